import { CapabilityRegistry } from "@tripwright/core";
import type { Capability } from "@tripwright/core";
import { createBudgetTool } from "./budget-tool.js";
import { createWeatherTool } from "./weather-tool.js";

export { createBudgetTool, DAILY_RATE_USD } from "./budget-tool.js";
export { createWeatherTool, forecastFor } from "./weather-tool.js";

/** Registry with the built-in capabilities plus any extras. Left unlocked; the orchestrator locks it. */
export function createCapabilityRegistry(extra: Capability[] = []): CapabilityRegistry {
  const registry = new CapabilityRegistry();
  registry.register(createWeatherTool());
  registry.register(createBudgetTool());
  for (const capability of extra) {
    registry.register(capability);
  }
  return registry;
}
