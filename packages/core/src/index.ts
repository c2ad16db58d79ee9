export * from "./errors.js";

export type * from "./config/types.js";
export {
  DEFAULT_AGENT_SETTINGS,
  DEFAULT_CONFIG,
  LOG_FORMATS,
  LOG_LEVELS,
  TOOL_CONCURRENCY_MODES,
  mergeConfig,
  validateConfig,
} from "./config/schema.js";
export { loadConfig, getConfigValue, setConfigValue } from "./config/loader.js";
export type { LoadOptions, LoadResult } from "./config/loader.js";

export { Logger, createLogger, silentLogger, formatJson, formatPretty } from "./logging/logger.js";
export type { LogEntry, LogOutput, LoggerOptions } from "./logging/logger.js";

export type * from "./tools/types.js";
export { defineCapability, formatIssues } from "./tools/define.js";
export type { CapabilityDefinition } from "./tools/define.js";
export { CapabilityRegistry } from "./tools/registry.js";

export { RunState } from "./state/run-state.js";
export type { RunOutput, RunSnapshot, RunStateInit, ToolOutcome } from "./state/run-state.js";

export { ExecutionGraph, normalizeDecision } from "./graph/execution-graph.js";
export type { ExecutionGraphDeps, GraphSettings } from "./graph/execution-graph.js";
export { nextState } from "./graph/routing.js";
export type { GraphState } from "./graph/routing.js";

export type { RunRecordQuery, RunRecordStore } from "./storage/run-record-store.js";
export { InMemoryRunRecordStore } from "./storage/memory-store.js";
export type { InMemoryRunRecordStoreOptions } from "./storage/memory-store.js";
export { DrizzleRunRecordStore } from "./storage/drizzle-store.js";
export { createDatabase } from "./storage/connection.js";
export type { Database, DatabaseHandle } from "./storage/connection.js";
export { agentRuns } from "./storage/schema.js";

export { JsonItineraryFormatter, itinerarySchema } from "./format/itinerary.js";
export type { ItineraryFormatter } from "./format/itinerary.js";

export { EventBus } from "./events/event-bus.js";

export { Orchestrator } from "./orchestrator/orchestrator.js";
export type { OrchestratorDeps, OrchestratorSettings, RunOptions, RunRequest } from "./orchestrator/orchestrator.js";
