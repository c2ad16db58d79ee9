import type { TripwrightConfig } from "@tripwright/core";
import { OpenAIReasoningProvider, ReasoningProviderRegistry, ScriptedReasoningProvider } from "@tripwright/llm-sdk";
import type { ReasoningProvider } from "@tripwright/llm-sdk";

/**
 * Builds the provider registry from the `llm` config section. The scripted provider is
 * always available; OpenAI joins once it has an API key.
 */
export function createReasoningRegistry(llm: TripwrightConfig["llm"]): ReasoningProviderRegistry {
  const registry = new ReasoningProviderRegistry();
  const scripted = llm.providers.scripted;
  registry.register(new ScriptedReasoningProvider({ scriptPath: scripted?.scriptPath }));

  const openai = llm.providers.openai;
  if (openai?.apiKey) {
    registry.register(
      new OpenAIReasoningProvider({ apiKey: openai.apiKey, model: openai.model, baseUrl: openai.baseUrl }),
    );
  }
  return registry;
}

export function resolveReasoning(llm: TripwrightConfig["llm"]): ReasoningProvider {
  return createReasoningRegistry(llm).require(llm.defaultProvider);
}
