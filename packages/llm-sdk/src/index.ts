export type { ModelDef, ReasoningProvider } from "./types.js";
export { ReasoningProviderRegistry } from "./provider-registry.js";
export { ToolCallAccumulator, parseSseLines, parseToolArguments, readSseStream } from "./stream-parsers.js";
export type { SSELine, ToolCallDelta } from "./stream-parsers.js";
export { buildSystemPrompt } from "./system-prompt.js";
export type { PromptContext } from "./system-prompt.js";
export { OpenAIReasoningProvider } from "./providers/openai.js";
export type { OpenAIConfig } from "./providers/openai.js";
export { ScriptedReasoningProvider, loadScript, travelDemoScript } from "./providers/scripted.js";
export type { ScriptFn, ScriptedProviderConfig } from "./providers/scripted.js";
