import type { ConversationEntry, TokenUsage, ToolManifestEntry, ToolRequest } from "./conversation.js";

export type ReasoningInput = {
  messages: ConversationEntry[];
  tools: ToolManifestEntry[];
  signal: AbortSignal;
};

export type ReasoningDecision =
  | { kind: "final-answer"; text: string; usage?: TokenUsage }
  | { kind: "tool-requests"; text?: string; requests: ToolRequest[]; usage?: TokenUsage };

export type ReasoningChunk =
  | { type: "delta"; text: string }
  | { type: "decision"; decision: ReasoningDecision };

/**
 * The opaque model call. Given the conversation and the tools on offer it either answers
 * or asks for tool invocations. `stream` is optional; when present it must end with
 * exactly one `decision` chunk.
 */
export interface ReasoningCapability {
  readonly id: string;
  readonly name: string;

  decide(input: ReasoningInput): Promise<ReasoningDecision>;
  stream?(input: ReasoningInput): AsyncIterable<ReasoningChunk>;
}
