export const MESSAGE_ROLES = ["system", "user", "assistant", "tool"] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export type ToolRequest = {
  id: string;
  name: string;
  /** Raw arguments as produced by the reasoning step; validated against the capability schema later. */
  arguments: unknown;
};

export type ConversationEntry = {
  role: MessageRole;
  content: string;
  at: number;
  toolCalls?: ToolRequest[];
  toolCallId?: string;
  toolName?: string;
  success?: boolean;
};

export type JsonSchema = Record<string, unknown>;

export type ToolManifestEntry = {
  name: string;
  description: string;
  parameters: JsonSchema;
};

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
};
