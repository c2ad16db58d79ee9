export type TripwrightConfig = {
  daemon: {
    host: string;
    port: number;
  };
  database: {
    url: string;
  };
  llm: {
    defaultProvider: string;
    providers: Record<string, LLMProviderEntry>;
  };
  agent: AgentSettings;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
};

export type LLMProviderEntry = {
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  /** Scripted provider only: JSON file of decisions to replay. */
  scriptPath?: string;
};

export type ToolConcurrency = "parallel" | "sequential";

export type AgentSettings = {
  /** Completed reasoning/tool cycles allowed before a run fails. */
  maxIterations: number;
  reasoningTimeoutMs: number;
  toolTimeoutMs: number;
  runDeadlineMs: number;
  toolConcurrency: ToolConcurrency;
  /** Tool output longer than this is cut before it re-enters the conversation. */
  maxToolResultChars: number;
};

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFormat = "json" | "pretty";

export type ConfigSource = "global" | "project" | "env" | "default";
