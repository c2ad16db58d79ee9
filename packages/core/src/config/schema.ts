import type { AgentSettings, TripwrightConfig } from "./types.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export const LOG_FORMATS = ["json", "pretty"] as const;
export const TOOL_CONCURRENCY_MODES = ["parallel", "sequential"] as const;

export const DEFAULT_AGENT_SETTINGS: AgentSettings = {
  maxIterations: 10,
  reasoningTimeoutMs: 60_000,
  toolTimeoutMs: 15_000,
  runDeadlineMs: 300_000,
  toolConcurrency: "parallel",
  maxToolResultChars: 30_000,
};

export const DEFAULT_CONFIG: TripwrightConfig = {
  daemon: {
    host: "127.0.0.1",
    port: 7433,
  },
  database: {
    url: "",
  },
  llm: {
    defaultProvider: "scripted",
    providers: {},
  },
  agent: { ...DEFAULT_AGENT_SETTINGS },
  logging: {
    level: "info",
    format: "pretty",
  },
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: unknown, allowed: readonly T[]): value is T {
  return typeof value === "string" && allowed.some((a) => a === value);
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

export function validateConfig(raw: Record<string, unknown>): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (isRecord(raw.daemon)) {
    const d = raw.daemon;
    if (d.port !== undefined && (typeof d.port !== "number" || d.port < 1 || d.port > 65535)) {
      errors.push("daemon.port must be a number between 1 and 65535");
    }
    if (d.host !== undefined && typeof d.host !== "string") {
      errors.push("daemon.host must be a string");
    }
  }

  if (isRecord(raw.database)) {
    if (raw.database.url !== undefined && typeof raw.database.url !== "string") {
      errors.push("database.url must be a string");
    }
  }

  if (isRecord(raw.llm)) {
    if (raw.llm.defaultProvider !== undefined && typeof raw.llm.defaultProvider !== "string") {
      errors.push("llm.defaultProvider must be a string");
    }
    if (raw.llm.providers !== undefined && !isRecord(raw.llm.providers)) {
      errors.push("llm.providers must be an object");
    }
  }

  if (isRecord(raw.agent)) {
    const a = raw.agent;
    for (const key of ["maxIterations", "reasoningTimeoutMs", "toolTimeoutMs", "runDeadlineMs", "maxToolResultChars"]) {
      if (a[key] !== undefined && !isPositiveInt(a[key])) {
        errors.push(`agent.${key} must be a positive integer`);
      }
    }
    if (a.toolConcurrency !== undefined && !isOneOf(a.toolConcurrency, TOOL_CONCURRENCY_MODES)) {
      errors.push("agent.toolConcurrency must be parallel or sequential");
    }
  }

  if (isRecord(raw.logging)) {
    const l = raw.logging;
    if (l.level !== undefined && !isOneOf(l.level, LOG_LEVELS)) {
      errors.push("logging.level must be debug, info, warn, error, or silent");
    }
    if (l.format !== undefined && !isOneOf(l.format, LOG_FORMATS)) {
      errors.push("logging.format must be json or pretty");
    }
  }

  return { valid: errors.length === 0, errors };
}

/** Overlays a validated source onto `base`. Unknown keys are ignored. */
export function mergeConfig(base: TripwrightConfig, override: Record<string, unknown>): TripwrightConfig {
  const result = structuredClone(base);

  if (isRecord(override.daemon)) {
    const d = override.daemon;
    if (typeof d.host === "string") result.daemon.host = d.host;
    if (typeof d.port === "number") result.daemon.port = d.port;
  }
  if (isRecord(override.database) && typeof override.database.url === "string") {
    result.database.url = override.database.url;
  }
  if (isRecord(override.llm)) {
    const llm = override.llm;
    if (typeof llm.defaultProvider === "string" && llm.defaultProvider) {
      result.llm.defaultProvider = llm.defaultProvider;
    }
    if (isRecord(llm.providers)) {
      for (const [id, entry] of Object.entries(llm.providers)) {
        if (!isRecord(entry)) continue;
        result.llm.providers[id] = {
          ...result.llm.providers[id],
          ...(typeof entry.model === "string" ? { model: entry.model } : {}),
          ...(typeof entry.apiKey === "string" ? { apiKey: entry.apiKey } : {}),
          ...(typeof entry.baseUrl === "string" ? { baseUrl: entry.baseUrl } : {}),
          ...(typeof entry.scriptPath === "string" ? { scriptPath: entry.scriptPath } : {}),
        };
      }
    }
  }
  if (isRecord(override.agent)) {
    const a = override.agent;
    if (isPositiveInt(a.maxIterations)) result.agent.maxIterations = a.maxIterations;
    if (isPositiveInt(a.reasoningTimeoutMs)) result.agent.reasoningTimeoutMs = a.reasoningTimeoutMs;
    if (isPositiveInt(a.toolTimeoutMs)) result.agent.toolTimeoutMs = a.toolTimeoutMs;
    if (isPositiveInt(a.runDeadlineMs)) result.agent.runDeadlineMs = a.runDeadlineMs;
    if (isPositiveInt(a.maxToolResultChars)) result.agent.maxToolResultChars = a.maxToolResultChars;
    if (isOneOf(a.toolConcurrency, TOOL_CONCURRENCY_MODES)) result.agent.toolConcurrency = a.toolConcurrency;
  }
  if (isRecord(override.logging)) {
    const l = override.logging;
    if (isOneOf(l.level, LOG_LEVELS)) result.logging.level = l.level;
    if (isOneOf(l.format, LOG_FORMATS)) result.logging.format = l.format;
  }

  return result;
}
