import type { LogFormat, LogLevel } from "../config/types.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogEntry = {
  level: LogLevel;
  subsystem: string;
  message: string;
  data?: Record<string, unknown>;
  ts: string;
};

export type LogOutput = (entry: LogEntry) => void;

export type LoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  output?: LogOutput;
};

export class Logger {
  private subsystem: string;
  private level: LogLevel;
  private output: LogOutput;

  constructor(subsystem: string, level: LogLevel = "info", output?: LogOutput) {
    this.subsystem = subsystem;
    this.level = level;
    this.output = output ?? prettyOutput;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  child(subsystem: string): Logger {
    return new Logger(`${this.subsystem}:${subsystem}`, this.level, this.output);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== "silent" && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    this.output({
      level,
      subsystem: this.subsystem,
      message,
      data,
      ts: new Date().toISOString(),
    });
  }
}

export function formatPretty(entry: LogEntry): string {
  const prefix = `[${entry.ts}] [${entry.level.toUpperCase()}] [${entry.subsystem}]`;
  const msg = entry.data ? `${entry.message} ${JSON.stringify(entry.data)}` : entry.message;
  return `${prefix} ${msg}`;
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    ts: entry.ts,
    level: entry.level,
    subsystem: entry.subsystem,
    msg: entry.message,
    ...entry.data,
  });
}

function write(entry: LogEntry, line: string): void {
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function prettyOutput(entry: LogEntry): void {
  write(entry, formatPretty(entry));
}

function jsonOutput(entry: LogEntry): void {
  write(entry, formatJson(entry));
}

export function createLogger(subsystem: string, opts: LoggerOptions = {}): Logger {
  const output = opts.output ?? (opts.format === "json" ? jsonOutput : prettyOutput);
  return new Logger(subsystem, opts.level, output);
}

/** Logger that drops everything; the default when a caller does not supply one. */
export function silentLogger(): Logger {
  return new Logger("silent", "silent", () => {});
}
