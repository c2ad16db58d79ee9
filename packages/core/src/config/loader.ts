import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { envInt, envOneOf, envString } from "@tripwright/shared";
import { DEFAULT_CONFIG, LOG_LEVELS, isRecord, mergeConfig, validateConfig } from "./schema.js";
import type { TripwrightConfig, ConfigSource } from "./types.js";

const CONFIG_DIR = ".tripwright";
const CONFIG_FILE = "config.json";

const ENV_KEYS = [
  "TRIPWRIGHT_DAEMON_PORT",
  "TRIPWRIGHT_DAEMON_HOST",
  "TRIPWRIGHT_DATABASE_URL",
  "TRIPWRIGHT_LOG_LEVEL",
  "TRIPWRIGHT_MAX_ITERATIONS",
  "OPENAI_API_KEY",
] as const;

export type LoadResult = {
  config: TripwrightConfig;
  sources: ConfigSource[];
  errors: string[];
};

export type LoadOptions = {
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
};

export function loadConfig(projectDir?: string, opts: LoadOptions = {}): LoadResult {
  const env = opts.env ?? process.env;
  const sources: ConfigSource[] = ["default"];
  const errors: string[] = [];
  let config = structuredClone(DEFAULT_CONFIG);

  const globalPath = path.join(opts.homeDir ?? os.homedir(), CONFIG_DIR, CONFIG_FILE);
  const globalRaw = readJsonFile(globalPath, errors, "global");
  if (globalRaw) {
    const validation = validateConfig(globalRaw);
    if (validation.valid) {
      config = mergeConfig(config, globalRaw);
      sources.push("global");
    } else {
      errors.push(...validation.errors.map((e) => `[global] ${e}`));
    }
  }

  if (projectDir) {
    const projectPath = path.join(projectDir, CONFIG_DIR, CONFIG_FILE);
    const projectRaw = readJsonFile(projectPath, errors, "project");
    if (projectRaw) {
      const validation = validateConfig(projectRaw);
      if (validation.valid) {
        config = mergeConfig(config, projectRaw);
        sources.push("project");
      } else {
        errors.push(...validation.errors.map((e) => `[project] ${e}`));
      }
    }
  }

  if (hasEnvOverrides(env)) {
    config = applyEnvOverrides(config, env);
    sources.push("env");
  }

  return { config, sources, errors };
}

export function getConfigValue(config: TripwrightConfig, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Returns a copy of `config` with the dotted `key` set. The result is re-validated so a
 * bad value cannot slip in; invalid writes throw.
 */
export function setConfigValue(config: TripwrightConfig, key: string, value: unknown): TripwrightConfig {
  const parts = key.split(".");
  const override: Record<string, unknown> = {};
  let current = override;
  for (let i = 0; i < parts.length - 1; i++) {
    const next: Record<string, unknown> = {};
    current[parts[i] ?? ""] = next;
    current = next;
  }
  current[parts[parts.length - 1] ?? ""] = value;

  const validation = validateConfig(override);
  if (!validation.valid) {
    throw new Error(`Invalid value for ${key}: ${validation.errors.join("; ")}`);
  }
  return mergeConfig(config, override);
}

function readJsonFile(
  filePath: string,
  errors: string[],
  label: "global" | "project",
): Record<string, unknown> | null {
  if (!fs.existsSync(filePath)) return null;
  const content = fs.readFileSync(filePath, "utf-8").trim();
  if (!content) return null;
  try {
    const parsed: unknown = JSON.parse(content);
    if (isRecord(parsed)) return parsed;
    errors.push(`[${label}] config must be a JSON object`);
  } catch (err) {
    errors.push(`[${label}] ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return null;
}

function applyEnvOverrides(config: TripwrightConfig, env: NodeJS.ProcessEnv): TripwrightConfig {
  const result = structuredClone(config);

  result.daemon.port = envInt("TRIPWRIGHT_DAEMON_PORT", result.daemon.port, env, 1);
  result.daemon.host = envString("TRIPWRIGHT_DAEMON_HOST", result.daemon.host, env);
  result.database.url = envString("TRIPWRIGHT_DATABASE_URL", result.database.url, env);
  result.agent.maxIterations = envInt("TRIPWRIGHT_MAX_ITERATIONS", result.agent.maxIterations, env, 1);
  result.logging.level = envOneOf("TRIPWRIGHT_LOG_LEVEL", LOG_LEVELS, env) ?? result.logging.level;

  const apiKey = envString("OPENAI_API_KEY", "", env);
  if (apiKey) {
    result.llm.providers.openai = { ...result.llm.providers.openai, apiKey };
  }

  return result;
}

function hasEnvOverrides(env: NodeJS.ProcessEnv): boolean {
  return ENV_KEYS.some((key) => Boolean(env[key]));
}
