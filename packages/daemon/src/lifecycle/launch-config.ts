import { loadConfig } from "@tripwright/core";
import { envBool } from "@tripwright/shared";
import type { ConfigSource, TripwrightConfig } from "@tripwright/core";

const ALLOW_OPEN_BIND_ENV = "TRIPWRIGHT_ALLOW_OPEN_BIND";

export type DaemonLaunchConfig = {
  port: number;
  host: string;
  config: TripwrightConfig;
  sources: ConfigSource[];
  /** Config files that were skipped, with the reason. */
  warnings: string[];
};

export type LaunchOptions = {
  projectDir?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  argv?: string[];
};

function parsePort(value: unknown): number | undefined {
  if (typeof value !== "string") return undefined;
  const parsed = Number.parseInt(value.trim(), 10);
  if (Number.isFinite(parsed) && parsed >= 1 && parsed <= 65535) return parsed;
  return undefined;
}

function parseHost(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  if (!normalized) return undefined;
  if (/\s/.test(normalized)) return undefined;
  return normalized;
}

/** `--port 8080` or `--port=8080`. */
function flagValue(argv: string[], name: string): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === `--${name}`) return argv[i + 1];
    if (arg?.startsWith(`--${name}=`)) return arg.slice(name.length + 3);
  }
  return undefined;
}

export function isLoopbackHost(host: string): boolean {
  const normalizedHost = host.trim().toLowerCase();
  return normalizedHost === "127.0.0.1" || normalizedHost === "::1" || normalizedHost === "localhost";
}

function assertSafeBind(host: string, env: NodeJS.ProcessEnv): void {
  if (isLoopbackHost(host)) return;
  if (envBool(ALLOW_OPEN_BIND_ENV, false, env)) return;
  throw new Error(
    `Refusing to bind the daemon to "${host}": it has no authentication. ` +
      `Bind to loopback, or set ${ALLOW_OPEN_BIND_ENV}=1 behind a trusted proxy.`,
  );
}

/** Layered config plus command-line overrides for the listen address. */
export function resolveLaunchConfig(opts: LaunchOptions = {}): DaemonLaunchConfig {
  const env = opts.env ?? process.env;
  const argv = opts.argv ?? [];
  const { config, sources, errors } = loadConfig(opts.projectDir, { homeDir: opts.homeDir, env });

  const port = parsePort(flagValue(argv, "port")) ?? config.daemon.port;
  const host = parseHost(flagValue(argv, "host")) ?? config.daemon.host;
  assertSafeBind(host, env);

  return {
    port,
    host,
    config: { ...config, daemon: { port, host } },
    sources,
    warnings: errors,
  };
}
