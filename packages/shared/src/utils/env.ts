import process from "node:process";

type Env = NodeJS.ProcessEnv;

export function envString(key: string, fallback = "", env: Env = process.env): string {
  return env[key]?.trim() || fallback;
}

export function envInt(key: string, fallback: number, env: Env = process.env, min = Number.MIN_SAFE_INTEGER): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < min) return fallback;
  return parsed;
}

export function envBool(key: string, fallback = false, env: Env = process.env): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === "1" || raw === "true" || raw === "yes";
}

export function envOneOf<T extends string>(key: string, allowed: readonly T[], env: Env = process.env): T | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return undefined;
  return allowed.find((value) => value === raw);
}
