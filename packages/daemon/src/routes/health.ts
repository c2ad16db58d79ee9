import type { FastifyInstance } from "fastify";

/** Resolves with details when the dependency is usable; rejects when it is not. */
export type HealthProbe = () => Promise<Record<string, unknown>> | Record<string, unknown>;

export type HealthRouteOptions = {
  version?: string;
  probes?: Record<string, HealthProbe>;
};

type ProbeReport = { ok: boolean; error?: string } & Record<string, unknown>;

async function runProbes(probes: Record<string, HealthProbe>) {
  const entries = await Promise.all(
    Object.entries(probes).map(async ([name, probe]): Promise<[string, ProbeReport]> => {
      try {
        return [name, { ok: true, ...(await probe()) }];
      } catch (err) {
        return [name, { ok: false, error: err instanceof Error ? err.message : String(err) }];
      }
    }),
  );
  const checks = Object.fromEntries(entries);
  return { ready: entries.every(([, report]) => report.ok), checks };
}

export async function healthRoutes(app: FastifyInstance, opts?: HealthRouteOptions) {
  const version = opts?.version ?? "0.1.0";
  const probes = opts?.probes ?? {};

  app.get("/health", async () => {
    const { ready, checks } = await runProbes(probes);
    return {
      status: ready ? "ok" : "degraded",
      ready,
      version,
      uptime: process.uptime(),
      checks,
    };
  });

  app.get("/ready", async (_req, reply) => {
    const payload = await runProbes(probes);
    if (payload.ready) return payload;
    return reply.code(503).send(payload);
  });
}
