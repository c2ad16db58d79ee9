import type { FastifyInstance } from "fastify";
import type { RunRecordStore } from "@tripwright/core";

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

function parseLimit(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1) return DEFAULT_LIMIT;
  return Math.min(parsed, MAX_LIMIT);
}

export function runRoutes(app: FastifyInstance, store: RunRecordStore) {
  app.get<{ Params: { id: string } }>("/runs/:id", async (req, reply) => {
    const run = await store.getRunRecord(req.params.id);
    if (!run) return reply.code(404).send({ error: "Run not found" });
    return run;
  });

  app.get<{ Querystring: { userId?: string; limit?: string } }>("/runs", async (req) => {
    return store.listRunRecords({ userId: req.query.userId, limit: parseLimit(req.query.limit) });
  });
}
