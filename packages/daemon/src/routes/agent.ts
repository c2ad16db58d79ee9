import type { FastifyInstance, FastifyRequest } from "fastify";
import { OrchestrationError, PersistenceError, toErrorInfo } from "@tripwright/core";
import type { Orchestrator } from "@tripwright/core";
import { parsePlanRequest } from "./plan-request.js";
import { formatSseFrame, isWritable, openEventStream } from "./sse.js";

const ANONYMOUS = "anonymous";

/** Caller identity from `x-user-id`. Unauthenticated. */
export function callerId(req: FastifyRequest): string {
  const header = req.headers["x-user-id"];
  const value = Array.isArray(header) ? header[0] : header;
  return value?.trim() || ANONYMOUS;
}

export function agentRoutes(app: FastifyInstance, orchestrator: Orchestrator) {
  app.post("/agent/plan", async (req, reply) => {
    const parsed = parsePlanRequest(req.body, callerId(req));
    if (!parsed.ok) {
      return reply.code(400).send({ error: "Invalid plan request", issues: parsed.issues });
    }

    try {
      const result = await orchestrator.run(parsed.request);
      return reply.code(result.status === "completed" ? 201 : 422).send(result);
    } catch (err) {
      if (err instanceof PersistenceError) {
        req.log.error({ err }, "run outcome could not be stored");
        if (err.result) {
          return reply.code(502).send({ error: toErrorInfo(err), result: err.result });
        }
        return reply.code(503).send({ error: toErrorInfo(err) });
      }
      if (err instanceof OrchestrationError && err.kind === "validation") {
        return reply.code(400).send({ error: "Invalid plan request", issues: [err.message] });
      }
      throw err;
    }
  });

  app.post("/agent/stream", async (req, reply) => {
    const parsed = parsePlanRequest(req.body, callerId(req));
    if (!parsed.ok) {
      return reply.code(400).send({ error: "Invalid plan request", issues: parsed.issues });
    }

    const disconnect = new AbortController();
    reply.raw.on("close", () => {
      if (!reply.raw.writableFinished) disconnect.abort();
    });

    openEventStream(reply);
    try {
      for await (const event of orchestrator.stream(parsed.request, { signal: disconnect.signal })) {
        if (!isWritable(reply)) break;
        reply.raw.write(formatSseFrame(event.type, event));
      }
    } catch (err) {
      req.log.error({ err }, "stream failed");
      if (isWritable(reply)) {
        reply.raw.write(formatSseFrame("error", { error: toErrorInfo(err) }));
      }
    } finally {
      if (isWritable(reply)) reply.raw.end();
    }
  });
}
