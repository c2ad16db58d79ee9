import type { FastifyInstance } from "fastify";
import { TERMINAL_RUN_STATUSES } from "@tripwright/shared";
import type { RunRecord, StreamEvent } from "@tripwright/shared";
import type { EventBus, RunRecordStore } from "@tripwright/core";
import { formatSseFrame, isWritable, openEventStream } from "./sse.js";

function isTerminal(event: StreamEvent): boolean {
  return event.type === "final-result" || event.type === "error";
}

/** Live tail of a run's events. Nothing is replayed; a finished run only reports its status. */
export function eventRoutes(app: FastifyInstance, eventBus: EventBus, store: RunRecordStore) {
  app.get<{ Params: { id: string } }>("/runs/:id/events", async (req, reply) => {
    const runId = req.params.id;
    // Subscribe before the lookup so nothing published in between is lost.
    const early: StreamEvent[] = [];
    let open = false;
    let done = false;

    const finish = () => {
      if (done) return;
      done = true;
      unsubscribe();
      if (isWritable(reply)) reply.raw.end();
    };
    const forward = (event: StreamEvent) => {
      if (done || !isWritable(reply)) return;
      reply.raw.write(formatSseFrame(event.type, event));
      if (isTerminal(event)) finish();
    };
    const unsubscribe = eventBus.onRun(runId, (event) => {
      if (open) forward(event);
      else early.push(event);
    });

    let run: RunRecord | undefined;
    try {
      run = await store.getRunRecord(runId);
    } catch (err) {
      unsubscribe();
      throw err;
    }
    if (!run) {
      unsubscribe();
      return reply.code(404).send({ error: "Run not found" });
    }

    openEventStream(reply);
    reply.raw.on("close", finish);
    open = true;

    if (early.length === 0 && TERMINAL_RUN_STATUSES.has(run.status)) {
      reply.raw.write(formatSseFrame("end", { runId, status: run.status }));
      finish();
      return;
    }
    for (const event of early.splice(0)) forward(event);
  });
}
