import Fastify from "fastify";
import type { FastifyServerOptions } from "fastify";
import {
  DrizzleRunRecordStore,
  EventBus,
  InMemoryRunRecordStore,
  JsonItineraryFormatter,
  Orchestrator,
  PersistenceError,
  createDatabase,
  createLogger,
  toErrorInfo,
} from "@tripwright/core";
import type { CapabilityRegistry, DatabaseHandle, RunRecordStore, TripwrightConfig } from "@tripwright/core";
import type { ReasoningCapability } from "@tripwright/shared";
import { buildSystemPrompt } from "@tripwright/llm-sdk";
import { agentRoutes } from "../routes/agent.js";
import { eventRoutes } from "../routes/events.js";
import { healthRoutes } from "../routes/health.js";
import type { HealthProbe } from "../routes/health.js";
import { runRoutes } from "../routes/runs.js";
import { resolveReasoning } from "../services/reasoning-service.js";
import { createCapabilityRegistry } from "../tools/index.js";

export type ServerOptions = {
  config: TripwrightConfig;
  /** Replaces the configured store; tests pass an in-memory or failing one. */
  store?: RunRecordStore;
  /** Replaces the configured reasoning provider. */
  reasoning?: ReasoningCapability;
  registry?: CapabilityRegistry;
  logger?: FastifyServerOptions["logger"];
};

export async function createServer(opts: ServerOptions) {
  const { config } = opts;
  const app = Fastify({ logger: opts.logger ?? { level: config.logging.level } });

  let database: DatabaseHandle | null = null;
  let store = opts.store;
  if (!store) {
    if (config.database.url) {
      database = createDatabase(config.database.url);
      store = new DrizzleRunRecordStore(database.db);
      app.log.info("Run records stored in PostgreSQL");
    } else {
      store = new InMemoryRunRecordStore();
      app.log.info("TRIPWRIGHT_DATABASE_URL not set - run records kept in memory");
    }
  }

  const registry = opts.registry ?? createCapabilityRegistry();
  const reasoning = opts.reasoning ?? resolveReasoning(config.llm);
  const eventBus = new EventBus();
  const orchestrator = new Orchestrator({
    registry,
    reasoning,
    store,
    formatter: new JsonItineraryFormatter(),
    eventBus,
    logger: createLogger("orchestrator", config.logging),
    settings: {
      ...config.agent,
      systemPrompt: buildSystemPrompt({
        tools: [...registry.listManifest()],
        structuredOutput: true,
      }),
    },
  });

  const probes: Record<string, HealthProbe> = {
    store: async () => {
      if (!database) return { kind: "memory" };
      await database.ping();
      return { kind: "postgres" };
    },
    reasoning: () => ({ provider: reasoning.id, capabilities: registry.size }),
  };

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof PersistenceError) {
      req.log.error({ err }, "run store unavailable");
      return reply.code(503).send({ error: toErrorInfo(err) });
    }
    return reply.send(err);
  });

  await app.register(healthRoutes, { probes });
  agentRoutes(app, orchestrator);
  runRoutes(app, store);
  eventRoutes(app, eventBus, store);

  return {
    start: async () => {
      await app.listen({ port: config.daemon.port, host: config.daemon.host });
    },
    stop: async () => {
      await app.close();
      eventBus.removeAllListeners();
      await database?.close();
    },
    app,
    orchestrator,
    eventBus,
    store,
  };
}
