import process from "node:process";
import { createLogger } from "@tripwright/core";
import { createServer } from "./server/server.js";
import { GracefulShutdown } from "./lifecycle/shutdown.js";
import { resolveLaunchConfig } from "./lifecycle/launch-config.js";

let log = createLogger("daemon");
let activeServer: Awaited<ReturnType<typeof createServer>> | null = null;

async function stopServer(): Promise<void> {
  if (!activeServer) return;
  const current = activeServer;
  activeServer = null;
  await current.stop();
}

let fatalInProgress = false;

async function handleFatal(source: string, err: unknown): Promise<void> {
  if (fatalInProgress) return;
  fatalInProgress = true;
  log.error(`Fatal (${source})`, { error: err instanceof Error ? (err.stack ?? err.message) : String(err) });
  try {
    await stopServer();
  } catch (stopErr) {
    log.error("Server did not stop cleanly", { error: String(stopErr) });
  }
  process.exit(1);
}

process.on("uncaughtException", (err) => {
  void handleFatal("uncaughtException", err);
});

process.on("unhandledRejection", (reason) => {
  void handleFatal("unhandledRejection", reason);
});

async function main() {
  const launch = resolveLaunchConfig({ projectDir: process.cwd(), argv: process.argv.slice(2) });
  log = createLogger("daemon", launch.config.logging);
  for (const warning of launch.warnings) {
    log.warn("Config source skipped", { warning });
  }
  log.info("Configuration loaded", { sources: launch.sources });

  const server = await createServer({ config: launch.config });
  activeServer = server;

  const shutdown = new GracefulShutdown({ logger: log });
  shutdown.register("server", stopServer);
  shutdown.attachSignals();

  await server.start();
}

main().catch((err) => {
  void handleFatal("startup", err);
});
