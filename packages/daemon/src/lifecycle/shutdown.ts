import type { Logger } from "@tripwright/core";

export type ShutdownHandler = () => Promise<void> | void;

type NamedHandler = { name: string; handler: ShutdownHandler };

export type GracefulShutdownOptions = {
  logger?: Logger;
  exit?: (code: number) => void;
};

/** Runs registered cleanup in order on SIGINT/SIGTERM, then exits. */
export class GracefulShutdown {
  private handlers: NamedHandler[] = [];
  private shuttingDown = false;
  private logger?: Logger;
  private exit: (code: number) => void;

  constructor(opts: GracefulShutdownOptions = {}) {
    this.logger = opts.logger;
    this.exit = opts.exit ?? ((code) => process.exit(code));
  }

  register(name: string, handler: ShutdownHandler): void {
    this.handlers.push({ name, handler });
  }

  attachSignals(): void {
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        this.shutdown(signal).then(
          (failed) => this.exit(failed.length > 0 ? 1 : 0),
          () => this.exit(1),
        );
      });
    }
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /** Runs every handler once. Resolves with the names of the handlers that failed. */
  async shutdown(reason: string): Promise<string[]> {
    if (this.shuttingDown) return [];
    this.shuttingDown = true;
    this.logger?.info("Shutting down", { reason, handlers: this.handlers.length });
    return this.executeHandlers();
  }

  async executeHandlers(): Promise<string[]> {
    const failed: string[] = [];
    for (const { name, handler } of this.handlers) {
      try {
        await handler();
      } catch (err) {
        failed.push(name);
        this.logger?.warn("Shutdown handler failed", { handler: name, error: err instanceof Error ? err.message : String(err) });
      }
    }
    return failed;
  }
}
