import { EventEmitter } from "node:events";
import type { StreamEvent } from "@tripwright/shared";

type EventHandler = (event: StreamEvent) => void;

const ALL = "event";

export class EventBus {
  private emitter = new EventEmitter();

  constructor() {
    // One listener per live SSE tail.
    this.emitter.setMaxListeners(0);
  }

  publish(event: StreamEvent): void {
    this.emitter.emit(ALL, event);
    this.emitter.emit(runChannel(event.runId), event);
  }

  onAll(handler: EventHandler): () => void {
    this.emitter.on(ALL, handler);
    return () => this.emitter.off(ALL, handler);
  }

  onRun(runId: string, handler: EventHandler): () => void {
    const channel = runChannel(runId);
    this.emitter.on(channel, handler);
    return () => this.emitter.off(channel, handler);
  }

  listenerCount(runId?: string): number {
    return this.emitter.listenerCount(runId === undefined ? ALL : runChannel(runId));
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}

function runChannel(runId: string): string {
  return `run:${runId}`;
}
