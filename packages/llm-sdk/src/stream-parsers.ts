import type { ToolRequest } from "@tripwright/shared";

export type SSELine = { event?: string; data: string };

export function* parseSseLines(buffer: string): Generator<SSELine> {
  const lines = buffer.split("\n");
  let currentEvent: string | undefined;

  for (const line of lines) {
    if (line.startsWith("event: ")) {
      currentEvent = line.slice(7).trim();
      continue;
    }
    if (line.startsWith("data: ")) {
      const data = line.slice(6).trim();
      yield { event: currentEvent, data };
      currentEvent = undefined;
    }
  }
}

export async function* readSseStream(
  reader: ReadableStreamDefaultReader<Uint8Array>,
): AsyncGenerator<SSELine> {
  const decoder = new TextDecoder();
  let buffer = "";

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;

    buffer += decoder.decode(value, { stream: true }).replace(/\r\n/g, "\n");
    const parts = buffer.split("\n\n");
    buffer = parts.pop() ?? "";

    for (const part of parts) {
      for (const line of parseSseLines(part)) {
        yield line;
      }
    }
  }

  if (buffer.trim()) {
    for (const line of parseSseLines(buffer)) {
      yield line;
    }
  }
}

/**
 * Tool arguments arrive as a JSON string. Empty means no arguments; anything that does not
 * parse is passed through as the raw string so capability validation reports it.
 */
export function parseToolArguments(raw: string | undefined): unknown {
  if (!raw || !raw.trim()) return {};
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export type ToolCallDelta = {
  index: number;
  id?: string;
  name?: string;
  arguments?: string;
};

/** Stitches streamed tool-call fragments back together, keyed by their index. */
export class ToolCallAccumulator {
  private calls = new Map<number, { id: string; name: string; arguments: string }>();

  add(delta: ToolCallDelta): void {
    const call = this.calls.get(delta.index) ?? { id: "", name: "", arguments: "" };
    if (delta.id) call.id = delta.id;
    if (delta.name) call.name += delta.name;
    if (delta.arguments) call.arguments += delta.arguments;
    this.calls.set(delta.index, call);
  }

  get size(): number {
    return this.calls.size;
  }

  requests(): ToolRequest[] {
    return [...this.calls.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, call]) => ({ id: call.id, name: call.name, arguments: parseToolArguments(call.arguments) }));
  }
}
