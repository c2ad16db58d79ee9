import { describe, it, expect, vi, afterEach } from "vitest";
import type { ReasoningChunk, ReasoningInput } from "@tripwright/shared";
import { OpenAIReasoningProvider, toWireMessage } from "./openai.js";

const TOOLS = [
  {
    name: "get_weather",
    description: "Forecast for a city",
    parameters: { type: "object", properties: { city: { type: "string" } }, required: ["city"] },
  },
];

function input(overrides: Partial<ReasoningInput> = {}): ReasoningInput {
  return {
    messages: [
      { role: "system", content: "You plan trips.", at: 1 },
      { role: "user", content: "Plan a 3-day trip to Lisbon", at: 2 },
    ],
    tools: TOOLS,
    signal: new AbortController().signal,
    ...overrides,
  };
}

function sse(...frames: string[]): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const frame of frames) controller.enqueue(encoder.encode(`data: ${frame}\n\n`));
      controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { "content-type": "text/event-stream" } });
}

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => response);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

async function collect(chunks: AsyncIterable<ReasoningChunk>): Promise<ReasoningChunk[]> {
  const out: ReasoningChunk[] = [];
  for await (const chunk of chunks) out.push(chunk);
  return out;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OpenAIReasoningProvider", () => {
  it("has correct id and name", () => {
    const provider = new OpenAIReasoningProvider({ apiKey: "test-key" });
    expect(provider.id).toBe("openai");
    expect(provider.name).toBe("OpenAI");
  });

  it("resolves known models and rejects unknown ones", () => {
    const provider = new OpenAIReasoningProvider({ apiKey: "test-key" });
    expect(provider.resolveModel("gpt-4o")?.contextWindow).toBe(128000);
    expect(provider.resolveModel("gpt-99")).toBeUndefined();
  });

  describe("decide", () => {
    it("maps tool calls to tool requests", async () => {
      const fetchMock = stubFetch(
        Response.json({
          choices: [
            {
              message: {
                content: null,
                tool_calls: [{ id: "call_1", type: "function", function: { name: "get_weather", arguments: '{"city":"Lisbon"}' } }],
              },
              finish_reason: "tool_calls",
            },
          ],
          usage: { prompt_tokens: 120, completion_tokens: 18, total_tokens: 138 },
        }),
      );
      const provider = new OpenAIReasoningProvider({ apiKey: "test-key", baseUrl: "http://llm.test/v1/" });

      const decision = await provider.decide(input());

      expect(decision).toEqual({
        kind: "tool-requests",
        requests: [{ id: "call_1", name: "get_weather", arguments: { city: "Lisbon" } }],
        usage: { inputTokens: 120, outputTokens: 18, totalTokens: 138 },
      });
      const [url, init] = fetchMock.mock.calls[0]!;
      expect(url).toBe("http://llm.test/v1/chat/completions");
      expect(init.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-key" });
    });

    it("returns a final answer when no tools are requested", async () => {
      stubFetch(Response.json({ choices: [{ message: { content: "Day 1: Alfama." }, finish_reason: "stop" }] }));
      const provider = new OpenAIReasoningProvider({ apiKey: "test-key" });

      expect(await provider.decide(input())).toEqual({ kind: "final-answer", text: "Day 1: Alfama." });
    });

    it("throws on HTTP errors", async () => {
      stubFetch(new Response("busy", { status: 503, statusText: "Service Unavailable" }));
      const provider = new OpenAIReasoningProvider({ apiKey: "test-key" });

      await expect(provider.decide(input())).rejects.toThrow("OpenAI API error: 503 Service Unavailable");
    });

    it("throws on an unexpected body", async () => {
      stubFetch(Response.json({ choices: [] }));
      const provider = new OpenAIReasoningProvider({ apiKey: "test-key" });

      await expect(provider.decide(input())).rejects.toThrow("unexpected completion shape");
    });
  });

  describe("stream", () => {
    it("yields content deltas and a closing final answer", async () => {
      stubFetch(
        sse(
          JSON.stringify({ choices: [{ delta: { content: "Day 1: " } }] }),
          JSON.stringify({ choices: [{ delta: { content: "Alfama." } }] }),
          JSON.stringify({ choices: [], usage: { prompt_tokens: 10, completion_tokens: 4, total_tokens: 14 } }),
          "[DONE]",
        ),
      );
      const provider = new OpenAIReasoningProvider({ apiKey: "test-key" });

      const chunks = await collect(provider.stream(input()));

      expect(chunks).toEqual([
        { type: "delta", text: "Day 1: " },
        { type: "delta", text: "Alfama." },
        {
          type: "decision",
          decision: {
            kind: "final-answer",
            text: "Day 1: Alfama.",
            usage: { inputTokens: 10, outputTokens: 4, totalTokens: 14 },
          },
        },
      ]);
    });

    it("reassembles streamed tool calls", async () => {
      stubFetch(
        sse(
          JSON.stringify({
            choices: [{ delta: { tool_calls: [{ index: 0, id: "call_1", function: { name: "get_weather", arguments: "" } }] } }],
          }),
          JSON.stringify({ choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '{"city":' } }] } }] }),
          "not json",
          JSON.stringify({ choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '"Lisbon"}' } }] } }] }),
          "[DONE]",
        ),
      );
      const provider = new OpenAIReasoningProvider({ apiKey: "test-key" });

      const chunks = await collect(provider.stream(input()));

      expect(chunks).toEqual([
        {
          type: "decision",
          decision: {
            kind: "tool-requests",
            requests: [{ id: "call_1", name: "get_weather", arguments: { city: "Lisbon" } }],
          },
        },
      ]);
    });

    it("asks for usage in the final chunk", async () => {
      const fetchMock = stubFetch(sse("[DONE]"));
      const provider = new OpenAIReasoningProvider({ apiKey: "test-key", model: "gpt-4o" });

      await collect(provider.stream(input()));

      const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]![1].body));
      expect(body).toMatchObject({ model: "gpt-4o", stream: true, stream_options: { include_usage: true } });
    });
  });

  describe("buildRequestBody", () => {
    it("offers the tool manifest as functions", () => {
      const provider = new OpenAIReasoningProvider({ apiKey: "test-key" });
      const body = provider.buildRequestBody(input());

      expect(body.tools).toEqual([{ type: "function", function: TOOLS[0] }]);
      expect(body.tool_choice).toBe("auto");
    });

    it("omits tools when none are registered", () => {
      const provider = new OpenAIReasoningProvider({ apiKey: "test-key" });
      const body = provider.buildRequestBody(input({ tools: [] }));

      expect(body).not.toHaveProperty("tools");
    });
  });
});

describe("toWireMessage", () => {
  it("renders assistant tool calls with JSON arguments", () => {
    expect(
      toWireMessage({
        role: "assistant",
        content: "",
        at: 3,
        toolCalls: [{ id: "call_1", name: "get_weather", arguments: { city: "Lisbon" } }],
      }),
    ).toEqual({
      role: "assistant",
      content: null,
      tool_calls: [{ id: "call_1", type: "function", function: { name: "get_weather", arguments: '{"city":"Lisbon"}' } }],
    });
  });

  it("links tool results to their call", () => {
    expect(toWireMessage({ role: "tool", content: '{"forecast":"sunny"}', at: 4, toolCallId: "call_1", toolName: "get_weather" })).toEqual({
      role: "tool",
      tool_call_id: "call_1",
      content: '{"forecast":"sunny"}',
    });
  });
});
