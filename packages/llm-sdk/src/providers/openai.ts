import { z } from "zod";
import type {
  ConversationEntry,
  ReasoningChunk,
  ReasoningDecision,
  ReasoningInput,
  TokenUsage,
  ToolManifestEntry,
  ToolRequest,
} from "@tripwright/shared";
import { ToolCallAccumulator, parseToolArguments, readSseStream } from "../stream-parsers.js";
import type { ModelDef, ReasoningProvider } from "../types.js";

export type OpenAIConfig = {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
};

const DEFAULT_MODEL = "gpt-4.1-mini";
const DEFAULT_BASE_URL = "https://api.openai.com/v1";

const OPENAI_MODELS: ModelDef[] = [
  { id: "gpt-4.1", name: "GPT-4.1", provider: "openai", contextWindow: 1047576, maxOutputTokens: 32768, supportsTools: true },
  { id: "gpt-4.1-mini", name: "GPT-4.1 Mini", provider: "openai", contextWindow: 1047576, maxOutputTokens: 32768, supportsTools: true },
  { id: "gpt-4o", name: "GPT-4o", provider: "openai", contextWindow: 128000, maxOutputTokens: 16384, supportsTools: true },
  { id: "gpt-4o-mini", name: "GPT-4o Mini", provider: "openai", contextWindow: 128000, maxOutputTokens: 16384, supportsTools: true },
];

const usageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(z.object({ id: z.string(), function: z.object({ name: z.string(), arguments: z.string() }) }))
            .optional(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1),
  usage: usageSchema.nullish(),
});

const chunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number(),
                  id: z.string().optional(),
                  function: z.object({ name: z.string().optional(), arguments: z.string().optional() }).optional(),
                }),
              )
              .optional(),
          })
          .optional(),
      }),
    )
    .optional(),
  usage: usageSchema.nullish(),
});

type WireMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: Array<{ id: string; type: "function"; function: { name: string; arguments: string } }>;
    }
  | { role: "tool"; tool_call_id: string; content: string };

/** Chat Completions client speaking the function-calling protocol. Works against any compatible server. */
export class OpenAIReasoningProvider implements ReasoningProvider {
  readonly id = "openai";
  readonly name = "OpenAI";

  private config: OpenAIConfig;

  constructor(config: OpenAIConfig) {
    this.config = config;
  }

  async decide(input: ReasoningInput): Promise<ReasoningDecision> {
    const res = await this.post(input, false);
    const parsed = completionSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error("OpenAI API returned an unexpected completion shape");
    }

    const [choice] = parsed.data.choices;
    const usage = parsed.data.usage ? mapUsage(parsed.data.usage) : undefined;
    const text = choice?.message.content ?? "";
    const requests: ToolRequest[] = (choice?.message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: parseToolArguments(call.function.arguments),
    }));

    return toDecision(text, requests, usage);
  }

  async *stream(input: ReasoningInput): AsyncIterable<ReasoningChunk> {
    const res = await this.post(input, true);
    const reader = res.body?.getReader();
    if (!reader) {
      throw new Error("OpenAI API returned no response body");
    }

    const calls = new ToolCallAccumulator();
    let text = "";
    let usage: TokenUsage | undefined;

    for await (const line of readSseStream(reader)) {
      if (line.data === "[DONE]") break;
      let json: unknown;
      try {
        json = JSON.parse(line.data);
      } catch {
        continue;
      }
      const parsed = chunkSchema.safeParse(json);
      if (!parsed.success) continue;

      const delta = parsed.data.choices?.[0]?.delta;
      if (delta?.content) {
        text += delta.content;
        yield { type: "delta", text: delta.content };
      }
      for (const call of delta?.tool_calls ?? []) {
        calls.add({ index: call.index, id: call.id, name: call.function?.name, arguments: call.function?.arguments });
      }
      if (parsed.data.usage) {
        usage = mapUsage(parsed.data.usage);
      }
    }

    yield { type: "decision", decision: toDecision(text, calls.requests(), usage) };
  }

  async listModels(): Promise<ModelDef[]> {
    return OPENAI_MODELS;
  }

  resolveModel(modelId: string): ModelDef | undefined {
    return OPENAI_MODELS.find((m) => m.id === modelId);
  }

  private get baseUrl(): string {
    return (this.config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  }

  private get model(): string {
    return this.config.model ?? DEFAULT_MODEL;
  }

  private async post(input: ReasoningInput, stream: boolean): Promise<Response> {
    const res = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify(this.buildRequestBody(input, stream)),
      signal: input.signal,
    });
    if (!res.ok) {
      throw new Error(`OpenAI API error: ${res.status} ${res.statusText}`);
    }
    return res;
  }

  buildRequestBody(input: ReasoningInput, stream = false) {
    return {
      model: this.model,
      stream,
      ...(stream ? { stream_options: { include_usage: true } } : {}),
      temperature: this.config.temperature ?? 0,
      max_tokens: this.config.maxTokens ?? 4096,
      messages: input.messages.map(toWireMessage),
      ...(input.tools.length > 0 ? { tools: input.tools.map(toWireTool), tool_choice: "auto" } : {}),
    };
  }
}

export function toWireMessage(entry: ConversationEntry): WireMessage {
  switch (entry.role) {
    case "assistant":
      if (entry.toolCalls?.length) {
        return {
          role: "assistant",
          content: entry.content || null,
          tool_calls: entry.toolCalls.map((call) => ({
            id: call.id,
            type: "function",
            function: { name: call.name, arguments: JSON.stringify(call.arguments ?? {}) },
          })),
        };
      }
      return { role: "assistant", content: entry.content };
    case "tool":
      return { role: "tool", tool_call_id: entry.toolCallId ?? "", content: entry.content };
    default:
      return { role: entry.role, content: entry.content };
  }
}

function toWireTool(tool: ToolManifestEntry) {
  return {
    type: "function" as const,
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

function toDecision(text: string, requests: ToolRequest[], usage: TokenUsage | undefined): ReasoningDecision {
  const extra = usage ? { usage } : {};
  if (requests.length > 0) {
    return { kind: "tool-requests", ...(text ? { text } : {}), requests, ...extra };
  }
  return { kind: "final-answer", text, ...extra };
}

function mapUsage(raw: z.infer<typeof usageSchema>): TokenUsage {
  return {
    inputTokens: raw.prompt_tokens,
    outputTokens: raw.completion_tokens,
    totalTokens: raw.total_tokens,
  };
}
