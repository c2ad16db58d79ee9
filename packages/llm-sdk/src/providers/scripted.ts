import * as fs from "node:fs";
import { z } from "zod";
import type { ReasoningChunk, ReasoningDecision, ReasoningInput } from "@tripwright/shared";
import type { ReasoningProvider } from "../types.js";

export type ScriptFn = (input: ReasoningInput, turn: number) => ReasoningDecision;

export type ScriptedProviderConfig = {
  /** Fixed decisions handed out in order, or a function deciding per turn. */
  script?: ReasoningDecision[] | ScriptFn;
  /** JSON file holding an array of decisions; used when `script` is absent. */
  scriptPath?: string;
  /** Words per streamed delta. */
  chunkWords?: number;
};

const usageSchema = z.object({ inputTokens: z.number(), outputTokens: z.number(), totalTokens: z.number() });

const decisionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("final-answer"), text: z.string(), usage: usageSchema.optional() }),
  z.object({
    kind: z.literal("tool-requests"),
    text: z.string().optional(),
    requests: z.array(
      z
        .object({ id: z.string().default(""), name: z.string().min(1), arguments: z.unknown() })
        .transform((r) => ({ id: r.id, name: r.name, arguments: r.arguments ?? {} })),
    ),
    usage: usageSchema.optional(),
  }),
]);

/**
 * Replays a prepared script instead of calling a model. Turns are counted per conversation,
 * from the number of assistant entries already present, so one instance serves many runs.
 */
export class ScriptedReasoningProvider implements ReasoningProvider {
  readonly id = "scripted";
  readonly name = "Scripted";

  private script: ScriptFn;
  private chunkWords: number;

  constructor(config: ScriptedProviderConfig = {}) {
    this.chunkWords = config.chunkWords ?? 3;
    const script = config.script ?? (config.scriptPath ? loadScript(config.scriptPath) : travelDemoScript);
    this.script = typeof script === "function" ? script : replay(script);
  }

  async decide(input: ReasoningInput): Promise<ReasoningDecision> {
    input.signal.throwIfAborted();
    return this.script(input, turnOf(input));
  }

  async *stream(input: ReasoningInput): AsyncIterable<ReasoningChunk> {
    const decision = await this.decide(input);
    const text = decision.text ?? "";
    const words = text.split(/(?<=\s)/);
    for (let i = 0; i < words.length; i += this.chunkWords) {
      const piece = words.slice(i, i + this.chunkWords).join("");
      if (piece) yield { type: "delta", text: piece };
    }
    yield { type: "decision", decision };
  }
}

export function loadScript(filePath: string): ReasoningDecision[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Script file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch {
    throw new Error(`Invalid JSON in script file: ${filePath}`);
  }

  const result = z.array(decisionSchema).min(1).safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid script in ${filePath}: ${result.error.issues[0]?.message ?? "unknown issue"}`);
  }
  return result.data;
}

function replay(decisions: ReasoningDecision[]): ScriptFn {
  return (_input, turn) => {
    const decision = decisions[turn];
    if (!decision) throw new Error(`Script has no decision for turn ${turn + 1}`);
    return decision;
  };
}

function turnOf(input: ReasoningInput): number {
  return input.messages.filter((m) => m.role === "assistant").length;
}

const DESTINATION = /\bto ([A-Z]\p{L}*(?:[ -][A-Z]\p{L}*)*)/u;
const DURATION = /(\d+)[- ]day/;
const MAX_FORECAST_DAYS = 14;

/**
 * Offline stand-in for a model: checks the weather at the destination once, then answers
 * with a skeleton itinerary.
 */
export const travelDemoScript: ScriptFn = (input, turn) => {
  const query = [...input.messages].reverse().find((m) => m.role === "user")?.content ?? "";
  const destination = DESTINATION.exec(query)?.[1] ?? "your destination";
  const days = Number(DURATION.exec(query)?.[1] ?? "3");
  const canCheckWeather = input.tools.some((t) => t.name === "get_weather");

  if (turn === 0 && canCheckWeather) {
    return {
      kind: "tool-requests",
      text: `Checking the weather in ${destination}.`,
      requests: [
        {
          id: "",
          name: "get_weather",
          arguments: { location: destination, days: Math.min(days, MAX_FORECAST_DAYS) },
        },
      ],
    };
  }

  const weather = [...input.messages].reverse().find((m) => m.role === "tool" && m.toolName === "get_weather");
  const note = weather?.success ? "Forecast checked before planning." : "Weather unavailable; pack for anything.";
  const itinerary = {
    destination,
    durationDays: days,
    days: Array.from({ length: days }, (_, i) => ({
      day: i + 1,
      items: [{ title: `Explore ${destination}, day ${i + 1}` }],
    })),
    recommendations: [note],
  };

  return {
    kind: "final-answer",
    text: `Here is a ${days}-day plan for ${destination}.\n\n\`\`\`json\n${JSON.stringify(itinerary, null, 2)}\n\`\`\``,
  };
};
