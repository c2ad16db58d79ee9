import { z } from "zod";
import type { Itinerary } from "@tripwright/shared";
import type { RunSnapshot } from "../state/run-state.js";

export interface ItineraryFormatter {
  /** Structured itinerary for a finished run, or null when the answer carries none. */
  format(answer: string, snapshot: RunSnapshot): Itinerary | null;
}

const itemSchema = z.object({
  title: z.string().min(1),
  start: z.string().optional(),
  end: z.string().optional(),
  location: z.string().optional(),
  notes: z.string().optional(),
  costUsd: z.number().nonnegative().optional(),
});

export const itinerarySchema: z.ZodType<Itinerary> = z.object({
  destination: z.string().min(1),
  durationDays: z.number().int().positive(),
  totalCostUsd: z.number().nonnegative().optional(),
  days: z.array(
    z.object({
      day: z.number().int().positive(),
      date: z.string().optional(),
      items: z.array(itemSchema),
    }),
  ),
  recommendations: z.array(z.string()).default([]),
});

const FENCED_JSON = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/;
const BARE_JSON = /\{[\s\S]*\}/;

/** First JSON object in `raw`, preferring a fenced block. Undefined when nothing parses. */
export function extractJson(raw: string): unknown {
  for (const pattern of [FENCED_JSON, BARE_JSON]) {
    const match = raw.match(pattern);
    const candidate = match?.[1] ?? match?.[0];
    if (!candidate) continue;
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  return undefined;
}

export class JsonItineraryFormatter implements ItineraryFormatter {
  format(answer: string): Itinerary | null {
    const candidate = extractJson(answer);
    if (candidate === undefined) return null;
    const parsed = itinerarySchema.safeParse(candidate);
    return parsed.success ? parsed.data : null;
  }
}
