import { z } from "zod";
import { formatIssues } from "@tripwright/core";
import type { RunRequest } from "@tripwright/core";

const sessionId = z.string().trim().min(1).max(128).optional();

const queryRequestSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty").max(4000),
  sessionId,
  context: z.record(z.string(), z.unknown()).optional(),
});

const tripRequestSchema = z.object({
  destination: z.string().trim().min(1).max(200),
  duration: z.number().int().min(1).max(60),
  budget: z.number().positive().optional(),
  preferences: z.array(z.string().trim().min(1)).max(20).optional(),
  groupSize: z.number().int().min(1).max(50).optional(),
  sessionId,
});

export type TripRequest = z.infer<typeof tripRequestSchema>;

export type ParsedPlanRequest =
  | { ok: true; request: RunRequest }
  | { ok: false; issues: string[] };

/** Natural-language query for the structured form, e.g. "Plan a 3-day trip to Lisbon". */
export function composeQuery(trip: TripRequest): string {
  let query = `Plan a ${trip.duration}-day trip to ${trip.destination}`;
  if (trip.groupSize && trip.groupSize > 1) query += ` for ${trip.groupSize} people`;
  if (trip.budget !== undefined) query += ` with a budget of $${trip.budget}`;
  if (trip.preferences?.length) query += `. Preferences: ${trip.preferences.join(", ")}`;
  return query;
}

export function parsePlanRequest(body: unknown, userId: string): ParsedPlanRequest {
  const record = typeof body === "object" && body !== null ? body : {};

  if ("query" in record) {
    const parsed = queryRequestSchema.safeParse(record);
    if (!parsed.success) return { ok: false, issues: formatIssues(parsed.error.issues) };
    const { query, sessionId, context } = parsed.data;
    return { ok: true, request: { query, userId, sessionId, context } };
  }

  const parsed = tripRequestSchema.safeParse(record);
  if (!parsed.success) return { ok: false, issues: formatIssues(parsed.error.issues) };
  const { sessionId, ...trip } = parsed.data;
  return {
    ok: true,
    request: { query: composeQuery(parsed.data), userId, sessionId, context: { ...trip } },
  };
}
