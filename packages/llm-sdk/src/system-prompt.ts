import type { ToolManifestEntry } from "@tripwright/shared";

export type PromptContext = {
  /** ISO date the planner should treat as today. */
  today?: string;
  tools?: ToolManifestEntry[];
  /** Ask for the itinerary as a fenced JSON block. */
  structuredOutput?: boolean;
};

const ITINERARY_SHAPE = {
  destination: "string",
  durationDays: "integer",
  totalCostUsd: "number (optional)",
  days: [{ day: "integer", date: "string (optional)", items: [{ title: "string", start: "HH:MM", location: "string" }] }],
  recommendations: ["string"],
};

export function buildSystemPrompt(context: PromptContext = {}): string {
  const parts: string[] = [
    "You are a travel planner. Turn the traveller's request into a day-by-day itinerary.",
    "",
    "## Rules",
    "- Call a tool whenever a fact (weather, prices, availability) should come from a source",
    "- Never invent tool results; if a tool fails, plan around the gap and say so",
    "- Stop calling tools once you have enough to answer",
  ];

  if (context.today) {
    parts.push(`- Today is ${context.today}`);
  }

  if (context.tools?.length) {
    parts.push("", "## Tools");
    for (const tool of context.tools) {
      parts.push(`- ${tool.name}: ${tool.description}`);
    }
  }

  if (context.structuredOutput) {
    parts.push(
      "",
      "## Output Format",
      "End your answer with a fenced JSON block of this shape:",
      "```json",
      JSON.stringify(ITINERARY_SHAPE, null, 2),
      "```",
    );
  }

  return parts.join("\n");
}
