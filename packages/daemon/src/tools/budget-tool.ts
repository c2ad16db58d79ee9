import { z } from "zod";
import { defineCapability } from "@tripwright/core";
import type { Capability } from "@tripwright/core";

export const DAILY_RATE_USD = {
  budget: 60,
  standard: 140,
  luxury: 380,
} as const;

export function createBudgetTool(): Capability {
  return defineCapability({
    name: "estimate_budget",
    description: "Rough trip cost in USD for lodging, food and local transport, by travel style.",
    schema: z.object({
      destination: z.string().trim().min(1),
      days: z.number().int().positive(),
      groupSize: z.number().int().positive().default(1),
      style: z.enum(["budget", "standard", "luxury"]).default("standard"),
    }),
    execute: async ({ destination, days, groupSize, style }) => {
      const perPersonPerDay = DAILY_RATE_USD[style];
      return {
        success: true,
        data: {
          destination,
          currency: "USD",
          style,
          perPersonPerDay,
          total: perPersonPerDay * days * groupSize,
        },
      };
    },
  });
}
