import { z } from "zod";
import { defineCapability } from "@tripwright/core";
import type { Capability } from "@tripwright/core";

const CONDITIONS = ["sunny", "partly cloudy", "overcast", "light rain", "showers", "windy"] as const;

export type ForecastDay = {
  day: number;
  condition: (typeof CONDITIONS)[number];
  highC: number;
  lowC: number;
};

export const MAX_FORECAST_DAYS = 14;

/** Stable per-location seed so the same place always gets the same forecast. */
function seedOf(location: string): number {
  let hash = 0;
  for (const ch of location.trim().toLowerCase()) {
    hash = (hash * 31 + (ch.codePointAt(0) ?? 0)) >>> 0;
  }
  return hash;
}

export function forecastFor(location: string, days: number): ForecastDay[] {
  const seed = seedOf(location);
  return Array.from({ length: days }, (_, i) => {
    const highC = 14 + ((seed >>> i) % 17);
    return {
      day: i + 1,
      condition: CONDITIONS[(seed + i * 7) % CONDITIONS.length] ?? "sunny",
      highC,
      lowC: highC - 6 - ((seed >>> (i + 3)) % 4),
    };
  });
}

/** Synthetic forecasts; no weather service is contacted. */
export function createWeatherTool(): Capability {
  return defineCapability({
    name: "get_weather",
    description: "Daily weather forecast for a location: condition and high/low temperature in Celsius.",
    schema: z.object({
      location: z.string().trim().min(1).describe("City or region, e.g. Lisbon"),
      days: z.number().int().min(1).max(MAX_FORECAST_DAYS).default(7).describe("Number of days to forecast"),
    }),
    timeoutMs: 5_000,
    execute: async ({ location, days }) => {
      const forecast = forecastFor(location, days);
      const first = forecast[0];
      return {
        success: true,
        data: { location, unit: "celsius", forecast },
        citations: first
          ? [
              {
                source: "tripwright:weather-fixture",
                title: `Forecast for ${location}`,
                snippet: `${location} day 1: ${first.condition}, ${first.lowC}-${first.highC}°C`,
              },
            ]
          : [],
      };
    },
  });
}
