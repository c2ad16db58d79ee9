import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG } from "@tripwright/core";
import type { TripwrightConfig } from "@tripwright/core";
import { createReasoningRegistry, resolveReasoning } from "./reasoning-service.js";

function llm(overrides: Partial<TripwrightConfig["llm"]> = {}): TripwrightConfig["llm"] {
  return { ...structuredClone(DEFAULT_CONFIG.llm), ...overrides };
}

describe("createReasoningRegistry", () => {
  it("always offers the scripted provider", () => {
    expect(createReasoningRegistry(llm()).ids()).toEqual(["scripted"]);
  });

  it("adds OpenAI once it has an API key", () => {
    const registry = createReasoningRegistry(llm({ providers: { openai: { apiKey: "test-key" } } }));
    expect(registry.ids()).toEqual(["scripted", "openai"]);
  });

  it("skips OpenAI without a key", () => {
    const registry = createReasoningRegistry(llm({ providers: { openai: { model: "gpt-4.1-mini" } } }));
    expect(registry.has("openai")).toBe(false);
  });
});

describe("resolveReasoning", () => {
  it("returns the default provider", () => {
    expect(resolveReasoning(llm()).id).toBe("scripted");
  });

  it("names the available providers when the default is missing", () => {
    expect(() => resolveReasoning(llm({ defaultProvider: "openai" }))).toThrow(
      'Reasoning provider "openai" is not configured (available: scripted)',
    );
  });
});
