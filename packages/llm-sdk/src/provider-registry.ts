import type { ReasoningProvider } from "./types.js";

/** Reasoning providers configured for this process, in registration order. */
export class ReasoningProviderRegistry {
  private byId = new Map<string, ReasoningProvider>();

  register(provider: ReasoningProvider): this {
    if (this.byId.has(provider.id)) {
      throw new Error(`Reasoning provider "${provider.id}" already registered`);
    }
    this.byId.set(provider.id, provider);
    return this;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  ids(): string[] {
    return [...this.byId.keys()];
  }

  /** The provider with `id`; the error names what is available instead. */
  require(id: string): ReasoningProvider {
    const provider = this.byId.get(id);
    if (!provider) {
      const available = this.ids().join(", ") || "none";
      throw new Error(`Reasoning provider "${id}" is not configured (available: ${available})`);
    }
    return provider;
  }
}
