import type { ToolManifestEntry } from "@tripwright/shared";
import { DuplicateCapabilityError, RegistryLockedError, UnknownCapabilityError } from "../errors.js";
import type { Capability, CapabilityCallable, CapabilityContext } from "./types.js";

export class CapabilityRegistry {
  private capabilities = new Map<string, Capability>();
  private frozen = false;

  register(capability: Capability): void {
    if (this.frozen) {
      throw new RegistryLockedError(capability.name);
    }
    if (this.capabilities.has(capability.name)) {
      throw new DuplicateCapabilityError(capability.name);
    }
    this.capabilities.set(capability.name, capability);
  }

  get(name: string): Capability {
    const capability = this.capabilities.get(name);
    if (!capability) {
      throw new UnknownCapabilityError(name);
    }
    return capability;
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  list(): Capability[] {
    return Array.from(this.capabilities.values());
  }

  get size(): number {
    return this.capabilities.size;
  }

  get locked(): boolean {
    return this.frozen;
  }

  /** Freezes the catalog. Reads stay available; further registration throws. */
  lock(): void {
    this.frozen = true;
  }

  /** Restartable, insertion-ordered view; each iteration walks the catalog afresh. */
  listManifest(): Iterable<ToolManifestEntry> {
    const capabilities = this.capabilities;
    return {
      *[Symbol.iterator]() {
        for (const c of capabilities.values()) {
          yield { name: c.name, description: c.description, parameters: c.parameters };
        }
      },
    };
  }

  /** Locks the catalog and binds every capability for the tool-dispatch step. */
  createCallables(): ReadonlyMap<string, CapabilityCallable> {
    this.lock();
    const callables = new Map<string, CapabilityCallable>();
    for (const capability of this.capabilities.values()) {
      const call: CapabilityCallable = Object.assign(
        (rawArgs: unknown, ctx: CapabilityContext) => capability.invoke(rawArgs, ctx),
        { timeoutMs: capability.timeoutMs },
      );
      callables.set(capability.name, call);
    }
    return callables;
  }
}
