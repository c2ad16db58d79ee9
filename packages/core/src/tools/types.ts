import type { Citation, JsonSchema } from "@tripwright/shared";
import type { Logger } from "../logging/logger.js";

/** Citation as a capability reports it; the run links it to the invocation. */
export type CapabilityCitation = Omit<Citation, "toolInvocationId">;

export type CapabilityResult =
  | { success: true; data: unknown; citations?: CapabilityCitation[] }
  | { success: false; error: string };

export type CapabilityContext = {
  runId: string;
  callId: string;
  /** Aborted when the call times out or the run is cancelled. */
  signal: AbortSignal;
  logger: Logger;
};

/** A registered capability bound for dispatch. */
export interface CapabilityCallable {
  (rawArgs: unknown, ctx: CapabilityContext): Promise<CapabilityResult>;
  /** The capability's own time limit, when it sets one. */
  readonly timeoutMs?: number;
}

export interface Capability {
  readonly name: string;
  readonly description: string;
  /** JSON Schema of the accepted arguments, as offered to the reasoning step. */
  readonly parameters: JsonSchema;
  readonly timeoutMs?: number;

  /** Validates `rawArgs` and runs the capability. Throws CapabilityValidationError on bad input. */
  invoke(rawArgs: unknown, ctx: CapabilityContext): Promise<CapabilityResult>;
}
