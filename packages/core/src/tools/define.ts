import { z } from "zod";
import type { JsonSchema } from "@tripwright/shared";
import { CapabilityValidationError } from "../errors.js";
import type { Capability, CapabilityContext, CapabilityResult } from "./types.js";

export type CapabilityDefinition<S extends z.ZodObject> = {
  name: string;
  description: string;
  schema: S;
  timeoutMs?: number;
  execute(args: z.infer<S>, ctx: CapabilityContext): Promise<CapabilityResult>;
};

const NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export function defineCapability<S extends z.ZodObject>(def: CapabilityDefinition<S>): Capability {
  if (!NAME_PATTERN.test(def.name)) {
    throw new Error(`Invalid capability name "${def.name}": use letters, digits, "_" or "-" (max 64)`);
  }
  if (def.timeoutMs !== undefined && (!Number.isInteger(def.timeoutMs) || def.timeoutMs <= 0)) {
    throw new Error(`Capability "${def.name}" timeoutMs must be a positive integer`);
  }

  const parameters = toParameters(def.schema);

  return {
    name: def.name,
    description: def.description,
    parameters,
    timeoutMs: def.timeoutMs,
    async invoke(rawArgs, ctx) {
      const parsed = def.schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw new CapabilityValidationError(def.name, formatIssues(parsed.error.issues));
      }
      return def.execute(parsed.data, ctx);
    },
  };
}

export function formatIssues(issues: readonly z.core.$ZodIssue[]): string[] {
  return issues.map((issue) => {
    const where = issue.path.map((p) => String(p)).join(".");
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}

function toParameters(schema: z.ZodObject): JsonSchema {
  const json = z.toJSONSchema(schema, { io: "input" });
  return Object.fromEntries(Object.entries(json).filter(([key]) => key !== "$schema"));
}
