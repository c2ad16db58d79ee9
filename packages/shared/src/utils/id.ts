import { randomUUID } from "node:crypto";

export function generateId(): string {
  return randomUUID();
}

export function generateCallId(): string {
  return `call_${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}
