export * from "./types/conversation.js";
export * from "./types/reasoning.js";
export * from "./types/runs.js";
export * from "./types/events.js";
export { generateId, generateCallId } from "./utils/id.js";
export { nowISO } from "./utils/time.js";
export { envString, envInt, envBool, envOneOf } from "./utils/env.js";
