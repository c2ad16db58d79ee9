import type { ReasoningDecision } from "@tripwright/shared";
import { OrchestrationError } from "../errors.js";

export type GraphState = "START" | "REASONING" | "TOOL_DISPATCH" | "END";

export function requestsTools(decision: ReasoningDecision): boolean {
  return decision.kind === "tool-requests" && decision.requests.length > 0;
}

/** Transition function of the execution graph. Pure; knows nothing of tools or models. */
export function nextState(current: GraphState, reasoningOutput?: ReasoningDecision): GraphState {
  switch (current) {
    case "START":
      return "REASONING";
    case "REASONING":
      if (!reasoningOutput) {
        throw new OrchestrationError("internal", "Leaving REASONING requires the reasoning output");
      }
      return requestsTools(reasoningOutput) ? "TOOL_DISPATCH" : "END";
    case "TOOL_DISPATCH":
      return "REASONING";
    case "END":
      return "END";
  }
}
