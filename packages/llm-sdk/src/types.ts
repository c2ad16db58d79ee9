import type { ReasoningCapability } from "@tripwright/shared";

export type ModelDef = {
  id: string;
  name: string;
  provider: string;
  contextWindow: number;
  maxOutputTokens: number;
  supportsTools: boolean;
};

/** A reasoning capability that can also describe the models behind it. */
export interface ReasoningProvider extends ReasoningCapability {
  listModels?(): Promise<ModelDef[]>;
  resolveModel?(modelId: string): ModelDef | undefined;
}
