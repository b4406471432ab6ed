import type { EntityExtractionTarget } from "../../prompts/index.js";
import type { CoverageMatch, EntityPair } from "./types.js";

export interface EntityExtractionRequest {
  target: EntityExtractionTarget;
  userQuery: string;
  expectedAnswer: string;
  llmAnswer: string;
  itemId?: string;
}

export interface CoverageVerdict {
  matches: CoverageMatch[];
  reason: string;
}

export interface AccuracyVerdict {
  score: number;
  reason: string;
}

/**
 * LLM-as-judge operations used while scoring an answer. Implementations
 * throw `JudgeResponseError` when the model output does not fit the
 * expected shape.
 */
export interface EvaluationJudge {
  extractEntities(request: EntityExtractionRequest): Promise<EntityPair[]>;
  classifyCoverage(request: {
    expectedEntities: EntityPair[];
    generatedEntities: EntityPair[];
    itemId?: string;
  }): Promise<CoverageVerdict>;
  scoreAccuracy(request: {
    entity: EntityPair;
    llmAnswer: string;
    expectedAnswer: string;
    itemId?: string;
  }): Promise<AccuracyVerdict>;
}
