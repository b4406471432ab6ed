import type {
  AccuracyVerdict,
  CoverageVerdict,
  EntityExtractionRequest,
  EvaluationJudge
} from "../../src/modules/evaluation/judge.js";
import type { CoverageMatch, EntityPair } from "../../src/modules/evaluation/types.js";

export const pair = (trigger: string, consequence = "N/A"): EntityPair => ({
  trigger_variable: trigger,
  consequence_variable: consequence
});

export interface FakeJudgeScript {
  entities?: (request: EntityExtractionRequest) => EntityPair[];
  coverage?: (expected: EntityPair[], generated: EntityPair[]) => CoverageVerdict;
  accuracy?: (entity: EntityPair, llmAnswer: string) => AccuracyVerdict;
}

/** In-process judge: answers come from the script, defaults are all "exact"/1.0. */
export class FakeJudge implements EvaluationJudge {
  readonly calls: string[] = [];

  constructor(private readonly script: FakeJudgeScript = {}) {}

  async extractEntities(request: EntityExtractionRequest): Promise<EntityPair[]> {
    this.calls.push(`entities:${request.target}`);
    return this.script.entities?.(request) ?? [];
  }

  async classifyCoverage(request: {
    expectedEntities: EntityPair[];
    generatedEntities: EntityPair[];
  }): Promise<CoverageVerdict> {
    this.calls.push("coverage");
    return (
      this.script.coverage?.(request.expectedEntities, request.generatedEntities) ?? {
        matches: request.expectedEntities.map((): CoverageMatch => "exact"),
        reason: "all covered"
      }
    );
  }

  async scoreAccuracy(request: { entity: EntityPair; llmAnswer: string }): Promise<AccuracyVerdict> {
    this.calls.push(`accuracy:${request.entity.trigger_variable}`);
    return this.script.accuracy?.(request.entity, request.llmAnswer) ?? { score: 1, reason: "matches" };
  }
}
