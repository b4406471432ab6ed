import { JudgeResponseError } from "../../errors/index.js";
import type { EvaluationJudge } from "./judge.js";
import type { CoverageMatch, EntityExtraction, TopicCoverageEvaluationResults } from "./types.js";

export const COVERAGE_MATCH_SCORES: Record<CoverageMatch, number> = {
  exact: 1,
  partial: 0.5,
  missing: 0
};

/**
 * Scores how many of the expected answer's entities the generated answer
 * covers. The judge only classifies; the score is computed here.
 */
export const evaluateTopicCoverage = async (
  entities: EntityExtraction,
  judge: EvaluationJudge,
  itemId?: string
): Promise<TopicCoverageEvaluationResults> => {
  const expected = entities.expected_answer_entities;
  const generated = entities.llm_answer_entities;

  if (expected.length === 0 && generated.length === 0) {
    return {
      coverage_score: 1,
      reason: "Neither the expected nor the generated answer contains entities.",
      classifications: []
    };
  }
  if (expected.length === 0) {
    return {
      coverage_score: 0,
      reason: "The expected answer contains no entities but the generated answer does.",
      classifications: []
    };
  }
  if (generated.length === 0) {
    return {
      coverage_score: 0,
      reason: "The generated answer contains no entities.",
      classifications: expected.map((entity) => ({ entity, match: "missing" as const, score: 0 }))
    };
  }

  const verdict = await judge.classifyCoverage({ expectedEntities: expected, generatedEntities: generated, itemId });
  if (verdict.matches.length !== expected.length) {
    throw new JudgeResponseError(
      "topic_coverage",
      `expected ${expected.length} classifications, got ${verdict.matches.length}`
    );
  }

  const classifications = expected.map((entity, index) => {
    const match = verdict.matches[index] ?? "missing";
    return { entity, match, score: COVERAGE_MATCH_SCORES[match] };
  });
  const total = classifications.reduce((sum, classification) => sum + classification.score, 0);
  return {
    coverage_score: total / expected.length,
    reason: verdict.reason,
    classifications
  };
};
