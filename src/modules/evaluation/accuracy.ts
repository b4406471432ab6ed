import type { EvaluationJudge } from "./judge.js";
import type { AccuracyEvaluationResults, EntityExtraction } from "./types.js";

// An answer with no expected entities has nothing to contradict.
export const EMPTY_ACCURACY_MEAN = 1;

export const evaluateAccuracy = async (
  input: { entities: EntityExtraction; llmAnswer: string; expectedAnswer: string; itemId?: string },
  judge: EvaluationJudge
): Promise<AccuracyEvaluationResults> => {
  const expected = input.entities.expected_answer_entities;
  if (expected.length === 0) {
    return { entity_accuracies: [], accuracy_mean: EMPTY_ACCURACY_MEAN };
  }

  const entityAccuracies = await Promise.all(
    expected.map(async (entity) => {
      const verdict = await judge.scoreAccuracy({
        entity,
        llmAnswer: input.llmAnswer,
        expectedAnswer: input.expectedAnswer,
        itemId: input.itemId
      });
      return { entity, reason: verdict.reason, score: verdict.score };
    })
  );
  const total = entityAccuracies.reduce((sum, accuracy) => sum + accuracy.score, 0);
  return { entity_accuracies: entityAccuracies, accuracy_mean: total / entityAccuracies.length };
};
