import type { Axiom, RealityStatement } from "../references/types.js";
import type { EvaluationOutput, EvaluationResult, FailedEvaluationItem, MetricSummary } from "./types.js";

export const summarizeScores = (scores: number[]): MetricSummary => {
  if (scores.length === 0) {
    return { mean: 0, std: 0 };
  }
  const mean = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  if (scores.length < 2) {
    return { mean, std: 0 };
  }
  const variance = scores.reduce((sum, score) => sum + (score - mean) ** 2, 0) / scores.length;
  return { mean, std: Math.sqrt(variance) };
};

export interface ReferenceDefinitions {
  axioms?: Axiom[] | null;
  reality?: RealityStatement[] | null;
}

export const calculateStats = (
  outputs: EvaluationOutput[],
  failedItems: FailedEvaluationItem[] = [],
  definitions: ReferenceDefinitions = {}
): EvaluationResult => {
  const collect = (pick: (output: EvaluationOutput) => number | undefined): number[] =>
    outputs.flatMap((output) => {
      const value = pick(output);
      return value === undefined ? [] : [value];
    });

  return {
    evaluation_outputs: outputs,
    failed_items: failedItems,
    accuracy: summarizeScores(collect((output) => output.accuracy.accuracy_mean)),
    topic_coverage: summarizeScores(collect((output) => output.topic_coverage.coverage_score)),
    axiom_precision_metric: summarizeScores(collect((output) => output.axiom_references?.precision)),
    axiom_recall_metric: summarizeScores(collect((output) => output.axiom_references?.recall)),
    reality_precision_metric: summarizeScores(collect((output) => output.reality_references?.precision)),
    reality_recall_metric: summarizeScores(collect((output) => output.reality_references?.recall)),
    axiom_definitions: definitions.axioms ?? null,
    reality_definitions: definitions.reality ?? null
  };
};
