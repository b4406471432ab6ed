import { z } from "zod";
import type { Axiom, RealityStatement } from "../references/types.js";

export const NO_CONSEQUENCE = "N/A";

export const entityPairSchema = z.object({
  trigger_variable: z.string().trim().min(1),
  consequence_variable: z
    .string()
    .nullish()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : NO_CONSEQUENCE))
});

export type EntityPair = z.output<typeof entityPairSchema>;

export const evaluationItemSchema = z.object({
  id: z.union([z.number().int(), z.string().trim().min(1)]),
  query: z.string().trim().min(1, "query is required"),
  context: z.string().default(""),
  expected_answer: z.string(),
  reasoning: z.union([z.string(), z.array(z.string())]).default([]),
  axioms_used: z.array(z.string()).default([]),
  reality_used: z.array(z.string()).default([])
});

export type EvaluationItem = z.output<typeof evaluationItemSchema>;

export type EvaluationItemId = EvaluationItem["id"];

export interface EntityExtraction {
  user_query_entities: EntityPair[];
  expected_answer_entities: EntityPair[];
  llm_answer_entities: EntityPair[];
}

export interface EntityAccuracy {
  entity: EntityPair;
  reason: string;
  score: number;
}

export interface AccuracyEvaluationResults {
  entity_accuracies: EntityAccuracy[];
  accuracy_mean: number;
}

export type CoverageMatch = "exact" | "partial" | "missing";

export interface CoverageClassification {
  entity: EntityPair;
  match: CoverageMatch;
  score: number;
}

export interface TopicCoverageEvaluationResults {
  reason: string;
  coverage_score: number;
  classifications: CoverageClassification[];
}

export interface ReferenceResults {
  references_expected: string[];
  references_found: string[];
  precision: number;
  recall: number;
}

export interface EvaluationOutput {
  input: EvaluationItem;
  llm_response: string;
  entities: EntityExtraction;
  accuracy: AccuracyEvaluationResults;
  topic_coverage: TopicCoverageEvaluationResults;
  axiom_references?: ReferenceResults;
  reality_references?: ReferenceResults;
}

export interface MetricSummary {
  mean: number;
  std: number;
}

export interface FailedEvaluationItem {
  id: EvaluationItemId;
  error: string;
}

export interface EvaluationResult {
  evaluation_outputs: EvaluationOutput[];
  failed_items: FailedEvaluationItem[];
  accuracy: MetricSummary;
  topic_coverage: MetricSummary;
  axiom_precision_metric: MetricSummary;
  axiom_recall_metric: MetricSummary;
  reality_precision_metric: MetricSummary;
  reality_recall_metric: MetricSummary;
  axiom_definitions?: Axiom[] | null;
  reality_definitions?: RealityStatement[] | null;
}

export type QuestionAnswerFunction = (query: string, item: EvaluationItem) => Promise<string>;
