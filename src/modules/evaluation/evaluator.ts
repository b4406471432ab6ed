import { describeError } from "../../errors/index.js";
import { logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { evaluateAccuracy } from "./accuracy.js";
import { DEFAULT_CONCURRENCY_LIMIT, limitConcurrency } from "./concurrency.js";
import { extractEntities } from "./entity-extraction.js";
import type { EvaluationJudge } from "./judge.js";
import { evaluateReferences, extractCitedReferences } from "./references.js";
import { calculateStats, type ReferenceDefinitions } from "./stats.js";
import { evaluateTopicCoverage } from "./topic-coverage.js";
import type {
  EvaluationItem,
  EvaluationOutput,
  EvaluationResult,
  FailedEvaluationItem,
  QuestionAnswerFunction
} from "./types.js";

export interface EvaluatorOptions {
  judge: EvaluationJudge;
  answer: QuestionAnswerFunction;
  concurrency?: number;
  definitions?: ReferenceDefinitions;
  now?: () => number;
}

export const evaluateAnswer = async (
  item: EvaluationItem,
  llmAnswer: string,
  judge: EvaluationJudge
): Promise<EvaluationOutput> => {
  const itemId = String(item.id);
  const entities = await extractEntities(
    { userQuery: item.query, expectedAnswer: item.expected_answer, llmAnswer, itemId },
    judge
  );
  const [accuracy, topicCoverage] = await Promise.all([
    evaluateAccuracy({ entities, llmAnswer, expectedAnswer: item.expected_answer, itemId }, judge),
    evaluateTopicCoverage(entities, judge, itemId)
  ]);
  const cited = extractCitedReferences(llmAnswer);

  return {
    input: item,
    llm_response: llmAnswer,
    entities,
    accuracy,
    topic_coverage: topicCoverage,
    axiom_references: evaluateReferences(cited.axioms, item.axioms_used),
    reality_references: evaluateReferences(cited.reality, item.reality_used)
  };
};

type ItemOutcome =
  | { status: "ok"; output: EvaluationOutput }
  | { status: "failed"; failure: FailedEvaluationItem };

/**
 * Answers and scores every item. Items run at most `concurrency` at a time;
 * a failing item is reported in `failed_items` and left out of the stats.
 */
export const evaluate = async (items: EvaluationItem[], options: EvaluatorOptions): Promise<EvaluationResult> => {
  const now = options.now ?? Date.now;
  const startedAt = now();
  const limit = limitConcurrency(options.concurrency ?? DEFAULT_CONCURRENCY_LIMIT);

  const runItem = limit(async (item: EvaluationItem): Promise<ItemOutcome> => {
    const context = { evaluationItemId: item.id };
    const itemStartedAt = now();
    try {
      const llmAnswer = await options.answer(item.query, item);
      const output = await evaluateAnswer(item, llmAnswer, options.judge);
      logInfo("evaluation.item.complete", context, {
        duration_ms: now() - itemStartedAt,
        accuracy_mean: output.accuracy.accuracy_mean,
        coverage_score: output.topic_coverage.coverage_score
      });
      return { status: "ok", output };
    } catch (error) {
      recordErrorRate("evaluation_item_failed");
      logWarn("evaluation.item.failed", context, serializeError(error));
      return { status: "failed", failure: { id: item.id, error: describeError(error) } };
    }
  });

  const outcomes = await Promise.all(items.map((item) => runItem(item)));
  const outputs: EvaluationOutput[] = [];
  const failures: FailedEvaluationItem[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === "ok") {
      outputs.push(outcome.output);
    } else {
      failures.push(outcome.failure);
    }
  }

  logInfo("evaluation.run.complete", {}, {
    item_count: items.length,
    failed_count: failures.length,
    duration_ms: now() - startedAt
  });
  return calculateStats(outputs, failures, options.definitions);
};
