import { config } from "../config/index.js";
import { shutdownOpenAIClient } from "../clients/openai.js";
import {
  createQaEngineAnswerFunction,
  createTranscriptAnswerFunction,
  echoAnswerFunction,
  loadTranscriptDirectory
} from "../modules/evaluation/answer-providers.js";
import { OpenAIJudge } from "../modules/evaluation/openai-judge.js";
import { runEvaluation } from "../modules/evaluation/run-evaluation.js";
import type { QuestionAnswerFunction } from "../modules/evaluation/types.js";
import { OpenAIConversationAgent } from "../modules/llm/openai-conversation-agent.js";
import { loadReferenceData } from "../modules/qa/default-engine.js";
import { QaEngine } from "../modules/qa/qa-engine.js";

const references = await loadReferenceData();

const resolveAnswerFunction = async (): Promise<QuestionAnswerFunction> => {
  if (config.EVAL_ANSWERS === "echo") {
    return echoAnswerFunction;
  }
  if (config.EVAL_ANSWERS === "transcripts") {
    if (!config.EVAL_TRANSCRIPTS_DIR) {
      throw new Error("EVAL_TRANSCRIPTS_DIR is required when EVAL_ANSWERS=transcripts.");
    }
    return createTranscriptAnswerFunction(await loadTranscriptDirectory(config.EVAL_TRANSCRIPTS_DIR));
  }
  const engine = new QaEngine({
    llm: new OpenAIConversationAgent(),
    axioms: references.axioms,
    reality: references.reality
  });
  return createQaEngineAnswerFunction(engine);
};

try {
  const run = await runEvaluation({
    datasetPath: config.EVAL_DATASET_FILE,
    outputRoot: config.EVAL_OUTPUT_DIR,
    concurrency: config.EVAL_CONCURRENCY,
    judge: new OpenAIJudge(),
    answer: await resolveAnswerFunction(),
    axioms: references.axioms,
    reality: references.reality
  });

  console.info(`[evaluation] results written to ${run.resultPath}`);
  console.info(
    `[evaluation] accuracy=${run.result.accuracy.mean.toFixed(4)} coverage=${run.result.topic_coverage.mean.toFixed(4)} ` +
      `axiom_precision=${run.result.axiom_precision_metric.mean.toFixed(4)} axiom_recall=${run.result.axiom_recall_metric.mean.toFixed(4)} ` +
      `failed=${run.result.failed_items.length}`
  );
} finally {
  await shutdownOpenAIClient();
}
