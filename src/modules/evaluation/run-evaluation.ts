import fs from "node:fs/promises";
import path from "node:path";
import { logInfo } from "../../observability/logger.js";
import type { ReferenceStore } from "../references/reference-store.js";
import type { Axiom, RealityStatement } from "../references/types.js";
import { transcriptFileName } from "./answer-providers.js";
import { loadEvaluationDataset } from "./dataset.js";
import { evaluate } from "./evaluator.js";
import type { EvaluationJudge } from "./judge.js";
import type { EvaluationResult, QuestionAnswerFunction } from "./types.js";

export const EVALUATION_RESULTS_FILE = "evaluation_results.json";

export interface RunEvaluationOptions {
  datasetPath: string;
  outputRoot: string;
  judge: EvaluationJudge;
  answer: QuestionAnswerFunction;
  concurrency?: number;
  axioms?: ReferenceStore<Axiom> | null;
  reality?: ReferenceStore<RealityStatement> | null;
  now?: () => Date;
}

export interface EvaluationRun {
  outputDir: string;
  resultPath: string;
  result: EvaluationResult;
}

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatRunTimestamp = (date: Date): string =>
  `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
  `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;

export const runEvaluation = async (options: RunEvaluationOptions): Promise<EvaluationRun> => {
  const items = await loadEvaluationDataset(options.datasetPath);
  const outputDir = path.join(options.outputRoot, formatRunTimestamp((options.now ?? (() => new Date()))()));
  await fs.mkdir(outputDir, { recursive: true });
  logInfo("evaluation.run.start", {}, { item_count: items.length, output_dir: outputDir });

  const result = await evaluate(items, {
    judge: options.judge,
    concurrency: options.concurrency,
    definitions: {
      axioms: options.axioms?.list() ?? null,
      reality: options.reality?.list() ?? null
    },
    answer: async (query, item) => {
      const answer = await options.answer(query, item);
      await fs.writeFile(path.join(outputDir, transcriptFileName(item.id)), answer, "utf8");
      return answer;
    }
  });

  const resultPath = path.join(outputDir, EVALUATION_RESULTS_FILE);
  await fs.writeFile(resultPath, `${JSON.stringify(result, null, 2)}\n`, "utf8");
  logInfo("evaluation.run.written", {}, { result_path: resultPath, failed_count: result.failed_items.length });
  return { outputDir, resultPath, result };
};
