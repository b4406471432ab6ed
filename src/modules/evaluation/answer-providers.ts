import fs from "node:fs/promises";
import path from "node:path";
import type { InvokeResult } from "../qa/qa-engine.js";
import type { RealityStatement } from "../references/types.js";
import type { QuestionAnswerFunction } from "./types.js";

export interface AnsweringEngine {
  invoke(question: string, sessionId: string, reality?: RealityStatement[] | null): Promise<InvokeResult>;
  resetSession(sessionId: string): void;
}

export const TRANSCRIPT_FILE_PATTERN = /^results_(.+)\.md$/;

export const transcriptFileName = (id: string | number): string => `results_${id}.md`;

/** Each item gets its own session so earlier items never leak into later answers. */
export const createQaEngineAnswerFunction = (
  engine: AnsweringEngine,
  options: { sessionPrefix?: string; reality?: RealityStatement[] | null } = {}
): QuestionAnswerFunction => {
  const prefix = options.sessionPrefix ?? "eval";
  return async (query, item) => {
    const sessionId = `${prefix}-${item.id}`;
    try {
      const { text } = await engine.invoke(query, sessionId, options.reality);
      return text;
    } finally {
      engine.resetSession(sessionId);
    }
  };
};

export const createTranscriptAnswerFunction = (transcripts: ReadonlyMap<string, string>): QuestionAnswerFunction =>
  async (_query, item) => {
    const transcript = transcripts.get(String(item.id));
    if (transcript === undefined) {
      throw new Error(`No transcript found for evaluation item ${item.id}.`);
    }
    return transcript;
  };

export const loadTranscriptDirectory = async (directory: string): Promise<Map<string, string>> => {
  const transcripts = new Map<string, string>();
  for (const fileName of await fs.readdir(directory)) {
    const match = TRANSCRIPT_FILE_PATTERN.exec(fileName);
    if (match?.[1]) {
      transcripts.set(match[1], await fs.readFile(path.join(directory, fileName), "utf8"));
    }
  }
  return transcripts;
};

export const echoAnswerFunction: QuestionAnswerFunction = async (query) => `Generated answer for: ${query}`;
