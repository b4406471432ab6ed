import fs from "node:fs/promises";
import { z } from "zod";
import { DataFormatError } from "../../errors/index.js";
import { evaluationItemSchema, type EvaluationItem } from "./types.js";

const datasetSchema = z.array(evaluationItemSchema);

export const parseEvaluationDataset = (raw: unknown, source: string): EvaluationItem[] => {
  const parsed = datasetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataFormatError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
    );
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const item of parsed.data) {
    const key = String(item.id);
    if (seen.has(key)) {
      duplicates.push(`duplicate id ${key}`);
    }
    seen.add(key);
  }
  if (duplicates.length > 0) {
    throw new DataFormatError(source, duplicates);
  }
  return parsed.data;
};

export const loadEvaluationDataset = async (filePath: string): Promise<EvaluationItem[]> => {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DataFormatError(filePath, [`cannot read file: ${message}`], { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    throw new DataFormatError(filePath, [`not valid JSON: ${message}`], { cause: error });
  }
  return parseEvaluationDataset(raw, filePath);
};
