import { z } from "zod";
import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { JudgeResponseError } from "../../errors/index.js";
import { logDebug } from "../../observability/logger.js";
import { recordJudgeLatency } from "../../observability/metrics.js";
import {
  JUDGE_SYSTEM_PROMPT,
  buildAccuracyPrompt,
  buildEntityExtractionPrompt,
  buildTopicCoveragePrompt
} from "../../prompts/index.js";
import type { AccuracyVerdict, CoverageVerdict, EntityExtractionRequest, EvaluationJudge } from "./judge.js";
import { entityPairSchema, type EntityPair } from "./types.js";

const extractionResponseSchema = z.object({
  entities: z.array(entityPairSchema).default([])
});

const coverageResponseSchema = z.object({
  classifications: z.array(
    z.object({
      entity: z.string().optional(),
      match: z.enum(["exact", "partial", "missing"])
    })
  ),
  reason: z.string().trim().min(1)
});

const accuracyResponseSchema = z.object({
  score: z.number().min(0).max(1),
  reason: z.string().trim().min(1)
});

export interface OpenAIJudgeOptions {
  model?: string;
  getOpenAIClient?: typeof getOpenAIClient;
  now?: () => number;
}

export class OpenAIJudge implements EvaluationJudge {
  private readonly model: string;
  private readonly resolveClient: typeof getOpenAIClient;
  private readonly now: () => number;

  constructor(options: OpenAIJudgeOptions = {}) {
    this.model = options.model ?? config.OPENAI_JUDGE_MODEL;
    this.resolveClient = options.getOpenAIClient ?? getOpenAIClient;
    this.now = options.now ?? Date.now;
  }

  async extractEntities(request: EntityExtractionRequest): Promise<EntityPair[]> {
    const parsed = await this.completeJson(
      `entity_extraction.${request.target}`,
      buildEntityExtractionPrompt(request),
      extractionResponseSchema,
      request.itemId
    );
    return parsed.entities;
  }

  async classifyCoverage(request: {
    expectedEntities: EntityPair[];
    generatedEntities: EntityPair[];
    itemId?: string;
  }): Promise<CoverageVerdict> {
    const parsed = await this.completeJson(
      "topic_coverage",
      buildTopicCoveragePrompt(request),
      coverageResponseSchema,
      request.itemId
    );
    return {
      matches: parsed.classifications.map((classification) => classification.match),
      reason: parsed.reason
    };
  }

  async scoreAccuracy(request: {
    entity: EntityPair;
    llmAnswer: string;
    expectedAnswer: string;
    itemId?: string;
  }): Promise<AccuracyVerdict> {
    return this.completeJson("accuracy", buildAccuracyPrompt(request), accuracyResponseSchema, request.itemId);
  }

  private async completeJson<T>(
    operation: string,
    prompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    itemId?: string
  ): Promise<T> {
    const startedAt = this.now();
    const { client } = await this.resolveClient();
    const response = await client.chat.completions.create({
      model: this.model,
      temperature: 0,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: JUDGE_SYSTEM_PROMPT },
        { role: "user", content: prompt }
      ]
    });
    const latencyMs = this.now() - startedAt;
    recordJudgeLatency(latencyMs);
    logDebug("evaluation.judge.call", { evaluationItemId: itemId }, { operation, judge_latency_ms: latencyMs });

    const content = response.choices[0]?.message?.content ?? "";
    if (content.trim().length === 0) {
      throw new JudgeResponseError(operation, "judge returned empty content");
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : "invalid json";
      throw new JudgeResponseError(operation, `judge returned invalid JSON: ${message}`, { cause: error });
    }

    const parsed = schema.safeParse(parsedJson);
    if (!parsed.success) {
      throw new JudgeResponseError(
        operation,
        `judge JSON schema validation failed: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "root"} ${issue.message}`)
          .join("; ")}`
      );
    }
    return parsed.data;
  }
}
