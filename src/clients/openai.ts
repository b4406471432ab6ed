import OpenAI from "openai";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";

type HealthStatus = "ok" | "error";

export interface OpenAIHealth {
  status: HealthStatus;
  models: string[];
  details?: string;
}

export interface OpenAISingleton {
  client: OpenAI;
  healthCheck: () => Promise<OpenAIHealth>;
}

const HEALTH_CHECK_TIMEOUT_MS = 7000;
const HEALTH_CHECK_RETRIES = 1;
const REQUEST_RETRIES = 2;

let singleton: OpenAISingleton | null = null;

/** Answer and judge models, once each. */
export const configuredModels = (): string[] => [...new Set([config.OPENAI_MODEL, config.OPENAI_JUDGE_MODEL])];

function initialize(): OpenAISingleton {
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.OPENAI_BASE_URL,
    maxRetries: REQUEST_RETRIES,
    timeout: config.OPENAI_TIMEOUT_MS
  });

  logInfo("openai.client.initialized", {}, {
    answer_model: config.OPENAI_MODEL,
    judge_model: config.OPENAI_JUDGE_MODEL,
    custom_base_url: config.OPENAI_BASE_URL !== undefined
  });

  return {
    client,
    async healthCheck() {
      const models = configuredModels();
      try {
        await Promise.all(
          models.map((model) =>
            client.models.retrieve(model, { timeout: HEALTH_CHECK_TIMEOUT_MS, maxRetries: HEALTH_CHECK_RETRIES })
          )
        );
        return { status: "ok", models };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", models, details };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  logInfo("openai.client.shutdown", {});
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
