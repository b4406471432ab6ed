import { afterEach, beforeEach, vi } from "vitest";

const ENV_SNAPSHOT = { ...process.env };

beforeEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

afterEach(async () => {
  for (const key of Object.keys(process.env)) {
    if (!(key in ENV_SNAPSHOT)) {
      delete process.env[key];
    }
  }

  for (const [key, value] of Object.entries(ENV_SNAPSHOT)) {
    process.env[key] = value;
  }

  const [openai, metrics, engine] = await Promise.all([
    import("../../src/clients/openai.js"),
    import("../../src/observability/metrics.js"),
    import("../../src/modules/qa/default-engine.js")
  ]);
  openai.resetOpenAIClientForTests();
  metrics.resetMetrics();
  engine.resetDefaultQaEngineForTests();
});
