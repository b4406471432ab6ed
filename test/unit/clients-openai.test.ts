import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("clients/openai", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.doUnmock("../../src/config/index.js");
    vi.doUnmock("openai");
  });

  async function importOpenAIClientModule(retrieveMock: ReturnType<typeof vi.fn>, judgeModel = "gpt-judge") {
    vi.doMock("../../src/config/index.js", () => ({
      config: {
        OPENAI_API_KEY: "test-openai-key",
        OPENAI_BASE_URL: "http://localhost:9999/v1",
        OPENAI_MODEL: "gpt-test",
        OPENAI_JUDGE_MODEL: judgeModel,
        OPENAI_TIMEOUT_MS: 20000
      }
    }));

    const OpenAIConstructor = vi.fn(function () {
      return { models: { retrieve: retrieveMock } };
    });
    vi.doMock("openai", () => ({ default: OpenAIConstructor }));

    const mod = await import("../../src/clients/openai.js");
    return { mod, OpenAIConstructor };
  }

  it("constructs the client once from configuration", async () => {
    const { mod, OpenAIConstructor } = await importOpenAIClientModule(vi.fn());

    const singleton = await mod.getOpenAIClient();

    expect(await mod.getOpenAIClient()).toBe(singleton);
    expect(OpenAIConstructor).toHaveBeenCalledTimes(1);
    expect(OpenAIConstructor).toHaveBeenCalledWith({
      apiKey: "test-openai-key",
      baseURL: "http://localhost:9999/v1",
      maxRetries: 2,
      timeout: 20000
    });
    expect(console.info).toHaveBeenCalledWith(expect.stringContaining('"event":"openai.client.initialized"'));
  });

  it("checks the answer and judge models with per-request timeout and retries", async () => {
    const retrieveMock = vi.fn().mockResolvedValue({ id: "model" });
    const { mod } = await importOpenAIClientModule(retrieveMock);

    const health = await (await mod.getOpenAIClient()).healthCheck();

    expect(health).toEqual({ status: "ok", models: ["gpt-test", "gpt-judge"] });
    expect(retrieveMock).toHaveBeenCalledTimes(2);
    expect(retrieveMock).toHaveBeenNthCalledWith(1, "gpt-test", { timeout: 7000, maxRetries: 1 });
    expect(retrieveMock).toHaveBeenNthCalledWith(2, "gpt-judge", { timeout: 7000, maxRetries: 1 });
  });

  it("checks a shared answer and judge model once", async () => {
    const retrieveMock = vi.fn().mockResolvedValue({ id: "gpt-test" });
    const { mod } = await importOpenAIClientModule(retrieveMock, "gpt-test");

    const health = await (await mod.getOpenAIClient()).healthCheck();

    expect(health).toEqual({ status: "ok", models: ["gpt-test"] });
    expect(retrieveMock).toHaveBeenCalledTimes(1);
  });

  it("reports a failed model lookup", async () => {
    const retrieveMock = vi.fn().mockRejectedValue(new Error("404 model not found"));
    const { mod } = await importOpenAIClientModule(retrieveMock);

    const health = await (await mod.getOpenAIClient()).healthCheck();

    expect(health).toEqual({ status: "error", models: ["gpt-test", "gpt-judge"], details: "404 model not found" });
  });

  it("drops the singleton on shutdown", async () => {
    const { mod, OpenAIConstructor } = await importOpenAIClientModule(vi.fn());

    await mod.getOpenAIClient();
    await mod.shutdownOpenAIClient();
    await mod.getOpenAIClient();

    expect(console.info).toHaveBeenCalledWith(expect.stringContaining('"event":"openai.client.shutdown"'));
    expect(OpenAIConstructor).toHaveBeenCalledTimes(2);
  });
});
