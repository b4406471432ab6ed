import { describe, expect, it, vi } from "vitest";
import { GenerationError } from "../../src/errors/index.js";
import type { CitationChunk } from "../../src/modules/citations/types.js";
import type { LlmCapability } from "../../src/modules/llm/types.js";
import { QaEngine } from "../../src/modules/qa/qa-engine.js";
import { ReferenceStore } from "../../src/modules/references/reference-store.js";
import { getMetricsSnapshot } from "../../src/observability/metrics.js";
import { FakeLlm, type FakeThread } from "../../tests/helpers/fake-llm.js";

const axioms = new ReferenceStore([
  { id: "A-001", description: "Higher policy rates raise borrowing costs." },
  { id: "A-002", description: "Higher borrowing costs reduce mortgage demand." }
]);
const reality = new ReferenceStore([{ id: "R-001", description: "The policy rate is 1.75 percent." }]);

const collect = async (stream: AsyncIterable<CitationChunk>): Promise<CitationChunk[]> => {
  const chunks: CitationChunk[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
};

const silenceLogs = (): void => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
};

describe("QaEngine.invokeStreaming", () => {
  it("streams text and resolved citations in order", async () => {
    silenceLogs();
    const llm = new FakeLlm([["Borrowing gets dearer [A-0", "01] at [R-001]", "."]]);
    const engine = new QaEngine({ llm, axioms, reality });

    const chunks = await collect(engine.invokeStreaming("What if rates rise?", "session-1"));

    expect(chunks).toEqual([
      { type: "text", text: "Borrowing gets dearer " },
      { type: "axiom_citation", id: "A-001", description: "Higher policy rates raise borrowing costs." },
      { type: "text", text: " at " },
      { type: "reality_citation", id: "R-001", description: "The policy rate is 1.75 percent." },
      { type: "text", text: "." }
    ]);
  });

  it("builds the prompt from the constitution, reality and question", async () => {
    silenceLogs();
    const llm = new FakeLlm();
    const engine = new QaEngine({ llm, axioms, reality });

    await collect(engine.invokeStreaming("What if rates rise?", "session-1"));

    const prompt = llm.requests[0]?.prompt ?? "";
    expect(prompt).toContain("[A-001] Higher policy rates raise borrowing costs.");
    expect(prompt).toContain("Current reality:\n[R-001] The policy rate is 1.75 percent.");
    expect(prompt.endsWith("Question:\nWhat if rates rise?")).toBe(true);
  });

  it("uses supplied reality instead of the default, even when empty", async () => {
    silenceLogs();
    const llm = new FakeLlm([["[R-001] [R-900]"], ["[R-001]"]]);
    const engine = new QaEngine({ llm, axioms, reality });

    const supplied = await collect(
      engine.invokeStreaming("q", "session-1", [{ id: "R-900", description: "Uploaded fact." }])
    );
    const empty = await collect(engine.invokeStreaming("q", "session-2", []));

    expect(supplied).toEqual([
      { type: "text", text: "[R-001] " },
      { type: "reality_citation", id: "R-900", description: "Uploaded fact." }
    ]);
    expect(empty).toEqual([{ type: "text", text: "[R-001]" }]);
    expect(llm.requests[1]?.prompt).not.toContain("Current reality:");
  });

  it("applies a constitution override to a single call", async () => {
    silenceLogs();
    const llm = new FakeLlm([["[A-050]"], ["[A-050]"]]);
    const engine = new QaEngine({ llm, axioms, reality });
    const override = new ReferenceStore([{ id: "A-050", description: "Debug axiom." }]);

    const overridden = await collect(engine.invokeStreaming("q", "session-1", null, { constitution: override }));
    const normal = await collect(engine.invokeStreaming("q", "session-1"));

    expect(overridden).toEqual([{ type: "axiom_citation", id: "A-050", description: "Debug axiom." }]);
    expect(normal).toEqual([{ type: "text", text: "[A-050]" }]);
    expect(llm.requests[0]?.prompt).not.toContain("[A-001]");
    expect(llm.requests[1]?.prompt).toContain("[A-001] Higher policy rates raise borrowing costs.");
  });

  it("reuses the session thread across turns and isolates sessions", async () => {
    silenceLogs();
    const llm = new FakeLlm();
    const engine = new QaEngine({ llm, axioms, reality });

    await collect(engine.invokeStreaming("first", "session-a"));
    await collect(engine.invokeStreaming("second", "session-a"));
    await collect(engine.invokeStreaming("other", "session-b"));

    expect(llm.threadsCreated).toBe(2);
    expect(llm.requests[0]?.thread).toBe(llm.requests[1]?.thread);
    expect(llm.requests[2]?.thread).not.toBe(llm.requests[0]?.thread);
  });

  it("starts a fresh thread after resetSession", async () => {
    silenceLogs();
    const llm = new FakeLlm();
    const engine = new QaEngine({ llm, axioms, reality });

    await collect(engine.invokeStreaming("first", "session-a"));
    engine.resetSession("session-a");
    engine.resetSession("session-a");
    await collect(engine.invokeStreaming("second", "session-a"));

    expect(llm.threadsCreated).toBe(2);
    expect(llm.requests[1]?.thread.id).toBe("thread-2");
  });

  it("wraps capability failures in GenerationError and keeps the thread", async () => {
    silenceLogs();
    const llm = new FakeLlm([new Error("upstream timeout"), ["recovered"]]);
    const engine = new QaEngine({ llm, axioms, reality });

    const failure = collect(engine.invokeStreaming("q", "session-1"));
    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(collect(engine.invokeStreaming("q", "session-1"))).resolves.toEqual([
      { type: "text", text: "recovered" }
    ]);

    expect(llm.threadsCreated).toBe(1);
    expect(llm.requests[1]?.thread.prompts).toHaveLength(1);
    expect(getMetricsSnapshot().error_rates).toEqual({ qa_generation_error: 1 });
  });

  it("carries the session id and cause on GenerationError", async () => {
    silenceLogs();
    const cause = new Error("boom");
    const engine = new QaEngine({ llm: new FakeLlm([cause]), axioms, reality });

    try {
      await collect(engine.invokeStreaming("q", "session-9"));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GenerationError);
      if (error instanceof GenerationError) {
        expect(error.sessionId).toBe("session-9");
        expect(error.cause).toBe(cause);
      }
    }
  });

  it("aborts the capability call when the consumer stops early", async () => {
    silenceLogs();
    const llm = new FakeLlm([["one ", "two ", "three"]]);
    const engine = new QaEngine({ llm, axioms, reality });

    for await (const chunk of engine.invokeStreaming("q", "session-1")) {
      expect(chunk).toEqual({ type: "text", text: "one " });
      break;
    }

    expect(llm.requests[0]?.signal?.aborted).toBe(true);
    expect(llm.requests[0]?.thread.prompts).toEqual([]);
  });

  it("propagates the caller's abort signal to the capability", async () => {
    silenceLogs();
    const controller = new AbortController();
    const hanging: LlmCapability<FakeThread> = {
      createThread: async () => ({ id: "thread-1", prompts: [] }),
      async *streamReply({ signal }) {
        yield "partial ";
        await new Promise<never>((_resolve, reject) => {
          if (signal?.aborted) {
            reject(new Error("request aborted"));
            return;
          }
          signal?.addEventListener("abort", () => reject(new Error("request aborted")), { once: true });
        });
      }
    };
    const engine = new QaEngine({ llm: hanging, axioms, reality });
    const stream = engine.invokeStreaming("q", "session-1", null, { signal: controller.signal });

    await expect(stream.next()).resolves.toEqual({ done: false, value: { type: "text", text: "partial " } });
    const pending = stream.next();
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(GenerationError);
  });

  it("records token usage reported by the capability", async () => {
    silenceLogs();
    const llm = new FakeLlm([
      ["answer", { type: "usage", usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 } }]
    ]);
    const engine = new QaEngine({ llm, axioms, reality });

    await collect(engine.invokeStreaming("q", "session-1"));

    expect(getMetricsSnapshot().llm_usage).toEqual({ promptTokens: 12, completionTokens: 3, totalTokens: 15 });
  });
});

describe("QaEngine.invoke", () => {
  it("returns the full answer with citations rendered as markers", async () => {
    silenceLogs();
    const llm = new FakeLlm([["Demand falls [A-002] and [A-404]."]]);
    const engine = new QaEngine({ llm, axioms, reality });

    await expect(engine.invoke("q", "session-1")).resolves.toEqual({
      text: "Demand falls [A-002] and [A-404].",
      sessionId: "session-1"
    });
  });
});
