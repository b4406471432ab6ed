import { randomUUID } from "node:crypto";
import { GenerationError } from "../../errors/index.js";
import { logDebug, logError, logInfo, serializeError } from "../../observability/logger.js";
import { recordErrorRate, recordLlmLatency, recordLlmUsage, type LlmUsage } from "../../observability/metrics.js";
import { buildQaUserPrompt } from "../../prompts/index.js";
import { renderChunkText } from "../citations/citation-markers.js";
import { createCitationResolver, parseCitationStream } from "../citations/citation-stream-parser.js";
import type { CitationChunk } from "../citations/types.js";
import type { ConversationThread, LlmCapability } from "../llm/types.js";
import { ReferenceStore } from "../references/reference-store.js";
import type { Axiom, RealityStatement } from "../references/types.js";
import { SessionThreadManager } from "../sessions/session-thread-manager.js";

export interface QaEngineDependencies<TThread> {
  llm: LlmCapability<TThread>;
  axioms: ReferenceStore<Axiom>;
  reality?: ReferenceStore<RealityStatement>;
  sessions?: SessionThreadManager<TThread>;
  buildPrompt?: typeof buildQaUserPrompt;
  now?: () => number;
}

export interface InvokeOptions {
  /** Replaces the loaded constitution for this call only. */
  constitution?: ReferenceStore<Axiom>;
  signal?: AbortSignal;
  requestId?: string;
}

export interface InvokeResult {
  text: string;
  sessionId: string;
}

export class QaEngine<TThread = ConversationThread> {
  readonly sessions: SessionThreadManager<TThread>;
  private readonly llm: LlmCapability<TThread>;
  private readonly axioms: ReferenceStore<Axiom>;
  private readonly defaultReality: ReferenceStore<RealityStatement>;
  private readonly buildPrompt: typeof buildQaUserPrompt;
  private readonly now: () => number;

  constructor(dependencies: QaEngineDependencies<TThread>) {
    this.llm = dependencies.llm;
    this.axioms = dependencies.axioms;
    this.defaultReality = dependencies.reality ?? ReferenceStore.empty();
    this.sessions = dependencies.sessions ?? new SessionThreadManager(() => dependencies.llm.createThread());
    this.buildPrompt = dependencies.buildPrompt ?? buildQaUserPrompt;
    this.now = dependencies.now ?? Date.now;
  }

  resetSession(sessionId: string): void {
    this.sessions.resetThread(sessionId);
  }

  async *invokeStreaming(
    question: string,
    sessionId: string,
    reality?: RealityStatement[] | null,
    options: InvokeOptions = {}
  ): AsyncGenerator<CitationChunk, void, void> {
    const context = { requestId: options.requestId ?? randomUUID(), sessionId };
    const controller = new AbortController();
    const abortFromCaller = (): void => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener("abort", abortFromCaller, { once: true });
    }

    const startedAt = this.now();
    const usage: Required<LlmUsage> = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
    let completed = false;
    let textChars = 0;
    let citationCount = 0;

    try {
      const thread = await this.sessions.getOrCreateThread(sessionId);
      const axioms = options.constitution ?? this.axioms;
      const realityStore = reality ? new ReferenceStore(reality) : this.defaultReality;
      const prompt = this.buildPrompt({
        axioms: axioms.list(),
        reality: realityStore.list(),
        question
      });
      logInfo("qa.invoke.start", context, {
        axiom_count: axioms.size,
        reality_count: realityStore.size,
        reality_supplied: Boolean(reality)
      });

      const deltas = this.streamDeltas(thread, prompt, controller.signal, usage);
      for await (const chunk of parseCitationStream(deltas, {
        resolve: createCitationResolver({ axioms, reality: realityStore }),
        onUnresolved: (id) => logDebug("qa.citation.unresolved", context, { citation_id: id })
      })) {
        if (chunk.type === "text") {
          textChars += chunk.text.length;
        } else {
          citationCount += 1;
        }
        yield chunk;
      }
      completed = true;

      const latencyMs = this.now() - startedAt;
      recordLlmLatency(latencyMs);
      recordLlmUsage(usage);
      logInfo("qa.invoke.complete", context, {
        llm_latency_ms: latencyMs,
        text_chars: textChars,
        citation_count: citationCount,
        prompt_tokens: usage.promptTokens,
        completion_tokens: usage.completionTokens,
        total_tokens: usage.totalTokens
      });
    } catch (error) {
      recordErrorRate("qa_generation_error");
      logError("qa.invoke.error", context, {
        aborted: controller.signal.aborted,
        ...serializeError(error)
      });
      throw error instanceof GenerationError
        ? error
        : new GenerationError("Answer generation failed.", { cause: error, sessionId });
    } finally {
      options.signal?.removeEventListener("abort", abortFromCaller);
      if (!completed) {
        controller.abort();
      }
    }
  }

  async invoke(
    question: string,
    sessionId: string,
    reality?: RealityStatement[] | null,
    options: InvokeOptions = {}
  ): Promise<InvokeResult> {
    let text = "";
    for await (const chunk of this.invokeStreaming(question, sessionId, reality, options)) {
      text += renderChunkText(chunk);
    }
    return { text, sessionId };
  }

  private async *streamDeltas(
    thread: TThread,
    prompt: string,
    signal: AbortSignal,
    usage: Required<LlmUsage>
  ): AsyncGenerator<string, void, void> {
    for await (const chunk of this.llm.streamReply({ thread, prompt, signal })) {
      if (typeof chunk === "string") {
        if (chunk.length > 0) {
          yield chunk;
        }
        continue;
      }

      if (chunk.type === "usage") {
        usage.promptTokens = chunk.usage.promptTokens ?? usage.promptTokens;
        usage.completionTokens = chunk.usage.completionTokens ?? usage.completionTokens;
        usage.totalTokens = chunk.usage.totalTokens ?? usage.totalTokens;
        continue;
      }

      if (chunk.text.length > 0) {
        yield chunk.text;
      }
    }
  }
}
