import type { LlmUsage } from "../../observability/metrics.js";

export interface ConversationMessage {
  role: "user" | "assistant";
  content: string;
}

/**
 * Conversation state held by the model side. The QA engine only creates,
 * passes along and discards it.
 */
export interface ConversationThread {
  readonly id: string;
  readonly messages: ConversationMessage[];
}

export interface LlmStreamTextChunk {
  type: "text";
  text: string;
}

export interface LlmStreamUsageChunk {
  type: "usage";
  usage: LlmUsage;
}

export type LlmStreamChunk = LlmStreamTextChunk | LlmStreamUsageChunk;

export interface LlmStreamRequest<TThread> {
  thread: TThread;
  prompt: string;
  signal?: AbortSignal;
}

export interface LlmCapability<TThread = ConversationThread> {
  createThread(): Promise<TThread>;
  streamReply(request: LlmStreamRequest<TThread>): AsyncIterable<string | LlmStreamChunk>;
}
