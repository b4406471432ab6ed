import { randomUUID } from "node:crypto";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { QA_SYSTEM_PROMPT } from "../../prompts/index.js";
import type { ConversationMessage, ConversationThread, LlmCapability, LlmStreamChunk, LlmStreamRequest } from "./types.js";

const MAX_HISTORY_MESSAGES = 16;

export interface OpenAIConversationAgentOptions {
  model?: string;
  systemPrompt?: string;
  maxHistoryMessages?: number;
  getOpenAIClient?: typeof getOpenAIClient;
}

const toHistoryMessages = (messages: ConversationMessage[], limit: number): ChatCompletionMessageParam[] =>
  messages.slice(-limit).map((message) =>
    message.role === "user"
      ? { role: "user", content: message.content }
      : { role: "assistant", content: message.content }
  );

/**
 * Chat-completions backed conversation agent. A turn is appended to the
 * thread only once the reply stream has been fully consumed.
 */
export class OpenAIConversationAgent implements LlmCapability<ConversationThread> {
  private readonly model: string;
  private readonly systemPrompt: string;
  private readonly maxHistoryMessages: number;
  private readonly resolveClient: typeof getOpenAIClient;

  constructor(options: OpenAIConversationAgentOptions = {}) {
    this.model = options.model ?? config.OPENAI_MODEL;
    this.systemPrompt = options.systemPrompt ?? QA_SYSTEM_PROMPT;
    this.maxHistoryMessages = options.maxHistoryMessages ?? MAX_HISTORY_MESSAGES;
    this.resolveClient = options.getOpenAIClient ?? getOpenAIClient;
  }

  async createThread(): Promise<ConversationThread> {
    return { id: randomUUID(), messages: [] };
  }

  async *streamReply(request: LlmStreamRequest<ConversationThread>): AsyncGenerator<LlmStreamChunk, void, void> {
    const { client } = await this.resolveClient();
    const stream = await client.chat.completions.create(
      {
        model: this.model,
        stream: true,
        stream_options: { include_usage: true },
        messages: [
          { role: "system", content: this.systemPrompt },
          ...toHistoryMessages(request.thread.messages, this.maxHistoryMessages),
          { role: "user", content: request.prompt }
        ]
      },
      { signal: request.signal }
    );

    let reply = "";
    for await (const chunk of stream) {
      const token = chunk.choices[0]?.delta?.content ?? "";
      if (token.length > 0) {
        reply += token;
        yield { type: "text", text: token };
      }

      if (chunk.usage) {
        yield {
          type: "usage",
          usage: {
            promptTokens: chunk.usage.prompt_tokens,
            completionTokens: chunk.usage.completion_tokens,
            totalTokens: chunk.usage.total_tokens
          }
        };
      }
    }

    request.thread.messages.push({ role: "user", content: request.prompt }, { role: "assistant", content: reply });
  }
}
