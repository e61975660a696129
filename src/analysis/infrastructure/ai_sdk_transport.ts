import { createOpenAI } from "@ai-sdk/openai";
import {
  APICallError,
  LanguageModelUsage,
  LoadAPIKeyError,
  ModelMessage,
  streamText,
} from "ai";
import { getLogger } from "../../util/logger";
import { errorMessage } from "../../util/errors";
import { LlmError, LlmErrorKind } from "../domain/errors";
import type { ChatMessage, TokenUsage } from "../domain/types";
import type { ChatRequest, ChatStreamPart, ChatTransport } from "./contracts";

const logger = getLogger("analysis/ai_sdk_transport");

export function kindForLlmStatus(status: number | undefined): LlmErrorKind {
  if (status === 401 || status === 403) return "AUTH";
  if (status === 429) return "RATE_LIMIT";
  if (status === 408 || status === 504) return "TIMEOUT";
  return "PROTOCOL";
}

/**
 * Translate whatever the AI SDK raised into an `LlmError`.
 */
export function toLlmError(err: unknown): LlmError {
  if (err instanceof LlmError) return err;
  if (APICallError.isInstance(err)) {
    return new LlmError(kindForLlmStatus(err.statusCode), err.message, {
      cause: err,
      status: err.statusCode,
    });
  }
  if (LoadAPIKeyError.isInstance(err)) {
    return new LlmError("AUTH", err.message, { cause: err });
  }
  return new LlmError("PROTOCOL", errorMessage(err), { cause: err });
}

function toTokenUsage(usage: LanguageModelUsage): TokenUsage | undefined {
  const { inputTokens, outputTokens } = usage;
  if (inputTokens === undefined || outputTokens === undefined) return undefined;
  return {
    promptTokens: inputTokens,
    completionTokens: outputTokens,
    totalTokens: usage.totalTokens ?? inputTokens + outputTokens,
  };
}

function toModelMessage(message: ChatMessage): ModelMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

/**
 * Chat transport over the AI SDK's OpenAI provider. Uses the chat completions
 * API so any OpenAI-compatible `baseURL` works. SDK retries are off; the
 * caller decides whether to try again.
 */
export function createAiSdkTransport(): ChatTransport {
  return {
    async *stream(
      request: ChatRequest,
      signal: AbortSignal
    ): AsyncGenerator<ChatStreamPart> {
      const provider = createOpenAI({
        apiKey: request.apiKey,
        baseURL: request.baseURL,
      });
      const result = streamText({
        model: provider.chat(request.model),
        messages: request.messages.map(toModelMessage),
        temperature: request.temperature,
        maxOutputTokens: request.maxOutputTokens,
        maxRetries: 0,
        abortSignal: signal,
        onError: ({ error }) => {
          logger.debug({ err: error, model: request.model }, "stream error");
        },
      });

      try {
        for await (const part of result.fullStream) {
          switch (part.type) {
            case "text-delta":
              yield { type: "text-delta", text: part.text };
              break;
            case "finish":
              yield { type: "finish", usage: toTokenUsage(part.totalUsage) };
              break;
            case "error":
              throw toLlmError(part.error);
            case "abort":
              return;
            default:
              break;
          }
        }
      } catch (err) {
        throw toLlmError(err);
      }
    },
  };
}
