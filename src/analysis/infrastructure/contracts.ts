import type { LlmErrorKind } from "../domain/errors";
import type {
  ChatMessage,
  LlmChunk,
  ModelConfig,
  PromptContext,
  TokenUsage,
} from "../domain/types";

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxOutputTokens?: number;
  apiKey?: string;
  baseURL?: string;
}

/**
 * Incremental output of a streaming chat completion. `finish` is the
 * completion marker and carries provider totals when the server sends them.
 */
export type ChatStreamPart =
  | { type: "text-delta"; text: string }
  | { type: "finish"; usage?: TokenUsage };

/**
 * Streaming chat-completion capability. Implementations stop producing parts
 * once `signal` aborts and throw `LlmError` for classified failures.
 */
export interface ChatTransport {
  stream(request: ChatRequest, signal: AbortSignal): AsyncIterable<ChatStreamPart>;
}

export type UsageOutcome = "success" | "error" | "cancelled";

export interface UsageRecord {
  timestamp: string;
  model: string;
  usage: TokenUsage;
  outcome: UsageOutcome;
  elapsedMs: number;
  temperature?: number;
  errorKind?: LlmErrorKind;
  errorMessage?: string;
  inputPreview: string;
  outputPreview: string;
}

export interface UsageRecorder {
  record(entry: UsageRecord): void;
}

/**
 * One in-flight completion. Iterating it sends the request; iterating again
 * throws. `usage` is live while chunks arrive.
 */
export interface LlmCompletion extends AsyncIterable<LlmChunk> {
  readonly modelId: string;
  readonly usage: TokenUsage;
}

export interface LlmClient {
  complete(context: PromptContext, config: ModelConfig): LlmCompletion;
}
