import type { InstrumentCode, QuoteSnapshot } from "../../market/types";
import type { OrchestrationError } from "./errors";

export const ANALYSIS_KINDS = ["MARKET", "STOCK"] as const;
export type AnalysisKind = (typeof ANALYSIS_KINDS)[number];

export const RISK_PREFERENCES = [
  "neutral",
  "conservative",
  "aggressive",
  "custom",
] as const;
export type RiskPreference = (typeof RISK_PREFERENCES)[number];

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export const EMPTY_USAGE: Readonly<TokenUsage> = Object.freeze({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0,
});

/**
 * Endpoint and sampling settings for one chat completion. `baseURL` points
 * at any OpenAI-compatible server.
 */
export interface ModelConfig {
  model: string;
  apiKey?: string;
  baseURL?: string;
  temperature?: number;
  maxOutputTokens?: number;
  /** Budget for the whole stream, first byte to completion marker */
  timeoutMs: number;
}

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface PromptContext {
  system: string;
  user: string;
  /** Rendered numbers, shared verbatim by every analysis kind */
  snapshotBlock: string;
  instruction: string;
  messages: ChatMessage[];
}

export interface LlmChunk {
  textDelta: string;
  /** Present on the final chunk only */
  usage?: TokenUsage;
  done: boolean;
}

export interface AnalysisRequest {
  instrument: InstrumentCode;
  snapshot: QuoteSnapshot;
  kind: AnalysisKind;
  modelConfig: ModelConfig;
}

export const ANALYSIS_STATES = [
  "RESOLVING",
  "FETCHING",
  "BUILDING_CONTEXT",
  "STREAMING_LLM",
  "DONE",
  "ERROR",
  "CANCELLED",
] as const;
export type AnalysisState = (typeof ANALYSIS_STATES)[number];

export type FailedStage = Extract<
  AnalysisState,
  "RESOLVING" | "FETCHING" | "BUILDING_CONTEXT" | "STREAMING_LLM"
>;

export type AnalysisEvent =
  | { type: "text-delta"; text: string }
  | { type: "usage"; usage: TokenUsage }
  | { type: "warning"; stage: FailedStage; message: string }
  | { type: "error"; error: OrchestrationError; usage: TokenUsage };

export function isTerminalState(state: AnalysisState): boolean {
  return state === "DONE" || state === "ERROR" || state === "CANCELLED";
}
