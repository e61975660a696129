export * from "./market/types";
export * from "./market/errors";
export { parsePrefixTable, DEFAULT_PREFIX_TABLE } from "./market/prefix_table";
export type { PrefixRule, PrefixTable } from "./market/prefix_table";
export { resolveInstrument, lookupInstrumentName } from "./market/resolve_instrument";
export {
  fetchWithFallback,
  orderSources,
  classifyFetchFailure,
} from "./market/fetch_with_fallback";
export type {
  FetchResult,
  FetchWithFallbackOptions,
  SourceAttempt,
} from "./market/fetch_with_fallback";
export type {
  FetchQuoteOptions,
  HistorySource,
  QuoteSource,
  SourceSettings,
} from "./market/sources/contracts";
export { EastmoneyKlineSource, EastmoneyQuoteSource } from "./market/sources/eastmoney";
export { TencentQuoteSource } from "./market/sources/tencent";
export { SinaQuoteSource } from "./market/sources/sina";
export {
  createQuoteSources,
  DEFAULT_SOURCE_SETTINGS,
  KNOWN_SOURCE_IDS,
} from "./market/sources/registry";

export * from "./analysis/domain/types";
export * from "./analysis/domain/errors";
export { estimateTokens, estimatePromptTokens } from "./analysis/domain/usage";
export {
  buildPromptContext,
  renderSnapshot,
  renderHistory,
} from "./analysis/prompts/context_builder";
export type { PromptContextOptions } from "./analysis/prompts/context_builder";
export { getCorePrinciples, RISK_PREFERENCE_LABELS } from "./analysis/prompts/principles";
export { computeIndicators } from "./analysis/prompts/indicators";
export type { Indicators } from "./analysis/prompts/indicators";
export type {
  ChatRequest,
  ChatStreamPart,
  ChatTransport,
  LlmClient,
  LlmCompletion,
  UsageRecord,
  UsageRecorder,
} from "./analysis/infrastructure/contracts";
export { createLlmClient } from "./analysis/infrastructure/llm_client";
export type { LlmClientDeps } from "./analysis/infrastructure/llm_client";
export { createAiSdkTransport } from "./analysis/infrastructure/ai_sdk_transport";
export { UsageLedger, DEFAULT_PRICING } from "./analysis/infrastructure/usage_ledger";
export type { UsageStats } from "./analysis/infrastructure/usage_ledger";
export { loadAnalysisConfig, parseSourceTable } from "./analysis/config";
export type { AnalysisConfig } from "./analysis/config";
export { createAnalysisOrchestrator } from "./analysis/application/analyze";
export type {
  AnalysisDependencies,
  AnalysisOrchestrator,
  AnalysisRun,
  AnalyzeOptions,
} from "./analysis/application/analyze";
