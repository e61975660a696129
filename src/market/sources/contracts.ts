import type { DailyBar, InstrumentCode, Market, QuoteSnapshot } from "../types";

/**
 * Priority/timeout entry for one provider, injected from configuration.
 */
export interface SourceSettings {
  id: string;
  /** Lower is tried first */
  priority: number;
  timeoutMs: number;
}

export interface FetchQuoteOptions {
  /** Fires when the fetcher gives up on this source */
  signal: AbortSignal;
}

/**
 * One upstream market-data provider behind a uniform capability.
 * Implementations are stateless between calls, never retry, and reject with
 * `SourceError` only.
 */
export interface QuoteSource {
  readonly id: string;
  readonly priority: number;
  readonly timeoutMs: number;
  readonly markets: readonly Market[];
  fetchQuote(
    code: InstrumentCode,
    options: FetchQuoteOptions
  ): Promise<QuoteSnapshot>;
}

/**
 * Recent daily bars for the optional historical context block.
 */
export interface HistorySource {
  readonly id: string;
  fetchDailyBars(
    code: InstrumentCode,
    params: { limit: number; signal?: AbortSignal }
  ): Promise<DailyBar[]>;
}
