/**
 * Domain types for instruments and quotes.
 */

export const MARKETS = ["A_SHARE", "HK", "INDEX", "FUND"] as const;
export type Market = (typeof MARKETS)[number];

export const EXCHANGES = ["SH", "SZ", "BJ", "HK"] as const;
export type Exchange = (typeof EXCHANGES)[number];

/**
 * Result type for operations that report failure as a value instead of throwing.
 */
export type Result<TData, TError> =
  | { ok: true; data: TData }
  | { ok: false; error: TError };

export interface InstrumentCode {
  /** Input as the user typed it */
  raw: string;
  market: Market;
  /** Bare numeric code, e.g. "600000" or "00700" */
  symbol: string;
  exchange: Exchange;
}

export interface QuoteSnapshot {
  readonly symbol: string;
  readonly market: Market;
  readonly name?: string;
  readonly price: number;
  /** Percent, e.g. 1.2 means +1.2% */
  readonly changePct: number;
  readonly change?: number;
  /** Shares traded */
  readonly volume: number;
  /** Turnover in local currency */
  readonly amount?: number;
  readonly open?: number;
  readonly high?: number;
  readonly low?: number;
  readonly prevClose?: number;
  /** ISO8601 */
  readonly timestamp: string;
  readonly sourceId: string;
}

export interface DailyBar {
  /** YYYY-MM-DD */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Freeze a snapshot so downstream stages cannot mutate it in place.
 */
export function createSnapshot(fields: QuoteSnapshot): QuoteSnapshot {
  return Object.freeze({ ...fields });
}

export function formatInstrument(code: InstrumentCode): string {
  return `${code.exchange}${code.symbol}`;
}
