import { AppError } from "../util/errors";
import type { Market } from "./types";

export class ResolutionError extends AppError {
  public readonly reason = "unrecognized_code" as const;

  constructor(
    public readonly input: string,
    detail: string
  ) {
    super(`Unrecognized instrument code "${input}": ${detail}`, "RESOLUTION_ERROR", {
      context: { input, detail },
    });
    this.name = "ResolutionError";
  }
}

export const SOURCE_ERROR_KINDS = [
  "TRANSIENT",
  "PERMANENT",
  "RATE_LIMITED",
] as const;
export type SourceErrorKind = (typeof SOURCE_ERROR_KINDS)[number];

/**
 * Uniform failure record raised by every quote source. `kind` drives what the
 * caller can expect from another attempt later; the fallback fetcher moves on
 * to the next source regardless.
 */
export class SourceError extends AppError {
  constructor(
    public readonly sourceId: string,
    public readonly kind: SourceErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, `SOURCE_${kind}`, {
      cause: options?.cause,
      context: { sourceId, kind, status: options?.status },
    });
    this.name = "SourceError";
  }
}

/**
 * Map an HTTP status to a source error kind.
 */
export function kindForStatus(status: number): SourceErrorKind {
  if (status === 429) return "RATE_LIMITED";
  if (status >= 500 || status === 408) return "TRANSIENT";
  return "PERMANENT";
}

export interface SourceFailure {
  sourceId: string;
  kind: SourceErrorKind;
  message: string;
}

export type FetchFailureClass =
  | "NO_SOURCES"
  | "ALL_RATE_LIMITED"
  | "ALL_PERMANENT"
  | "ALL_TRANSIENT"
  | "MIXED";

/**
 * Raised across the orchestrator boundary when every source failed.
 */
export class FetchFailureError extends AppError {
  constructor(
    public readonly symbol: string,
    public readonly market: Market,
    public readonly errors: SourceFailure[],
    public readonly classification: FetchFailureClass
  ) {
    super(
      errors.length === 0
        ? `No quote source supports ${market} (${symbol})`
        : `All ${errors.length} quote sources failed for ${symbol}: ` +
            errors.map(e => `${e.sourceId}=${e.kind}`).join(", "),
      "FETCH_FAILURE",
      { context: { symbol, market, classification, errors } }
    );
    this.name = "FetchFailureError";
  }
}
