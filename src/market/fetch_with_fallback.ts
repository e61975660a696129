/**
 * Business logic: fetch one quote snapshot, falling back across sources.
 */
import { getLogger } from "../util/logger";
import { errorMessage } from "../util/errors";
import {
  FetchFailureClass,
  SourceError,
  SourceErrorKind,
  SourceFailure,
} from "./errors";
import type { QuoteSource } from "./sources/contracts";
import type { InstrumentCode, QuoteSnapshot } from "./types";

export interface SourceAttempt {
  sourceId: string;
  outcome: "success" | "failure";
  kind?: SourceErrorKind;
  message?: string;
  elapsedMs: number;
}

export type FetchResult =
  | { ok: true; snapshot: QuoteSnapshot; attempts: SourceAttempt[] }
  | { ok: false; errors: SourceFailure[]; attempts: SourceAttempt[] };

export interface FetchWithFallbackOptions {
  /** Stops the whole fetch, e.g. when the caller went away */
  signal?: AbortSignal;
  now?: () => number;
}

/**
 * Try each source that supports `code.market`, lowest priority first, and
 * return the first snapshot. Every failure kind moves straight on to the next
 * source; there is no retry or backoff against the same provider.
 */
export async function fetchWithFallback(
  code: InstrumentCode,
  sources: readonly QuoteSource[],
  options: FetchWithFallbackOptions = {}
): Promise<FetchResult> {
  const logger = getLogger("market/fetch_with_fallback");
  const now = options.now ?? Date.now;
  const candidates = orderSources(code, sources);
  const attempts: SourceAttempt[] = [];
  const errors: SourceFailure[] = [];

  for (const source of candidates) {
    if (options.signal?.aborted) break;
    const startedAt = now();
    try {
      const snapshot = await callWithTimeout(source, code, options.signal);
      const elapsedMs = now() - startedAt;
      attempts.push({ sourceId: source.id, outcome: "success", elapsedMs });
      logger.debug(
        { source: source.id, symbol: code.symbol, elapsedMs },
        "quote source succeeded"
      );
      return { ok: true, snapshot, attempts };
    } catch (err) {
      const failure = toFailure(source.id, err);
      const elapsedMs = now() - startedAt;
      errors.push(failure);
      attempts.push({
        sourceId: source.id,
        outcome: "failure",
        kind: failure.kind,
        message: failure.message,
        elapsedMs,
      });
      logger.debug(
        { source: source.id, symbol: code.symbol, kind: failure.kind, elapsedMs },
        "quote source failed, trying next"
      );
    }
  }

  logger.warn(
    {
      symbol: code.symbol,
      market: code.market,
      tried: attempts.map(a => a.sourceId),
      classification: classifyFetchFailure(errors),
    },
    "all quote sources failed"
  );
  return { ok: false, errors, attempts };
}

/**
 * Sources supporting the market, ascending priority. `Array.prototype.sort`
 * is stable, so equal priorities keep declaration order.
 */
export function orderSources(
  code: InstrumentCode,
  sources: readonly QuoteSource[]
): QuoteSource[] {
  return sources
    .filter(source => source.markets.includes(code.market))
    .slice()
    .sort((a, b) => a.priority - b.priority);
}

/**
 * Summarize why every source failed so a caller can tell "symbol unknown or
 * not trading" (all permanent) from "providers down" (all transient).
 */
export function classifyFetchFailure(
  errors: readonly SourceFailure[]
): FetchFailureClass {
  if (errors.length === 0) return "NO_SOURCES";
  const kinds = new Set(errors.map(e => e.kind));
  if (kinds.size > 1) return "MIXED";
  if (kinds.has("RATE_LIMITED")) return "ALL_RATE_LIMITED";
  if (kinds.has("PERMANENT")) return "ALL_PERMANENT";
  return "ALL_TRANSIENT";
}

async function callWithTimeout(
  source: QuoteSource,
  code: InstrumentCode,
  parentSignal: AbortSignal | undefined
): Promise<QuoteSnapshot> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  parentSignal?.addEventListener("abort", onParentAbort, { once: true });
  let timer: NodeJS.Timeout | undefined;

  // The source receives the signal, but a source that ignores it must not
  // hold the pipeline past its declared timeout.
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new SourceError(
          source.id,
          "TRANSIENT",
          `Timed out after ${source.timeoutMs}ms`
        )
      );
    }, source.timeoutMs);
  });

  try {
    return await Promise.race([
      source.fetchQuote(code, { signal: controller.signal }),
      deadline,
    ]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener("abort", onParentAbort);
  }
}

function toFailure(sourceId: string, err: unknown): SourceFailure {
  if (err instanceof SourceError) {
    return { sourceId, kind: err.kind, message: err.message };
  }
  // Anything unexpected from an adapter is treated as a passing fault
  return { sourceId, kind: "TRANSIENT", message: errorMessage(err) };
}
