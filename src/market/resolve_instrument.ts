import { ResolutionError } from "./errors";
import { DEFAULT_PREFIX_TABLE, PrefixTable } from "./prefix_table";
import type { Exchange, InstrumentCode, Result } from "./types";

const EXCHANGE_MARKERS: Record<string, Exchange> = {
  SH: "SH",
  SS: "SH",
  SZ: "SZ",
  BJ: "BJ",
  HK: "HK",
};

interface SplitInput {
  digits: string;
  exchange?: Exchange;
}

/**
 * Classify a user-entered code into market + normalized symbol.
 *
 * Accepted shapes: "600000", "sh600000", "SH:600000", "600000.SH", "00700",
 * "hk700", "00700.HK". Pure: the same input and table always give the same answer.
 */
export function resolveInstrument(
  raw: string,
  table: PrefixTable = DEFAULT_PREFIX_TABLE
): Result<InstrumentCode, ResolutionError> {
  const normalized = normalize(raw);
  if (!normalized) {
    return fail(raw, "empty input");
  }

  const split = splitExchange(normalized);
  if (!split) {
    return fail(raw, "expected a numeric code with an optional SH/SZ/BJ/HK marker");
  }

  const { digits, exchange } = split;

  if (exchange === "HK") {
    if (digits.length > table.hkDigits) {
      return fail(raw, `HK codes have at most ${table.hkDigits} digits`);
    }
    return ok(raw, {
      market: "HK",
      symbol: digits.padStart(table.hkDigits, "0"),
      exchange: "HK",
    });
  }

  if (!exchange && digits.length === table.hkDigits) {
    return ok(raw, { market: "HK", symbol: digits, exchange: "HK" });
  }

  if (digits.length !== 6) {
    return fail(raw, `unsupported code length ${digits.length}`);
  }

  const index = table.indexCodes.find(
    entry => entry.code === digits && (!exchange || entry.exchange === exchange)
  );
  if (index) {
    return ok(raw, { market: "INDEX", symbol: digits, exchange: index.exchange });
  }

  const rule = table.rules.find(
    r =>
      digits.startsWith(r.prefix) &&
      (exchange ? r.exchange === exchange : !r.explicitOnly)
  );
  if (!rule) {
    return fail(raw, "no known market uses this prefix");
  }
  return ok(raw, { market: rule.market, symbol: digits, exchange: rule.exchange });
}

/**
 * Display name for well-known indices; providers usually send their own names
 * for stocks and funds.
 */
export function lookupInstrumentName(
  code: InstrumentCode,
  table: PrefixTable = DEFAULT_PREFIX_TABLE
): string | undefined {
  if (code.market !== "INDEX") return undefined;
  return table.indexCodes.find(
    entry => entry.code === code.symbol && entry.exchange === code.exchange
  )?.name;
}

function normalize(value: string): string {
  return String(value ?? "")
    .trim()
    .toUpperCase()
    .replace(/\s+/g, "");
}

function splitExchange(input: string): SplitInput | undefined {
  const prefixed = input.match(/^([A-Z]{2})[:#]?(\d+)$/);
  if (prefixed) {
    const exchange = EXCHANGE_MARKERS[prefixed[1]];
    return exchange ? { digits: prefixed[2], exchange } : undefined;
  }

  const suffixed = input.match(/^(\d+)\.([A-Z]{2})$/);
  if (suffixed) {
    const exchange = EXCHANGE_MARKERS[suffixed[2]];
    return exchange ? { digits: suffixed[1], exchange } : undefined;
  }

  if (/^\d+$/.test(input)) {
    return { digits: input };
  }
  return undefined;
}

function ok(
  raw: string,
  fields: Omit<InstrumentCode, "raw">
): Result<InstrumentCode, ResolutionError> {
  return { ok: true, data: { raw, ...fields } };
}

function fail(
  raw: string,
  detail: string
): Result<InstrumentCode, ResolutionError> {
  return { ok: false, error: new ResolutionError(raw, detail) };
}
