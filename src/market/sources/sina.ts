import { pickNumber, readGbkText, roundTo } from "../../util/http";
import { SourceError } from "../errors";
import type { InstrumentCode, Market, QuoteSnapshot } from "../types";
import { createSnapshot } from "../types";
import type { FetchQuoteOptions, QuoteSource, SourceSettings } from "./contracts";
import {
  chinaTimeToIso,
  malformed,
  optionalNumber,
  readBody,
  requestProvider,
} from "./shared";

const QUOTE_URL = "https://hq.sinajs.cn/list=";
// Sina rejects requests without a finance.sina.com.cn referer (HTTP 403)
const REFERER = "https://finance.sina.com.cn/";

/**
 * Parse `var hq_str_sh600000="name,open,prev,...";`. Empty quotes mean the
 * provider does not know the symbol.
 */
export function parseSinaPayload(
  body: string,
  providerSymbol: string
): string[] | undefined {
  const m = body.match(new RegExp(`hq_str_${providerSymbol}="([^"]*)"`));
  if (!m || m[1].length === 0) return undefined;
  return m[1].split(",");
}

/**
 * Sina finance quote feed (GBK text). Domestic markets only.
 */
export class SinaQuoteSource implements QuoteSource {
  readonly id: string;
  readonly priority: number;
  readonly timeoutMs: number;
  readonly markets: readonly Market[] = ["A_SHARE", "INDEX", "FUND"];

  constructor(settings: SourceSettings) {
    this.id = settings.id;
    this.priority = settings.priority;
    this.timeoutMs = settings.timeoutMs;
  }

  async fetchQuote(
    code: InstrumentCode,
    options: FetchQuoteOptions
  ): Promise<QuoteSnapshot> {
    const providerSymbol = `${code.exchange.toLowerCase()}${code.symbol}`;
    const res = await requestProvider(this.id, `${QUOTE_URL}${providerSymbol}`, {
      timeoutMs: this.timeoutMs,
      signal: options.signal,
      headers: { Referer: REFERER },
    });
    const body = await readBody(this.id, () => readGbkText(res));

    const fields = parseSinaPayload(body, providerSymbol);
    if (!fields) {
      throw new SourceError(this.id, "PERMANENT", `No quote for ${providerSymbol}`);
    }
    if (fields.length < 32) {
      throw malformed(this.id, `expected at least 32 fields, got ${fields.length}`);
    }

    const price = pickNumber(fields[3]);
    const prevClose = pickNumber(fields[2]);
    if (price === null || prevClose === null) {
      throw malformed(this.id, "missing price or previous close");
    }
    // Before the open Sina reports 0 as the last price
    if (price === 0) {
      throw new SourceError(this.id, "TRANSIENT", `No trades yet for ${providerSymbol}`);
    }

    const change = roundTo(price - prevClose, 4);
    const changePct = prevClose !== 0 ? roundTo((change / prevClose) * 100, 4) : 0;

    return createSnapshot({
      symbol: code.symbol,
      market: code.market,
      name: fields[0] || undefined,
      price,
      changePct,
      change,
      volume: pickNumber(fields[8]) ?? 0,
      amount: optionalNumber(pickNumber(fields[9])),
      open: optionalNumber(pickNumber(fields[1])),
      high: optionalNumber(pickNumber(fields[4])),
      low: optionalNumber(pickNumber(fields[5])),
      prevClose,
      timestamp:
        chinaTimeToIso(`${fields[30]} ${fields[31]}`) ?? new Date().toISOString(),
      sourceId: this.id,
    });
  }
}
