import { pickNumber, readGbkText } from "../../util/http";
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

const QUOTE_URL = "https://qt.gtimg.cn/q=";

// Positions in the "~"-separated payload
const F = {
  name: 1,
  code: 2,
  price: 3,
  prevClose: 4,
  open: 5,
  volume: 6,
  time: 30,
  change: 31,
  changePct: 32,
  high: 33,
  low: 34,
  amountWan: 37,
} as const;

export function toTencentSymbol(code: InstrumentCode): string {
  return `${code.exchange.toLowerCase()}${code.symbol}`;
}

/**
 * Parse `v_sh600000="1~name~600000~10.50~...";` into its field list.
 * Returns undefined when the provider answered with its "no match" marker.
 */
export function parseTencentPayload(
  body: string,
  providerSymbol: string
): string[] | undefined {
  const re = new RegExp(`v_${providerSymbol}="([^"]*)"`);
  const m = body.match(re);
  if (!m || m[1].length === 0) return undefined;
  return m[1].split("~");
}

/**
 * Tencent quote feed (GBK text). A-shares, indices, funds and HK.
 */
export class TencentQuoteSource implements QuoteSource {
  readonly id: string;
  readonly priority: number;
  readonly timeoutMs: number;
  readonly markets: readonly Market[] = ["A_SHARE", "INDEX", "FUND", "HK"];

  constructor(settings: SourceSettings) {
    this.id = settings.id;
    this.priority = settings.priority;
    this.timeoutMs = settings.timeoutMs;
  }

  async fetchQuote(
    code: InstrumentCode,
    options: FetchQuoteOptions
  ): Promise<QuoteSnapshot> {
    const providerSymbol = toTencentSymbol(code);
    const res = await requestProvider(this.id, `${QUOTE_URL}${providerSymbol}`, {
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    });
    const body = await readBody(this.id, () => readGbkText(res));

    const fields = parseTencentPayload(body, providerSymbol);
    if (!fields) {
      throw new SourceError(this.id, "PERMANENT", `No quote for ${providerSymbol}`);
    }
    if (fields.length <= F.low) {
      throw malformed(this.id, `expected more than ${F.low} fields, got ${fields.length}`);
    }

    const price = pickNumber(fields[F.price]);
    const changePct = pickNumber(fields[F.changePct]);
    if (price === null || changePct === null) {
      throw malformed(this.id, "missing price or change percent");
    }
    const volume = pickNumber(fields[F.volume]) ?? 0;
    const amountWan = pickNumber(fields[F.amountWan]);
    const isHk = code.market === "HK";

    return createSnapshot({
      symbol: code.symbol,
      market: code.market,
      name: fields[F.name] || undefined,
      price,
      changePct,
      change: optionalNumber(pickNumber(fields[F.change])),
      // A-share volume is quoted in lots of 100 and turnover in units of 10k CNY
      volume: isHk ? volume : volume * 100,
      amount: !isHk && amountWan !== null ? amountWan * 10000 : undefined,
      open: optionalNumber(pickNumber(fields[F.open])),
      high: optionalNumber(pickNumber(fields[F.high])),
      low: optionalNumber(pickNumber(fields[F.low])),
      prevClose: optionalNumber(pickNumber(fields[F.prevClose])),
      timestamp: chinaTimeToIso(fields[F.time]) ?? new Date().toISOString(),
      sourceId: this.id,
    });
  }
}
