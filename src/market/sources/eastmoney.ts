import { z } from "zod";
import { getLogger } from "../../util/logger";
import { pickNumber, roundTo } from "../../util/http";
import { SourceError } from "../errors";
import type {
  DailyBar,
  Exchange,
  InstrumentCode,
  Market,
  QuoteSnapshot,
} from "../types";
import { createSnapshot } from "../types";
import type {
  FetchQuoteOptions,
  HistorySource,
  QuoteSource,
  SourceSettings,
} from "./contracts";
import { malformed, optionalNumber, readBody, requestProvider } from "./shared";

const QUOTE_URL = "https://push2.eastmoney.com/api/qt/stock/get";
const QUOTE_FIELDS = "f43,f44,f45,f46,f47,f48,f57,f58,f60,f86,f169,f170";
const KLINE_URL = "https://push2his.eastmoney.com/api/qt/stock/kline/get";

// Numeric fields arrive as numbers, or "-" while a stock is suspended
const numeric = z.union([z.number(), z.string()]).nullish();

const QuoteResponseSchema = z.object({
  rc: z.number().optional(),
  data: z
    .object({
      f43: numeric, // last
      f44: numeric, // high
      f45: numeric, // low
      f46: numeric, // open
      f47: numeric, // volume, lots of 100 outside HK
      f48: numeric, // turnover
      f57: z.string().nullish(), // code
      f58: z.string().nullish(), // name
      f60: numeric, // previous close
      f86: numeric, // epoch seconds of last trade
      f169: numeric, // change
      f170: numeric, // change percent
    })
    .nullable(),
});

const MARKET_IDS: Record<Exchange, string> = {
  SH: "1",
  SZ: "0",
  BJ: "0",
  HK: "116",
};

/**
 * Eastmoney `secid` for a resolved instrument, e.g. "1.600000" or "116.00700".
 */
export function toEastmoneySecId(code: InstrumentCode): string {
  return `${MARKET_IDS[code.exchange]}.${code.symbol}`;
}

/**
 * Eastmoney push2 JSON quotes. Covers every supported market.
 */
export class EastmoneyQuoteSource implements QuoteSource {
  readonly id: string;
  readonly priority: number;
  readonly timeoutMs: number;
  readonly markets: readonly Market[] = ["A_SHARE", "INDEX", "FUND", "HK"];
  private readonly logger = getLogger("market/sources/eastmoney");

  constructor(settings: SourceSettings) {
    this.id = settings.id;
    this.priority = settings.priority;
    this.timeoutMs = settings.timeoutMs;
  }

  async fetchQuote(
    code: InstrumentCode,
    options: FetchQuoteOptions
  ): Promise<QuoteSnapshot> {
    const url = `${QUOTE_URL}?secid=${toEastmoneySecId(code)}&fltt=2&invt=2&fields=${QUOTE_FIELDS}`;
    const res = await requestProvider(this.id, url, {
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    });
    const json: unknown = await readBody(this.id, () => res.json());

    const parsed = QuoteResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw malformed(this.id, parsed.error.issues[0]?.message ?? "schema mismatch");
    }
    const data = parsed.data.data;
    if (!data) {
      throw new SourceError(this.id, "PERMANENT", `No quote for ${code.symbol}`);
    }

    const price = pickNumber(data.f43);
    const prevClose = pickNumber(data.f60);
    if (price === null) {
      throw new SourceError(
        this.id,
        "PERMANENT",
        `No last price for ${code.symbol} (suspended or not trading)`
      );
    }

    const change =
      pickNumber(data.f169) ??
      (prevClose !== null ? roundTo(price - prevClose, 4) : null);
    const changePct =
      pickNumber(data.f170) ??
      (change !== null && prevClose ? roundTo((change / prevClose) * 100, 4) : 0);
    const lots = pickNumber(data.f47) ?? 0;
    const tradedAt = pickNumber(data.f86);

    this.logger.debug({ secid: toEastmoneySecId(code), price }, "eastmoney quote");

    return createSnapshot({
      symbol: code.symbol,
      market: code.market,
      name: data.f58 ?? undefined,
      price,
      changePct,
      change: optionalNumber(change),
      volume: code.market === "HK" ? lots : lots * 100,
      amount: optionalNumber(pickNumber(data.f48)),
      open: optionalNumber(pickNumber(data.f46)),
      high: optionalNumber(pickNumber(data.f44)),
      low: optionalNumber(pickNumber(data.f45)),
      prevClose: optionalNumber(prevClose),
      timestamp: tradedAt
        ? new Date(tradedAt * 1000).toISOString()
        : new Date().toISOString(),
      sourceId: this.id,
    });
  }
}

const KlineResponseSchema = z.object({
  data: z
    .object({
      klines: z.array(z.string()),
    })
    .nullable(),
});

/**
 * Parse one "date,open,close,high,low,volume" kline row.
 */
export function parseKlineRow(row: string): DailyBar | undefined {
  const [date, open, close, high, low, volume] = row.split(",");
  const o = pickNumber(open);
  const c = pickNumber(close);
  const h = pickNumber(high);
  const l = pickNumber(low);
  const v = pickNumber(volume);
  if (!date || o === null || c === null || h === null || l === null || v === null) {
    return undefined;
  }
  return { date, open: o, close: c, high: h, low: l, volume: v };
}

/**
 * Forward-adjusted daily bars from Eastmoney's history endpoint.
 */
export class EastmoneyKlineSource implements HistorySource {
  readonly id = "eastmoney-kline";

  constructor(private readonly timeoutMs = 5000) {}

  async fetchDailyBars(
    code: InstrumentCode,
    params: { limit: number; signal?: AbortSignal }
  ): Promise<DailyBar[]> {
    const url =
      `${KLINE_URL}?secid=${toEastmoneySecId(code)}` +
      `&fields1=f1,f2,f3&fields2=f51,f52,f53,f54,f55,f56` +
      `&klt=101&fqt=1&end=20500101&lmt=${params.limit}`;
    const res = await requestProvider(this.id, url, {
      timeoutMs: this.timeoutMs,
      signal: params.signal,
    });
    const json: unknown = await readBody(this.id, () => res.json());
    const parsed = KlineResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw malformed(this.id, parsed.error.issues[0]?.message ?? "schema mismatch");
    }
    if (!parsed.data.data) {
      throw new SourceError(this.id, "PERMANENT", `No history for ${code.symbol}`);
    }
    return parsed.data.data.klines
      .map(parseKlineRow)
      .filter((bar): bar is DailyBar => bar !== undefined)
      .slice(-params.limit);
  }
}
