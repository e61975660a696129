import { SourceError } from "@src/market/errors";
import {
  EastmoneyKlineSource,
  EastmoneyQuoteSource,
  parseKlineRow,
  toEastmoneySecId,
} from "@src/market/sources/eastmoney";
import { createQuoteSources } from "@src/market/sources/registry";
import { SinaQuoteSource } from "@src/market/sources/sina";
import { TencentQuoteSource } from "@src/market/sources/tencent";
import type { InstrumentCode } from "@src/market/types";

const PUFA: InstrumentCode = {
  raw: "600000",
  market: "A_SHARE",
  symbol: "600000",
  exchange: "SH",
};

const TENCENT_HK: InstrumentCode = {
  raw: "00700",
  market: "HK",
  symbol: "00700",
  exchange: "HK",
};

const settings = (id: string) => ({ id, priority: 1, timeoutMs: 1000 });
const signal = () => new AbortController().signal;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

async function captureError(promise: Promise<unknown>): Promise<SourceError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof SourceError) return err;
    throw err;
  }
  throw new Error("expected the promise to reject");
}

describe("quote sources", () => {
  let fetchSpy: jest.SpyInstance<
    ReturnType<typeof fetch>,
    Parameters<typeof fetch>
  >;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, "fetch");
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  describe("EastmoneyQuoteSource", () => {
    const source = new EastmoneyQuoteSource(settings("eastmoney"));

    it("maps push2 fields into a snapshot", async () => {
      fetchSpy.mockResolvedValueOnce(
        jsonResponse({
          rc: 0,
          data: {
            f43: 10.5,
            f44: 10.6,
            f45: 10.3,
            f46: 10.4,
            f47: 123456,
            f48: 129876543,
            f57: "600000",
            f58: "浦发银行",
            f60: 10.38,
            f86: 1726038003,
            f169: 0.12,
            f170: 1.16,
          },
        })
      );

      const snap = await source.fetchQuote(PUFA, { signal: signal() });

      expect(String(fetchSpy.mock.calls[0][0])).toContain("secid=1.600000");
      expect(snap).toEqual({
        symbol: "600000",
        market: "A_SHARE",
        name: "浦发银行",
        price: 10.5,
        changePct: 1.16,
        change: 0.12,
        volume: 12345600,
        amount: 129876543,
        open: 10.4,
        high: 10.6,
        low: 10.3,
        prevClose: 10.38,
        timestamp: new Date(1726038003 * 1000).toISOString(),
        sourceId: "eastmoney",
      });
      expect(Object.isFrozen(snap)).toBe(true);
    });

    it("builds HK secids", () => {
      expect(toEastmoneySecId(TENCENT_HK)).toBe("116.00700");
      expect(toEastmoneySecId({ ...PUFA, symbol: "399001", exchange: "SZ" })).toBe(
        "0.399001"
      );
    });

    it("reports unknown symbols as permanent", async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ rc: 0, data: null }));

      const err = await captureError(source.fetchQuote(PUFA, { signal: signal() }));

      expect(err.kind).toBe("PERMANENT");
      expect(err.sourceId).toBe("eastmoney");
    });

    it("reports a suspended stock without price as permanent", async () => {
      fetchSpy.mockResolvedValueOnce(
        jsonResponse({ rc: 0, data: { f43: "-", f60: 10.38 } })
      );

      const err = await captureError(source.fetchQuote(PUFA, { signal: signal() }));

      expect(err.kind).toBe("PERMANENT");
      expect(err.message).toBe(
        "No last price for 600000 (suspended or not trading)"
      );
    });

    it.each([
      [429, "RATE_LIMITED"],
      [503, "TRANSIENT"],
      [404, "PERMANENT"],
    ])("maps HTTP %i to %s", async (status, kind) => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({}, status));

      const err = await captureError(source.fetchQuote(PUFA, { signal: signal() }));

      expect(err.kind).toBe(kind);
      expect(err.message).toBe(`HTTP ${status} from eastmoney`);
    });

    it("maps network failures to transient", async () => {
      fetchSpy.mockRejectedValueOnce(new TypeError("fetch failed"));

      const err = await captureError(source.fetchQuote(PUFA, { signal: signal() }));

      expect(err.kind).toBe("TRANSIENT");
      expect(err.message).toBe("Request failed: fetch failed");
    });

    it("maps unexpected JSON shapes to permanent", async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ rc: 0, data: "oops" }));

      const err = await captureError(source.fetchQuote(PUFA, { signal: signal() }));

      expect(err.kind).toBe("PERMANENT");
      expect(err.message).toMatch(/^Malformed payload: /);
    });
  });

  describe("TencentQuoteSource", () => {
    const source = new TencentQuoteSource(settings("tencent"));

    function tencentBody(symbol: string, overrides: Record<number, string>): string {
      const fields = Array.from({ length: 50 }, () => "");
      for (const [index, value] of Object.entries(overrides)) {
        fields[Number(index)] = value;
      }
      return `v_${symbol}="${fields.join("~")}";\n`;
    }

    it("parses the tilde separated payload", async () => {
      fetchSpy.mockResolvedValueOnce(
        textResponse(
          tencentBody("sh600000", {
            1: "PF Bank",
            2: "600000",
            3: "10.50",
            4: "10.38",
            5: "10.40",
            6: "123456",
            30: "20240911150003",
            31: "0.12",
            32: "1.16",
            33: "10.60",
            34: "10.30",
            37: "12987",
          })
        )
      );

      const snap = await source.fetchQuote(PUFA, { signal: signal() });

      expect(String(fetchSpy.mock.calls[0][0])).toBe("https://qt.gtimg.cn/q=sh600000");
      expect(snap).toMatchObject({
        name: "PF Bank",
        price: 10.5,
        changePct: 1.16,
        change: 0.12,
        volume: 12345600,
        amount: 129870000,
        prevClose: 10.38,
        timestamp: "2024-09-11T07:00:03.000Z",
        sourceId: "tencent",
      });
    });

    it("keeps HK volume in shares and omits turnover", async () => {
      fetchSpy.mockResolvedValueOnce(
        textResponse(
          tencentBody("hk00700", {
            1: "TENCENT",
            3: "380.000",
            4: "375.000",
            6: "15000000",
            30: "2024/09/11 16:08:03",
            32: "1.33",
            34: "372.0",
          })
        )
      );

      const snap = await source.fetchQuote(TENCENT_HK, { signal: signal() });

      expect(snap.volume).toBe(15000000);
      expect(snap.amount).toBeUndefined();
      expect(snap.timestamp).toBe("2024-09-11T08:08:03.000Z");
    });

    it("reports the no-match marker as permanent", async () => {
      fetchSpy.mockResolvedValueOnce(textResponse('v_pv_none_match="1";\n'));

      const err = await captureError(source.fetchQuote(PUFA, { signal: signal() }));

      expect(err.kind).toBe("PERMANENT");
      expect(err.message).toBe("No quote for sh600000");
    });
  });

  describe("SinaQuoteSource", () => {
    const source = new SinaQuoteSource(settings("sina"));

    function sinaBody(symbol: string, overrides: Record<number, string>): string {
      const fields = Array.from({ length: 33 }, () => "0");
      for (const [index, value] of Object.entries(overrides)) {
        fields[Number(index)] = value;
      }
      return `var hq_str_${symbol}="${fields.join(",")}";\n`;
    }

    it("parses the comma separated payload and sends a referer", async () => {
      fetchSpy.mockResolvedValueOnce(
        textResponse(
          sinaBody("sh600000", {
            0: "PF Bank",
            1: "10.40",
            2: "10.38",
            3: "10.50",
            4: "10.60",
            5: "10.30",
            8: "12345600",
            9: "129876543.000",
            30: "2024-09-11",
            31: "15:00:03",
          })
        )
      );

      const snap = await source.fetchQuote(PUFA, { signal: signal() });

      expect(fetchSpy.mock.calls[0][1]?.headers).toMatchObject({
        Referer: "https://finance.sina.com.cn/",
      });
      expect(snap).toMatchObject({
        name: "PF Bank",
        price: 10.5,
        change: 0.12,
        changePct: 1.1561,
        volume: 12345600,
        amount: 129876543,
        timestamp: "2024-09-11T07:00:03.000Z",
        sourceId: "sina",
      });
    });

    it("does not claim HK support", () => {
      expect(source.markets).not.toContain("HK");
    });

    it("reports an empty quote as permanent", async () => {
      fetchSpy.mockResolvedValueOnce(textResponse('var hq_str_sh600000="";\n'));

      const err = await captureError(source.fetchQuote(PUFA, { signal: signal() }));

      expect(err.kind).toBe("PERMANENT");
    });

    it("reports a zero pre-open price as transient", async () => {
      fetchSpy.mockResolvedValueOnce(
        textResponse(sinaBody("sh600000", { 2: "10.38", 3: "0.00" }))
      );

      const err = await captureError(source.fetchQuote(PUFA, { signal: signal() }));

      expect(err.kind).toBe("TRANSIENT");
    });
  });

  describe("EastmoneyKlineSource", () => {
    it("returns parsed daily bars, oldest first", async () => {
      fetchSpy.mockResolvedValueOnce(
        jsonResponse({
          data: {
            klines: [
              "2024-09-10,10.30,10.38,10.45,10.20,100000",
              "2024-09-11,10.40,10.50,10.60,10.30,123456",
            ],
          },
        })
      );

      const bars = await new EastmoneyKlineSource().fetchDailyBars(PUFA, { limit: 2 });

      expect(String(fetchSpy.mock.calls[0][0])).toContain("lmt=2");
      expect(bars).toEqual([
        { date: "2024-09-10", open: 10.3, close: 10.38, high: 10.45, low: 10.2, volume: 100000 },
        { date: "2024-09-11", open: 10.4, close: 10.5, high: 10.6, low: 10.3, volume: 123456 },
      ]);
    });

    it("drops rows with missing numbers", () => {
      expect(parseKlineRow("2024-09-10,10.30,,10.45,10.20,100000")).toBeUndefined();
    });
  });
});

describe("createQuoteSources", () => {
  it("builds adapters in declaration order with the injected settings", () => {
    const sources = createQuoteSources([
      { id: "sina", priority: 1, timeoutMs: 500 },
      { id: "eastmoney", priority: 1, timeoutMs: 800 },
    ]);

    expect(sources.map(s => [s.id, s.priority, s.timeoutMs])).toEqual([
      ["sina", 1, 500],
      ["eastmoney", 1, 800],
    ]);
  });

  it("rejects unknown providers", () => {
    expect(() => createQuoteSources([{ id: "bloomberg", priority: 1, timeoutMs: 1 }])).toThrow(
      'Unknown quote source "bloomberg"; expected one of eastmoney, tencent, sina'
    );
  });
});
