import {
  AnalysisDependencies,
  createAnalysisOrchestrator,
} from "@src/analysis/application/analyze";
import { LlmError, OrchestrationError } from "@src/analysis/domain/errors";
import type { AnalysisEvent, ModelConfig } from "@src/analysis/domain/types";
import type {
  ChatRequest,
  ChatStreamPart,
  ChatTransport,
} from "@src/analysis/infrastructure/contracts";
import { createLlmClient } from "@src/analysis/infrastructure/llm_client";
import {
  FetchFailureError,
  ResolutionError,
  SourceError,
  SourceErrorKind,
} from "@src/market/errors";
import type { HistorySource, QuoteSource } from "@src/market/sources/contracts";
import { createSnapshot, DailyBar, InstrumentCode } from "@src/market/types";

interface ScriptedTransport extends ChatTransport {
  requests: ChatRequest[];
  signals: AbortSignal[];
}

function scriptedTransport(
  script: () => AsyncGenerator<ChatStreamPart>
): ScriptedTransport {
  const transport: ScriptedTransport = {
    requests: [],
    signals: [],
    async *stream(request, signal) {
      transport.requests.push(request);
      transport.signals.push(signal);
      yield* script();
    },
  };
  return transport;
}

const delta = (text: string): ChatStreamPart => ({ type: "text-delta", text });

async function* threeChunks(): AsyncGenerator<ChatStreamPart> {
  yield delta("Bullish ");
  yield delta("but ");
  yield delta("cautious.");
  yield {
    type: "finish",
    usage: { promptTokens: 10, completionTokens: 20, totalTokens: 30 },
  };
}

function quoteSource(
  outcome: "ok" | SourceErrorKind,
  fetchQuote = jest.fn(async (code: InstrumentCode) => {
    if (outcome !== "ok") {
      throw new SourceError("stub", outcome, `stub ${outcome.toLowerCase()}`);
    }
    return createSnapshot({
      symbol: code.symbol,
      market: code.market,
      price: 10.5,
      changePct: 1.2,
      volume: 1000,
      timestamp: "2024-09-11T07:00:00.000Z",
      sourceId: "stub",
    });
  })
): QuoteSource & { fetchQuote: typeof fetchQuote } {
  return {
    id: "stub",
    priority: 1,
    timeoutMs: 1000,
    markets: ["A_SHARE", "INDEX", "FUND", "HK"],
    fetchQuote,
  };
}

const CONFIG: ModelConfig = { model: "test-model", timeoutMs: 1000 };

function orchestrator(
  transport: ChatTransport,
  overrides: Partial<AnalysisDependencies> = {}
) {
  let counter = 0;
  return createAnalysisOrchestrator({
    sources: [quoteSource("ok")],
    llm: createLlmClient({ transport, usageRecorder: { record: () => undefined } }),
    createRunId: () => `run-${++counter}`,
    ...overrides,
  });
}

async function collect(run: AsyncIterable<AnalysisEvent>): Promise<AnalysisEvent[]> {
  const events: AnalysisEvent[] = [];
  for await (const event of run) events.push(event);
  return events;
}

function lastError(events: AnalysisEvent[]): OrchestrationError {
  const last = events[events.length - 1];
  if (last?.type !== "error") {
    throw new Error(`expected an error event, got ${JSON.stringify(last)}`);
  }
  return last.error;
}

describe("createAnalysisOrchestrator", () => {
  it("streams three text chunks and then the provider's usage", async () => {
    const transport = scriptedTransport(threeChunks);
    const run = orchestrator(transport).analyze("600000", "STOCK", CONFIG);

    const events = await collect(run);

    expect(events).toEqual([
      { type: "text-delta", text: "Bullish " },
      { type: "text-delta", text: "but " },
      { type: "text-delta", text: "cautious." },
      {
        type: "usage",
        usage: { promptTokens: 10, completionTokens: 20, totalTokens: 30 },
      },
    ]);
    expect(run.state).toBe("DONE");
    expect(run.transitions).toEqual([
      "RESOLVING",
      "FETCHING",
      "BUILDING_CONTEXT",
      "STREAMING_LLM",
      "DONE",
    ]);
    expect(run.id).toBe("run-1");
    expect(run.instrument).toEqual({
      raw: "600000",
      market: "A_SHARE",
      symbol: "600000",
      exchange: "SH",
    });
    expect(run.snapshot?.price).toBe(10.5);
    expect(run.attempts.map(a => [a.sourceId, a.outcome])).toEqual([["stub", "success"]]);
    expect(run.usage).toEqual({ promptTokens: 10, completionTokens: 20, totalTokens: 30 });
    expect(run.modelId).toBe("test-model");

    const prompt = transport.requests[0].messages[1].content;
    expect(prompt).toContain("代码：600000");
    expect(prompt).toContain("最新价：10.50 人民币");
    expect(prompt).toContain("涨跌幅：+1.20%");
  });

  it("names well-known indices in the prompt", async () => {
    const transport = scriptedTransport(threeChunks);

    await collect(orchestrator(transport).analyze("000001", "MARKET", CONFIG));

    expect(transport.requests[0].messages[1].content).toContain("名称：上证指数");
  });

  it("stops at RESOLVING for an unrecognized code", async () => {
    const source = quoteSource("ok");
    const transport = scriptedTransport(threeChunks);
    const run = orchestrator(transport, { sources: [source] }).analyze(
      "ABC123",
      "STOCK",
      CONFIG
    );

    const events = await collect(run);

    expect(events).toHaveLength(1);
    const error = lastError(events);
    expect(error.stage).toBe("RESOLVING");
    expect(error.cause).toBeInstanceOf(ResolutionError);
    expect(error.usage).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
    expect(run.state).toBe("ERROR");
    expect(run.transitions).toEqual(["RESOLVING", "ERROR"]);
    expect(source.fetchQuote).not.toHaveBeenCalled();
    expect(transport.requests).toHaveLength(0);
  });

  it("stops at FETCHING with every source failure attached", async () => {
    const transport = scriptedTransport(threeChunks);
    const run = orchestrator(transport, {
      sources: [quoteSource("PERMANENT")],
    }).analyze("600000", "STOCK", CONFIG);

    const events = await collect(run);

    const error = lastError(events);
    expect(error.stage).toBe("FETCHING");
    expect(error.cause).toBeInstanceOf(FetchFailureError);
    if (!(error.cause instanceof FetchFailureError)) return;
    expect(error.cause.classification).toBe("ALL_PERMANENT");
    expect(error.cause.errors).toEqual([
      { sourceId: "stub", kind: "PERMANENT", message: "stub permanent" },
    ]);
    expect(run.transitions).toEqual(["RESOLVING", "FETCHING", "ERROR"]);
    expect(transport.requests).toHaveLength(0);
  });

  it("keeps streamed text and reports partial usage when the LLM fails", async () => {
    const transport = scriptedTransport(async function* () {
      yield delta("Partial");
      throw new LlmError("AUTH", "invalid api key", { status: 401 });
    });
    const run = orchestrator(transport).analyze("600000", "STOCK", CONFIG);

    const events = await collect(run);

    expect(events[0]).toEqual({ type: "text-delta", text: "Partial" });
    const error = lastError(events);
    expect(error.stage).toBe("STREAMING_LLM");
    expect(error.cause).toBeInstanceOf(LlmError);
    expect(error.message).toBe("STREAMING_LLM failed: invalid api key");
    expect(error.usage.completionTokens).toBe(1);
    expect(error.usage.promptTokens).toBeGreaterThan(0);
    expect(run.usage).toEqual(error.usage);
    expect(run.state).toBe("ERROR");
  });

  it("stops at STREAMING_LLM when the model exceeds its deadline", async () => {
    const transport: ChatTransport = {
      async *stream(_request, signal) {
        yield delta("Slow");
        await new Promise<void>(resolve => {
          signal.addEventListener("abort", () => resolve());
        });
      },
    };
    const run = orchestrator(transport).analyze("600000", "STOCK", {
      model: "test-model",
      timeoutMs: 20,
    });

    const events = await collect(run);

    expect(events[0]).toEqual({ type: "text-delta", text: "Slow" });
    const error = lastError(events);
    expect(error.stage).toBe("STREAMING_LLM");
    expect(error.message).toBe("STREAMING_LLM failed: LLM stream exceeded 20ms");
    expect(error.cause).toBeInstanceOf(LlmError);
    if (!(error.cause instanceof LlmError)) return;
    expect(error.cause.kind).toBe("TIMEOUT");
    expect(error.usage.completionTokens).toBe(1);
    expect(error.usage.totalTokens).toBe(error.usage.promptTokens + 1);
    expect(run.state).toBe("ERROR");
  });

  it("cancels the stream when the caller stops iterating", async () => {
    const transport = scriptedTransport(threeChunks);
    const run = orchestrator(transport).analyze("600000", "STOCK", CONFIG);

    for await (const event of run) {
      if (event.type === "text-delta") break;
    }

    expect(run.state).toBe("CANCELLED");
    expect(run.usage.completionTokens).toBe(1);
    expect(run.usage.totalTokens).toBe(run.usage.promptTokens + 1);
    expect(transport.signals[0].aborted).toBe(true);
  });

  it("warns and continues when history is unavailable", async () => {
    const history: HistorySource = {
      id: "history-stub",
      fetchDailyBars: jest.fn(async () => {
        throw new SourceError("history-stub", "TRANSIENT", "kline down");
      }),
    };
    const transport = scriptedTransport(threeChunks);
    const run = orchestrator(transport, { history }).analyze("600000", "STOCK", CONFIG, {
      historyDays: 5,
    });

    const events = await collect(run);

    expect(events[0]).toEqual({
      type: "warning",
      stage: "FETCHING",
      message: "History unavailable: kline down",
    });
    expect(events.filter(e => e.type === "text-delta")).toHaveLength(3);
    expect(run.state).toBe("DONE");
  });

  it("adds history to the prompt when requested", async () => {
    const bars: DailyBar[] = [
      { date: "2024-09-10", open: 10.3, high: 10.45, low: 10.2, close: 10.38, volume: 100000 },
    ];
    const fetchDailyBars = jest.fn(async () => bars);
    const transport = scriptedTransport(threeChunks);

    await collect(
      orchestrator(transport, {
        history: { id: "history-stub", fetchDailyBars },
      }).analyze("600000", "STOCK", CONFIG, { historyDays: 5, userOpinion: "长期持有" })
    );

    expect(fetchDailyBars).toHaveBeenCalledWith(
      expect.objectContaining({ symbol: "600000" }),
      { limit: 5 }
    );
    const prompt = transport.requests[0].messages[1].content;
    expect(prompt).toContain("【近期日线】（共1个交易日，按时间先后排列）");
    expect(prompt).toContain("【用户观点】\n长期持有");
  });

  it("skips history unless the request asks for it", async () => {
    const fetchDailyBars = jest.fn(async () => []);

    await collect(
      orchestrator(scriptedTransport(threeChunks), {
        history: { id: "history-stub", fetchDailyBars },
      }).analyze("600000", "STOCK", CONFIG)
    );

    expect(fetchDailyBars).not.toHaveBeenCalled();
  });

  it("keeps concurrent runs independent", async () => {
    const analyst = orchestrator(scriptedTransport(threeChunks));
    const first = analyst.analyze("600000", "STOCK", CONFIG);
    const second = analyst.analyze("bad", "STOCK", CONFIG);

    await Promise.all([collect(first), collect(second)]);

    expect(first.id).not.toBe(second.id);
    expect(first.state).toBe("DONE");
    expect(second.state).toBe("ERROR");
  });

  it("can only be iterated once", async () => {
    const run = orchestrator(scriptedTransport(threeChunks)).analyze(
      "600000",
      "STOCK",
      CONFIG
    );
    await collect(run);

    expect(() => run[Symbol.asyncIterator]()).toThrow(
      "Analysis run run-1 can only be iterated once"
    );
  });
});
