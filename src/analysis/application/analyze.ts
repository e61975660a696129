import crypto from "crypto";
import type { Logger } from "pino";
import { withRunContext } from "../../util/logger";
import { errorMessage } from "../../util/errors";
import { FetchFailureError } from "../../market/errors";
import {
  SourceAttempt,
  classifyFetchFailure,
  fetchWithFallback,
} from "../../market/fetch_with_fallback";
import type { PrefixTable } from "../../market/prefix_table";
import { lookupInstrumentName, resolveInstrument } from "../../market/resolve_instrument";
import type { HistorySource, QuoteSource } from "../../market/sources/contracts";
import type { DailyBar, InstrumentCode, QuoteSnapshot } from "../../market/types";
import { formatInstrument } from "../../market/types";
import {
  LlmError,
  OrchestrationCause,
  OrchestrationError,
} from "../domain/errors";
import {
  AnalysisEvent,
  AnalysisKind,
  AnalysisRequest,
  AnalysisState,
  EMPTY_USAGE,
  FailedStage,
  ModelConfig,
  RiskPreference,
  TokenUsage,
  isTerminalState,
} from "../domain/types";
import type { LlmClient, LlmCompletion } from "../infrastructure/contracts";
import { buildPromptContext } from "../prompts/context_builder";

export interface AnalysisDependencies {
  sources: readonly QuoteSource[];
  llm: LlmClient;
  /** Enables the daily-bar block when a request asks for history */
  history?: HistorySource;
  prefixTable?: PrefixTable;
  createRunId?: () => string;
}

export interface AnalyzeOptions {
  riskPreference?: RiskPreference;
  customPrinciples?: string;
  userOpinion?: string;
  /** Number of daily bars to include; 0 or absent skips the history fetch */
  historyDays?: number;
}

/**
 * One analysis request. Iterate it once to drive the pipeline; stopping the
 * iteration early cancels the run.
 */
export interface AnalysisRun extends AsyncIterable<AnalysisEvent> {
  readonly id: string;
  readonly state: AnalysisState;
  readonly transitions: readonly AnalysisState[];
  readonly instrument: InstrumentCode | undefined;
  readonly snapshot: QuoteSnapshot | undefined;
  readonly attempts: readonly SourceAttempt[];
  readonly usage: TokenUsage;
  readonly modelId: string;
}

export interface AnalysisOrchestrator {
  analyze(
    rawCode: string,
    kind: AnalysisKind,
    config: ModelConfig,
    options?: AnalyzeOptions
  ): AnalysisRun;
}

class PipelineRun implements AnalysisRun {
  readonly transitions: AnalysisState[] = [];
  instrument: InstrumentCode | undefined;
  snapshot: QuoteSnapshot | undefined;
  attempts: SourceAttempt[] = [];
  private completion: LlmCompletion | undefined;
  private finalUsage: TokenUsage | undefined;
  private started = false;
  private logger: Logger;

  constructor(
    readonly id: string,
    private readonly rawCode: string,
    private readonly kind: AnalysisKind,
    private readonly config: ModelConfig,
    private readonly options: AnalyzeOptions,
    private readonly deps: AnalysisDependencies
  ) {
    this.logger = withRunContext("analysis/analyze", { runId: id, kind });
  }

  get state(): AnalysisState {
    return this.transitions[this.transitions.length - 1] ?? "RESOLVING";
  }

  get usage(): TokenUsage {
    if (this.finalUsage) return { ...this.finalUsage };
    return this.completion ? this.completion.usage : { ...EMPTY_USAGE };
  }

  get modelId(): string {
    return this.completion?.modelId ?? this.config.model;
  }

  [Symbol.asyncIterator](): AsyncIterator<AnalysisEvent> {
    if (this.started) {
      throw new Error(`Analysis run ${this.id} can only be iterated once`);
    }
    this.started = true;
    return this.events();
  }

  private async *events(): AsyncGenerator<AnalysisEvent> {
    try {
      yield* this.pipeline();
    } finally {
      if (!isTerminalState(this.state)) {
        this.transition("CANCELLED");
        this.logger.info({ usage: this.usage }, "analysis cancelled");
      }
    }
  }

  private async *pipeline(): AsyncGenerator<AnalysisEvent> {
    this.transition("RESOLVING");
    const resolved = resolveInstrument(this.rawCode, this.deps.prefixTable);
    if (!resolved.ok) {
      yield this.fail("RESOLVING", resolved.error);
      return;
    }
    const instrument = resolved.data;
    this.instrument = instrument;
    this.logger = this.logger.child({ instrument: formatInstrument(instrument) });

    this.transition("FETCHING");
    const fetched = await fetchWithFallback(instrument, this.deps.sources);
    this.attempts = fetched.attempts;
    if (!fetched.ok) {
      yield this.fail(
        "FETCHING",
        new FetchFailureError(
          instrument.symbol,
          instrument.market,
          fetched.errors,
          classifyFetchFailure(fetched.errors)
        )
      );
      return;
    }
    const request: AnalysisRequest = {
      instrument,
      snapshot: fetched.snapshot,
      kind: this.kind,
      modelConfig: this.config,
    };
    this.snapshot = request.snapshot;

    let history: DailyBar[] | undefined;
    const historyDays = this.options.historyDays ?? 0;
    if (this.deps.history && historyDays > 0) {
      try {
        history = await this.deps.history.fetchDailyBars(instrument, {
          limit: historyDays,
        });
      } catch (err) {
        this.logger.warn({ err }, "history unavailable, continuing without it");
        yield {
          type: "warning",
          stage: "FETCHING",
          message: `History unavailable: ${errorMessage(err)}`,
        };
      }
    }

    this.transition("BUILDING_CONTEXT");
    const context = buildPromptContext(request.snapshot, request.kind, {
      riskPreference: this.options.riskPreference,
      customPrinciples: this.options.customPrinciples,
      userOpinion: this.options.userOpinion,
      history,
      name: lookupInstrumentName(instrument, this.deps.prefixTable),
    });

    this.transition("STREAMING_LLM");
    const completion = this.deps.llm.complete(context, request.modelConfig);
    this.completion = completion;
    try {
      for await (const chunk of completion) {
        if (chunk.textDelta.length > 0) {
          yield { type: "text-delta", text: chunk.textDelta };
        }
        if (chunk.done && chunk.usage) this.finalUsage = chunk.usage;
      }
    } catch (err) {
      const cause =
        err instanceof LlmError
          ? err
          : new LlmError("PROTOCOL", errorMessage(err), {
              cause: err,
              usage: completion.usage,
            });
      yield this.fail("STREAMING_LLM", cause);
      return;
    }

    const usage = this.usage;
    this.transition("DONE");
    this.logger.info(
      { source: request.snapshot.sourceId, model: this.modelId, usage },
      "analysis completed"
    );
    yield { type: "usage", usage };
  }

  private transition(next: AnalysisState): void {
    this.transitions.push(next);
    this.logger.debug({ state: next }, "analysis state");
  }

  private fail(stage: FailedStage, cause: OrchestrationCause): AnalysisEvent {
    const usage = cause instanceof LlmError ? cause.usage : this.usage;
    this.finalUsage = usage;
    const error = new OrchestrationError(stage, cause, usage);
    this.transition("ERROR");
    this.logger.error({ err: error.toJSON() }, "analysis failed");
    return { type: "error", error, usage };
  }
}

/**
 * Wire the resolver, fallback fetcher, context builder and LLM client into a
 * single streaming entry point. Runs share nothing but the injected
 * dependencies.
 */
export function createAnalysisOrchestrator(
  deps: AnalysisDependencies
): AnalysisOrchestrator {
  const createRunId = deps.createRunId ?? (() => crypto.randomUUID());
  return {
    analyze(rawCode, kind, config, options = {}) {
      return new PipelineRun(createRunId(), rawCode, kind, config, options, deps);
    },
  };
}
