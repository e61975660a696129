import { getLogger } from "../../util/logger";
import { errorMessage } from "../../util/errors";
import { LlmError } from "../domain/errors";
import type {
  LlmChunk,
  ModelConfig,
  PromptContext,
  TokenUsage,
} from "../domain/types";
import { estimatePromptTokens } from "../domain/usage";
import type {
  ChatRequest,
  ChatTransport,
  LlmClient,
  LlmCompletion,
  UsageOutcome,
  UsageRecorder,
} from "./contracts";
import { UsageLedger } from "./usage_ledger";

const PREVIEW_CHARS = 500;

export interface LlmClientDeps {
  transport: ChatTransport;
  usageRecorder?: UsageRecorder;
  now?: () => number;
}

function preview(text: string): string {
  return text.length <= PREVIEW_CHARS ? text : `${text.slice(0, PREVIEW_CHARS)}...`;
}

class StreamingCompletion implements LlmCompletion {
  readonly modelId: string;
  private readonly logger = getLogger("analysis/llm_client");
  private readonly promptEstimate: number;
  private completionTokens = 0;
  private providerUsage: TokenUsage | undefined;
  private output = "";
  private started = false;

  constructor(
    private readonly context: PromptContext,
    private readonly config: ModelConfig,
    private readonly deps: Required<LlmClientDeps>
  ) {
    this.modelId = config.model;
    this.promptEstimate = estimatePromptTokens(context.messages);
  }

  /**
   * Provider totals once the completion marker arrived; before that, the
   * prompt estimate plus one token per delivered delta.
   */
  get usage(): TokenUsage {
    if (this.providerUsage) return { ...this.providerUsage };
    return {
      promptTokens: this.promptEstimate,
      completionTokens: this.completionTokens,
      totalTokens: this.promptEstimate + this.completionTokens,
    };
  }

  [Symbol.asyncIterator](): AsyncIterator<LlmChunk> {
    if (this.started) {
      throw new Error("An LLM completion can only be iterated once");
    }
    this.started = true;
    return this.run();
  }

  private async *run(): AsyncGenerator<LlmChunk> {
    const { transport, now } = this.deps;
    const startedAt = now();
    const controller = new AbortController();
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
        reject(
          new LlmError(
            "TIMEOUT",
            `LLM stream exceeded ${this.config.timeoutMs}ms`
          )
        );
      }, this.config.timeoutMs);
    });

    const request: ChatRequest = {
      model: this.config.model,
      messages: this.context.messages,
      temperature: this.config.temperature,
      maxOutputTokens: this.config.maxOutputTokens,
      apiKey: this.config.apiKey,
      baseURL: this.config.baseURL,
    };
    const iterator = transport
      .stream(request, controller.signal)
      [Symbol.asyncIterator]();

    let outcome: UsageOutcome = "cancelled";
    let failure: LlmError | undefined;
    try {
      for (;;) {
        const step = await Promise.race([iterator.next(), deadline]);
        if (timedOut) throw new Error("deadline passed");
        if (step.done) break;
        const part = step.value;
        if (part.type === "finish") {
          if (part.usage) this.providerUsage = part.usage;
          continue;
        }
        if (part.text.length === 0) continue;
        this.completionTokens += 1;
        this.output += part.text;
        yield { textDelta: part.text, done: false };
      }
      outcome = "success";
      yield { textDelta: "", usage: this.usage, done: true };
    } catch (err) {
      outcome = "error";
      // After a timeout the transport may surface its own abort error instead
      let base: LlmError;
      if (timedOut) {
        base = new LlmError("TIMEOUT", `LLM stream exceeded ${this.config.timeoutMs}ms`);
      } else if (err instanceof LlmError) {
        base = err;
      } else {
        base = new LlmError("PROTOCOL", errorMessage(err), { cause: err });
      }
      failure = base.withUsage(this.usage);
      throw failure;
    } finally {
      clearTimeout(timer);
      if (!controller.signal.aborted) controller.abort();
      if (outcome !== "success") {
        iterator.return?.().catch(err => {
          this.logger.debug({ err }, "transport did not close cleanly");
        });
      }
      this.report(outcome, now() - startedAt, failure);
    }
  }

  private report(
    outcome: UsageOutcome,
    elapsedMs: number,
    failure: LlmError | undefined
  ): void {
    const usage = this.usage;
    this.deps.usageRecorder.record({
      timestamp: new Date(this.deps.now()).toISOString(),
      model: this.modelId,
      usage,
      outcome,
      elapsedMs,
      temperature: this.config.temperature,
      errorKind: failure?.kind,
      errorMessage: failure?.message,
      inputPreview: preview(this.context.user),
      outputPreview: preview(this.output),
    });
    this.logger.debug(
      { model: this.modelId, outcome, elapsedMs, ...usage },
      "llm completion finished"
    );
  }
}

/**
 * Streaming chat completions with token accounting, cooperative cancellation
 * and an overall timeout. Never retries.
 */
export function createLlmClient(deps: LlmClientDeps): LlmClient {
  const resolved: Required<LlmClientDeps> = {
    transport: deps.transport,
    usageRecorder: deps.usageRecorder ?? new UsageLedger(),
    now: deps.now ?? Date.now,
  };
  return {
    complete(context: PromptContext, config: ModelConfig): LlmCompletion {
      return new StreamingCompletion(context, config, resolved);
    },
  };
}
