import { AppError } from "../../util/errors";
import type { FetchFailureError, ResolutionError } from "../../market/errors";
import { EMPTY_USAGE, FailedStage, TokenUsage } from "./types";

export const LLM_ERROR_KINDS = [
  "AUTH",
  "RATE_LIMIT",
  "TIMEOUT",
  "PROTOCOL",
] as const;
export type LlmErrorKind = (typeof LLM_ERROR_KINDS)[number];

/**
 * Failure of a chat completion. AUTH is fatal; RATE_LIMIT and TIMEOUT may be
 * retried by the caller, never automatically. `usage` holds whatever was
 * consumed before the failure.
 */
export class LlmError extends AppError {
  public readonly usage: TokenUsage;
  public readonly status?: number;

  constructor(
    public readonly kind: LlmErrorKind,
    message: string,
    options: { usage?: TokenUsage; cause?: unknown; status?: number } = {}
  ) {
    super(message, `LLM_${kind}`, {
      cause: options.cause,
      context: { kind, status: options.status },
    });
    this.name = "LlmError";
    this.usage = { ...(options.usage ?? EMPTY_USAGE) };
    this.status = options.status;
  }

  withUsage(usage: TokenUsage): LlmError {
    return new LlmError(this.kind, this.message, {
      usage,
      cause: this.cause,
      status: this.status,
    });
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), kind: this.kind, usage: this.usage };
  }
}

export type OrchestrationCause = ResolutionError | FetchFailureError | LlmError;

/**
 * What an analysis run reports when it stops early: the state that failed and
 * the error that stopped it.
 */
export class OrchestrationError extends AppError {
  declare readonly cause: OrchestrationCause;
  public readonly usage: TokenUsage;

  constructor(
    public readonly stage: FailedStage,
    cause: OrchestrationCause,
    usage: TokenUsage = EMPTY_USAGE
  ) {
    super(`${stage} failed: ${cause.message}`, `ANALYSIS_${stage}_FAILED`, {
      cause,
      context: { stage, cause: cause.toJSON() },
    });
    this.name = "OrchestrationError";
    this.usage = { ...usage };
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), stage: this.stage, usage: this.usage };
  }
}
