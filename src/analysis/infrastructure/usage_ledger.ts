import type { Logger } from "pino";
import { getLogger } from "../../util/logger";
import type { TokenUsage } from "../domain/types";
import type { UsageRecord, UsageRecorder } from "./contracts";

/** USD per token, reference list prices */
export interface ModelPrice {
  input: number;
  output: number;
}

export const DEFAULT_PRICING: Record<string, ModelPrice> = {
  "gpt-4o": { input: 0.005 / 1000, output: 0.015 / 1000 },
  "gpt-4o-mini": { input: 0.00015 / 1000, output: 0.0006 / 1000 },
  "gpt-4": { input: 0.03 / 1000, output: 0.06 / 1000 },
  "gpt-3.5-turbo": { input: 0.0015 / 1000, output: 0.002 / 1000 },
};

export interface UsageStats {
  totalRequests: number;
  totalTokens: number;
  totalCost: number;
  avgElapsedMs: number;
  successRate: number;
  modelDistribution: Record<string, number>;
  /** Tokens per UTC day, keyed YYYY-MM-DD */
  dailyUsage: Record<string, number>;
}

export interface UsageLedgerOptions {
  pricing?: Record<string, ModelPrice>;
  /** Oldest entries are dropped beyond this */
  maxEntries?: number;
  logger?: Logger;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * In-memory record of LLM calls: logs each one and answers usage statistics
 * for a trailing window.
 */
export class UsageLedger implements UsageRecorder {
  private readonly entries: (UsageRecord & { costEstimate: number })[] = [];
  private readonly pricing: Record<string, ModelPrice>;
  private readonly maxEntries: number;
  private readonly logger: Logger;

  constructor(options: UsageLedgerOptions = {}) {
    this.pricing = options.pricing ?? DEFAULT_PRICING;
    this.maxEntries = options.maxEntries ?? 1000;
    this.logger = options.logger ?? getLogger("analysis/usage_ledger");
  }

  estimateCost(model: string, usage: TokenUsage): number {
    const price = this.pricing[model];
    if (!price) return 0;
    return usage.promptTokens * price.input + usage.completionTokens * price.output;
  }

  record(entry: UsageRecord): void {
    const costEstimate = this.estimateCost(entry.model, entry.usage);
    this.entries.push({ ...entry, costEstimate });
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
    this.logger.info(
      {
        model: entry.model,
        outcome: entry.outcome,
        elapsedMs: entry.elapsedMs,
        promptTokens: entry.usage.promptTokens,
        completionTokens: entry.usage.completionTokens,
        totalTokens: entry.usage.totalTokens,
        costEstimate,
        errorKind: entry.errorKind,
      },
      "llm usage recorded"
    );
  }

  get size(): number {
    return this.entries.length;
  }

  stats(days = 30, now: number = Date.now()): UsageStats {
    const cutoff = now - days * DAY_MS;
    const recent = this.entries.filter(
      entry => Date.parse(entry.timestamp) >= cutoff
    );

    const modelDistribution: Record<string, number> = {};
    const dailyUsage: Record<string, number> = {};
    let totalTokens = 0;
    let totalCost = 0;
    let totalElapsed = 0;
    let successes = 0;

    for (const entry of recent) {
      totalTokens += entry.usage.totalTokens;
      totalCost += entry.costEstimate;
      totalElapsed += entry.elapsedMs;
      if (entry.outcome === "success") successes += 1;
      modelDistribution[entry.model] = (modelDistribution[entry.model] ?? 0) + 1;
      const day = entry.timestamp.slice(0, 10);
      dailyUsage[day] = (dailyUsage[day] ?? 0) + entry.usage.totalTokens;
    }

    const count = recent.length;
    return {
      totalRequests: count,
      totalTokens,
      totalCost,
      avgElapsedMs: count > 0 ? totalElapsed / count : 0,
      successRate: count > 0 ? successes / count : 0,
      modelDistribution,
      dailyUsage,
    };
  }
}
