import type { DailyBar } from "../../market/types";

export const TRADING_DAYS_PER_YEAR = 252;
export const MA_WINDOWS = [5, 10, 20] as const;

export type MovingAverageWindow = (typeof MA_WINDOWS)[number];

export interface Indicators {
  /** Simple moving averages of close, present once enough bars exist */
  movingAverages: Partial<Record<MovingAverageWindow, number>>;
  /** Sample std of daily returns scaled to a year, as a fraction */
  annualVolatility?: number;
  /** Worst peak-to-trough decline of close, as a fraction (<= 0) */
  maxDrawdown?: number;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function dailyReturns(closes: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1];
    if (prev > 0) returns.push(closes[i] / prev - 1);
  }
  return returns;
}

function annualVolatility(returns: readonly number[]): number | undefined {
  if (returns.length < 2) return undefined;
  const avg = mean(returns);
  const variance =
    returns.reduce((sum, r) => sum + (r - avg) ** 2, 0) / (returns.length - 1);
  return Math.sqrt(variance) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

function maxDrawdown(closes: readonly number[]): number | undefined {
  let peak = 0;
  let worst: number | undefined;
  for (const close of closes) {
    if (close <= 0) continue;
    peak = Math.max(peak, close);
    const drawdown = (close - peak) / peak;
    worst = worst === undefined ? drawdown : Math.min(worst, drawdown);
  }
  return worst;
}

/**
 * Moving averages and risk figures over daily bars ordered oldest first.
 * Non-positive closes are left out of returns and drawdown.
 */
export function computeIndicators(bars: readonly DailyBar[]): Indicators {
  const closes = bars.map(bar => bar.close);
  const movingAverages: Indicators["movingAverages"] = {};
  for (const window of MA_WINDOWS) {
    if (closes.length >= window) {
      movingAverages[window] = mean(closes.slice(-window));
    }
  }
  if (closes.length < 2) return { movingAverages };

  return {
    movingAverages,
    annualVolatility: annualVolatility(dailyReturns(closes)),
    maxDrawdown: maxDrawdown(closes),
  };
}
