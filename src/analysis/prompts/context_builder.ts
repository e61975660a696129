import type { DailyBar, Market, QuoteSnapshot } from "../../market/types";
import type {
  AnalysisKind,
  ChatMessage,
  PromptContext,
  RiskPreference,
} from "../domain/types";
import { computeIndicators, Indicators, MA_WINDOWS } from "./indicators";
import { getCorePrinciples } from "./principles";

export interface PromptContextOptions {
  riskPreference?: RiskPreference;
  customPrinciples?: string;
  userOpinion?: string;
  /** Recent daily bars, oldest first */
  history?: readonly DailyBar[];
  /** Used when the snapshot carries no name */
  name?: string;
}

const MARKET_LABELS: Record<Market, string> = {
  A_SHARE: "A股",
  HK: "港股",
  INDEX: "指数",
  FUND: "场内基金",
};

const ROLE: Record<AnalysisKind, string> = {
  MARKET: "你是一名资深的市场策略分析师，擅长从指数与整体行情层面判断市场趋势和情绪。",
  STOCK: "你是一名专业的证券分析师，擅长结合技术形态与量价关系研判个股走势。",
};

const INSTRUCTIONS: Record<AnalysisKind, string[]> = {
  MARKET: [
    "请基于以上数据，从市场整体的角度进行分析，内容包括：",
    "1. 当前走势与强弱判断；",
    "2. 成交量能与市场情绪；",
    "3. 关键支撑位与压力位；",
    "4. 短期展望与主要风险。",
  ],
  STOCK: [
    "请基于以上数据，对该标的进行个股分析，内容包括：",
    "1. 价格表现与技术形态；",
    "2. 量价关系与资金动向；",
    "3. 关键支撑位与压力位；",
    "4. 操作建议（买入、持有、观望或回避）、理由与主要风险。",
  ],
};

const GROUNDING =
  "只依据提供的数据进行分析，数据缺失时直接说明，不要编造数字。请使用中文回答。";

function currencyOf(market: Market): string {
  return market === "HK" ? "港币" : "人民币";
}

function priceUnit(market: Market): string {
  return market === "INDEX" ? "点" : currencyOf(market);
}

function priceDigits(market: Market): number {
  return market === "FUND" ? 3 : 2;
}

function signed(value: number, digits: number): string {
  const fixed = value.toFixed(digits);
  return value > 0 ? `+${fixed}` : fixed;
}

/**
 * 12345600 -> "1234.56万", 129876543 -> "1.30亿".
 */
export function formatLargeNumber(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1e8) return `${(value / 1e8).toFixed(2)}亿`;
  if (abs >= 1e4) return `${(value / 1e4).toFixed(2)}万`;
  return String(Math.round(value));
}

/**
 * Render the snapshot's fields as a fixed block of lines. Both analysis kinds
 * embed this block unchanged.
 */
export function renderSnapshot(snapshot: QuoteSnapshot, name?: string): string {
  const digits = priceDigits(snapshot.market);
  const price = (value: number) => value.toFixed(digits);
  const displayName = snapshot.name ?? name;
  const lines = ["【行情快照】", `代码：${snapshot.symbol}`];

  if (displayName) lines.push(`名称：${displayName}`);
  lines.push(`市场：${MARKET_LABELS[snapshot.market]}`);
  lines.push(`最新价：${price(snapshot.price)} ${priceUnit(snapshot.market)}`);
  if (snapshot.change !== undefined) {
    lines.push(`涨跌额：${signed(snapshot.change, digits)}`);
  }
  lines.push(`涨跌幅：${signed(snapshot.changePct, 2)}%`);
  if (snapshot.open !== undefined) lines.push(`今开：${price(snapshot.open)}`);
  if (snapshot.high !== undefined) lines.push(`最高：${price(snapshot.high)}`);
  if (snapshot.low !== undefined) lines.push(`最低：${price(snapshot.low)}`);
  if (snapshot.prevClose !== undefined) {
    lines.push(`昨收：${price(snapshot.prevClose)}`);
  }
  lines.push(`成交量：${formatLargeNumber(snapshot.volume)}股`);
  if (snapshot.amount !== undefined) {
    lines.push(
      `成交额：${formatLargeNumber(snapshot.amount)}${currencyOf(snapshot.market)}`
    );
  }
  lines.push(`数据时间：${snapshot.timestamp}`);
  lines.push(`数据来源：${snapshot.sourceId}`);
  return lines.join("\n");
}

export function renderHistory(bars: readonly DailyBar[], market: Market): string {
  const digits = priceDigits(market);
  const lines = [
    `【近期日线】（共${bars.length}个交易日，按时间先后排列）`,
    "日期 开盘 最高 最低 收盘 成交量",
    ...bars.map(bar =>
      [
        bar.date,
        bar.open.toFixed(digits),
        bar.high.toFixed(digits),
        bar.low.toFixed(digits),
        bar.close.toFixed(digits),
        formatLargeNumber(bar.volume),
      ].join(" ")
    ),
  ];
  const first = bars[0];
  const last = bars[bars.length - 1];
  if (bars.length >= 2 && first.close !== 0) {
    const pct = ((last.close - first.close) / first.close) * 100;
    lines.push(`区间涨跌幅：${signed(pct, 2)}%`);
  }
  lines.push(...renderIndicators(computeIndicators(bars), market));
  return lines.join("\n");
}

export function renderIndicators(indicators: Indicators, market: Market): string[] {
  const digits = priceDigits(market);
  const lines: string[] = [];
  const averages = MA_WINDOWS.flatMap(window => {
    const value = indicators.movingAverages[window];
    return value === undefined ? [] : [`MA${window} ${value.toFixed(digits)}`];
  });
  if (averages.length > 0) lines.push(`均线：${averages.join(" / ")}`);
  if (indicators.annualVolatility !== undefined) {
    lines.push(`年化波动率：${(indicators.annualVolatility * 100).toFixed(2)}%`);
  }
  if (indicators.maxDrawdown !== undefined) {
    lines.push(`最大回撤：${(indicators.maxDrawdown * 100).toFixed(2)}%`);
  }
  return lines;
}

/**
 * Assemble the system and user messages for one analysis. Deterministic: the
 * same snapshot, kind and options always give the same context.
 */
export function buildPromptContext(
  snapshot: QuoteSnapshot,
  kind: AnalysisKind,
  options: PromptContextOptions = {}
): PromptContext {
  const snapshotBlock = renderSnapshot(snapshot, options.name);
  const opinion = options.userOpinion?.trim();

  const instructionLines = [...INSTRUCTIONS[kind]];
  if (opinion) instructionLines.push("请结合【用户观点】给出你的评价。");
  const instruction = instructionLines.join("\n");

  const system = [
    ROLE[kind],
    getCorePrinciples(options.riskPreference, options.customPrinciples),
    GROUNDING,
  ].join("\n\n");

  const sections = [snapshotBlock];
  if (options.history && options.history.length > 0) {
    sections.push(renderHistory(options.history, snapshot.market));
  }
  if (opinion) sections.push(`【用户观点】\n${opinion}`);
  sections.push(instruction);
  const user = sections.join("\n\n");

  const messages: ChatMessage[] = [
    { role: "system", content: system },
    { role: "user", content: user },
  ];
  return { system, user, snapshotBlock, instruction, messages };
}
