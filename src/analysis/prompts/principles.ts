import type { RiskPreference } from "../domain/types";

type PresetPreference = Exclude<RiskPreference, "custom">;

const PRINCIPLES: Record<PresetPreference, string> = {
  neutral: [
    "核心原则：",
    "- 实事求是：直接指出标的的长处与短板，不说客套话，不用模棱两可的措辞。",
    "- 正反兼顾：同时评估利好与利空信号，既提示风险也不错过机会。",
    "- 结论清晰：给出明确的操作倾向（买入、持有、观望或回避）并说明依据。",
  ].join("\n"),
  conservative: [
    "核心原则：",
    "- 本金安全第一：宁可错过行情，也要避免本金出现较大回撤。",
    "- 严控风险：对业绩下滑、估值过高、量价背离等负面信号保持警惕，优先建议观望。",
    "- 稳健操作：只有风险收益比明显有利时才建议建仓，且控制仓位。",
  ].join("\n"),
  aggressive: [
    "核心原则：",
    "- 重视成长：优先关注景气上行、资金关注度高、具备催化因素的方向。",
    "- 承担可控风险：在设定止损的前提下敢于布局趋势与热点，追求超额收益。",
    "- 行动果断：出现明确的突破或重大利好时，及时给出买入或加仓建议。",
  ].join("\n"),
};

export const RISK_PREFERENCE_LABELS: Record<RiskPreference, string> = {
  neutral: "中性：客观评估正负信号",
  conservative: "保守：本金安全优先",
  aggressive: "激进：积极把握成长机会",
  custom: "自定义：使用调用方提供的核心原则",
};

/**
 * Core principles for a risk preference. `custom` falls back to the neutral
 * text when no principles were supplied.
 */
export function getCorePrinciples(
  preference: RiskPreference = "neutral",
  customPrinciples = ""
): string {
  if (preference === "custom") {
    const trimmed = customPrinciples.trim();
    return trimmed.length > 0 ? trimmed : PRINCIPLES.neutral;
  }
  return PRINCIPLES[preference];
}
