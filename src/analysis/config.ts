import { z } from "zod";
import {
  getEnvVar,
  getNumber,
  getStage,
  getString,
  isProduction,
} from "../util/env";
import type { SourceSettings } from "../market/sources/contracts";
import {
  DEFAULT_SOURCE_SETTINGS,
  KNOWN_SOURCE_IDS,
  isKnownSourceId,
} from "../market/sources/registry";
import { ModelConfig, RISK_PREFERENCES, RiskPreference } from "./domain/types";

export const ModelConfigSchema = z.object({
  model: z.string().min(1),
  apiKey: z.string().min(1).optional(),
  baseURL: z.string().url().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive(),
});

const SourceSettingsSchema = z.object({
  id: z.string().refine(isKnownSourceId, id => ({
    message: `Unknown quote source "${id}"; expected one of ${KNOWN_SOURCE_IDS.join(", ")}`,
  })),
  priority: z.number().int(),
  timeoutMs: z.number().int().positive(),
});

export interface AnalysisConfig {
  model: ModelConfig;
  sources: SourceSettings[];
  /** Daily bars added to the prompt; 0 turns history off */
  historyDays: number;
  riskPreference: RiskPreference;
  /** Principle text used when `riskPreference` is custom */
  customPrinciples?: string;
  stage: string;
  production: boolean;
}

/**
 * Parse "eastmoney:1:3000,tencent:2:2500" into source settings. Priority and
 * timeout may be omitted and then default to list position and 3000ms.
 */
export function parseSourceTable(raw: string): SourceSettings[] {
  const entries = raw
    .split(",")
    .map(part => part.trim())
    .filter(part => part.length > 0);
  if (entries.length === 0) {
    throw new Error("QUOTE_SOURCES must name at least one source");
  }
  return entries.map((entry, index) => {
    const [id, priority, timeoutMs] = entry.split(":");
    const parsed = SourceSettingsSchema.safeParse({
      id,
      priority: priority ? Number(priority) : index + 1,
      timeoutMs: timeoutMs ? Number(timeoutMs) : 3000,
    });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(
        `Invalid QUOTE_SOURCES entry "${entry}": ${issue?.path.join(".") || "entry"} ${issue?.message ?? ""}`.trim()
      );
    }
    return parsed.data;
  });
}

function parseRiskPreference(raw: string): RiskPreference {
  const value = raw.toLowerCase();
  const match = RISK_PREFERENCES.find(pref => pref === value);
  if (!match) {
    throw new Error(
      `Env var RISK_PREFERENCE must be one of ${RISK_PREFERENCES.join(", ")}: ${raw}`
    );
  }
  return match;
}

/**
 * Read the analysis settings from the environment. The result is injected
 * into the orchestrator; nothing below this layer touches process.env.
 */
export function loadAnalysisConfig(): AnalysisConfig {
  const model = ModelConfigSchema.parse({
    model: getString("MODEL_NAME", "gpt-4o-mini"),
    apiKey: getString("OPENAI_API_KEY"),
    baseURL: getString("OPENAI_BASE_URL"),
    temperature: getNumber("LLM_TEMPERATURE", 0.7),
    maxOutputTokens: getNumber("LLM_MAX_OUTPUT_TOKENS"),
    timeoutMs: getNumber("LLM_TIMEOUT_MS", 60_000),
  });
  const sources =
    getEnvVar<SourceSettings[]>("QUOTE_SOURCES", { parse: parseSourceTable }) ??
    DEFAULT_SOURCE_SETTINGS;
  const historyDays = z
    .number()
    .int()
    .min(0)
    .max(250)
    .parse(getNumber("HISTORY_DAYS", 30));
  const riskPreference =
    getEnvVar<RiskPreference>("RISK_PREFERENCE", { parse: parseRiskPreference }) ??
    "neutral";
  const customPrinciples = getString("CUSTOM_PRINCIPLES")?.trim() || undefined;
  if (riskPreference === "custom" && !customPrinciples) {
    throw new Error("RISK_PREFERENCE=custom requires CUSTOM_PRINCIPLES");
  }

  return {
    model,
    sources,
    historyDays,
    riskPreference,
    customPrinciples,
    stage: getStage(),
    production: isProduction(),
  };
}
