#!/usr/bin/env node
/* eslint-disable no-console */
// Load envs from .env
// node dist/analysis/scripts/run_analysis.js 600000 STOCK
import "dotenv/config";
import { EastmoneyKlineSource } from "../../market/sources/eastmoney";
import { createQuoteSources } from "../../market/sources/registry";
import { loadAnalysisConfig } from "../config";
import { createAnalysisOrchestrator } from "../application/analyze";
import { ANALYSIS_KINDS, AnalysisKind } from "../domain/types";
import { RISK_PREFERENCE_LABELS } from "../prompts/principles";
import { createAiSdkTransport } from "../infrastructure/ai_sdk_transport";
import { createLlmClient } from "../infrastructure/llm_client";
import { UsageLedger } from "../infrastructure/usage_ledger";

function parseArgs(): { code: string; kind: AnalysisKind; opinion?: string } {
  const code = process.argv[2];
  if (!code) {
    console.error("Usage: run_analysis <code> [MARKET|STOCK] [opinion]");
    process.exit(2);
  }
  const kindArg = (process.argv[3] ?? "STOCK").toUpperCase();
  const kind = ANALYSIS_KINDS.find(k => k === kindArg) ?? "STOCK";
  const opinion = process.argv.slice(4).join(" ").trim();
  return { code, kind, opinion: opinion.length > 0 ? opinion : undefined };
}

async function main() {
  const args = parseArgs();
  const config = loadAnalysisConfig();
  const ledger = new UsageLedger();
  const orchestrator = createAnalysisOrchestrator({
    sources: createQuoteSources(config.sources),
    history: new EastmoneyKlineSource(),
    llm: createLlmClient({ transport: createAiSdkTransport(), usageRecorder: ledger }),
  });

  const run = orchestrator.analyze(args.code, args.kind, config.model, {
    riskPreference: config.riskPreference,
    customPrinciples: config.customPrinciples,
    userOpinion: args.opinion,
    historyDays: config.historyDays,
  });

  for await (const event of run) {
    switch (event.type) {
      case "text-delta":
        process.stdout.write(event.text);
        break;
      case "warning":
        console.error(`\n[warning] ${event.message}`);
        break;
      case "usage":
        console.log(
          `\n\n[usage] model=${run.modelId} prompt=${event.usage.promptTokens} ` +
            `completion=${event.usage.completionTokens} total=${event.usage.totalTokens}`
        );
        break;
      case "error":
        console.error(`\n[error] ${event.error.message}`);
        console.error(JSON.stringify(event.error.toJSON(), null, 2));
        process.exitCode = 1;
        break;
    }
  }

  const stats = ledger.stats();
  console.log(
    `[session] state=${run.state} source=${run.snapshot?.sourceId ?? "-"} ` +
      `risk=${RISK_PREFERENCE_LABELS[config.riskPreference]} ` +
      `requests=${stats.totalRequests} cost≈$${stats.totalCost.toFixed(4)}`
  );
}

main().catch(err => {
  console.error("Unhandled error:", err);
  process.exit(1);
});
