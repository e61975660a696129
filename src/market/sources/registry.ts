import type { QuoteSource, SourceSettings } from "./contracts";
import { EastmoneyQuoteSource } from "./eastmoney";
import { SinaQuoteSource } from "./sina";
import { TencentQuoteSource } from "./tencent";

export const KNOWN_SOURCE_IDS = ["eastmoney", "tencent", "sina"] as const;
export type KnownSourceId = (typeof KNOWN_SOURCE_IDS)[number];

const FACTORIES: Record<KnownSourceId, (settings: SourceSettings) => QuoteSource> = {
  eastmoney: settings => new EastmoneyQuoteSource(settings),
  tencent: settings => new TencentQuoteSource(settings),
  sina: settings => new SinaQuoteSource(settings),
};

export const DEFAULT_SOURCE_SETTINGS: SourceSettings[] = [
  { id: "eastmoney", priority: 1, timeoutMs: 3000 },
  { id: "tencent", priority: 2, timeoutMs: 3000 },
  { id: "sina", priority: 3, timeoutMs: 3000 },
];

export function isKnownSourceId(id: string): id is KnownSourceId {
  return KNOWN_SOURCE_IDS.some(known => known === id);
}

/**
 * Build the adapter list from the injected priority/timeout table, preserving
 * declaration order (the fetcher's tie-break).
 */
export function createQuoteSources(
  settings: SourceSettings[] = DEFAULT_SOURCE_SETTINGS
): QuoteSource[] {
  return settings.map(entry => {
    if (!isKnownSourceId(entry.id)) {
      throw new Error(
        `Unknown quote source "${entry.id}"; expected one of ${KNOWN_SOURCE_IDS.join(", ")}`
      );
    }
    return FACTORIES[entry.id](entry);
  });
}
