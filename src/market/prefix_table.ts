import { z } from "zod";
import rawTable from "./prefix_table.json";
import { EXCHANGES, MARKETS } from "./types";

/**
 * Code classification table. Ranges are configuration, not logic: callers may
 * load their own table (e.g. after an exchange adds a new board) and pass it
 * to `resolveInstrument`.
 */
export const PrefixTableSchema = z.object({
  indexCodes: z.array(
    z.object({
      code: z.string().regex(/^\d{6}$/),
      exchange: z.enum(EXCHANGES),
      name: z.string().min(1),
    })
  ),
  rules: z.array(
    z.object({
      prefix: z.string().regex(/^\d{1,5}$/),
      market: z.enum(MARKETS),
      exchange: z.enum(EXCHANGES),
      /** Only applies when the user typed the exchange marker (e.g. "SH000300") */
      explicitOnly: z.boolean().default(false),
    })
  ),
  hkDigits: z.number().int().positive().default(5),
});

export type PrefixTable = z.infer<typeof PrefixTableSchema>;
export type PrefixRule = PrefixTable["rules"][number];

export function parsePrefixTable(input: unknown): PrefixTable {
  return PrefixTableSchema.parse(input);
}

export const DEFAULT_PREFIX_TABLE: PrefixTable = parsePrefixTable(rawTable);
