import Decimal from "decimal.js";
import { z } from "zod";
import type { LotSnapshot } from "@/engine/types";
import type { HoldingsTotals } from "@/engine/tax-calculator";
import { parseUtcDate } from "@/engine/csv-parser";

export class SeedImportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SeedImportError";
  }
}

const NUMERIC = /^-?\d+(\.\d+)?(e[+-]?\d+)?$/i;

const DecimalString = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    const text = String(value).trim();
    if (!NUMERIC.test(text)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a number: ${text}` });
      return z.NEVER;
    }
    return new Decimal(text);
  });

const DateString = z.string().transform((value, ctx) => {
  const parsed = parseUtcDate(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
    return z.NEVER;
  }
  return parsed.date;
});

const SeedLotSchema = z.object({
  acquisitionDate: DateString,
  quantity: DecimalString,
  unitCostBasisUsd: DecimalString,
});

const SeedFileSchema = z.object({
  lots: z.record(z.string().min(1), z.array(SeedLotSchema)),
  holdings: z.record(z.string().min(1), DecimalString).optional(),
});

export interface SeedFile {
  lots: LotSnapshot;
  holdings?: HoldingsTotals;
}

/**
 * Validates a prior-year rollover document:
 * `{ lots: { BTC: [{ acquisitionDate, quantity, unitCostBasisUsd }] }, holdings?: { BTC: "1.5" } }`.
 * Value checks (negative quantities and the like) are left to seeding, which
 * reports them per asset; a malformed document is rejected outright.
 */
export function parseSeedFile(input: unknown): SeedFile {
  const parsed = SeedFileSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SeedImportError(`Invalid seed file: ${detail}`);
  }
  return parsed.data;
}

/**
 * Inverse of parseSeedFile for a run's closing snapshot, so next period can
 * load it back.
 */
export function serializeSnapshot(
  snapshot: LotSnapshot,
  holdings?: HoldingsTotals,
): Record<string, unknown> {
  const lots: Record<string, unknown[]> = {};
  for (const [asset, assetLots] of Object.entries(snapshot)) {
    lots[asset] = assetLots.map((lot) => ({
      acquisitionDate: lot.acquisitionDate.toISOString(),
      quantity: lot.quantity.toString(),
      unitCostBasisUsd: lot.unitCostBasisUsd.toString(),
    }));
  }

  if (!holdings) return { lots };

  const totals: Record<string, string> = {};
  for (const [asset, quantity] of Object.entries(holdings)) {
    totals[asset] = quantity.toString();
  }
  return { lots, holdings: totals };
}
