// ─── FMV Coverage ─────────────────────────────────────────────────────────────
// How much of an export arrives without a USD value, where those rows come
// from, and how many of them the price table can still value.

import type { FmvLookup, Transaction } from "@/engine/types";
import { unitPriceUsd } from "@/engine/valuation";
import { toDateKey } from "@/lib/format";
import { getLogger } from "@/lib/logger";

const logger = getLogger("FmvCoverage");

export type CountMap = Record<string, number>;

export interface FmvBreakdown {
  byType: CountMap;
  byBuyCurrency: CountMap;
  bySellCurrency: CountMap;
  byExchange: CountMap;
  byMonth: CountMap; // YYYY-MM, UTC
}

export interface FmvCoverage {
  totalTransactions: number;
  missingCount: number;
  availableCount: number;
  missingPercentage: number;
  /** Rows without USDEquivalent whose every leg the lookup can price. */
  resolvableCount: number;
  missing: FmvBreakdown;
  available: FmvBreakdown;
}

function emptyBreakdown(): FmvBreakdown {
  return {
    byType: {},
    byBuyCurrency: {},
    bySellCurrency: {},
    byExchange: {},
    byMonth: {},
  };
}

function bump(counts: CountMap, key: string | undefined): void {
  if (key === undefined || key === "") return;
  counts[key] = (counts[key] ?? 0) + 1;
}

function tally(breakdown: FmvBreakdown, tx: Transaction): void {
  bump(breakdown.byType, tx.type);
  bump(breakdown.byBuyCurrency, tx.buyCurrency);
  bump(breakdown.bySellCurrency, tx.sellCurrency);
  bump(breakdown.byExchange, tx.exchange);
  if (!isNaN(tx.date.getTime())) {
    bump(breakdown.byMonth, toDateKey(tx.date).slice(0, 7));
  }
}

function isResolvable(tx: Transaction, lookupFmv: FmvLookup): boolean {
  const legs: string[] = [];
  if (tx.buyCurrency && tx.buyAmount?.gt(0)) legs.push(tx.buyCurrency);
  if (tx.sellCurrency && tx.sellAmount?.gt(0)) legs.push(tx.sellCurrency);
  if (legs.length === 0 || isNaN(tx.date.getTime())) return false;
  return legs.every((asset) => unitPriceUsd(asset, tx.date, lookupFmv) !== null);
}

/**
 * Splits transactions by whether they carry a USDEquivalent and counts
 * each side by type, currency, exchange and month.
 */
export function analyzeMissingFmv(
  transactions: readonly Transaction[],
  lookupFmv: FmvLookup = () => null,
): FmvCoverage {
  const missing = emptyBreakdown();
  const available = emptyBreakdown();
  let missingCount = 0;
  let resolvableCount = 0;

  for (const tx of transactions) {
    if (tx.usdEquivalent === null) {
      missingCount++;
      tally(missing, tx);
      if (isResolvable(tx, lookupFmv)) resolvableCount++;
    } else {
      tally(available, tx);
    }
  }

  const total = transactions.length;
  const coverage: FmvCoverage = {
    totalTransactions: total,
    missingCount,
    availableCount: total - missingCount,
    missingPercentage: total > 0 ? (missingCount / total) * 100 : 0,
    resolvableCount,
    missing,
    available,
  };

  logger.info(
    { total, missing: missingCount, resolvable: resolvableCount },
    "FMV coverage analysed",
  );
  return coverage;
}
