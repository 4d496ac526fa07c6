import Decimal from "decimal.js";
import {
  FeeTreatment,
  HoldingTerm,
  IncomeCategory,
  type AssetDisposalTotals,
  type DisposalSummary,
  type FeeRecord,
  type FeeSummary,
  type Form8949Row,
  type GainRecord,
  type HoldingSummary,
  type IncomeRecord,
  type IncomeSummary,
  type LedgerFlag,
  type Lot,
  type LotSnapshot,
  type ReconciliationReport,
  type ScheduleDSummary,
  type ValidationError,
} from "@/engine/types";
import type { LedgerResult } from "@/engine/tax-calculator";
import { CAPITAL_LOSS_LIMIT_USD } from "@/lib/constants";
import { formatCryptoAmount } from "@/lib/format";

export interface TaxReport {
  taxYear: number;
  gains: GainRecord[];
  income: IncomeRecord[];
  form8949Rows: Form8949Row[];
  scheduleDSummary: ScheduleDSummary;
  incomeSummary: IncomeSummary;
  disposalSummary: DisposalSummary;
  fees: FeeRecord[];
  feeSummary: FeeSummary;
  holdings: HoldingSummary[];
  reconciliation: ReconciliationReport[];
  snapshot: LotSnapshot;
  flags: LedgerFlag[];
  errors: ValidationError[];
}

/**
 * Convert a single GainRecord into a Form 8949 row.
 * The description shows the disposed amount and asset (e.g., "1.5 BTC").
 */
function gainToForm8949Row(g: GainRecord): Form8949Row {
  return {
    description: `${formatCryptoAmount(g.quantity)} ${g.asset}`,
    dateAcquired: g.acquisitionDate,
    dateSold: g.disposalDate,
    proceeds: g.proceedsUsd,
    costBasis: g.basisUsd,
    gainOrLoss: g.gainUsd,
    isLongTerm: g.term === HoldingTerm.LONG,
    holdingDays: g.holdingDays,
  };
}

/**
 * Each GainRecord (one per consumed lot segment) becomes one Form 8949 line.
 */
export function generateForm8949(gains: readonly GainRecord[]): Form8949Row[] {
  return gains.map(gainToForm8949Row);
}

/**
 * Aggregate Form 8949 rows into a Schedule D summary. A net loss is
 * deductible up to `lossLimitUsd`; the rest carries over.
 */
export function generateScheduleD(
  rows: Form8949Row[],
  lossLimitUsd: Decimal.Value = CAPITAL_LOSS_LIMIT_USD,
): ScheduleDSummary {
  let shortTermGains = new Decimal(0);
  let shortTermLosses = new Decimal(0);
  let longTermGains = new Decimal(0);
  let longTermLosses = new Decimal(0);

  for (const row of rows) {
    if (row.isLongTerm) {
      if (row.gainOrLoss.gte(0)) {
        longTermGains = longTermGains.plus(row.gainOrLoss);
      } else {
        longTermLosses = longTermLosses.plus(row.gainOrLoss);
      }
    } else {
      if (row.gainOrLoss.gte(0)) {
        shortTermGains = shortTermGains.plus(row.gainOrLoss);
      } else {
        shortTermLosses = shortTermLosses.plus(row.gainOrLoss);
      }
    }
  }

  const netShortTerm = shortTermGains.plus(shortTermLosses);
  const netLongTerm = longTermGains.plus(longTermLosses);
  const totalNetGainOrLoss = netShortTerm.plus(netLongTerm);

  const netLoss = totalNetGainOrLoss.isNegative()
    ? totalNetGainOrLoss.abs()
    : new Decimal(0);
  const allowableLossDeduction = Decimal.min(netLoss, lossLimitUsd);

  return {
    shortTermGains,
    shortTermLosses,
    longTermGains,
    longTermLosses,
    netShortTerm,
    netLongTerm,
    totalNetGainOrLoss,
    allowableLossDeduction,
    lossCarryover: netLoss.minus(allowableLossDeduction),
  };
}

export function summarizeIncome(income: readonly IncomeRecord[]): IncomeSummary {
  const byCategory: Record<IncomeCategory, Decimal> = {
    [IncomeCategory.STAKING]: new Decimal(0),
    [IncomeCategory.AIRDROP]: new Decimal(0),
    [IncomeCategory.MINING]: new Decimal(0),
    [IncomeCategory.OTHER]: new Decimal(0),
  };
  let total = new Decimal(0);

  for (const record of income) {
    byCategory[record.category] = byCategory[record.category].plus(record.fmvUsd);
    total = total.plus(record.fmvUsd);
  }

  return { total, byCategory };
}

/**
 * Closing position per asset: remaining quantity, the basis it carries, and
 * the average unit basis. Sorted by asset.
 */
export function summarizeHoldings(lots: readonly Lot[]): HoldingSummary[] {
  const byAsset = new Map<string, HoldingSummary>();

  for (const lot of lots) {
    const current = byAsset.get(lot.asset) ?? {
      asset: lot.asset,
      quantity: new Decimal(0),
      totalBasisUsd: new Decimal(0),
      lotCount: 0,
      averageUnitBasisUsd: new Decimal(0),
    };
    current.quantity = current.quantity.plus(lot.quantity);
    current.totalBasisUsd = current.totalBasisUsd.plus(
      lot.quantity.mul(lot.unitCostBasisUsd),
    );
    current.lotCount++;
    byAsset.set(lot.asset, current);
  }

  return [...byAsset.values()]
    .sort((a, b) => a.asset.localeCompare(b.asset))
    .map((h) => ({
      ...h,
      averageUnitBasisUsd: h.quantity.gt(0)
        ? h.totalBasisUsd.div(h.quantity)
        : new Decimal(0),
    }));
}

export function summarizeDisposals(gains: readonly GainRecord[]): DisposalSummary {
  const transactions = new Set<string>();
  const byAsset: Record<string, AssetDisposalTotals> = {};
  let proceedsUsd = new Decimal(0);
  let basisUsd = new Decimal(0);
  let shortTermGainUsd = new Decimal(0);
  let longTermGainUsd = new Decimal(0);

  for (const g of gains) {
    transactions.add(g.transactionId);
    proceedsUsd = proceedsUsd.plus(g.proceedsUsd);
    basisUsd = basisUsd.plus(g.basisUsd);
    if (g.term === HoldingTerm.LONG) {
      longTermGainUsd = longTermGainUsd.plus(g.gainUsd);
    } else {
      shortTermGainUsd = shortTermGainUsd.plus(g.gainUsd);
    }

    const totals = byAsset[g.asset] ?? {
      quantity: new Decimal(0),
      proceedsUsd: new Decimal(0),
      basisUsd: new Decimal(0),
      gainUsd: new Decimal(0),
    };
    byAsset[g.asset] = {
      quantity: totals.quantity.plus(g.quantity),
      proceedsUsd: totals.proceedsUsd.plus(g.proceedsUsd),
      basisUsd: totals.basisUsd.plus(g.basisUsd),
      gainUsd: totals.gainUsd.plus(g.gainUsd),
    };
  }

  return {
    disposalCount: transactions.size,
    recordCount: gains.length,
    proceedsUsd,
    basisUsd,
    gainUsd: shortTermGainUsd.plus(longTermGainUsd),
    shortTermGainUsd,
    longTermGainUsd,
    byAsset,
  };
}

/**
 * Fee counts and USD totals. Unpriced fees and fees with no tax treatment
 * count toward the totals at $0.
 */
export function summarizeFees(fees: readonly FeeRecord[]): FeeSummary {
  const byTreatment: Record<FeeTreatment, number> = {
    [FeeTreatment.ADD_TO_BASIS]: 0,
    [FeeTreatment.REDUCE_PROCEEDS]: 0,
    [FeeTreatment.NONE]: 0,
  };
  const byCurrency: Record<string, number> = {};
  let totalFeeUsd = new Decimal(0);
  let unpricedCount = 0;

  for (const fee of fees) {
    totalFeeUsd = totalFeeUsd.plus(fee.feeUsd);
    byTreatment[fee.treatment]++;
    byCurrency[fee.currency] = (byCurrency[fee.currency] ?? 0) + 1;
    if (fee.unpriced) unpricedCount++;
  }

  return {
    feeCount: fees.length,
    totalFeeUsd,
    averageFeeUsd: fees.length > 0 ? totalFeeUsd.div(fees.length) : new Decimal(0),
    unpricedCount,
    byTreatment,
    byCurrency,
  };
}

/**
 * Generate the tax report for a single-year run. Records dated outside
 * `taxYear` (UTC) are left out of the gain, income and fee totals; the
 * holdings are the closing position.
 */
export function generateReport(
  result: LedgerResult,
  taxYear: number,
  lossLimitUsd: Decimal.Value = CAPITAL_LOSS_LIMIT_USD,
): TaxReport {
  const gains = result.gains.filter(
    (g) => g.disposalDate.getUTCFullYear() === taxYear,
  );
  const income = result.income.filter(
    (e) => e.date.getUTCFullYear() === taxYear,
  );

  const fees = result.fees.filter(
    (f) => f.date.getUTCFullYear() === taxYear,
  );

  const form8949Rows = generateForm8949(gains);

  return {
    taxYear,
    gains,
    income,
    form8949Rows,
    scheduleDSummary: generateScheduleD(form8949Rows, lossLimitUsd),
    incomeSummary: summarizeIncome(income),
    disposalSummary: summarizeDisposals(gains),
    fees,
    feeSummary: summarizeFees(fees),
    holdings: summarizeHoldings(result.remainingLots),
    reconciliation: [...result.reconciliation],
    snapshot: result.snapshot,
    flags: [...result.flags],
    errors: [...result.errors],
  };
}
