import Decimal from "decimal.js";
import {
  DisposalKind,
  FlagKind,
  IncomeCategory,
  LotOrigin,
  TransactionCategory,
  type AssetLeg,
  type FeeRecord,
  type FmvLookup,
  type GainRecord,
  type IncomeRecord,
  type LedgerFlag,
  type Lot,
  type LotSnapshot,
  type ReconciliationReport,
  type AmbiguousTransaction,
  type Transaction,
  type ValidationError,
} from "@/engine/types";
import { LotPool } from "@/engine/lot-pool";
import { LedgerAccumulator } from "@/engine/ledger";
import { classifyTransaction, type ClassifierOptions } from "@/engine/classifier";
import {
  allocateFee,
  feeTreatmentFor,
  feeUnpricedFlag,
} from "@/engine/fee-allocator";
import { processDisposal } from "@/engine/disposal-engine";
import { recognizeIncome } from "@/engine/income-recognizer";
import { reconcileHoldings } from "@/engine/reconciliation";
import { legValueUsd, unitPriceUsd } from "@/engine/valuation";
import { formatCryptoAmount } from "@/lib/format";
import { getLogger } from "@/lib/logger";

const logger = getLogger("TaxCalculator");

export type HoldingsTotals = Record<string, Decimal>;

export interface LedgerInput {
  /** Tax-year transactions, already in chronological order. */
  transactions: Transaction[];
  /** Prior-year lots to start from. */
  seed?: LotSnapshot;
  /** Independent per-asset holdings at the start of the period. */
  seedHoldings?: HoldingsTotals;
  /** Independent per-asset holdings at the end of the period. */
  endHoldings?: HoldingsTotals;
}

export interface CalculationOptions {
  lookupFmv?: FmvLookup;
  reconciliationTolerance?: Decimal;
  classifier?: ClassifierOptions;
}

export interface LedgerResult {
  gains: readonly GainRecord[];
  income: readonly IncomeRecord[];
  reconciliation: readonly ReconciliationReport[];
  flags: readonly LedgerFlag[];
  errors: readonly ValidationError[];
  ambiguous: readonly AmbiguousTransaction[];
  fees: readonly FeeRecord[];
  remainingLots: Lot[];
  snapshot: LotSnapshot;
}

const noQuotes: FmvLookup = () => null;

function toQuantityMap(totals: HoldingsTotals): Map<string, Decimal> {
  return new Map(Object.entries(totals));
}

/**
 * Rejects rows the engine cannot process at all: negative quantities or
 * values and invalid dates. The caller corrects and resubmits these.
 */
export function validateTransaction(tx: Transaction): ValidationError[] {
  const errors: ValidationError[] = [];
  const push = (field: string, message: string) =>
    errors.push({ row: tx.rowIndex, field, message, transactionId: tx.id });

  if (tx.type.trim() === "") {
    push("type", "type is required");
  }
  if (isNaN(tx.date.getTime())) {
    push("date", "date is not a valid timestamp");
  }

  const amountFields: { name: string; value: Decimal | null | undefined }[] = [
    { name: "buyAmount", value: tx.buyAmount },
    { name: "sellAmount", value: tx.sellAmount },
    { name: "feeAmount", value: tx.feeAmount },
    { name: "interestAmount", value: tx.interestAmount },
    { name: "usdEquivalent", value: tx.usdEquivalent },
  ];
  for (const { name, value } of amountFields) {
    if (value && value.isNegative()) {
      push(name, `${name} must not be negative, got ${value.toString()}`);
    }
  }

  return errors;
}

function missingFmvFlag(tx: Transaction, leg: AssetLeg, what: string): LedgerFlag {
  return {
    kind: FlagKind.MISSING_FMV,
    message: `No FMV for ${formatCryptoAmount(leg.quantity)} ${leg.asset} ${what} on ${tx.date.toISOString()}; recorded as $0`,
    transactionId: tx.id,
    asset: leg.asset,
    date: tx.date,
  };
}

class LedgerRun {
  readonly pool = new LotPool();
  readonly ledger = new LedgerAccumulator();
  private readonly lookupFmv: FmvLookup;
  private readonly classifierOptions: ClassifierOptions;

  constructor(options: CalculationOptions) {
    this.lookupFmv = options.lookupFmv ?? noQuotes;
    this.classifierOptions = options.classifier ?? {};
  }

  process(tx: Transaction): void {
    const classified = classifyTransaction(tx, this.classifierOptions);
    const fee = allocateFee(tx, feeTreatmentFor(classified), this.lookupFmv);
    if (fee.unpriced) {
      this.ledger.addFlags([feeUnpricedFlag(tx)]);
    }
    if (tx.feeAmount && tx.feeAmount.gt(0) && tx.feeCurrency) {
      this.ledger.addFee({
        transactionId: tx.id,
        date: tx.date,
        currency: tx.feeCurrency,
        amount: tx.feeAmount,
        feeUsd: fee.feeUsd,
        treatment: fee.treatment,
        unpriced: fee.unpriced,
      });
    }

    switch (classified.category) {
      // ── Acquisitions: new lot, fee added to basis ────────────────────────
      case TransactionCategory.ACQUISITION: {
        this.acquire(tx, classified.acquisition, fee.feeUsd, null);
        break;
      }

      // ── Disposals: FIFO match; swaps then acquire the received side ──────
      case TransactionCategory.DISPOSAL: {
        const { disposal, acquisition } = classified;
        const grossProceeds = legValueUsd(tx, disposal, this.lookupFmv);
        this.dispose(tx, disposal, grossProceeds, fee.feeUsd, classified.disposalKind);
        if (acquisition) {
          // What was given up is what was received when the buy side has no
          // quote of its own.
          this.acquire(tx, acquisition, new Decimal(0), grossProceeds);
        }
        break;
      }

      // ── Income: ordinary income + new lot at FMV ─────────────────────────
      case TransactionCategory.INCOME: {
        const { income, incomeCategory } = classified;
        const outcome = recognizeIncome(this.pool, {
          transactionId: tx.id,
          asset: income.asset,
          quantity: income.quantity,
          fmvUsd: legValueUsd(tx, income, this.lookupFmv),
          date: tx.date,
          category: incomeCategory,
        });
        this.ledger.addIncome(outcome.record);
        this.ledger.addFlags(outcome.flags);
        break;
      }

      // ── Loans: principal moves without tax effect; interest does not ─────
      case TransactionCategory.BORROW_REPAY: {
        const { interest } = classified;
        if (!interest) break;
        const price = unitPriceUsd(interest.asset, tx.date, this.lookupFmv);
        const value = price === null ? null : interest.quantity.mul(price);

        if (classified.direction === "BORROW") {
          const outcome = recognizeIncome(this.pool, {
            transactionId: tx.id,
            asset: interest.asset,
            quantity: interest.quantity,
            fmvUsd: value,
            date: tx.date,
            category: IncomeCategory.OTHER,
          });
          this.ledger.addIncome(outcome.record);
          this.ledger.addFlags(outcome.flags);
        } else {
          this.dispose(tx, interest, value, new Decimal(0), DisposalKind.INTEREST);
        }
        break;
      }

      // ── Proven theft: capital loss, nothing received ─────────────────────
      case TransactionCategory.LOST: {
        this.dispose(tx, classified.disposal, new Decimal(0), fee.feeUsd, DisposalKind.LOST);
        break;
      }

      case TransactionCategory.TRANSFER: {
        logger.debug({ transactionId: tx.id, type: tx.type }, "Transfer, no tax effect");
        break;
      }

      case TransactionCategory.AMBIGUOUS: {
        this.ledger.addAmbiguous(classified);
        this.ledger.addFlags([
          {
            kind: FlagKind.AMBIGUOUS_CLASSIFICATION,
            message: classified.reason,
            transactionId: tx.id,
            asset: tx.sellCurrency ?? tx.buyCurrency,
            date: tx.date,
          },
        ]);
        break;
      }
    }
  }

  private acquire(
    tx: Transaction,
    leg: AssetLeg,
    feeUsd: Decimal,
    fallbackValue: Decimal | null,
  ): void {
    let value = legValueUsd(tx, leg, this.lookupFmv) ?? fallbackValue;
    if (value === null) {
      this.ledger.addFlags([missingFmvFlag(tx, leg, "acquired")]);
      value = new Decimal(0);
    }

    this.pool.addLot({
      asset: leg.asset,
      quantity: leg.quantity,
      unitCostBasisUsd: value.plus(feeUsd).div(leg.quantity),
      acquisitionDate: tx.date,
      origin: LotOrigin.ACQUIRED,
      sourceTransactionId: tx.id,
    });
  }

  private dispose(
    tx: Transaction,
    leg: AssetLeg,
    grossProceedsUsd: Decimal | null,
    feeUsd: Decimal,
    disposalKind: DisposalKind,
  ): void {
    const outcome = processDisposal(this.pool, {
      transactionId: tx.id,
      asset: leg.asset,
      quantity: leg.quantity,
      grossProceedsUsd,
      feeUsd,
      disposalDate: tx.date,
      disposalKind,
    });
    this.ledger.addGains(outcome.records);
    this.ledger.addFlags(outcome.flags);
  }
}

/**
 * Runs one period: seeds prior-year lots, reconciles them, then walks the
 * transactions in the order given. Rows are never re-sorted; a row dated
 * before its predecessor is flagged and still processed. Nothing short of
 * a programming error stops the run.
 */
export function calculateTaxes(
  input: LedgerInput,
  options: CalculationOptions = {},
): LedgerResult {
  const run = new LedgerRun(options);
  const { pool, ledger } = run;
  const tolerance = options.reconciliationTolerance ?? new Decimal(0);

  // ── Seed and reconcile opening state ───────────────────────────────────
  for (const [asset, lots] of Object.entries(input.seed ?? {})) {
    ledger.addFlags(pool.seed(asset, lots));
  }
  if (input.seedHoldings) {
    const outcome = reconcileHoldings(
      pool.quantities(),
      toQuantityMap(input.seedHoldings),
      "SEED",
      tolerance,
    );
    ledger.addReports(outcome.reports);
    ledger.addFlags(outcome.flags);
  }

  // ── Single chronological pass ──────────────────────────────────────────
  let latest: Date | null = null;

  for (const tx of input.transactions) {
    const errors = validateTransaction(tx);
    if (errors.length > 0) {
      errors.forEach((e) => ledger.addError(e));
      continue;
    }

    if (latest !== null && tx.date.getTime() < latest.getTime()) {
      ledger.addFlags([
        {
          kind: FlagKind.OUT_OF_ORDER,
          message: `Transaction ${tx.id} dated ${tx.date.toISOString()} precedes ${latest.toISOString()}`,
          transactionId: tx.id,
          date: tx.date,
        },
      ]);
    } else {
      latest = tx.date;
    }

    try {
      run.process(tx);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ transactionId: tx.id, err }, "Failed to process transaction");
      ledger.addError({
        row: tx.rowIndex,
        field: "",
        message: `Error processing ${tx.type} on ${tx.date.toISOString()}: ${message}`,
        transactionId: tx.id,
      });
    }
  }

  // ── Closing reconciliation ─────────────────────────────────────────────
  if (input.endHoldings) {
    const outcome = reconcileHoldings(
      pool.quantities(),
      toQuantityMap(input.endHoldings),
      "END",
      tolerance,
    );
    ledger.addReports(outcome.reports);
    ledger.addFlags(outcome.flags);
  }

  logger.info(
    {
      transactions: input.transactions.length,
      gains: ledger.gains.length,
      income: ledger.income.length,
      flags: ledger.flags.length,
      errors: ledger.errors.length,
    },
    "Ledger run complete",
  );

  return {
    gains: ledger.gains,
    income: ledger.income,
    reconciliation: ledger.reconciliation,
    flags: ledger.flags,
    errors: ledger.errors,
    ambiguous: ledger.ambiguous,
    fees: ledger.fees,
    remainingLots: pool.getAllRemainingLots(),
    snapshot: pool.exportSnapshot(),
  };
}
