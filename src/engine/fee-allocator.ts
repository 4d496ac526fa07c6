import Decimal from "decimal.js";
import {
  FeeTreatment,
  FlagKind,
  TransactionCategory,
  type ClassifiedTransaction,
  type FmvLookup,
  type LedgerFlag,
  type Transaction,
} from "@/engine/types";
import { unitPriceUsd } from "@/engine/valuation";

export interface FeeAllocation {
  feeUsd: Decimal;
  treatment: FeeTreatment;
  unpriced: boolean;
}

/**
 * Fees on disposals reduce proceeds; fees on pure acquisitions raise basis.
 * A swap has both legs and the fee goes to the disposal side. Income,
 * transfers and loan movements carry no basis or proceeds adjustment.
 */
export function feeTreatmentFor(classified: ClassifiedTransaction): FeeTreatment {
  switch (classified.category) {
    case TransactionCategory.ACQUISITION:
      return FeeTreatment.ADD_TO_BASIS;
    case TransactionCategory.DISPOSAL:
    case TransactionCategory.LOST:
      return FeeTreatment.REDUCE_PROCEEDS;
    case TransactionCategory.INCOME:
    case TransactionCategory.TRANSFER:
    case TransactionCategory.BORROW_REPAY:
    case TransactionCategory.AMBIGUOUS:
      return FeeTreatment.NONE;
  }
}

// Unit price implied by the row's USDEquivalent when the fee is paid in one
// of the traded currencies.
function impliedUnitPrice(tx: Transaction, currency: string): Decimal | null {
  if (tx.usdEquivalent === null) return null;
  if (tx.sellCurrency === currency && tx.sellAmount && tx.sellAmount.gt(0)) {
    return tx.usdEquivalent.div(tx.sellAmount);
  }
  if (tx.buyCurrency === currency && tx.buyAmount && tx.buyAmount.gt(0)) {
    return tx.usdEquivalent.div(tx.buyAmount);
  }
  return null;
}

/**
 * Prices a transaction's fee in USD. The fee currency is priced on its own,
 * independent of either leg. Unpriceable fees count as zero and are marked.
 */
export function allocateFee(
  tx: Transaction,
  treatment: FeeTreatment,
  lookupFmv: FmvLookup,
): FeeAllocation {
  const amount = tx.feeAmount;
  const currency = tx.feeCurrency;

  if (treatment === FeeTreatment.NONE || !amount || amount.lte(0) || !currency) {
    return { feeUsd: new Decimal(0), treatment, unpriced: false };
  }

  const price =
    unitPriceUsd(currency, tx.date, lookupFmv) ?? impliedUnitPrice(tx, currency);

  if (price === null) {
    return { feeUsd: new Decimal(0), treatment, unpriced: true };
  }
  return { feeUsd: amount.mul(price), treatment, unpriced: false };
}

export function feeUnpricedFlag(tx: Transaction): LedgerFlag {
  return {
    kind: FlagKind.FEE_UNPRICED,
    message: `No USD price for fee of ${tx.feeAmount?.toString() ?? "0"} ${tx.feeCurrency ?? ""} on ${tx.date.toISOString()}; fee treated as $0`,
    transactionId: tx.id,
    asset: tx.feeCurrency,
    date: tx.date,
  };
}
