import Decimal from "decimal.js";
import {
  DisposalKind,
  IncomeCategory,
  TransactionCategory,
  TransactionType,
  type AssetLeg,
  type ClassifiedTransaction,
  type Transaction,
} from "@/engine/types";
import {
  EXTERNAL_INCOME_KEYWORDS,
  FIAT_CURRENCIES,
  INCOME_TYPE_CATEGORIES,
  PROVEN_THEFT_PATTERN,
  THIRD_PARTY_KEYWORDS,
} from "@/lib/constants";

export interface ClassifierOptions {
  externalIncomeKeywords?: readonly string[];
  thirdPartyKeywords?: readonly string[];
}

const TYPES_BY_LABEL = new Map<string, TransactionType>(
  Object.values(TransactionType).map((t) => [t.toLowerCase(), t]),
);

export function parseTransactionType(label: string): TransactionType | null {
  return TYPES_BY_LABEL.get(label.trim().toLowerCase()) ?? null;
}

export function isFiat(currency: string): boolean {
  return FIAT_CURRENCIES.has(currency.toUpperCase());
}

function toLeg(
  asset: string | undefined,
  quantity: Decimal | undefined,
): AssetLeg | null {
  if (!asset || !quantity || quantity.lte(0)) return null;
  return { asset, quantity };
}

function mentionsAny(comment: string | undefined, keywords: readonly string[]) {
  if (!comment) return false;
  const lower = comment.toLowerCase();
  return keywords.some((k) => lower.includes(k.toLowerCase()));
}

function ambiguous(tx: Transaction, reason: string): ClassifiedTransaction {
  return { category: TransactionCategory.AMBIGUOUS, transaction: tx, reason };
}

/**
 * Maps a normalized transaction onto its tax category. Pure; never throws.
 * Anything it cannot place with confidence comes back AMBIGUOUS with a reason
 * so it can be excluded from totals and reviewed by hand.
 */
export function classifyTransaction(
  tx: Transaction,
  options: ClassifierOptions = {},
): ClassifiedTransaction {
  const incomeKeywords =
    options.externalIncomeKeywords ?? EXTERNAL_INCOME_KEYWORDS;
  const thirdPartyKeywords = options.thirdPartyKeywords ?? THIRD_PARTY_KEYWORDS;

  const type = parseTransactionType(tx.type);
  if (type === null) {
    return ambiguous(tx, `Unrecognized transaction type "${tx.type}"`);
  }

  const buyLeg = toLeg(tx.buyCurrency, tx.buyAmount);
  const sellLeg = toLeg(tx.sellCurrency, tx.sellAmount);

  switch (type) {
    // ── Deposits: own-wallet transfer unless value came from outside ──────
    case TransactionType.DEPOSIT: {
      if (!mentionsAny(tx.comment, incomeKeywords)) {
        return { category: TransactionCategory.TRANSFER, transaction: tx };
      }
      if (!buyLeg || isFiat(buyLeg.asset)) {
        return ambiguous(tx, "Income deposit has no crypto received side");
      }
      return {
        category: TransactionCategory.INCOME,
        transaction: tx,
        incomeCategory: IncomeCategory.OTHER,
        income: buyLeg,
      };
    }

    // ── Withdrawals: own-wallet transfer unless paid to a third party ─────
    case TransactionType.WITHDRAWAL: {
      if (!mentionsAny(tx.comment, thirdPartyKeywords)) {
        return { category: TransactionCategory.TRANSFER, transaction: tx };
      }
      if (!sellLeg || isFiat(sellLeg.asset)) {
        return ambiguous(tx, "Third-party withdrawal has no crypto sent side");
      }
      return {
        category: TransactionCategory.DISPOSAL,
        transaction: tx,
        disposalKind: DisposalKind.WITHDRAWAL,
        disposal: sellLeg,
      };
    }

    // ── Trades: disposal leg, acquisition leg, or both ────────────────────
    case TransactionType.TRADE:
    case TransactionType.SWAP: {
      const acquires = buyLeg && !isFiat(buyLeg.asset) ? buyLeg : null;
      const disposes = sellLeg && !isFiat(sellLeg.asset) ? sellLeg : null;

      if (disposes) {
        return {
          category: TransactionCategory.DISPOSAL,
          transaction: tx,
          disposalKind: DisposalKind.TRADE,
          disposal: disposes,
          ...(acquires ? { acquisition: acquires } : {}),
        };
      }
      if (acquires) {
        return {
          category: TransactionCategory.ACQUISITION,
          transaction: tx,
          acquisition: acquires,
        };
      }
      return ambiguous(tx, "Trade moves no crypto on either side");
    }

    case TransactionType.SPEND: {
      if (!sellLeg || isFiat(sellLeg.asset)) {
        return ambiguous(tx, "Spend has no crypto sent side");
      }
      return {
        category: TransactionCategory.DISPOSAL,
        transaction: tx,
        disposalKind: DisposalKind.SPEND,
        disposal: sellLeg,
      };
    }

    case TransactionType.INCOME:
    case TransactionType.STAKING:
    case TransactionType.AIRDROP:
    case TransactionType.MINING: {
      if (!buyLeg || isFiat(buyLeg.asset)) {
        return ambiguous(tx, `${type} has no crypto received side`);
      }
      return {
        category: TransactionCategory.INCOME,
        transaction: tx,
        incomeCategory: INCOME_TYPE_CATEGORIES.get(type) ?? IncomeCategory.OTHER,
        income: buyLeg,
      };
    }

    // ── Lost: capital loss only with proof of theft ───────────────────────
    case TransactionType.LOST: {
      if (!tx.comment || !PROVEN_THEFT_PATTERN.test(tx.comment)) {
        return ambiguous(tx, "Lost funds without proven theft need manual review");
      }
      if (!sellLeg || isFiat(sellLeg.asset)) {
        return ambiguous(tx, "Lost transaction has no crypto sent side");
      }
      return {
        category: TransactionCategory.LOST,
        transaction: tx,
        disposal: sellLeg,
      };
    }

    case TransactionType.BORROW:
    case TransactionType.REPAY: {
      const interest = toLeg(tx.interestCurrency, tx.interestAmount);
      return {
        category: TransactionCategory.BORROW_REPAY,
        transaction: tx,
        direction: type === TransactionType.BORROW ? "BORROW" : "REPAY",
        ...(interest && !isFiat(interest.asset) ? { interest } : {}),
      };
    }
  }
}
