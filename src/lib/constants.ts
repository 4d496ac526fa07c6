import { IncomeCategory, TransactionType } from "@/engine/types";

// ─── Income Transaction Types ─────────────────────────────────────────────────
// These transaction types are treated as ordinary income at fair market value
// and also create a new tax lot with basis = FMV (dual event).

export const INCOME_TYPE_CATEGORIES: ReadonlyMap<TransactionType, IncomeCategory> =
  new Map([
    [TransactionType.INCOME, IncomeCategory.OTHER],
    [TransactionType.STAKING, IncomeCategory.STAKING],
    [TransactionType.AIRDROP, IncomeCategory.AIRDROP],
    [TransactionType.MINING, IncomeCategory.MINING],
  ]);

// ─── Fiat ─────────────────────────────────────────────────────────────────────
// Fiat legs never create or consume lots. USD-pegged stablecoins are lots like
// any other asset, but price at 1 when no quote is available.

export const FIAT_CURRENCIES: ReadonlySet<string> = new Set(["USD"]);

export const USD_PEGGED_CURRENCIES: ReadonlySet<string> = new Set([
  "USDT",
  "USDC",
  "BUSD",
  "DAI",
  "TUSD",
  "FRAX",
  "USDP",
]);

// ─── Classifier Keywords ──────────────────────────────────────────────────────
// Matched case-insensitively against the free-text comment.

export const EXTERNAL_INCOME_KEYWORDS: readonly string[] = [
  "payment",
  "reward",
  "salary",
  "bounty",
  "interest",
  "referral",
];

export const THIRD_PARTY_KEYWORDS: readonly string[] = [
  "payment",
  "purchase",
  "merchant",
  "goods",
  "services",
  "cash out",
  "fiat",
  "gift",
];

export const PROVEN_THEFT_PATTERN = /proven\s+theft/i;

// ─── Holding Period Threshold ─────────────────────────────────────────────────
// IRS rule: must hold for MORE than one year (>365 days).

export const LONG_TERM_HOLDING_DAYS = 365;

// ─── Defaults ─────────────────────────────────────────────────────────────────

export const DUST_THRESHOLD_USD = 0.01;
export const CAPITAL_LOSS_LIMIT_USD = 3000;
export const RECONCILIATION_TOLERANCE = "0.00000001";

// ─── CSV Column Headers ──────────────────────────────────────────────────────
// The 15-column transaction export.

export const CSV_HEADERS = {
  TYPE: "Type",
  BUY_AMOUNT: "BuyAmount",
  BUY_CURRENCY: "BuyCurrency",
  SELL_AMOUNT: "SellAmount",
  SELL_CURRENCY: "SellCurrency",
  FEE_AMOUNT: "FeeAmount",
  FEE_CURRENCY: "FeeCurrency",
  EXCHANGE: "Exchange",
  EXCHANGE_ID: "ExchangeId",
  GROUP: "Group",
  IMPORT: "Import",
  COMMENT: "Comment",
  DATE: "Date",
  USD_EQUIVALENT: "USDEquivalent",
  UPDATED_AT: "UpdatedAt",
} as const;

export const REQUIRED_CSV_COLUMNS: readonly string[] = Object.values(CSV_HEADERS);
