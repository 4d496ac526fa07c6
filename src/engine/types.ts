import Decimal from "decimal.js";

// ─── Raw Transaction Types from the Export ────────────────────────────────────

export enum TransactionType {
  DEPOSIT = "Deposit",
  WITHDRAWAL = "Withdrawal",
  TRADE = "Trade",
  SWAP = "Swap",
  SPEND = "Spend",
  INCOME = "Income",
  STAKING = "Staking",
  AIRDROP = "Airdrop",
  MINING = "Mining",
  LOST = "Lost",
  BORROW = "Borrow",
  REPAY = "Repay",
}

// ─── Semantic Categories (output of the classifier) ───────────────────────────

export enum TransactionCategory {
  ACQUISITION = "ACQUISITION",
  DISPOSAL = "DISPOSAL",
  INCOME = "INCOME",
  TRANSFER = "TRANSFER",
  BORROW_REPAY = "BORROW_REPAY",
  LOST = "LOST",
  AMBIGUOUS = "AMBIGUOUS",
}

export enum DisposalKind {
  TRADE = "TRADE",
  SPEND = "SPEND",
  WITHDRAWAL = "WITHDRAWAL",
  LOST = "LOST",
  INTEREST = "INTEREST",
}

export enum IncomeCategory {
  STAKING = "STAKING",
  AIRDROP = "AIRDROP",
  MINING = "MINING",
  OTHER = "OTHER",
}

export enum LotOrigin {
  SEEDED = "SEEDED", // Prior-year rollover
  ACQUIRED = "ACQUIRED",
  INCOME = "INCOME",
}

export enum HoldingTerm {
  SHORT = "SHORT",
  LONG = "LONG",
}

export enum FeeTreatment {
  ADD_TO_BASIS = "ADD_TO_BASIS",
  REDUCE_PROCEEDS = "REDUCE_PROCEEDS",
  NONE = "NONE",
}

// ─── Normalized Transaction (from ingestion) ──────────────────────────────────

export interface Transaction {
  readonly id: string;
  readonly rowIndex: number;
  readonly type: string; // Raw source label, classified later
  readonly date: Date;
  readonly buyAmount?: Decimal;
  readonly buyCurrency?: string;
  readonly sellAmount?: Decimal;
  readonly sellCurrency?: string;
  readonly feeAmount?: Decimal;
  readonly feeCurrency?: string;
  readonly usdEquivalent: Decimal | null;
  readonly exchange?: string;
  readonly exchangeId?: string;
  readonly comment?: string;
  readonly interestAmount?: Decimal;
  readonly interestCurrency?: string;
}

// One side of a transaction: an asset and the quantity that moved.
export interface AssetLeg {
  asset: string;
  quantity: Decimal;
}

// ─── Classified Transaction: closed union on `category` ───────────────────────

interface ClassifiedBase {
  transaction: Transaction;
}

export interface AcquisitionTransaction extends ClassifiedBase {
  category: TransactionCategory.ACQUISITION;
  acquisition: AssetLeg;
}

export interface DisposalTransaction extends ClassifiedBase {
  category: TransactionCategory.DISPOSAL;
  disposalKind: DisposalKind;
  disposal: AssetLeg;
  acquisition?: AssetLeg; // Present for crypto-to-crypto swaps
}

export interface IncomeTransaction extends ClassifiedBase {
  category: TransactionCategory.INCOME;
  incomeCategory: IncomeCategory;
  income: AssetLeg;
}

export interface TransferTransaction extends ClassifiedBase {
  category: TransactionCategory.TRANSFER;
}

export interface BorrowRepayTransaction extends ClassifiedBase {
  category: TransactionCategory.BORROW_REPAY;
  direction: "BORROW" | "REPAY";
  interest?: AssetLeg;
}

export interface LostTransaction extends ClassifiedBase {
  category: TransactionCategory.LOST;
  disposal: AssetLeg;
}

export interface AmbiguousTransaction extends ClassifiedBase {
  category: TransactionCategory.AMBIGUOUS;
  reason: string;
}

export type ClassifiedTransaction =
  | AcquisitionTransaction
  | DisposalTransaction
  | IncomeTransaction
  | TransferTransaction
  | BorrowRepayTransaction
  | LostTransaction
  | AmbiguousTransaction;

// ─── Tax Lot ──────────────────────────────────────────────────────────────────

export interface Lot {
  readonly id: string;
  readonly asset: string;
  readonly originalQuantity: Decimal;
  quantity: Decimal; // Remaining; only consume() changes it
  readonly unitCostBasisUsd: Decimal;
  readonly acquisitionDate: Date;
  readonly origin: LotOrigin;
  readonly sourceTransactionId: string | null;
}

// Prior-year rollover shape; also the shape of the end-of-period snapshot.
export interface SeedLot {
  acquisitionDate: Date;
  quantity: Decimal;
  unitCostBasisUsd: Decimal;
}

export type LotSnapshot = Record<string, SeedLot[]>;

export interface ConsumedSegment {
  lotId: string;
  quantity: Decimal;
  unitCostBasisUsd: Decimal;
  acquisitionDate: Date;
}

export interface ConsumeResult {
  segments: ConsumedSegment[];
  consumed: Decimal;
  shortfall: Decimal;
  insufficient: boolean;
}

// ─── Ledger Records ───────────────────────────────────────────────────────────

export interface GainRecord {
  readonly id: string;
  readonly transactionId: string;
  readonly asset: string;
  readonly disposalKind: DisposalKind;
  readonly disposalDate: Date;
  readonly acquisitionDate: Date;
  readonly quantity: Decimal;
  readonly proceedsUsd: Decimal; // Net of the allocated fee
  readonly feeUsd: Decimal;
  readonly basisUsd: Decimal;
  readonly gainUsd: Decimal;
  readonly term: HoldingTerm;
  readonly holdingDays: number;
  readonly sourceLotIds: readonly string[];
}

export interface IncomeRecord {
  readonly id: string;
  readonly transactionId: string;
  readonly asset: string;
  readonly date: Date;
  readonly quantity: Decimal;
  readonly fmvUsd: Decimal;
  readonly category: IncomeCategory;
  readonly resultingLotId: string;
}

// One per transaction carrying a fee, whatever its treatment.
export interface FeeRecord {
  readonly transactionId: string;
  readonly date: Date;
  readonly currency: string;
  readonly amount: Decimal;
  readonly feeUsd: Decimal; // 0 when unpriced or NONE
  readonly treatment: FeeTreatment;
  readonly unpriced: boolean;
}

export type ReconciliationStage = "SEED" | "END";

export interface ReconciliationReport {
  readonly asset: string;
  readonly stage: ReconciliationStage;
  readonly expectedQuantity: Decimal;
  readonly computedQuantity: Decimal;
  readonly delta: Decimal; // expected − computed
  readonly status: "OK" | "MISMATCH";
}

// ─── Diagnostics ──────────────────────────────────────────────────────────────

export enum FlagKind {
  INSUFFICIENT_LOTS = "INSUFFICIENT_LOTS",
  MISSING_FMV = "MISSING_FMV",
  FEE_UNPRICED = "FEE_UNPRICED",
  RECONCILIATION_MISMATCH = "RECONCILIATION_MISMATCH",
  AMBIGUOUS_CLASSIFICATION = "AMBIGUOUS_CLASSIFICATION",
  SEED_REJECTED = "SEED_REJECTED",
  OUT_OF_ORDER = "OUT_OF_ORDER",
}

export interface LedgerFlag {
  readonly kind: FlagKind;
  readonly message: string;
  readonly transactionId?: string;
  readonly asset?: string;
  readonly date?: Date;
}

export interface ValidationError {
  row: number;
  field: string;
  message: string;
  transactionId?: string;
}

export interface ValidationWarning {
  row: number;
  field: string;
  message: string;
}

export interface ParseResult {
  transactions: Transaction[];
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

// ─── FMV Capability ───────────────────────────────────────────────────────────
// Synchronous and side-effect free from the engine's point of view.

export type FmvLookup = (asset: string, date: Date) => Decimal | null;

// ─── Form 8949 / Schedule D ───────────────────────────────────────────────────

export interface Form8949Row {
  description: string; // e.g., "1.5 BTC"
  dateAcquired: Date;
  dateSold: Date;
  proceeds: Decimal;
  costBasis: Decimal;
  gainOrLoss: Decimal;
  isLongTerm: boolean;
  holdingDays: number;
}

export interface ScheduleDSummary {
  shortTermGains: Decimal;
  shortTermLosses: Decimal;
  longTermGains: Decimal;
  longTermLosses: Decimal;
  netShortTerm: Decimal;
  netLongTerm: Decimal;
  totalNetGainOrLoss: Decimal;
  allowableLossDeduction: Decimal;
  lossCarryover: Decimal;
}

export interface IncomeSummary {
  total: Decimal;
  byCategory: Record<IncomeCategory, Decimal>;
}

// ─── Summaries ────────────────────────────────────────────────────────────────

export interface HoldingSummary {
  asset: string;
  quantity: Decimal;
  totalBasisUsd: Decimal;
  lotCount: number;
  averageUnitBasisUsd: Decimal; // 0 when nothing is held
}

export interface AssetDisposalTotals {
  quantity: Decimal;
  proceedsUsd: Decimal;
  basisUsd: Decimal;
  gainUsd: Decimal;
}

export interface DisposalSummary {
  disposalCount: number; // Distinct disposing transactions
  recordCount: number;
  proceedsUsd: Decimal;
  basisUsd: Decimal;
  gainUsd: Decimal;
  shortTermGainUsd: Decimal;
  longTermGainUsd: Decimal;
  byAsset: Record<string, AssetDisposalTotals>;
}

export interface FeeSummary {
  feeCount: number;
  totalFeeUsd: Decimal;
  averageFeeUsd: Decimal;
  unpricedCount: number;
  byTreatment: Record<FeeTreatment, number>;
  byCurrency: Record<string, number>;
}
