export * from "@/engine/types";
export { classifyTransaction, parseTransactionType, isFiat } from "@/engine/classifier";
export type { ClassifierOptions } from "@/engine/classifier";
export { allocateFee, feeTreatmentFor } from "@/engine/fee-allocator";
export type { FeeAllocation } from "@/engine/fee-allocator";
export { AssetLotQueue, LotPool, LotQueueError } from "@/engine/lot-pool";
export type { NewLot } from "@/engine/lot-pool";
export { processDisposal } from "@/engine/disposal-engine";
export type { DisposalRequest, DisposalOutcome } from "@/engine/disposal-engine";
export { recognizeIncome } from "@/engine/income-recognizer";
export type { IncomeRequest, IncomeOutcome } from "@/engine/income-recognizer";
export { reconcileHoldings } from "@/engine/reconciliation";
export type { ReconciliationOutcome } from "@/engine/reconciliation";
export { LedgerAccumulator } from "@/engine/ledger";
export { getHoldingDays, getHoldingTerm, isLongTerm } from "@/engine/holding-period";
export { legValueUsd, unitPriceUsd } from "@/engine/valuation";
export { calculateTaxes, validateTransaction } from "@/engine/tax-calculator";
export type {
  CalculationOptions,
  HoldingsTotals,
  LedgerInput,
  LedgerResult,
} from "@/engine/tax-calculator";
export {
  generateForm8949,
  generateReport,
  generateScheduleD,
  summarizeDisposals,
  summarizeFees,
  summarizeHoldings,
  summarizeIncome,
} from "@/engine/report-generator";
export type { TaxReport } from "@/engine/report-generator";
export { parseTransactionsCsv, parseUtcDate, sortTransactions } from "@/engine/csv-parser";
export type { CsvParseOptions } from "@/engine/csv-parser";
export { parseSeedFile, serializeSnapshot, SeedImportError } from "@/engine/seed-import";
export type { SeedFile } from "@/engine/seed-import";
export { fetchDailyPrices, PriceTable } from "@/engine/price-lookup";
export { analyzeMissingFmv } from "@/engine/fmv-coverage";
export type { CountMap, FmvBreakdown, FmvCoverage } from "@/engine/fmv-coverage";
export { importCsv, runTaxYear, tickersToPrice } from "@/engine/csv-import";
export type { ImportOptions, ImportResult, TaxYearInput, TaxYearRun } from "@/engine/csv-import";
export { ConfigError, loadConfig, parseLogLevel } from "@/lib/config";
export type { EngineConfig, LogLevel } from "@/lib/config";
export { getLogger, resolveLogLevel } from "@/lib/logger";
