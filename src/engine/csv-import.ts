// ─── CSV Import Orchestrator ──────────────────────────────────────────────────
// Thin layer over the parser and the engine: parses the export with the
// configured filters, loads daily prices for rows that carry no USD value,
// then runs the ledger and builds the year's report.

import Decimal from "decimal.js";
import type { ParseResult, ValidationWarning } from "@/engine/types";
import { parseTransactionsCsv } from "@/engine/csv-parser";
import { isFiat } from "@/engine/classifier";
import { PriceTable } from "@/engine/price-lookup";
import { calculateTaxes, type HoldingsTotals } from "@/engine/tax-calculator";
import { generateReport, type TaxReport } from "@/engine/report-generator";
import { analyzeMissingFmv, type FmvCoverage } from "@/engine/fmv-coverage";
import type { SeedFile } from "@/engine/seed-import";
import { ConfigError, loadConfig, type EngineConfig } from "@/lib/config";
import { USD_PEGGED_CURRENCIES } from "@/lib/constants";
import { formatUsd } from "@/lib/format";
import { getLogger } from "@/lib/logger";

const logger = getLogger("CsvImport");

export interface ImportOptions {
  config?: EngineConfig;
  /** Overrides the configured tax year. */
  taxYear?: number;
  /** Pre-filled prices; tickers already present are not fetched again. */
  prices?: PriceTable;
  /** Set false to stay offline and rely on the given prices only. */
  fetchPrices?: boolean;
}

export interface ImportResult {
  parseResult: ParseResult;
  prices: PriceTable;
}

export interface TaxYearInput extends ImportOptions {
  seed?: SeedFile;
  endHoldings?: HoldingsTotals;
}

export interface TaxYearRun {
  report: TaxReport;
  warnings: ValidationWarning[];
  fmvCoverage: FmvCoverage;
}

function needsQuote(currency: string | undefined): currency is string {
  return (
    currency !== undefined &&
    !isFiat(currency) &&
    !USD_PEGGED_CURRENCIES.has(currency.toUpperCase())
  );
}

/**
 * Tickers that must come from the price table: any non-fiat currency on a
 * row without USDEquivalent, plus every priced fee currency.
 */
export function tickersToPrice(parseResult: ParseResult): string[] {
  const tickers = new Set<string>();
  for (const tx of parseResult.transactions) {
    const legs =
      tx.usdEquivalent === null
        ? [tx.buyCurrency, tx.sellCurrency, tx.interestCurrency]
        : [tx.interestCurrency];
    for (const currency of [...legs, tx.feeCurrency]) {
      if (needsQuote(currency)) tickers.add(currency);
    }
  }
  return [...tickers].sort();
}

export async function importCsv(
  csvContent: string,
  options: ImportOptions = {},
): Promise<ImportResult> {
  const config = options.config ?? loadConfig();
  const taxYear = options.taxYear ?? config.taxYear;

  const parseResult = parseTransactionsCsv(csvContent, {
    taxYear,
    dustThresholdUsd: config.dustThresholdUsd,
  });

  const prices = options.prices ?? new PriceTable();
  const tickers = tickersToPrice(parseResult);
  const last = parseResult.transactions[parseResult.transactions.length - 1];

  if (options.fetchPrices !== false && tickers.length > 0 && last) {
    // One day past the last row so its own close is included
    const toDate = new Date(last.date.getTime() + 86_400_000);
    const warnings = await prices.loadDailyPrices(tickers, toDate);
    for (const message of warnings) {
      parseResult.warnings.push({ row: 0, field: "", message });
    }
  }

  return { parseResult, prices };
}

/**
 * Full single-year run from a CSV export: import, FMV coverage, ledger pass
 * over the optional seed, and report. Parse errors are reported alongside the
 * engine's own so callers see every row needing correction in one list.
 */
export async function runTaxYear(
  csvContent: string,
  input: TaxYearInput = {},
): Promise<TaxYearRun> {
  const config = input.config ?? loadConfig();
  const taxYear = input.taxYear ?? config.taxYear;
  if (taxYear === null) {
    throw new ConfigError("A tax year is required: set TAX_YEAR or pass taxYear");
  }

  const { parseResult, prices } = await importCsv(csvContent, {
    ...input,
    config,
    taxYear,
  });

  const lookupFmv = prices.asLookup();
  const fmvCoverage = analyzeMissingFmv(parseResult.transactions, lookupFmv);

  const result = calculateTaxes(
    {
      transactions: parseResult.transactions,
      seed: input.seed?.lots,
      seedHoldings: input.seed?.holdings,
      endHoldings: input.endHoldings,
    },
    {
      lookupFmv,
      reconciliationTolerance: new Decimal(config.reconciliationTolerance),
    },
  );

  const report = generateReport(result, taxYear, config.capitalLossLimitUsd);
  logger.info(
    {
      taxYear,
      disposals: report.form8949Rows.length,
      net: formatUsd(report.scheduleDSummary.totalNetGainOrLoss),
      flags: report.flags.length,
    },
    "Tax year complete",
  );

  return {
    report: { ...report, errors: [...parseResult.errors, ...report.errors] },
    warnings: parseResult.warnings,
    fmvCoverage,
  };
}
