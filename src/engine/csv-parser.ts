import Papa from "papaparse";
import Decimal from "decimal.js";
import type {
  ParseResult,
  Transaction,
  ValidationError,
  ValidationWarning,
} from "@/engine/types";
import { CSV_HEADERS, DUST_THRESHOLD_USD, REQUIRED_CSV_COLUMNS } from "@/lib/constants";
import { getLogger } from "@/lib/logger";

const logger = getLogger("CsvParser");

export interface CsvParseOptions {
  /** Keep only rows dated in this UTC year. */
  taxYear?: number | null;
  /** Drop rows whose USDEquivalent is below this value. */
  dustThresholdUsd?: number;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || String(value).trim() === "";
}

function cleanNumber(value: string): string {
  return value.trim().replace(/[$,]/g, "");
}

function toDecimalOrNull(value: string | undefined): Decimal | null {
  if (value === undefined || isBlank(value)) return null;
  try {
    return new Decimal(cleanNumber(value));
  } catch {
    return null;
  }
}

const ISO_DATE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

interface ParsedDate {
  date: Date;
  assumedUtc: boolean; // Had a time of day but no offset
}

/**
 * Accepts YYYY-MM-DD, YYYY-MM-DD HH:MM[:SS] with optional offset, and
 * MM/DD/YYYY. Anything without an offset is read as UTC.
 */
export function parseUtcDate(raw: string): ParsedDate | null {
  const value = raw.trim();

  const iso = ISO_DATE.exec(value);
  if (iso) {
    const [, y, m, d, hh, mm, ss, offset] = iso;
    if (offset) {
      const date = new Date(value.replace(" ", "T"));
      return isNaN(date.getTime()) ? null : { date, assumedUtc: false };
    }
    const date = new Date(
      Date.UTC(Number(y), Number(m) - 1, Number(d), Number(hh ?? 0), Number(mm ?? 0), Number(ss ?? 0)),
    );
    if (isNaN(date.getTime()) || date.getUTCDate() !== Number(d)) return null;
    return { date, assumedUtc: hh !== undefined };
  }

  const us = US_DATE.exec(value);
  if (us) {
    const [, m, d, y] = us;
    const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
    if (date.getUTCDate() !== Number(d) || date.getUTCMonth() !== Number(m) - 1) {
      return null;
    }
    return { date, assumedUtc: false };
  }

  return null;
}

/**
 * Stable chronological order: by date, ties keep their original row order.
 */
export function sortTransactions(transactions: Transaction[]): Transaction[] {
  return [...transactions].sort((a, b) => {
    const timeDiff = a.date.getTime() - b.date.getTime();
    if (timeDiff !== 0) return timeDiff;
    return a.rowIndex - b.rowIndex;
  });
}

// ─── Main Parser ─────────────────────────────────────────────────────────────

/**
 * Parses the 15-column transaction export into normalized transactions,
 * filtered to the tax year and above the dust threshold, in chronological
 * order. Negative amounts pass through; the engine reports them per row.
 */
export function parseTransactionsCsv(
  csvContent: string,
  options: CsvParseOptions = {},
): ParseResult {
  const transactions: Transaction[] = [];
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const taxYear = options.taxYear ?? null;
  const dustThreshold = new Decimal(options.dustThresholdUsd ?? DUST_THRESHOLD_USD);

  const trimmed = csvContent.trim();
  if (trimmed === "") {
    return { transactions, errors, warnings };
  }

  const parsed = Papa.parse<Record<string, string>>(trimmed, {
    header: true,
    skipEmptyLines: true,
  });

  // ── Structure: every expected column must be present ──────────────────
  const fields = parsed.meta.fields ?? [];
  const missing = REQUIRED_CSV_COLUMNS.filter((c) => !fields.includes(c));
  if (missing.length > 0) {
    errors.push({
      row: 1,
      field: "",
      message: `Missing required columns: ${missing.join(", ")}`,
    });
    return { transactions, errors, warnings };
  }
  const extra = fields.filter((f) => !REQUIRED_CSV_COLUMNS.includes(f));
  if (extra.length > 0) {
    warnings.push({
      row: 1,
      field: "",
      message: `Extra columns ignored: ${extra.join(", ")}`,
    });
  }

  // Surface PapaParse-level errors
  for (const err of parsed.errors) {
    errors.push({
      row: (err.row ?? -1) + 2,
      field: "",
      message: err.message,
    });
  }

  let outsideYear = 0;
  let dust = 0;

  for (let i = 0; i < parsed.data.length; i++) {
    const row = parsed.data[i];
    const rowNum = i + 2; // 1-indexed, accounting for header row
    const rowErrors: ValidationError[] = [];

    // ── Required: Type ───────────────────────────────────────────────────
    const rawType = row[CSV_HEADERS.TYPE];
    if (isBlank(rawType)) {
      rowErrors.push({ row: rowNum, field: CSV_HEADERS.TYPE, message: "Type is required" });
    }

    // ── Required: Date ───────────────────────────────────────────────────
    const rawDate = row[CSV_HEADERS.DATE];
    let parsedDate: ParsedDate | null = null;
    if (isBlank(rawDate)) {
      rowErrors.push({ row: rowNum, field: CSV_HEADERS.DATE, message: "Date is required" });
    } else {
      parsedDate = parseUtcDate(rawDate);
      if (parsedDate === null) {
        rowErrors.push({
          row: rowNum,
          field: CSV_HEADERS.DATE,
          message: `Invalid date: "${rawDate}"`,
        });
      } else if (parsedDate.assumedUtc) {
        warnings.push({
          row: rowNum,
          field: CSV_HEADERS.DATE,
          message: "Date has no timezone info; UTC will be assumed.",
        });
      }
    }

    // ── Numeric fields ───────────────────────────────────────────────────
    const numbers = new Map<string, Decimal | null>();
    for (const column of [
      CSV_HEADERS.BUY_AMOUNT,
      CSV_HEADERS.SELL_AMOUNT,
      CSV_HEADERS.FEE_AMOUNT,
      CSV_HEADERS.USD_EQUIVALENT,
    ]) {
      const raw = row[column];
      const value = toDecimalOrNull(raw);
      if (!isBlank(raw) && value === null) {
        rowErrors.push({
          row: rowNum,
          field: column,
          message: `Invalid number for ${column}: "${raw}"`,
        });
      }
      numbers.set(column, value);
    }

    if (rowErrors.length > 0 || parsedDate === null) {
      errors.push(...rowErrors);
      continue;
    }

    // ── Filters ──────────────────────────────────────────────────────────
    const date = parsedDate.date;
    if (taxYear !== null && date.getUTCFullYear() !== taxYear) {
      outsideYear++;
      continue;
    }
    const usdEquivalent = numbers.get(CSV_HEADERS.USD_EQUIVALENT) ?? null;
    if (
      usdEquivalent !== null &&
      !usdEquivalent.isNegative() &&
      usdEquivalent.lt(dustThreshold)
    ) {
      dust++;
      continue;
    }

    const text = (column: string): string | undefined => {
      const value = row[column]?.trim();
      return value ? value : undefined;
    };

    const buyAmount = numbers.get(CSV_HEADERS.BUY_AMOUNT) ?? undefined;
    const sellAmount = numbers.get(CSV_HEADERS.SELL_AMOUNT) ?? undefined;
    const feeAmount = numbers.get(CSV_HEADERS.FEE_AMOUNT) ?? undefined;

    transactions.push({
      id: `row-${rowNum}`,
      rowIndex: rowNum,
      type: rawType.trim(),
      date,
      buyAmount,
      buyCurrency: text(CSV_HEADERS.BUY_CURRENCY)?.toUpperCase(),
      sellAmount,
      sellCurrency: text(CSV_HEADERS.SELL_CURRENCY)?.toUpperCase(),
      feeAmount,
      feeCurrency: text(CSV_HEADERS.FEE_CURRENCY)?.toUpperCase(),
      usdEquivalent,
      exchange: text(CSV_HEADERS.EXCHANGE),
      exchangeId: text(CSV_HEADERS.EXCHANGE_ID),
      comment: text(CSV_HEADERS.COMMENT),
    });
  }

  if (outsideYear > 0) {
    warnings.push({
      row: 0,
      field: CSV_HEADERS.DATE,
      message: `Skipped ${outsideYear} transaction(s) outside tax year ${taxYear}`,
    });
  }
  if (dust > 0) {
    warnings.push({
      row: 0,
      field: CSV_HEADERS.USD_EQUIVALENT,
      message: `Skipped ${dust} dust transaction(s) below $${dustThreshold.toString()}`,
    });
  }

  logger.info(
    { rows: parsed.data.length, transactions: transactions.length, errors: errors.length },
    "Parsed transaction CSV",
  );

  return { transactions: sortTransactions(transactions), errors, warnings };
}
