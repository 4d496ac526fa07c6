import Decimal from "decimal.js";

/**
 * Format a Decimal or number as USD currency string.
 * e.g., 1234.56 → "$1,234.56"
 */
export function formatUsd(value: Decimal | number): string {
  const num = value instanceof Decimal ? value.toNumber() : value;
  return new Intl.NumberFormat("en-US", {
    style: "currency",
    currency: "USD",
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  }).format(num);
}

/**
 * Format a crypto amount with up to 8 decimal places, trimming trailing zeros.
 * e.g., 1.50000000 → "1.5", 0.00012345 → "0.00012345"
 */
export function formatCryptoAmount(value: Decimal | number): string {
  const d = value instanceof Decimal ? value : new Decimal(value);
  const fixed = d.toDecimalPlaces(8).toFixed();
  return fixed.includes(".") ? fixed.replace(/\.?0+$/, "") : fixed;
}

/**
 * ISO calendar date (YYYY-MM-DD) in UTC.
 */
export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}
