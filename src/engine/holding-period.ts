import { HoldingTerm } from "@/engine/types";
import { LONG_TERM_HOLDING_DAYS } from "@/lib/constants";

const MS_PER_DAY = 1000 * 60 * 60 * 24;

function utcDayNumber(date: Date): number {
  return Math.floor(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()) /
      MS_PER_DAY,
  );
}

/**
 * Returns the number of UTC calendar days between acquisition and disposal.
 * Time of day is ignored, so a 09:00 buy and a 08:00 sale a year later still
 * count the full calendar difference.
 */
export function getHoldingDays(
  acquisitionDate: Date,
  disposalDate: Date,
): number {
  return utcDayNumber(disposalDate) - utcDayNumber(acquisitionDate);
}

/**
 * IRS rule: an asset must be held for MORE than one year (>365 days)
 * to qualify for long-term capital gains treatment.
 */
export function isLongTerm(
  acquisitionDate: Date,
  disposalDate: Date,
): boolean {
  return getHoldingDays(acquisitionDate, disposalDate) > LONG_TERM_HOLDING_DAYS;
}

export function getHoldingTerm(
  acquisitionDate: Date,
  disposalDate: Date,
): HoldingTerm {
  return isLongTerm(acquisitionDate, disposalDate)
    ? HoldingTerm.LONG
    : HoldingTerm.SHORT;
}
