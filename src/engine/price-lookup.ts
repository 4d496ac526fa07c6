// ─── Historical Price Table ───────────────────────────────────────────────────
// Daily close prices keyed by ticker and UTC date, exposed to the engine as a
// synchronous FMV lookup. Loading from CryptoCompare happens up front, before
// a run; the engine itself never goes to the network.

import Decimal from "decimal.js";
import type { FmvLookup } from "@/engine/types";
import { toDateKey } from "@/lib/format";
import { getLogger } from "@/lib/logger";

const logger = getLogger("PriceTable");

// ─── CryptoCompare API Types ─────────────────────────────────────────────────

interface HistodayDataPoint {
  time: number;
  close: number;
}

interface HistodayResponse {
  Response: string;
  Message?: string;
  Data?: {
    Data?: HistodayDataPoint[];
  };
}

// ─── Fetch Daily Prices ──────────────────────────────────────────────────────

/**
 * Fetches up to 2000 days of daily close prices ending at `toDate` for a given
 * ticker. Returns a Map keyed by "YYYY-MM-DD" → close price.
 */
export async function fetchDailyPrices(
  ticker: string,
  toDate: Date,
): Promise<Map<string, Decimal>> {
  const toTs = Math.floor(toDate.getTime() / 1000);
  const url =
    `https://min-api.cryptocompare.com/data/v2/histoday` +
    `?fsym=${encodeURIComponent(ticker)}&tsym=USD&limit=2000&toTs=${toTs}`;

  const res = await fetch(url);
  if (!res.ok) {
    throw new Error(`CryptoCompare API returned ${res.status} for ${ticker}`);
  }

  const json = (await res.json()) as HistodayResponse;
  if (json.Response !== "Success" || !json.Data?.Data) {
    throw new Error(
      `CryptoCompare returned no data for ${ticker}: ${json.Message ?? "unknown error"}`,
    );
  }

  const priceMap = new Map<string, Decimal>();
  for (const point of json.Data.Data) {
    if (point.close > 0) {
      priceMap.set(toDateKey(new Date(point.time * 1000)), new Decimal(point.close));
    }
  }
  return priceMap;
}

// ─── Price Table ─────────────────────────────────────────────────────────────

export class PriceTable {
  private readonly prices = new Map<string, Map<string, Decimal>>();

  set(ticker: string, dateKey: string, price: Decimal.Value): void {
    const symbol = ticker.toUpperCase();
    let byDate = this.prices.get(symbol);
    if (!byDate) {
      byDate = new Map();
      this.prices.set(symbol, byDate);
    }
    byDate.set(dateKey, new Decimal(price));
  }

  setAll(ticker: string, prices: Map<string, Decimal>): void {
    for (const [dateKey, price] of prices) {
      this.set(ticker, dateKey, price);
    }
  }

  has(ticker: string): boolean {
    return this.prices.has(ticker.toUpperCase());
  }

  /**
   * Price for `ticker` on the UTC date of `date`. Falls back to the day
   * before and after if an exact match isn't found (e.g., for timezone edge
   * cases in daily OHLCV data).
   */
  lookup(ticker: string, date: Date): Decimal | null {
    const byDate = this.prices.get(ticker.toUpperCase());
    if (!byDate) return null;

    const dateKey = toDateKey(date);
    const exact = byDate.get(dateKey);
    if (exact !== undefined) return exact;

    const day = new Date(dateKey + "T00:00:00Z").getTime();
    const prev = toDateKey(new Date(day - 86_400_000));
    const next = toDateKey(new Date(day + 86_400_000));

    return byDate.get(prev) ?? byDate.get(next) ?? null;
  }

  /** The table as the engine's FMV capability. */
  asLookup(): FmvLookup {
    return (asset, date) => this.lookup(asset, date);
  }

  /**
   * Fetches daily closes for every ticker not already loaded. A ticker that
   * fails to load is reported in the returned warnings and simply stays
   * unpriced, which the engine flags where it matters.
   */
  async loadDailyPrices(tickers: Iterable<string>, toDate: Date): Promise<string[]> {
    const warnings: string[] = [];

    for (const raw of new Set([...tickers].map((t) => t.toUpperCase()))) {
      if (this.has(raw)) continue;
      try {
        const prices = await fetchDailyPrices(raw, toDate);
        if (prices.size === 0) {
          warnings.push(`No price data returned for ${raw}`);
        } else {
          this.setAll(raw, prices);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ ticker: raw }, message);
        warnings.push(`Failed to fetch prices for ${raw}: ${message}`);
      }
    }

    return warnings;
  }
}
