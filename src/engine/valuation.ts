import Decimal from "decimal.js";
import type { AssetLeg, FmvLookup, Transaction } from "@/engine/types";
import { FIAT_CURRENCIES, USD_PEGGED_CURRENCIES } from "@/lib/constants";

/**
 * USD price of one unit of `asset` at `date`. Fiat is 1; pegged stablecoins
 * fall back to 1 when the lookup has no quote.
 */
export function unitPriceUsd(
  asset: string,
  date: Date,
  lookupFmv: FmvLookup,
): Decimal | null {
  const symbol = asset.toUpperCase();
  if (FIAT_CURRENCIES.has(symbol)) return new Decimal(1);

  const quoted = lookupFmv(asset, date);
  if (quoted !== null) return quoted;

  return USD_PEGGED_CURRENCIES.has(symbol) ? new Decimal(1) : null;
}

/**
 * USD value of one leg of a transaction. The row's own USDEquivalent wins
 * (it is the value of the whole exchange, so both legs of a swap share it);
 * otherwise quantity × FMV. Null when neither is available.
 */
export function legValueUsd(
  tx: Transaction,
  leg: AssetLeg,
  lookupFmv: FmvLookup,
): Decimal | null {
  if (tx.usdEquivalent !== null) return tx.usdEquivalent;

  const price = unitPriceUsd(leg.asset, tx.date, lookupFmv);
  return price === null ? null : leg.quantity.mul(price);
}
