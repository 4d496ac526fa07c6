import Decimal from "decimal.js";
import { analyzeMissingFmv } from "@/engine/fmv-coverage";
import { PriceTable } from "@/engine/price-lookup";
import type { Transaction } from "@/engine/types";

function tx(overrides: Partial<Transaction> & { id: string }): Transaction {
  return {
    rowIndex: 2,
    type: "Trade",
    date: new Date("2024-03-10T12:00:00Z"),
    usdEquivalent: null,
    ...overrides,
  };
}

const TRANSACTIONS: Transaction[] = [
  tx({
    id: "row-2",
    buyAmount: new Decimal(1),
    buyCurrency: "BTC",
    sellAmount: new Decimal(40000),
    sellCurrency: "USD",
    exchange: "Kraken",
    usdEquivalent: new Decimal(40000),
  }),
  tx({
    id: "row-3",
    type: "Staking",
    date: new Date("2024-02-01T00:00:00Z"),
    buyAmount: new Decimal("0.5"),
    buyCurrency: "ETH",
    exchange: "Kraken",
  }),
  tx({
    id: "row-4",
    type: "Swap",
    date: new Date("2024-02-20T00:00:00Z"),
    buyAmount: new Decimal(10),
    buyCurrency: "SOL",
    sellAmount: new Decimal("0.1"),
    sellCurrency: "ETH",
  }),
  tx({
    id: "row-5",
    type: "Staking",
    date: new Date("2024-03-01T00:00:00Z"),
    buyAmount: new Decimal("0.1"),
    buyCurrency: "ETH",
    exchange: "Binance",
  }),
];

describe("analyzeMissingFmv", () => {
  it("counts rows without a USD value and breaks them down", () => {
    const coverage = analyzeMissingFmv(TRANSACTIONS);

    expect(coverage.totalTransactions).toBe(4);
    expect(coverage.missingCount).toBe(3);
    expect(coverage.availableCount).toBe(1);
    expect(coverage.missingPercentage).toBe(75);
    expect(coverage.missing.byType).toEqual({ Staking: 2, Swap: 1 });
    expect(coverage.missing.byBuyCurrency).toEqual({ ETH: 2, SOL: 1 });
    expect(coverage.missing.bySellCurrency).toEqual({ ETH: 1 });
    expect(coverage.missing.byExchange).toEqual({ Kraken: 1, Binance: 1 });
    expect(coverage.missing.byMonth).toEqual({ "2024-02": 2, "2024-03": 1 });
    expect(coverage.available.byType).toEqual({ Trade: 1 });
    expect(coverage.available.byBuyCurrency).toEqual({ BTC: 1 });
  });

  it("counts nothing as resolvable without a lookup", () => {
    expect(analyzeMissingFmv(TRANSACTIONS).resolvableCount).toBe(0);
  });

  it("counts rows whose every leg the price table covers", () => {
    const prices = new PriceTable();
    prices.set("ETH", "2024-02-01", 2500);
    prices.set("ETH", "2024-02-20", 2800);
    // No SOL quote, so the swap stays unresolved

    const coverage = analyzeMissingFmv(TRANSACTIONS, prices.asLookup());

    expect(coverage.resolvableCount).toBe(1);
  });

  it("uses the day-before close for rows the table covers that way", () => {
    const prices = new PriceTable();
    prices.set("ETH", "2024-02-29", 3000);

    const coverage = analyzeMissingFmv([TRANSACTIONS[3]], prices.asLookup());

    expect(coverage.resolvableCount).toBe(1);
  });

  it("reports an empty input as zero percent", () => {
    const coverage = analyzeMissingFmv([]);
    expect(coverage.totalTransactions).toBe(0);
    expect(coverage.missingPercentage).toBe(0);
    expect(coverage.missing.byType).toEqual({});
  });
});
