import Decimal from "decimal.js";
import { fetchDailyPrices, PriceTable } from "@/engine/price-lookup";
import { calculateTaxes } from "@/engine/tax-calculator";

// ─── Mock fetch globally ─────────────────────────────────────────────────────

const mockFetch = jest.spyOn(global, "fetch");

beforeEach(() => {
  mockFetch.mockReset();
});

afterAll(() => {
  mockFetch.mockRestore();
});

// ─── Helper: build a CryptoCompare-style response ───────────────────────────

function makeCCResponse(
  dataPoints: { time: number; close: number }[],
): Response {
  return new Response(
    JSON.stringify({
      Response: "Success",
      Data: { Data: dataPoints },
    }),
    { status: 200, headers: { "Content-Type": "application/json" } },
  );
}

function makeErrorResponse(message: string): Response {
  return new Response(
    JSON.stringify({ Response: "Error", Message: message }),
    { status: 200, headers: { "Content-Type": "application/json" } },
  );
}

// 2024-03-15T00:00:00Z
const MAR_15 = 1710460800;
const DAY = 86400;

// ─── fetchDailyPrices ────────────────────────────────────────────────────────

describe("fetchDailyPrices", () => {
  it("should return a Map of date → close price", async () => {
    mockFetch.mockResolvedValueOnce(
      makeCCResponse([
        { time: MAR_15, close: 65000 },
        { time: MAR_15 + DAY, close: 66000 },
        { time: MAR_15 + 2 * DAY, close: 0 },
      ]),
    );

    const result = await fetchDailyPrices("BTC", new Date("2024-03-17"));

    expect(result.size).toBe(2);
    expect(result.get("2024-03-15")?.toNumber()).toBe(65000);
    expect(result.get("2024-03-16")?.toNumber()).toBe(66000);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("should throw on an HTTP error", async () => {
    mockFetch.mockResolvedValueOnce(new Response("", { status: 500 }));
    await expect(fetchDailyPrices("BTC", new Date())).rejects.toThrow(
      "CryptoCompare API returned 500 for BTC",
    );
  });

  it("should throw when the API reports an error", async () => {
    mockFetch.mockResolvedValueOnce(makeErrorResponse("market does not exist"));
    await expect(fetchDailyPrices("NOPE", new Date())).rejects.toThrow(
      "CryptoCompare returned no data for NOPE: market does not exist",
    );
  });
});

// ─── PriceTable ──────────────────────────────────────────────────────────────

describe("PriceTable", () => {
  it("finds the exact day, then the day before or after", () => {
    const table = new PriceTable();
    table.set("btc", "2024-03-15", 65000);

    expect(table.lookup("BTC", new Date("2024-03-15T18:00:00Z"))?.toNumber()).toBe(65000);
    expect(table.lookup("BTC", new Date("2024-03-16T01:00:00Z"))?.toNumber()).toBe(65000);
    expect(table.lookup("BTC", new Date("2024-03-14T23:00:00Z"))?.toNumber()).toBe(65000);
    expect(table.lookup("BTC", new Date("2024-03-17T00:00:00Z"))).toBeNull();
    expect(table.lookup("ETH", new Date("2024-03-15T00:00:00Z"))).toBeNull();
  });

  it("loads each ticker once and collects failures as warnings", async () => {
    mockFetch
      .mockResolvedValueOnce(makeCCResponse([{ time: MAR_15, close: 3500 }]))
      .mockResolvedValueOnce(makeErrorResponse("market does not exist"));

    const table = new PriceTable();
    const warnings = await table.loadDailyPrices(["ETH", "eth", "NOPE"], new Date("2024-03-16"));

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(table.has("ETH")).toBe(true);
    expect(table.has("NOPE")).toBe(false);
    expect(warnings).toEqual([
      "Failed to fetch prices for NOPE: CryptoCompare returned no data for NOPE: market does not exist",
    ]);
  });

  it("skips tickers already in the table", async () => {
    const table = new PriceTable();
    table.set("BTC", "2024-03-15", 65000);

    const warnings = await table.loadDailyPrices(["BTC"], new Date("2024-03-16"));

    expect(warnings).toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("prices unquoted staking income through the engine", () => {
    const table = new PriceTable();
    table.set("ETH", "2024-03-15", new Decimal(3500));

    const result = calculateTaxes(
      {
        transactions: [
          {
            id: "row-2",
            rowIndex: 2,
            type: "Staking",
            date: new Date("2024-03-15T08:00:00Z"),
            buyAmount: new Decimal("0.1"),
            buyCurrency: "ETH",
            usdEquivalent: null,
          },
        ],
      },
      { lookupFmv: table.asLookup() },
    );

    expect(result.income[0].fmvUsd.toNumber()).toBe(350);
  });
});
