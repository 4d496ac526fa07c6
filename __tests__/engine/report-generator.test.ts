import Decimal from "decimal.js";
import {
  generateForm8949,
  generateReport,
  generateScheduleD,
  summarizeDisposals,
  summarizeFees,
  summarizeHoldings,
  summarizeIncome,
} from "@/engine/report-generator";
import { calculateTaxes } from "@/engine/tax-calculator";
import {
  DisposalKind,
  FeeTreatment,
  HoldingTerm,
  IncomeCategory,
  LotOrigin,
  type FeeRecord,
  type Form8949Row,
  type GainRecord,
  type IncomeRecord,
  type Lot,
  type Transaction,
} from "@/engine/types";

function gain(overrides: Partial<GainRecord>): GainRecord {
  return {
    id: "row-2#1",
    transactionId: "row-2",
    asset: "BTC",
    disposalKind: DisposalKind.TRADE,
    disposalDate: new Date("2024-06-01T00:00:00Z"),
    acquisitionDate: new Date("2024-01-01T00:00:00Z"),
    quantity: new Decimal("1.5"),
    proceedsUsd: new Decimal(100),
    feeUsd: new Decimal(0),
    basisUsd: new Decimal(40),
    gainUsd: new Decimal(60),
    term: HoldingTerm.SHORT,
    holdingDays: 152,
    sourceLotIds: ["lot-1"],
    ...overrides,
  };
}

function row(gainOrLoss: number, isLongTerm: boolean): Form8949Row {
  return {
    description: "1 BTC",
    dateAcquired: new Date("2023-01-01T00:00:00Z"),
    dateSold: new Date("2024-06-01T00:00:00Z"),
    proceeds: new Decimal(0),
    costBasis: new Decimal(0),
    gainOrLoss: new Decimal(gainOrLoss),
    isLongTerm,
    holdingDays: isLongTerm ? 517 : 100,
  };
}

describe("generateForm8949", () => {
  it("one row per gain record", () => {
    const rows = generateForm8949([gain({}), gain({ term: HoldingTerm.LONG, asset: "ETH", quantity: new Decimal(100) })]);

    expect(rows).toHaveLength(2);
    expect(rows[0].description).toBe("1.5 BTC");
    expect(rows[0].isLongTerm).toBe(false);
    expect(rows[0].gainOrLoss.toNumber()).toBe(60);
    expect(rows[1].description).toBe("100 ETH");
    expect(rows[1].isLongTerm).toBe(true);
  });
});

describe("generateScheduleD", () => {
  it("nets gains and losses by term", () => {
    const summary = generateScheduleD([
      row(500, false),
      row(-200, false),
      row(1000, true),
      row(-300, true),
    ]);

    expect(summary.shortTermGains.toNumber()).toBe(500);
    expect(summary.shortTermLosses.toNumber()).toBe(-200);
    expect(summary.netShortTerm.toNumber()).toBe(300);
    expect(summary.netLongTerm.toNumber()).toBe(700);
    expect(summary.totalNetGainOrLoss.toNumber()).toBe(1000);
    expect(summary.allowableLossDeduction.toNumber()).toBe(0);
    expect(summary.lossCarryover.toNumber()).toBe(0);
  });

  it("caps a net loss at the deduction limit and carries the rest", () => {
    const summary = generateScheduleD([row(-5000, false), row(500, true)]);

    expect(summary.totalNetGainOrLoss.toNumber()).toBe(-4500);
    expect(summary.allowableLossDeduction.toNumber()).toBe(3000);
    expect(summary.lossCarryover.toNumber()).toBe(1500);
  });

  it("takes a custom loss limit", () => {
    const summary = generateScheduleD([row(-5000, false)], 1500);
    expect(summary.allowableLossDeduction.toNumber()).toBe(1500);
    expect(summary.lossCarryover.toNumber()).toBe(3500);
  });
});

describe("summarizeIncome", () => {
  it("totals by category", () => {
    const record = (category: IncomeCategory, fmv: number): IncomeRecord => ({
      id: "row-2#income",
      transactionId: "row-2",
      asset: "ETH",
      date: new Date("2024-03-01T00:00:00Z"),
      quantity: new Decimal(1),
      fmvUsd: new Decimal(fmv),
      category,
      resultingLotId: "lot-1",
    });

    const summary = summarizeIncome([
      record(IncomeCategory.STAKING, 100),
      record(IncomeCategory.STAKING, 50),
      record(IncomeCategory.AIRDROP, 25),
    ]);

    expect(summary.total.toNumber()).toBe(175);
    expect(summary.byCategory[IncomeCategory.STAKING].toNumber()).toBe(150);
    expect(summary.byCategory[IncomeCategory.AIRDROP].toNumber()).toBe(25);
    expect(summary.byCategory[IncomeCategory.MINING].toNumber()).toBe(0);
  });
});

describe("summarizeHoldings", () => {
  function lot(asset: string, quantity: number, unitCost: number): Lot {
    return {
      id: `lot-${asset}-${quantity}`,
      asset,
      originalQuantity: new Decimal(quantity),
      quantity: new Decimal(quantity),
      unitCostBasisUsd: new Decimal(unitCost),
      acquisitionDate: new Date("2024-01-01T00:00:00Z"),
      origin: LotOrigin.ACQUIRED,
      sourceTransactionId: null,
    };
  }

  it("totals quantity and basis per asset, sorted by asset", () => {
    const holdings = summarizeHoldings([
      lot("ETH", 2, 1000),
      lot("BTC", 1, 20000),
      lot("ETH", 1, 4000),
    ]);

    expect(holdings.map((h) => h.asset)).toEqual(["BTC", "ETH"]);
    expect(holdings[1].quantity.toNumber()).toBe(3);
    expect(holdings[1].totalBasisUsd.toNumber()).toBe(6000);
    expect(holdings[1].lotCount).toBe(2);
    expect(holdings[1].averageUnitBasisUsd.toNumber()).toBe(2000);
  });

  it("returns nothing for no lots", () => {
    expect(summarizeHoldings([])).toEqual([]);
  });
});

describe("summarizeDisposals", () => {
  it("totals by term and by asset, counting disposing transactions once", () => {
    const summary = summarizeDisposals([
      gain({ id: "row-2#1", quantity: new Decimal(1), proceedsUsd: new Decimal(100), basisUsd: new Decimal(40), gainUsd: new Decimal(60) }),
      gain({ id: "row-2#2", quantity: new Decimal(1), proceedsUsd: new Decimal(100), basisUsd: new Decimal(130), gainUsd: new Decimal(-30), term: HoldingTerm.LONG }),
      gain({ id: "row-5#1", transactionId: "row-5", asset: "ETH", quantity: new Decimal(2), proceedsUsd: new Decimal(50), basisUsd: new Decimal(20), gainUsd: new Decimal(30) }),
    ]);

    expect(summary.disposalCount).toBe(2);
    expect(summary.recordCount).toBe(3);
    expect(summary.proceedsUsd.toNumber()).toBe(250);
    expect(summary.basisUsd.toNumber()).toBe(190);
    expect(summary.gainUsd.toNumber()).toBe(60);
    expect(summary.shortTermGainUsd.toNumber()).toBe(90);
    expect(summary.longTermGainUsd.toNumber()).toBe(-30);
    expect(Object.keys(summary.byAsset)).toEqual(["BTC", "ETH"]);
    expect(summary.byAsset.BTC.quantity.toNumber()).toBe(2);
    expect(summary.byAsset.BTC.gainUsd.toNumber()).toBe(30);
    expect(summary.byAsset.ETH.proceedsUsd.toNumber()).toBe(50);
  });
});

describe("summarizeFees", () => {
  function fee(overrides: Partial<FeeRecord>): FeeRecord {
    return {
      transactionId: "row-2",
      date: new Date("2024-03-01T00:00:00Z"),
      currency: "USD",
      amount: new Decimal(5),
      feeUsd: new Decimal(5),
      treatment: FeeTreatment.ADD_TO_BASIS,
      unpriced: false,
      ...overrides,
    };
  }

  it("counts by treatment and currency and averages the USD value", () => {
    const summary = summarizeFees([
      fee({}),
      fee({ transactionId: "row-3", treatment: FeeTreatment.REDUCE_PROCEEDS, feeUsd: new Decimal(7) }),
      fee({ transactionId: "row-4", currency: "XYZ", feeUsd: new Decimal(0), treatment: FeeTreatment.REDUCE_PROCEEDS, unpriced: true }),
    ]);

    expect(summary.feeCount).toBe(3);
    expect(summary.totalFeeUsd.toNumber()).toBe(12);
    expect(summary.averageFeeUsd.toNumber()).toBe(4);
    expect(summary.unpricedCount).toBe(1);
    expect(summary.byTreatment).toEqual({
      [FeeTreatment.ADD_TO_BASIS]: 1,
      [FeeTreatment.REDUCE_PROCEEDS]: 2,
      [FeeTreatment.NONE]: 0,
    });
    expect(summary.byCurrency).toEqual({ USD: 2, XYZ: 1 });
  });

  it("averages to zero with no fees", () => {
    const summary = summarizeFees([]);
    expect(summary.feeCount).toBe(0);
    expect(summary.averageFeeUsd.toNumber()).toBe(0);
  });
});

describe("generateReport", () => {
  it("keeps only records dated in the tax year", () => {
    const transactions: Transaction[] = [
      {
        id: "row-2",
        rowIndex: 2,
        type: "Trade",
        date: new Date("2023-12-01T00:00:00Z"),
        buyAmount: new Decimal(2),
        buyCurrency: "BTC",
        sellAmount: new Decimal(200),
        sellCurrency: "USD",
        usdEquivalent: new Decimal(200),
      },
      {
        id: "row-3",
        rowIndex: 3,
        type: "Trade",
        date: new Date("2023-12-31T23:00:00Z"),
        buyAmount: new Decimal(150),
        buyCurrency: "USD",
        sellAmount: new Decimal(1),
        sellCurrency: "BTC",
        usdEquivalent: new Decimal(150),
      },
      {
        id: "row-4",
        rowIndex: 4,
        type: "Trade",
        date: new Date("2024-01-01T01:00:00Z"),
        buyAmount: new Decimal(80),
        buyCurrency: "USD",
        sellAmount: new Decimal(1),
        sellCurrency: "BTC",
        usdEquivalent: new Decimal(80),
      },
    ];

    const report = generateReport(calculateTaxes({ transactions }), 2024);

    expect(report.gains.map((g) => g.transactionId)).toEqual(["row-4"]);
    expect(report.scheduleDSummary.totalNetGainOrLoss.toNumber()).toBe(-20);
    expect(report.scheduleDSummary.allowableLossDeduction.toNumber()).toBe(20);
    expect(report.form8949Rows).toHaveLength(1);
  });

  it("adds fee, disposal and holding summaries", () => {
    const transactions: Transaction[] = [
      {
        id: "row-2",
        rowIndex: 2,
        type: "Trade",
        date: new Date("2023-12-01T00:00:00Z"),
        buyAmount: new Decimal(2),
        buyCurrency: "BTC",
        sellAmount: new Decimal(200),
        sellCurrency: "USD",
        feeAmount: new Decimal(2),
        feeCurrency: "USD",
        usdEquivalent: new Decimal(200),
      },
      {
        id: "row-3",
        rowIndex: 3,
        type: "Trade",
        date: new Date("2024-02-01T00:00:00Z"),
        buyAmount: new Decimal(150),
        buyCurrency: "USD",
        sellAmount: new Decimal(1),
        sellCurrency: "BTC",
        feeAmount: new Decimal(1),
        feeCurrency: "USD",
        usdEquivalent: new Decimal(150),
      },
    ];

    const result = calculateTaxes({ transactions });
    expect(result.fees.map((f) => [f.transactionId, f.treatment])).toEqual([
      ["row-2", FeeTreatment.ADD_TO_BASIS],
      ["row-3", FeeTreatment.REDUCE_PROCEEDS],
    ]);

    const report = generateReport(result, 2024);

    expect(report.fees.map((f) => f.transactionId)).toEqual(["row-3"]);
    expect(report.feeSummary.totalFeeUsd.toNumber()).toBe(1);
    expect(report.disposalSummary.proceedsUsd.toNumber()).toBe(149);
    expect(report.disposalSummary.basisUsd.toNumber()).toBe(101);
    expect(report.disposalSummary.shortTermGainUsd.toNumber()).toBe(48);
    expect(report.holdings).toHaveLength(1);
    expect(report.holdings[0].asset).toBe("BTC");
    expect(report.holdings[0].quantity.toNumber()).toBe(1);
    expect(report.holdings[0].averageUnitBasisUsd.toNumber()).toBe(101);
  });
});
