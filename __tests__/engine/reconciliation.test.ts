import Decimal from "decimal.js";
import { reconcileHoldings } from "@/engine/reconciliation";
import { FlagKind } from "@/engine/types";

function quantities(entries: Record<string, number | string>): Map<string, Decimal> {
  return new Map(
    Object.entries(entries).map(([asset, qty]) => [asset, new Decimal(qty)]),
  );
}

describe("reconcileHoldings", () => {
  it("reports a mismatch with delta = expected - computed", () => {
    const { reports, flags } = reconcileHoldings(
      quantities({ XYZ: "9.5" }),
      quantities({ XYZ: 10 }),
      "SEED",
    );

    expect(reports).toHaveLength(1);
    expect(reports[0].status).toBe("MISMATCH");
    expect(reports[0].delta.toString()).toBe("0.5");
    expect(reports[0].stage).toBe("SEED");
    expect(flags).toHaveLength(1);
    expect(flags[0].kind).toBe(FlagKind.RECONCILIATION_MISMATCH);
    expect(flags[0].asset).toBe("XYZ");
  });

  it("matches within tolerance", () => {
    const { reports, flags } = reconcileHoldings(
      quantities({ BTC: "1.000000001" }),
      quantities({ BTC: 1 }),
      "END",
      new Decimal("0.00000001"),
    );

    expect(reports[0].status).toBe("OK");
    expect(reports[0].delta.toString()).toBe("-1e-9");
    expect(flags).toEqual([]);
  });

  it("treats an asset missing on one side as zero", () => {
    const { reports } = reconcileHoldings(
      quantities({ BTC: 1 }),
      quantities({ ETH: 2 }),
      "END",
    );

    expect(reports.map((r) => [r.asset, r.delta.toString(), r.status])).toEqual([
      ["BTC", "-1", "MISMATCH"],
      ["ETH", "2", "MISMATCH"],
    ]);
  });
});
