import { getHoldingDays, getHoldingTerm, isLongTerm } from "@/engine/holding-period";
import { HoldingTerm } from "@/engine/types";

describe("holding period", () => {
  it("counts UTC calendar days, ignoring time of day", () => {
    expect(
      getHoldingDays(new Date("2023-01-01T09:00:00Z"), new Date("2024-01-02T08:00:00Z")),
    ).toBe(366);
  });

  it("needs more than 365 days for long-term", () => {
    const acquired = new Date("2023-03-01T00:00:00Z");
    expect(isLongTerm(acquired, new Date("2024-02-29T00:00:00Z"))).toBe(false);
    expect(isLongTerm(acquired, new Date("2024-03-01T00:00:00Z"))).toBe(true);
    expect(getHoldingTerm(acquired, new Date("2023-03-02T00:00:00Z"))).toBe(HoldingTerm.SHORT);
  });
});
