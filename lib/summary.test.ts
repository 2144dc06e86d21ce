import { describe, expect, it } from "vitest";
import { defaultTable, withCell } from "./allocationTable";
import { allocationStatus, summarizeAll, summarizeScenario } from "./summary";

describe("summarizeScenario", () => {
  it("summarizes the default Good scenario", () => {
    expect(summarizeScenario(defaultTable(), "good")).toEqual({
      scenario: "good",
      party1Seats: 168,
      party1Percent: "71.8%",
      allyTotal: 66,
      zeroSeatAllyCount: 1,
      activeAllyCount: 20,
      allyCount: 21,
      allocated: 234,
      allocation: "234/234",
      allocationStatus: "FULL",
    });
  });

  it("counts allies left without seats", () => {
    const table = withCell(withCell(defaultTable(), 2, "worst", 0), 3, "worst", 0);
    const summary = summarizeScenario(table, "worst");
    expect(summary.zeroSeatAllyCount).toBe(3);
    expect(summary.activeAllyCount).toBe(18);
    expect(summary.allocation).toBe("231/234");
    expect(summary.allocationStatus).toBe("SHORT: 3");
  });
});

describe("summarizeAll", () => {
  it("lists the scenarios in Good, Neutral, Worst order", () => {
    const summaries = summarizeAll(defaultTable());
    expect(summaries.map((summary) => summary.scenario)).toEqual(["good", "neutral", "worst"]);
    expect(summaries.map((summary) => summary.party1Percent)).toEqual([
      "71.8%",
      "69.7%",
      "67.5%",
    ]);
  });
});

describe("allocationStatus", () => {
  it("reports shortfalls and overflows", () => {
    expect(allocationStatus(234)).toBe("FULL");
    expect(allocationStatus(230)).toBe("SHORT: 4");
    expect(allocationStatus(240)).toBe("OVER: 6");
  });
});
