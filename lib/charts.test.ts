import { describe, expect, it } from "vitest";
import { defaultTable } from "./allocationTable";
import { comparisonMaximum, scenarioComparison, seatedParties, topParties } from "./charts";

describe("chart data", () => {
  it("ranks the largest parties, keeping table order on ties", () => {
    const top = topParties(defaultTable(), "good");
    expect(top).toHaveLength(10);
    expect(top.map((entry) => entry.party)).toEqual([
      "Party 1",
      "Party 9",
      "Party 10",
      "Party 21",
      "Party 20",
      "Party 8",
      "Party 11",
      "Party 12",
      "Party 2",
      "Party 13",
    ]);
  });

  it("takes the first seated parties in table order for pie charts", () => {
    expect(seatedParties(defaultTable(), "good").map((entry) => entry.party)).toEqual([
      "Party 1",
      "Party 2",
      "Party 3",
      "Party 4",
      "Party 5",
      "Party 7",
      "Party 8",
      "Party 9",
    ]);
  });

  it("compares the largest Good parties across all scenarios", () => {
    const entries = scenarioComparison(defaultTable());
    expect(entries.map((entry) => entry.party)).toEqual([
      "Party 1",
      "Party 9",
      "Party 10",
      "Party 21",
      "Party 20",
      "Party 8",
    ]);
    expect(entries[1]).toEqual({
      party: "Party 9",
      seats: { good: 22, neutral: 24, worst: 25 },
    });
    expect(comparisonMaximum(entries)).toBe(168);
  });
});
