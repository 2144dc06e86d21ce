import { describe, expect, it } from "vitest";
import { defaultTable, type AllocationTable } from "./allocationTable";
import { previewLeadPartyChange } from "./whatIf";

const smallTable: AllocationTable = [
  { party: "Party 1", good: 100, neutral: 100, worst: 100 },
  { party: "Party 2", good: 50, neutral: 50, worst: 50 },
  { party: "Party 3", good: 30, neutral: 30, worst: 30 },
  { party: "Party 4", good: 0, neutral: 0, worst: 0 },
  { party: "Party 5", good: 54, neutral: 54, worst: 54 },
];

describe("previewLeadPartyChange", () => {
  it("splits a lead-party gain over the seated allies", () => {
    expect(previewLeadPartyChange(smallTable, "good", 120)).toEqual({
      current: 100,
      target: 120,
      direction: "loss",
      total: 20,
      impacts: [
        { party: "Party 2", before: 50, after: 43 },
        { party: "Party 3", before: 30, after: 26 },
        { party: "Party 5", before: 54, after: 46 },
      ],
    });
  });

  it("reports the seats allies would gain when Party 1 drops", () => {
    const table = defaultTable();
    const preview = previewLeadPartyChange(table, "good", 150);

    expect(preview.direction).toBe("gain");
    expect(preview.total).toBe(18);
    expect(preview.impacts.map((impact) => impact.party)).toEqual([
      "Party 2",
      "Party 3",
      "Party 4",
      "Party 5",
    ]);
    expect(table).toEqual(defaultTable());
  });

  it("only looks at the first five allies", () => {
    const preview = previewLeadPartyChange(defaultTable(), "worst", 200);
    // Party 6 holds no seats and Party 7 is past the first five allies.
    expect(preview.impacts.map((impact) => impact.party)).toEqual([
      "Party 2",
      "Party 3",
      "Party 4",
      "Party 5",
    ]);
    expect(preview.impacts[0]).toEqual({ party: "Party 2", before: 2, after: 1 });
  });

  it("clamps the target to the slider range", () => {
    const preview = previewLeadPartyChange(smallTable, "good", 40);
    expect(preview.target).toBe(100);
    expect(preview.direction).toBe("none");
    expect(preview.total).toBe(0);
    expect(preview.impacts).toEqual([]);
  });

  it("shows no change until a target is chosen", () => {
    const table: AllocationTable = [
      { party: "Party 1", good: 71, neutral: 71, worst: 71 },
      { party: "Party 2", good: 163, neutral: 163, worst: 163 },
    ];
    expect(previewLeadPartyChange(table, "good", null)).toEqual({
      current: 71,
      target: 71,
      direction: "none",
      total: 0,
      impacts: [],
    });
  });
});
