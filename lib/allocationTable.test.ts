import { describe, expect, it } from "vitest";
import {
  allyTotal,
  columnTotal,
  defaultTable,
  isBalanced,
  moveLeadPartyFirst,
  readCell,
  withCell,
  type AllocationRow,
} from "./allocationTable";

const row = (party: string, seats: number): AllocationRow => ({
  party,
  good: seats,
  neutral: seats,
  worst: seats,
});

describe("default table", () => {
  it("has Party 1 first followed by 21 allies", () => {
    const table = defaultTable();
    expect(table).toHaveLength(22);
    expect(table[0].party).toBe("Party 1");
    expect(table[21].party).toBe("Party 22");
  });

  it("fills the seat pool in every scenario", () => {
    const table = defaultTable();
    expect(isBalanced(table)).toBe(true);
    expect(allyTotal(table, "good")).toBe(66);
    expect(allyTotal(table, "neutral")).toBe(71);
    expect(allyTotal(table, "worst")).toBe(76);
  });

  it("returns a fresh copy each time", () => {
    const first = defaultTable();
    const edited = withCell(first, 0, "good", 1);
    expect(readCell(edited, 0, "good")).toBe(1);
    expect(readCell(first, 0, "good")).toBe(168);
    expect(defaultTable()[0].good).toBe(168);
  });
});

describe("cells", () => {
  it("reads and writes a single scenario cell", () => {
    const table = withCell(defaultTable(), 8, "worst", 30);
    expect(readCell(table, 8, "worst")).toBe(30);
    expect(readCell(table, 8, "good")).toBe(22);
    expect(columnTotal(table, "worst")).toBe(239);
    expect(isBalanced(table)).toBe(false);
  });

  it("rejects rows outside the table", () => {
    expect(() => readCell(defaultTable(), 40, "good")).toThrow(RangeError);
  });
});

describe("moveLeadPartyFirst", () => {
  it("moves Party 1 to the top and keeps the other rows in order", () => {
    const rows = [row("Party 3", 10), row("Party 1", 200), row("Party 2", 24)];
    expect(moveLeadPartyFirst(rows).map((entry) => entry.party)).toEqual([
      "Party 1",
      "Party 3",
      "Party 2",
    ]);
  });

  it("leaves tables without Party 1 in their given order", () => {
    const rows = [row("Alpha", 200), row("Beta", 34)];
    expect(moveLeadPartyFirst(rows)).toBe(rows);
  });
});
