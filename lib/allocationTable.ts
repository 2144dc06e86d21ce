import defaultAllocation from "@/data/default-allocation.json";
import { LEAD_PARTY, SCENARIOS, TOTAL_SEATS, type Scenario } from "./config";

export type AllocationRow = {
  party: string;
  good: number;
  neutral: number;
  worst: number;
};

/** Row 0 is always the lead party; every other row is an ally. */
export type AllocationTable = readonly AllocationRow[];

export const defaultTable = (): AllocationTable =>
  defaultAllocation.map((row): AllocationRow => ({ ...row }));

export const readCell = (table: AllocationTable, row: number, scenario: Scenario) => {
  const entry = table[row];
  if (!entry) {
    throw new RangeError(`Row ${row} is outside the allocation table.`);
  }
  return entry[scenario];
};

export const withSeats = (
  entry: AllocationRow,
  scenario: Scenario,
  value: number
): AllocationRow => {
  const next = { ...entry };
  next[scenario] = value;
  return next;
};

export const withCell = (
  table: AllocationTable,
  row: number,
  scenario: Scenario,
  value: number
): AllocationTable =>
  table.map((entry, index) => (index === row ? withSeats(entry, scenario, value) : entry));

export const columnTotal = (table: AllocationTable, scenario: Scenario) =>
  table.reduce((sum, row) => sum + row[scenario], 0);

export const allyTotal = (table: AllocationTable, scenario: Scenario) =>
  table.slice(1).reduce((sum, row) => sum + row[scenario], 0);

export const isBalanced = (table: AllocationTable) =>
  SCENARIOS.every((scenario) => columnTotal(table, scenario) === TOTAL_SEATS);

export const moveLeadPartyFirst = (rows: AllocationRow[]): AllocationRow[] => {
  if (rows.length === 0 || rows[0].party === LEAD_PARTY) return rows;
  const lead = rows.filter((row) => row.party === LEAD_PARTY);
  if (lead.length === 0) return rows;
  return [...lead, ...rows.filter((row) => row.party !== LEAD_PARTY)];
};
