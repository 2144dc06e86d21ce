import type { AllocationRow, AllocationTable } from "./allocationTable";
import {
  BAR_CHART_PARTIES,
  COMPARISON_PARTIES,
  PIE_CHART_PARTIES,
  SCENARIOS,
  type Scenario,
} from "./config";

export type PartySeats = {
  party: string;
  seats: number;
};

export type ComparisonEntry = {
  party: string;
  seats: Record<Scenario, number>;
};

const byScenarioDescending = (scenario: Scenario) => {
  return (
    a: { row: AllocationRow; index: number },
    b: { row: AllocationRow; index: number }
  ) => {
    if (a.row[scenario] === b.row[scenario]) return a.index - b.index;
    return b.row[scenario] - a.row[scenario];
  };
};

const largest = (table: AllocationTable, scenario: Scenario, count: number) =>
  table
    .map((row, index) => ({ row, index }))
    .sort(byScenarioDescending(scenario))
    .slice(0, count)
    .map(({ row }) => row);

export const topParties = (
  table: AllocationTable,
  scenario: Scenario,
  count = BAR_CHART_PARTIES
): PartySeats[] =>
  largest(table, scenario, count).map((row) => ({
    party: row.party,
    seats: row[scenario],
  }));

export const seatedParties = (
  table: AllocationTable,
  scenario: Scenario,
  count = PIE_CHART_PARTIES
): PartySeats[] =>
  table
    .filter((row) => row[scenario] > 0)
    .slice(0, count)
    .map((row) => ({ party: row.party, seats: row[scenario] }));

export const scenarioComparison = (
  table: AllocationTable,
  count = COMPARISON_PARTIES
): ComparisonEntry[] =>
  largest(table, "good", count).map((row) => ({
    party: row.party,
    seats: { good: row.good, neutral: row.neutral, worst: row.worst },
  }));

export const comparisonMaximum = (entries: ComparisonEntry[]) =>
  Math.max(
    0,
    ...entries.flatMap((entry) => SCENARIOS.map((scenario) => entry.seats[scenario]))
  );
