import { allyTotal, columnTotal, readCell, type AllocationTable } from "./allocationTable";
import { SCENARIOS, TOTAL_SEATS, type Scenario } from "./config";

export type ScenarioSummary = {
  scenario: Scenario;
  party1Seats: number;
  party1Percent: string;
  allyTotal: number;
  zeroSeatAllyCount: number;
  activeAllyCount: number;
  allyCount: number;
  allocated: number;
  allocation: string;
  allocationStatus: string;
};

export const formatNumber = (value: number, digits = 0) =>
  new Intl.NumberFormat("en-US", {
    maximumFractionDigits: digits,
    minimumFractionDigits: digits,
  }).format(value);

export const formatShare = (seats: number) =>
  `${formatNumber((seats / TOTAL_SEATS) * 100, 1)}%`;

export const allocationStatus = (allocated: number) => {
  if (allocated === TOTAL_SEATS) return "FULL";
  if (allocated < TOTAL_SEATS) return `SHORT: ${TOTAL_SEATS - allocated}`;
  return `OVER: ${allocated - TOTAL_SEATS}`;
};

export const summarizeScenario = (
  table: AllocationTable,
  scenario: Scenario
): ScenarioSummary => {
  const allies = table.slice(1);
  const party1Seats = table.length > 0 ? readCell(table, 0, scenario) : 0;
  const allocated = columnTotal(table, scenario);
  const zeroSeatAllyCount = allies.filter((row) => row[scenario] === 0).length;

  return {
    scenario,
    party1Seats,
    party1Percent: formatShare(party1Seats),
    allyTotal: allyTotal(table, scenario),
    zeroSeatAllyCount,
    activeAllyCount: allies.length - zeroSeatAllyCount,
    allyCount: allies.length,
    allocated,
    allocation: `${allocated}/${TOTAL_SEATS}`,
    allocationStatus: allocationStatus(allocated),
  };
};

export const summarizeAll = (table: AllocationTable) =>
  SCENARIOS.map((scenario) => summarizeScenario(table, scenario));
