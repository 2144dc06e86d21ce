import { allyTotal, readCell, type AllocationTable } from "./allocationTable";
import {
  PREVIEW_ALLY_LIMIT,
  WHAT_IF_MAX,
  WHAT_IF_MIN,
  type Scenario,
} from "./config";

export type AllyImpact = {
  party: string;
  before: number;
  after: number;
};

export type WhatIfPreview = {
  current: number;
  target: number;
  direction: "loss" | "gain" | "none";
  /** Seats the allies would lose or gain in total. */
  total: number;
  impacts: AllyImpact[];
};

export const clampWhatIfTarget = (value: number) =>
  Math.min(WHAT_IF_MAX, Math.max(WHAT_IF_MIN, Math.round(value)));

/** A `null` target means the slider has not been moved yet. */
export const previewLeadPartyChange = (
  table: AllocationTable,
  scenario: Scenario,
  target: number | null
): WhatIfPreview => {
  const current = readCell(table, 0, scenario);
  const clamped = target === null ? current : clampWhatIfTarget(target);
  const difference = clamped - current;
  const direction = difference > 0 ? "loss" : difference < 0 ? "gain" : "none";
  const total = allyTotal(table, scenario);

  // Same proportional split the rebalancer applies to a lead-party edit.
  const impacts =
    direction === "none" || total === 0
      ? []
      : table
          .slice(1, PREVIEW_ALLY_LIMIT + 1)
          .filter((row) => row[scenario] > 0)
          .map((row) => {
            const before = row[scenario];
            const change = Math.trunc(difference * (before / total));
            return { party: row.party, before, after: Math.max(0, before - change) };
          });

  return {
    current,
    target: clamped,
    direction,
    total: Math.abs(difference),
    impacts,
  };
};
