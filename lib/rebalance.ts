import {
  allyTotal,
  columnTotal,
  readCell,
  withCell,
  withSeats,
  type AllocationTable,
} from "./allocationTable";
import { SCENARIOS, TOTAL_SEATS, type Scenario } from "./config";

export type CellEdit = {
  scenario: Scenario;
  row: number;
  oldValue: number;
  newValue: number;
};

export type RebalanceOptions = {
  /** Reject edits outside [0, TOTAL_SEATS] instead of coercing them. */
  strict?: boolean;
  /** Scenarios whose edits are scaled into the other scenarios. */
  propagateFrom?: readonly Scenario[];
};

const DEFAULT_PROPAGATION: readonly Scenario[] = ["good"];

const clampSeats = (value: number) => Math.max(0, Math.min(TOTAL_SEATS, value));

const assertEditable = (table: AllocationTable, edit: CellEdit, strict: boolean) => {
  if (!Number.isInteger(edit.row) || edit.row < 0 || edit.row >= table.length) {
    throw new RangeError(`Row ${edit.row} is outside the allocation table.`);
  }
  if (
    strict &&
    (!Number.isInteger(edit.newValue) || edit.newValue < 0 || edit.newValue > TOTAL_SEATS)
  ) {
    throw new RangeError(
      `Seat counts must be whole numbers between 0 and ${TOTAL_SEATS}.`
    );
  }
};

/**
 * Keeps the edited column zero-sum. A lead-party edit is spread over the allies
 * in proportion to their share of the ally total; an ally edit is absorbed by
 * the lead party.
 */
export const applyZeroSum = (table: AllocationTable, edit: CellEdit): AllocationTable => {
  const { scenario, row, oldValue, newValue } = edit;
  const delta = newValue - oldValue;

  if (row === 0) {
    const total = allyTotal(table, scenario);
    const adjusted =
      total > 0 && delta !== 0
        ? table.map((entry, index) => {
            if (index === 0) return entry;
            const proportion = entry[scenario] / total;
            const adjustment = Math.trunc(delta * proportion);
            return withSeats(entry, scenario, Math.max(0, entry[scenario] - adjustment));
          })
        : table;
    return withCell(adjusted, 0, scenario, newValue);
  }

  const lead = readCell(table, 0, scenario);
  return withCell(
    withCell(table, row, scenario, newValue),
    0,
    scenario,
    Math.max(0, lead - delta)
  );
};

/** Scales the edited row in the other scenarios by new / old. */
export const propagateAcrossScenarios = (
  table: AllocationTable,
  edit: CellEdit
): AllocationTable => {
  const ratio = edit.oldValue > 0 ? edit.newValue / edit.oldValue : 1;
  return SCENARIOS.filter((scenario) => scenario !== edit.scenario).reduce(
    (next, scenario) =>
      withCell(
        next,
        edit.row,
        scenario,
        Math.trunc(readCell(next, edit.row, scenario) * ratio)
      ),
    table
  );
};

/** Pushes every column back to TOTAL_SEATS through the lead party. */
export const correctTotals = (table: AllocationTable): AllocationTable =>
  SCENARIOS.reduce((next, scenario) => {
    const total = columnTotal(next, scenario);
    if (total === TOTAL_SEATS || next.length === 0) return next;
    const lead = readCell(next, 0, scenario) + (TOTAL_SEATS - total);
    return withCell(next, 0, scenario, clampSeats(lead));
  }, table);

export const rebalance = (
  table: AllocationTable,
  edit: CellEdit,
  options: RebalanceOptions = {}
): AllocationTable => {
  const { strict = false, propagateFrom = DEFAULT_PROPAGATION } = options;
  assertEditable(table, edit, strict);

  const balanced = applyZeroSum(table, edit);
  const propagated = propagateFrom.includes(edit.scenario)
    ? propagateAcrossScenarios(balanced, edit)
    : balanced;
  return correctTotals(propagated);
};
