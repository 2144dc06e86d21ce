import { defaultTable, readCell, type AllocationTable } from "./allocationTable";
import { DEFAULT_SCENARIO, type Scenario } from "./config";
import { rebalance, type RebalanceOptions } from "./rebalance";
import { InvalidUploadError, parseUpload } from "./upload";

export type SessionStatus =
  | { kind: "idle" }
  | { kind: "success"; message: string }
  | { kind: "error"; message: string };

export type SessionState = {
  original: AllocationTable;
  current: AllocationTable;
  scenario: Scenario;
  status: SessionStatus;
};

export type SessionCommand =
  | { type: "selectScenario"; scenario: Scenario }
  | { type: "editCell"; row: number; value: number }
  | { type: "reset" }
  | { type: "loadTable"; table: AllocationTable; source: string }
  | { type: "reportError"; message: string }
  | { type: "dismissStatus" };

const IDLE: SessionStatus = { kind: "idle" };

export const createSession = (
  scenario: Scenario = DEFAULT_SCENARIO,
  original: AllocationTable = defaultTable()
): SessionState => ({
  original,
  current: original,
  scenario,
  status: IDLE,
});

const editCell = (
  state: SessionState,
  row: number,
  value: number,
  options: RebalanceOptions
): SessionState => {
  try {
    const oldValue = readCell(state.current, row, state.scenario);
    if (oldValue === value) return state;
    const current = rebalance(
      state.current,
      { scenario: state.scenario, row, oldValue, newValue: value },
      options
    );
    return { ...state, current, status: IDLE };
  } catch (error) {
    if (!(error instanceof RangeError)) throw error;
    return { ...state, status: { kind: "error", message: error.message } };
  }
};

export const applyCommand = (
  state: SessionState,
  command: SessionCommand,
  options: RebalanceOptions = {}
): SessionState => {
  switch (command.type) {
    case "selectScenario":
      return { ...state, scenario: command.scenario };
    case "editCell":
      return editCell(state, command.row, command.value, options);
    case "reset":
      return { ...state, current: state.original, status: IDLE };
    case "loadTable":
      return {
        ...state,
        current: command.table,
        status: { kind: "success", message: `Loaded ${command.source}.` },
      };
    case "reportError":
      return { ...state, status: { kind: "error", message: command.message } };
    case "dismissStatus":
      return { ...state, status: IDLE };
  }
};

export const commandFromUpload = (
  fileName: string,
  content: ArrayBuffer
): SessionCommand => {
  try {
    return { type: "loadTable", table: parseUpload(fileName, content), source: fileName };
  } catch (error) {
    if (!(error instanceof InvalidUploadError)) throw error;
    return { type: "reportError", message: error.message };
  }
};
