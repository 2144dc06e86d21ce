import { timeFormat } from "d3";
import Papa from "papaparse";
import * as XLSX from "xlsx";
import type { AllocationTable } from "./allocationTable";
import { scenarioLabel } from "./config";
import { summarizeAll } from "./summary";

export type ExportFormat = "xlsx" | "csv";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["xlsx", "csv"];

export const ALLOCATION_SHEET = "Seat_Allocation";
export const SUMMARY_SHEET = "Summary";

export const ALLOCATION_COLUMNS = ["Party", "Good", "Neutral", "Worst"];
export const SUMMARY_COLUMNS = [
  "Scenario",
  "Party 1 Seats",
  "Party 1 %",
  "Allies Total",
  "Zero Seat Allies",
];

export const EXPORT_CONTENT_TYPES: Record<ExportFormat, string> = {
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  csv: "text/csv",
};

const stampToMinute = timeFormat("%Y%m%d_%H%M");
const stampToDay = timeFormat("%Y%m%d");

export const isExportFormat = (value: string | null): value is ExportFormat =>
  EXPORT_FORMATS.some((format) => format === value);

export const exportFileName = (format: ExportFormat, date: Date) =>
  format === "xlsx"
    ? `seat_allocation_${stampToMinute(date)}.xlsx`
    : `seat_allocation_${stampToDay(date)}.csv`;

const allocationRows = (table: AllocationTable) =>
  table.map((row) => [row.party, row.good, row.neutral, row.worst]);

const summaryRows = (table: AllocationTable) =>
  summarizeAll(table).map((summary) => [
    scenarioLabel(summary.scenario),
    summary.party1Seats,
    summary.party1Percent,
    summary.allyTotal,
    summary.zeroSeatAllyCount,
  ]);

export const buildWorkbook = (table: AllocationTable): XLSX.WorkBook => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet([ALLOCATION_COLUMNS, ...allocationRows(table)]),
    ALLOCATION_SHEET
  );
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet([SUMMARY_COLUMNS, ...summaryRows(table)]),
    SUMMARY_SHEET
  );
  return workbook;
};

export const toXlsx = (table: AllocationTable): ArrayBuffer =>
  XLSX.write(buildWorkbook(table), { type: "array", bookType: "xlsx" });

export const toCsv = (table: AllocationTable) =>
  Papa.unparse({ fields: ALLOCATION_COLUMNS, data: allocationRows(table) });
