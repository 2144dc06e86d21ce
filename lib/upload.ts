import Papa from "papaparse";
import * as XLSX from "xlsx";
import { z } from "zod";
import { moveLeadPartyFirst, type AllocationRow, type AllocationTable } from "./allocationTable";

export const REQUIRED_COLUMNS = ["Party", "Good", "Neutral", "Worst"] as const;

export class InvalidUploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidUploadError";
  }
}

type RawSheet = {
  columns: string[];
  records: Record<string, unknown>[];
};

const seatCount = z.preprocess(
  (value) => (typeof value === "string" && value.trim() !== "" ? Number(value) : value),
  z.number().int().nonnegative()
);

const partyName = z.preprocess(
  (value) => (typeof value === "number" ? String(value) : value),
  z.string().trim().min(1)
);

const uploadRowSchema = z.object({
  Party: partyName,
  Good: seatCount,
  Neutral: seatCount,
  Worst: seatCount,
});

const extensionOf = (fileName: string) => {
  const dot = fileName.lastIndexOf(".");
  return dot === -1 ? "" : fileName.slice(dot + 1).toLowerCase();
};

const readDelimited = (content: ArrayBuffer): RawSheet => {
  const text = new TextDecoder("utf-8").decode(content);
  const parsed = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim(),
  });
  return { columns: parsed.meta.fields ?? [], records: parsed.data };
};

const readWorkbook = (content: ArrayBuffer): RawSheet => {
  const workbook = XLSX.read(content, { type: "array" });
  const firstSheet = workbook.SheetNames[0];
  if (!firstSheet) return { columns: [], records: [] };
  const sheet = workbook.Sheets[firstSheet];
  const [header = []] = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1 });
  return {
    columns: header.map((cell) => String(cell ?? "").trim()),
    records: XLSX.utils
      .sheet_to_json<Record<string, unknown>>(sheet, { defval: null })
      .map((record) =>
        Object.fromEntries(Object.entries(record).map(([key, value]) => [key.trim(), value]))
      ),
  };
};

const readSheet = (fileName: string, content: ArrayBuffer): RawSheet => {
  const extension = extensionOf(fileName);
  if (extension === "csv" || extension === "txt") return readDelimited(content);
  if (extension === "xlsx" || extension === "xls") return readWorkbook(content);
  throw new InvalidUploadError("Upload an Excel (.xlsx) or CSV file.");
};

const describeIssue = (issue: z.ZodIssue, rowNumber: number) => {
  const column = issue.path.join(".");
  if (column === "Party") return `Row ${rowNumber}: Party must not be blank.`;
  return `Row ${rowNumber}: ${column} must be a non-negative whole number.`;
};

export const toAllocationRows = (records: Record<string, unknown>[]): AllocationRow[] =>
  records.map((record, index) => {
    const result = uploadRowSchema.safeParse(record);
    if (!result.success) {
      // Row numbers count the header as row 1, as spreadsheets show them.
      throw new InvalidUploadError(describeIssue(result.error.issues[0], index + 2));
    }
    const { Party, Good, Neutral, Worst } = result.data;
    return { party: Party, good: Good, neutral: Neutral, worst: Worst };
  });

/** Parses an uploaded spreadsheet into a table, lead party first. */
export const parseUpload = (fileName: string, content: ArrayBuffer): AllocationTable => {
  const { columns, records } = readSheet(fileName, content);
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new InvalidUploadError(`Missing required columns: ${missing.join(", ")}.`);
  }
  if (records.length === 0) {
    throw new InvalidUploadError("The file has no party rows.");
  }
  return moveLeadPartyFirst(toAllocationRows(records));
};
