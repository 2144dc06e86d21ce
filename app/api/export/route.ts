import { NextResponse } from "next/server";
import { z } from "zod";
import {
  EXPORT_CONTENT_TYPES,
  exportFileName,
  isExportFormat,
  toCsv,
  toXlsx,
} from "@/lib/export";

const seats = z.number().int().nonnegative();

const exportRequestSchema = z.object({
  rows: z
    .array(
      z.object({
        party: z.string(),
        good: seats,
        neutral: seats,
        worst: seats,
      })
    )
    .min(1),
});

const badRequest = (message: string, error: string) =>
  NextResponse.json({ message, error }, { status: 400 });

export async function POST(request: Request) {
  const format = new URL(request.url).searchParams.get("format");
  if (!isExportFormat(format)) {
    return badRequest("Export could not be created.", "Format must be xlsx or csv");
  }

  let payload: unknown;
  try {
    payload = await request.json();
  } catch (error) {
    return badRequest(
      "Export could not be created.",
      error instanceof Error ? error.message : "Body is not JSON"
    );
  }

  const parsed = exportRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return badRequest(
      "Export could not be created.",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
    );
  }

  const { rows } = parsed.data;
  const body = format === "xlsx" ? toXlsx(rows) : toCsv(rows);
  return new NextResponse(body, {
    headers: {
      "Content-Type": EXPORT_CONTENT_TYPES[format],
      "Content-Disposition": `attachment; filename="${exportFileName(format, new Date())}"`,
    },
  });
}
