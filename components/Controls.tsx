"use client";

import type { ChangeEvent } from "react";
import { SCENARIOS, TOTAL_SEATS, scenarioLabel, type Scenario } from "@/lib/config";
import type { ExportFormat } from "@/lib/export";
import type { SessionStatus } from "@/lib/session";
import type { ScenarioSummary } from "@/lib/summary";

type ControlsProps = {
  scenario: Scenario;
  onScenarioChange: (scenario: Scenario) => void;
  summaries: ScenarioSummary[];
  status: SessionStatus;
  onDismissStatus: () => void;
  onReset: () => void;
  onUpload: (file: File) => void;
  onDownload: (format: ExportFormat) => void;
  downloading: ExportFormat | null;
};

const scenarioDescriptions: Record<Scenario, string> = {
  good: "Optimistic outcome",
  neutral: "Most likely outcome",
  worst: "Pessimistic outcome",
};

export default function Controls({
  scenario,
  onScenarioChange,
  summaries,
  status,
  onDismissStatus,
  onReset,
  onUpload,
  onDownload,
  downloading,
}: ControlsProps) {
  const handleFileChange = (event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (file) onUpload(file);
    event.target.value = "";
  };

  return (
    <div className="card space-y-6">
      <div>
        <p className="label">Primary scenario</p>
        <div className="mt-2 grid gap-2">
          {SCENARIOS.map((option) => (
            <button
              type="button"
              key={option}
              className={`button w-full justify-between ${
                scenario === option ? "button-primary" : ""
              }`}
              onClick={() => onScenarioChange(option)}
            >
              <span className="text-sm font-semibold">{scenarioLabel(option)}</span>
              <span className="text-xs opacity-70">{scenarioDescriptions[option]}</span>
            </button>
          ))}
        </div>
      </div>

      <div>
        <p className="label">Current totals</p>
        <ul className="mt-2 space-y-2 text-sm">
          {summaries.map((summary) => {
            const balanced = summary.allocated === TOTAL_SEATS;
            return (
              <li key={summary.scenario} className="flex items-center justify-between">
                <span>{scenarioLabel(summary.scenario)}</span>
                <span
                  className={`font-semibold ${
                    balanced
                      ? "text-emerald-600 dark:text-emerald-400"
                      : "text-amber-600 dark:text-amber-400"
                  }`}
                >
                  {summary.allocated} {balanced ? "✓" : "⚠"}
                </span>
              </li>
            );
          })}
        </ul>
      </div>

      <div className="space-y-3">
        <p className="label">Data management</p>
        <button type="button" className="button w-full" onClick={onReset}>
          Reset to default
        </button>
        <label className="block text-sm text-slate-500 dark:text-slate-400">
          Upload custom data
          <input
            aria-label="Upload custom data"
            type="file"
            accept=".xlsx,.xls,.csv"
            onChange={handleFileChange}
            className="mt-2 block w-full text-sm file:mr-3 file:rounded-lg file:border-0 file:bg-slate-100 file:px-3 file:py-2 file:text-sm file:font-semibold dark:file:bg-slate-800"
          />
        </label>
        <p className="text-xs text-slate-500 dark:text-slate-400">
          Excel or CSV with Party, Good, Neutral and Worst columns.
        </p>
        {status.kind !== "idle" && (
          <div
            role={status.kind === "error" ? "alert" : "status"}
            className={`flex items-start justify-between gap-2 rounded-lg border-l-4 p-3 text-sm ${
              status.kind === "error"
                ? "border-amber-500 bg-amber-50 dark:bg-amber-950/40"
                : "border-emerald-500 bg-emerald-50 dark:bg-emerald-950/40"
            }`}
          >
            <span>{status.message}</span>
            <button type="button" className="text-xs underline" onClick={onDismissStatus}>
              Dismiss
            </button>
          </div>
        )}
      </div>

      <div className="space-y-2">
        <p className="label">Export</p>
        <div className="grid gap-2 sm:grid-cols-2">
          <button
            type="button"
            className="button"
            disabled={downloading !== null}
            onClick={() => onDownload("xlsx")}
          >
            {downloading === "xlsx" ? "Preparing..." : "Download Excel"}
          </button>
          <button
            type="button"
            className="button"
            disabled={downloading !== null}
            onClick={() => onDownload("csv")}
          >
            {downloading === "csv" ? "Preparing..." : "Download CSV"}
          </button>
        </div>
      </div>
    </div>
  );
}
