"use client";

import { Suspense, useCallback, useEffect, useMemo, useReducer, useState } from "react";
import { useRouter, useSearchParams } from "next/navigation";
import AllocationEditor from "@/components/AllocationEditor";
import Controls from "@/components/Controls";
import SeatCharts from "@/components/SeatCharts";
import SummaryTable from "@/components/SummaryTable";
import WhatIfPanel from "@/components/WhatIfPanel";
import {
  PROPAGATE_ALL_SCENARIOS,
  SCENARIOS,
  STRICT_EDITS,
  TOTAL_SEATS,
  parseScenario,
  scenarioLabel,
} from "@/lib/config";
import { exportFileName, type ExportFormat } from "@/lib/export";
import type { RebalanceOptions } from "@/lib/rebalance";
import {
  applyCommand,
  commandFromUpload,
  createSession,
  type SessionCommand,
  type SessionState,
} from "@/lib/session";
import { summarizeAll } from "@/lib/summary";

const EXPORT_API_URL = "/api/export";

const REBALANCE_OPTIONS: RebalanceOptions = {
  strict: STRICT_EDITS,
  propagateFrom: PROPAGATE_ALL_SCENARIOS ? SCENARIOS : ["good"],
};

type ExportErrorResponse = {
  message: string;
  error?: string;
};

const sessionReducer = (state: SessionState, command: SessionCommand) =>
  applyCommand(state, command, REBALANCE_OPTIONS);

const fileNameFromDisposition = (header: string | null) => {
  const match = header?.match(/filename="([^"]+)"/);
  return match ? match[1] : null;
};

const saveBlob = (blob: Blob, fileName: string) => {
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = fileName;
  link.click();
  URL.revokeObjectURL(url);
};

function Dashboard() {
  const router = useRouter();
  const searchParams = useSearchParams();
  const [session, dispatch] = useReducer(sessionReducer, undefined, () =>
    createSession(parseScenario(searchParams.get("scenario")))
  );
  const [downloading, setDownloading] = useState<ExportFormat | null>(null);
  const { current, scenario, status } = session;

  useEffect(() => {
    const params = new URLSearchParams();
    params.set("scenario", scenario);
    router.replace(`/?${params.toString()}`, { scroll: false });
  }, [scenario, router]);

  const summaries = useMemo(() => summarizeAll(current), [current]);
  const summary = summaries.find((entry) => entry.scenario === scenario) ?? summaries[0];

  const handleUpload = useCallback(async (file: File) => {
    try {
      const content = await file.arrayBuffer();
      dispatch(commandFromUpload(file.name, content));
    } catch (error) {
      dispatch({
        type: "reportError",
        message: error instanceof Error ? error.message : "Upload failed",
      });
    }
  }, []);

  const handleDownload = useCallback(
    async (format: ExportFormat) => {
      setDownloading(format);
      try {
        const response = await fetch(`${EXPORT_API_URL}?format=${format}`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ rows: current }),
        });
        if (!response.ok) {
          const payload = (await response.json()) as ExportErrorResponse;
          throw new Error(payload.error ?? payload.message);
        }
        const fileName =
          fileNameFromDisposition(response.headers.get("Content-Disposition")) ??
          exportFileName(format, new Date());
        saveBlob(await response.blob(), fileName);
      } catch (error) {
        dispatch({
          type: "reportError",
          message: error instanceof Error ? error.message : "Export failed",
        });
      } finally {
        setDownloading(null);
      }
    },
    [current]
  );

  return (
    <main className="min-h-screen pb-16">
      <div className="container-max py-10">
        <header className="mb-8 space-y-4">
          <p className="label">Seat Allocation Lab</p>
          <h1 className="text-4xl font-semibold tracking-tight sm:text-5xl">
            Explore zero-sum seat allocations across three scenarios
          </h1>
          <p className="max-w-3xl text-lg text-slate-600 dark:text-slate-300">
            Edit any party&apos;s seats and the rest of the table rebalances so every
            scenario still adds up to {TOTAL_SEATS}. Party 1 gains come out of the
            allies in proportion to their seats; ally changes are absorbed by Party 1.
          </p>
        </header>

        <div className="mb-6 rounded-xl bg-gradient-to-r from-blue-900 to-blue-500 px-4 py-2 text-center font-semibold text-white">
          Total seats always: {TOTAL_SEATS} | Selected scenario: {scenarioLabel(scenario)}
        </div>

        <div className="grid gap-4 sm:grid-cols-2 lg:grid-cols-4">
          <div className="card">
            <p className="text-sm text-slate-500 dark:text-slate-400">Party 1 seats</p>
            <p className="text-2xl font-semibold">{summary.party1Seats}</p>
            <p className="text-sm text-blue-600 dark:text-blue-400">{summary.party1Percent}</p>
          </div>
          <div className="card">
            <p className="text-sm text-slate-500 dark:text-slate-400">Allies total</p>
            <p className="text-2xl font-semibold">{summary.allyTotal}</p>
          </div>
          <div className="card">
            <p className="text-sm text-slate-500 dark:text-slate-400">Active allies</p>
            <p className="text-2xl font-semibold">
              {summary.activeAllyCount}/{summary.allyCount}
            </p>
          </div>
          <div className="card">
            <p className="text-sm text-slate-500 dark:text-slate-400">Allocated</p>
            <p className="text-2xl font-semibold">{summary.allocation}</p>
            <p
              className={`text-sm ${
                summary.allocationStatus === "FULL"
                  ? "text-emerald-600 dark:text-emerald-400"
                  : "text-amber-600 dark:text-amber-400"
              }`}
            >
              {summary.allocationStatus}
            </p>
          </div>
        </div>

        <div className="mt-6 grid gap-6 lg:grid-cols-[0.8fr_1.2fr]">
          <div className="space-y-6">
            <Controls
              scenario={scenario}
              onScenarioChange={(next) => dispatch({ type: "selectScenario", scenario: next })}
              summaries={summaries}
              status={status}
              onDismissStatus={() => dispatch({ type: "dismissStatus" })}
              onReset={() => dispatch({ type: "reset" })}
              onUpload={(file) => void handleUpload(file)}
              onDownload={(format) => void handleDownload(format)}
              downloading={downloading}
            />
            <WhatIfPanel table={current} scenario={scenario} />
          </div>

          <div className="space-y-6">
            <AllocationEditor
              table={current}
              scenario={scenario}
              onEditCell={(row, value) => dispatch({ type: "editCell", row, value })}
            />
            <SummaryTable summaries={summaries} scenario={scenario} />
          </div>
        </div>

        <div className="mt-6">
          <SeatCharts table={current} scenario={scenario} />
        </div>

        <footer className="mt-10 border-t border-slate-200 pt-4 text-center text-sm text-slate-500 dark:border-slate-800 dark:text-slate-400">
          Zero-sum allocation model | Total seats: {TOTAL_SEATS}
        </footer>
      </div>
    </main>
  );
}

export default function Home() {
  return (
    <Suspense fallback={null}>
      <Dashboard />
    </Suspense>
  );
}
