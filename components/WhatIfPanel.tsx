"use client";

import { useEffect, useMemo, useState } from "react";
import type { AllocationTable } from "@/lib/allocationTable";
import { readCell } from "@/lib/allocationTable";
import { WHAT_IF_MAX, WHAT_IF_MIN, scenarioLabel, type Scenario } from "@/lib/config";
import { clampWhatIfTarget, previewLeadPartyChange } from "@/lib/whatIf";

type WhatIfPanelProps = {
  table: AllocationTable;
  scenario: Scenario;
};

export default function WhatIfPanel({ table, scenario }: WhatIfPanelProps) {
  const current = readCell(table, 0, scenario);
  const [target, setTarget] = useState<number | null>(null);

  useEffect(() => {
    setTarget(null);
  }, [current, scenario]);

  const preview = useMemo(
    () => previewLeadPartyChange(table, scenario, target),
    [table, scenario, target]
  );

  return (
    <div className="card space-y-4">
      <div>
        <p className="label">What-if analysis</p>
        <p className="text-sm text-slate-500 dark:text-slate-400">
          Preview only. The allocation table is not changed.
        </p>
      </div>
      <div>
        <div className="flex items-center justify-between text-sm">
          <span>Party 1 seats in {scenarioLabel(scenario)}</span>
          <span className="font-semibold">{preview.target}</span>
        </div>
        <input
          aria-label="What-if Party 1 seats"
          type="range"
          min={WHAT_IF_MIN}
          max={WHAT_IF_MAX}
          step={1}
          value={target ?? clampWhatIfTarget(current)}
          onChange={(event) => setTarget(Number(event.target.value))}
          className="mt-2 h-2 w-full cursor-pointer appearance-none rounded-full bg-slate-200 dark:bg-slate-800"
        />
        <div className="flex justify-between text-xs text-slate-500 dark:text-slate-400">
          <span>{WHAT_IF_MIN}</span>
          <span>{WHAT_IF_MAX}</span>
        </div>
      </div>
      {preview.direction === "loss" && (
        <p className="rounded-lg border-l-4 border-red-500 bg-red-50 p-3 text-sm dark:bg-red-950/40">
          Allies would lose {preview.total} seats total
        </p>
      )}
      {preview.direction === "gain" && (
        <p className="rounded-lg border-l-4 border-emerald-500 bg-emerald-50 p-3 text-sm dark:bg-emerald-950/40">
          Allies would gain {preview.total} seats total
        </p>
      )}
      {preview.impacts.length > 0 && (
        <div>
          <p className="text-sm font-semibold">Impact per ally (approx.)</p>
          <ul className="mt-2 space-y-1 text-sm text-slate-600 dark:text-slate-300">
            {preview.impacts.map((impact) => (
              <li key={impact.party}>
                {impact.party}: {impact.before} → {impact.after}
              </li>
            ))}
          </ul>
        </div>
      )}
    </div>
  );
}
