"use client";

import { scenarioLabel, type Scenario } from "@/lib/config";
import type { ScenarioSummary } from "@/lib/summary";

type SummaryTableProps = {
  summaries: ScenarioSummary[];
  scenario: Scenario;
};

export default function SummaryTable({ summaries, scenario }: SummaryTableProps) {
  return (
    <div className="card">
      <p className="label">Scenario summary</p>
      <div className="mt-4 overflow-auto">
        <table className="min-w-full text-sm">
          <thead className="text-left text-xs uppercase tracking-wider text-slate-500 dark:text-slate-400">
            <tr>
              <th className="py-2 pr-4">Scenario</th>
              <th className="py-2 pr-4">Party 1 seats</th>
              <th className="py-2 pr-4">Party 1 %</th>
              <th className="py-2 pr-4">Allies total</th>
              <th className="py-2 pr-4">Zero allies</th>
              <th className="py-2 pr-4">Allocated</th>
            </tr>
          </thead>
          <tbody className="divide-y divide-slate-200 text-slate-700 dark:divide-slate-800 dark:text-slate-200">
            {summaries.map((summary) => (
              <tr
                key={summary.scenario}
                className={summary.scenario === scenario ? "font-semibold" : ""}
              >
                <td className="py-2 pr-4">{scenarioLabel(summary.scenario)}</td>
                <td className="py-2 pr-4">{summary.party1Seats}</td>
                <td className="py-2 pr-4">{summary.party1Percent}</td>
                <td className="py-2 pr-4">{summary.allyTotal}</td>
                <td className="py-2 pr-4">{summary.zeroSeatAllyCount}</td>
                <td className="py-2 pr-4">{summary.allocation}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
}
