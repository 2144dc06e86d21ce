"use client";

import { useEffect, useState } from "react";
import type { AllocationTable } from "@/lib/allocationTable";
import { columnTotal } from "@/lib/allocationTable";
import { TOTAL_SEATS, scenarioLabel, type Scenario } from "@/lib/config";

type AllocationEditorProps = {
  table: AllocationTable;
  scenario: Scenario;
  onEditCell: (row: number, value: number) => void;
};

type SeatInputProps = {
  party: string;
  value: number;
  onCommit: (value: number) => void;
};

const parseSeatInput = (raw: string) => {
  if (raw.trim() === "") return null;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) return null;
  return Math.min(TOTAL_SEATS, Math.max(0, Math.round(parsed)));
};

function SeatInput({ party, value, onCommit }: SeatInputProps) {
  const [draft, setDraft] = useState(String(value));

  useEffect(() => {
    setDraft(String(value));
  }, [value]);

  const commit = () => {
    const parsed = parseSeatInput(draft);
    if (parsed === null || parsed === value) {
      setDraft(String(value));
      return;
    }
    onCommit(parsed);
  };

  return (
    <input
      aria-label={`${party} seats`}
      type="number"
      inputMode="numeric"
      min={0}
      max={TOTAL_SEATS}
      step={1}
      value={draft}
      onChange={(event) => setDraft(event.target.value)}
      onBlur={commit}
      onKeyDown={(event) => {
        if (event.key === "Enter") commit();
      }}
      className="w-24 rounded-lg border border-slate-200 bg-transparent px-2 py-1 text-right dark:border-slate-700"
    />
  );
}

export default function AllocationEditor({
  table,
  scenario,
  onEditCell,
}: AllocationEditorProps) {
  const total = columnTotal(table, scenario);

  return (
    <div className="card">
      <div>
        <p className="label">Seat allocation editor</p>
        <h3 className="text-lg font-semibold">{scenarioLabel(scenario)} scenario</h3>
        <p className="text-sm text-slate-500 dark:text-slate-400">
          Party 1 gains are taken from allies in proportion to their seats; ally
          changes are absorbed by Party 1.
        </p>
      </div>
      <div className="mt-4 max-h-[32rem] overflow-auto">
        <table className="min-w-full text-sm">
          <thead className="text-left text-xs uppercase tracking-wider text-slate-500 dark:text-slate-400">
            <tr>
              <th className="py-2 pr-4">Party</th>
              <th className="py-2 pr-4 text-right">{scenarioLabel(scenario)}</th>
            </tr>
          </thead>
          <tbody className="divide-y divide-slate-200 text-slate-700 dark:divide-slate-800 dark:text-slate-200">
            {table.map((row, index) => (
              <tr
                key={`${row.party}-${index}`}
                className={index === 0 ? "bg-lead/10 font-semibold" : ""}
              >
                <td className="py-2 pr-4">{row.party}</td>
                <td className="py-2 pr-4 text-right">
                  <SeatInput
                    party={row.party}
                    value={row[scenario]}
                    onCommit={(value) => onEditCell(index, value)}
                  />
                </td>
              </tr>
            ))}
          </tbody>
          <tfoot>
            <tr className="border-t-2 border-slate-300 font-semibold dark:border-slate-600">
              <td className="py-2 pr-4">Total</td>
              <td className="py-2 pr-4 text-right" data-testid="allocation-total">
                {total}/{TOTAL_SEATS}
              </td>
            </tr>
          </tfoot>
        </table>
      </div>
    </div>
  );
}
