"use client";

import { useMemo, useState } from "react";
import * as d3 from "d3";
import type { AllocationTable } from "@/lib/allocationTable";
import {
  comparisonMaximum,
  scenarioComparison,
  seatedParties,
  topParties,
  type PartySeats,
} from "@/lib/charts";
import {
  SCENARIOS,
  SIMPLE_MAJORITY,
  STRONG_MAJORITY,
  TOTAL_SEATS,
  scenarioLabel,
  type Scenario,
} from "@/lib/config";

type SeatChartsProps = {
  table: AllocationTable;
  scenario: Scenario;
};

type ChartTab = "bar" | "pie" | "comparison";

const tabs: { key: ChartTab; label: string }[] = [
  { key: "bar", label: "Bar chart" },
  { key: "pie", label: "Pie charts" },
  { key: "comparison", label: "Comparison" },
];

const WIDTH = 720;
const HEIGHT = 360;
const MARGIN = { top: 16, right: 16, bottom: 72, left: 44 };

const scenarioColors: Record<Scenario, string> = {
  good: "#10B981",
  neutral: "#3B82F6",
  worst: "#EF4444",
};

const legendSwatches: Record<Scenario, string> = {
  good: "bg-scenario-good",
  neutral: "bg-scenario-neutral",
  worst: "bg-scenario-worst",
};

const majorityLines = [
  { seats: SIMPLE_MAJORITY, label: `Simple majority (${SIMPLE_MAJORITY})`, color: "#F59E0B" },
  { seats: STRONG_MAJORITY, label: `Strong majority (${STRONG_MAJORITY})`, color: "#EF4444" },
];

function SeatBarChart({ data, scenario }: { data: PartySeats[]; scenario: Scenario }) {
  const x = useMemo(
    () =>
      d3
        .scaleBand()
        .domain(data.map((entry) => entry.party))
        .range([MARGIN.left, WIDTH - MARGIN.right])
        .padding(0.2),
    [data]
  );
  const y = useMemo(
    () =>
      d3
        .scaleLinear()
        .domain([0, Math.max(STRONG_MAJORITY, d3.max(data, (entry) => entry.seats) ?? 0)])
        .nice()
        .range([HEIGHT - MARGIN.bottom, MARGIN.top]),
    [data]
  );
  const color = useMemo(
    () =>
      d3
        .scaleSequential(d3.interpolateBlues)
        .domain([0, d3.max(data, (entry) => entry.seats) ?? 1]),
    [data]
  );

  return (
    <svg
      viewBox={`0 0 ${WIDTH} ${HEIGHT}`}
      role="img"
      aria-label={`Top parties in the ${scenarioLabel(scenario)} scenario`}
      className="h-auto w-full"
    >
      {y.ticks(6).map((tick) => (
        <g key={tick} transform={`translate(0, ${y(tick)})`}>
          <line
            x1={MARGIN.left}
            x2={WIDTH - MARGIN.right}
            className="stroke-slate-200 dark:stroke-slate-800"
          />
          <text x={MARGIN.left - 6} dy="0.32em" textAnchor="end" className="fill-slate-500 text-[10px]">
            {tick}
          </text>
        </g>
      ))}
      {data.map((entry) => (
        <rect
          key={entry.party}
          x={x(entry.party) ?? 0}
          y={y(entry.seats)}
          width={x.bandwidth()}
          height={y(0) - y(entry.seats)}
          fill={color(entry.seats)}
          rx={3}
        >
          <title>
            {entry.party}: {entry.seats}
          </title>
        </rect>
      ))}
      {data.map((entry) => (
        <text
          key={entry.party}
          transform={`translate(${(x(entry.party) ?? 0) + x.bandwidth() / 2}, ${
            HEIGHT - MARGIN.bottom + 10
          }) rotate(35)`}
          className="fill-slate-600 text-[10px] dark:fill-slate-300"
        >
          {entry.party}
        </text>
      ))}
      {majorityLines.map((line) => (
        <g key={line.seats}>
          <line
            x1={MARGIN.left}
            x2={WIDTH - MARGIN.right}
            y1={y(line.seats)}
            y2={y(line.seats)}
            stroke={line.color}
            strokeDasharray="6 4"
          />
          <text
            x={WIDTH - MARGIN.right}
            y={y(line.seats) - 4}
            textAnchor="end"
            fill={line.color}
            className="text-[10px] font-semibold"
          >
            {line.label}
          </text>
        </g>
      ))}
    </svg>
  );
}

function SeatPieChart({
  data,
  title,
  interpolate,
}: {
  data: PartySeats[];
  title: string;
  interpolate: (t: number) => string;
}) {
  const radius = 120;
  const arcs = useMemo(
    () =>
      d3
        .pie<PartySeats>()
        .sort(null)
        .value((entry) => entry.seats)(data),
    [data]
  );
  const arc = useMemo(
    () =>
      d3
        .arc<d3.PieArcDatum<PartySeats>>()
        .innerRadius(radius * 0.4)
        .outerRadius(radius),
    []
  );

  if (data.length === 0) {
    return <p className="text-sm text-slate-500 dark:text-slate-400">No seated parties.</p>;
  }

  return (
    <figure>
      <figcaption className="mb-2 text-sm font-semibold">{title}</figcaption>
      <svg viewBox={`${-radius} ${-radius} ${radius * 2} ${radius * 2}`} className="mx-auto h-64 w-64">
        {arcs.map((slice, index) => (
          <path
            key={slice.data.party}
            d={arc(slice) ?? undefined}
            fill={interpolate(1 - index / Math.max(1, arcs.length))}
            className="stroke-white dark:stroke-slate-900"
          >
            <title>
              {slice.data.party}: {slice.data.seats} ({d3.format(".1%")(slice.data.seats / TOTAL_SEATS)})
            </title>
          </path>
        ))}
      </svg>
      <ul className="mt-3 grid grid-cols-2 gap-1 text-xs text-slate-600 dark:text-slate-300">
        {data.map((entry) => (
          <li key={entry.party}>
            {entry.party}: {entry.seats}
          </li>
        ))}
      </ul>
    </figure>
  );
}

function ScenarioComparisonChart({ table }: { table: AllocationTable }) {
  const entries = useMemo(() => scenarioComparison(table), [table]);
  const x = useMemo(
    () =>
      d3
        .scaleBand()
        .domain(entries.map((entry) => entry.party))
        .range([MARGIN.left, WIDTH - MARGIN.right])
        .padding(0.2),
    [entries]
  );
  const inner = useMemo(
    () => d3.scaleBand<Scenario>().domain(SCENARIOS).range([0, x.bandwidth()]).padding(0.08),
    [x]
  );
  const y = useMemo(
    () =>
      d3
        .scaleLinear()
        .domain([0, comparisonMaximum(entries)])
        .nice()
        .range([HEIGHT - MARGIN.bottom, MARGIN.top]),
    [entries]
  );

  return (
    <div>
      <div className="mb-2 flex gap-4 text-xs">
        {SCENARIOS.map((option) => (
          <span key={option} className="flex items-center gap-1">
            <span className={`inline-block h-3 w-3 rounded-sm ${legendSwatches[option]}`} />
            {scenarioLabel(option)}
          </span>
        ))}
      </div>
      <svg viewBox={`0 0 ${WIDTH} ${HEIGHT}`} role="img" aria-label="Scenario comparison" className="h-auto w-full">
        {y.ticks(6).map((tick) => (
          <text
            key={tick}
            x={MARGIN.left - 6}
            y={y(tick)}
            dy="0.32em"
            textAnchor="end"
            className="fill-slate-500 text-[10px]"
          >
            {tick}
          </text>
        ))}
        {entries.map((entry) => (
          <g key={entry.party} transform={`translate(${x(entry.party) ?? 0}, 0)`}>
            {SCENARIOS.map((option) => (
              <rect
                key={option}
                x={inner(option) ?? 0}
                y={y(entry.seats[option])}
                width={inner.bandwidth()}
                height={y(0) - y(entry.seats[option])}
                fill={scenarioColors[option]}
                rx={2}
              >
                <title>
                  {entry.party} ({scenarioLabel(option)}): {entry.seats[option]}
                </title>
              </rect>
            ))}
            <text
              x={x.bandwidth() / 2}
              y={HEIGHT - MARGIN.bottom + 16}
              textAnchor="middle"
              className="fill-slate-600 text-[10px] dark:fill-slate-300"
            >
              {entry.party}
            </text>
          </g>
        ))}
      </svg>
    </div>
  );
}

export default function SeatCharts({ table, scenario }: SeatChartsProps) {
  const [tab, setTab] = useState<ChartTab>("bar");
  const barData = useMemo(() => topParties(table, scenario), [table, scenario]);
  const goodPie = useMemo(() => seatedParties(table, "good"), [table]);
  const worstPie = useMemo(() => seatedParties(table, "worst"), [table]);

  return (
    <div className="card">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <div>
          <p className="label">Visualization</p>
          <h3 className="text-lg font-semibold">
            {tab === "bar"
              ? `Top ${barData.length} parties - ${scenarioLabel(scenario)} scenario`
              : tab === "pie"
                ? "Good vs Worst seat shares"
                : "Largest parties across scenarios"}
          </h3>
        </div>
        <div className="flex gap-2">
          {tabs.map((option) => (
            <button
              type="button"
              key={option.key}
              className={`button ${tab === option.key ? "button-primary" : ""}`}
              onClick={() => setTab(option.key)}
            >
              {option.label}
            </button>
          ))}
        </div>
      </div>
      <div className="mt-4">
        {tab === "bar" && <SeatBarChart data={barData} scenario={scenario} />}
        {tab === "pie" && (
          <div className="grid gap-6 md:grid-cols-2">
            <SeatPieChart
              data={goodPie}
              title={`Good scenario - first ${goodPie.length} seated parties`}
              interpolate={d3.interpolateBlues}
            />
            <SeatPieChart
              data={worstPie}
              title={`Worst scenario - first ${worstPie.length} seated parties`}
              interpolate={d3.interpolateReds}
            />
          </div>
        )}
        {tab === "comparison" && <ScenarioComparisonChart table={table} />}
      </div>
    </div>
  );
}
