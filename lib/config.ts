export const TOTAL_SEATS = 234;

export const LEAD_PARTY = "Party 1";

export const SIMPLE_MAJORITY = 117;
export const STRONG_MAJORITY = 150;

export const WHAT_IF_MIN = 100;
export const WHAT_IF_MAX = 200;
export const PREVIEW_ALLY_LIMIT = 5;

export const BAR_CHART_PARTIES = 10;
export const PIE_CHART_PARTIES = 8;
export const COMPARISON_PARTIES = 6;

export const SCENARIOS = ["good", "neutral", "worst"] as const;

export type Scenario = (typeof SCENARIOS)[number];

export const DEFAULT_SCENARIO: Scenario = "good";

const scenarioLabels: Record<Scenario, string> = {
  good: "Good",
  neutral: "Neutral",
  worst: "Worst",
};

export const scenarioLabel = (scenario: Scenario) => scenarioLabels[scenario];

export const isScenario = (value: string | null | undefined): value is Scenario =>
  SCENARIOS.some((scenario) => scenario === value);

export const parseScenario = (value: string | null | undefined): Scenario =>
  isScenario(value) ? value : DEFAULT_SCENARIO;

// Next inlines NEXT_PUBLIC_* values at build time.
const flagEnabled = (value: string | undefined) => value === "1" || value === "true";

export const STRICT_EDITS = flagEnabled(process.env.NEXT_PUBLIC_STRICT_EDITS);

export const PROPAGATE_ALL_SCENARIOS = flagEnabled(
  process.env.NEXT_PUBLIC_PROPAGATE_ALL_SCENARIOS
);
