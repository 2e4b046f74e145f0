import type { AnalysisCategory } from "@/lib/types";

export type Strategy = {
  /** Human label of the lookback window, e.g. "24 hours". */
  timeframe: string;
  /** SQLite datetime modifier for the same window, e.g. "-24 hours". */
  window: string;
  tables: string[];
  metrics: string[];
  context: string;
};

const LOCATION_RULES = `
SQL GENERATION RULES:
1. Target SQLite. Return a single SELECT statement.
2. When grouping by area, GROUP BY neighborhood only, never by coordinates.
3. Always select AVG(latitude) AS latitude and AVG(longitude) AS longitude per neighborhood when the table has coordinates.
`.trim();

type StrategyBase = Omit<Strategy, "context"> & { focus: string };

const STRATEGIES: Record<AnalysisCategory, StrategyBase> = {
  emergency_stress: {
    timeframe: "24 hours",
    window: "-24 hours",
    tables: ["sf_police_calls_rt", "sf_fire_ems_calls"],
    metrics: ["police_calls", "fire_ems_calls", "stress_score"],
    focus: "Count police_calls and fire_ems_calls per neighborhood. stress_score = police_calls * 1.0 + fire_ems_calls * 1.2.",
  },
  homelessness_pressure: {
    timeframe: "7 days",
    window: "-7 days",
    tables: ["sf_shelter_waitlist", "sf_homeless_baseline"],
    metrics: ["people_waiting", "capacity_baseline", "pressure_ratio"],
    focus:
      "Sum people_waiting per neighborhood and join sheltered_count from sf_homeless_baseline AS capacity_baseline. pressure_ratio = people_waiting / MAX(capacity_baseline, 1).",
  },
  disaster_impact: {
    timeframe: "7 days",
    window: "-7 days",
    tables: ["sf_disaster_events"],
    metrics: ["event_count", "severity"],
    focus: "Group by neighborhood, event_type and severity and return COUNT(*) AS event_count.",
  },
  infrastructure_complaints: {
    timeframe: "7 days",
    window: "-7 days",
    tables: ["sf_311_cases"],
    metrics: ["case_count"],
    focus: "Group 311 cases by neighborhood and category and return COUNT(*) AS case_count.",
  },
  insurance_report: {
    timeframe: "30 days",
    window: "-30 days",
    tables: ["sf_disaster_events", "sf_311_cases", "sf_fire_ems_calls", "sf_police_calls_rt"],
    metrics: ["avg_quake_severity", "fire_events", "hazmat_events", "infra_cases", "ems_calls", "police_calls"],
    focus:
      "Return one row with avg_quake_severity (Low=1, Medium=2, High=3, Critical=4), fire_events, hazmat_events, infra_cases, ems_calls and police_calls.",
  },
  mixed_query: {
    timeframe: "24 hours",
    window: "-24 hours",
    tables: [],
    metrics: [],
    focus: "Answer the question directly.",
  },
  unknown: {
    timeframe: "24 hours",
    window: "-24 hours",
    tables: [],
    metrics: [],
    focus: "Answer the question directly.",
  },
};

export function planStrategy(category: AnalysisCategory): Strategy {
  const { focus, ...base } = STRATEGIES[category];
  const scope = base.tables.length ? `Use tables ${base.tables.join(", ")}. ` : "";
  return {
    ...base,
    context: `Focus on the past ${base.timeframe}. ${scope}${focus}\n\n${LOCATION_RULES}`,
  };
}
