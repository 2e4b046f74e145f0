import { MetricComputationError } from "@/lib/errors";
import { errorFields, logger as defaultLogger, type Logger } from "@/lib/logger";
import { hasColumn, neighborhoodOf, pickColumn, round2, toNumber } from "@/lib/rows";
import type { AnalysisCategory, LocationMetric, RankedResult, RiskAssessment, RiskInputs, RiskTier, Row, Scalar } from "@/lib/types";

type Scored = { locations: LocationMetric[]; risk: RiskAssessment | null };
type Scorer = (rows: Row[]) => Scored;

export const STRESS_WEIGHTS = { police_calls: 1.0, fire_ems_calls: 1.2 } as const;

export const SEVERITY_LEVELS = ["low", "medium", "high", "critical"] as const;

export type SeverityLevel = (typeof SEVERITY_LEVELS)[number];

export const SEVERITY_WEIGHTS: Record<SeverityLevel, number> = { low: 1, medium: 2, high: 3, critical: 4 };

export const RISK_WEIGHTS: Record<keyof RiskInputs, number> = {
  avg_quake_severity: 12,
  fire_events: 10,
  hazmat_events: 12,
  infra_cases: 2,
  ems_calls: 0.4,
  police_calls: 0.4,
};

export const CITYWIDE = "Citywide";

const COORDINATE_COLUMNS = new Set(["latitude", "longitude", "lat", "lng", "lon"]);

const ALIASES = {
  police_calls: ["police_calls", "police_call_count"],
  fire_ems_calls: ["fire_ems_calls", "fire_ems_call_count", "ems_calls"],
  people_waiting: ["people_waiting", "total_waiting", "waitlist"],
  capacity_baseline: ["capacity_baseline", "shelter_capacity", "sheltered_count"],
  event_count: ["event_count", "events", "count"],
  case_count: ["case_count", "cases", "complaints", "count"],
  avg_quake_severity: ["avg_quake_severity", "quake_severity"],
  fire_events: ["fire_events"],
  hazmat_events: ["hazmat_events"],
  infra_cases: ["infra_cases", "infra_311_cases", "cases_311"],
  ems_calls: ["ems_calls", "fire_ems_calls"],
} as const;

function numberAt(row: Row, column: string | null) {
  if (!column) return 0;
  return toNumber(row[column]) ?? 0;
}

/** Orders by score descending, then name ascending. */
export function rankLocations(locations: LocationMetric[]) {
  return [...locations].sort((a, b) => {
    if (b.derived_score !== a.derived_score) return b.derived_score - a.derived_score;
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  });
}

function groupByNeighborhood(rows: Row[], add: (row: Row, counts: Record<string, number>) => void) {
  const groups = new Map<string, Record<string, number>>();
  for (const row of rows) {
    const name = neighborhoodOf(row);
    const counts = groups.get(name) ?? {};
    add(row, counts);
    groups.set(name, counts);
  }
  return groups;
}

function bump(counts: Record<string, number>, key: string, by: number) {
  counts[key] = (counts[key] ?? 0) + by;
}

const scoreEmergencyStress: Scorer = (rows) => {
  const police = pickColumn(rows, ALIASES.police_calls);
  const fire = pickColumn(rows, ALIASES.fire_ems_calls);
  if (!police && !fire) throw new MetricComputationError("emergency_stress", ["police_calls", "fire_ems_calls"]);

  const groups = groupByNeighborhood(rows, (row, counts) => {
    bump(counts, "police_calls", numberAt(row, police));
    bump(counts, "fire_ems_calls", numberAt(row, fire));
  });

  const locations = [...groups].map(([name, counts]) => ({
    name,
    raw_counts: counts,
    derived_score: round2(
      counts.police_calls * STRESS_WEIGHTS.police_calls + counts.fire_ems_calls * STRESS_WEIGHTS.fire_ems_calls
    ),
  }));
  return { locations, risk: null };
};

const scoreHomelessnessPressure: Scorer = (rows) => {
  const waiting = pickColumn(rows, ALIASES.people_waiting);
  if (!waiting) throw new MetricComputationError("homelessness_pressure", ["people_waiting"]);
  const capacity = pickColumn(rows, ALIASES.capacity_baseline);

  const groups = groupByNeighborhood(rows, (row, counts) => {
    bump(counts, "people_waiting", numberAt(row, waiting));
    // capacity repeats on every waitlist row of a neighborhood, so keep the largest
    counts.capacity_baseline = Math.max(counts.capacity_baseline ?? 0, numberAt(row, capacity));
  });

  const locations = [...groups].map(([name, counts]) => ({
    name,
    raw_counts: counts,
    derived_score: round2(counts.people_waiting / Math.max(counts.capacity_baseline, 1)),
  }));
  return { locations, risk: null };
};

function severityLevel(value: Scalar | undefined): SeverityLevel | null {
  if (typeof value !== "string") return null;
  const key = value.trim().toLowerCase();
  return SEVERITY_LEVELS.find((level) => level === key) ?? null;
}

export function severityWeight(value: Scalar | undefined) {
  const level = severityLevel(value);
  if (level) return SEVERITY_WEIGHTS[level];
  return toNumber(value) ?? 1;
}

const scoreDisasterImpact: Scorer = (rows) => {
  const countColumn = pickColumn(rows, ALIASES.event_count);
  const hasSeverity = hasColumn(rows, "severity");
  if (!countColumn && !hasSeverity) throw new MetricComputationError("disaster_impact", ["severity", "event_count"]);

  const scores = new Map<string, number>();
  const groups = groupByNeighborhood(rows, (row, counts) => {
    const events = countColumn ? toNumber(row[countColumn]) ?? 1 : 1;
    bump(counts, "events", events);
    const level = severityLevel(row.severity);
    if (level) bump(counts, level, events);
    const name = neighborhoodOf(row);
    scores.set(name, (scores.get(name) ?? 0) + events * severityWeight(row.severity));
  });

  const locations = [...groups].map(([name, counts]) => ({
    name,
    raw_counts: counts,
    derived_score: round2(scores.get(name) ?? 0),
  }));
  return { locations, risk: null };
};

const scoreInfrastructureComplaints: Scorer = (rows) => {
  const countColumn = pickColumn(rows, ALIASES.case_count);
  if (!countColumn && !hasColumn(rows, "neighborhood")) {
    throw new MetricComputationError("infrastructure_complaints", ["case_count", "neighborhood"]);
  }

  const groups = groupByNeighborhood(rows, (row, counts) => {
    bump(counts, "case_count", countColumn ? toNumber(row[countColumn]) ?? 1 : 1);
  });

  const locations = [...groups].map(([name, counts]) => ({
    name,
    raw_counts: counts,
    derived_score: round2(counts.case_count),
  }));
  return { locations, risk: null };
};

export function riskTier(score: number): RiskTier {
  if (score <= 25) return "Low";
  if (score <= 50) return "Medium";
  if (score <= 75) return "High";
  return "Critical";
}

const RISK_KEYS = [
  "avg_quake_severity",
  "fire_events",
  "hazmat_events",
  "infra_cases",
  "ems_calls",
  "police_calls",
] as const satisfies readonly (keyof RiskInputs)[];

export function riskContributions(inputs: RiskInputs) {
  return RISK_KEYS.map((key) => ({
    key,
    value: round2(RISK_WEIGHTS[key] * inputs[key]),
  }));
}

export function assessRisk(inputs: RiskInputs): RiskAssessment {
  const raw = riskContributions(inputs).reduce((sum, c) => sum + c.value, 0);
  const score = round2(Math.min(100, Math.max(0, raw)));
  return { score, tier: riskTier(score), inputs };
}

const scoreInsuranceReport: Scorer = (rows) => {
  const columns = {
    avg_quake_severity: pickColumn(rows, ALIASES.avg_quake_severity),
    fire_events: pickColumn(rows, ALIASES.fire_events),
    hazmat_events: pickColumn(rows, ALIASES.hazmat_events),
    infra_cases: pickColumn(rows, ALIASES.infra_cases),
    ems_calls: pickColumn(rows, ALIASES.ems_calls),
    police_calls: pickColumn(rows, ALIASES.police_calls),
  };
  if (Object.values(columns).every((c) => c === null)) {
    throw new MetricComputationError("insurance_report", Object.keys(columns));
  }

  const sum = (column: string | null) => rows.reduce((acc, row) => acc + numberAt(row, column), 0);
  const quakeColumn = columns.avg_quake_severity;
  const quakes = quakeColumn
    ? rows.map((r) => toNumber(r[quakeColumn])).filter((v): v is number => v !== null)
    : [];

  const inputs: RiskInputs = {
    avg_quake_severity: quakes.length ? quakes.reduce((a, b) => a + b, 0) / quakes.length : 0,
    fire_events: sum(columns.fire_events),
    hazmat_events: sum(columns.hazmat_events),
    infra_cases: sum(columns.infra_cases),
    ems_calls: sum(columns.ems_calls),
    police_calls: sum(columns.police_calls),
  };
  const risk = assessRisk(inputs);

  return {
    locations: [{ name: CITYWIDE, raw_counts: { ...inputs }, derived_score: risk.score }],
    risk,
  };
};

/** Groups by neighborhood when the column exists and keeps first-seen order. */
export function passthrough(rows: Row[]): LocationMetric[] {
  if (!hasColumn(rows, "neighborhood")) return [];

  const groups = groupByNeighborhood(rows, (row, counts) => {
    for (const [key, value] of Object.entries(row)) {
      if (key === "neighborhood" || COORDINATE_COLUMNS.has(key)) continue;
      const n = typeof value === "number" ? value : null;
      if (n !== null && Number.isFinite(n)) bump(counts, key, n);
    }
  });

  return [...groups].map(([name, counts]) => ({ name, raw_counts: counts, derived_score: 0 }));
}

const SCORERS: Record<AnalysisCategory, Scorer | null> = {
  emergency_stress: scoreEmergencyStress,
  homelessness_pressure: scoreHomelessnessPressure,
  disaster_impact: scoreDisasterImpact,
  infrastructure_complaints: scoreInfrastructureComplaints,
  insurance_report: scoreInsuranceReport,
  mixed_query: null,
  unknown: null,
};

export function computeMetrics(category: AnalysisCategory, rows: Row[], logger: Logger = defaultLogger): RankedResult {
  const scorer = SCORERS[category];
  if (!rows.length) return { category, ranked: scorer !== null, locations: [], risk: null };
  if (!scorer) return { category, ranked: false, locations: passthrough(rows), risk: null };

  try {
    const { locations, risk } = scorer(rows);
    return { category, ranked: true, locations: rankLocations(locations), risk };
  } catch (e) {
    if (!(e instanceof MetricComputationError)) throw e;
    logger.warn("Metric computation fell back to passthrough", {
      component: "metric-engine",
      category,
      columns: Object.keys(rows[0] ?? {}),
      error: errorFields(e),
    });
    return { category, ranked: false, locations: passthrough(rows), risk: null };
  }
}
