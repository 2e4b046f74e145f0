import { classifyIntent } from "@/lib/analysis/classify-intent";
import { planStrategy } from "@/lib/analysis/plan-strategy";
import { PRIMARY_TABLE } from "@/lib/schema";
import type { AnalysisCategory, SqlResult } from "@/lib/types";

export const LAST_RESORT_LIMIT = 50;

type Template = {
  name: string;
  matches: (q: string, category: AnalysisCategory) => boolean;
  sql: (window: string) => string;
  explanation: string;
  confidence: number;
};

const SEVERITY_WEIGHT_SQL = `CASE lower(severity) WHEN 'low' THEN 1 WHEN 'medium' THEN 2 WHEN 'high' THEN 3 WHEN 'critical' THEN 4 END`;

const emergencyStressSql = (w: string) => `
WITH police AS (
  SELECT neighborhood, COUNT(*) AS police_calls, AVG(latitude) AS latitude, AVG(longitude) AS longitude
  FROM sf_police_calls_rt
  WHERE datetime(received_datetime) >= datetime('now', '${w}')
  GROUP BY neighborhood
),
fire AS (
  SELECT neighborhood, COUNT(*) AS fire_ems_calls, AVG(latitude) AS latitude, AVG(longitude) AS longitude
  FROM sf_fire_ems_calls
  WHERE datetime(received_datetime) >= datetime('now', '${w}')
  GROUP BY neighborhood
),
areas AS (
  SELECT neighborhood FROM police
  UNION
  SELECT neighborhood FROM fire
)
SELECT
  a.neighborhood,
  COALESCE(p.police_calls, 0) AS police_calls,
  COALESCE(f.fire_ems_calls, 0) AS fire_ems_calls,
  COALESCE(p.police_calls, 0) * 1.0 + COALESCE(f.fire_ems_calls, 0) * 1.2 AS stress_score,
  COALESCE(p.latitude, f.latitude) AS latitude,
  COALESCE(p.longitude, f.longitude) AS longitude
FROM areas a
LEFT JOIN police p ON p.neighborhood IS a.neighborhood
LEFT JOIN fire f ON f.neighborhood IS a.neighborhood
ORDER BY stress_score DESC
LIMIT 20`;

const homelessnessSql = (w: string) => `
SELECT
  w.neighborhood,
  SUM(w.people_waiting) AS people_waiting,
  COALESCE(MAX(b.sheltered_count), 0) AS capacity_baseline,
  (SELECT AVG(c.latitude) FROM sf_311_cases c WHERE c.neighborhood = w.neighborhood) AS latitude,
  (SELECT AVG(c.longitude) FROM sf_311_cases c WHERE c.neighborhood = w.neighborhood) AS longitude
FROM sf_shelter_waitlist w
LEFT JOIN sf_homeless_baseline b ON b.neighborhood = w.neighborhood
WHERE date(w.snapshot_date) >= date('now', '${w}')
GROUP BY w.neighborhood
ORDER BY people_waiting DESC
LIMIT 20`;

const disasterSql = (w: string) => `
SELECT
  neighborhood,
  event_type,
  severity,
  COUNT(*) AS event_count,
  AVG(latitude) AS latitude,
  AVG(longitude) AS longitude
FROM sf_disaster_events
WHERE datetime(timestamp) >= datetime('now', '${w}')
GROUP BY neighborhood, event_type, severity
ORDER BY event_count DESC`;

const infrastructureSql = (w: string) => `
SELECT
  neighborhood,
  category,
  COUNT(*) AS case_count,
  AVG(latitude) AS latitude,
  AVG(longitude) AS longitude
FROM sf_311_cases
WHERE datetime(opened_datetime) >= datetime('now', '${w}')
GROUP BY neighborhood, category
ORDER BY case_count DESC`;

const insuranceSql = (w: string) => `
SELECT
  (SELECT AVG(${SEVERITY_WEIGHT_SQL}) FROM sf_disaster_events
    WHERE lower(event_type) = 'earthquake' AND datetime(timestamp) >= datetime('now', '${w}')) AS avg_quake_severity,
  (SELECT COUNT(*) FROM sf_disaster_events
    WHERE lower(event_type) = 'fire' AND datetime(timestamp) >= datetime('now', '${w}')) AS fire_events,
  (SELECT COUNT(*) FROM sf_disaster_events
    WHERE lower(event_type) = 'hazmat' AND datetime(timestamp) >= datetime('now', '${w}')) AS hazmat_events,
  (SELECT COUNT(*) FROM sf_311_cases
    WHERE datetime(opened_datetime) >= datetime('now', '${w}')) AS infra_cases,
  (SELECT COUNT(*) FROM sf_fire_ems_calls
    WHERE datetime(received_datetime) >= datetime('now', '${w}')) AS ems_calls,
  (SELECT COUNT(*) FROM sf_police_calls_rt
    WHERE datetime(received_datetime) >= datetime('now', '${w}')) AS police_calls`;

const neighborhoodOverviewSql = (w: string) => `
SELECT
  neighborhood,
  COUNT(*) AS police_calls,
  AVG(latitude) AS latitude,
  AVG(longitude) AS longitude
FROM sf_police_calls_rt
WHERE neighborhood IS NOT NULL
  AND datetime(received_datetime) >= datetime('now', '${w}')
GROUP BY neighborhood
ORDER BY police_calls DESC
LIMIT 20`;

const has = (q: string, ...words: string[]) => words.some((w) => q.includes(w));

/** Checked in order; the first match wins. */
const TEMPLATES: Template[] = [
  {
    name: "count_police",
    matches: (q) => has(q, "how many") && has(q, "police"),
    sql: () => "SELECT COUNT(*) AS police_calls FROM sf_police_calls_rt",
    explanation: "Total number of police calls",
    confidence: 0.8,
  },
  {
    name: "count_fire_ems",
    matches: (q) => has(q, "how many") && has(q, "fire", "ems"),
    sql: () => "SELECT COUNT(*) AS fire_ems_calls FROM sf_fire_ems_calls",
    explanation: "Total number of fire and EMS calls",
    confidence: 0.8,
  },
  {
    name: "count_311",
    matches: (q) => has(q, "how many") && has(q, "311"),
    sql: () => "SELECT COUNT(*) AS cases_311 FROM sf_311_cases",
    explanation: "Total number of 311 cases",
    confidence: 0.8,
  },
  {
    name: "count_neighborhoods",
    matches: (q) => has(q, "how many") && has(q, "neighborhoods"),
    sql: () => "SELECT COUNT(*) AS neighborhoods FROM neighborhoods",
    explanation: "Number of neighborhoods on record",
    confidence: 0.8,
  },
  {
    name: "insurance_report",
    matches: (_q, c) => c === "insurance_report",
    sql: insuranceSql,
    explanation: "Citywide insurance risk inputs: earthquake severity, fire and hazmat events, 311 cases and call volumes",
    confidence: 0.75,
  },
  {
    name: "disaster_impact",
    matches: (_q, c) => c === "disaster_impact",
    sql: disasterSql,
    explanation: "Disaster events by neighborhood, type and severity",
    confidence: 0.85,
  },
  {
    name: "homelessness_pressure",
    matches: (_q, c) => c === "homelessness_pressure",
    sql: homelessnessSql,
    explanation: "Shelter waitlist against sheltered baseline by neighborhood",
    confidence: 0.75,
  },
  {
    name: "emergency_stress",
    matches: (_q, c) => c === "emergency_stress",
    sql: emergencyStressSql,
    explanation: "Emergency stress by neighborhood combining police and fire/EMS calls",
    confidence: 0.85,
  },
  {
    name: "infrastructure_complaints",
    matches: (_q, c) => c === "infrastructure_complaints",
    sql: infrastructureSql,
    explanation: "311 cases by neighborhood and category",
    confidence: 0.8,
  },
  {
    name: "neighborhood_overview",
    matches: (q) => has(q, "neighborhood", "police"),
    sql: neighborhoodOverviewSql,
    explanation: "Police calls by neighborhood",
    confidence: 0.7,
  },
];

/**
 * Local rule-based SQL. Pure: the same question always yields the same SQL.
 */
export function generateFallbackSql(question: string): SqlResult {
  const q = question.toLowerCase();
  const category = classifyIntent(question);
  const template = TEMPLATES.find((t) => t.matches(q, category));

  if (!template) {
    return {
      sql: `SELECT * FROM ${PRIMARY_TABLE} LIMIT ${LAST_RESORT_LIMIT}`,
      source: "fallback",
      explanation: "No template matched the question; showing recent police calls",
      confidence: 0.3,
    };
  }

  const { window } = planStrategy(category);
  return {
    sql: template.sql(window).trim(),
    source: "fallback",
    explanation: template.explanation,
    confidence: template.confidence,
  };
}
