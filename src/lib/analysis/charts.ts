import { riskContributions, SEVERITY_LEVELS } from "@/lib/analysis/metrics";
import { logger as defaultLogger, type Logger } from "@/lib/logger";
import { hasColumn, pickColumn, round2, toNumber } from "@/lib/rows";
import type { ChartDescriptor, LocationMetric, RankedResult, RiskInputs, Row } from "@/lib/types";

export const TOP_N = 10;

const RISK_LABELS: Record<keyof RiskInputs, string> = {
  avg_quake_severity: "Earthquake severity",
  fire_events: "Fire events",
  hazmat_events: "Hazmat events",
  infra_cases: "311 cases",
  ems_calls: "EMS calls",
  police_calls: "Police calls",
};

const COORDINATE_COLUMNS = new Set(["latitude", "longitude", "lat", "lng", "lon"]);
const TIME_COLUMN = /date|day|hour|time|week|month|year/i;

function top(result: RankedResult) {
  return result.locations.slice(0, TOP_N);
}

function countOf(location: LocationMetric, key: string) {
  return location.raw_counts[key] ?? 0;
}

function scoreBar(result: RankedResult, title: string, description: string): ChartDescriptor {
  const shown = top(result);
  return {
    type: "bar",
    title,
    description,
    data: { labels: shown.map((l) => l.name), values: shown.map((l) => l.derived_score) },
    color: "danger",
  };
}

function countBar(result: RankedResult, key: string, title: string, description: string): ChartDescriptor {
  const shown = top(result);
  return {
    type: "bar",
    title,
    description,
    data: { labels: shown.map((l) => l.name), values: shown.map((l) => round2(countOf(l, key))) },
  };
}

/** Sums `countColumns` (or 1 per row) by the values of `column`, in first-seen order. */
function distribution(rows: Row[], column: string, countColumns: readonly string[]) {
  const counter = pickColumn(rows, countColumns);
  const totals = new Map<string, number>();
  for (const row of rows) {
    const raw = row[column];
    if (raw === null || raw === undefined || raw === "") continue;
    const label = String(raw);
    const n = counter ? toNumber(row[counter]) ?? 1 : 1;
    totals.set(label, (totals.get(label) ?? 0) + n);
  }
  return { labels: [...totals.keys()], values: [...totals.values()].map(round2) };
}

const BUILDERS: Record<RankedResult["category"], (result: RankedResult, rows: Row[]) => ChartDescriptor[]> = {
  emergency_stress: (result) => {
    const shown = top(result);
    const police = result.locations.reduce((sum, l) => sum + countOf(l, "police_calls"), 0);
    const fire = result.locations.reduce((sum, l) => sum + countOf(l, "fire_ems_calls"), 0);
    return [
      scoreBar(result, "Emergency stress by neighborhood", "Police calls x 1.0 + fire/EMS calls x 1.2"),
      {
        type: "pie",
        title: "Call mix",
        description: "Share of police and fire/EMS calls",
        data: { labels: ["Police", "Fire/EMS"], values: [round2(police), round2(fire)] },
      },
      {
        type: "grouped_bar",
        title: "Police vs fire/EMS calls",
        description: "Call volume by neighborhood",
        data: {
          labels: shown.map((l) => l.name),
          datasets: [
            { label: "Police calls", values: shown.map((l) => countOf(l, "police_calls")) },
            { label: "Fire/EMS calls", values: shown.map((l) => countOf(l, "fire_ems_calls")) },
          ],
        },
      },
    ];
  },

  homelessness_pressure: (result) => [
    scoreBar(result, "Shelter pressure by neighborhood", "People waiting per sheltered bed"),
    countBar(result, "people_waiting", "People waiting for shelter", "Waitlist size by neighborhood"),
  ],

  disaster_impact: (result, rows) => {
    const levels = SEVERITY_LEVELS.filter((level) =>
      result.locations.some((l) => countOf(l, level) > 0)
    );
    const charts: ChartDescriptor[] = [
      scoreBar(result, "Disaster impact by neighborhood", "Events weighted by severity (low 1 to critical 4)"),
      {
        type: "pie",
        title: "Events by severity",
        description: "Event count per severity level",
        data: {
          labels: levels.map((l) => l[0].toUpperCase() + l.slice(1)),
          values: levels.map((level) => result.locations.reduce((sum, l) => sum + countOf(l, level), 0)),
        },
      },
    ];
    if (hasColumn(rows, "event_type")) {
      charts.push({
        type: "pie",
        title: "Events by type",
        description: "Event count per disaster type",
        data: distribution(rows, "event_type", ["event_count", "events", "count"]),
      });
    }
    return charts;
  },

  infrastructure_complaints: (result, rows) => {
    const charts: ChartDescriptor[] = [
      scoreBar(result, "311 cases by neighborhood", "Open and closed 311 cases"),
    ];
    if (hasColumn(rows, "category")) {
      charts.push({
        type: "pie",
        title: "Cases by category",
        description: "311 cases per complaint category",
        data: distribution(rows, "category", ["case_count", "cases", "complaints", "count"]),
      });
    }
    return charts;
  },

  insurance_report: (result) => {
    if (!result.risk) return [];
    const contributions = riskContributions(result.risk.inputs);
    return [
      {
        type: "bar",
        title: "Risk score contributions",
        description: `Weighted inputs behind the ${result.risk.tier} tier (score ${result.risk.score}/100)`,
        data: {
          labels: contributions.map((c) => RISK_LABELS[c.key]),
          values: contributions.map((c) => c.value),
        },
        color: result.risk.tier === "High" || result.risk.tier === "Critical" ? "danger" : "default",
      },
    ];
  },

  mixed_query: (result, rows) => genericCharts(result, rows),
  unknown: (result, rows) => genericCharts(result, rows),
};

function genericCharts(result: RankedResult, rows: Row[]): ChartDescriptor[] {
  const charts: ChartDescriptor[] = [];

  const metric = result.locations.map((l) => Object.keys(l.raw_counts)[0]).find((k) => k !== undefined);
  if (metric) {
    charts.push(countBar(result, metric, `${metric.replace(/_/g, " ")} by neighborhood`, "First numeric column per neighborhood"));
  }

  const first = rows[0];
  if (first) {
    const timeColumn = Object.keys(first).find((k) => TIME_COLUMN.test(k) && typeof first[k] === "string");
    const valueColumn = Object.keys(first).find((k) => !COORDINATE_COLUMNS.has(k) && typeof first[k] === "number");
    if (timeColumn && valueColumn && rows.length > 1) {
      charts.push({
        type: "line",
        title: `${valueColumn.replace(/_/g, " ")} over time`,
        description: `${valueColumn} by ${timeColumn}`,
        data: {
          labels: rows.map((r) => String(r[timeColumn] ?? "")),
          values: rows.map((r) => toNumber(r[valueColumn]) ?? 0),
        },
      });
    }
  }

  return charts;
}

/** Labels and every value series must be non-empty and the same length. */
export function isWellFormed(chart: ChartDescriptor) {
  const { labels } = chart.data;
  if (!labels.length) return false;
  if (chart.type === "grouped_bar") {
    return chart.data.datasets.length > 0 && chart.data.datasets.every((d) => d.values.length === labels.length);
  }
  if (chart.data.values.length !== labels.length) return false;
  if (chart.type === "pie") return chart.data.values.some((v) => v > 0);
  return true;
}

export function buildCharts(result: RankedResult, rows: Row[], logger: Logger = defaultLogger): ChartDescriptor[] {
  if (!rows.length) return [];
  const build = result.ranked ? BUILDERS[result.category] : genericCharts;
  return build(result, rows).filter((chart) => {
    const ok = isWellFormed(chart);
    if (!ok) logger.warn("Chart dropped", { component: "charts", category: result.category, chart: chart.title });
    return ok;
  });
}
