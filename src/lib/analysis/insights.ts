import { riskContributions } from "@/lib/analysis/metrics";
import type { AnalysisCategory, Insight, LocationMetric, RankedResult, RiskAssessment, RiskInputs, RiskTier } from "@/lib/types";

export const NO_DATA_SUMMARY = "No data was returned for this question.";

const SCORE_LABELS: Record<AnalysisCategory, string> = {
  emergency_stress: "emergency stress",
  homelessness_pressure: "shelter pressure",
  disaster_impact: "disaster impact",
  infrastructure_complaints: "311 complaints",
  insurance_report: "insurance risk",
  mixed_query: "activity",
  unknown: "activity",
};

const RISK_INPUT_LABELS: Record<keyof RiskInputs, string> = {
  avg_quake_severity: "earthquake severity",
  fire_events: "fire events",
  hazmat_events: "hazmat events",
  infra_cases: "311 infrastructure cases",
  ems_calls: "EMS calls",
  police_calls: "police calls",
};

export const TIER_RECOMMENDATIONS: Record<RiskTier, string[]> = {
  Critical: ["Binding pause: suspend new policies pending review", "Mandatory inspections before renewal"],
  High: ["Apply a risk surcharge to new policies", "Require enhanced underwriting review"],
  Medium: ["Standard underwriting with quarterly monitoring"],
  Low: ["Standard terms apply"],
};

type Recommender = (top: LocationMetric) => string[];

const RECOMMENDATIONS: Partial<Record<AnalysisCategory, Recommender>> = {
  emergency_stress: (top) =>
    top.derived_score >= 50
      ? [`Deploy additional EMS units to ${top.name}`, `Stage extra patrol coverage in ${top.name} for the next shift`]
      : [`Keep standard staffing in ${top.name} and watch call volume`],
  homelessness_pressure: (top) =>
    top.derived_score >= 1
      ? [`Open overflow shelter capacity in ${top.name}`, `Send mobile outreach teams to ${top.name}`]
      : [`Shelter capacity in ${top.name} covers current demand; keep tracking the waitlist`],
  disaster_impact: (top) =>
    top.derived_score >= 10
      ? [`Activate emergency response protocols in ${top.name}`, `Pre-position response units near ${top.name}`]
      : [`Review response readiness in ${top.name}`],
  infrastructure_complaints: (top) =>
    top.derived_score >= 20
      ? [`Prioritize 311 crews for ${top.name}`]
      : [`Handle ${top.name} cases in the regular 311 queue`],
};

function formatNumber(value: number) {
  return String(Math.round(value * 100) / 100);
}

function plural(n: number, word: string) {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

/** "+47% higher than second-ranked", or null when there is nothing to compare. */
export function marginOverSecond(top: LocationMetric, second: LocationMetric | undefined) {
  if (!second) return null;
  if (top.derived_score === second.derived_score) return "tied with the second-ranked neighborhood";
  if (second.derived_score <= 0) return null;
  const pct = Math.round(((top.derived_score - second.derived_score) / second.derived_score) * 100);
  return `+${pct}% higher than second-ranked`;
}

function describeCounts(location: LocationMetric) {
  const parts = Object.entries(location.raw_counts).map(([k, v]) => `${k.replace(/_/g, " ")} ${formatNumber(v)}`);
  return parts.length ? ` (${parts.join(", ")})` : "";
}

function insuranceInsight(risk: RiskAssessment): Insight {
  const contributors = riskContributions(risk.inputs)
    .filter((c) => c.value > 0)
    .sort((a, b) => b.value - a.value)
    .slice(0, 2)
    .map((c) => `${RISK_INPUT_LABELS[c.key]} (${formatNumber(c.value)})`);

  return {
    summary: `Citywide insurance risk score is ${formatNumber(risk.score)}/100 (${risk.tier} tier).`,
    details: [
      ...TIER_RECOMMENDATIONS[risk.tier],
      ...(contributors.length ? [`Largest contributors: ${contributors.join(", ")}`] : []),
    ],
  };
}

export function synthesizeInsight(result: RankedResult, rowCount: number): Insight {
  if (rowCount === 0) return { summary: NO_DATA_SUMMARY, details: [] };

  if (result.risk) return insuranceInsight(result.risk);

  if (!result.ranked) {
    const summary = result.locations.length
      ? `Returned ${plural(rowCount, "row")} across ${plural(result.locations.length, "neighborhood")}.`
      : `Returned ${plural(rowCount, "row")}.`;
    return { summary, details: [] };
  }

  const [top, second] = result.locations;
  if (!top) return { summary: NO_DATA_SUMMARY, details: [] };

  const margin = marginOverSecond(top, second);
  const label = SCORE_LABELS[result.category];
  const summary = `${top.name} ranks highest for ${label} with a score of ${formatNumber(top.derived_score)}${margin ? `, ${margin}` : ""}.`;

  const ranking = result.locations
    .slice(0, 3)
    .map((l, i) => `#${i + 1} ${l.name}: score ${formatNumber(l.derived_score)}${describeCounts(l)}`);

  return {
    summary,
    details: [...ranking, ...(RECOMMENDATIONS[result.category]?.(top) ?? [])],
  };
}
