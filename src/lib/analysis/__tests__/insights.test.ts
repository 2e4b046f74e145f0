import { describe, expect, it } from "vitest";
import { synthesizeInsight, marginOverSecond, NO_DATA_SUMMARY } from "@/lib/analysis/insights";
import { computeMetrics } from "@/lib/analysis/metrics";
import type { RankedResult } from "@/lib/types";

const stressRows = [
  { neighborhood: "Tenderloin", police_calls: 10, fire_ems_calls: 5 },
  { neighborhood: "Mission", police_calls: 8, fire_ems_calls: 0 },
];

describe("synthesizeInsight", () => {
  it("reports no data for empty results", () => {
    const result = computeMetrics("emergency_stress", []);

    expect(synthesizeInsight(result, 0)).toEqual({ summary: NO_DATA_SUMMARY, details: [] });
  });

  it("names only the top neighborhood and its margin", () => {
    const insight = synthesizeInsight(computeMetrics("emergency_stress", stressRows), stressRows.length);

    expect(insight.summary).toBe(
      "Tenderloin ranks highest for emergency stress with a score of 16, +100% higher than second-ranked."
    );
    expect(insight.summary).not.toContain("Mission");
    expect(insight.details).toEqual([
      "#1 Tenderloin: score 16 (police calls 10, fire ems calls 5)",
      "#2 Mission: score 8 (police calls 8, fire ems calls 0)",
      "Keep standard staffing in Tenderloin and watch call volume",
    ]);
  });

  it("recommends extra units when stress is high", () => {
    const rows = [{ neighborhood: "Tenderloin", police_calls: 40, fire_ems_calls: 10 }];

    const insight = synthesizeInsight(computeMetrics("emergency_stress", rows), 1);

    expect(insight.summary).toBe("Tenderloin ranks highest for emergency stress with a score of 52.");
    expect(insight.details).toContain("Deploy additional EMS units to Tenderloin");
  });

  it("calls out ties with the second-ranked entry", () => {
    const result: RankedResult = {
      category: "infrastructure_complaints",
      ranked: true,
      locations: [
        { name: "Bayview", raw_counts: { case_count: 8 }, derived_score: 8 },
        { name: "Mission", raw_counts: { case_count: 8 }, derived_score: 8 },
      ],
      risk: null,
    };

    expect(synthesizeInsight(result, 2).summary).toBe(
      "Bayview ranks highest for 311 complaints with a score of 8, tied with the second-ranked neighborhood."
    );
  });

  it("summarises the insurance tier with recommendations and top contributors", () => {
    const rows = [
      { avg_quake_severity: 2, fire_events: 3, hazmat_events: 1, infra_cases: 10, ems_calls: 20, police_calls: 15 },
    ];

    expect(synthesizeInsight(computeMetrics("insurance_report", rows), 1)).toEqual({
      summary: "Citywide insurance risk score is 100/100 (Critical tier).",
      details: [
        "Binding pause: suspend new policies pending review",
        "Mandatory inspections before renewal",
        "Largest contributors: fire events (30), earthquake severity (24)",
      ],
    });
  });

  it("counts rows and neighborhoods for passthrough results", () => {
    const rows = [
      { neighborhood: "Mission", calls: 2 },
      { neighborhood: "SoMa", calls: 1 },
      { neighborhood: "Mission", calls: 3 },
    ];

    expect(synthesizeInsight(computeMetrics("mixed_query", rows), 3).summary).toBe(
      "Returned 3 rows across 2 neighborhoods."
    );
    expect(synthesizeInsight(computeMetrics("unknown", [{ n: 1 }]), 1).summary).toBe("Returned 1 row.");
  });
});

describe("marginOverSecond", () => {
  const entry = (name: string, derived_score: number) => ({ name, raw_counts: {}, derived_score });

  it("rounds the percentage", () => {
    expect(marginOverSecond(entry("A", 15), entry("B", 10))).toBe("+50% higher than second-ranked");
    expect(marginOverSecond(entry("A", 10), entry("B", 3))).toBe("+233% higher than second-ranked");
  });

  it("has nothing to say without a positive second score", () => {
    expect(marginOverSecond(entry("A", 5), undefined)).toBeNull();
    expect(marginOverSecond(entry("A", 5), entry("B", 0))).toBeNull();
  });
});
