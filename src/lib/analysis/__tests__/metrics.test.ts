import { describe, expect, it } from "vitest";
import { fakeLogger } from "@/lib/__tests__/fake-logger";
import { withFields } from "@/lib/logger";
import { assessRisk, computeMetrics, riskContributions, riskTier, severityWeight } from "@/lib/analysis/metrics";
import type { RiskInputs } from "@/lib/types";

const insuranceRow = {
  avg_quake_severity: 2,
  fire_events: 3,
  hazmat_events: 1,
  infra_311_cases: 10,
  fire_ems_calls: 20,
  police_calls: 15,
};

describe("computeMetrics: emergency_stress", () => {
  it("weights fire/EMS calls at 1.2 and accepts count aliases", () => {
    const result = computeMetrics("emergency_stress", [
      { neighborhood: "Tenderloin", police_call_count: 10, fire_ems_call_count: 5 },
    ]);

    expect(result).toEqual({
      category: "emergency_stress",
      ranked: true,
      locations: [{ name: "Tenderloin", raw_counts: { police_calls: 10, fire_ems_calls: 5 }, derived_score: 16 }],
      risk: null,
    });
  });

  it("sorts by score and breaks ties by name", () => {
    const result = computeMetrics("emergency_stress", [
      { neighborhood: "Mission", police_calls: 5, fire_ems_calls: 0 },
      { neighborhood: "Bayview", police_calls: 5, fire_ems_calls: 0 },
      { neighborhood: "SoMa", police_calls: 12, fire_ems_calls: 0 },
    ]);

    expect(result.locations.map((l) => l.name)).toEqual(["SoMa", "Bayview", "Mission"]);
  });

  it("buckets rows without a neighborhood as Unknown", () => {
    const result = computeMetrics("emergency_stress", [
      { neighborhood: null, police_calls: 2, fire_ems_calls: 0 },
      { neighborhood: "", police_calls: 1, fire_ems_calls: 0 },
    ]);

    expect(result.locations).toEqual([
      { name: "Unknown", raw_counts: { police_calls: 3, fire_ems_calls: 0 }, derived_score: 3 },
    ]);
  });
});

describe("computeMetrics: homelessness_pressure", () => {
  it("sums waiting, keeps the largest capacity and divides by at least 1", () => {
    const result = computeMetrics("homelessness_pressure", [
      { neighborhood: "Mission", people_waiting: 30, capacity_baseline: 20 },
      { neighborhood: "Mission", people_waiting: 10, capacity_baseline: 20 },
      { neighborhood: "Bayview", people_waiting: 5, capacity_baseline: null },
    ]);

    expect(result.locations).toEqual([
      { name: "Bayview", raw_counts: { people_waiting: 5, capacity_baseline: 0 }, derived_score: 5 },
      { name: "Mission", raw_counts: { people_waiting: 40, capacity_baseline: 20 }, derived_score: 2 },
    ]);
  });

  it("rounds the ratio to two decimals", () => {
    const result = computeMetrics("homelessness_pressure", [
      { neighborhood: "SoMa", total_waiting: 10, shelter_capacity: 3 },
    ]);

    expect(result.locations[0]?.derived_score).toBe(3.33);
  });
});

describe("computeMetrics: disaster_impact", () => {
  it("weights event counts by severity", () => {
    const result = computeMetrics("disaster_impact", [
      { neighborhood: "Mission", severity: "High", event_count: 2 },
      { neighborhood: "Mission", severity: "low", event_count: 1 },
      { neighborhood: "SoMa", severity: "Critical", event_count: 1 },
      { neighborhood: "SoMa", severity: null, event_count: 3 },
    ]);

    expect(result.locations).toEqual([
      { name: "Mission", raw_counts: { events: 3, high: 2, low: 1 }, derived_score: 7 },
      { name: "SoMa", raw_counts: { events: 4, critical: 1 }, derived_score: 7 },
    ]);
  });

  it("counts one event per row without a count column", () => {
    const result = computeMetrics("disaster_impact", [
      { neighborhood: "Marina", severity: "medium" },
      { neighborhood: "Marina", severity: "medium" },
    ]);

    expect(result.locations[0]).toEqual({ name: "Marina", raw_counts: { events: 2, medium: 2 }, derived_score: 4 });
  });
});

describe("severityWeight", () => {
  it("maps named levels case-insensitively and keeps numbers", () => {
    expect(severityWeight("CRITICAL")).toBe(4);
    expect(severityWeight("unheard-of")).toBe(1);
    expect(severityWeight(2.5)).toBe(2.5);
    expect(severityWeight(undefined)).toBe(1);
  });
});

describe("computeMetrics: infrastructure_complaints", () => {
  it("sums cases per neighborhood", () => {
    const result = computeMetrics("infrastructure_complaints", [
      { neighborhood: "Mission", category: "Graffiti", case_count: 4 },
      { neighborhood: "Mission", category: "Potholes", case_count: 3 },
      { neighborhood: "SoMa", category: "Graffiti", case_count: 9 },
    ]);

    expect(result.locations.map((l) => [l.name, l.derived_score])).toEqual([
      ["SoMa", 9],
      ["Mission", 7],
    ]);
  });
});

describe("computeMetrics: insurance_report", () => {
  it("aggregates to a single citywide entry with a risk tier", () => {
    const result = computeMetrics("insurance_report", [insuranceRow]);

    expect(result.ranked).toBe(true);
    expect(result.locations).toHaveLength(1);
    expect(result.locations[0]?.name).toBe("Citywide");
    expect(result.risk).toEqual({
      score: 100,
      tier: "Critical",
      inputs: {
        avg_quake_severity: 2,
        fire_events: 3,
        hazmat_events: 1,
        infra_cases: 10,
        ems_calls: 20,
        police_calls: 15,
      },
    });
  });

  it("averages quake severity and sums the counts across rows", () => {
    const result = computeMetrics("insurance_report", [
      { avg_quake_severity: 1, fire_events: 1 },
      { avg_quake_severity: 3, fire_events: 2 },
      { avg_quake_severity: null, fire_events: 0 },
    ]);

    expect(result.risk?.inputs.avg_quake_severity).toBe(2);
    expect(result.risk?.inputs.fire_events).toBe(3);
    expect(result.risk?.score).toBe(54);
    expect(result.risk?.tier).toBe("High");
  });
});

describe("risk scoring", () => {
  const inputs: RiskInputs = {
    avg_quake_severity: 2,
    fire_events: 3,
    hazmat_events: 1,
    infra_cases: 10,
    ems_calls: 20,
    police_calls: 15,
  };

  it("breaks the score into weighted contributions", () => {
    expect(riskContributions(inputs).map((c) => c.value)).toEqual([24, 30, 12, 20, 8, 6]);
  });

  it("clamps to 100", () => {
    expect(assessRisk({ ...inputs, fire_events: 20 }).score).toBe(100);
  });

  it("uses inclusive upper tier bounds", () => {
    expect(riskTier(25)).toBe("Low");
    expect(riskTier(25.01)).toBe("Medium");
    expect(riskTier(50)).toBe("Medium");
    expect(riskTier(75)).toBe("High");
    expect(riskTier(75.01)).toBe("Critical");
  });
});

describe("computeMetrics: passthrough and failures", () => {
  it("returns an empty result for no rows", () => {
    expect(computeMetrics("emergency_stress", [])).toEqual({
      category: "emergency_stress",
      ranked: true,
      locations: [],
      risk: null,
    });
  });

  it("groups generic results by neighborhood in first-seen order", () => {
    const result = computeMetrics("mixed_query", [
      { neighborhood: "Mission", calls: 2, latitude: 37.76 },
      { neighborhood: "SoMa", calls: 1 },
      { neighborhood: "Mission", calls: 3 },
    ]);

    expect(result).toEqual({
      category: "mixed_query",
      ranked: false,
      locations: [
        { name: "Mission", raw_counts: { calls: 5 }, derived_score: 0 },
        { name: "SoMa", raw_counts: { calls: 1 }, derived_score: 0 },
      ],
      risk: null,
    });
  });

  it("has no locations without a neighborhood column", () => {
    expect(computeMetrics("unknown", [{ police_calls: 4 }]).locations).toEqual([]);
  });

  it("falls back to passthrough when required columns are missing", () => {
    const logger = fakeLogger();

    const question = "Which neighborhoods are under the most emergency stress?";

    const result = computeMetrics("emergency_stress", [{ neighborhood: "Mission", total: 3 }], withFields(logger, { question }));

    expect(result.ranked).toBe(false);
    expect(result.locations).toEqual([{ name: "Mission", raw_counts: { total: 3 }, derived_score: 0 }]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Metric computation fell back to passthrough",
      expect.objectContaining({ question, category: "emergency_stress", component: "metric-engine" })
    );
  });
});
