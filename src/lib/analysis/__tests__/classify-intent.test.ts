import { describe, expect, it } from "vitest";
import { classifyIntent } from "@/lib/analysis/classify-intent";
import demoQueries from "@/data/demo-queries.json";

describe("classifyIntent", () => {
  it("routes insurance wording to insurance_report in any casing", () => {
    expect(classifyIntent("Generate an INSURANCE report")).toBe("insurance_report");
    expect(classifyIntent("underwriting summary for the city")).toBe("insurance_report");
    expect(classifyIntent("Underwriting view of fire-prone areas")).toBe("insurance_report");
  });

  it("recognises each analysis category", () => {
    expect(classifyIntent("Show me all disaster events in the past 24 hours")).toBe("disaster_impact");
    expect(classifyIntent("Which neighborhoods have the highest shelter waitlist counts?")).toBe("homelessness_pressure");
    expect(classifyIntent("What are the top 5 neighborhoods with the most emergency calls?")).toBe("emergency_stress");
    expect(classifyIntent("What is the total number of 311 cases?")).toBe("infrastructure_complaints");
  });

  it("falls back to mixed_query for generic data questions", () => {
    expect(classifyIntent("How many police calls are in the database?")).toBe("mixed_query");
  });

  it("returns unknown when nothing matches", () => {
    expect(classifyIntent("hello there")).toBe("unknown");
  });

  it("matches short keywords only at the start of a word", () => {
    expect(classifyIntent("What problems came up?")).toBe("unknown");
    expect(classifyIntent("EMS response in the Mission")).toBe("emergency_stress");
  });
});

describe("demo questions", () => {
  it("each route to the analysis they demonstrate", () => {
    expect(demoQueries.queries.map(classifyIntent)).toEqual([
      "mixed_query",
      "emergency_stress",
      "disaster_impact",
      "infrastructure_complaints",
      "homelessness_pressure",
      "mixed_query",
      "emergency_stress",
      "disaster_impact",
      "mixed_query",
      "emergency_stress",
    ]);
  });
});
