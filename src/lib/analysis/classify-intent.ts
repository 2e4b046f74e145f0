import type { AnalysisCategory } from "@/lib/types";

type SpecificCategory = Exclude<AnalysisCategory, "mixed_query" | "unknown">;

/** Ordered by priority: the first category with a matching keyword wins. */
export const CATEGORY_KEYWORDS: ReadonlyArray<readonly [SpecificCategory, readonly string[]]> = [
  ["insurance_report", ["insurance", "underwriting", "underwriter", "risk tier", "premium", "insurability"]],
  ["disaster_impact", ["disaster", "earthquake", "quake", "fire", "hazmat", "flood", "outage"]],
  ["homelessness_pressure", ["homeless", "unhoused", "shelter", "waitlist", "encampment"]],
  ["emergency_stress", ["emergency", "stress", "911", "dispatch", "ems"]],
  ["infrastructure_complaints", ["311", "complaint", "infrastructure", "pothole", "graffiti", "streetlight", "dumping", "sidewalk"]],
];

const GENERIC_KEYWORDS = [
  "how many",
  "count",
  "total",
  "calls",
  "incidents",
  "cases",
  "events",
  "neighborhood",
  "police",
  "show",
  "list",
  "top",
  "data",
  "database",
  "where",
  "which",
];

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Short keywords ("ems", "911", "top") only match at the start of a word.
function mentionsKeyword(text: string, keyword: string) {
  if (keyword.length >= 5) return text.includes(keyword);
  return new RegExp(`\\b${escapeRegExp(keyword)}`).test(text);
}

function mentions(text: string, keywords: readonly string[]) {
  return keywords.some((k) => mentionsKeyword(text, k));
}

export function classifyIntent(question: string): AnalysisCategory {
  const q = question.toLowerCase();

  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (mentions(q, keywords)) return category;
  }

  return mentions(q, GENERIC_KEYWORDS) ? "mixed_query" : "unknown";
}
