export const ANALYSIS_CATEGORIES = [
  "emergency_stress",
  "homelessness_pressure",
  "disaster_impact",
  "infrastructure_complaints",
  "insurance_report",
  "mixed_query",
  "unknown",
] as const;

export type AnalysisCategory = (typeof ANALYSIS_CATEGORIES)[number];

export type ProviderMode = "playground" | "direct";

export type Scalar = string | number | null;

export type Row = Record<string, Scalar>;

export type SchemaDescription = {
  tables: {
    name: string;
    description?: string;
    columns: { name: string; type: "TEXT" | "INTEGER" | "REAL" }[];
  }[];
};

export type SqlSource = "provider" | "provider_with_data" | "fallback";

export type SqlResult = {
  sql: string;
  source: SqlSource;
  explanation?: string;
  rows?: Row[];
  confidence?: number;
};

export type LocationMetric = {
  name: string;
  raw_counts: Record<string, number>;
  derived_score: number;
};

export type RiskTier = "Low" | "Medium" | "High" | "Critical";

export type RiskInputs = {
  avg_quake_severity: number;
  fire_events: number;
  hazmat_events: number;
  infra_cases: number;
  ems_calls: number;
  police_calls: number;
};

export type RiskAssessment = {
  score: number;
  tier: RiskTier;
  inputs: RiskInputs;
};

export type RankedResult = {
  category: AnalysisCategory;
  ranked: boolean;
  locations: LocationMetric[];
  risk: RiskAssessment | null;
};

export type Insight = {
  summary: string;
  details: string[];
};

export type LatLng = { lat: number; lng: number };

export type Severity = "low" | "medium" | "high" | "critical";

export type HeatmapPoint = LatLng & { weight: number };

export type MapMarker = LatLng & {
  title: string;
  description: string;
  severity: Severity;
};

export type MapLayer = {
  heatmap: HeatmapPoint[];
  markers: MapMarker[];
  center: LatLng;
  zoom: number;
};

export type ChartType = "bar" | "pie" | "line" | "grouped_bar";

export type SeriesData = { labels: string[]; values: number[] };

export type GroupedSeriesData = {
  labels: string[];
  datasets: { label: string; values: number[] }[];
};

export type ChartDescriptor =
  | {
      type: "bar" | "pie" | "line";
      title: string;
      description: string;
      data: SeriesData;
      color?: "default" | "danger";
    }
  | {
      type: "grouped_bar";
      title: string;
      description: string;
      data: GroupedSeriesData;
      color?: "default" | "danger";
    };

export type AnalysisResponse = {
  analysis_type: AnalysisCategory;
  timestamp: string;
  sql_used: string;
  sql_source: SqlSource;
  sql_explanation: string;
  sql_confidence: number | null;
  insight_summary: string;
  insights: string[];
  risk_assessment: RiskAssessment | null;
  top_neighborhoods: { name: string; metrics: Record<string, number> }[];
  map_layers: MapLayer;
  chart_data: { charts: ChartDescriptor[] };
  raw_rows: Row[];
};

export type ErrorResponse = {
  ok: false;
  error: { code: string; detail: string };
};
