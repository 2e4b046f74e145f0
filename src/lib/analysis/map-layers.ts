import { centroid, DEFAULT_CENTER, zoomFor } from "@/lib/geo";
import { coordinatesOf, hasColumn, neighborhoodOf, round2 } from "@/lib/rows";
import type { HeatmapPoint, LatLng, LocationMetric, MapLayer, MapMarker, RankedResult, Row, Severity } from "@/lib/types";

export const MAX_MARKERS = 25;
export const MAX_POINTS = 500;

const TITLE_COLUMNS = ["call_type", "event_type", "category", "neighborhood"];
const HIDDEN_COLUMNS = new Set(["latitude", "longitude", "lat", "lng", "lon", "neighborhood"]);

function averageCoordinates(rows: Row[]) {
  const sums = new Map<string, { lat: number; lng: number; n: number }>();
  for (const row of rows) {
    const point = coordinatesOf(row);
    if (!point) continue;
    const name = neighborhoodOf(row);
    const acc = sums.get(name) ?? { lat: 0, lng: 0, n: 0 };
    sums.set(name, { lat: acc.lat + point.lat, lng: acc.lng + point.lng, n: acc.n + 1 });
  }
  const out = new Map<string, LatLng>();
  for (const [name, s] of sums) out.set(name, { lat: s.lat / s.n, lng: s.lng / s.n });
  return out;
}

export function locationWeight(location: LocationMetric) {
  if (location.derived_score > 0) return location.derived_score;
  const total = Object.values(location.raw_counts).reduce((a, b) => a + b, 0);
  return total > 0 ? total : 1;
}

function quantile(sorted: number[], p: number) {
  const pos = (sorted.length - 1) * p;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

/** Buckets each weight by the quartiles of the whole set. */
export function severityBuckets(weights: number[]): Severity[] {
  if (!weights.length) return [];
  const sorted = [...weights].sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const median = quantile(sorted, 0.5);
  const q3 = quantile(sorted, 0.75);
  // the upper buckets need a weight above Q1, so flat sets stay medium
  return weights.map((w) => {
    if (w > q1 && w >= q3) return "critical";
    if (w > q1 && w >= median) return "high";
    if (w >= q1) return "medium";
    return "low";
  });
}

function describeLocation(location: LocationMetric) {
  const counts = Object.entries(location.raw_counts)
    .slice(0, 3)
    .map(([k, v]) => `${k}: ${round2(v)}`);
  return [`score: ${round2(location.derived_score)}`, ...counts].join(" | ");
}

function fromLocations(result: RankedResult, located: Map<string, LatLng>) {
  const placed = result.locations.flatMap((location) => {
    const point = located.get(location.name);
    return point ? [{ location, point, weight: locationWeight(location) }] : [];
  });

  const heatmap: HeatmapPoint[] = placed.map(({ point, weight }) => ({ ...point, weight: round2(weight) }));

  const shown = placed.slice(0, MAX_MARKERS);
  const severities = severityBuckets(shown.map((p) => p.weight));
  const markers: MapMarker[] = shown.map(({ location, point }, i) => ({
    ...point,
    title: location.name,
    description: describeLocation(location),
    severity: severities[i] ?? "low",
  }));

  return { heatmap, markers };
}

function rowTitle(row: Row) {
  for (const column of TITLE_COLUMNS) {
    const value = row[column];
    if (typeof value === "string" && value.trim()) return value;
  }
  return "Incident";
}

function isSeverity(value: string): value is Severity {
  return value === "low" || value === "medium" || value === "high" || value === "critical";
}

function rowSeverity(row: Row): Severity {
  const value = typeof row.severity === "string" ? row.severity.trim().toLowerCase() : "";
  return isSeverity(value) ? value : "low";
}

function fromRows(rows: Row[]) {
  const located = rows.flatMap((row) => {
    const point = coordinatesOf(row);
    return point ? [{ row, point }] : [];
  });

  const heatmap: HeatmapPoint[] = located.slice(0, MAX_POINTS).map(({ point }) => ({ ...point, weight: 1 }));
  const markers: MapMarker[] = located.slice(0, MAX_MARKERS).map(({ row, point }) => ({
    ...point,
    title: rowTitle(row),
    description: Object.entries(row)
      .filter(([k]) => !HIDDEN_COLUMNS.has(k))
      .slice(0, 3)
      .map(([k, v]) => `${k}: ${v}`)
      .join(" | "),
    severity: rowSeverity(row),
  }));

  return { heatmap, markers };
}

/**
 * Ranked locations are placed at the mean coordinates of their rows; results
 * without a neighborhood column plot the rows themselves.
 */
export function buildMapLayers(rows: Row[], result: RankedResult): MapLayer {
  const located = hasColumn(rows, "neighborhood") ? averageCoordinates(rows) : new Map<string, LatLng>();
  const { heatmap, markers } =
    located.size && result.locations.length ? fromLocations(result, located) : fromRows(rows);

  const center = centroid(heatmap) ?? DEFAULT_CENTER;
  return { heatmap, markers, center, zoom: zoomFor(heatmap, center) };
}
