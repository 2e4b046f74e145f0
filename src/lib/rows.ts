import type { Row, Scalar } from "@/lib/types";

export function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "string") return value;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "boolean") return value ? 1 : 0;
  if (Buffer.isBuffer(value)) return value.toString("base64");
  return String(value);
}

export function toRow(raw: unknown): Row {
  const row: Row = {};
  if (typeof raw !== "object" || raw === null) return row;
  for (const [key, value] of Object.entries(raw)) {
    row[key] = toScalar(value);
  }
  return row;
}

export function toNumber(value: Scalar | undefined) {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim()) {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function hasColumn(rows: Row[], column: string) {
  return rows.some((r) => column in r);
}

/** First alias present in any row, or null. */
export function pickColumn(rows: Row[], aliases: readonly string[]) {
  return aliases.find((a) => hasColumn(rows, a)) ?? null;
}

export const UNKNOWN_NEIGHBORHOOD = "Unknown";

export function neighborhoodOf(row: Row) {
  const value = row.neighborhood;
  if (typeof value === "string" && value.trim()) return value.trim();
  if (typeof value === "number") return String(value);
  return UNKNOWN_NEIGHBORHOOD;
}

export function coordinatesOf(row: Row) {
  const lat = toNumber(row.latitude ?? row.lat);
  const lng = toNumber(row.longitude ?? row.lng ?? row.lon);
  if (lat === null || lng === null) return null;
  if (Math.abs(lat) > 90 || Math.abs(lng) > 180) return null;
  return { lat, lng };
}

export function round2(value: number) {
  return Math.round(value * 100) / 100;
}
