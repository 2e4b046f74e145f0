import type { LatLng } from "@/lib/types";

/** San Francisco city hall area; used when a result carries no coordinates. */
export const DEFAULT_CENTER: LatLng = { lat: 37.7749, lng: -122.4194 };
export const DEFAULT_ZOOM = 12;
export const CLOSE_ZOOM = 13;

export function haversineMeters(a: LatLng, b: LatLng) {
  const R = 6371000;
  const toRad = (x: number) => (x * Math.PI) / 180;

  const dLat = toRad(b.lat - a.lat);
  const dLng = toRad(b.lng - a.lng);

  const lat1 = toRad(a.lat);
  const lat2 = toRad(b.lat);

  const s =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLng / 2) ** 2;

  return 2 * R * Math.asin(Math.sqrt(s));
}

export function centroid(points: LatLng[]): LatLng | null {
  if (!points.length) return null;
  const lat = points.reduce((sum, p) => sum + p.lat, 0) / points.length;
  const lng = points.reduce((sum, p) => sum + p.lng, 0) / points.length;
  return { lat, lng };
}

/** Zooms in one level when every point sits within `radiusM` of the center. */
export function zoomFor(points: LatLng[], center: LatLng, radiusM = 3000) {
  if (!points.length) return DEFAULT_ZOOM;
  return points.every((p) => haversineMeters(center, p) <= radiusM) ? CLOSE_ZOOM : DEFAULT_ZOOM;
}
