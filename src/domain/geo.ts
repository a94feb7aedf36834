import type { Area, GeoPosition } from './types';

const EARTH_RADIUS_KM = 6371;

const toRadians = (deg: number): number => (deg * Math.PI) / 180;

/**
 * Great-circle distance in kilometres.
 */
export function distanceKm(a: GeoPosition, b: GeoPosition): number {
  const dLat = toRadians(b.lat - a.lat);
  const dLon = toRadians(b.lon - a.lon);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Name of the closest configured area containing `position`. Points outside
 * every area fall into a sector named after the rounded coordinates.
 */
export function resolveArea(position: GeoPosition, areas: readonly Area[]): string {
  let best: { name: string; distance: number } | null = null;
  for (const area of areas) {
    const distance = distanceKm(position, area.center);
    if (distance <= area.radiusKm && (best === null || distance < best.distance)) {
      best = { name: area.name, distance };
    }
  }
  if (best) return best.name;
  return `Sector ${position.lat.toFixed(2)},${position.lon.toFixed(2)}`;
}

export function areaCenter(name: string, areas: readonly Area[]): GeoPosition | null {
  const area = areas.find((a) => a.name === name);
  return area ? area.center : null;
}

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
