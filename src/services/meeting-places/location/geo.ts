import type { CenterLocation, GeoPoint } from '../types.js';

/** (0, 0) marks a district-only anchor with no usable coordinates. */
export function isSentinel(point: GeoPoint): boolean {
  return point.latitude === 0 && point.longitude === 0;
}

export function sentinelLocation(district: string): CenterLocation {
  return { latitude: 0, longitude: 0, district };
}

/** Arithmetic mean of the points; callers pass at least one. */
export function centroid(points: readonly GeoPoint[]): GeoPoint {
  let latitude = 0;
  let longitude = 0;
  for (const point of points) {
    latitude += point.latitude;
    longitude += point.longitude;
  }
  return { latitude: latitude / points.length, longitude: longitude / points.length };
}
