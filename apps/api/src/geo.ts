import type { BoundingBox, BoxPolicy, GeoPoint } from './types.js';

// 1 degree of latitude ≈ 69 miles.
export const MILES_PER_DEGREE = 69.0;

// cos(lat) reaches 0 at the poles; the corrected policy never goes past this.
export const MAX_CORRECTED_LATITUDE = 89;

export function milesToDegrees(miles: number): number {
  return miles / MILES_PER_DEGREE;
}

function longitudeDegrees(miles: number, lat: number, policy: BoxPolicy): number {
  if (policy === 'flat') return milesToDegrees(miles);

  const clamped = Math.min(Math.max(lat, -MAX_CORRECTED_LATITUDE), MAX_CORRECTED_LATITUDE);
  return miles / (MILES_PER_DEGREE * Math.cos((clamped * Math.PI) / 180));
}

/**
 * Rectangle around `center` reaching `radiusMi` miles in each direction.
 *
 * `flat` applies the same degree offset to both axes, so boxes away from the
 * equator are narrower on the ground east-west than north-south. `corrected`
 * widens the longitude offset by 1/cos(lat) to keep the ground distance.
 */
export function boundingBox(center: GeoPoint, radiusMi: number, policy: BoxPolicy = 'flat'): BoundingBox {
  const dLat = milesToDegrees(radiusMi);
  const dLon = longitudeDegrees(radiusMi, center.lat, policy);

  return Object.freeze({
    neLat: center.lat + dLat,
    neLon: center.lon + dLon,
    swLat: center.lat - dLat,
    swLon: center.lon - dLon
  });
}
