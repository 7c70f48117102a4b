import type { Coordinate } from '../types/aircraft.types';

export const EARTH_RADIUS_NM = 3440.065;
export const KM_PER_NM = 1.852;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

export function haversineNm(from: Coordinate, to: Coordinate): number {
  const phi1 = toRadians(from.lat);
  const phi2 = toRadians(to.lat);
  const dPhi = toRadians(to.lat - from.lat);
  const dLambda = toRadians(to.lon - from.lon);
  const a = Math.sin(dPhi / 2) ** 2
    + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_NM * c;
}

export interface DistanceAnnotation {
  distanceNm: number | null;
  distanceKm: number | null;
}

/**
 * Distance of a position from the receiver. Without a reference both fields are null.
 */
export function distanceFromReference(
  position: Coordinate | null,
  reference: Coordinate | null,
): DistanceAnnotation {
  if (!reference || !position) {
    return { distanceNm: null, distanceKm: null };
  }
  const distanceNm = haversineNm(position, reference);
  return { distanceNm, distanceKm: distanceNm * KM_PER_NM };
}
