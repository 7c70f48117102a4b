import type { Coordinate } from '../types/aircraft.types';

export interface CprFrame {
  typeCode: number;
  cprLat: number;
  cprLon: number;
  timestamp: number;
}

const NZ = 15;
const AIRBORNE_D_LAT_EVEN = 360 / 60;
const AIRBORNE_D_LAT_ODD = 360 / 59;
const SURFACE_D_LAT_EVEN = 90 / 60;
const SURFACE_D_LAT_ODD = 90 / 59;

const floorMod = (value: number, modulus: number): number => ((value % modulus) + modulus) % modulus;

const round5 = (value: number): number => Math.round(value * 1e5) / 1e5;

/**
 * Number of longitude zones at a given latitude.
 */
export function cprNL(lat: number): number {
  if (Math.abs(lat) <= 1e-8) {
    return 59;
  }
  if (Math.abs(Math.abs(lat) - 87) <= 1e-8 + 1e-5 * 87) {
    return 2;
  }
  if (lat > 87 || lat < -87) {
    return 1;
  }
  const a = 1 - Math.cos(Math.PI / (2 * NZ));
  const b = Math.cos((Math.PI / 180) * Math.abs(lat)) ** 2;
  return Math.floor((2 * Math.PI) / Math.acos(1 - a / b));
}

const isAirborne = (tc: number): boolean => (tc >= 9 && tc <= 18) || (tc >= 20 && tc <= 22);
const isSurface = (tc: number): boolean => tc >= 5 && tc <= 8;

export function airbornePosition(even: CprFrame, odd: CprFrame): Coordinate | null {
  const j = Math.floor(59 * even.cprLat - 60 * odd.cprLat + 0.5);
  let latEven = AIRBORNE_D_LAT_EVEN * (floorMod(j, 60) + even.cprLat);
  let latOdd = AIRBORNE_D_LAT_ODD * (floorMod(j, 59) + odd.cprLat);
  if (latEven >= 270) {
    latEven -= 360;
  }
  if (latOdd >= 270) {
    latOdd -= 360;
  }

  // Both halves must fall in the same longitude zone
  if (cprNL(latEven) !== cprNL(latOdd)) {
    return null;
  }

  const useEven = even.timestamp > odd.timestamp;
  const lat = useEven ? latEven : latOdd;
  const nl = cprNL(lat);
  const ni = Math.max(useEven ? nl : nl - 1, 1);
  const m = Math.floor(even.cprLon * (nl - 1) - odd.cprLon * nl + 0.5);
  let lon = (360 / ni) * (floorMod(m, ni) + (useEven ? even.cprLon : odd.cprLon));
  if (lon > 180) {
    lon -= 360;
  }

  return { lat: round5(lat), lon: round5(lon) };
}

/**
 * Surface encodings cover a 90 degree sector, so a nearby reference picks
 * the hemisphere and the longitude quadrant.
 */
export function surfacePosition(even: CprFrame, odd: CprFrame, reference: Coordinate): Coordinate | null {
  const j = Math.floor(59 * even.cprLat - 60 * odd.cprLat + 0.5);
  const latEvenNorth = SURFACE_D_LAT_EVEN * (floorMod(j, 60) + even.cprLat);
  const latOddNorth = SURFACE_D_LAT_ODD * (floorMod(j, 59) + odd.cprLat);
  const latEven = reference.lat > 0 ? latEvenNorth : latEvenNorth - 90;
  const latOdd = reference.lat > 0 ? latOddNorth : latOddNorth - 90;

  if (cprNL(latEven) !== cprNL(latOdd)) {
    return null;
  }

  const useEven = even.timestamp > odd.timestamp;
  const lat = useEven ? latEven : latOdd;
  const nl = cprNL(lat);
  const ni = Math.max(useEven ? nl : nl - 1, 1);
  const m = Math.floor(even.cprLon * (nl - 1) - odd.cprLon * nl + 0.5);
  const base = (90 / ni) * (floorMod(m, ni) + (useEven ? even.cprLon : odd.cprLon));

  const candidates = [base, base + 90, base + 180, base + 270]
    .map((lon) => floorMod(lon + 180, 360) - 180);
  let lon = candidates[0];
  for (const candidate of candidates) {
    if (Math.abs(candidate - reference.lon) < Math.abs(lon - reference.lon)) {
      lon = candidate;
    }
  }

  return { lat: round5(lat), lon: round5(lon) };
}

/**
 * Global decode of an even/odd pair. Mixed airborne and surface frames never
 * resolve, and surface pairs need a reference coordinate.
 */
export function resolveGlobalPosition(
  even: CprFrame,
  odd: CprFrame,
  reference: Coordinate | null,
): Coordinate | null {
  if (isAirborne(even.typeCode) && isAirborne(odd.typeCode)) {
    return airbornePosition(even, odd);
  }
  if (isSurface(even.typeCode) && isSurface(odd.typeCode)) {
    return reference ? surfacePosition(even, odd, reference) : null;
  }
  return null;
}
