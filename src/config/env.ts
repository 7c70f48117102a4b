import type { QueueDriver, ReferenceCoordinate } from '../types/config.types';

export const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const parseOptionalFloat = (value: string | undefined): number | null => {
  if (value === undefined || value.trim() === '') {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * A reference coordinate is only usable when both halves are present and in range.
 */
export const parseReference = (
  lat: string | undefined,
  lon: string | undefined,
): ReferenceCoordinate | null => {
  const parsedLat = parseOptionalFloat(lat);
  const parsedLon = parseOptionalFloat(lon);
  if (parsedLat === null || parsedLon === null) {
    return null;
  }
  if (Math.abs(parsedLat) > 90 || Math.abs(parsedLon) > 180) {
    return null;
  }
  return { lat: parsedLat, lon: parsedLon };
};

export const parseQueueDriver = (value: string | undefined): QueueDriver => (
  value?.trim().toLowerCase() === 'redis' ? 'redis' : 'memory'
);
