import { z } from 'zod';

const nullableNumber = z.number().nullable().default(null);

export const coordinateSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

export const velocitySchema = z.object({
  speed: nullableNumber,
  track: nullableNumber,
  verticalRate: nullableNumber,
  type: z.enum(['GS', 'IAS', 'TAS']),
});

export const snapshotEntrySchema = z.object({
  // The mapping key is authoritative; publishers may omit this field
  address: z.string().min(1).optional(),
  callsign: z.string().nullable().default(null),
  position: coordinateSchema.nullable().default(null),
  altitude: nullableNumber,
  velocity: velocitySchema.nullable().default(null),
  firstSeen: z.number(),
  lastUpdate: z.number(),
  distanceNm: nullableNumber,
  distanceKm: nullableNumber,
  assemblyTimeMs: nullableNumber,
  staleCprCount: z.number().int().nonnegative().default(0),
});

/**
 * Broadcast payload: aircraft records keyed by hex address.
 */
export const snapshotSchema = z.record(z.string(), snapshotEntrySchema);

/**
 * Top-level shape only; entries are validated one by one.
 */
export const snapshotEnvelopeSchema = z.record(z.string(), z.unknown());

export type SnapshotEntry = z.infer<typeof snapshotEntrySchema>;
export type SnapshotPayload = z.infer<typeof snapshotSchema>;
