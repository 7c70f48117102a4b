import { z } from 'zod';

const nullableNumber = z.number().nullable();

export const upsertAircraftTaskSchema = z.object({
  kind: z.literal('upsert_aircraft'),
  address: z.string().min(1),
  callsign: z.string().nullable(),
  firstSeen: nullableNumber,
  lastUpdate: nullableNumber,
  assemblyTimeMs: nullableNumber.optional(),
  staleCprCount: nullableNumber.optional(),
});

export const startSessionTaskSchema = z.object({
  kind: z.literal('start_session'),
  sessionId: z.string().min(1),
  address: z.string().min(1),
  startTime: z.number(),
});

export const endSessionTaskSchema = z.object({
  kind: z.literal('end_session'),
  sessionId: z.string().min(1),
  endTime: z.number(),
});

export const insertPathTaskSchema = z.object({
  kind: z.literal('insert_path'),
  sessionId: z.string().min(1),
  address: z.string().min(1),
  ts: z.number(),
  tsIso: z.string(),
  lat: z.number(),
  lon: z.number(),
  altitude: nullableNumber,
  speed: nullableNumber,
  track: nullableNumber,
  verticalRate: nullableNumber,
  velocityType: z.string().nullable(),
});

/**
 * Queue payloads, discriminated on `kind`.
 */
export const persistenceTaskSchema = z.discriminatedUnion('kind', [
  upsertAircraftTaskSchema,
  startSessionTaskSchema,
  endSessionTaskSchema,
  insertPathTaskSchema,
]);
