/**
 * Write tasks handed from the stream subscriber to the persistence worker.
 * Plain values only so they can cross a queue (in-process or Redis) unchanged.
 */

export interface UpsertAircraftTask {
  kind: 'upsert_aircraft';
  address: string;
  callsign: string | null;
  firstSeen: number | null;
  lastUpdate: number | null;
  assemblyTimeMs?: number | null;
  staleCprCount?: number | null;
}

export interface StartSessionTask {
  kind: 'start_session';
  sessionId: string;
  address: string;
  startTime: number;
}

export interface EndSessionTask {
  kind: 'end_session';
  sessionId: string;
  endTime: number;
}

export interface InsertPathTask {
  kind: 'insert_path';
  sessionId: string;
  address: string;
  ts: number;
  tsIso: string;
  lat: number;
  lon: number;
  altitude: number | null;
  speed: number | null;
  track: number | null;
  verticalRate: number | null;
  velocityType: string | null;
}

export type PersistenceTask =
  | UpsertAircraftTask
  | StartSessionTask
  | EndSessionTask
  | InsertPathTask;

export type PersistenceTaskKind = PersistenceTask['kind'];

export interface FlightSession {
  id: string;
  aircraftAddress: string;
  startTime: number;
  endTime: number | null;
}

/**
 * An open session together with the latest path activity of its aircraft.
 */
export interface OpenSessionActivity {
  id: string;
  aircraftAddress: string;
  startTime: number;
  lastActivity: number;
}
