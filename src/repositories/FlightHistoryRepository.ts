import type {
  InsertPathTask,
  OpenSessionActivity,
  StartSessionTask,
  UpsertAircraftTask,
} from '../types/persistence.types';
import SchemaRepository, { type SqlClient } from './SchemaRepository';

/**
 * Durable store for aircraft, flight sessions and path points.
 */
export interface FlightHistoryStore {
  initialize(): Promise<void>;
  upsertAircraft(task: UpsertAircraftTask): Promise<void>;
  /** Insert if absent; resolves false when the id already existed. */
  insertSession(task: StartSessionTask): Promise<boolean>;
  endSession(sessionId: string, endTime: number): Promise<void>;
  insertPath(task: InsertPathTask): Promise<void>;
  findOpenSessions(address?: string): Promise<OpenSessionActivity[]>;
  close(): Promise<void>;
}

/**
 * Connection lifecycle hooks; DatabaseConnection satisfies this.
 */
export interface StorageLifecycle {
  verify(): Promise<void>;
  close(): Promise<void>;
}

interface OpenSessionRow {
  id: string;
  aircraft_address: string;
  start_time: number | string;
  last_activity: number | string;
}

const UPSERT_AIRCRAFT = `
  INSERT INTO aircraft (address, callsign, first_seen, last_seen, assembly_time_ms, stale_cpr_count)
  VALUES ($1, $2, $3, $4, $5, $6)
  ON CONFLICT (address) DO UPDATE SET
    callsign = COALESCE(EXCLUDED.callsign, aircraft.callsign),
    first_seen = LEAST(aircraft.first_seen, EXCLUDED.first_seen),
    last_seen = GREATEST(aircraft.last_seen, EXCLUDED.last_seen),
    assembly_time_ms = COALESCE(EXCLUDED.assembly_time_ms, aircraft.assembly_time_ms),
    stale_cpr_count = COALESCE(EXCLUDED.stale_cpr_count, aircraft.stale_cpr_count)
`;

const INSERT_SESSION = `
  INSERT INTO flight_session (id, aircraft_address, start_time, end_time)
  VALUES ($1, $2, $3, NULL)
  ON CONFLICT (id) DO NOTHING
  RETURNING id
`;

const END_SESSION = `
  UPDATE flight_session SET end_time = $2
  WHERE id = $1 AND end_time IS NULL
`;

const INSERT_PATH = `
  INSERT INTO path (session_id, address, ts, ts_iso, lat, lon, alt, velocity, track, vertical_rate, type)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
`;

const OPEN_SESSIONS = `
  SELECT s.id, s.aircraft_address, s.start_time,
    GREATEST(
      s.start_time,
      COALESCE((SELECT MAX(p.ts) FROM path p WHERE p.session_id = s.id), s.start_time)
    ) AS last_activity
  FROM flight_session s
  WHERE s.end_time IS NULL
`;

const toNumber = (value: number | string): number => (typeof value === 'number' ? value : Number(value));

class FlightHistoryRepository implements FlightHistoryStore {
  private schema: SchemaRepository;

  constructor(
    private readonly db: SqlClient,
    private readonly lifecycle: StorageLifecycle | null = null,
  ) {
    this.schema = new SchemaRepository(db);
  }

  async initialize(): Promise<void> {
    if (this.lifecycle) {
      await this.lifecycle.verify();
    }
    await this.schema.initialize();
  }

  async upsertAircraft(task: UpsertAircraftTask): Promise<void> {
    await this.db.none(UPSERT_AIRCRAFT, [
      task.address,
      task.callsign,
      task.firstSeen,
      task.lastUpdate,
      task.assemblyTimeMs ?? null,
      task.staleCprCount ?? null,
    ]);
  }

  async insertSession(task: StartSessionTask): Promise<boolean> {
    const rows = await this.db.any<{ id: string }>(INSERT_SESSION, [
      task.sessionId,
      task.address,
      task.startTime,
    ]);
    return rows.length > 0;
  }

  async endSession(sessionId: string, endTime: number): Promise<void> {
    await this.db.none(END_SESSION, [sessionId, endTime]);
  }

  async insertPath(task: InsertPathTask): Promise<void> {
    await this.db.none(INSERT_PATH, [
      task.sessionId,
      task.address,
      task.ts,
      task.tsIso,
      task.lat,
      task.lon,
      task.altitude,
      task.speed,
      task.track,
      task.verticalRate,
      task.velocityType,
    ]);
  }

  async findOpenSessions(address?: string): Promise<OpenSessionActivity[]> {
    const rows = address === undefined
      ? await this.db.any<OpenSessionRow>(OPEN_SESSIONS)
      : await this.db.any<OpenSessionRow>(`${OPEN_SESSIONS} AND s.aircraft_address = $1`, [address]);
    return rows.map((row) => ({
      id: row.id,
      aircraftAddress: row.aircraft_address,
      startTime: toNumber(row.start_time),
      lastActivity: toNumber(row.last_activity),
    }));
  }

  async close(): Promise<void> {
    if (this.lifecycle) {
      await this.lifecycle.close();
    }
  }
}

export default FlightHistoryRepository;
