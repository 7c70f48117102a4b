import type { IDatabase } from 'pg-promise';
import logger from '../utils/logger';

/**
 * The slice of a pg-promise database the repositories use.
 */
export type SqlClient = Pick<IDatabase<object>, 'none' | 'any'>;

export interface ColumnMigration {
  id: string;
  table: string;
  column: string;
  definition: string;
}

/**
 * Additive column migrations, applied in order. Entries are never edited or
 * removed once released; new columns are appended.
 */
export const COLUMN_MIGRATIONS: readonly ColumnMigration[] = [
  { id: '001_path_velocity', table: 'path', column: 'velocity', definition: 'DOUBLE PRECISION' },
  { id: '002_path_track', table: 'path', column: 'track', definition: 'DOUBLE PRECISION' },
  { id: '003_path_vertical_rate', table: 'path', column: 'vertical_rate', definition: 'DOUBLE PRECISION' },
  { id: '004_path_type', table: 'path', column: 'type', definition: 'TEXT' },
  { id: '005_aircraft_assembly_time_ms', table: 'aircraft', column: 'assembly_time_ms', definition: 'DOUBLE PRECISION' },
  { id: '006_aircraft_stale_cpr_count', table: 'aircraft', column: 'stale_cpr_count', definition: 'INTEGER' },
];

// Base tables carry only their first-release columns; later columns arrive through COLUMN_MIGRATIONS
const CREATE_TABLES = `
  CREATE TABLE IF NOT EXISTS aircraft (
    address TEXT PRIMARY KEY,
    callsign TEXT,
    first_seen DOUBLE PRECISION,
    last_seen DOUBLE PRECISION
  );

  CREATE TABLE IF NOT EXISTS flight_session (
    id TEXT PRIMARY KEY,
    aircraft_address TEXT NOT NULL,
    start_time DOUBLE PRECISION NOT NULL,
    end_time DOUBLE PRECISION
  );

  CREATE TABLE IF NOT EXISTS path (
    id SERIAL PRIMARY KEY,
    session_id TEXT NOT NULL,
    address TEXT NOT NULL,
    ts DOUBLE PRECISION NOT NULL,
    ts_iso TEXT NOT NULL,
    lat DOUBLE PRECISION NOT NULL,
    lon DOUBLE PRECISION NOT NULL,
    alt DOUBLE PRECISION
  );
`;

const CREATE_INDEXES = `
  CREATE INDEX IF NOT EXISTS idx_flight_session_aircraft_address ON flight_session (aircraft_address);
  CREATE INDEX IF NOT EXISTS idx_path_address_ts ON path (address, ts);
  CREATE INDEX IF NOT EXISTS idx_path_session_ts ON path (session_id, ts);
`;

/**
 * Repository for database schema creation and migrations
 */
class SchemaRepository {
  constructor(
    private readonly db: SqlClient,
    private readonly migrations: readonly ColumnMigration[] = COLUMN_MIGRATIONS,
  ) {}

  async createTables(): Promise<void> {
    await this.db.none(CREATE_TABLES);
  }

  async createIndexes(): Promise<void> {
    await this.db.none(CREATE_INDEXES);
  }

  /**
   * Add every missing migrated column. Returns the ids of migrations applied
   * by this call.
   */
  async applyMigrations(): Promise<string[]> {
    const applied: string[] = [];
    for (const migration of this.migrations) {
      const rows = await this.db.any<{ column_name: string }>(
        `SELECT column_name FROM information_schema.columns
         WHERE table_schema = current_schema() AND table_name = $1 AND column_name = $2`,
        [migration.table, migration.column],
      );
      if (rows.length > 0) {
        continue;
      }
      await this.db.none(
        `ALTER TABLE $1:name ADD COLUMN IF NOT EXISTS $2:name ${migration.definition}`,
        [migration.table, migration.column],
      );
      applied.push(migration.id);
      logger.info('Applied column migration', { id: migration.id, table: migration.table, column: migration.column });
    }
    return applied;
  }

  async initialize(): Promise<void> {
    await this.createTables();
    await this.applyMigrations();
    await this.createIndexes();
    logger.info('Database schema ready');
  }
}

export default SchemaRepository;
