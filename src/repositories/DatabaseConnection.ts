import pgPromise from 'pg-promise';
import config from '../config';
import type { DatabaseConfig } from '../types/config.types';
import logger from '../utils/logger';
import { StorageUnavailableError } from '../utils/errors';

export type Database = pgPromise.IDatabase<object>;

// Error throttling to prevent log flooding
const errorThrottle = {
  lastError: '',
  lastErrorTime: 0,
  errorCount: 0,
  throttleMs: 5000,
};

const describeQuery = (query: unknown): string | undefined => (
  typeof query === 'string' ? query.substring(0, 100) : undefined
);

const pgp = pgPromise({
  error: (err: Error, e) => {
    const now = Date.now();
    const query = describeQuery(e?.query);
    const errorKey = `${err.message}:${query?.substring(0, 50) ?? ''}`;

    if (errorKey === errorThrottle.lastError) {
      errorThrottle.errorCount += 1;
      if (now - errorThrottle.lastErrorTime < errorThrottle.throttleMs) {
        return;
      }
      logger.error(`Database error (repeated x${errorThrottle.errorCount})`, { error: err.message, query });
      errorThrottle.errorCount = 0;
    } else {
      logger.error('Database query error', { error: err.message, query });
      errorThrottle.errorCount = 1;
    }

    errorThrottle.lastError = errorKey;
    errorThrottle.lastErrorTime = now;
  },
});

/**
 * PostgreSQL pool owned by the persistence worker.
 */
class DatabaseConnection {
  private db: Database;

  constructor(settings: DatabaseConfig['postgres'] = config.database.postgres) {
    this.db = pgp<object>({
      connectionString: settings.url,
      max: settings.pool.max,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      keepAlive: true,
      statement_timeout: 10000,
      query_timeout: 10000,
    });
  }

  /**
   * Open one connection to prove the database is reachable.
   */
  async verify(): Promise<void> {
    try {
      const connection = await this.db.connect();
      connection.done();
      logger.info('Database connection established');
    } catch (error) {
      const err = error as Error;
      logger.error('Database connection error during initialization', { error: err.message });
      throw new StorageUnavailableError(`Database unavailable: ${err.message}`, err);
    }
  }

  getDb(): Database {
    return this.db;
  }

  /**
   * Close database connections and pool
   */
  async close(): Promise<void> {
    await this.db.$pool.end();
  }
}

let connectionInstance: DatabaseConnection | null = null;

/**
 * Get or create database connection instance
 */
export function getConnection(): DatabaseConnection {
  if (!connectionInstance) {
    connectionInstance = new DatabaseConnection();
  }
  return connectionInstance;
}

/**
 * Release the shared pool and the pg-promise library state.
 */
export async function closeConnection(): Promise<void> {
  if (connectionInstance) {
    const instance = connectionInstance;
    connectionInstance = null;
    await instance.close();
  }
  pgp.end();
}

export { DatabaseConnection };
