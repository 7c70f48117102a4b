import Redis, { RedisOptions } from 'ioredis';
import logger from '../../utils/logger';

export type ConnectionStatus = 'connecting' | 'ready' | 'reconnecting' | 'error' | 'closed';

export interface ConnectionMeta {
  status: ConnectionStatus;
  lastError?: string;
  createdAt: Date;
}

interface ManagedConnection {
  client: Redis;
  meta: ConnectionMeta;
}

// BRPOP holds a connection for the whole wait, so commands must never time out client-side
const DEFAULT_OPTIONS: RedisOptions = {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
};

const redactUrl = (url: string): string => {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return 'invalid-url';
  }
};

/**
 * Named ioredis connections. A blocking consumer and a producer must not
 * share a connection, so callers ask for each by name.
 */
export class RedisClientManager {
  private connections = new Map<string, ManagedConnection>();

  getClient(name: string, url: string, overrides: RedisOptions = {}): Redis {
    const existing = this.connections.get(name);
    if (existing) {
      return existing.client;
    }

    const options: RedisOptions = { ...DEFAULT_OPTIONS, ...overrides };
    if (url.startsWith('rediss:') && !options.tls) {
      options.tls = { rejectUnauthorized: process.env.REDIS_REJECT_UNAUTHORIZED !== 'false' };
    }

    const client = new Redis(url, options);
    const meta: ConnectionMeta = {
      status: 'connecting',
      createdAt: new Date(),
    };
    this.connections.set(name, { client, meta });
    const safeUrl = redactUrl(url);

    client.on('ready', () => {
      meta.status = 'ready';
      meta.lastError = undefined;
      logger.info('Redis client ready', { name, url: safeUrl });
    });

    client.on('error', (error: Error) => {
      meta.status = 'error';
      meta.lastError = error.message;
      logger.error('Redis client error', { name, error: error.message });
    });

    client.on('reconnecting', () => {
      meta.status = 'reconnecting';
      logger.warn('Redis client reconnecting', { name });
    });

    client.on('close', () => {
      meta.status = 'closed';
      logger.debug('Redis client connection closed', { name });
    });

    client.connect().catch((error: Error) => {
      meta.status = 'error';
      meta.lastError = error.message;
      logger.error('Redis client failed to connect', { name, error: error.message });
    });

    return client;
  }

  getHealth(): Record<string, ConnectionMeta> {
    const result: Record<string, ConnectionMeta> = {};
    for (const [name, connection] of this.connections.entries()) {
      result[name] = { ...connection.meta };
    }
    return result;
  }

  async disconnect(name?: string): Promise<void> {
    const names = name ? [name] : Array.from(this.connections.keys());
    await Promise.all(names.map(async (key) => {
      const managed = this.connections.get(key);
      if (!managed) {
        return;
      }
      this.connections.delete(key);
      try {
        await managed.client.quit();
      } catch (error) {
        logger.warn('Redis quit failed, forcing disconnect', { name: key, error: (error as Error).message });
        managed.client.disconnect();
      }
    }));
  }
}

const redisClientManager = new RedisClientManager();

export default redisClientManager;
