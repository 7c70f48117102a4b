/**
 * Configuration type definitions
 */

export type QueueDriver = 'memory' | 'redis';

export interface ReferenceCoordinate {
  lat: number;
  lon: number;
}

export interface FeedConfig {
  host: string;
  port: number;
  reconnectDelayMs: number;
}

export interface PublisherConfig {
  host: string;
  port: number;
  broadcastIntervalMs: number;
  pruneIntervalMs: number;
}

export interface SubscriberConfig {
  url: string;
  baseDelayMs: number;
  maxDelayMs: number;
  connectTimeoutMs: number;
  persistIntervalMs: number;
}

export interface TrackingConfig {
  cprStaleSeconds: number;
  positionFailureLogSeconds: number;
  assemblyTimeoutSeconds: number;
  recordTtlSeconds: number;
  reference: ReferenceCoordinate | null;
}

export interface PersistenceConfig {
  sessionInactivitySeconds: number;
  sweepIntervalMs: number;
  pollIntervalMs: number;
  queueDriver: QueueDriver;
}

export interface QueueConfig {
  redisUrl: string;
  key: string;
}

export interface DatabaseConfig {
  postgres: {
    url: string;
    pool: {
      max: number;
    };
  };
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  feed: FeedConfig;
  publisher: PublisherConfig;
  subscriber: SubscriberConfig;
  tracking: TrackingConfig;
  persistence: PersistenceConfig;
  queue: QueueConfig;
  database: DatabaseConfig;
}
