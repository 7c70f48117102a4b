import { randomUUID } from 'crypto';
import type { PersistenceTask } from '../types/persistence.types';
import type { SubscriberConfig } from '../types/config.types';
import {
  snapshotEntrySchema,
  snapshotEnvelopeSchema,
  type SnapshotEntry,
} from '../schemas/snapshot.schemas';
import logger from '../utils/logger';

export type ConnectionState = 'DISCONNECTED' | 'CONNECTING' | 'CONNECTED';

/**
 * An established link to the publisher.
 */
export interface FeedConnection {
  onMessage(handler: (raw: unknown) => void): void;
  /** Resolves with a reason once the link is gone. */
  readonly closed: Promise<string>;
  close(): void;
}

export type ConnectResult =
  | { ok: true; connection: FeedConnection }
  | { ok: false; error: Error };

export interface FeedConnector {
  connect(): Promise<ConnectResult>;
}

export interface TaskSink {
  enqueue(task: PersistenceTask): void;
}

export type StreamSubscriberOptions = Pick<
  SubscriberConfig,
  'baseDelayMs' | 'maxDelayMs' | 'persistIntervalMs'
> & {
  sessionInactivitySeconds: number;
};

export interface StreamSubscriberDeps {
  sleep?: (ms: number) => Promise<void>;
  createSessionId?: () => string;
}

export interface StreamSubscriberStats {
  state: ConnectionState;
  receivedMessages: number;
  malformedMessages: number;
  skippedEntries: number;
  connectAttempts: number;
  mirroredAircraft: number;
  trackedSessions: number;
}

export const nextBackoff = (currentMs: number, maxMs: number): number => Math.min(currentMs * 2, maxMs);

/**
 * Mirrors the publisher's snapshots and turns them into persistence tasks.
 * Reconnection is driven by an explicit state and backoff value.
 */
export class StreamSubscriber {
  private state: ConnectionState = 'DISCONNECTED';

  private running = false;

  private loopPromise: Promise<void> | null = null;

  private stopSignal: Promise<void> = Promise.resolve();

  private signalStop: () => void = () => undefined;

  private connection: FeedConnection | null = null;

  private persistTimer: NodeJS.Timeout | null = null;

  private mirror: Map<string, SnapshotEntry> = new Map();

  // Last lastUpdate written as a path point, per aircraft
  private watermarks: Map<string, number> = new Map();

  private sessions: Map<string, string> = new Map();

  private receivedMessages = 0;

  private malformedMessages = 0;

  private skippedEntries = 0;

  private connectAttempts = 0;

  private readonly sleep: ((ms: number) => Promise<void>) | null;

  private backoffTimer: { timer: NodeJS.Timeout; resolve: () => void } | null = null;

  private readonly createSessionId: () => string;

  constructor(
    private readonly connector: FeedConnector,
    private readonly sink: TaskSink,
    private readonly options: StreamSubscriberOptions,
    deps: StreamSubscriberDeps = {},
  ) {
    this.sleep = deps.sleep ?? null;
    this.createSessionId = deps.createSessionId ?? randomUUID;
  }

  /**
   * Run until stop(). Resolves once the connection loop has exited.
   */
  start(): Promise<void> {
    if (this.loopPromise) {
      return this.loopPromise;
    }
    this.running = true;
    this.stopSignal = new Promise<void>((resolve) => {
      this.signalStop = resolve;
    });
    this.persistTimer = setInterval(() => {
      try {
        this.persistOnce();
      } catch (error) {
        logger.error('Persistence cycle failed', { error: (error as Error).message });
      }
    }, this.options.persistIntervalMs);
    logger.info('Stream subscriber started', {
      baseDelayMs: this.options.baseDelayMs,
      maxDelayMs: this.options.maxDelayMs,
      persistIntervalMs: this.options.persistIntervalMs,
    });
    this.loopPromise = this.connectionLoop();
    return this.loopPromise;
  }

  async stop(): Promise<void> {
    this.running = false;
    this.signalStop();
    if (this.backoffTimer) {
      clearTimeout(this.backoffTimer.timer);
      this.backoffTimer.resolve();
      this.backoffTimer = null;
    }
    if (this.persistTimer) {
      clearInterval(this.persistTimer);
      this.persistTimer = null;
    }
    this.connection?.close();
    if (this.loopPromise) {
      await this.loopPromise;
      this.loopPromise = null;
    }
    this.setState('DISCONNECTED');
    logger.info('Stream subscriber stopped', { receivedMessages: this.receivedMessages });
  }

  getState(): ConnectionState {
    return this.state;
  }

  getMirror(): ReadonlyMap<string, SnapshotEntry> {
    return this.mirror;
  }

  getStats(): StreamSubscriberStats {
    return {
      state: this.state,
      receivedMessages: this.receivedMessages,
      malformedMessages: this.malformedMessages,
      skippedEntries: this.skippedEntries,
      connectAttempts: this.connectAttempts,
      mirroredAircraft: this.mirror.size,
      trackedSessions: this.sessions.size,
    };
  }

  /**
   * Validate one inbound payload. Any mapping keyed by address replaces the
   * mirror; entries that fail validation are left out of it. Payloads of any
   * other shape are counted and ignored.
   */
  handleMessage(raw: unknown): boolean {
    let payload: unknown = raw;
    if (typeof raw === 'string') {
      try {
        payload = JSON.parse(raw);
      } catch (error) {
        this.rejectMessage('unparseable JSON', (error as Error).message);
        return false;
      }
    }

    const parsed = snapshotEnvelopeSchema.safeParse(payload);
    if (!parsed.success) {
      this.rejectMessage('unexpected snapshot shape', parsed.error.issues[0]?.message ?? 'invalid');
      return false;
    }

    const mirror = new Map<string, SnapshotEntry>();
    for (const [address, value] of Object.entries(parsed.data)) {
      const entry = snapshotEntrySchema.safeParse(value);
      if (!entry.success) {
        this.skippedEntries += 1;
        logger.warn('Skipping invalid snapshot entry', {
          address,
          detail: entry.error.issues[0]?.message ?? 'invalid',
        });
        continue;
      }
      mirror.set(address, { ...entry.data, address });
    }

    this.mirror = mirror;
    this.receivedMessages += 1;
    return true;
  }

  /**
   * Queue the write-set for the current mirror. Returns the number of tasks enqueued.
   */
  persistOnce(): number {
    let enqueued = 0;
    const enqueue = (task: PersistenceTask) => {
      this.sink.enqueue(task);
      enqueued += 1;
    };

    this.forgetDepartedAircraft();

    for (const [address, entry] of this.mirror.entries()) {
      enqueue({
        kind: 'upsert_aircraft',
        address,
        callsign: entry.callsign,
        firstSeen: entry.firstSeen,
        lastUpdate: entry.lastUpdate,
        assemblyTimeMs: entry.assemblyTimeMs,
        staleCprCount: entry.staleCprCount,
      });

      const { position, velocity } = entry;
      const watermark = this.watermarks.get(address);
      if (!position || (watermark !== undefined && entry.lastUpdate <= watermark)) {
        continue;
      }

      let sessionId = this.sessions.get(address);
      if (sessionId !== undefined
        && watermark !== undefined
        && entry.lastUpdate - watermark > this.options.sessionInactivitySeconds) {
        // The worker's sweep will have closed the old session
        this.sessions.delete(address);
        sessionId = undefined;
      }
      if (sessionId === undefined) {
        sessionId = this.createSessionId();
        this.sessions.set(address, sessionId);
        enqueue({
          kind: 'start_session',
          sessionId,
          address,
          startTime: entry.lastUpdate,
        });
      }

      enqueue({
        kind: 'insert_path',
        sessionId,
        address,
        ts: entry.lastUpdate,
        tsIso: new Date(entry.lastUpdate * 1000).toISOString(),
        lat: position.lat,
        lon: position.lon,
        altitude: entry.altitude,
        speed: velocity?.speed ?? null,
        track: velocity?.track ?? null,
        verticalRate: velocity?.verticalRate ?? null,
        velocityType: velocity?.type ?? null,
      });
      this.watermarks.set(address, entry.lastUpdate);
    }

    if (enqueued > 0) {
      logger.debug('Queued persistence tasks', { enqueued, aircraft: this.mirror.size });
    }
    return enqueued;
  }

  /**
   * Drop watermarks and sessions of aircraft gone from the mirror for longer
   * than the inactivity threshold; the worker's sweep has closed their sessions.
   */
  private forgetDepartedAircraft(): void {
    let newest: number | null = null;
    for (const entry of this.mirror.values()) {
      newest = newest === null ? entry.lastUpdate : Math.max(newest, entry.lastUpdate);
    }
    if (newest === null) {
      return;
    }
    const cutoff = newest - this.options.sessionInactivitySeconds;
    for (const [address, watermark] of this.watermarks.entries()) {
      if (!this.mirror.has(address) && watermark < cutoff) {
        this.watermarks.delete(address);
        this.sessions.delete(address);
      }
    }
  }

  private async connectionLoop(): Promise<void> {
    let delayMs = this.options.baseDelayMs;

    while (this.running) {
      this.setState('CONNECTING');
      this.connectAttempts += 1;
      const result = await this.attemptConnect();

      if (!this.running) {
        if (result.ok) {
          result.connection.close();
        }
        break;
      }

      if (!result.ok) {
        this.setState('DISCONNECTED');
        logger.warn('Failed to connect to publisher', { error: result.error.message, retryInMs: delayMs });
        await this.wait(delayMs);
        delayMs = nextBackoff(delayMs, this.options.maxDelayMs);
        continue;
      }

      delayMs = this.options.baseDelayMs;
      const { connection } = result;
      this.connection = connection;
      connection.onMessage((raw) => {
        this.handleMessage(raw);
      });
      this.setState('CONNECTED');

      const reason = await Promise.race([connection.closed, this.stopSignal.then(() => 'stopped')]);
      this.connection = null;
      this.setState('DISCONNECTED');
      if (!this.running) {
        connection.close();
        break;
      }
      logger.warn('Publisher connection lost', { reason, retryInMs: delayMs });
      await this.wait(delayMs);
    }
  }

  private async attemptConnect(): Promise<ConnectResult> {
    try {
      return await this.connector.connect();
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  private async wait(ms: number): Promise<void> {
    if (this.sleep) {
      await Promise.race([this.sleep(ms), this.stopSignal]);
      return;
    }
    if (!this.running) {
      return;
    }
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.backoffTimer = null;
        resolve();
      }, ms);
      this.backoffTimer = { timer, resolve };
    });
  }

  private setState(next: ConnectionState): void {
    if (this.state === next) {
      return;
    }
    logger.debug('Subscriber state change', { from: this.state, to: next });
    this.state = next;
  }

  private rejectMessage(reason: string, detail: string): void {
    this.malformedMessages += 1;
    logger.warn('Discarding malformed snapshot message', {
      reason,
      detail,
      malformedMessages: this.malformedMessages,
    });
  }
}

export default StreamSubscriber;
