import type {
  OpenSessionActivity,
  PersistenceTask,
  StartSessionTask,
} from '../types/persistence.types';
import type { PersistenceConfig } from '../types/config.types';
import type { FlightHistoryStore } from '../repositories/FlightHistoryRepository';
import type { TaskQueue } from '../services/TaskQueue';
import { StorageUnavailableError } from '../utils/errors';
import logger from '../utils/logger';

export type PersistenceWorkerOptions = Pick<
  PersistenceConfig,
  'pollIntervalMs' | 'sweepIntervalMs' | 'sessionInactivitySeconds'
>;

export interface PersistenceWorkerStats {
  processed: number;
  failed: number;
  sessionsStarted: number;
  sessionsAliased: number;
  sessionsEnded: number;
  sweeps: number;
}

/**
 * Open sessions whose last activity is more than `thresholdSeconds` before `now`.
 */
export function findExpiredSessions(
  sessions: OpenSessionActivity[],
  now: number,
  thresholdSeconds: number,
): OpenSessionActivity[] {
  return sessions.filter((session) => now - session.lastActivity > thresholdSeconds);
}

/**
 * Sole writer to the flight history store. Consumes the task queue in order
 * and closes inactive sessions on a sweep interval.
 */
export class PersistenceWorker {
  private running = false;

  private loopPromise: Promise<void> | null = null;

  private lastSweepAt: number | null = null;

  // Session ids started by a subscriber while another session was still open for the aircraft
  private sessionAliases: Map<string, string> = new Map();

  private stats: PersistenceWorkerStats = {
    processed: 0,
    failed: 0,
    sessionsStarted: 0,
    sessionsAliased: 0,
    sessionsEnded: 0,
    sweeps: 0,
  };

  constructor(
    private readonly store: FlightHistoryStore,
    private readonly queue: TaskQueue,
    private readonly options: PersistenceWorkerOptions,
    private readonly clock: () => number = () => Date.now() / 1000,
  ) {}

  /**
   * Initialize storage and begin consuming. Storage failure here is fatal.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    try {
      await this.store.initialize();
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        throw error;
      }
      const err = error as Error;
      throw new StorageUnavailableError(`Failed to initialize storage: ${err.message}`, err);
    }

    this.running = true;
    logger.info('Persistence worker started', {
      pollIntervalMs: this.options.pollIntervalMs,
      sweepIntervalMs: this.options.sweepIntervalMs,
      sessionInactivitySeconds: this.options.sessionInactivitySeconds,
    });
    this.loopPromise = this.run();
  }

  enqueue(task: PersistenceTask): void {
    this.queue.enqueue(task);
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): PersistenceWorkerStats {
    return { ...this.stats };
  }

  /**
   * Apply one task. Failures are logged and the task is skipped.
   */
  async processTask(task: PersistenceTask): Promise<boolean> {
    try {
      switch (task.kind) {
        case 'upsert_aircraft':
          await this.store.upsertAircraft(task);
          break;
        case 'start_session':
          await this.startSession(task);
          break;
        case 'end_session':
          await this.store.endSession(this.resolveSessionId(task.sessionId), task.endTime);
          this.stats.sessionsEnded += 1;
          break;
        case 'insert_path':
          await this.store.insertPath({ ...task, sessionId: this.resolveSessionId(task.sessionId) });
          break;
        default: {
          const unknownTask: never = task;
          logger.warn('Ignoring unknown persistence task', { task: unknownTask });
          return false;
        }
      }
      this.stats.processed += 1;
      return true;
    } catch (error) {
      this.stats.failed += 1;
      logger.error('Persistence task failed', {
        kind: task.kind,
        error: (error as Error).message,
      });
      return false;
    }
  }

  /**
   * Close every open session inactive for longer than the threshold, stamping
   * it with the sweep time. Returns the number of sessions closed.
   */
  async sweep(now: number = this.clock()): Promise<number> {
    this.stats.sweeps += 1;
    try {
      const open = await this.store.findOpenSessions();
      return await this.closeExpired(open, now);
    } catch (error) {
      logger.error('Session sweep failed', { error: (error as Error).message });
      return 0;
    }
  }

  async stop(): Promise<void> {
    if (!this.running && !this.loopPromise) {
      return;
    }
    this.running = false;
    if (this.loopPromise) {
      await this.loopPromise;
      this.loopPromise = null;
    }

    const remaining = await this.queue.drain();
    for (const task of remaining) {
      await this.processTask(task);
    }
    if (remaining.length > 0) {
      logger.info('Drained persistence queue on shutdown', { count: remaining.length });
    }

    try {
      await this.store.close();
    } catch (error) {
      logger.warn('Error closing flight history store', { error: (error as Error).message });
    }
    await this.queue.close();
    logger.info('Persistence worker stopped', { ...this.stats });
  }

  private async run(): Promise<void> {
    while (this.running) {
      let task: PersistenceTask | null = null;
      try {
        task = await this.queue.take(this.options.pollIntervalMs);
      } catch (error) {
        logger.error('Failed to take persistence task', { error: (error as Error).message });
      }
      if (task) {
        await this.processTask(task);
      }
      await this.sweepIfDue();
    }
  }

  private async sweepIfDue(): Promise<void> {
    const now = this.clock();
    if (this.lastSweepAt !== null
      && (now - this.lastSweepAt) * 1000 < this.options.sweepIntervalMs) {
      return;
    }
    this.lastSweepAt = now;
    await this.sweep(now);
  }

  private async startSession(task: StartSessionTask): Promise<void> {
    const open = await this.store.findOpenSessions(task.address);
    const remaining = new Set(open.map((session) => session.id));
    const now = Math.max(this.clock(), task.startTime);
    for (const session of findExpiredSessions(open, now, this.options.sessionInactivitySeconds)) {
      await this.endExpired(session, now);
      remaining.delete(session.id);
    }

    const [existing] = Array.from(remaining);
    if (existing !== undefined && existing !== task.sessionId) {
      this.sessionAliases.set(task.sessionId, existing);
      this.stats.sessionsAliased += 1;
      logger.info('Aircraft already has an open session, reusing it', {
        address: task.address,
        sessionId: task.sessionId,
        openSessionId: existing,
      });
      return;
    }

    const inserted = await this.store.insertSession(task);
    if (inserted) {
      this.stats.sessionsStarted += 1;
      logger.debug('Flight session started', { address: task.address, sessionId: task.sessionId });
    }
  }

  private async closeExpired(open: OpenSessionActivity[], now: number): Promise<number> {
    const expired = findExpiredSessions(open, now, this.options.sessionInactivitySeconds);
    let closed = 0;
    for (const session of expired) {
      try {
        await this.endExpired(session, now);
        closed += 1;
      } catch (error) {
        logger.error('Failed to close inactive session', {
          sessionId: session.id,
          error: (error as Error).message,
        });
      }
    }
    if (closed > 0) {
      logger.info('Closed inactive flight sessions', { closed, openSessions: open.length - closed });
    }
    return closed;
  }

  private async endExpired(session: OpenSessionActivity, now: number): Promise<void> {
    await this.store.endSession(session.id, now);
    this.stats.sessionsEnded += 1;
    for (const [alias, target] of this.sessionAliases.entries()) {
      if (target === session.id) {
        this.sessionAliases.delete(alias);
      }
    }
    logger.debug('Flight session ended', {
      sessionId: session.id,
      address: session.aircraftAddress,
      lastActivity: session.lastActivity,
      endTime: now,
    });
  }

  private resolveSessionId(sessionId: string): string {
    return this.sessionAliases.get(sessionId) ?? sessionId;
  }
}

export default PersistenceWorker;
