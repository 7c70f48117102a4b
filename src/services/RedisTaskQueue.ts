import type { PersistenceTask } from '../types/persistence.types';
import { persistenceTaskSchema } from '../schemas/task.schemas';
import redisClientManager, { RedisClientManager } from '../lib/redis/RedisClientManager';
import logger from '../utils/logger';
import type { TaskQueue } from './TaskQueue';

export interface QueueProducerClient {
  lpush(key: string, payload: string): Promise<number>;
}

export interface QueueConsumerClient {
  brpop(key: string, timeoutSeconds: number): Promise<[string, string] | null>;
  rpop(key: string): Promise<string | null>;
}

// BRPOP treats 0 as "block forever"
const MIN_BLOCK_SECONDS = 0.1;

const PRODUCER_CLIENT = 'persistence:producer';
const CONSUMER_CLIENT = 'persistence:consumer';

/**
 * Redis list as the persistence queue: LPUSH on enqueue, BRPOP on take,
 * which yields FIFO order for a single consumer.
 */
export class RedisTaskQueue implements TaskQueue {
  private enqueued = 0;

  private rejected = 0;

  constructor(
    private readonly queueKey: string,
    private readonly producer: QueueProducerClient,
    private readonly consumer: QueueConsumerClient,
    private readonly onClose: () => Promise<void> = async () => undefined,
    private readonly sleep: (ms: number) => Promise<void> = (ms) => new Promise((resolve) => {
      setTimeout(resolve, ms);
    }),
  ) {}

  getQueueKey(): string {
    return this.queueKey;
  }

  getStats(): { enqueued: number; rejected: number } {
    return { enqueued: this.enqueued, rejected: this.rejected };
  }

  enqueue(task: PersistenceTask): void {
    this.enqueued += 1;
    this.producer.lpush(this.queueKey, JSON.stringify(task)).catch((error: Error) => {
      logger.error('Failed to enqueue persistence task', {
        kind: task.kind,
        error: error.message,
      });
    });
  }

  async take(timeoutMs: number): Promise<PersistenceTask | null> {
    const timeoutSeconds = Math.max(timeoutMs / 1000, MIN_BLOCK_SECONDS);
    let result: [string, string] | null;
    try {
      result = await this.consumer.brpop(this.queueKey, timeoutSeconds);
    } catch (error) {
      logger.warn('Failed to read from persistence queue', { error: (error as Error).message });
      await this.sleep(timeoutMs);
      return null;
    }
    if (!result) {
      return null;
    }
    return this.decode(result[1]);
  }

  async drain(): Promise<PersistenceTask[]> {
    const tasks: PersistenceTask[] = [];
    try {
      for (;;) {
        const payload = await this.consumer.rpop(this.queueKey);
        if (payload === null) {
          break;
        }
        const task = this.decode(payload);
        if (task) {
          tasks.push(task);
        }
      }
    } catch (error) {
      logger.warn('Failed to drain persistence queue', {
        drained: tasks.length,
        error: (error as Error).message,
      });
    }
    return tasks;
  }

  async close(): Promise<void> {
    await this.onClose();
  }

  private decode(payload: string): PersistenceTask | null {
    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch (error) {
      this.rejected += 1;
      logger.error('Failed to parse queue message', { error: (error as Error).message });
      return null;
    }
    const parsed = persistenceTaskSchema.safeParse(raw);
    if (!parsed.success) {
      this.rejected += 1;
      logger.error('Discarding invalid persistence task', { issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }
}

/**
 * Build a Redis-backed queue with separate producer and blocking-consumer connections.
 */
export function createRedisTaskQueue(
  redisUrl: string,
  queueKey: string,
  manager: RedisClientManager = redisClientManager,
): RedisTaskQueue {
  const producer = manager.getClient(PRODUCER_CLIENT, redisUrl);
  const consumer = manager.getClient(CONSUMER_CLIENT, redisUrl);
  logger.info('Persistence queue using Redis', { queueKey });

  return new RedisTaskQueue(
    queueKey,
    { lpush: (key, payload) => producer.lpush(key, payload) },
    {
      brpop: (key, timeoutSeconds) => consumer.brpop(key, timeoutSeconds),
      rpop: (key) => consumer.rpop(key),
    },
    async () => {
      await manager.disconnect(PRODUCER_CLIENT);
      await manager.disconnect(CONSUMER_CLIENT);
    },
  );
}

export default RedisTaskQueue;
