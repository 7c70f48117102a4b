import config from './config';
import logger, { setProcessRole } from './utils/logger';
import { StorageUnavailableError } from './utils/errors';
import { getConnection, closeConnection } from './repositories/DatabaseConnection';
import FlightHistoryRepository from './repositories/FlightHistoryRepository';
import { InMemoryTaskQueue, type TaskQueue } from './services/TaskQueue';
import { createRedisTaskQueue } from './services/RedisTaskQueue';
import { SocketIoFeedConnector } from './services/SocketIoFeedConnector';
import { StreamSubscriber } from './services/StreamSubscriber';
import { PersistenceWorker } from './workers/persistenceWorker';

/**
 * Subscriber process: socket.io feed -> task queue -> persistence worker.
 */
export interface SubscriberProcess {
  subscriber: StreamSubscriber;
  worker: PersistenceWorker;
  stop(): Promise<void>;
}

export function createTaskQueue(): TaskQueue {
  if (config.persistence.queueDriver === 'redis') {
    return createRedisTaskQueue(config.queue.redisUrl, config.queue.key);
  }
  return new InMemoryTaskQueue();
}

export async function startSubscriber(): Promise<SubscriberProcess> {
  const { persistence, subscriber: subscriberConfig } = config;

  const connection = getConnection();
  const store = new FlightHistoryRepository(connection.getDb(), {
    verify: () => connection.verify(),
    close: () => closeConnection(),
  });
  const queue = createTaskQueue();
  const worker = new PersistenceWorker(store, queue, {
    pollIntervalMs: persistence.pollIntervalMs,
    sweepIntervalMs: persistence.sweepIntervalMs,
    sessionInactivitySeconds: persistence.sessionInactivitySeconds,
  });

  // Fatal: nothing is consumed without storage
  await worker.start();

  const subscriber = new StreamSubscriber(
    new SocketIoFeedConnector(subscriberConfig.url, subscriberConfig.connectTimeoutMs),
    worker,
    {
      baseDelayMs: subscriberConfig.baseDelayMs,
      maxDelayMs: subscriberConfig.maxDelayMs,
      persistIntervalMs: subscriberConfig.persistIntervalMs,
      sessionInactivitySeconds: persistence.sessionInactivitySeconds,
    },
  );
  subscriber.start().catch((error: Error) => {
    logger.error('Stream subscriber loop failed', { error: error.message });
  });

  logger.info('Subscriber started', {
    url: subscriberConfig.url,
    queueDriver: persistence.queueDriver,
  });

  return {
    subscriber,
    worker,
    stop: async () => {
      await subscriber.stop();
      // Final write-set so the last mirror is not lost
      subscriber.persistOnce();
      await worker.stop();
    },
  };
}

if (require.main === module) {
  setProcessRole('subscriber');
  let running: SubscriberProcess | null = null;

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down subscriber`);
    try {
      await running?.stop();
    } catch (error) {
      logger.error('Error during subscriber shutdown', { error: (error as Error).message });
    }
    process.exit(0);
  };
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(() => process.exit(1));
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(() => process.exit(1));
  });

  startSubscriber()
    .then((started) => {
      running = started;
    })
    .catch((error: Error) => {
      const fatal = error instanceof StorageUnavailableError ? 'Storage unavailable' : 'Fatal error';
      logger.error(`${fatal} in subscriber`, { error: error.message });
      process.exit(1);
    });
}
