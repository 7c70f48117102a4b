import { createServer } from 'http';
import { Server } from 'socket.io';
import config from './config';
import logger, { setProcessRole } from './utils/logger';
import modeSDecoder from './utils/modeS';
import { PositionResolver } from './services/PositionResolver';
import { AircraftStateAggregator } from './services/AircraftStateAggregator';
import { RawFrameSource } from './services/RawFrameSource';
import { BroadcastPublisher } from './services/BroadcastPublisher';

/**
 * Publisher process: raw feed -> aggregator -> socket.io broadcast.
 */
export interface PublisherProcess {
  aggregator: AircraftStateAggregator;
  publisher: BroadcastPublisher;
  stop(): Promise<void>;
}

export function startPublisher(): PublisherProcess {
  const { tracking, feed, publisher: publisherConfig } = config;

  const resolver = new PositionResolver(modeSDecoder, {
    staleSeconds: tracking.cprStaleSeconds,
    failureLogSeconds: tracking.positionFailureLogSeconds,
    reference: tracking.reference,
  });
  const aggregator = new AircraftStateAggregator(modeSDecoder, resolver, {
    assemblyTimeoutSeconds: tracking.assemblyTimeoutSeconds,
    recordTtlSeconds: tracking.recordTtlSeconds,
    reference: tracking.reference,
  });
  const source = new RawFrameSource(feed, (frame, timestamp) => {
    aggregator.ingest(frame, timestamp);
  });
  const publisher = new BroadcastPublisher(
    aggregator,
    { broadcastIntervalMs: publisherConfig.broadcastIntervalMs },
    undefined,
    source,
  );

  const server = createServer();
  const io = new Server(server, {
    transports: ['websocket', 'polling'],
  });
  publisher.attach(io);

  const pruneTimer = setInterval(() => {
    aggregator.prune(Date.now() / 1000);
    logger.debug('Aggregator stats', { ...aggregator.getStats() });
  }, publisherConfig.pruneIntervalMs);

  if (!tracking.reference) {
    logger.warn('No receiver reference configured; surface positions and distances are unavailable');
  }

  server.listen(publisherConfig.port, publisherConfig.host, () => {
    logger.info(`Publisher listening on ${publisherConfig.host}:${publisherConfig.port}`);
  });
  publisher.start();

  return {
    aggregator,
    publisher,
    stop: async () => {
      clearInterval(pruneTimer);
      await publisher.stop();
    },
  };
}

if (require.main === module) {
  setProcessRole('publisher');
  let running: PublisherProcess | null = null;

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    try {
      await running?.stop();
    } catch (error) {
      logger.error('Error during publisher shutdown', { error: (error as Error).message });
    }
    process.exit(0);
  };
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(() => process.exit(1));
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason });
  });

  try {
    running = startPublisher();
  } catch (err) {
    const error = err as Error;
    logger.error('Error starting publisher', { error: error.message });
    process.exit(1);
  }
}
