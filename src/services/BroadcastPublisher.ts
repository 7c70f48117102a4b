import type { Server, Socket } from 'socket.io';
import type { Snapshot } from '../types/aircraft.types';
import logger from '../utils/logger';
import type { SnapshotProvider } from './AircraftStateAggregator';
import type { FrameFeed } from './RawFrameSource';

export const SNAPSHOT_EVENT = 'aircraft:snapshot';

/**
 * One connected consumer of snapshot broadcasts.
 */
export interface SubscriberEndpoint {
  readonly id: string;
  send(payload: string): Promise<void>;
  close(): void;
}

export type SnapshotSerializer = (snapshot: Snapshot) => string;

export const serializeSnapshot: SnapshotSerializer = (snapshot) => JSON.stringify(snapshot);

export interface BroadcastPublisherOptions {
  broadcastIntervalMs: number;
}

export type EndpointSocket = Pick<Socket, 'id' | 'connected' | 'emit' | 'disconnect'>;

/**
 * Wrap a socket.io socket. Sending to a socket that has gone away rejects.
 */
export function createSocketEndpoint(socket: EndpointSocket): SubscriberEndpoint {
  return {
    id: socket.id,
    send: async (payload: string) => {
      if (!socket.connected) {
        throw new Error(`Socket ${socket.id} is not connected`);
      }
      socket.emit(SNAPSHOT_EVENT, payload);
    },
    close: () => {
      socket.disconnect(true);
    },
  };
}

export class BroadcastPublisher {
  private endpoints: Map<string, SubscriberEndpoint> = new Map();

  private timer: NodeJS.Timeout | null = null;

  private inFlight: Promise<number> | null = null;

  private io: Server | null = null;

  private broadcasts = 0;

  constructor(
    private readonly source: SnapshotProvider,
    private readonly options: BroadcastPublisherOptions,
    private readonly serializer: SnapshotSerializer = serializeSnapshot,
    private readonly feed: FrameFeed | null = null,
  ) {}

  /**
   * Register socket.io connections as endpoints for the lifetime of each socket.
   */
  attach(io: Server): void {
    this.io = io;
    io.on('connection', (socket: Socket) => {
      this.addEndpoint(createSocketEndpoint(socket));
      socket.on('disconnect', (reason: string) => {
        this.removeEndpoint(socket.id);
        logger.info('Subscriber disconnected', { socketId: socket.id, reason });
      });
    });
  }

  addEndpoint(endpoint: SubscriberEndpoint): void {
    this.endpoints.set(endpoint.id, endpoint);
    logger.info('Subscriber connected', { endpointId: endpoint.id, totalEndpoints: this.endpoints.size });
  }

  removeEndpoint(id: string): boolean {
    return this.endpoints.delete(id);
  }

  endpointCount(): number {
    return this.endpoints.size;
  }

  getBroadcastCount(): number {
    return this.broadcasts;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.feed?.start();
    this.timer = setInterval(() => {
      if (this.inFlight) {
        return;
      }
      this.inFlight = this.broadcastOnce();
      this.inFlight
        .catch((error: Error) => {
          logger.error('Snapshot broadcast failed', { error: error.message });
          return 0;
        })
        .finally(() => {
          this.inFlight = null;
        });
    }, this.options.broadcastIntervalMs);
    logger.info('Broadcast publisher started', { broadcastIntervalMs: this.options.broadcastIntervalMs });
  }

  /**
   * Serialize one snapshot and send it to every endpoint. Endpoints whose
   * send fails are closed and forgotten. Returns the number of successful sends.
   */
  async broadcastOnce(): Promise<number> {
    if (this.endpoints.size === 0) {
      return 0;
    }

    const payload = this.serializer(this.source.snapshot());
    const targets = Array.from(this.endpoints.values());
    const results = await Promise.allSettled(targets.map((endpoint) => endpoint.send(payload)));

    let delivered = 0;
    results.forEach((result, index) => {
      const endpoint = targets[index];
      if (result.status === 'fulfilled') {
        delivered += 1;
        return;
      }
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      logger.warn('Dropping subscriber after failed send', { endpointId: endpoint.id, error: reason });
      this.endpoints.delete(endpoint.id);
      this.closeEndpoint(endpoint);
    });

    this.broadcasts += 1;
    logger.debug('Broadcast snapshot', { bytes: payload.length, delivered, failed: targets.length - delivered });
    return delivered;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight.catch(() => 0);
    }

    for (const endpoint of this.endpoints.values()) {
      this.closeEndpoint(endpoint);
    }
    this.endpoints.clear();

    if (this.feed) {
      await this.feed.stop();
    }

    const { io } = this;
    this.io = null;
    if (io) {
      // Also closes the attached http server
      await new Promise<void>((resolve) => {
        const closed = (error?: Error) => {
          if (error) {
            logger.warn('Error closing socket.io server', { error: error.message });
          }
          resolve();
        };
        Promise.resolve(io.close(closed)).catch(closed);
      });
    }
    logger.info('Broadcast publisher stopped');
  }

  private closeEndpoint(endpoint: SubscriberEndpoint): void {
    try {
      endpoint.close();
    } catch (error) {
      logger.debug('Ignoring endpoint close failure', { endpointId: endpoint.id, error: (error as Error).message });
    }
  }
}

export default BroadcastPublisher;
