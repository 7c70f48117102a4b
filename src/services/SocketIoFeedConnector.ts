import {
  io,
  type ManagerOptions,
  type Socket,
  type SocketOptions,
} from 'socket.io-client';
import logger from '../utils/logger';
import { SNAPSHOT_EVENT } from './BroadcastPublisher';
import type { ConnectResult, FeedConnection, FeedConnector } from './StreamSubscriber';

export type SocketFactory = (url: string, options: Partial<ManagerOptions & SocketOptions>) => Socket;

function wrapSocket(socket: Socket): FeedConnection {
  const closed = new Promise<string>((resolve) => {
    socket.once('disconnect', (reason) => resolve(reason));
  });
  return {
    onMessage: (handler) => {
      socket.on(SNAPSHOT_EVENT, (payload: unknown) => handler(payload));
    },
    closed,
    close: () => {
      socket.disconnect();
    },
  };
}

/**
 * One socket.io-client connection per attempt. The client's own reconnection
 * is disabled; StreamSubscriber decides when to try again.
 */
export class SocketIoFeedConnector implements FeedConnector {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
    private readonly createSocket: SocketFactory = io,
  ) {}

  connect(): Promise<ConnectResult> {
    const socket = this.createSocket(this.url, {
      reconnection: false,
      autoConnect: false,
      transports: ['websocket'],
      timeout: this.timeoutMs,
    });

    return new Promise<ConnectResult>((resolve) => {
      const onConnect = () => {
        socket.off('connect_error', onError);
        logger.info('Connected to publisher', { url: this.url, socketId: socket.id });
        resolve({ ok: true, connection: wrapSocket(socket) });
      };
      const onError = (error: Error) => {
        socket.off('connect', onConnect);
        socket.close();
        resolve({ ok: false, error });
      };
      socket.once('connect', onConnect);
      socket.once('connect_error', onError);
      socket.connect();
    });
  }
}

export default SocketIoFeedConnector;
