import net from 'net';
import readline from 'readline';
import type { FeedConfig } from '../types/config.types';
import logger from '../utils/logger';

export type FrameHandler = (frame: string, timestamp: number) => void;

/**
 * Anything that can be started and stopped alongside the publisher.
 */
export interface FrameFeed {
  start(): void;
  stop(): Promise<void>;
}

const RAW_LINE_PATTERN = /^\*?([0-9A-Fa-f]+);?$/;

/**
 * Extract the hex payload from one line of a raw Mode S feed
 * (`*8D4840D6202CC371C32CE0576098;`). Bare hex lines are accepted too.
 */
export function parseRawLine(line: string): string | null {
  const match = RAW_LINE_PATTERN.exec(line.trim());
  if (!match) {
    return null;
  }
  return match[1].toUpperCase();
}

/**
 * TCP client for a raw-format ADS-B feed. Reconnects after a fixed delay
 * until stopped.
 */
export class RawFrameSource implements FrameFeed {
  private socket: net.Socket | null = null;

  private reconnectTimer: NodeJS.Timeout | null = null;

  private running = false;

  private linesReceived = 0;

  constructor(
    private readonly options: FeedConfig,
    private readonly onFrame: FrameHandler,
    private readonly clock: () => number = () => Date.now() / 1000,
  ) {}

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.connect();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const { socket } = this;
    this.socket = null;
    if (!socket || socket.destroyed) {
      return;
    }
    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.destroy();
    });
  }

  getLinesReceived(): number {
    return this.linesReceived;
  }

  private connect(): void {
    const { host, port } = this.options;
    logger.info('Connecting to raw ADS-B feed', { host, port });

    const socket = net.createConnection({ host, port });
    this.socket = socket;

    socket.on('connect', () => {
      logger.info('Connected to raw ADS-B feed', { host, port });
    });

    socket.on('error', (error) => {
      logger.warn('Raw ADS-B feed error', { host, port, error: error.message });
    });

    socket.on('close', () => {
      if (this.socket === socket) {
        this.socket = null;
      }
      this.scheduleReconnect();
    });

    const lines = readline.createInterface({ input: socket, crlfDelay: Infinity });
    lines.on('line', (line) => this.handleLine(line));
  }

  private handleLine(line: string): void {
    const frame = parseRawLine(line);
    if (!frame) {
      return;
    }
    this.linesReceived += 1;
    try {
      this.onFrame(frame, this.clock());
    } catch (error) {
      logger.error('Frame handler failed', { frame, error: (error as Error).message });
    }
  }

  private scheduleReconnect(): void {
    if (!this.running || this.reconnectTimer) {
      return;
    }
    logger.warn('Raw ADS-B feed disconnected, retrying', {
      delayMs: this.options.reconnectDelayMs,
    });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.running) {
        this.connect();
      }
    }, this.options.reconnectDelayMs);
  }
}

export default RawFrameSource;
