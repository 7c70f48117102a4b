import { RedisClientManager } from '../RedisClientManager';

jest.mock('../../../utils/logger', () => ({
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
}));

jest.mock('ioredis', () => {
  const { EventEmitter } = jest.requireActual<typeof import('events')>('events');
  class FakeRedis extends EventEmitter {
    connect = jest.fn().mockResolvedValue(undefined);

    quit = jest.fn().mockResolvedValue('OK');

    disconnect = jest.fn();

    constructor(public url: string, public options: Record<string, unknown>) {
      super();
    }
  }
  return { __esModule: true, default: jest.fn((url: string, options: Record<string, unknown>) => new FakeRedis(url, options)) };
});

const { default: RedisMock } = jest.requireMock<{ default: jest.Mock }>('ioredis');

describe('RedisClientManager', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('creates one lazily connected client per name', () => {
    const manager = new RedisClientManager();

    const producer = manager.getClient('producer', 'redis://127.0.0.1:6379');
    expect(manager.getClient('producer', 'redis://127.0.0.1:6379')).toBe(producer);
    manager.getClient('consumer', 'redis://127.0.0.1:6379');

    expect(RedisMock).toHaveBeenCalledTimes(2);
    expect(RedisMock).toHaveBeenCalledWith('redis://127.0.0.1:6379', {
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
      lazyConnect: true,
    });
  });

  it('enables TLS for rediss URLs', () => {
    const manager = new RedisClientManager();

    manager.getClient('secure', 'rediss://:test-secret@cache.internal:6380');

    expect(RedisMock.mock.calls[0][1]).toMatchObject({ tls: { rejectUnauthorized: true } });
  });

  it('tracks connection status from client events', () => {
    const manager = new RedisClientManager();
    const client = manager.getClient('producer', 'redis://127.0.0.1:6379');

    client.emit('ready');
    expect(manager.getHealth().producer.status).toBe('ready');

    client.emit('error', new Error('ECONNRESET'));
    expect(manager.getHealth().producer).toMatchObject({ status: 'error', lastError: 'ECONNRESET' });
  });

  it('falls back to disconnect when quit fails', async () => {
    const manager = new RedisClientManager();
    const client = manager.getClient('producer', 'redis://127.0.0.1:6379');
    jest.spyOn(client, 'quit').mockRejectedValueOnce(new Error('Connection is closed.'));
    const disconnect = jest.spyOn(client, 'disconnect');

    await manager.disconnect('producer');

    expect(disconnect).toHaveBeenCalledTimes(1);
    expect(manager.getHealth()).toEqual({});
  });
});
