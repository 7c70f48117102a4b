import { createServer } from 'http';
import { Server } from 'socket.io';
import type { AircraftRecord, Snapshot } from '../../types/aircraft.types';
import {
  BroadcastPublisher,
  SNAPSHOT_EVENT,
  createSocketEndpoint,
  type SubscriberEndpoint,
} from '../BroadcastPublisher';
import { SocketIoFeedConnector } from '../SocketIoFeedConnector';

jest.mock('../../utils/logger', () => ({
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
}));

const RECORD: AircraftRecord = {
  address: 'ABC123',
  callsign: 'TEST1',
  position: { lat: 1, lon: 2 },
  altitude: 35000,
  velocity: null,
  firstSeen: 100,
  lastUpdate: 104,
  distanceNm: null,
  distanceKm: null,
  assemblyTimeMs: null,
  staleCprCount: 0,
};

const SNAPSHOT: Snapshot = Object.freeze({ ABC123: Object.freeze({ ...RECORD }) });

const provider = { snapshot: jest.fn(() => SNAPSHOT) };

const createEndpoint = (id: string, fails = false) => ({
  id,
  send: jest.fn(async (_payload: string) => {
    if (fails) {
      throw new Error('socket gone');
    }
  }),
  close: jest.fn(),
});

describe('BroadcastPublisher', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('does no serialization work without endpoints', async () => {
    const serializer = jest.fn((snapshot: Snapshot) => JSON.stringify(snapshot));
    const publisher = new BroadcastPublisher(provider, { broadcastIntervalMs: 1000 }, serializer);

    await expect(publisher.broadcastOnce()).resolves.toBe(0);

    expect(serializer).not.toHaveBeenCalled();
    expect(provider.snapshot).not.toHaveBeenCalled();
  });

  it('serializes once and sends the same payload to every endpoint', async () => {
    const serializer = jest.fn((snapshot: Snapshot) => JSON.stringify(snapshot));
    const publisher = new BroadcastPublisher(provider, { broadcastIntervalMs: 1000 }, serializer);
    const first = createEndpoint('a');
    const second = createEndpoint('b');
    publisher.addEndpoint(first);
    publisher.addEndpoint(second);

    await expect(publisher.broadcastOnce()).resolves.toBe(2);

    const payload = JSON.stringify(SNAPSHOT);
    expect(serializer).toHaveBeenCalledTimes(1);
    expect(first.send).toHaveBeenCalledWith(payload);
    expect(second.send).toHaveBeenCalledWith(payload);
  });

  it('drops and closes a failing endpoint without affecting the others', async () => {
    const publisher = new BroadcastPublisher(provider, { broadcastIntervalMs: 1000 });
    const healthy = createEndpoint('healthy');
    const broken = createEndpoint('broken', true);
    publisher.addEndpoint(healthy);
    publisher.addEndpoint(broken);

    await expect(publisher.broadcastOnce()).resolves.toBe(1);
    expect(publisher.endpointCount()).toBe(1);
    expect(broken.close).toHaveBeenCalledTimes(1);
    expect(healthy.close).not.toHaveBeenCalled();

    await expect(publisher.broadcastOnce()).resolves.toBe(1);
    expect(healthy.send).toHaveBeenCalledTimes(2);
    expect(broken.send).toHaveBeenCalledTimes(1);
  });

  it('broadcasts on its interval and stops the feed and endpoints on stop', async () => {
    jest.useFakeTimers();
    try {
      const feed = { start: jest.fn(), stop: jest.fn(async () => undefined) };
      const publisher = new BroadcastPublisher(provider, { broadcastIntervalMs: 3000 }, undefined, feed);
      const endpoint: SubscriberEndpoint = createEndpoint('a');
      publisher.addEndpoint(endpoint);

      publisher.start();
      expect(feed.start).toHaveBeenCalledTimes(1);
      jest.advanceTimersByTime(2999);
      expect(provider.snapshot).not.toHaveBeenCalled();
      jest.advanceTimersByTime(1);
      expect(provider.snapshot).toHaveBeenCalledTimes(1);

      await publisher.stop();
      expect(feed.stop).toHaveBeenCalledTimes(1);
      expect(publisher.endpointCount()).toBe(0);
      jest.advanceTimersByTime(10000);
      expect(provider.snapshot).toHaveBeenCalledTimes(1);
    } finally {
      jest.useRealTimers();
    }
  });

  describe('createSocketEndpoint', () => {
    it('emits the payload on the snapshot event while connected', async () => {
      const socket = { id: 's1', connected: true, emit: jest.fn(), disconnect: jest.fn() };
      const endpoint = createSocketEndpoint(socket);

      await endpoint.send('{}');
      endpoint.close();

      expect(socket.emit).toHaveBeenCalledWith(SNAPSHOT_EVENT, '{}');
      expect(socket.disconnect).toHaveBeenCalledWith(true);
    });

    it('rejects once the socket is disconnected', async () => {
      const socket = { id: 's1', connected: false, emit: jest.fn(), disconnect: jest.fn() };

      await expect(createSocketEndpoint(socket).send('{}')).rejects.toThrow('Socket s1 is not connected');
      expect(socket.emit).not.toHaveBeenCalled();
    });
  });

  describe('over socket.io', () => {
    it('delivers snapshots to a connected subscriber and forgets it on disconnect', async () => {
      const httpServer = createServer();
      const io = new Server(httpServer);
      const publisher = new BroadcastPublisher(provider, { broadcastIntervalMs: 60000 });
      publisher.attach(io);
      await new Promise<void>((resolve) => {
        httpServer.listen(0, '127.0.0.1', () => resolve());
      });
      const address = httpServer.address();
      if (!address || typeof address === 'string') {
        throw new Error('Test server has no TCP address');
      }

      const connector = new SocketIoFeedConnector(`http://127.0.0.1:${address.port}`, 2000);
      const result = await connector.connect();
      if (!result.ok) {
        throw result.error;
      }
      const received = new Promise<unknown>((resolve) => {
        result.connection.onMessage(resolve);
      });

      await expect(publisher.broadcastOnce()).resolves.toBe(1);
      const payload = await received;
      expect(typeof payload).toBe('string');
      expect(JSON.parse(String(payload))).toEqual({ ABC123: RECORD });

      result.connection.close();
      await expect(result.connection.closed).resolves.toBe('io client disconnect');
      await publisher.stop();
      expect(publisher.endpointCount()).toBe(0);
    });
  });
});
