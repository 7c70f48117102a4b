import type { PersistenceTask } from '../../types/persistence.types';
import { InMemoryTaskQueue } from '../TaskQueue';

const upsert = (address: string): PersistenceTask => ({
  kind: 'upsert_aircraft',
  address,
  callsign: null,
  firstSeen: 100,
  lastUpdate: 100,
});

describe('InMemoryTaskQueue', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('hands tasks out in the order they were enqueued', async () => {
    const queue = new InMemoryTaskQueue();
    queue.enqueue(upsert('A'));
    queue.enqueue(upsert('B'));
    queue.enqueue(upsert('C'));

    const first = await queue.take(10);
    const second = await queue.take(10);
    const third = await queue.take(10);

    expect([first, second, third].map((task) => task && task.kind === 'upsert_aircraft' && task.address))
      .toEqual(['A', 'B', 'C']);
    expect(queue.size()).toBe(0);
  });

  it('resolves null when nothing arrives before the timeout', async () => {
    jest.useFakeTimers();
    const queue = new InMemoryTaskQueue();

    const pending = queue.take(500);
    jest.advanceTimersByTime(500);

    await expect(pending).resolves.toBeNull();
  });

  it('wakes a waiting consumer on enqueue', async () => {
    jest.useFakeTimers();
    const queue = new InMemoryTaskQueue();

    const pending = queue.take(500);
    queue.enqueue(upsert('A'));

    await expect(pending).resolves.toEqual(upsert('A'));
    expect(queue.size()).toBe(0);
    expect(jest.getTimerCount()).toBe(0);
  });

  it('rejects a second concurrent consumer', async () => {
    jest.useFakeTimers();
    const queue = new InMemoryTaskQueue();

    const first = queue.take(500);
    await expect(queue.take(500)).rejects.toThrow('InMemoryTaskQueue supports a single consumer');

    await queue.close();
    await expect(first).resolves.toBeNull();
  });

  it('drains whatever is still queued', async () => {
    const queue = new InMemoryTaskQueue();
    queue.enqueue(upsert('A'));
    queue.enqueue(upsert('B'));

    await expect(queue.drain()).resolves.toEqual([upsert('A'), upsert('B')]);
    await expect(queue.drain()).resolves.toEqual([]);
  });

  it('ignores enqueues after close', async () => {
    const queue = new InMemoryTaskQueue();
    await queue.close();
    queue.enqueue(upsert('A'));

    expect(queue.size()).toBe(0);
    await expect(queue.take(10)).resolves.toBeNull();
  });
});
