import type { PersistenceTask } from '../types/persistence.types';

/**
 * Ordered hand-off from the stream subscriber to the persistence worker.
 * Many producers, exactly one consumer.
 */
export interface TaskQueue {
  /** Never blocks the caller. */
  enqueue(task: PersistenceTask): void;
  /** Next task in FIFO order, or null once `timeoutMs` passes without one. */
  take(timeoutMs: number): Promise<PersistenceTask | null>;
  /** Remove and return everything still queued. */
  drain(): Promise<PersistenceTask[]>;
  close(): Promise<void>;
}

interface PendingTake {
  resolve: (task: PersistenceTask | null) => void;
  timer: NodeJS.Timeout;
}

export class InMemoryTaskQueue implements TaskQueue {
  private tasks: PersistenceTask[] = [];

  private waiter: PendingTake | null = null;

  private closed = false;

  enqueue(task: PersistenceTask): void {
    if (this.closed) {
      return;
    }
    const { waiter } = this;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(task);
      return;
    }
    this.tasks.push(task);
  }

  take(timeoutMs: number): Promise<PersistenceTask | null> {
    const next = this.tasks.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    // A second concurrent take would break single-consumer ordering
    if (this.waiter) {
      return Promise.reject(new Error('InMemoryTaskQueue supports a single consumer'));
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = { resolve, timer };
    });
  }

  async drain(): Promise<PersistenceTask[]> {
    const remaining = this.tasks;
    this.tasks = [];
    return remaining;
  }

  size(): number {
    return this.tasks.length;
  }

  async close(): Promise<void> {
    this.closed = true;
    const { waiter } = this;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }
}

export default InMemoryTaskQueue;
