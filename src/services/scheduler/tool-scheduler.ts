// Concurrency policy for tool execution.
// Reads share a bounded pool of slots; writes are serialized per resource key.

import { abortReason } from '../../utils/clock.js';

export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
  reject: (error: Error) => void;
  detach: () => void;
}

/**
 * Counting semaphore with FIFO hand-off. A permit released while others wait
 * goes straight to the oldest waiter, so the permit count never drifts.
 */
export class Semaphore {
  private permits: number;
  private readonly waiters: Waiter[] = [];

  constructor(permits: number) {
    this.permits = Math.max(1, Math.floor(permits));
  }

  get available(): number {
    return this.permits;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        if (signal) reject(abortReason(signal));
      };

      const waiter: Waiter = {
        grant: resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  async run<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await operation();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.dispatch();
    };
  }

  private dispatch(): void {
    const next = this.waiters.shift();
    if (next) {
      next.detach();
      next.grant(this.createRelease());
      return;
    }
    this.permits++;
  }
}

/** One mutex per key, created on first use and kept for the owner's lifetime. */
export class KeyedMutex {
  private readonly locks = new Map<string, Semaphore>();

  run<T>(key: string, operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Semaphore(1);
      this.locks.set(key, lock);
    }
    return lock.run(operation, signal);
  }

  get size(): number {
    return this.locks.size;
  }
}

export const DEFAULT_READ_CONCURRENCY = 4;

export interface ToolSchedulerOptions {
  readConcurrency?: number;
}

export class ToolScheduler {
  private readonly reads: Semaphore;
  private readonly writes = new KeyedMutex();

  constructor(options: ToolSchedulerOptions = {}) {
    this.reads = new Semaphore(options.readConcurrency ?? DEFAULT_READ_CONCURRENCY);
  }

  runRead<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.reads.run(operation, signal);
  }

  runWrite<T>(key: string, operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.writes.run(key, operation, signal);
  }
}
