import { SessionBusyError } from '../errors.js';

export interface RunOptions {
  /** False to wait even when the queue is full. Default: true. */
  bounded?: boolean;
}

/**
 * FIFO async mutex with a bounded wait queue.
 *
 * `run()` executes tasks one at a time in arrival order. When `maxQueue`
 * callers are already waiting, new callers are rejected with
 * SessionBusyError instead of joining the queue, unless they run with
 * `bounded: false`.
 */
export class SessionLock {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly maxQueue = Infinity) {}

  /** Number of callers waiting behind the current holder. */
  get queued(): number {
    return this.waiters.length;
  }

  get busy(): boolean {
    return this.locked;
  }

  async run<T>(task: () => Promise<T>, opts: RunOptions = {}): Promise<T> {
    await this.acquire(opts.bounded ?? true);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(bounded: boolean): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    if (bounded && this.waiters.length >= this.maxQueue) {
      return Promise.reject(new SessionBusyError(this.waiters.length));
    }
    return new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter; `locked` stays true.
      next();
    } else {
      this.locked = false;
    }
  }
}
