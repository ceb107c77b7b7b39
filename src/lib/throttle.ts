import { defaultSleep } from './retry.js';

export interface RequestThrottleOptions {
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Enforces a minimum spacing between the starts of outbound calls. Callers
 * queue on a promise chain so the check-and-stamp of `lastStart` never
 * interleaves, even when several clients share one throttle.
 */
export class RequestThrottle {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastStart: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RequestThrottleOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Resolves once the caller may start its call. */
  acquire(): Promise<void> {
    const turn = this.queue.then(async () => {
      if (this.lastStart !== null) {
        const wait = this.lastStart + this.minIntervalMs - this.now();
        if (wait > 0) await this.sleep(wait);
      }
      this.lastStart = this.now();
    });
    // A rejected sleep must not poison later turns.
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    return fn();
  }
}
