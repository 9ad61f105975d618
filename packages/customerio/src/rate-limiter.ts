import { type Logger, getLogger } from '@customerio-async/logger';
import { err, ok, type Result } from 'neverthrow';

import { AdmissionCancelledError } from './errors.js';
import type { RateLimitConfig, ReplenishPolicy } from './types.js';

export interface RateLimiterStatus {
  available: number;
  capacity: number;
  intervalMs: number;
  policy: ReplenishPolicy;
  waiting: number;
}

interface Waiter {
  detach: () => void;
  resolve: (result: Result<void, Error>) => void;
}

const assertPositive = (fieldName: string, value: number, integer: boolean): void => {
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    const expected = integer ? 'a positive integer' : 'a positive finite number';
    throw new Error(`Invalid rate limit configuration: ${fieldName} must be ${expected}, got ${value}`);
  }
};

const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error ? signal.reason : new AdmissionCancelledError();

/**
 * Token-bucket admission gate.
 *
 * `acquire()` grants immediately while slots remain and otherwise queues the
 * caller; queued callers are granted strictly in arrival order. Under the
 * `rolling` policy every grant returns its slot exactly `intervalMs` later,
 * so no window of `intervalMs` ever sees more than `capacity` grants. Under
 * `fixed-window` the whole bucket refills `intervalMs` after the first grant
 * of each window.
 *
 * State is only touched from timer callbacks and `acquire()` itself, which
 * the event loop already serializes.
 */
export class RateLimiter {
  private readonly capacity: number;
  private readonly intervalMs: number;
  private readonly policy: ReplenishPolicy;
  private readonly logger: Logger;
  private readonly waiters: Waiter[] = [];
  private available: number;
  private windowOpen = false;

  constructor(name: string, config: RateLimitConfig) {
    assertPositive('capacity', config.capacity, true);
    assertPositive('intervalMs', config.intervalMs, false);

    this.capacity = config.capacity;
    this.intervalMs = config.intervalMs;
    this.policy = config.policy;
    this.available = config.capacity;
    this.logger = getLogger(`RateLimiter:${name}`);

    this.logger.debug(
      `Rate limiter initialized - Capacity: ${config.capacity}, IntervalMs: ${config.intervalMs}, Policy: ${config.policy}`
    );
  }

  /**
   * Wait for a slot. Resolves `ok()` once granted, or `err(reason)` if the
   * signal aborts first; an aborted waiter never consumes a slot.
   */
  acquire(signal?: AbortSignal): Promise<Result<void, Error>> {
    if (signal?.aborted) {
      return Promise.resolve(err(abortReason(signal)));
    }

    if (this.available > 0 && this.waiters.length === 0) {
      this.grant();
      return Promise.resolve(ok());
    }

    return new Promise((resolve) => {
      const waiter: Waiter = { detach: () => undefined, resolve };

      if (signal) {
        const onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          this.logger.debug(`Admission cancelled while queued - Waiting: ${this.waiters.length}`);
          resolve(err(abortReason(signal)));
        };
        signal.addEventListener('abort', onAbort, { once: true });
        waiter.detach = () => signal.removeEventListener('abort', onAbort);
      }

      this.waiters.push(waiter);
      this.logger.debug(`Rate limit reached, queueing caller - Waiting: ${this.waiters.length}`);
    });
  }

  getStatus(): RateLimiterStatus {
    return {
      available: this.available,
      capacity: this.capacity,
      intervalMs: this.intervalMs,
      policy: this.policy,
      waiting: this.waiters.length,
    };
  }

  private grant(): void {
    this.available -= 1;

    if (this.policy === 'rolling') {
      setTimeout(() => this.replenish(), this.intervalMs);
      return;
    }

    if (!this.windowOpen) {
      this.windowOpen = true;
      setTimeout(() => this.resetWindow(), this.intervalMs);
    }
  }

  private replenish(): void {
    this.available = Math.min(this.capacity, this.available + 1);
    this.serveWaiters();
  }

  private resetWindow(): void {
    this.windowOpen = false;
    this.available = this.capacity;
    this.serveWaiters();
  }

  private serveWaiters(): void {
    while (this.available > 0) {
      const next = this.waiters.shift();
      if (!next) {
        return;
      }
      next.detach();
      this.grant();
      next.resolve(ok());
    }
  }
}
