import { setTimeout as delay } from "node:timers/promises";

import { CancelledError, toCancelledError } from "../errors.js";
import { sourceLogger } from "../logger.js";

// ============================================================================
// Clock
// ============================================================================

/**
 * Time source used for spacing and backoff. Tests swap in a virtual clock.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    if (ms <= 0) {
      return;
    }
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted === true) {
        throw toCancelledError(signal);
      }
      throw error;
    }
  },
};

// ============================================================================
// Types
// ============================================================================

export interface RateGovernorOptions {
  /** Identifies the governor in logs */
  name: string;
  /** Maximum simultaneous in-flight requests */
  maxConcurrent: number;
  /** Minimum spacing between request starts, when the endpoint has none */
  defaultIntervalMs: number;
  /** Per-endpoint spacing applied after a request to that endpoint starts */
  endpointIntervalsMs?: Record<string, number>;
  clock?: Clock;
}

// ============================================================================
// Rate Governor
// ============================================================================

/**
 * Concurrency gate plus start-to-start spacing for one source.
 *
 * Starts are reserved in call order: a request to endpoint E starting at t
 * pushes the earliest next start to t + interval(E), whatever endpoint the
 * next request targets.
 */
export class RateGovernor {
  readonly name: string;
  readonly maxConcurrent: number;
  private readonly defaultIntervalMs: number;
  private readonly endpointIntervalsMs: Record<string, number>;
  private readonly clock: Clock;

  private active = 0;
  private waiters: (() => void)[] = [];
  private nextStartAt = 0;

  constructor(options: RateGovernorOptions) {
    if (options.maxConcurrent < 1) {
      throw new RangeError("maxConcurrent must be at least 1");
    }
    this.name = options.name;
    this.maxConcurrent = options.maxConcurrent;
    this.defaultIntervalMs = options.defaultIntervalMs;
    this.endpointIntervalsMs = options.endpointIntervalsMs ?? {};
    this.clock = options.clock ?? systemClock;
  }

  intervalFor(endpoint: string): number {
    return this.endpointIntervalsMs[endpoint] ?? this.defaultIntervalMs;
  }

  get inFlight(): number {
    return this.active;
  }

  /**
   * Run a task once a slot is free and the spacing has elapsed.
   */
  async run<T>(
    endpoint: string,
    task: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    await this.acquire(signal);
    try {
      await this.awaitTurn(endpoint, signal);
      return await task();
    } finally {
      this.release();
    }
  }

  private async awaitTurn(endpoint: string, signal?: AbortSignal): Promise<void> {
    const now = this.clock.now();
    const startAt = Math.max(now, this.nextStartAt);
    this.nextStartAt = startAt + this.intervalFor(endpoint);

    const waitMs = startAt - now;
    if (waitMs > 0) {
      sourceLogger.debug(
        { governor: this.name, endpoint, waitMs },
        "Rate limiting: waiting before request"
      );
      await this.clock.sleep(waitMs, signal);
    }
    if (signal?.aborted === true) {
      throw toCancelledError(signal);
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted === true) {
      return Promise.reject(toCancelledError(signal));
    }
    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((waiter) => waiter !== grant);
        reject(
          signal !== undefined ? toCancelledError(signal) : new CancelledError()
        );
      };
      const grant = (): void => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(grant);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next !== undefined) {
      // Slot passes straight to the next waiter; active count is unchanged
      next();
    } else {
      this.active--;
    }
  }
}
