/**
 * Virtual clock: sleeping advances time instantly and is recorded.
 */

import { toCancelledError } from "../../src/errors.js";

import type { Clock } from "../../src/scraper/rate-governor.js";

export class VirtualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted === true) {
      return Promise.reject(toCancelledError(signal));
    }
    this.sleeps.push(ms);
    if (ms > 0) {
      this.current += ms;
    }
    return Promise.resolve();
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * Let pending promise callbacks run.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}

export interface Gate {
  promise: Promise<void>;
  open: () => void;
}

export function createGate(): Gate {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}
