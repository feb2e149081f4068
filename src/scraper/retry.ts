import { CancelledError, SourceError, toCancelledError } from "../errors.js";
import { sourceLogger } from "../logger.js";
import { systemClock, type Clock } from "./rate-governor.js";

// ============================================================================
// Types
// ============================================================================

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  clock?: Clock;
  signal?: AbortSignal;
  /** Label for log lines, e.g. "steamspy:730" */
  label?: string;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: SourceError; attempts: number };

export const DEFAULT_RETRY: Pick<
  RetryOptions,
  "maxAttempts" | "baseDelayMs" | "maxDelayMs"
> = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  maxDelayMs: 30_000,
};

// ============================================================================
// Helpers
// ============================================================================

/**
 * Backoff before the next attempt: base, 2*base, 4*base ... capped.
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number
): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Anything that is not already a SourceError counts as a network-level
 * failure and may be retried.
 */
export function classifyError(error: unknown): SourceError {
  if (error instanceof SourceError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SourceError("transient", message, { cause: error });
}

// ============================================================================
// Retry Executor
// ============================================================================

/**
 * Run a fetch attempt with bounded exponential backoff.
 *
 * Never throws for source failures: the outcome carries the typed error.
 * Cancellation of the signal is the one exception and is rethrown as
 * CancelledError.
 */
export async function executeWithRetry<T>(
  attempt: (attemptNumber: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const clock = options.clock ?? systemClock;
  const { signal } = options;

  for (let attemptNumber = 1; ; attemptNumber++) {
    if (signal?.aborted === true) {
      throw toCancelledError(signal);
    }

    try {
      const value = await attempt(attemptNumber);
      return { ok: true, value, attempts: attemptNumber };
    } catch (raw) {
      if (raw instanceof CancelledError) {
        throw raw;
      }
      if (signal?.aborted) {
        throw toCancelledError(signal);
      }

      const error = classifyError(raw);
      if (!error.retryable || attemptNumber >= options.maxAttempts) {
        sourceLogger.debug(
          {
            label: options.label,
            kind: error.kind,
            attempts: attemptNumber,
            error: error.message,
          },
          "Giving up on request"
        );
        return { ok: false, error, attempts: attemptNumber };
      }

      const backoff = backoffDelay(
        attemptNumber,
        options.baseDelayMs,
        options.maxDelayMs
      );
      const waitMs = Math.max(backoff, error.retryAfterMs ?? 0);

      sourceLogger.warn(
        {
          label: options.label,
          kind: error.kind,
          attempt: attemptNumber,
          maxAttempts: options.maxAttempts,
          waitMs,
          error: error.message,
        },
        "Request failed, retrying"
      );

      await clock.sleep(waitMs, signal);
    }
  }
}
