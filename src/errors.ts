/**
 * Error types shared by sources, pipeline and store.
 */

// ============================================================================
// Source Errors
// ============================================================================

/**
 * How a source failure should be treated by the retry executor.
 *
 * - transient: network error, timeout, 408/5xx (retried)
 * - throttled: 429 or a source-declared rate limit (retried)
 * - not_found: entity unknown to the source (permanent)
 * - malformed: payload failed parsing or validation (permanent)
 * - http: any other non-2xx status (permanent)
 */
export type SourceErrorKind =
  | "transient"
  | "throttled"
  | "not_found"
  | "malformed"
  | "http";

export class SourceError extends Error {
  code = "SOURCE_ERROR" as const;
  kind: SourceErrorKind;
  status?: number;
  retryAfterMs?: number;

  constructor(
    kind: SourceErrorKind,
    message: string,
    options?: { status?: number; retryAfterMs?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "SourceError";
    this.kind = kind;
    this.status = options?.status;
    this.retryAfterMs = options?.retryAfterMs;
  }

  get retryable(): boolean {
    return this.kind === "transient" || this.kind === "throttled";
  }
}

/**
 * Raised when a run is cancelled or times out. Never retried.
 */
export class CancelledError extends Error {
  code = "CANCELLED" as const;

  constructor(message = "Run cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

// ============================================================================
// Store Errors
// ============================================================================

export class ConstraintViolationError extends Error {
  code = "CONSTRAINT_VIOLATION" as const;
  key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "ConstraintViolationError";
    this.key = key;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  problems: string[];

  constructor(message: string, problems: string[]) {
    super(`${message}: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

/**
 * Normalize an unknown thrown value into a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a signal's abort reason to a CancelledError.
 */
export function toCancelledError(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof CancelledError) {
    return reason;
  }
  return new CancelledError(
    reason instanceof Error ? reason.message : "Run cancelled"
  );
}
