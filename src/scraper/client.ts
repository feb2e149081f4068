import {
  CancelledError,
  SourceError,
  errorMessage,
  type SourceErrorKind,
} from "../errors.js";
import { sourceLogger } from "../logger.js";
import { runWithConcurrency } from "../utils/concurrency.js";
import { systemClock, type Clock, type RateGovernor } from "./rate-governor.js";
import {
  executeWithRetry,
  DEFAULT_RETRY,
  type RetryOptions,
  type RetryOutcome,
} from "./retry.js";
import { SourceSession, type FetchLike } from "./session.js";

import type { SourceName } from "../types/index.js";

// ============================================================================
// Capability Set
// ============================================================================

export interface SourceRequest {
  /** Governor endpoint key, selects the spacing policy */
  endpoint: string;
  url: string;
  format: "json" | "text";
}

/** A listed entity, or the reason its listing entry was rejected */
export type DiscoveredEntity<TParsed> =
  | { appid: number; parsed: TParsed }
  | { appid: number; error: SourceError };

/**
 * What differs between sources: how to address an entity, how to read the
 * payload, and how to normalize it. Transport, spacing and retries are
 * shared by SourceClient.
 *
 * parse() throws SourceError("not_found" | "malformed" | "throttled") for
 * payloads it cannot accept; normalize() is pure.
 */
export interface SourceAdapter<TParsed, TRecord> {
  readonly source: SourceName;
  /** Short provider name used in logs ("steamspy", "steamcharts", ...) */
  readonly provider: string;
  requestFor(appid: number): SourceRequest;
  parse(raw: unknown, appid: number): TParsed;
  normalize(parsed: TParsed, appid: number): TRecord[];
  /** Bulk listing of every known entity; only the discovery authority has it */
  discovery?: {
    request(): SourceRequest;
    parse(raw: unknown): DiscoveredEntity<TParsed>[];
  };
}

// ============================================================================
// Results
// ============================================================================

export interface SourceFailure {
  /** null when the failure is not tied to one entity (discovery) */
  appid: number | null;
  kind: SourceErrorKind;
  message: string;
  attempts: number;
}

export interface AcquireResult<TRecord> {
  source: SourceName;
  provider: string;
  requested: number[];
  succeeded: number[];
  records: TRecord[];
  failures: SourceFailure[];
  requests: number;
}

export type AcquireTarget = readonly number[] | "all";

export interface AcquireOptions {
  signal?: AbortSignal;
  /** Cap on entities returned by discovery */
  discoveryLimit?: number;
}

export interface SourceClientOptions {
  governor: RateGovernor;
  userAgent: string;
  timeoutMs: number;
  retry?: Partial<Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs">>;
  clock?: Clock;
  fetch?: FetchLike;
}

// ============================================================================
// Source Client
// ============================================================================

/**
 * Acquires normalized records from one source under its own governor.
 *
 * Per-entity failures are collected, never thrown; only cancellation
 * escapes acquire().
 */
export class SourceClient<TParsed, TRecord> {
  readonly source: SourceName;
  private readonly retry: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs">;
  private readonly clock: Clock;

  constructor(
    private readonly adapter: SourceAdapter<TParsed, TRecord>,
    private readonly options: SourceClientOptions
  ) {
    this.source = adapter.source;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.clock = options.clock ?? systemClock;
  }

  get provider(): string {
    return this.adapter.provider;
  }

  get canDiscover(): boolean {
    return this.adapter.discovery !== undefined;
  }

  async acquire(
    target: AcquireTarget,
    options: AcquireOptions = {}
  ): Promise<AcquireResult<TRecord>> {
    // One session per acquisition, released whatever happens
    const session = new SourceSession({
      name: this.adapter.provider,
      userAgent: this.options.userAgent,
      timeoutMs: this.options.timeoutMs,
      signal: options.signal,
      fetch: this.options.fetch,
    });

    const result: AcquireResult<TRecord> = {
      source: this.adapter.source,
      provider: this.adapter.provider,
      requested: [],
      succeeded: [],
      records: [],
      failures: [],
      requests: 0,
    };

    const startTime = performance.now();

    try {
      if (target === "all") {
        await this.discoverAll(session, result, options.discoveryLimit);
      } else {
        await this.acquireKeys(session, [...new Set(target)], result);
      }
    } finally {
      result.requests = session.requestCount;
      session.close();
    }

    sourceLogger.info(
      {
        source: result.source,
        provider: result.provider,
        requested: result.requested.length,
        succeeded: result.succeeded.length,
        records: result.records.length,
        failures: result.failures.length,
        duration: `${String(Math.round(performance.now() - startTime))}ms`,
      },
      "Source acquisition finished"
    );

    return result;
  }

  private async acquireKeys(
    session: SourceSession,
    appids: number[],
    result: AcquireResult<TRecord>
  ): Promise<void> {
    result.requested = appids;

    const outcomes = await runWithConcurrency(
      appids,
      this.options.governor.maxConcurrent,
      (appid) =>
        this.fetchAndParse(
          session,
          this.adapter.requestFor(appid),
          `${this.adapter.provider}:${String(appid)}`,
          (raw) => this.adapter.parse(raw, appid)
        )
    );

    for (const [index, outcome] of outcomes.entries()) {
      const appid = appids[index];
      if (appid === undefined) {
        continue;
      }
      if (!outcome.ok) {
        result.failures.push({
          appid,
          kind: outcome.error.kind,
          message: outcome.error.message,
          attempts: outcome.attempts,
        });
        continue;
      }

      const normalized = this.normalizeSafely(outcome.value, appid);
      if (normalized instanceof SourceError) {
        result.failures.push({
          appid,
          kind: normalized.kind,
          message: normalized.message,
          attempts: outcome.attempts,
        });
        continue;
      }
      result.succeeded.push(appid);
      result.records.push(...normalized);
    }
  }

  private async discoverAll(
    session: SourceSession,
    result: AcquireResult<TRecord>,
    limit?: number
  ): Promise<void> {
    const discovery = this.adapter.discovery;
    if (discovery === undefined) {
      throw new Error(`${this.adapter.provider} cannot discover entities`);
    }

    const outcome = await this.fetchAndParse(
      session,
      discovery.request(),
      `${this.adapter.provider}:all`,
      (raw) => discovery.parse(raw)
    );

    if (!outcome.ok) {
      result.failures.push({
        appid: null,
        kind: outcome.error.kind,
        message: outcome.error.message,
        attempts: outcome.attempts,
      });
      return;
    }

    const entities =
      limit !== undefined ? outcome.value.slice(0, limit) : outcome.value;

    for (const entity of entities) {
      result.requested.push(entity.appid);
      if ("error" in entity) {
        result.failures.push({
          appid: entity.appid,
          kind: entity.error.kind,
          message: entity.error.message,
          attempts: outcome.attempts,
        });
        continue;
      }
      const normalized = this.normalizeSafely(entity.parsed, entity.appid);
      if (normalized instanceof SourceError) {
        result.failures.push({
          appid: entity.appid,
          kind: normalized.kind,
          message: normalized.message,
          attempts: outcome.attempts,
        });
        continue;
      }
      result.succeeded.push(entity.appid);
      result.records.push(...normalized);
    }
  }

  private fetchAndParse<T>(
    session: SourceSession,
    request: SourceRequest,
    label: string,
    parse: (raw: unknown) => T
  ): Promise<RetryOutcome<T>> {
    return executeWithRetry(
      () =>
        this.options.governor.run(
          request.endpoint,
          async () => {
            const raw =
              request.format === "json"
                ? await session.getJson(request.url)
                : await session.getText(request.url);
            return parse(raw);
          },
          session.signal
        ),
      { ...this.retry, clock: this.clock, signal: session.signal, label }
    );
  }

  private normalizeSafely(parsed: TParsed, appid: number): TRecord[] | SourceError {
    try {
      return this.adapter.normalize(parsed, appid);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      return error instanceof SourceError
        ? error
        : new SourceError(
            "malformed",
            `Could not normalize ${this.adapter.provider} payload for ${String(appid)}: ${errorMessage(error)}`,
            { cause: error }
          );
    }
  }
}
