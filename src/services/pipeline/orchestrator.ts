/**
 * Pipeline Orchestrator
 *
 * One run: acquire (per-source, concurrent) → merge → dedupe → load →
 * report. Runs are serialized; a second call waits for the first.
 */

import { CancelledError, errorMessage, toCancelledError } from "../../errors.js";
import { pipelineLogger } from "../../logger.js";
import { SerialLock } from "../../utils/concurrency.js";
import { dedupeFacts } from "./dedupe.js";
import { mergeSources } from "./merge.js";
import { loadFailureCount, sourceFailureCount } from "./reporters.js";
import {
  SOURCE_NAMES,
  type MergeStats,
  type SourceName,
  type SourceRecordMap,
} from "../../types/index.js";

import type { Loader, LoadStats } from "./loader.js";
import type { DestinationStore, StoreBaseline } from "./store.js";
import type { AcquireResult, SourceFailure } from "../../scraper/client.js";
import type { RecordSource, SourceSet } from "../../scraper/sources/index.js";

// ============================================================================
// Types
// ============================================================================

export type RunType = "full" | "metadata" | "timeseries" | "pricing";

export const RUN_TYPES: readonly RunType[] = [
  "full",
  "metadata",
  "timeseries",
  "pricing",
];

export type RunStatus =
  | "succeeded"
  | "partial"
  | "failed"
  | "aborted"
  | "cancelled";

export interface RunRequest {
  runType: RunType;
  /** Explicit target set; absent means discovery (or the stored games) */
  appids?: readonly number[];
  discoveryLimit?: number;
  signal?: AbortSignal;
  /** Overrides the configured run timeout */
  timeoutMs?: number;
}

export interface SourceRunSummary {
  provider: string;
  /** false when the source was filled from the stored baseline */
  fetched: boolean;
  requested: number;
  succeeded: number;
  records: number;
  requests: number;
  failures: SourceFailure[];
}

export interface RunSummary {
  runType: RunType;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  targets: number;
  failureRate: number;
  sources: Record<SourceName, SourceRunSummary>;
  merge: MergeStats | null;
  dedupe: { dropped: number; collisions: string[] } | null;
  load: LoadStats | null;
  message?: string;
}

/**
 * Receives every run summary (logs, run history table, ...).
 */
export interface RunReporter {
  report(summary: RunSummary): Promise<void>;
}

export interface OrchestratorOptions {
  /** Share of failed keys above which a run is aborted before loading */
  maxFailureRate: number;
  runTimeoutMs: number;
}

type Acquired = { [K in SourceName]: AcquireResult<SourceRecordMap[K]> | null };

const RUN_SOURCES: Record<RunType, readonly SourceName[]> = {
  full: ["metadata", "timeseries", "pricing"],
  metadata: ["metadata"],
  timeseries: ["timeseries"],
  pricing: ["pricing"],
};

function emptySourceSummary(provider: string, fetched: boolean): SourceRunSummary {
  return {
    provider,
    fetched,
    requested: 0,
    succeeded: 0,
    records: 0,
    requests: 0,
    failures: [],
  };
}

function summarizeSource<T>(
  provider: string,
  result: AcquireResult<T> | null,
  baselineRecords: number
): SourceRunSummary {
  if (result === null) {
    return { ...emptySourceSummary(provider, false), records: baselineRecords };
  }
  return {
    provider,
    fetched: true,
    requested: result.requested.length,
    succeeded: result.succeeded.length,
    records: result.records.length,
    requests: result.requests,
    failures: result.failures,
  };
}

/**
 * Failed keys over requested keys across the fetched sources. A failed
 * discovery (no keys at all) counts as a full failure.
 */
export function computeFailureRate(
  results: readonly (AcquireResult<unknown> | null)[]
): number {
  let requested = 0;
  let failed = 0;
  for (const result of results) {
    if (result === null) {
      continue;
    }
    if (result.failures.some((failure) => failure.appid === null)) {
      return 1;
    }
    requested += result.requested.length;
    failed += result.failures.length;
  }
  return requested === 0 ? 0 : failed / requested;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class PipelineOrchestrator {
  private readonly lock = new SerialLock();

  constructor(
    private readonly sources: SourceSet,
    private readonly store: DestinationStore,
    private readonly loader: Loader,
    private readonly reporters: readonly RunReporter[],
    private readonly options: OrchestratorOptions
  ) {}

  /** Runs waiting behind the current one */
  get pendingRuns(): number {
    return this.lock.queued;
  }

  async run(request: RunRequest): Promise<RunSummary> {
    return this.lock.runExclusive(() => this.execute(request));
  }

  private async execute(request: RunRequest): Promise<RunSummary> {
    const startedAt = new Date();
    const fetchSources = RUN_SOURCES[request.runType];

    const summary: RunSummary = {
      runType: request.runType,
      status: "failed",
      startedAt: startedAt.toISOString(),
      finishedAt: startedAt.toISOString(),
      durationMs: 0,
      targets: 0,
      failureRate: 0,
      sources: {
        metadata: emptySourceSummary(this.sources.metadata.provider, false),
        timeseries: emptySourceSummary(this.sources.timeseries.provider, false),
        pricing: emptySourceSummary(this.sources.pricing.provider, false),
      },
      merge: null,
      dedupe: null,
      load: null,
    };

    // Run-level cancellation: caller's signal or the timeout
    const controller = new AbortController();
    const timeoutMs = request.timeoutMs ?? this.options.runTimeoutMs;
    const timer = setTimeout(() => {
      controller.abort(
        new CancelledError(`Run timed out after ${String(timeoutMs)}ms`)
      );
    }, timeoutMs);
    const parent = request.signal;
    const onParentAbort = (): void => {
      controller.abort(
        parent !== undefined ? toCancelledError(parent) : new CancelledError()
      );
    };
    if (parent?.aborted === true) {
      onParentAbort();
    } else {
      parent?.addEventListener("abort", onParentAbort, { once: true });
    }
    const { signal } = controller;

    pipelineLogger.info(
      {
        runType: request.runType,
        appids: request.appids?.length ?? "discover",
        sources: fetchSources,
      },
      "Pipeline run started"
    );

    try {
      const acquired = await this.acquireAll(request, fetchSources, signal);
      const targets = acquired.targets;
      summary.targets = targets.length;

      const baseline = await this.loadBaseline(fetchSources, targets);
      const { metadata, timeseries, pricing } = acquired.results;
      summary.sources = {
        metadata: summarizeSource(
          this.sources.metadata.provider,
          metadata,
          baseline.metadata.length
        ),
        timeseries: summarizeSource(
          this.sources.timeseries.provider,
          timeseries,
          baseline.timeseries.length
        ),
        pricing: summarizeSource(
          this.sources.pricing.provider,
          pricing,
          baseline.pricing.length
        ),
      };

      if (signal.aborted) {
        throw toCancelledError(signal);
      }

      summary.failureRate = computeFailureRate([metadata, timeseries, pricing]);
      if (targets.length === 0) {
        summary.status = "failed";
        summary.message = "No target games";
        return summary;
      }
      const acquiredAny = [metadata, timeseries, pricing].some(
        (result) => result !== null && result.succeeded.length > 0
      );
      if (!acquiredAny) {
        summary.status = "failed";
        summary.message = "No game acquired from any source";
        return summary;
      }
      if (summary.failureRate > this.options.maxFailureRate) {
        summary.status = "aborted";
        summary.message = `Failure rate ${summary.failureRate.toFixed(2)} exceeds ${String(this.options.maxFailureRate)}`;
        return summary;
      }

      const merged = mergeSources({
        metadata: metadata?.records ?? baseline.metadata,
        timeseries: timeseries?.records ?? baseline.timeseries,
        pricing: pricing?.records ?? baseline.pricing,
      });
      const deduped = dedupeFacts(merged.entities.facts);
      summary.merge = merged.stats;
      summary.dedupe = {
        dropped: deduped.dropped,
        collisions: deduped.collisions,
      };

      if (merged.entities.games.length === 0) {
        summary.status = "failed";
        summary.message = "No games to load";
        return summary;
      }

      if (signal.aborted) {
        throw toCancelledError(signal);
      }

      // Loading is not interrupted once started
      summary.load = await this.loader.load({
        ...merged.entities,
        facts: deduped.facts,
      });

      summary.status =
        sourceFailureCount(summary) + loadFailureCount(summary) > 0
          ? "partial"
          : "succeeded";
      return summary;
    } catch (error) {
      if (error instanceof CancelledError) {
        summary.status = "cancelled";
        summary.message = error.message;
        summary.merge = null;
        summary.dedupe = null;
        summary.load = null;
        return summary;
      }
      summary.status = "failed";
      summary.message = errorMessage(error);
      pipelineLogger.error({ error }, "Pipeline run failed");
      return summary;
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
      if (!signal.aborted) {
        controller.abort(new CancelledError("Run finished"));
      }

      const finishedAt = new Date();
      summary.finishedAt = finishedAt.toISOString();
      summary.durationMs = finishedAt.getTime() - startedAt.getTime();
      await this.report(summary);
    }
  }

  /**
   * Resolve the target keys and fetch every selected source. With explicit
   * keys all sources run at once; with discovery, metadata goes first.
   */
  private async acquireAll(
    request: RunRequest,
    fetchSources: readonly SourceName[],
    signal: AbortSignal
  ): Promise<{ targets: number[]; results: Acquired }> {
    const results: Acquired = { metadata: null, timeseries: null, pricing: null };
    const fetches = (name: SourceName): boolean => fetchSources.includes(name);

    let targets: number[];
    if (request.appids !== undefined) {
      targets = [...new Set(request.appids)];
    } else if (fetches("metadata") && this.sources.metadata.canDiscover) {
      results.metadata = await this.sources.metadata.acquire("all", {
        signal,
        discoveryLimit: request.discoveryLimit,
      });
      targets = results.metadata.succeeded;
    } else {
      const known = await this.store.knownAppIds();
      targets =
        request.discoveryLimit !== undefined
          ? known.slice(0, request.discoveryLimit)
          : known;
    }

    const pending: Promise<void>[] = [];
    if (fetches("metadata") && results.metadata === null) {
      pending.push(
        this.acquireInto(this.sources.metadata, targets, signal, (r) => {
          results.metadata = r;
        })
      );
    }
    if (fetches("timeseries")) {
      pending.push(
        this.acquireInto(this.sources.timeseries, targets, signal, (r) => {
          results.timeseries = r;
        })
      );
    }
    if (fetches("pricing")) {
      pending.push(
        this.acquireInto(this.sources.pricing, targets, signal, (r) => {
          results.pricing = r;
        })
      );
    }

    // Join barrier: merge starts only after every source has finished
    await Promise.all(pending);
    return { targets, results };
  }

  private async acquireInto<T>(
    source: RecordSource<T>,
    targets: readonly number[],
    signal: AbortSignal,
    assign: (result: AcquireResult<T>) => void
  ): Promise<void> {
    assign(await source.acquire(targets, { signal }));
  }

  private async loadBaseline(
    fetchSources: readonly SourceName[],
    targets: readonly number[]
  ): Promise<StoreBaseline> {
    const fetchesAll = SOURCE_NAMES.every((name) => fetchSources.includes(name));
    if (fetchesAll || targets.length === 0) {
      return { metadata: [], timeseries: [], pricing: [] };
    }
    const baseline = await this.store.loadBaseline(targets);
    pipelineLogger.debug(
      {
        metadata: baseline.metadata.length,
        timeseries: baseline.timeseries.length,
        pricing: baseline.pricing.length,
      },
      "Loaded stored baseline for sources not fetched"
    );
    return baseline;
  }

  private async report(summary: RunSummary): Promise<void> {
    for (const reporter of this.reporters) {
      try {
        await reporter.report(summary);
      } catch (error) {
        pipelineLogger.error(
          { error: errorMessage(error), status: summary.status },
          "Run reporter failed"
        );
      }
    }
  }
}
