import { RateGovernor, type Clock } from "../rate-governor.js";
import {
  SourceClient,
  type AcquireOptions,
  type AcquireResult,
  type AcquireTarget,
} from "../client.js";
import { SteamChartsAdapter, STEAMCHARTS_ENDPOINT } from "./steamcharts.js";
import { SteamSpyAdapter, STEAMSPY_ENDPOINTS } from "./steamspy.js";
import { SteamStoreAdapter, STEAM_STORE_ENDPOINT } from "./steam-store.js";

import type { FetchLike } from "../session.js";
import type { LoaderConfig } from "../../config.js";
import type { SourceRecordMap } from "../../types/index.js";

export {
  SteamChartsAdapter,
  parseChartTable,
  type ChartRow,
} from "./steamcharts.js";
export { SteamSpyAdapter } from "./steamspy.js";
export { SteamStoreAdapter } from "./steam-store.js";

/**
 * What the orchestrator needs from a source, independent of its payload type.
 */
export interface RecordSource<TRecord> {
  readonly source: string;
  readonly provider: string;
  readonly canDiscover: boolean;
  acquire(
    target: AcquireTarget,
    options?: AcquireOptions
  ): Promise<AcquireResult<TRecord>>;
}

export type SourceSet = {
  [K in keyof SourceRecordMap]: RecordSource<SourceRecordMap[K]>;
};

export interface SourceDependencies {
  clock?: Clock;
  fetch?: FetchLike;
}

/**
 * Build the three source clients, each with its own governor and session.
 */
export function createSources(
  config: LoaderConfig,
  deps: SourceDependencies = {}
): SourceSet {
  const { sources, intervals, retry } = config;
  const shared = {
    userAgent: sources.userAgent,
    timeoutMs: sources.requestTimeoutMs,
    retry,
    clock: deps.clock,
    fetch: deps.fetch,
  };

  return {
    metadata: new SourceClient(new SteamSpyAdapter(sources.steamSpyUrl), {
      ...shared,
      governor: new RateGovernor({
        name: "steamspy",
        maxConcurrent: 1,
        defaultIntervalMs: intervals.steamSpyDetail,
        endpointIntervalsMs: {
          [STEAMSPY_ENDPOINTS.all]: intervals.steamSpyAll,
          [STEAMSPY_ENDPOINTS.appdetails]: intervals.steamSpyDetail,
        },
        clock: deps.clock,
      }),
    }),
    timeseries: new SourceClient(
      new SteamChartsAdapter(sources.steamChartsUrl),
      {
        ...shared,
        governor: new RateGovernor({
          name: "steamcharts",
          maxConcurrent: 1,
          defaultIntervalMs: intervals.steamCharts,
          endpointIntervalsMs: { [STEAMCHARTS_ENDPOINT]: intervals.steamCharts },
          clock: deps.clock,
        }),
      }
    ),
    pricing: new SourceClient(
      new SteamStoreAdapter(sources.steamStoreUrl, sources.storeCountryCode),
      {
        ...shared,
        governor: new RateGovernor({
          name: "steam-store",
          maxConcurrent: 1,
          defaultIntervalMs: intervals.steamStore,
          endpointIntervalsMs: { [STEAM_STORE_ENDPOINT]: intervals.steamStore },
          clock: deps.clock,
        }),
      }
    ),
  };
}
