/**
 * Pipeline wiring: sources, store, loader, orchestrator and reporters.
 */

import { createSources, type SourceDependencies } from "../../scraper/sources/index.js";
import { Loader } from "./loader.js";
import { PipelineOrchestrator, type RunReporter } from "./orchestrator.js";
import { LogRunReporter } from "./reporters.js";

import type { DestinationStore } from "./store.js";
import type { LoaderConfig } from "../../config.js";

export { dedupeFacts } from "./dedupe.js";
export { Loader, type LoadStats, type TableLoadStats } from "./loader.js";
export { mergeSources } from "./merge.js";
export {
  PipelineOrchestrator,
  RUN_TYPES,
  type RunReporter,
  type RunRequest,
  type RunStatus,
  type RunSummary,
  type RunType,
} from "./orchestrator.js";
export { LogRunReporter } from "./reporters.js";
export type { DestinationStore, StoreBaseline, WriteOutcomes } from "./store.js";

export interface PipelineDependencies extends SourceDependencies {
  store: DestinationStore;
  /** Reporters in addition to the log reporter */
  reporters?: RunReporter[];
}

export function createPipeline(
  config: LoaderConfig,
  deps: PipelineDependencies
): PipelineOrchestrator {
  const sources = createSources(config, { clock: deps.clock, fetch: deps.fetch });
  const loader = new Loader(deps.store, {
    batchSize: config.pipeline.loadBatchSize,
  });
  return new PipelineOrchestrator(
    sources,
    deps.store,
    loader,
    [new LogRunReporter(), ...(deps.reporters ?? [])],
    {
      maxFailureRate: config.pipeline.maxFailureRate,
      runTimeoutMs: config.pipeline.runTimeoutMs,
    }
  );
}
