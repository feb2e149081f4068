import { pipelineLogger } from "../../logger.js";

import type { RunReporter, RunSummary } from "./orchestrator.js";
import type { Logger } from "pino";

/**
 * Total failed rows across the load tables.
 */
export function loadFailureCount(summary: RunSummary): number {
  const load = summary.load;
  if (load === null) {
    return 0;
  }
  return (
    load.genres.failed +
    load.tags.failed +
    load.games.failed +
    load.facts.failed +
    load.gameTags.failed +
    load.gameGenres.failed
  );
}

export function sourceFailureCount(summary: RunSummary): number {
  const { metadata, timeseries, pricing } = summary.sources;
  return (
    metadata.failures.length +
    timeseries.failures.length +
    pricing.failures.length
  );
}

/**
 * Writes the run summary to the pipeline logger. Failed keys are logged at
 * warn level, one line per source.
 */
export class LogRunReporter implements RunReporter {
  constructor(private readonly log: Logger = pipelineLogger) {}

  report(summary: RunSummary): Promise<void> {
    for (const [source, stats] of Object.entries(summary.sources)) {
      if (stats.failures.length > 0) {
        this.log.warn(
          {
            source,
            provider: stats.provider,
            failed: stats.failures.map((f) => f.appid),
          },
          "Source failures"
        );
      }
    }

    const fields = {
      runType: summary.runType,
      status: summary.status,
      durationMs: summary.durationMs,
      targets: summary.targets,
      failureRate: summary.failureRate,
      sourceFailures: sourceFailureCount(summary),
      loadFailures: loadFailureCount(summary),
      merge: summary.merge,
      dedupe: summary.dedupe,
      message: summary.message,
    };

    if (summary.status === "succeeded" || summary.status === "partial") {
      this.log.info(fields, "Pipeline run finished");
    } else {
      this.log.error(fields, "Pipeline run did not load");
    }
    return Promise.resolve();
  }
}
