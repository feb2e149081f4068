import { jsonb } from "./connection.js";
import { dbLogger } from "../logger.js";
import {
  loadFailureCount,
  sourceFailureCount,
} from "../services/pipeline/reporters.js";

import type { Database, PipelineRun } from "./types.js";
import type {
  RunReporter,
  RunSummary,
} from "../services/pipeline/orchestrator.js";
import type { TableLoadStats } from "../services/pipeline/loader.js";
import type { Kysely } from "kysely";

/**
 * Run history in pipeline_runs, one row per finished run.
 */
export class RunRepository implements RunReporter {
  constructor(private readonly db: Kysely<Database>) {}

  async report(summary: RunSummary): Promise<void> {
    const load = summary.load;
    const written = (table: TableLoadStats): number =>
      table.inserted + table.updated + table.unchanged;

    const row = await this.db
      .insertInto("pipeline_runs")
      .values({
        run_type: summary.runType,
        status: summary.status,
        started_at: summary.startedAt,
        finished_at: summary.finishedAt,
        requested_appids: summary.targets,
        games_loaded: load !== null ? written(load.games) : null,
        facts_loaded: load !== null ? written(load.facts) : null,
        failures: sourceFailureCount(summary) + loadFailureCount(summary),
        summary: jsonb(summary),
      })
      .returning("run_id")
      .executeTakeFirstOrThrow();

    dbLogger.debug(
      { runId: row.run_id, status: summary.status },
      "Run recorded"
    );
  }

  async list(limit = 20): Promise<PipelineRun[]> {
    return this.db
      .selectFrom("pipeline_runs")
      .selectAll()
      .orderBy("started_at", "desc")
      .limit(limit)
      .execute();
  }
}
