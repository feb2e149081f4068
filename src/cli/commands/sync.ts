import { Option } from "commander";
import ora from "ora";

import { getConfig } from "../../config.js";
import { db, closeConnection } from "../../db/connection.js";
import { RunRepository } from "../../db/runs.js";
import { KyselyDestinationStore } from "../../db/store.js";
import { CancelledError, errorMessage } from "../../errors.js";
import { createPipeline, RUN_TYPES } from "../../services/pipeline/index.js";
import { displayRunSummary } from "../utils/display.js";
import { parseAppIds, parsePositiveInt } from "../utils/options.js";

import type { RunType } from "../../services/pipeline/index.js";
import type { Command } from "commander";

// ============================================================================
// Sync Commands
// ============================================================================

interface SyncRunOptions {
  type: RunType;
  appids?: number[];
  limit?: number;
  timeout?: number;
}

const FAILED_STATUSES = new Set(["failed", "aborted", "cancelled"]);

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Fetch Steam sources, merge them and load the warehouse")
    .addHelpText(
      "after",
      `
RUN TYPES:
══════════════════════════════════════════════════════════════════════════════
  full        SteamSpy + SteamCharts + Steam Store
  metadata    SteamSpy only (owners, tags, genres, reviews)
  timeseries  SteamCharts only (monthly player counts)
  pricing     Steam Store only (current price and discount)

Partial runs fill the sources they do not fetch from what is already stored.
Without --appids, metadata runs discover games from SteamSpy; the others
use the games already in dim_game.

EXAMPLES:
──────────────────────────────────────────────────────────────────────────────
  steam-loader sync run --type full --limit 50
  steam-loader sync run --type pricing --appids 730,570
`
    );

  // sync run
  sync
    .command("run")
    .description("Run one ingest → merge → load pass")
    .addOption(
      new Option("-t, --type <type>", "Run type")
        .choices(RUN_TYPES)
        .default("full")
    )
    .option("--appids <list>", "Comma-separated appids to process", parseAppIds)
    .option("--limit <n>", "Cap on discovered games", parsePositiveInt)
    .option("--timeout <ms>", "Run timeout in milliseconds", parsePositiveInt)
    .action(async (options: SyncRunOptions) => {
      const controller = new AbortController();
      const onInterrupt = (): void => {
        controller.abort(new CancelledError("Interrupted by user"));
      };
      process.once("SIGINT", onInterrupt);

      const spinner = ora(`Running ${options.type} pipeline...`).start();

      try {
        const pipeline = createPipeline(getConfig(), {
          store: new KyselyDestinationStore(db),
          reporters: [new RunRepository(db)],
        });

        const summary = await pipeline.run({
          runType: options.type,
          appids: options.appids,
          discoveryLimit: options.limit,
          timeoutMs: options.timeout,
          signal: controller.signal,
        });

        if (FAILED_STATUSES.has(summary.status)) {
          spinner.fail(`Run ${summary.status}`);
          process.exitCode = 1;
        } else {
          spinner.succeed(`Run ${summary.status}`);
        }

        displayRunSummary(summary);
      } catch (error) {
        spinner.fail(`Run failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        process.removeListener("SIGINT", onInterrupt);
        await closeConnection();
      }
    });
}
