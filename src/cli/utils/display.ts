/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { FactReadRow } from "../../db/facts.js";
import type { PipelineRun } from "../../db/types.js";
import type { TableLoadStats } from "../../services/pipeline/loader.js";
import type {
  RunStatus,
  RunSummary,
} from "../../services/pipeline/orchestrator.js";

function colorStatus(status: RunStatus | "running"): string {
  switch (status) {
    case "succeeded":
      return chalk.green(status);
    case "partial":
      return chalk.yellow(status);
    case "running":
      return chalk.cyan(status);
    default:
      return chalk.red(status);
  }
}

function formatValue(value: number | null, digits = 0): string {
  return value === null ? chalk.gray("-") : value.toFixed(digits);
}

/**
 * Display one run summary: sources, merge output and per-table load stats
 */
export function displayRunSummary(summary: RunSummary): void {
  console.log(
    chalk.bold(`\nRun ${summary.runType}: `) +
      colorStatus(summary.status) +
      chalk.gray(` (${String(Math.round(summary.durationMs / 1000))}s)`)
  );
  if (summary.message !== undefined) {
    console.log(`  ${summary.message}`);
  }

  const sources = new CliTable3({
    head: ["Source", "Provider", "Fetched", "Requested", "OK", "Records", "Failed"].map(
      (h) => chalk.cyan(h)
    ),
  });
  for (const [name, stats] of Object.entries(summary.sources)) {
    sources.push([
      name,
      stats.provider,
      stats.fetched ? "yes" : chalk.gray("baseline"),
      String(stats.requested),
      String(stats.succeeded),
      String(stats.records),
      stats.failures.length > 0
        ? chalk.red(String(stats.failures.length))
        : "0",
    ]);
  }
  console.log(sources.toString());

  if (summary.merge !== null) {
    const { merge } = summary;
    console.log(
      `  Merged: ${String(merge.games)} games, ${String(merge.facts)} facts, ` +
        `${String(merge.tags)} tags, ${String(merge.genres)} genres` +
        (merge.excludedAppIds.length > 0
          ? chalk.gray(` (${String(merge.excludedAppIds.length)} excluded)`)
          : "")
    );
  }

  if (summary.load !== null) {
    const load = new CliTable3({
      head: ["Table", "Inserted", "Updated", "Unchanged", "Failed"].map((h) =>
        chalk.cyan(h)
      ),
    });
    const tables: [string, TableLoadStats][] = [
      ["dim_genre", summary.load.genres],
      ["dim_tag", summary.load.tags],
      ["dim_game", summary.load.games],
      ["fact_player_price", summary.load.facts],
      ["bridge_game_tag", summary.load.gameTags],
      ["bridge_game_genre", summary.load.gameGenres],
    ];
    for (const [name, stats] of tables) {
      load.push([
        name,
        String(stats.inserted),
        String(stats.updated),
        String(stats.unchanged),
        stats.failed > 0 ? chalk.red(String(stats.failed)) : "0",
      ]);
    }
    console.log(load.toString());

    if (summary.load.periods.missing.length > 0) {
      console.log(
        chalk.yellow(
          `  Missing calendar periods: ${summary.load.periods.missing.join(", ")} (run 'db seed-calendar')`
        )
      );
    }
  }
}

/**
 * Display run history
 */
export function displayRunsTable(runs: PipelineRun[]): void {
  const table = new CliTable3({
    head: ["#", "Type", "Status", "Started", "Targets", "Games", "Facts", "Failures"].map(
      (h) => chalk.cyan(h)
    ),
  });

  for (const run of runs) {
    table.push([
      String(run.run_id),
      run.run_type,
      colorStatus(run.status),
      run.started_at.toISOString().replace("T", " ").slice(0, 19),
      formatValue(run.requested_appids),
      formatValue(run.games_loaded),
      formatValue(run.facts_loaded),
      formatValue(run.failures),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display fact rows
 */
export function displayFactsTable(rows: FactReadRow[]): void {
  const table = new CliTable3({
    head: ["AppID", "Name", "Month", "Avg", "Peak", "Gain %", "Price", "Disc %", "Sale"].map(
      (h) => chalk.cyan(h)
    ),
  });

  for (const row of rows) {
    const name = row.name.length > 30 ? row.name.slice(0, 27) + "..." : row.name;
    table.push([
      String(row.appid),
      name,
      row.period,
      formatValue(row.avgPlayers),
      formatValue(row.peakPlayers),
      formatValue(row.gainPct, 2),
      formatValue(row.currentPrice, 2),
      row.isDiscountActive ? chalk.green(formatValue(row.discountPct)) : formatValue(row.discountPct),
      row.saleName ?? "",
    ]);
  }

  console.log(table.toString());
}
