import ora from "ora";

import { db, closeConnection } from "../../db/connection.js";
import { RunRepository } from "../../db/runs.js";
import { errorMessage } from "../../errors.js";
import { displayRunsTable } from "../utils/display.js";
import { parsePositiveInt } from "../utils/options.js";

import type { Command } from "commander";

export function registerRunsCommand(program: Command): void {
  const runs = program.command("runs").description("Pipeline run history");

  runs
    .command("list")
    .description("Show the most recent runs")
    .option("-l, --limit <n>", "Number of runs", parsePositiveInt, 20)
    .action(async (options: { limit: number }) => {
      const spinner = ora("Loading run history...").start();

      try {
        const rows = await new RunRepository(db).list(options.limit);
        spinner.stop();

        if (rows.length === 0) {
          console.log("No runs recorded yet");
          return;
        }
        displayRunsTable(rows);
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
