import ora from "ora";

import { db, closeConnection } from "../../db/connection.js";
import { FactReader } from "../../db/facts.js";
import { errorMessage } from "../../errors.js";
import { displayFactsTable } from "../utils/display.js";
import { parseAppIds, parsePeriod } from "../utils/options.js";

import type { Command } from "commander";

interface FactsOptions {
  appids?: number[];
  from?: string;
  to?: string;
}

export function registerFactsCommand(program: Command): void {
  program
    .command("facts")
    .description("Show loaded monthly player and price facts")
    .option("--appids <list>", "Comma-separated appids", parseAppIds)
    .option("--from <month>", "First month (YYYY-MM)", parsePeriod)
    .option("--to <month>", "Last month (YYYY-MM)", parsePeriod)
    .action(async (options: FactsOptions) => {
      const spinner = ora("Reading facts...").start();

      try {
        const rows = await new FactReader(db).readFacts(options);
        spinner.stop();

        if (rows.length === 0) {
          console.log("No facts found matching criteria");
          return;
        }
        displayFactsTable(rows);
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
