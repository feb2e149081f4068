#!/usr/bin/env node

/**
 * Steam Analytics Loader CLI
 *
 * Loads SteamSpy, SteamCharts and Steam Store data into a PostgreSQL star schema.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerFactsCommand } from "./commands/facts.js";
import { registerRunsCommand } from "./commands/runs.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("steam-loader")
  .description("Steam games ingest, merge and warehouse loader CLI")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerSyncCommand(program);
registerRunsCommand(program);
registerFactsCommand(program);

program.action(() => {
  program.outputHelp();
});

program.parse();
