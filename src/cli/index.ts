#!/usr/bin/env node

/**
 * Ecuador Linked Data Loader CLI
 *
 * Keeps the local record store of Ecuadorian provinces, parks, heritage sites
 * and plazas in step with Wikidata and DBpedia.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerSyncCommand, showSyncStatus } from "./commands/sync.js";

const program = new Command();

program
  .name("ecuador-sync")
  .description("Ecuador linked-data loader CLI")
  .version("0.1.0");

registerDbCommand(program);
registerSyncCommand(program);

// Top-level alias for 'sync status'
program
  .command("status")
  .description("Show sync status (alias for 'sync status')")
  .action(showSyncStatus);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
