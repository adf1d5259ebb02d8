import ora, { type Ora } from "ora";

import { loadConfig } from "../../config.js";
import {
  checkConnection,
  closeConnection,
  describeDatabase,
  getDb,
} from "../../db/connection.js";
import { getTableStats, hasSchema, runMigration } from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";
import { displayTableStats } from "../utils/display.js";

import type { Database } from "../../db/schema.js";
import type { Command } from "commander";
import type { Kysely } from "kysely";

/**
 * Run one database action behind a spinner; failures set the exit code and
 * the connection is always closed.
 */
async function withDatabase(
  startText: string,
  failurePrefix: string,
  action: (db: Kysely<Database>, spinner: Ora) => Promise<void>
): Promise<void> {
  const spinner = ora(startText).start();
  try {
    await action(getDb(), spinner);
  } catch (error) {
    spinner.fail(`${failurePrefix}: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program
    .command("db")
    .description("Manage the record store schema");

  db.command("migrate")
    .description("Create the entity, cache, lock and history tables")
    .option("--fresh", "Drop every table first (destroys synced records)")
    .action((options: { fresh?: boolean }) =>
      withDatabase("Creating tables...", "Migration failed", async (connection, spinner) => {
        const fresh = options.fresh === true;
        if (fresh) {
          spinner.text = "Dropping tables and recreating them...";
        }
        await runMigration(connection, { fresh });
        spinner.succeed(fresh ? "Schema recreated" : "Schema is up to date");

        console.log("\nTables:");
        displayTableStats(await getTableStats(connection));
      })
    );

  db.command("status")
    .description("Show where the store lives and how many rows each table holds")
    .action(() =>
      withDatabase("Connecting...", "Status failed", async (connection, spinner) => {
        const location = describeDatabase(loadConfig().database);

        if (!(await checkConnection(connection))) {
          spinner.fail(`Cannot reach ${location}`);
          process.exitCode = 1;
          return;
        }
        spinner.succeed(`Connected to ${location}`);

        if (await hasSchema(connection)) {
          console.log("\nTables:");
          displayTableStats(await getTableStats(connection));
        } else {
          console.log("\nNo schema yet; run 'db migrate'");
        }
      })
    );

  db.command("reset")
    .description("Drop and recreate every table")
    .action(() =>
      withDatabase("Resetting...", "Reset failed", async (connection, spinner) => {
        await runMigration(connection, { fresh: true });
        spinner.succeed("Record store reset; every kind will sync on the next run");
      })
    );
}
