import chalk from "chalk";
import ora from "ora";

import { loadConfig } from "../../config.js";
import { closeConnection, getDb } from "../../db/connection.js";
import { hasSchema } from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";
import { createSyncServices } from "../../services/sync/index.js";
import { ENTITY_KINDS, isEntityKind } from "../../types/index.js";
import {
  displayCleanupReport,
  displayStatusTable,
  displaySyncResults,
} from "../utils/display.js";

import type { EntityKind } from "../../types/index.js";
import type { Command } from "commander";

// ============================================================================
// Sync Commands
// ============================================================================

interface SyncOptions {
  cleanOnly?: boolean;
  force?: boolean;
}

function parseKinds(type: string): EntityKind[] | null {
  if (type === "all") {
    return [...ENTITY_KINDS];
  }
  return isEntityKind(type) ? [type] : null;
}

/**
 * Print per-kind sync status; shared by `sync status` and `status`
 */
export async function showSyncStatus(): Promise<void> {
  const spinner = ora("Reading sync status...").start();

  try {
    const db = getDb();
    if (!(await hasSchema(db))) {
      spinner.fail("Schema not initialized (run 'db migrate')");
      process.exitCode = 1;
      return;
    }

    const { orchestrator } = createSyncServices(db, loadConfig());
    const statuses = await orchestrator.getStatus();
    spinner.stop();
    displayStatusTable(statuses);
  } catch (error) {
    spinner.fail(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Synchronize provinces, parks, heritage sites and plazas")
    .argument("[type]", `${ENTITY_KINDS.join("|")}|all`, "all")
    .option("--clean-only", "Skip fetching, only run the cleanup pass")
    .option("--force", "Ignore staleness and refetch every facet")
    .addHelpText(
      "after",
      `
Each type is fetched from Wikidata (primary) and DBpedia (enrichment), merged,
written in one transaction, then the cleanup pass removes records without a
name, provinces outside the official list and places outside Ecuador.

Examples:
  ecuador-sync sync                 # every stale type
  ecuador-sync sync sitios --force  # refetch heritage sites
  ecuador-sync sync --clean-only    # cleanup pass only
`
    )
    .action(async (type: string, options: SyncOptions) => {
      const kinds = parseKinds(type);
      if (kinds === null) {
        console.error(
          chalk.red(
            `Unknown type '${type}'. Expected one of: ${ENTITY_KINDS.join(", ")}, all`
          )
        );
        process.exitCode = 1;
        return;
      }

      const spinner = ora("Preparing sync...").start();

      try {
        const db = getDb();
        if (!(await hasSchema(db))) {
          spinner.fail("Schema not initialized (run 'db migrate')");
          process.exitCode = 1;
          return;
        }

        const { orchestrator, cleanup } = createSyncServices(db, loadConfig());

        if (options.cleanOnly !== true) {
          orchestrator.setProgressCallback((progress) => {
            spinner.text = `${progress.kind} ${progress.phase}: ${String(progress.current)}/${String(progress.total)}${progress.currentItem !== undefined ? ` (${progress.currentItem})` : ""}`;
          });

          spinner.text = `Syncing ${kinds.join(", ")}...`;
          const run = await orchestrator.syncAll({
            force: options.force === true,
            kinds,
          });

          if (run.failed.length > 0) {
            spinner.warn(
              `Sync finished with failures: ${run.failed.join(", ")}`
            );
            process.exitCode = 1;
          } else {
            spinner.succeed(
              `Sync finished: ${String(run.created)} created, ${String(run.updated)} updated`
            );
          }
          displaySyncResults(run);
        }

        const cleanupSpinner = ora("Running cleanup...").start();
        const report = await cleanup.run();
        cleanupSpinner.succeed(
          `Cleanup removed ${String(report.total)} records`
        );
        displayCleanupReport(report);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync status
  sync
    .command("status")
    .description("Show record counts, last sync and staleness per type")
    .action(showSyncStatus);
}
