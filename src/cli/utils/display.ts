/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { CleanupReport } from "../../services/sync/cleanup.js";
import type {
  KindStatus,
  SyncRunResult,
  TypeSyncResult,
} from "../../services/sync/orchestrator.js";

function statusLabel(status: TypeSyncResult["status"]): string {
  switch (status) {
    case "synced":
      return chalk.green("synced");
    case "skipped":
      return chalk.gray("skipped");
    case "failed":
      return chalk.red("failed");
  }
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${String(ms)}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * One row per entity kind, followed by the per-kind error lists
 */
export function displaySyncResults(run: SyncRunResult): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Type"),
      chalk.cyan("Status"),
      chalk.cyan("Reason"),
      chalk.cyan("Created"),
      chalk.cyan("Updated"),
      chalk.cyan("Ignored"),
      chalk.cyan("Orphans"),
      chalk.cyan("Errors"),
      chalk.cyan("Time"),
    ],
  });

  for (const result of run.results) {
    table.push([
      result.kind,
      statusLabel(result.status),
      result.reason,
      String(result.created),
      String(result.updated),
      String(result.ignored),
      String(result.orphans),
      result.errors.length > 0
        ? chalk.yellow(String(result.errors.length))
        : "0",
      formatDuration(result.durationMs),
    ]);
  }

  console.log(table.toString());

  for (const result of run.results) {
    if (result.errors.length === 0) {
      continue;
    }
    console.log(chalk.bold(`\n${result.kind} errors:`));
    for (const error of result.errors.slice(0, 10)) {
      console.log(`  ${chalk.yellow("-")} ${error}`);
    }
    if (result.errors.length > 10) {
      console.log(
        chalk.gray(`  ... and ${String(result.errors.length - 10)} more`)
      );
    }
  }
}

export function displayCleanupReport(report: CleanupReport): void {
  const table = new CliTable3({
    head: [chalk.cyan("Type"), chalk.cyan("Rule"), chalk.cyan("Removed")],
  });

  for (const rule of report.rules) {
    table.push([
      rule.kind,
      rule.rule,
      rule.removed > 0 ? chalk.yellow(String(rule.removed)) : "0",
    ]);
  }

  console.log(table.toString());
  console.log(`Total removed: ${chalk.bold(String(report.total))}`);
}

export function displayStatusTable(statuses: KindStatus[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Type"),
      chalk.cyan("Records"),
      chalk.cyan("Last Sync"),
      chalk.cyan("Due"),
      chalk.cyan("Last Run"),
      chalk.cyan("Lock"),
    ],
  });

  for (const status of statuses) {
    const lastRun =
      status.lastRun === null
        ? chalk.gray("never")
        : `${status.lastRun.status} (+${String(status.lastRun.created)}/~${String(status.lastRun.updated)}, ${String(status.lastRun.errorCount)} errors)`;

    table.push([
      status.kind,
      String(status.records),
      status.lastSyncAt ?? chalk.gray("never"),
      status.due ? chalk.yellow(`yes (${status.reason})`) : chalk.green("no"),
      lastRun,
      status.lockedBy ?? chalk.gray("free"),
    ]);
  }

  console.log(table.toString());
}

export function displayTableStats(
  stats: { table_name: string; row_count: number }[]
): void {
  for (const row of stats) {
    console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
  }
}
