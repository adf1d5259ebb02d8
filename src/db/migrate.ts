import { sql, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";
import { TABLE_NAMES } from "./schema.js";

import type { Database } from "./schema.js";

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create the schema. Idempotent; `fresh` drops every table first.
 */
export async function runMigration(
  db: Kysely<Database>,
  options?: { fresh?: boolean }
): Promise<void> {
  if (options?.fresh === true) {
    dbLogger.info("Dropping existing tables (--fresh mode)...");
    for (const table of TABLE_NAMES) {
      await db.schema.dropTable(table).ifExists().execute();
    }
  }

  dbLogger.info("Running schema migration...");

  await db.schema
    .createTable("entities")
    .ifNotExists()
    .addColumn("kind", "text", (col) => col.notNull())
    .addColumn("source_key", "text", (col) => col.notNull())
    .addColumn("name", "text", (col) => col.notNull())
    .addColumn("latitude", "double precision")
    .addColumn("longitude", "double precision")
    .addColumn("details", "text", (col) => col.notNull())
    .addColumn("refreshed_at", "text", (col) => col.notNull())
    .addColumn("created_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("entities_pkey", ["kind", "source_key"])
    .execute();

  await db.schema
    .createIndex("entities_kind_name_idx")
    .ifNotExists()
    .on("entities")
    .columns(["kind", "name"])
    .execute();

  await db.schema
    .createTable("cache_entries")
    .ifNotExists()
    .addColumn("namespace", "text", (col) => col.notNull())
    .addColumn("key", "text", (col) => col.notNull())
    .addColumn("value", "text", (col) => col.notNull())
    .addColumn("expires_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("cache_entries_pkey", ["namespace", "key"])
    .execute();

  await db.schema
    .createTable("sync_locks")
    .ifNotExists()
    .addColumn("kind", "text", (col) => col.primaryKey())
    .addColumn("locked_by", "text")
    .addColumn("locked_until", "text")
    .execute();

  await db.schema
    .createTable("sync_history")
    .ifNotExists()
    .addColumn("id", "text", (col) => col.primaryKey())
    .addColumn("kind", "text", (col) => col.notNull())
    .addColumn("status", "text", (col) => col.notNull())
    .addColumn("reason", "text", (col) => col.notNull())
    .addColumn("created", "integer", (col) => col.notNull())
    .addColumn("updated", "integer", (col) => col.notNull())
    .addColumn("ignored", "integer", (col) => col.notNull())
    .addColumn("orphans", "integer", (col) => col.notNull())
    .addColumn("error_count", "integer", (col) => col.notNull())
    .addColumn("errors", "text", (col) => col.notNull())
    .addColumn("started_at", "text", (col) => col.notNull())
    .addColumn("finished_at", "text", (col) => col.notNull())
    .addColumn("duration_ms", "integer", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("sync_history_kind_started_idx")
    .ifNotExists()
    .on("sync_history")
    .columns(["kind", "started_at"])
    .execute();

  dbLogger.info("Schema migration completed successfully");
}

/**
 * Check whether the entities table exists
 */
export async function hasSchema(db: Kysely<Database>): Promise<boolean> {
  const tables = await db.introspection.getTables();
  return tables.some((table) => table.name === "entities");
}

/**
 * Row counts for every table of the schema
 */
export async function getTableStats(
  db: Kysely<Database>
): Promise<{ table_name: string; row_count: number }[]> {
  const stats: { table_name: string; row_count: number }[] = [];

  for (const table of TABLE_NAMES) {
    const result = await sql<{
      count: number | string | bigint;
    }>`SELECT COUNT(*) AS count FROM ${sql.table(table)}`.execute(db);
    stats.push({
      table_name: table,
      row_count: Number(result.rows[0]?.count ?? 0),
    });
  }

  return stats;
}
