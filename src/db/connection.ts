import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, sql } from "kysely";
import pg from "pg";

import { loadConfig } from "../config.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./schema.js";

const { Pool } = pg;

// ============================================================================
// Configuration
// ============================================================================

export interface DatabaseOptions {
  /** PostgreSQL connection string; when absent SQLite is used */
  url?: string;
  /** SQLite file path */
  path: string;
}

export function isPostgresUrl(url: string | undefined): url is string {
  return url !== undefined && /^postgres(ql)?:\/\//.test(url);
}

// ============================================================================
// Factory
// ============================================================================

export function createDatabase(options: DatabaseOptions): Kysely<Database> {
  if (isPostgresUrl(options.url)) {
    const pool = new Pool({
      connectionString: options.url,
      max: 10,
      idleTimeoutMillis: 30_000, // Close idle connections after 30s
      connectionTimeoutMillis: 5000,
    });

    dbLogger.debug({ url: describeDatabase(options) }, "Using PostgreSQL");
    return new Kysely<Database>({ dialect: new PostgresDialect({ pool }) });
  }

  const dataDir = dirname(options.path);
  if (options.path !== ":memory:" && !existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }

  dbLogger.debug({ path: options.path }, "Using SQLite");
  return new Kysely<Database>({
    dialect: new SqliteDialect({ database: new SQLite(options.path) }),
  });
}

// ============================================================================
// Process-wide instance
// ============================================================================

let instance: Kysely<Database> | undefined;

export function getDb(): Kysely<Database> {
  instance ??= createDatabase(loadConfig().database);
  return instance;
}

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(db: Kysely<Database>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the process-wide connection, if one was opened
 */
export async function closeConnection(): Promise<void> {
  if (instance === undefined) {
    return;
  }
  try {
    await instance.destroy();
    instance = undefined;
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Database location for display, with any password masked
 */
export function describeDatabase(options: DatabaseOptions): string {
  if (!isPostgresUrl(options.url)) {
    return `sqlite:${options.path}`;
  }
  const url = new URL(options.url);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}
