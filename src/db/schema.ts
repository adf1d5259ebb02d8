/**
 * Kysely table definitions.
 *
 * Timestamps are ISO-8601 strings and entity details are JSON text so the
 * same schema runs on PostgreSQL and SQLite.
 */

import type { EntityKind } from "../types/index.js";
import type { Insertable, Selectable } from "kysely";

// ============================================================================
// Entities
// ============================================================================

export interface EntitiesTable {
  kind: EntityKind;
  source_key: string;
  name: string;
  latitude: number | null;
  longitude: number | null;
  /** JSON-encoded kind-specific details */
  details: string;
  refreshed_at: string;
  created_at: string;
}

// ============================================================================
// Support tables
// ============================================================================

export interface CacheEntriesTable {
  namespace: string;
  key: string;
  /** JSON-encoded value */
  value: string;
  expires_at: string;
}

export interface SyncLocksTable {
  kind: string;
  locked_by: string | null;
  locked_until: string | null;
}

export interface SyncHistoryTable {
  id: string;
  kind: EntityKind;
  status: string;
  reason: string;
  created: number;
  updated: number;
  ignored: number;
  orphans: number;
  error_count: number;
  /** JSON-encoded list of error messages */
  errors: string;
  started_at: string;
  finished_at: string;
  duration_ms: number;
}

export interface Database {
  entities: EntitiesTable;
  cache_entries: CacheEntriesTable;
  sync_locks: SyncLocksTable;
  sync_history: SyncHistoryTable;
}

export type EntityRow = Selectable<EntitiesTable>;
export type NewEntityRow = Insertable<EntitiesTable>;
export type SyncHistoryRow = Selectable<SyncHistoryTable>;

export const TABLE_NAMES = [
  "entities",
  "cache_entries",
  "sync_locks",
  "sync_history",
] as const satisfies readonly (keyof Database)[];
