/**
 * Sync history: one row per entity-kind sync attempt.
 */

import { randomUUID } from "node:crypto";

import type { TypeSyncResult } from "./orchestrator.js";
import type { Database, SyncHistoryRow } from "../../db/schema.js";
import type { EntityKind } from "../../types/index.js";
import type { Kysely } from "kysely";

export class SyncHistoryService {
  constructor(private db: Kysely<Database>) {}

  async record(
    result: TypeSyncResult,
    startedAt: Date,
    finishedAt: Date
  ): Promise<string> {
    const id = randomUUID();

    await this.db
      .insertInto("sync_history")
      .values({
        id,
        kind: result.kind,
        status: result.status,
        reason: result.reason,
        created: result.created,
        updated: result.updated,
        ignored: result.ignored,
        orphans: result.orphans,
        error_count: result.errors.length,
        errors: JSON.stringify(result.errors),
        started_at: startedAt.toISOString(),
        finished_at: finishedAt.toISOString(),
        duration_ms: result.durationMs,
      })
      .execute();

    return id;
  }

  /**
   * Most recent attempt for a kind, skipped runs excluded.
   */
  async latest(kind: EntityKind): Promise<SyncHistoryRow | null> {
    const row = await this.db
      .selectFrom("sync_history")
      .selectAll()
      .where("kind", "=", kind)
      .where("status", "!=", "skipped")
      .orderBy("started_at", "desc")
      .limit(1)
      .executeTakeFirst();

    return row ?? null;
  }

  async recent(limit = 20): Promise<SyncHistoryRow[]> {
    return await this.db
      .selectFrom("sync_history")
      .selectAll()
      .orderBy("started_at", "desc")
      .limit(limit)
      .execute();
  }
}
