import { dbLogger } from "../logger.js";
import { systemClock, type Cache, type Clock } from "./types.js";

import type { Database } from "../db/schema.js";
import type { Kysely } from "kysely";

/**
 * Cache backed by the `cache_entries` table, shared across processes.
 *
 * Each instance owns a namespace so the raw-query cache and the sync
 * bookkeeping cache never see each other's keys.
 */
export class DatabaseCache implements Cache {
  constructor(
    private db: Kysely<Database>,
    readonly namespace: string,
    private clock: Clock = systemClock
  ) {}

  async get(key: string): Promise<unknown> {
    const row = await this.db
      .selectFrom("cache_entries")
      .select(["value", "expires_at"])
      .where("namespace", "=", this.namespace)
      .where("key", "=", key)
      .executeTakeFirst();

    if (!row) {
      return undefined;
    }

    if (Date.parse(row.expires_at) <= this.clock()) {
      await this.delete(key);
      return undefined;
    }

    try {
      const value: unknown = JSON.parse(row.value);
      return value;
    } catch (error) {
      dbLogger.warn(
        { namespace: this.namespace, key, error },
        "Discarding unreadable cache entry"
      );
      await this.delete(key);
      return undefined;
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const expiresAt = new Date(this.clock() + ttlSeconds * 1000).toISOString();
    const encoded = JSON.stringify(value);

    await this.db
      .insertInto("cache_entries")
      .values({
        namespace: this.namespace,
        key,
        value: encoded,
        expires_at: expiresAt,
      })
      .onConflict((oc) =>
        oc.columns(["namespace", "key"]).doUpdateSet({
          value: encoded,
          expires_at: expiresAt,
        })
      )
      .execute();
  }

  async delete(key: string): Promise<void> {
    await this.db
      .deleteFrom("cache_entries")
      .where("namespace", "=", this.namespace)
      .where("key", "=", key)
      .execute();
  }
}
