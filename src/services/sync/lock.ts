/**
 * Per-kind lease lock in the `sync_locks` table.
 *
 * A lease expires on its own, so a crashed writer cannot block a kind for
 * longer than the TTL.
 */

import { randomUUID } from "node:crypto";
import { hostname } from "node:os";

import { syncLogger } from "../../logger.js";

import type { Database } from "../../db/schema.js";
import type { Kysely } from "kysely";

export interface LockHolder {
  lockedBy: string;
  lockedUntil: Date;
}

export class SyncLock {
  readonly owner: string;

  constructor(
    private db: Kysely<Database>,
    private ttlMs: number,
    owner?: string,
    private clock: () => Date = () => new Date()
  ) {
    this.owner =
      owner ??
      `${hostname()}:${String(process.pid)}:${randomUUID().slice(0, 8)}`;
  }

  /**
   * Take the lease for `name`. False while any live lease exists, including
   * one this owner took earlier: the lease is not re-entrant, so only the
   * call that got true may release it.
   */
  async acquire(name: string): Promise<boolean> {
    const now = this.clock();
    const nowIso = now.toISOString();

    await this.db
      .insertInto("sync_locks")
      .values({ kind: name, locked_by: null, locked_until: null })
      .onConflict((oc) => oc.column("kind").doNothing())
      .execute();

    const result = await this.db
      .updateTable("sync_locks")
      .set({
        locked_by: this.owner,
        locked_until: new Date(now.getTime() + this.ttlMs).toISOString(),
      })
      .where("kind", "=", name)
      .where((eb) =>
        eb.or([
          eb("locked_until", "is", null),
          eb("locked_until", "<=", nowIso),
        ])
      )
      .executeTakeFirst();

    const acquired = result.numUpdatedRows > 0n;
    syncLogger.debug(
      { lock: name, owner: this.owner, acquired },
      "Lock attempt"
    );
    return acquired;
  }

  async release(name: string): Promise<void> {
    await this.db
      .updateTable("sync_locks")
      .set({ locked_by: null, locked_until: null })
      .where("kind", "=", name)
      .where("locked_by", "=", this.owner)
      .execute();
  }

  /**
   * Current live lease, if any.
   */
  async holder(name: string): Promise<LockHolder | null> {
    const row = await this.db
      .selectFrom("sync_locks")
      .select(["locked_by", "locked_until"])
      .where("kind", "=", name)
      .executeTakeFirst();

    if (!row || row.locked_by === null || row.locked_until === null) {
      return null;
    }
    const lockedUntil = new Date(row.locked_until);
    if (lockedUntil.getTime() <= this.clock().getTime()) {
      return null;
    }
    return { lockedBy: row.locked_by, lockedUntil };
  }
}
