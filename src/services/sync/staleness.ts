/**
 * Staleness check: decides whether an entity kind needs a refresh.
 *
 * Reasons are evaluated in a fixed order and the first match is reported:
 * forced, empty-store, never-synced, expired. Otherwise the kind is fresh.
 */

import { EntityStore } from "./store.js";

import type { Cache } from "../../cache/types.js";
import type { Database } from "../../db/schema.js";
import type { EntityKind } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export type StalenessReason =
  | "forced"
  | "empty-store"
  | "never-synced"
  | "expired"
  | "fresh";

export interface StalenessVerdict {
  due: boolean;
  reason: StalenessReason;
  recordCount: number;
  lastSyncAt: Date | null;
}

export function lastSyncKey(kind: EntityKind): string {
  return `last_sync:${kind}`;
}

// ============================================================================
// Staleness Checker
// ============================================================================

export class StalenessChecker {
  constructor(
    private db: Kysely<Database>,
    private bookkeeping: Cache,
    private intervalMs: number,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Side-effect free; safe to call repeatedly.
   */
  async check(
    kind: EntityKind,
    options: { force?: boolean } = {}
  ): Promise<StalenessVerdict> {
    const recordCount = await new EntityStore(this.db, kind).countAll();
    const lastSyncAt = await this.lastSync(kind);

    const reason = this.reasonFor(
      options.force === true,
      recordCount,
      lastSyncAt
    );

    return { due: reason !== "fresh", reason, recordCount, lastSyncAt };
  }

  async lastSync(kind: EntityKind): Promise<Date | null> {
    const value = await this.bookkeeping.get(lastSyncKey(kind));
    if (typeof value !== "string") {
      return null;
    }
    const time = Date.parse(value);
    return Number.isNaN(time) ? null : new Date(time);
  }

  async markSynced(kind: EntityKind, at: Date, ttlSeconds: number): Promise<void> {
    await this.bookkeeping.set(lastSyncKey(kind), at.toISOString(), ttlSeconds);
  }

  private reasonFor(
    force: boolean,
    recordCount: number,
    lastSyncAt: Date | null
  ): StalenessReason {
    if (force) {
      return "forced";
    }
    if (recordCount === 0) {
      return "empty-store";
    }
    if (lastSyncAt === null) {
      return "never-synced";
    }
    const elapsed = this.clock().getTime() - lastSyncAt.getTime();
    return elapsed > this.intervalMs ? "expired" : "fresh";
  }
}
