/**
 * Cleanup pass: removes records that fail the data-quality rules.
 *
 * Runs in one transaction. Rules:
 * - blank names, every kind
 * - provinces whose key is not an official province
 * - parks, sites and plazas outside the Ecuador bounding box
 */

import {
  ECUADOR_BOUNDS,
  OFFICIAL_PROVINCE_IDS,
  type GeoBounds,
} from "../../constants.js";
import { syncLogger } from "../../logger.js";
import { DASHBOARD_STATS_KEY } from "../stats.js";
import { EntityStore, type DeletePredicate } from "./store.js";

import type { Cache } from "../../cache/types.js";
import type { Database } from "../../db/schema.js";
import type { EntityKind } from "../../types/index.js";
import type { Kysely } from "kysely";

const logger = syncLogger.child({ component: "cleanup" });

// ============================================================================
// Types
// ============================================================================

export interface CleanupRule {
  kind: EntityKind;
  predicate: DeletePredicate;
}

export interface CleanupRuleResult {
  kind: EntityKind;
  rule: DeletePredicate["type"];
  removed: number;
}

export interface CleanupReport {
  rules: CleanupRuleResult[];
  total: number;
}

export function cleanupRules(
  provinceIds: readonly string[] = OFFICIAL_PROVINCE_IDS,
  bounds: GeoBounds = ECUADOR_BOUNDS
): CleanupRule[] {
  return [
    { kind: "provincias", predicate: { type: "blank-name" } },
    { kind: "provincias", predicate: { type: "key-not-in", keys: provinceIds } },
    { kind: "parques", predicate: { type: "blank-name" } },
    { kind: "parques", predicate: { type: "outside-bounds", bounds } },
    { kind: "sitios", predicate: { type: "blank-name" } },
    { kind: "sitios", predicate: { type: "outside-bounds", bounds } },
    { kind: "plazas", predicate: { type: "blank-name" } },
    { kind: "plazas", predicate: { type: "outside-bounds", bounds } },
  ];
}

// ============================================================================
// Cleanup Service
// ============================================================================

export class CleanupService {
  constructor(
    private db: Kysely<Database>,
    private bookkeeping: Cache,
    private rules: readonly CleanupRule[] = cleanupRules()
  ) {}

  async run(): Promise<CleanupReport> {
    const results = await this.db.transaction().execute(async (trx) => {
      const applied: CleanupRuleResult[] = [];
      for (const { kind, predicate } of this.rules) {
        const removed = await new EntityStore(trx, kind).deleteWhere(predicate);
        applied.push({ kind, rule: predicate.type, removed });
      }
      return applied;
    });

    const total = results.reduce((sum, result) => sum + result.removed, 0);

    if (total > 0) {
      await this.bookkeeping.delete(DASHBOARD_STATS_KEY);
    }

    logger.info(
      { total, removed: results.filter((result) => result.removed > 0) },
      "Cleanup completed"
    );

    return { rules: results, total };
  }
}
