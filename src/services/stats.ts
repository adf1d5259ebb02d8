/**
 * Dashboard counts, cached in the bookkeeping cache.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ENTITY_KINDS } from "../types/index.js";
import { EntityStore } from "./sync/store.js";

import type { Cache } from "../cache/types.js";
import type { Database } from "../db/schema.js";
import type { Kysely } from "kysely";

export const DASHBOARD_STATS_KEY = "dashboard_stats";

export const DashboardStatsSchema = Type.Object({
  provincias: Type.Integer(),
  parques: Type.Integer(),
  sitios: Type.Integer(),
  plazas: Type.Integer(),
  total: Type.Integer(),
  generatedAt: Type.String(),
});

export type DashboardStats = Static<typeof DashboardStatsSchema>;

export class StatsService {
  constructor(
    private db: Kysely<Database>,
    private bookkeeping: Cache,
    private ttlSeconds: number,
    private clock: () => Date = () => new Date()
  ) {}

  async getDashboardStats(): Promise<DashboardStats> {
    const cached = await this.bookkeeping.get(DASHBOARD_STATS_KEY);
    if (Value.Check(DashboardStatsSchema, cached)) {
      return cached;
    }

    const counts = new Map<string, number>();
    for (const kind of ENTITY_KINDS) {
      counts.set(kind, await new EntityStore(this.db, kind).countAll());
    }

    const stats: DashboardStats = {
      provincias: counts.get("provincias") ?? 0,
      parques: counts.get("parques") ?? 0,
      sitios: counts.get("sitios") ?? 0,
      plazas: counts.get("plazas") ?? 0,
      total: [...counts.values()].reduce((sum, count) => sum + count, 0),
      generatedAt: this.clock().toISOString(),
    };

    await this.bookkeeping.set(DASHBOARD_STATS_KEY, stats, this.ttlSeconds);
    return stats;
  }
}
