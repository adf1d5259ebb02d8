import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { MemoryCache } from "../../../../src/cache/memory.js";
import {
  CleanupService,
  cleanupRules,
} from "../../../../src/services/sync/cleanup.js";
import { EntityStore } from "../../../../src/services/sync/store.js";
import { DASHBOARD_STATS_KEY } from "../../../../src/services/stats.js";
import { createTestDb } from "../../../helpers/db.js";
import {
  parkRecord,
  plazaRecord,
  provinceRecord,
} from "../../../helpers/records.js";

import type { Database } from "../../../../src/db/schema.js";
import type { EntityKind } from "../../../../src/types/index.js";
import type { Kysely } from "kysely";

describe("services/sync/cleanup", () => {
  let db: Kysely<Database>;
  let bookkeeping: MemoryCache;

  const keysOf = async (kind: EntityKind) =>
    (
      await db
        .selectFrom("entities")
        .select("source_key")
        .where("kind", "=", kind)
        .orderBy("name")
        .execute()
    ).map((row) => row.source_key);

  beforeEach(async () => {
    db = await createTestDb();
    bookkeeping = new MemoryCache();

    await new EntityStore(db, "provincias").insertMany([
      provinceRecord("Q220451", "Pichincha"),
      provinceRecord("Q261165", "   "),
      provinceRecord("Q999999", "Provincia de prueba"),
    ]);
    await new EntityStore(db, "parques").insertMany([
      parkRecord("Q1", "Parque Nacional Cotopaxi", { lat: -0.68, lon: -78.44 }),
      parkRecord("Q2", "Parque lejano", { lat: 10, lon: -78 }),
      parkRecord("Q3", "Parque sin coordenadas"),
      parkRecord("Q4", "Parque en el borde", { lat: 2, lon: -75 }),
    ]);
    await new EntityStore(db, "plazas").insertMany([
      plazaRecord("Q10", "Plaza Grande", { lat: -0.22, lon: -78.51 }, "Quito"),
      plazaRecord("Q11", "Plaza del Pacífico", { lat: -1, lon: -100 }),
    ]);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("should report removals per rule", async () => {
    const report = await new CleanupService(db, bookkeeping).run();

    expect(report.total).toBe(4);
    expect(report.rules).toEqual([
      { kind: "provincias", rule: "blank-name", removed: 1 },
      { kind: "provincias", rule: "key-not-in", removed: 1 },
      { kind: "parques", rule: "blank-name", removed: 0 },
      { kind: "parques", rule: "outside-bounds", removed: 1 },
      { kind: "sitios", rule: "blank-name", removed: 0 },
      { kind: "sitios", rule: "outside-bounds", removed: 0 },
      { kind: "plazas", rule: "blank-name", removed: 0 },
      { kind: "plazas", rule: "outside-bounds", removed: 1 },
    ]);
  });

  it("should keep valid records, boundary points and records without coordinates", async () => {
    await new CleanupService(db, bookkeeping).run();

    expect(await keysOf("parques")).toEqual(["Q1", "Q4", "Q3"]);
    expect(await keysOf("provincias")).toEqual(["Q220451"]);
  });

  it("should skip the allowlist when it is empty", async () => {
    const report = await new CleanupService(
      db,
      bookkeeping,
      cleanupRules([])
    ).run();

    expect(report.rules[1]).toEqual({
      kind: "provincias",
      rule: "key-not-in",
      removed: 0,
    });
    expect(await new EntityStore(db, "provincias").countAll()).toBe(2);
  });

  it("should drop cached dashboard stats only when something was removed", async () => {
    await bookkeeping.set(DASHBOARD_STATS_KEY, { total: 9 }, 60);

    await new CleanupService(db, bookkeeping).run();
    expect(await bookkeeping.get(DASHBOARD_STATS_KEY)).toBeUndefined();

    await bookkeeping.set(DASHBOARD_STATS_KEY, { total: 5 }, 60);
    const second = await new CleanupService(db, bookkeeping).run();

    expect(second.total).toBe(0);
    expect(await bookkeeping.get(DASHBOARD_STATS_KEY)).toEqual({ total: 5 });
  });
});
