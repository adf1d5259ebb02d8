import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { SyncHistoryService } from "../../../../src/services/sync/history.js";
import { createTestDb } from "../../../helpers/db.js";

import type { Database } from "../../../../src/db/schema.js";
import type { TypeSyncResult } from "../../../../src/services/sync/orchestrator.js";
import type { Kysely } from "kysely";

function result(overrides: Partial<TypeSyncResult> = {}): TypeSyncResult {
  return {
    kind: "parques",
    status: "synced",
    reason: "expired",
    skipped: false,
    created: 3,
    updated: 1,
    ignored: 0,
    orphans: 0,
    errors: [],
    facets: [],
    durationMs: 120,
    ...overrides,
  };
}

const at = (minute: number) =>
  new Date(`2026-03-01T10:${String(minute).padStart(2, "0")}:00.000Z`);

describe("services/sync/history", () => {
  let db: Kysely<Database>;
  let history: SyncHistoryService;

  beforeEach(async () => {
    db = await createTestDb();
    history = new SyncHistoryService(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("should store one row per attempt", async () => {
    const id = await history.record(
      result({ errors: ["Yasuní: Invalid details: /areaKm2 Expected number"] }),
      at(0),
      at(1)
    );

    const row = await history.latest("parques");
    expect(row).toMatchObject({
      id,
      kind: "parques",
      status: "synced",
      created: 3,
      updated: 1,
      error_count: 1,
      started_at: "2026-03-01T10:00:00.000Z",
      finished_at: "2026-03-01T10:01:00.000Z",
    });
    expect(JSON.parse(row?.errors ?? "[]")).toEqual([
      "Yasuní: Invalid details: /areaKm2 Expected number",
    ]);
  });

  it("should ignore skipped attempts for the latest run", async () => {
    await history.record(result({ status: "failed" }), at(0), at(1));
    await history.record(
      result({ status: "skipped", reason: "fresh", skipped: true }),
      at(5),
      at(5)
    );

    expect((await history.latest("parques"))?.status).toBe("failed");
    expect(await history.latest("plazas")).toBeNull();
  });

  it("should list recent attempts newest first", async () => {
    await history.record(result({ kind: "plazas" }), at(0), at(1));
    await history.record(result({ kind: "sitios" }), at(10), at(11));
    await history.record(result({ kind: "provincias" }), at(20), at(21));

    const recent = await history.recent(2);
    expect(recent.map((row) => row.kind)).toEqual(["provincias", "sitios"]);
  });
});
