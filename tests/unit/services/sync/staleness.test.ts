import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { MemoryCache } from "../../../../src/cache/memory.js";
import {
  StalenessChecker,
  lastSyncKey,
} from "../../../../src/services/sync/staleness.js";
import { EntityStore } from "../../../../src/services/sync/store.js";
import { createTestDb } from "../../../helpers/db.js";
import { parkRecord } from "../../../helpers/records.js";

import type { Database } from "../../../../src/db/schema.js";
import type { Kysely } from "kysely";

const HOUR = 60 * 60 * 1000;

describe("services/sync/staleness", () => {
  let db: Kysely<Database>;
  let bookkeeping: MemoryCache;
  let now: Date;
  let checker: StalenessChecker;

  beforeEach(async () => {
    db = await createTestDb();
    now = new Date("2026-03-01T12:00:00.000Z");
    bookkeeping = new MemoryCache(() => now.getTime());
    checker = new StalenessChecker(db, bookkeeping, 6 * HOUR, () => now);
  });

  afterEach(async () => {
    await db.destroy();
  });

  async function storePark(): Promise<void> {
    await new EntityStore(db, "parques").insertMany([
      parkRecord("Q1", "Cotopaxi"),
    ]);
  }

  it("should report an empty store as due even after a recent sync", async () => {
    await checker.markSynced("parques", now, 86_400);

    const verdict = await checker.check("parques");

    expect(verdict).toEqual({
      due: true,
      reason: "empty-store",
      recordCount: 0,
      lastSyncAt: now,
    });
  });

  it("should report stored records without a sync mark as never synced", async () => {
    await storePark();

    const verdict = await checker.check("parques");

    expect(verdict.due).toBe(true);
    expect(verdict.reason).toBe("never-synced");
    expect(verdict.recordCount).toBe(1);
  });

  it("should be fresh within the interval and expired after it", async () => {
    await storePark();
    await checker.markSynced("parques", now, 86_400);

    now = new Date(now.getTime() + 6 * HOUR);
    expect(await checker.check("parques")).toMatchObject({
      due: false,
      reason: "fresh",
    });

    now = new Date(now.getTime() + 1);
    expect(await checker.check("parques")).toMatchObject({
      due: true,
      reason: "expired",
    });
  });

  it("should let force win over every other reason", async () => {
    expect((await checker.check("parques", { force: true })).reason).toBe(
      "forced"
    );

    await storePark();
    await checker.markSynced("parques", now, 86_400);
    expect((await checker.check("parques", { force: true })).due).toBe(true);
  });

  it("should store the mark under a per-kind key", async () => {
    await checker.markSynced("sitios", now, 60);

    expect(await bookkeeping.get(lastSyncKey("sitios"))).toBe(
      "2026-03-01T12:00:00.000Z"
    );
    expect(lastSyncKey("sitios")).toBe("last_sync:sitios");
    expect(await checker.lastSync("plazas")).toBeNull();
  });

  it("should ignore unreadable marks", async () => {
    await bookkeeping.set(lastSyncKey("plazas"), "yesterday", 60);

    expect(await checker.lastSync("plazas")).toBeNull();
  });
});
