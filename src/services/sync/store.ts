/**
 * Record store for synchronized entities.
 *
 * One instance per entity kind. Build it on a transaction handle to take
 * part in the per-type atomic write.
 */

import { Value } from "@sinclair/typebox/value";

import { PersistenceError } from "../../errors.js";
import {
  HeritageSiteDetailsSchema,
  NaturalAreaDetailsSchema,
  PlazaDetailsSchema,
  ProvinceDetailsSchema,
} from "../../types/index.js";

import type { GeoBounds } from "../../constants.js";
import type { Database, EntityRow, NewEntityRow } from "../../db/schema.js";
import type {
  EntityKind,
  EntityRecord,
  StoredEntity,
} from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export type DeletePredicate =
  | { type: "blank-name" }
  | { type: "outside-bounds"; bounds: GeoBounds }
  | { type: "key-not-in"; keys: readonly string[] };

export interface UpsertResult {
  record: StoredEntity;
  created: boolean;
}

// Keeps IN lists well under SQLite's bound-parameter limit
const KEY_LOOKUP_CHUNK = 500;

export const DEFAULT_WRITE_BATCH_SIZE = 50;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

// ============================================================================
// Row mapping
// ============================================================================

function toRow(record: EntityRecord, now: string): NewEntityRow {
  return {
    kind: record.kind,
    source_key: record.sourceKey,
    name: record.name,
    latitude: record.coordinates?.lat ?? null,
    longitude: record.coordinates?.lon ?? null,
    details: JSON.stringify(record.details),
    refreshed_at: now,
    created_at: now,
  };
}

/**
 * Decode a stored row, validating its details against the kind's schema.
 *
 * @throws PersistenceError when the stored details no longer match
 */
export function fromRow(row: EntityRow): StoredEntity {
  let details: unknown;
  try {
    details = JSON.parse(row.details);
  } catch (error) {
    throw new PersistenceError(
      `Stored details of ${row.kind}/${row.source_key} are not valid JSON`,
      { cause: error }
    );
  }

  const base = {
    sourceKey: row.source_key,
    name: row.name,
    coordinates:
      row.latitude !== null && row.longitude !== null
        ? { lat: row.latitude, lon: row.longitude }
        : null,
    refreshedAt: row.refreshed_at,
    createdAt: row.created_at,
  };

  switch (row.kind) {
    case "provincias":
      if (Value.Check(ProvinceDetailsSchema, details)) {
        return { ...base, kind: "provincias", details };
      }
      break;
    case "parques":
      if (Value.Check(NaturalAreaDetailsSchema, details)) {
        return { ...base, kind: "parques", details };
      }
      break;
    case "sitios":
      if (Value.Check(HeritageSiteDetailsSchema, details)) {
        return { ...base, kind: "sitios", details };
      }
      break;
    case "plazas":
      if (Value.Check(PlazaDetailsSchema, details)) {
        return { ...base, kind: "plazas", details };
      }
      break;
  }

  throw new PersistenceError(
    `Stored details of ${row.kind}/${row.source_key} do not match the ${row.kind} schema`
  );
}

// ============================================================================
// Entity Store
// ============================================================================

export class EntityStore {
  constructor(
    private db: Kysely<Database>,
    readonly kind: EntityKind,
    private clock: () => Date = () => new Date()
  ) {}

  async find(sourceKey: string): Promise<StoredEntity | null> {
    const row = await this.db
      .selectFrom("entities")
      .selectAll()
      .where("kind", "=", this.kind)
      .where("source_key", "=", sourceKey)
      .executeTakeFirst();

    return row ? fromRow(row) : null;
  }

  /**
   * Subset of `keys` already stored for this kind.
   */
  async existingKeys(keys: readonly string[]): Promise<Set<string>> {
    const found = new Set<string>();

    for (const batch of chunk(keys, KEY_LOOKUP_CHUNK)) {
      const rows = await this.db
        .selectFrom("entities")
        .select("source_key")
        .where("kind", "=", this.kind)
        .where("source_key", "in", batch)
        .execute();

      for (const row of rows) {
        found.add(row.source_key);
      }
    }

    return found;
  }

  /**
   * Create the record or overwrite every field of the stored one.
   */
  async upsertByKey(record: EntityRecord): Promise<UpsertResult> {
    this.assertKind(record);
    const existing = await this.find(record.sourceKey);

    if (existing === null) {
      await this.insertMany([record]);
    } else {
      await this.bulkUpdate([record]);
    }

    const stored = await this.find(record.sourceKey);
    if (stored === null) {
      throw new PersistenceError(
        `Upsert of ${this.kind}/${record.sourceKey} left no row behind`
      );
    }

    return { record: stored, created: existing === null };
  }

  async insertMany(
    records: readonly EntityRecord[],
    batchSize = DEFAULT_WRITE_BATCH_SIZE
  ): Promise<number> {
    const now = this.clock().toISOString();
    let inserted = 0;

    for (const batch of chunk(records, batchSize)) {
      for (const record of batch) {
        this.assertKind(record);
      }
      await this.db
        .insertInto("entities")
        .values(batch.map((record) => toRow(record, now)))
        .execute();
      inserted += batch.length;
    }

    return inserted;
  }

  /**
   * Overwrite stored records in batched statements. `created_at` is kept.
   */
  async bulkUpdate(
    records: readonly EntityRecord[],
    batchSize = DEFAULT_WRITE_BATCH_SIZE
  ): Promise<number> {
    const now = this.clock().toISOString();
    let updated = 0;

    for (const batch of chunk(records, batchSize)) {
      for (const record of batch) {
        this.assertKind(record);
      }
      await this.db
        .insertInto("entities")
        .values(batch.map((record) => toRow(record, now)))
        .onConflict((oc) =>
          oc.columns(["kind", "source_key"]).doUpdateSet((eb) => ({
            name: eb.ref("excluded.name"),
            latitude: eb.ref("excluded.latitude"),
            longitude: eb.ref("excluded.longitude"),
            details: eb.ref("excluded.details"),
            refreshed_at: eb.ref("excluded.refreshed_at"),
          }))
        )
        .execute();
      updated += batch.length;
    }

    return updated;
  }

  async countAll(): Promise<number> {
    const result = await this.db
      .selectFrom("entities")
      .select((eb) => eb.fn.countAll().as("count"))
      .where("kind", "=", this.kind)
      .executeTakeFirst();

    return Number(result?.count ?? 0);
  }

  /**
   * Delete the records of this kind matching the predicate.
   */
  async deleteWhere(predicate: DeletePredicate): Promise<number> {
    let query = this.db.deleteFrom("entities").where("kind", "=", this.kind);

    switch (predicate.type) {
      case "blank-name":
        query = query.where((eb) =>
          eb(eb.fn<string>("trim", ["name"]), "=", "")
        );
        break;
      case "outside-bounds": {
        const { minLat, maxLat, minLon, maxLon } = predicate.bounds;
        query = query
          .where("latitude", "is not", null)
          .where("longitude", "is not", null)
          .where((eb) =>
            eb.or([
              eb("latitude", "<", minLat),
              eb("latitude", ">", maxLat),
              eb("longitude", "<", minLon),
              eb("longitude", ">", maxLon),
            ])
          );
        break;
      }
      case "key-not-in":
        // An empty allowlist disables the rule
        if (predicate.keys.length === 0) {
          return 0;
        }
        query = query.where("source_key", "not in", [...predicate.keys]);
        break;
    }

    const result = await query.executeTakeFirst();
    return Number(result.numDeletedRows);
  }

  private assertKind(record: EntityRecord): void {
    if (record.kind !== this.kind) {
      throw new PersistenceError(
        `Cannot write a ${record.kind} record through the ${this.kind} store`
      );
    }
  }
}
