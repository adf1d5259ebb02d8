/**
 * Sync Orchestrator
 *
 * Per entity kind: staleness check, lease lock, concurrent facet fan-out,
 * key reconciliation and merge, record processing, one transactional write,
 * completion bookkeeping. Kinds run sequentially in a fixed order.
 */

import {
  NoPrimaryDataError,
  PersistenceError,
  RecordTransformError,
  SourceUnavailableError,
  errorMessage,
} from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { bindingValue } from "../../sparql/extractors.js";
import { NameNormalizer } from "../../sparql/normalizer.js";
import { ENTITY_KINDS } from "../../types/index.js";
import { DASHBOARD_STATS_KEY } from "../stats.js";
import { SyncHistoryService } from "./history.js";
import { SyncLock } from "./lock.js";
import {
  NameIndex,
  keyRows,
  mergeEnrichments,
  type MergeResult,
  type MergedRecord,
} from "./merger.js";
import { SYNC_PLANS, type FacetRef, type SyncPlan } from "./plans.js";
import { runBounded, type TaskOutcome } from "./pool.js";
import {
  StalenessChecker,
  type StalenessReason,
} from "./staleness.js";
import { EntityStore } from "./store.js";

import type { Cache } from "../../cache/types.js";
import type { AppConfig } from "../../config.js";
import type { Database } from "../../db/schema.js";
import type {
  FacetResult,
  FacetSource,
  SourceName,
} from "../../sparql/sources.js";
import type { EntityKind, EntityRecord } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface SyncSettings {
  intervalSeconds: number;
  concurrency: number;
  queryTimeoutMs: number;
  typeDelayMs: number;
  queryRetries: number;
  persistRetries: number;
  retryBackoffMs: number;
  lockTtlMs: number;
  writeBatchSize: number;
  bookkeepingTtlSeconds: number;
}

export function syncSettingsFromConfig(config: AppConfig): SyncSettings {
  return {
    intervalSeconds: config.sync.intervalSeconds,
    concurrency: config.sync.concurrency,
    queryTimeoutMs: config.sparql.timeoutMs,
    typeDelayMs: config.sync.typeDelayMs,
    queryRetries: config.sync.queryRetries,
    persistRetries: config.sync.persistRetries,
    retryBackoffMs: 1000,
    lockTtlMs: config.sync.lockTtlMs,
    writeBatchSize: config.sync.writeBatchSize,
    bookkeepingTtlSeconds: config.cache.syncTtlSeconds,
  };
}

export interface SyncOrchestratorDeps {
  sources: Readonly<Record<SourceName, FacetSource>>;
  /** Holds last-sync timestamps and derived caches */
  bookkeeping: Cache;
  settings: SyncSettings;
  plans?: Partial<Record<EntityKind, SyncPlan>>;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  lockOwner?: string;
}

export type SyncStatus = "synced" | "skipped" | "failed";

export type SyncReason = StalenessReason | "locked" | "unknown";

export interface FacetReport {
  source: SourceName;
  facet: string;
  rows: number;
  cached: boolean;
  error: string | null;
}

export interface TypeSyncResult {
  kind: EntityKind;
  status: SyncStatus;
  reason: SyncReason;
  skipped: boolean;
  created: number;
  updated: number;
  /** Merged records without a usable name */
  ignored: number;
  /** Secondary rows with no matching primary entity */
  orphans: number;
  errors: string[];
  facets: FacetReport[];
  durationMs: number;
}

export interface SyncRunResult {
  results: TypeSyncResult[];
  failed: EntityKind[];
  created: number;
  updated: number;
}

export interface KindStatus {
  kind: EntityKind;
  records: number;
  lastSyncAt: string | null;
  due: boolean;
  reason: StalenessReason;
  lockedBy: string | null;
  lastRun: {
    status: string;
    finishedAt: string;
    created: number;
    updated: number;
    errorCount: number;
  } | null;
}

export interface SyncProgress {
  phase: "fetch" | "process" | "persist";
  kind: EntityKind;
  current: number;
  total: number;
  currentItem?: string;
}

type ProgressCallback = (progress: SyncProgress) => void;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

// ============================================================================
// Sync Orchestrator
// ============================================================================

export class SyncOrchestrator {
  private onProgress?: ProgressCallback;
  private readonly plans: Readonly<Record<EntityKind, SyncPlan>>;
  private readonly staleness: StalenessChecker;
  private readonly lock: SyncLock;
  private readonly history: SyncHistoryService;
  // Shared by every name join this orchestrator runs
  private readonly normalizer = new NameNormalizer();
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private db: Kysely<Database>,
    private deps: SyncOrchestratorDeps
  ) {
    this.plans = { ...SYNC_PLANS, ...deps.plans };
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
    this.staleness = new StalenessChecker(
      db,
      deps.bookkeeping,
      deps.settings.intervalSeconds * 1000,
      this.clock
    );
    this.lock = new SyncLock(
      db,
      deps.settings.lockTtlMs,
      deps.lockOwner,
      this.clock
    );
    this.history = new SyncHistoryService(db);
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  // ==========================================================================
  // Entry points
  // ==========================================================================

  /**
   * Sync every requested kind in the fixed order, pausing between kinds that
   * actually ran. A failing kind never affects the others.
   */
  async syncAll(
    options: { force?: boolean; kinds?: readonly EntityKind[] } = {}
  ): Promise<SyncRunResult> {
    const requested = options.kinds ?? ENTITY_KINDS;
    const kinds = ENTITY_KINDS.filter((kind) => requested.includes(kind));
    const results: TypeSyncResult[] = [];

    for (const [index, kind] of kinds.entries()) {
      let result: TypeSyncResult;
      try {
        result = await this.syncType(kind, { force: options.force });
      } catch (error) {
        syncLogger.error({ kind, error }, "Sync failed unexpectedly");
        result = this.result(kind, "failed", "unknown", this.clock(), {
          errors: [errorMessage(error)],
        });
      }
      results.push(result);

      if (result.status !== "skipped" && index < kinds.length - 1) {
        await this.sleep(this.deps.settings.typeDelayMs);
      }
    }

    return {
      results,
      failed: results
        .filter((result) => result.status === "failed")
        .map((result) => result.kind),
      created: results.reduce((sum, result) => sum + result.created, 0),
      updated: results.reduce((sum, result) => sum + result.updated, 0),
    };
  }

  async syncType(
    kind: EntityKind,
    options: { force?: boolean } = {}
  ): Promise<TypeSyncResult> {
    const startedAt = this.clock();
    const force = options.force === true;
    const verdict = await this.staleness.check(kind, { force });

    if (!verdict.due) {
      syncLogger.info(
        { kind, lastSyncAt: verdict.lastSyncAt?.toISOString() },
        "Data is fresh, skipping"
      );
      return this.result(kind, "skipped", verdict.reason, startedAt);
    }

    if (!(await this.lock.acquire(kind))) {
      syncLogger.warn({ kind }, "Another sync holds the lock, skipping");
      return this.result(kind, "skipped", "locked", startedAt, {
        errors: [`Another ${kind} sync is already running`],
      });
    }

    syncLogger.info({ kind, reason: verdict.reason }, "Starting sync");

    let result: TypeSyncResult;
    try {
      result = await this.runType(kind, verdict.reason, force, startedAt);
    } catch (error) {
      syncLogger.error({ kind, error }, "Sync aborted");
      result = this.result(kind, "failed", verdict.reason, startedAt, {
        errors: [errorMessage(error)],
      });
    } finally {
      await this.lock.release(kind);
    }

    await this.recordHistory(result, startedAt);

    syncLogger.info(
      {
        kind,
        status: result.status,
        created: result.created,
        updated: result.updated,
        errors: result.errors.length,
        durationMs: result.durationMs,
      },
      "Sync finished"
    );

    return result;
  }

  async getStatus(): Promise<KindStatus[]> {
    const statuses: KindStatus[] = [];

    for (const kind of ENTITY_KINDS) {
      const verdict = await this.staleness.check(kind);
      const lastRun = await this.history.latest(kind);
      const holder = await this.lock.holder(kind);

      statuses.push({
        kind,
        records: verdict.recordCount,
        lastSyncAt: verdict.lastSyncAt?.toISOString() ?? null,
        due: verdict.due,
        reason: verdict.reason,
        lockedBy: holder?.lockedBy ?? null,
        lastRun: lastRun
          ? {
              status: lastRun.status,
              finishedAt: lastRun.finished_at,
              created: lastRun.created,
              updated: lastRun.updated,
              errorCount: lastRun.error_count,
            }
          : null,
      });
    }

    return statuses;
  }

  // ==========================================================================
  // One kind
  // ==========================================================================

  private async runType(
    kind: EntityKind,
    reason: StalenessReason,
    force: boolean,
    startedAt: Date
  ): Promise<TypeSyncResult> {
    const plan = this.plans[kind];
    const { primary, secondaries } = await this.fetchFacets(plan, force);

    const facets = [primary, ...secondaries].map(
      (facet): FacetReport => ({
        source: facet.source,
        facet: facet.facet,
        rows: facet.bindings.length,
        cached: facet.cached,
        error: facet.error?.message ?? null,
      })
    );
    const facetErrors = facets
      .filter((facet) => facet.error !== null)
      .map((facet) => `${facet.source}/${facet.facet}: ${facet.error ?? ""}`);

    if (primary.bindings.length === 0) {
      const error = new NoPrimaryDataError(kind);
      syncLogger.error({ kind, facetErrors }, error.message);
      return this.result(kind, "failed", reason, startedAt, {
        errors: [error.message, ...facetErrors],
        facets,
      });
    }

    const merged = this.merge(plan, primary, secondaries);
    const { records, ignored, errors } = this.processAll(plan, merged.records);

    this.report({ phase: "persist", kind, current: 0, total: records.length });

    let written: { created: number; updated: number };
    try {
      written = await this.persist(kind, records);
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      syncLogger.error({ kind, error }, "Persisting records failed");
      return this.result(kind, "failed", reason, startedAt, {
        ignored,
        orphans: merged.orphans,
        errors: [...facetErrors, ...errors, error.message],
        facets,
      });
    }

    await this.staleness.markSynced(
      kind,
      this.clock(),
      this.deps.settings.bookkeepingTtlSeconds
    );
    await this.deps.bookkeeping.delete(DASHBOARD_STATS_KEY);

    return this.result(kind, "synced", reason, startedAt, {
      created: written.created,
      updated: written.updated,
      ignored,
      orphans: merged.orphans,
      errors: [...facetErrors, ...errors],
      facets,
    });
  }

  /**
   * Run the plan's facets on the bounded pool; retry a failed primary.
   */
  private async fetchFacets(
    plan: SyncPlan,
    bypassCache: boolean
  ): Promise<{ primary: FacetResult; secondaries: FacetResult[] }> {
    const { settings } = this.deps;
    const [first, ...secondaries] = await this.fetchAll(
      plan.kind,
      [plan.primary, ...plan.secondaries],
      bypassCache
    );

    let primary =
      first ??
      this.failedFacet(plan.primary, new Error("Primary facet did not run"));

    for (
      let attempt = 1;
      primary.error !== null && attempt <= settings.queryRetries;
      attempt++
    ) {
      syncLogger.warn(
        { kind: plan.kind, facet: plan.primary.facet, attempt },
        "Primary facet failed, retrying"
      );
      await this.sleep(settings.retryBackoffMs * attempt);
      const [retried] = await this.fetchAll(plan.kind, [plan.primary], true);
      primary = retried ?? primary;
    }

    return { primary, secondaries };
  }

  private async fetchAll(
    kind: EntityKind,
    refs: readonly FacetRef[],
    bypassCache: boolean
  ): Promise<FacetResult[]> {
    let completed = 0;
    const tasks = refs.map((ref) => async () => {
      const result = await this.deps.sources[ref.source].fetchFacet(
        ref.facet,
        { bypassCache }
      );
      completed++;
      this.report({
        phase: "fetch",
        kind,
        current: completed,
        total: refs.length,
        currentItem: `${ref.source}/${ref.facet}`,
      });
      return result;
    });

    const outcomes = await runBounded(tasks, {
      concurrency: this.deps.settings.concurrency,
      timeoutMs: this.deps.settings.queryTimeoutMs,
    });

    return refs.map((ref, index) => this.toFacetResult(ref, outcomes[index]));
  }

  private toFacetResult(
    ref: FacetRef,
    outcome: TaskOutcome<FacetResult> | undefined
  ): FacetResult {
    if (outcome === undefined) {
      return this.failedFacet(ref, new Error("Facet did not run"));
    }
    if (outcome.ok) {
      return outcome.value;
    }
    return this.failedFacet(ref, outcome.error);
  }

  private failedFacet(ref: FacetRef, cause: Error): FacetResult {
    const error =
      cause instanceof SourceUnavailableError
        ? cause
        : new SourceUnavailableError(
            ref.source,
            `${ref.source}/${ref.facet}: ${cause.message}`,
            { cause }
          );
    syncLogger.warn(
      { source: ref.source, facet: ref.facet, error: error.message },
      "Facet degraded to empty"
    );
    return {
      source: ref.source,
      facet: ref.facet,
      bindings: [],
      cached: false,
      error,
    };
  }

  private merge(
    plan: SyncPlan,
    primary: FacetResult,
    secondaries: readonly FacetResult[]
  ): MergeResult {
    const primaryTemplate = this.deps.sources[primary.source].template(
      primary.facet
    );
    const keyedPrimary = keyRows(primary.bindings, {
      keyVariable: primaryTemplate.keyVariable,
    });
    const nameIndex = NameIndex.fromRows(
      keyedPrimary.rows,
      plan.nameVariable,
      this.normalizer
    );

    let unresolved = 0;
    const lists = secondaries.map((result) => {
      const template = this.deps.sources[result.source].template(result.facet);
      const keyed = keyRows(result.bindings, {
        keyVariable: template.keyVariable,
        nameVariable: template.nameVariable,
        nameIndex,
      });
      unresolved += keyed.unresolved;
      return { source: result.facet, rows: keyed.rows };
    });

    const merged = mergeEnrichments(keyedPrimary.rows, lists);
    syncLogger.debug(
      {
        kind: plan.kind,
        records: merged.records.length,
        orphans: merged.orphans,
        unresolved,
      },
      "Merged facets"
    );

    return { records: merged.records, orphans: merged.orphans + unresolved };
  }

  private processAll(
    plan: SyncPlan,
    merged: readonly MergedRecord[]
  ): { records: EntityRecord[]; ignored: number; errors: string[] } {
    const records: EntityRecord[] = [];
    const errors: string[] = [];
    let ignored = 0;

    for (const [index, record] of merged.entries()) {
      try {
        const entity = plan.process(record);
        if (entity === null) {
          ignored++;
        } else {
          records.push(entity);
        }
      } catch (error) {
        const name =
          error instanceof RecordTransformError
            ? error.entityName
            : (bindingValue(record.primary, plan.nameVariable) ?? record.key);
        syncLogger.warn(
          { kind: plan.kind, key: record.key, name, error },
          "Record processing failed"
        );
        errors.push(`${name}: ${errorMessage(error)}`);
      }

      this.report({
        phase: "process",
        kind: plan.kind,
        current: index + 1,
        total: merged.length,
      });
    }

    return { records, ignored, errors };
  }

  /**
   * Write all records of a kind in one transaction, retried as a whole.
   *
   * @throws PersistenceError once every attempt has failed
   */
  private async persist(
    kind: EntityKind,
    records: readonly EntityRecord[]
  ): Promise<{ created: number; updated: number }> {
    const { persistRetries, writeBatchSize, retryBackoffMs } =
      this.deps.settings;
    let lastError: unknown;

    for (let attempt = 0; attempt <= persistRetries; attempt++) {
      if (attempt > 0) {
        syncLogger.warn(
          { kind, attempt, error: errorMessage(lastError) },
          "Retrying batch write"
        );
        await this.sleep(retryBackoffMs * attempt);
      }

      try {
        return await this.db.transaction().execute(async (trx) => {
          const store = new EntityStore(trx, kind, this.clock);
          const existing = await store.existingKeys(
            records.map((record) => record.sourceKey)
          );
          const fresh = records.filter(
            (record) => !existing.has(record.sourceKey)
          );
          const known = records.filter((record) =>
            existing.has(record.sourceKey)
          );

          await store.insertMany(fresh, writeBatchSize);
          await store.bulkUpdate(known, writeBatchSize);

          return { created: fresh.length, updated: known.length };
        });
      } catch (error) {
        lastError = error;
      }
    }

    throw new PersistenceError(
      `Writing ${String(records.length)} ${kind} records failed after ${String(persistRetries + 1)} attempts: ${errorMessage(lastError)}`,
      { cause: lastError }
    );
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async recordHistory(
    result: TypeSyncResult,
    startedAt: Date
  ): Promise<void> {
    try {
      await this.history.record(result, startedAt, this.clock());
    } catch (error) {
      syncLogger.warn(
        { kind: result.kind, error },
        "Could not record sync history"
      );
    }
  }

  private report(progress: SyncProgress): void {
    this.onProgress?.(progress);
  }

  private result(
    kind: EntityKind,
    status: SyncStatus,
    reason: SyncReason,
    startedAt: Date,
    fields: Partial<
      Pick<
        TypeSyncResult,
        "created" | "updated" | "ignored" | "orphans" | "errors" | "facets"
      >
    > = {}
  ): TypeSyncResult {
    return {
      kind,
      status,
      reason,
      skipped: status === "skipped",
      created: 0,
      updated: 0,
      ignored: 0,
      orphans: 0,
      errors: [],
      facets: [],
      ...fields,
      durationMs: this.clock().getTime() - startedAt.getTime(),
    };
  }
}
