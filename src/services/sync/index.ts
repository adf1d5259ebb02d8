// Sync Services - Re-exports and wiring
import { DatabaseCache } from "../../cache/database.js";
import {
  createSourceAdapters,
  type FacetSource,
  type SourceName,
} from "../../sparql/sources.js";
import { StatsService } from "../stats.js";
import { CleanupService } from "./cleanup.js";
import { SyncHistoryService } from "./history.js";
import {
  SyncOrchestrator,
  syncSettingsFromConfig,
} from "./orchestrator.js";

import type { AppConfig } from "../../config.js";
import type { Database } from "../../db/schema.js";
import type { Kysely } from "kysely";

export { CleanupService, cleanupRules, type CleanupReport } from "./cleanup.js";
export { SyncHistoryService } from "./history.js";
export {
  SyncOrchestrator,
  syncSettingsFromConfig,
  type KindStatus,
  type SyncProgress,
  type SyncRunResult,
  type TypeSyncResult,
} from "./orchestrator.js";
export { SYNC_PLANS, type SyncPlan } from "./plans.js";
export { EntityStore } from "./store.js";

export interface SyncServices {
  orchestrator: SyncOrchestrator;
  cleanup: CleanupService;
  stats: StatsService;
  history: SyncHistoryService;
}

export interface SyncServiceOptions {
  fetch?: typeof fetch;
  /** Replaces the SPARQL adapters, e.g. with in-process fakes */
  sources?: Readonly<Record<SourceName, FacetSource>>;
}

/**
 * Build the sync engine and its companions on one database handle.
 */
export function createSyncServices(
  db: Kysely<Database>,
  config: AppConfig,
  options: SyncServiceOptions = {}
): SyncServices {
  const sparqlCache = new DatabaseCache(db, "sparql");
  const bookkeeping = new DatabaseCache(db, "sync");

  const sources =
    options.sources ?? createSourceAdapters(config, sparqlCache, options.fetch);

  return {
    orchestrator: new SyncOrchestrator(db, {
      sources,
      bookkeeping,
      settings: syncSettingsFromConfig(config),
    }),
    cleanup: new CleanupService(db, bookkeeping),
    stats: new StatsService(db, bookkeeping, config.cache.statsTtlSeconds),
    history: new SyncHistoryService(db),
  };
}
