/**
 * Sync API Routes
 *
 * Per-type staleness and last-run status, recent runs, and an on-demand
 * trigger that runs one entity type followed by the cleanup pass.
 */

import { Type, type Static } from "@sinclair/typebox";

import { SyncInProgressError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  EntityKindSchema,
  KindParamSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type { SyncServices } from "../../services/sync/index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const StalenessReasonSchema = Type.Union([
  Type.Literal("forced"),
  Type.Literal("empty-store"),
  Type.Literal("never-synced"),
  Type.Literal("expired"),
  Type.Literal("fresh"),
]);

const KindStatusSchema = Type.Object({
  kind: EntityKindSchema,
  records: Type.Integer(),
  lastSyncAt: Type.Union([Type.String(), Type.Null()]),
  due: Type.Boolean(),
  reason: StalenessReasonSchema,
  lockedBy: Type.Union([Type.String(), Type.Null()]),
  lastRun: Type.Union([
    Type.Object({
      status: Type.String(),
      finishedAt: Type.String(),
      created: Type.Integer(),
      updated: Type.Integer(),
      errorCount: Type.Integer(),
    }),
    Type.Null(),
  ]),
});

const FacetReportSchema = Type.Object({
  source: Type.String(),
  facet: Type.String(),
  rows: Type.Integer(),
  cached: Type.Boolean(),
  error: Type.Union([Type.String(), Type.Null()]),
});

const SyncResultSchema = Type.Object({
  kind: EntityKindSchema,
  status: Type.Union([
    Type.Literal("synced"),
    Type.Literal("skipped"),
    Type.Literal("failed"),
  ]),
  reason: Type.String(),
  created: Type.Integer(),
  updated: Type.Integer(),
  ignored: Type.Integer(),
  orphans: Type.Integer(),
  errors: Type.Array(Type.String()),
  facets: Type.Array(FacetReportSchema),
  durationMs: Type.Integer(),
  cleanupRemoved: Type.Integer(),
});

const SyncRunSchema = Type.Object({
  kind: EntityKindSchema,
  status: Type.String(),
  reason: Type.String(),
  created: Type.Integer(),
  updated: Type.Integer(),
  ignored: Type.Integer(),
  orphans: Type.Integer(),
  errorCount: Type.Integer(),
  startedAt: Type.String(),
  finishedAt: Type.String(),
  durationMs: Type.Integer(),
});

const HistoryQuerySchema = Type.Object({
  limit: Type.Integer({ minimum: 1, maximum: 100, default: 20 }),
});

type HistoryQuery = Static<typeof HistoryQuerySchema>;

type KindParams = Static<typeof KindParamSchema>;

const SyncTriggerBodySchema = Type.Object({
  force: Type.Optional(
    Type.Boolean({ description: "Ignore staleness and refetch every facet" })
  ),
});

type SyncTriggerBody = Static<typeof SyncTriggerBodySchema>;

// ============================================================================
// Routes
// ============================================================================

export function registerSyncRoutes(
  app: FastifyInstance,
  services: Pick<SyncServices, "orchestrator" | "cleanup" | "history">
): void {
  // GET /sync/status
  app.get(
    "/sync/status",
    {
      schema: {
        summary: "Sync status per entity type",
        description:
          "Record count, last completed sync, staleness verdict, live lock and latest run for each type.",
        tags: ["Sync"],
        response: {
          200: createResponseSchema(Type.Array(KindStatusSchema)),
        },
      },
    },
    async () => ({ data: await services.orchestrator.getStatus() })
  );

  // GET /sync/history
  app.get<{ Querystring: HistoryQuery }>(
    "/sync/history",
    {
      schema: {
        summary: "Recent sync runs",
        description: "Sync attempts of every type, newest first.",
        tags: ["Sync"],
        querystring: HistoryQuerySchema,
        response: {
          200: createResponseSchema(Type.Array(SyncRunSchema)),
        },
      },
    },
    async (request) => {
      const rows = await services.history.recent(request.query.limit);
      return {
        data: rows.map((row) => ({
          kind: row.kind,
          status: row.status,
          reason: row.reason,
          created: row.created,
          updated: row.updated,
          ignored: row.ignored,
          orphans: row.orphans,
          errorCount: row.error_count,
          startedAt: row.started_at,
          finishedAt: row.finished_at,
          durationMs: row.duration_ms,
        })),
      };
    }
  );

  // POST /sync/:kind
  app.post<{ Params: KindParams; Body: SyncTriggerBody }>(
    "/sync/:kind",
    {
      schema: {
        summary: "Sync one entity type",
        description:
          "Runs the sync for one type when it is stale (or forced), then the cleanup pass. " +
          "Answers 409 while another process holds the type's lock.",
        tags: ["Sync"],
        params: KindParamSchema,
        body: SyncTriggerBodySchema,
        response: {
          200: createResponseSchema(SyncResultSchema),
          409: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const { kind } = request.params;
      const force = request.body.force === true;

      request.log.info({ kind, force }, "Sync requested");
      const result = await services.orchestrator.syncType(kind, { force });

      if (result.status === "skipped" && result.reason === "locked") {
        throw new SyncInProgressError(kind);
      }

      const cleanup = await services.cleanup.run();

      return { data: { ...result, cleanupRemoved: cleanup.total } };
    }
  );
}
