/**
 * Route table: /health at the root, everything else under /api/v1.
 */

import { Type } from "@sinclair/typebox";

import { registerStatsRoutes } from "./stats.js";
import { registerSyncRoutes } from "./sync.js";

import type { SyncServices } from "../../services/sync/index.js";
import type { FastifyInstance } from "fastify";

const API_PREFIX = "/api/v1";

const HealthResponseSchema = Type.Object({ status: Type.Literal("ok") });

export async function registerApiRoutes(
  app: FastifyInstance,
  services: SyncServices
): Promise<void> {
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        tags: ["Health"],
        response: { 200: HealthResponseSchema },
      },
    },
    () => ({ status: "ok" as const })
  );

  await app.register(
    (api) => {
      registerStatsRoutes(api, services.stats);
      registerSyncRoutes(api, services);
    },
    { prefix: API_PREFIX }
  );
}
