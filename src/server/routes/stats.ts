/**
 * Stats Routes - /api/v1/stats
 */

import { DashboardStatsSchema } from "../../services/stats.js";
import { createResponseSchema } from "../schemas/common.js";

import type { StatsService } from "../../services/stats.js";
import type { FastifyInstance } from "fastify";

export function registerStatsRoutes(
  app: FastifyInstance,
  stats: StatsService
): void {
  app.get(
    "/stats",
    {
      schema: {
        summary: "Dashboard counts",
        description:
          "Number of stored records per entity type. Cached for an hour and invalidated by every completed sync.",
        tags: ["Stats"],
        response: {
          200: createResponseSchema(DashboardStatsSchema),
        },
      },
    },
    async () => ({ data: await stats.getDashboardStats() })
  );
}
