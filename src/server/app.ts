import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";

import { fastifyLoggerConfig } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes } from "./routes/index.js";

import type { SyncServices } from "../services/sync/index.js";

export interface BuildAppOptions {
  /** Disable request logging, e.g. under test */
  logger?: boolean;
  /** Base URL advertised in the OpenAPI document */
  serverUrl?: string;
}

/**
 * Assemble the API on top of already-built sync services.
 */
export async function buildApp(
  services: SyncServices,
  options: BuildAppOptions = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : fastifyLoggerConfig,
  });

  await app.register(cors, { origin: true });

  // Routes registered after this are picked up by the document
  await app.register(openapi, {
    serverUrl: options.serverUrl ?? "http://localhost:3000",
  });
  await app.register(errorHandler);

  await registerApiRoutes(app, services);

  return app;
}
