/**
 * OpenAPI document for the sync API, served at /openapi.json.
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

export interface OpenApiOptions {
  /** Base URL advertised in the document */
  serverUrl: string;
}

const TAGS = [
  { name: "Health", description: "Liveness of the API" },
  { name: "Stats", description: "Record counts per entity type" },
  {
    name: "Sync",
    description: "Staleness, last runs and on-demand sync per entity type",
  },
];

async function openapiPlugin(
  fastify: FastifyInstance,
  options: OpenApiOptions
): Promise<void> {
  await fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Ecuador Linked Data API",
        description:
          "Record counts and sync control for Ecuadorian provinces, national parks, " +
          "heritage sites and plazas reconciled from Wikidata and DBpedia.",
        version: "0.1.0",
      },
      servers: [{ url: options.serverUrl }],
      tags: TAGS,
    },
  });

  fastify.get("/openapi.json", { schema: { hide: true } }, () =>
    fastify.swagger()
  );
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
