/**
 * Runtime configuration read from the environment.
 *
 * Values are converted and validated against a TypeBox schema so the rest of
 * the code can rely on numbers being numbers.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

const ConfigSchema = Type.Object({
  database: Type.Object({
    url: Type.Optional(Type.String({ minLength: 1 })),
    path: Type.String({ minLength: 1, default: "./data/ecuador.db" }),
  }),
  sparql: Type.Object({
    wikidataEndpoint: Type.String({
      default: "https://query.wikidata.org/sparql",
    }),
    dbpediaEndpoint: Type.String({ default: "https://dbpedia.org/sparql" }),
    timeoutMs: Type.Integer({ minimum: 1000, default: 30_000 }),
    minIntervalMs: Type.Integer({ minimum: 0, default: 500 }),
    userAgent: Type.String({
      default: "ecuador-linked-data-loader/0.1 (sync engine)",
    }),
  }),
  sync: Type.Object({
    intervalSeconds: Type.Integer({ minimum: 0, default: 6 * 60 * 60 }),
    concurrency: Type.Integer({ minimum: 1, maximum: 16, default: 3 }),
    typeDelayMs: Type.Integer({ minimum: 0, default: 2000 }),
    queryRetries: Type.Integer({ minimum: 0, maximum: 5, default: 1 }),
    persistRetries: Type.Integer({ minimum: 0, maximum: 5, default: 2 }),
    lockTtlMs: Type.Integer({ minimum: 1000, default: 10 * 60 * 1000 }),
    writeBatchSize: Type.Integer({ minimum: 1, default: 50 }),
  }),
  cache: Type.Object({
    sparqlTtlSeconds: Type.Integer({ minimum: 0, default: 24 * 60 * 60 }),
    syncTtlSeconds: Type.Integer({ minimum: 0, default: 24 * 60 * 60 }),
    statsTtlSeconds: Type.Integer({ minimum: 0, default: 60 * 60 }),
  }),
  server: Type.Object({
    port: Type.Integer({ minimum: 0, maximum: 65_535, default: 3000 }),
    host: Type.String({ default: "0.0.0.0" }),
  }),
});

export type AppConfig = Static<typeof ConfigSchema>;

// ============================================================================
// Loading
// ============================================================================

function defined(
  entries: Record<string, string | undefined>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined && value !== "") {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Build the configuration from environment variables.
 *
 * @throws ConfigError when a variable cannot be converted to its type
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = {
    database: defined({ url: env.DATABASE_URL, path: env.DB_PATH }),
    sparql: defined({
      wikidataEndpoint: env.WIKIDATA_ENDPOINT,
      dbpediaEndpoint: env.DBPEDIA_ENDPOINT,
      timeoutMs: env.SPARQL_TIMEOUT_MS,
      minIntervalMs: env.SPARQL_MIN_INTERVAL_MS,
      userAgent: env.SPARQL_USER_AGENT,
    }),
    sync: defined({
      intervalSeconds: env.SYNC_INTERVAL_SECONDS,
      concurrency: env.SYNC_CONCURRENCY,
      typeDelayMs: env.SYNC_TYPE_DELAY_MS,
      queryRetries: env.SYNC_QUERY_RETRIES,
      persistRetries: env.SYNC_PERSIST_RETRIES,
      lockTtlMs: env.SYNC_LOCK_TTL_MS,
      writeBatchSize: env.SYNC_WRITE_BATCH_SIZE,
    }),
    cache: defined({
      sparqlTtlSeconds: env.SPARQL_CACHE_TTL_SECONDS,
      syncTtlSeconds: env.SYNC_CACHE_TTL_SECONDS,
      statsTtlSeconds: env.STATS_CACHE_TTL_SECONDS,
    }),
    server: defined({ port: env.PORT, host: env.HOST }),
  };

  const value = Value.Convert(ConfigSchema, Value.Default(ConfigSchema, raw));

  if (!Value.Check(ConfigSchema, value)) {
    const issues = [...Value.Errors(ConfigSchema, value)].map(
      (error) => `${error.path}: ${error.message}`
    );
    throw new ConfigError("Invalid configuration", issues);
  }

  return value;
}
