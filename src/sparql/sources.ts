/**
 * Source adapters: one SPARQL client plus a fixed query catalog per endpoint.
 */

import { Value } from "@sinclair/typebox/value";

import { sparqlLogger } from "../logger.js";
import { SparqlBindingsSchema } from "../types/index.js";
import { SparqlClient } from "./client.js";
import { DBPEDIA_CATALOG } from "./queries/dbpedia.js";
import { WIKIDATA_CATALOG } from "./queries/wikidata.js";

import type { FacetTemplate } from "./queries/template.js";
import type { Cache } from "../cache/types.js";
import type { AppConfig } from "../config.js";
import type { SourceUnavailableError } from "../errors.js";
import type { SparqlBinding } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type SourceName = "wikidata" | "dbpedia";

export interface SourceConfig {
  name: SourceName;
  endpoint: string;
  /** Label languages in order of preference */
  labelLanguages: readonly string[];
  catalog: Readonly<Record<string, FacetTemplate>>;
}

export interface FacetResult {
  source: SourceName;
  facet: string;
  bindings: SparqlBinding[];
  cached: boolean;
  /** Set when the query failed; bindings are then empty */
  error: SourceUnavailableError | null;
}

export interface FetchFacetOptions {
  /** Skip cache reads; fresh results are still written back */
  bypassCache?: boolean;
}

/**
 * What the sync engine needs from a source.
 */
export interface FacetSource {
  readonly name: SourceName;
  template(facet: string): FacetTemplate;
  fetchFacet(facet: string, options?: FetchFacetOptions): Promise<FacetResult>;
}

export const LABEL_LANGUAGES: readonly string[] = ["es", "en"];

// ============================================================================
// Adapter
// ============================================================================

export class SourceAdapter implements FacetSource {
  constructor(
    private readonly config: SourceConfig,
    private readonly client: SparqlClient,
    private readonly cache: Cache,
    private readonly cacheTtlSeconds: number
  ) {}

  get name(): SourceName {
    return this.config.name;
  }

  template(facet: string): FacetTemplate {
    const template = this.config.catalog[facet];
    if (template === undefined) {
      throw new Error(`Unknown ${this.config.name} facet: ${facet}`);
    }
    return template;
  }

  renderQuery(facet: string): string {
    return this.template(facet).render({
      languages: this.config.labelLanguages,
    });
  }

  async fetchFacet(
    facet: string,
    options: FetchFacetOptions = {}
  ): Promise<FacetResult> {
    const source = this.config.name;
    const cacheKey = `${source}:${facet}`;
    const query = this.renderQuery(facet);

    if (options.bypassCache !== true) {
      const cached = await this.cache.get(cacheKey);
      if (cached !== undefined && Value.Check(SparqlBindingsSchema, cached)) {
        sparqlLogger.debug(
          { source, facet, rows: cached.length },
          "Using cached facet result"
        );
        return { source, facet, bindings: cached, cached: true, error: null };
      }
    }

    const outcome = await this.client.query(query);
    if (!outcome.ok) {
      return { source, facet, bindings: [], cached: false, error: outcome.error };
    }

    if (outcome.bindings.length > 0) {
      await this.cache.set(cacheKey, outcome.bindings, this.cacheTtlSeconds);
    }

    sparqlLogger.info(
      { source, facet, rows: outcome.bindings.length },
      "Fetched facet"
    );

    return {
      source,
      facet,
      bindings: outcome.bindings,
      cached: false,
      error: null,
    };
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createSourceAdapters(
  config: AppConfig,
  cache: Cache,
  fetchImpl?: typeof fetch
): Record<SourceName, SourceAdapter> {
  const { sparql } = config;

  const build = (
    name: SourceName,
    endpoint: string,
    catalog: Readonly<Record<string, FacetTemplate>>
  ): SourceAdapter =>
    new SourceAdapter(
      { name, endpoint, labelLanguages: LABEL_LANGUAGES, catalog },
      new SparqlClient({
        name,
        endpoint,
        timeoutMs: sparql.timeoutMs,
        minIntervalMs: sparql.minIntervalMs,
        userAgent: sparql.userAgent,
        fetch: fetchImpl,
      }),
      cache,
      config.cache.sparqlTtlSeconds
    );

  return {
    wikidata: build("wikidata", sparql.wikidataEndpoint, WIKIDATA_CATALOG),
    dbpedia: build("dbpedia", sparql.dbpediaEndpoint, DBPEDIA_CATALOG),
  };
}
