/**
 * Builders for SPARQL result rows and in-process facet sources.
 */

import { SourceUnavailableError } from "../../src/errors.js";
import { DBPEDIA_CATALOG } from "../../src/sparql/queries/dbpedia.js";
import { WIKIDATA_CATALOG } from "../../src/sparql/queries/wikidata.js";

import type { FacetTemplate } from "../../src/sparql/queries/template.js";
import type {
  FacetResult,
  FacetSource,
  FetchFacetOptions,
  SourceName,
} from "../../src/sparql/sources.js";
import type { SparqlBinding, SparqlTerm } from "../../src/types/index.js";

export const WD = "http://www.wikidata.org/entity/";
export const DBR = "http://dbpedia.org/resource/";

export function uri(value: string): SparqlTerm {
  return { type: "uri", value };
}

export function literal(value: string | number): SparqlTerm {
  return { type: "literal", value: String(value) };
}

/**
 * One result row. Strings starting with http become URIs.
 */
export function row(values: Record<string, string | number>): SparqlBinding {
  const binding: SparqlBinding = {};
  for (const [variable, value] of Object.entries(values)) {
    binding[variable] =
      typeof value === "string" && value.startsWith("http")
        ? uri(value)
        : literal(value);
  }
  return binding;
}

/**
 * Wikidata row keyed by `?item`.
 */
export function item(
  id: string,
  values: Record<string, string | number> = {}
): SparqlBinding {
  return row({ item: `${WD}${id}`, ...values });
}

type FacetData = SparqlBinding[] | Error;

/**
 * Facet source answering from canned rows. A facet set to an Error comes
 * back as unavailable; an unknown facet comes back empty.
 */
export class FakeSource implements FacetSource {
  readonly calls: { facet: string; options: FetchFacetOptions }[] = [];
  private readonly catalog: Readonly<Record<string, FacetTemplate>>;

  constructor(
    readonly name: SourceName,
    private data: Record<string, FacetData> = {}
  ) {
    this.catalog = name === "wikidata" ? WIKIDATA_CATALOG : DBPEDIA_CATALOG;
  }

  set(facet: string, value: FacetData): void {
    this.data[facet] = value;
  }

  template(facet: string): FacetTemplate {
    const template = this.catalog[facet];
    if (template === undefined) {
      throw new Error(`Unknown ${this.name} facet: ${facet}`);
    }
    return template;
  }

  fetchFacet(
    facet: string,
    options: FetchFacetOptions = {}
  ): Promise<FacetResult> {
    this.calls.push({ facet, options });
    const value = this.data[facet] ?? [];

    if (value instanceof Error) {
      return Promise.resolve({
        source: this.name,
        facet,
        bindings: [],
        cached: false,
        error: new SourceUnavailableError(this.name, value.message),
      });
    }

    return Promise.resolve({
      source: this.name,
      facet,
      bindings: value,
      cached: false,
      error: null,
    });
  }

  callsFor(facet: string): number {
    return this.calls.filter((call) => call.facet === facet).length;
  }
}

export function fakeSources(): {
  wikidata: FakeSource;
  dbpedia: FakeSource;
} {
  return {
    wikidata: new FakeSource("wikidata"),
    dbpedia: new FakeSource("dbpedia"),
  };
}
