import { describe, it, expect, vi } from "vitest";

import { MemoryCache } from "../../../src/cache/memory.js";
import { SparqlClient } from "../../../src/sparql/client.js";
import { WIKIDATA_CATALOG } from "../../../src/sparql/queries/wikidata.js";
import { LABEL_LANGUAGES, SourceAdapter } from "../../../src/sparql/sources.js";
import { item } from "../../helpers/sparql.js";

import type { SparqlBinding } from "../../../src/types/index.js";

function resultsResponse(bindings: SparqlBinding[]): Response {
  return new Response(
    JSON.stringify({ head: { vars: [] }, results: { bindings } })
  );
}

function createAdapter(fetchMock: typeof fetch, cache = new MemoryCache()) {
  const client = new SparqlClient({
    name: "wikidata",
    endpoint: "https://sparql.example.test/sparql",
    timeoutMs: 1000,
    minIntervalMs: 0,
    userAgent: "test-agent/1.0",
    fetch: fetchMock,
  });
  const adapter = new SourceAdapter(
    {
      name: "wikidata",
      endpoint: "https://sparql.example.test/sparql",
      labelLanguages: LABEL_LANGUAGES,
      catalog: WIKIDATA_CATALOG,
    },
    client,
    cache,
    3600
  );
  return { adapter, cache };
}

const rows = [item("Q14594", { itemLabel: "Guayas" })];

describe("sparql/sources", () => {
  it("should cache non-empty results under source and facet", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockImplementation(() => Promise.resolve(resultsResponse(rows)));
    const { adapter, cache } = createAdapter(fetchMock);

    const first = await adapter.fetchFacet("provinces");
    const second = await adapter.fetchFacet("provinces");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(first).toMatchObject({ cached: false, error: null });
    expect(second).toMatchObject({ cached: true, error: null });
    expect(second.bindings).toEqual(rows);
    expect(await cache.get("wikidata:provinces")).toEqual(rows);
  });

  it("should skip the cache read when bypassing", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockImplementation(() => Promise.resolve(resultsResponse(rows)));
    const { adapter } = createAdapter(fetchMock);

    await adapter.fetchFacet("provinces");
    const fresh = await adapter.fetchFacet("provinces", { bypassCache: true });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fresh.cached).toBe(false);
  });

  it("should not cache empty results", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockImplementation(() => Promise.resolve(resultsResponse([])));
    const { adapter, cache } = createAdapter(fetchMock);

    await adapter.fetchFacet("plazas");
    await adapter.fetchFacet("plazas");

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });

  it("should degrade failures to an empty result with the error", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockResolvedValue(
      new Response("down", { status: 502, statusText: "Bad Gateway" })
    );
    const { adapter, cache } = createAdapter(fetchMock);

    const result = await adapter.fetchFacet("unesco");

    expect(result.bindings).toEqual([]);
    expect(result.error?.message).toBe("wikidata responded 502 Bad Gateway");
    expect(cache.size).toBe(0);
  });

  it("should refetch when the cached value is not a binding list", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockImplementation(() => Promise.resolve(resultsResponse(rows)));
    const cache = new MemoryCache();
    await cache.set("wikidata:provinces", { stale: true }, 3600);
    const { adapter } = createAdapter(fetchMock, cache);

    const result = await adapter.fetchFacet("provinces");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result.bindings).toEqual(rows);
  });

  it("should reject unknown facets", () => {
    const { adapter } = createAdapter(vi.fn<typeof fetch>());

    expect(() => adapter.template("volcanoes")).toThrow(
      "Unknown wikidata facet: volcanoes"
    );
  });

  it("should render queries with the configured languages", () => {
    const { adapter } = createAdapter(vi.fn<typeof fetch>());

    expect(adapter.renderQuery("plazas")).toContain(
      'wikibase:language "es,en"'
    );
  });
});
