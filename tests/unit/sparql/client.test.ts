import { describe, it, expect, vi } from "vitest";

import { SourceUnavailableError } from "../../../src/errors.js";
import { SparqlClient } from "../../../src/sparql/client.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/sparql-results+json" },
  });
}

function createClient(fetchImpl: typeof fetch, timeoutMs = 1000): SparqlClient {
  return new SparqlClient({
    name: "wikidata",
    endpoint: "https://sparql.example.test/sparql",
    timeoutMs,
    minIntervalMs: 0,
    userAgent: "test-agent/1.0",
    fetch: fetchImpl,
  });
}

describe("sparql/client", () => {
  it("should POST the query as a form with SPARQL JSON headers", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockResolvedValue(
      jsonResponse({ head: { vars: [] }, results: { bindings: [] } })
    );

    await createClient(fetchMock).query("SELECT ?item WHERE {}");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://sparql.example.test/sparql");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      Accept: "application/sparql-results+json",
      "Content-Type": "application/x-www-form-urlencoded",
      "User-Agent": "test-agent/1.0",
    });
    expect(init?.body).toBe("query=SELECT+%3Fitem+WHERE+%7B%7D");
  });

  it("should space concurrent queries by the minimum interval", async () => {
    const sentAt: number[] = [];
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(() => {
      sentAt.push(Date.now());
      return Promise.resolve(
        jsonResponse({ head: { vars: [] }, results: { bindings: [] } })
      );
    });
    const client = new SparqlClient({
      name: "wikidata",
      endpoint: "https://sparql.example.test/sparql",
      timeoutMs: 1000,
      minIntervalMs: 50,
      userAgent: "test-agent/1.0",
      fetch: fetchMock,
    });

    const outcomes = await Promise.all([
      client.query("SELECT * {}"),
      client.query("SELECT * {}"),
      client.query("SELECT * {}"),
    ]);

    expect(outcomes.every((outcome) => outcome.ok)).toBe(true);
    expect(sentAt).toHaveLength(3);
    const [first = 0, , last = 0] = sentAt;
    expect(last - first).toBeGreaterThanOrEqual(95);
  });

  it("should return the bindings of a valid result", async () => {
    const bindings = [
      {
        item: { type: "uri", value: "http://www.wikidata.org/entity/Q14594" },
        itemLabel: { type: "literal", value: "Guayas", "xml:lang": "es" },
      },
    ];
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockResolvedValue(
      jsonResponse({ head: { vars: ["item"] }, results: { bindings } })
    );

    const outcome = await createClient(fetchMock).query("SELECT * {}");

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.bindings).toEqual(bindings);
    }
  });

  it("should report non-2xx responses as unavailable", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockResolvedValue(
      new Response("busy", { status: 503, statusText: "Service Unavailable" })
    );

    const outcome = await createClient(fetchMock).query("SELECT * {}");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(SourceUnavailableError);
      expect(outcome.error.source).toBe("wikidata");
      expect(outcome.error.message).toBe(
        "wikidata responded 503 Service Unavailable"
      );
    }
  });

  it("should reject payloads that are not SPARQL results", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockResolvedValue(jsonResponse({ rows: [] }));

    const outcome = await createClient(fetchMock).query("SELECT * {}");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe(
        "wikidata returned a malformed SPARQL result"
      );
    }
  });

  it("should report unparseable bodies as request failures", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockResolvedValue(new Response("<html>oops</html>"));

    const outcome = await createClient(fetchMock).query("SELECT * {}");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toMatch(/^wikidata request failed: /);
    }
  });

  it("should report network errors without throwing", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));

    const outcome = await createClient(fetchMock).query("SELECT * {}");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe(
        "wikidata request failed: fetch failed"
      );
      expect(outcome.error.cause).toBeInstanceOf(TypeError);
    }
  });

  it("should abort and report requests that exceed the timeout", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            reject(new Error("aborted"));
          });
        })
    );

    const outcome = await createClient(fetchMock, 20).query("SELECT * {}");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe("wikidata query timed out after 20ms");
    }
  });
});
