import { Value } from "@sinclair/typebox/value";

import { SourceUnavailableError, errorMessage } from "../errors.js";
import { sparqlLogger } from "../logger.js";
import { SparqlResponseSchema } from "../types/index.js";

import type { SparqlBinding } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface SparqlClientOptions {
  /** Source name used in logs and errors */
  name: string;
  endpoint: string;
  timeoutMs: number;
  /** Minimum spacing between two requests to the same endpoint */
  minIntervalMs: number;
  userAgent: string;
  fetch?: typeof fetch;
}

export type QueryOutcome =
  | { ok: true; bindings: SparqlBinding[]; durationMs: number }
  | { ok: false; error: SourceUnavailableError };

// ============================================================================
// Client
// ============================================================================

/**
 * Minimal SPARQL-over-HTTP client.
 *
 * `query` never rejects: transport and protocol problems come back as a
 * failed outcome so callers can degrade the facet to empty.
 */
export class SparqlClient {
  private lastRequestTime = 0;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: SparqlClientOptions) {
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  get name(): string {
    return this.options.name;
  }

  get endpoint(): string {
    return this.options.endpoint;
  }

  async query(text: string): Promise<QueryOutcome> {
    await this.throttle();

    const { name, endpoint, timeoutMs, userAgent } = this.options;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    sparqlLogger.debug({ source: name, endpoint }, "Sending SPARQL query");
    sparqlLogger.trace({ source: name, query: text }, "SPARQL query text");

    const startTime = performance.now();

    try {
      const response = await this.fetchImpl(endpoint, {
        method: "POST",
        headers: {
          Accept: "application/sparql-results+json",
          "Content-Type": "application/x-www-form-urlencoded",
          "User-Agent": userAgent,
        },
        body: new URLSearchParams({ query: text }).toString(),
        signal: controller.signal,
      });

      if (!response.ok) {
        return this.failure(
          `${name} responded ${String(response.status)} ${response.statusText}`
        );
      }

      const payload: unknown = await response.json();
      if (!Value.Check(SparqlResponseSchema, payload)) {
        return this.failure(`${name} returned a malformed SPARQL result`);
      }

      const durationMs = Math.round(performance.now() - startTime);
      sparqlLogger.debug(
        {
          source: name,
          rows: payload.results.bindings.length,
          duration: `${String(durationMs)}ms`,
        },
        "Received SPARQL response"
      );

      return { ok: true, bindings: payload.results.bindings, durationMs };
    } catch (error) {
      const message = controller.signal.aborted
        ? `${name} query timed out after ${String(timeoutMs)}ms`
        : `${name} request failed: ${errorMessage(error)}`;
      return this.failure(message, error);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Claim the next send slot before waiting, so concurrent callers queue up
   * one interval apart.
   */
  private async throttle(): Promise<void> {
    const slot = Math.max(
      Date.now(),
      this.lastRequestTime + this.options.minIntervalMs
    );
    this.lastRequestTime = slot;

    const waitTime = slot - Date.now();
    if (waitTime > 0) {
      sparqlLogger.debug(
        { source: this.options.name, waitTime },
        "Rate limiting: waiting before request"
      );
      await new Promise((resolve) => setTimeout(resolve, waitTime));
    }
  }

  private failure(message: string, cause?: unknown): QueryOutcome {
    sparqlLogger.warn({ source: this.options.name }, message);
    return {
      ok: false,
      error: new SourceUnavailableError(this.options.name, message, { cause }),
    };
  }
}
