import Fastify, { type FastifyInstance } from "fastify";
import { describe, it, expect, beforeAll, afterAll } from "vitest";

import {
  PersistenceError,
  SourceUnavailableError,
} from "../../../../src/errors.js";
import {
  errorHandler,
  SyncInProgressError,
} from "../../../../src/server/plugins/error-handler.js";

describe("server/plugins/error-handler", () => {
  // ============================================================================
  // Custom Error Classes Tests
  // ============================================================================

  describe("SyncInProgressError", () => {
    it("should name the locked entity type", () => {
      const error = new SyncInProgressError("parques");

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("SyncInProgressError");
      expect(error.message).toBe("A parques sync is already running");
      expect(error.code).toBe("SYNC_IN_PROGRESS");
      expect(error.statusCode).toBe(409);
    });
  });

  // ============================================================================
  // Error Handler Plugin Tests
  // ============================================================================

  describe("errorHandler plugin", () => {
    let app: FastifyInstance;

    beforeAll(async () => {
      app = Fastify({ logger: false });
      await app.register(errorHandler);

      // Test routes that throw different errors
      app.get("/sync-in-progress", async () => {
        throw new SyncInProgressError("sitios");
      });

      app.get("/persistence-error", async () => {
        throw new PersistenceError("Writing 3 plazas records failed");
      });

      app.get("/source-error", async () => {
        throw new SourceUnavailableError("dbpedia", "HTTP 503");
      });

      app.get("/generic-error", async () => {
        throw new Error("Something went wrong");
      });

      app.get("/fastify-404", async () => {
        throw Object.assign(new Error("Not found"), { statusCode: 404 });
      });

      app.get("/fastify-validation", async () => {
        throw Object.assign(new Error("Validation failed"), {
          validation: [{ keyword: "type", message: "must be string" }],
        });
      });

      await app.ready();
    });

    afterAll(async () => {
      await app.close();
    });

    it("should answer 409 for a sync in progress", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/sync-in-progress",
      });

      expect(response.statusCode).toBe(409);
      const body = response.json();
      expect(body.error).toBe("SYNC_IN_PROGRESS");
      expect(body.message).toBe("A sitios sync is already running");
      expect(body.requestId).toBeDefined();
    });

    it("should answer 503 when the store cannot be written", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/persistence-error",
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({
        error: "PERSISTENCE_FAILED",
        message: "Writing 3 plazas records failed",
      });
    });

    it("should answer 502 when an endpoint is unavailable", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/source-error",
      });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toMatchObject({
        error: "SOURCE_UNAVAILABLE",
        message: "HTTP 503",
      });
    });

    it("should handle generic errors with 500 status", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/generic-error",
      });

      expect(response.statusCode).toBe(500);
      const body = response.json();
      expect(body.error).toBe("INTERNAL_ERROR");
      expect(body.message).toBe("An unexpected error occurred");
      expect(body.requestId).toBeDefined();
    });

    it("should handle Fastify 404 errors", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/fastify-404",
      });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.error).toBe("NOT_FOUND");
      expect(body.message).toBe("Not found");
      expect(body.details).toBeUndefined();
      expect(body.requestId).toBeDefined();
    });

    it("should handle Fastify validation errors", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/fastify-validation",
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error).toBe("VALIDATION_ERROR");
      expect(body.message).toBe("Invalid request parameters");
      expect(body.details).toBeDefined();
      expect(body.details.validation).toBeDefined();
    });

    it("should handle unknown routes with 404", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/unknown-route",
      });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.error).toBe("NOT_FOUND");
      expect(body.message).toContain("Route GET /unknown-route not found");
      expect(body.requestId).toBeDefined();
    });

    it("should handle unknown POST routes with 404", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/unknown-route",
      });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.error).toBe("NOT_FOUND");
      expect(body.message).toContain("Route POST /unknown-route not found");
    });
  });
});
