import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { closeTestApp, createTestApp, type TestApp } from "../../../helpers/app.js";
import { item } from "../../../helpers/sparql.js";

describe("server/routes/stats", () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await closeTestApp(ctx);
  });

  it("should answer the health check", async () => {
    const response = await ctx.app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
  });

  it("should return zero counts on an empty store", async () => {
    const response = await ctx.app.inject({
      method: "GET",
      url: "/api/v1/stats",
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().data).toMatchObject({
      provincias: 0,
      parques: 0,
      sitios: 0,
      plazas: 0,
      total: 0,
    });
  });

  it("should reflect a completed sync", async () => {
    await ctx.app.inject({ method: "GET", url: "/api/v1/stats" });
    ctx.sources.wikidata.set("natural-areas", [
      item("Q1", { itemLabel: "Parque Nacional Cotopaxi" }),
    ]);

    await ctx.app.inject({
      method: "POST",
      url: "/api/v1/sync/parques",
      payload: {},
    });
    const response = await ctx.app.inject({
      method: "GET",
      url: "/api/v1/stats",
    });

    expect(response.json().data).toMatchObject({ parques: 1, total: 1 });
  });

  it("should publish the OpenAPI document", async () => {
    const response = await ctx.app.inject({
      method: "GET",
      url: "/openapi.json",
    });

    expect(response.statusCode).toBe(200);
    const document = response.json();
    expect(document.info.title).toBe("Ecuador Linked Data API");
    expect(document.servers).toEqual([{ url: "http://localhost:3000" }]);
    expect(Object.keys(document.paths)).toEqual(
      expect.arrayContaining([
        "/health",
        "/api/v1/stats",
        "/api/v1/sync/status",
        "/api/v1/sync/{kind}",
      ])
    );
  });

  it("should answer 404 for unknown routes", async () => {
    const response = await ctx.app.inject({
      method: "GET",
      url: "/api/v1/ciudades",
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({
      error: "NOT_FOUND",
      message: "Route GET /api/v1/ciudades not found",
    });
  });
});
