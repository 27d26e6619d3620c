import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildTestApp } from "../support/test-app.js";
import type { InMemoryUserStore } from "../support/in-memory-user-store.js";

describe("Health, metrics and error surface", () => {
  let app: FastifyInstance;
  let store: InMemoryUserStore;

  beforeAll(async () => {
    ({ app, store } = await buildTestApp());
  });

  afterAll(async () => {
    await app.close();
  });

  it("reports liveness", async () => {
    const res = await app.inject({ method: "GET", url: "/health/live" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "alive" });
  });

  it("reports the store in the aggregate and readiness", async () => {
    const health = await app.inject({ method: "GET", url: "/health" });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({
      status: "ok",
      ready: true,
      services: { db: "ok", redis: "disabled" },
    });

    const ready = await app.inject({ method: "GET", url: "/health/ready" });
    expect(ready.statusCode).toBe(200);
    expect(ready.json()).toEqual({ status: "ready", ready: true });
  });

  it("degrades when the store is down", async () => {
    store.unavailable = true;
    try {
      const health = await app.inject({ method: "GET", url: "/health" });
      expect(health.statusCode).toBe(503);
      expect(health.json()).toMatchObject({ status: "down", services: { db: "down" } });

      const ready = await app.inject({ method: "GET", url: "/health/ready" });
      expect(ready.statusCode).toBe(503);

      const login = await app.inject({
        method: "POST",
        url: "/auth/login",
        payload: { username: "anyone", password: "anything" },
      });
      expect(login.statusCode).toBe(503);
      expect(login.headers["retry-after"]).toBe("5");
      expect(login.json()).toEqual({
        status: 503,
        error: { code: "STORE_UNAVAILABLE", message: "Service temporarily unavailable." },
      });
    } finally {
      store.unavailable = false;
    }
  });

  it("exposes prometheus metrics", async () => {
    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/plain; version=0.0.4; charset=utf-8");
    expect(res.body).toContain("# TYPE http_requests_total counter");
    expect(res.body).toContain('http_requests_total{method="GET",route="/health/live",status="200"} 1');
  });

  it("sets security and request-id headers", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/health/live",
      headers: { "x-request-id": "req-123" },
    });

    expect(res.headers["x-request-id"]).toBe("req-123");
    expect(res.headers["x-content-type-options"]).toBe("nosniff");
    expect(res.headers["cache-control"]).toBe("no-store");
  });

  it("answers unknown routes with the error envelope", async () => {
    const res = await app.inject({ method: "GET", url: "/nope" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ status: 404, error: { code: "NOT_FOUND" } });
  });
});

describe("Configurable surfaces and rate limiting", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    ({ app } = await buildTestApp({
      METRICS_ENABLED: "false",
      OPENAPI_ENABLED: "false",
      RATE_LIMIT_AUTH_MAX: "2",
    }));
  });

  afterAll(async () => {
    await app.close();
  });

  it("hides disabled endpoints", async () => {
    expect((await app.inject({ method: "GET", url: "/metrics" })).statusCode).toBe(404);
    expect((await app.inject({ method: "GET", url: "/openapi.json" })).statusCode).toBe(404);
  });

  it("throttles credential endpoints per route", async () => {
    const attempt = () =>
      app.inject({ method: "POST", url: "/auth/login", payload: { username: "x", password: "y" } });

    expect((await attempt()).statusCode).toBe(401);
    expect((await attempt()).statusCode).toBe(401);

    const limited = await attempt();
    expect(limited.statusCode).toBe(429);
    expect(limited.json()).toMatchObject({ status: 429, error: { code: "RATE_LIMITED" } });

    // andere Route, eigener Zähler
    const refresh = await app.inject({ method: "POST", url: "/auth/refresh", payload: { refresh_token: "x" } });
    expect(refresh.statusCode).toBe(401);
  });
});
