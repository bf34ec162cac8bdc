// tests/http/health.test.ts
import { describe, it, expect, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../../app.js";
import { resetMetrics } from "../../libs/metrics.js";
import { TENANT_ID, createTestAppDeps, createTestHarness } from "../support/deps.js";

let app: FastifyInstance;

async function startApp(dbOk: boolean) {
  app = await buildApp({ logger: false, deps: createTestAppDeps(createTestHarness(), dbOk) });
  await app.ready();
}

describe("Health endpoints", () => {
  afterEach(async () => {
    await app.close();
  });

  it("GET /healthz reports liveness", async () => {
    await startApp(true);

    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe("alive");
  });

  it("GET /health aggregates db and smtp", async () => {
    await startApp(true);

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe("ok");
    expect(body.services).toEqual({ db: "ok", smtp: "ok" });
  });

  it("GET /health answers 503 when the database is down", async () => {
    await startApp(false);

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(503);
    expect(res.json().status).toBe("down");
    expect(res.json().services.db).toBe("down");
  });

  it("GET /readyz reflects database health", async () => {
    await startApp(false);

    const res = await app.inject({ method: "GET", url: "/readyz" });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({
      status: "degraded",
      db: { ok: false, error: "connection refused" },
      ready: false,
    });
  });

  it("GET /readyz is ready with a healthy database", async () => {
    await startApp(true);

    const res = await app.inject({ method: "GET", url: "/readyz" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ready", ready: true });
  });

  it("GET /metrics exposes issuance counters", async () => {
    resetMetrics();
    await startApp(true);
    await app.inject({
      method: "POST",
      url: "/auth/signup",
      headers: { "x-tenant-id": TENANT_ID },
      payload: { email: "alice@example.test", password: "correct-horse" },
    });

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/plain; version=0.0.4; charset=utf-8");
    const lines = res.body.split("\n");
    expect(lines).toContain('otp_issued_total{channel="email"} 1');
    expect(lines).toContain('signup_total{outcome="pending"} 1');
    expect(lines).toContain("# TYPE otp_issued_total counter");
  });

  it("unknown routes answer 404", async () => {
    await startApp(true);

    const res = await app.inject({ method: "GET", url: "/nope" });

    expect(res.statusCode).toBe(404);
    expect(res.json().error).toEqual({ code: "NOT_FOUND", message: "Route GET:/nope not found" });
    expect(res.headers["x-content-type-options"]).toBe("nosniff");
  });
});
