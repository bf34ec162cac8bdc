// tests/http/signup.test.ts
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../../app.js";
import { readCounter, resetMetrics } from "../../libs/metrics.js";
import { START, TENANT_ID, createTestAppDeps, createTestHarness, type TestHarness } from "../support/deps.js";

const ALICE = {
  email: "alice@example.test",
  phone: "+15555550123",
  password: "correct-horse",
};

let app: FastifyInstance;
let h: TestHarness;

async function startApp(harness: TestHarness) {
  h = harness;
  app = await buildApp({ logger: false, deps: createTestAppDeps(harness) });
  await app.ready();
}

function postSignup(payload: Record<string, unknown>, headers: Record<string, string> = {}) {
  return app.inject({
    method: "POST",
    url: "/auth/signup",
    headers: { "x-tenant-id": TENANT_ID, ...headers },
    payload,
  });
}

describe("POST /auth/signup", () => {
  beforeEach(async () => {
    resetMetrics();
    await startApp(createTestHarness());
  });

  afterEach(async () => {
    await app.close();
  });

  it("returns the pending user and sends both confirmations", async () => {
    const res = await postSignup(ALICE);

    expect(res.statusCode).toBe(200);
    expect(res.headers["cache-control"]).toBe("no-store");

    const body = res.json();
    expect(body.email).toBe("alice@example.test");
    expect(body.phone).toBe("15555550123");
    expect(body.aud).toBe("authenticated");
    expect(body.email_confirmed_at).toBeNull();
    expect(body.confirmation_sent_at).toBe(START.toISOString());
    expect(body.phone_confirmation_sent_at).toBe(START.toISOString());
    expect(body.app_metadata).toEqual({ provider: "phone", providers: ["email", "phone"] });
    expect(body).not.toHaveProperty("encrypted_password");
    expect(body).not.toHaveProperty("access_token");

    expect(h.email.sent).toHaveLength(1);
    expect(h.phone.sent).toHaveLength(1);
    expect(readCounter("signup_total", { outcome: "pending" })).toBe(1);
    expect(readCounter("otp_issued_total", { channel: "email" })).toBe(1);
    expect(readCounter("otp_issued_total", { channel: "phone" })).toBe(1);
  });

  it("uses the audience from X-JWT-AUD", async () => {
    const res = await postSignup(ALICE, { "x-jwt-aud": "mobile" });

    expect(res.statusCode).toBe(200);
    expect(res.json().aud).toBe("mobile");
    expect(h.store.tables.users[0]?.aud).toBe("mobile");
  });

  it("answers 429 with Retry-After inside the cooldown", async () => {
    await postSignup(ALICE);

    const res = await postSignup(ALICE);

    expect(res.statusCode).toBe(429);
    expect(res.headers["retry-after"]).toBe("60");
    expect(res.json()).toEqual({
      status: 429,
      error: {
        code: "THROTTLED",
        message: "For security purposes, you can only request this after 60 seconds",
      },
      details: { retry_after_sec: 60 },
    });
    expect(readCounter("otp_throttled_total", { channel: "email" })).toBe(1);
    expect(readCounter("signup_total", { outcome: "rejected" })).toBe(1);
  });

  it("answers 502 when the confirmation cannot be delivered", async () => {
    h.phone.failWith = new Error("provider down");

    const res = await postSignup(ALICE);

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({
      status: 502,
      error: { code: "DELIVERY_FAILED", message: "Error sending confirmation message." },
    });
    expect(readCounter("otp_delivery_failed_total", { channel: "phone" })).toBe(1);
    expect(h.store.tables.users).toEqual([]);
  });

  it("answers 422 for a malformed payload", async () => {
    const res = await postSignup({ email: "alice@example.test" });

    expect(res.statusCode).toBe(422);
    expect(res.json().error).toEqual({ code: "INVALID_FORMAT", message: "Invalid signup payload." });
  });

  it("answers 422 for an invalid phone number", async () => {
    const res = await postSignup({ ...ALICE, phone: "abc" });

    expect(res.statusCode).toBe(422);
    expect(res.json().error).toEqual({
      code: "INVALID_FORMAT",
      message: "Invalid phone number format (E.164 required)",
    });
  });

  it("answers 422 when the identifiers belong to different accounts", async () => {
    await postSignup(ALICE);
    h.clock.advance(60);

    const res = await postSignup({ ...ALICE, phone: "15555550999" });

    expect(res.statusCode).toBe(422);
    expect(res.json().error.code).toBe("IDENTIFIER_MISMATCH");
  });

  it("answers 400 without a tenant header", async () => {
    const res = await app.inject({ method: "POST", url: "/auth/signup", payload: ALICE });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({
      code: "INVALID_FORMAT",
      message: "Missing or invalid X-Tenant-Id header.",
    });
    expect(h.store.commits).toBe(0);
  });

  it("hides persistence details behind a generic 500", async () => {
    h.store.failOn("users.create");

    const res = await postSignup(ALICE);

    expect(res.statusCode).toBe(500);
    expect(res.json().error).toEqual({
      code: "INTERNAL_PERSISTENCE_ERROR",
      message: "Internal server error.",
    });
  });

  it("reports module health", async () => {
    const res = await app.inject({ method: "GET", url: "/auth/signup/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ module: "signup", healthy: true, db: { ok: true } });
  });
});

describe("POST /auth/signup with instance settings", () => {
  afterEach(async () => {
    await app.close();
  });

  it("returns an access grant", async () => {
    resetMetrics();
    await startApp(createTestHarness({ autoconfirm: { email: true, phone: true } }));

    const res = await postSignup(ALICE);

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(typeof body.access_token).toBe("string");
    expect(typeof body.refresh_token).toBe("string");
    expect(body.token_type).toBe("bearer");
    expect(body.expires_in).toBe(900);
    expect(body.expires_at).toBe(Math.floor(START.getTime() / 1000) + 900);
    expect(body.user.email_confirmed_at).toBe(START.toISOString());
    expect(body.user.phone_confirmed_at).toBe(START.toISOString());

    expect(h.email.sent).toEqual([]);
    expect(h.phone.sent).toEqual([]);
    expect(readCounter("signup_total", { outcome: "granted" })).toBe(1);
  });

  it("answers 400 for an address that is already confirmed", async () => {
    await startApp(createTestHarness({ autoconfirm: { email: true, phone: true } }));
    await postSignup(ALICE);

    const res = await postSignup(ALICE);

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({
      code: "ALREADY_REGISTERED",
      message: "A user with this email address has already been registered",
    });
  });

  it("answers 403 when signups are disabled", async () => {
    await startApp(createTestHarness({ signupDisabled: true }));

    const res = await postSignup(ALICE);

    expect(res.statusCode).toBe(403);
    expect(res.json().error).toEqual({
      code: "SIGNUP_DISABLED",
      message: "Signups not allowed for this instance",
    });
  });
});
