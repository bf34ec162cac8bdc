// Baut SignupDeps fuer Unit- und HTTP-Tests: In-Memory-Store, aufzeichnende
// Gateways, feste Uhr, schnelles Passwort-"Hashing".

import type { AppDeps } from "../../app.js";
import type { SignupConfig } from "../../libs/env.js";
import { createAccessTokenSigner } from "../../libs/jwt.js";
import { createLogger } from "../../libs/logger.js";
import { createSecretCipher } from "../../libs/secret-cipher.js";
import type { SignupDeps } from "../../modules/signup/types.js";
import { RecordingGateway, TestClock } from "./fakes.js";
import { MemoryStore } from "./memory-store.js";

export const TENANT_ID = "00000000-0000-4000-8000-000000000001";
export const OTHER_TENANT_ID = "00000000-0000-4000-8000-000000000002";
export const TEST_PASSPHRASE = "test-passphrase-0123456789abcdef";
export const TEST_JWT_SECRET = "test-secret";
export const TEST_ISSUER = "signup-otp-test";
export const START = new Date("2024-01-01T00:00:00.000Z");

export function testConfig(overrides: Partial<SignupConfig> = {}): SignupConfig {
  return {
    signupDisabled: false,
    passwordMinLength: 8,
    defaultRole: "authenticated",
    defaultAudience: "authenticated",
    otp: { issuer: TEST_ISSUER, periodSec: 30, digits: 6 },
    cooldownSec: { email: 60, phone: 60 },
    autoconfirm: { email: false, phone: false },
    deliveryTimeoutMs: 1_000,
    confirmationUrlBase: "http://localhost:8080/verify",
    smsTemplate: "Your code is {code}",
    refreshTtlSec: 3_600,
    hookEvents: ["validate", "signup", "login"],
    ...overrides,
  };
}

export type TestHarness = {
  deps: SignupDeps;
  store: MemoryStore;
  email: RecordingGateway;
  phone: RecordingGateway;
  clock: TestClock;
};

export function createTestHarness(overrides: Partial<SignupConfig> = {}): TestHarness {
  const store = new MemoryStore();
  const email = new RecordingGateway("email");
  const phone = new RecordingGateway("phone");
  const clock = new TestClock(START);

  const deps: SignupDeps = {
    uow: store,
    cipher: createSecretCipher({ passphrase: TEST_PASSPHRASE }),
    delivery: { email, phone },
    tokens: createAccessTokenSigner({ secret: TEST_JWT_SECRET, issuer: TEST_ISSUER, ttlSec: 900 }),
    hashPassword: async (plain) => `hashed:${plain}`,
    config: testConfig(overrides),
    log: createLogger("silent"),
    now: clock.now,
  };

  return { deps, store, email, phone, clock };
}

export function createTestAppDeps(harness: TestHarness, dbOk = true): AppDeps {
  return {
    signup: harness.deps,
    health: {
      db: async () => (dbOk ? { ok: true } : { ok: false, error: "connection refused" }),
      smtp: async () => ({ ok: true }),
    },
    close: async () => undefined,
  };
}
