import { describe, expect, it } from "vitest";
import { checkCooldown } from "../../modules/totp-secrets/service.js";

const NOW = new Date("2024-01-01T00:10:00.000Z");

function secondsBefore(seconds: number): Date {
  return new Date(NOW.getTime() - seconds * 1000);
}

describe("checkCooldown", () => {
  it("allows the first issuance", () => {
    expect(checkCooldown(null, NOW, 60)).toEqual({ allowed: true });
  });

  it("throttles inside the cooldown and reports the remaining seconds", () => {
    expect(checkCooldown(secondsBefore(59), NOW, 60)).toEqual({ allowed: false, retryAfterSec: 1 });
    expect(checkCooldown(secondsBefore(0.5), NOW, 60)).toEqual({ allowed: false, retryAfterSec: 60 });
  });

  it("allows again once the cooldown has fully elapsed", () => {
    expect(checkCooldown(secondsBefore(60), NOW, 60)).toEqual({ allowed: true });
    expect(checkCooldown(secondsBefore(3600), NOW, 60)).toEqual({ allowed: true });
  });

  it("caps retryAfterSec at the cooldown for timestamps in the future", () => {
    expect(checkCooldown(secondsBefore(-10), NOW, 60)).toEqual({ allowed: false, retryAfterSec: 60 });
  });

  it("never throttles with a zero cooldown", () => {
    expect(checkCooldown(NOW, NOW, 0)).toEqual({ allowed: true });
  });
});
