// src/libs/otp.ts
// ============================================================================
// OTP-Engine (TOTP, RFC 6238 via otpauth)
// ----------------------------------------------------------------------------
// - currentCode(): deterministisch aus Secret + Zeitfenster, keine I/O
// - generateTotpKey(): neues Secret + otpauth://-URL (wird verschluesselt
//   gespeichert, siehe modules/totp-secrets)
// - Telefonnummern: E.164-Pruefung + Normalisierung
// ============================================================================

import { randomBytes } from "node:crypto";
import * as OTPAuth from "otpauth";

const ALGORITHM = "SHA256";
const SECRET_SIZE_BYTES = 20;

const E164_RE = /^[1-9]\d{1,14}$/;

export type TotpKey = {
  /** base32 */
  secret: string;
  /** otpauth://totp/<issuer>:<account>?secret=...&algorithm=SHA256... */
  url: string;
};

function resolveSecret(secretOrUrl: string): OTPAuth.Secret {
  if (secretOrUrl.startsWith("otpauth://")) {
    return OTPAuth.URI.parse(secretOrUrl).secret;
  }
  return OTPAuth.Secret.fromBase32(secretOrUrl);
}

/**
 * Code fuer das Zeitfenster floor(timestamp / period).
 * `secret` ist entweder ein base32-Secret oder eine komplette otpauth://-URL.
 */
export function currentCode(
  secret: string,
  timestamp: Date | number,
  period: number,
  digits: number,
): string {
  const ts = timestamp instanceof Date ? timestamp.getTime() : timestamp;

  return OTPAuth.TOTP.generate({
    secret: resolveSecret(secret),
    algorithm: ALGORITHM,
    digits,
    period,
    timestamp: ts,
  });
}

export function generateTotpKey(opts: {
  issuer: string;
  accountName: string;
  period: number;
  digits: number;
}): TotpKey {
  const totp = new OTPAuth.TOTP({
    issuer: opts.issuer,
    label: opts.accountName,
    algorithm: ALGORITHM,
    digits: opts.digits,
    period: opts.period,
    secret: new OTPAuth.Secret({ size: SECRET_SIZE_BYTES }),
  });

  return {
    secret: totp.secret.base32,
    url: totp.toString(),
  };
}

// ---------------------------------------------------------------------------
// Telefonnummern
// ---------------------------------------------------------------------------

export function validatePhoneFormat(phone: string): boolean {
  return typeof phone === "string" && E164_RE.test(phone);
}

export function normalizePhone(phone: string): string {
  return phone.trim().replace(/^\+/, "").replace(/\s+/g, "");
}

// ---------------------------------------------------------------------------
// Zufaellige Tokens (E-Mail-Bestaetigung)
// ---------------------------------------------------------------------------

export function secureToken(): string {
  return randomBytes(16).toString("base64url");
}
