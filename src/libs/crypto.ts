// src/libs/crypto.ts
// ============================================================================
// Passwort-Hashing (argon2id) & Opaque-Token-Hashes
// ----------------------------------------------------------------------------
// - hashPassword(): argon2id mit festen Parametern
// - generatePassword(): Zufallspasswort fuer Nutzer, die ueber /auth/otp
//   implizit angelegt werden (Login nur per OTP moeglich)
// - hashOpaqueToken(): sha256 fuer Bestaetigungs- und Refresh-Tokens
// ============================================================================

import { createHash, randomBytes } from "node:crypto";
import argon2 from "argon2";

// ---------------------------------------------------------------------------
// Passwort hashen
// ---------------------------------------------------------------------------

export async function hashPassword(plain: string): Promise<string> {
  return argon2.hash(plain, {
    type: argon2.argon2id,
    memoryCost: 2 ** 16, // 64 MiB
    timeCost: 3,
    parallelism: 1,
  });
}

// 48 Byte → 64 Zeichen base64url
export function generatePassword(): string {
  return randomBytes(48).toString("base64url");
}

// ---------------------------------------------------------------------------
// Opaque-Token hashen (Bestaetigung / Refresh)
// ---------------------------------------------------------------------------

export function hashOpaqueToken(token: string): string {
  return createHash("sha256").update(token, "utf8").digest("hex");
}
