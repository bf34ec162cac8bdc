// src/libs/jwt.ts
// ============================================================================
// JWT-Hilfen (JOSE)
// ----------------------------------------------------------------------------
// Design:
// - HS256 Symmetric Key (JWT_SECRET_ACTIVE via env.ts, secrets-first)
// - JTI pro Token
// - typ="access" + tenant_id im Payload
// - Audience kommt pro Request (X-JWT-AUD) und wird mitsigniert
// ============================================================================

import crypto from "node:crypto";
import { SignJWT, jwtVerify, type JWTPayload } from "jose";
import { ConfigurationError } from "./errors.js";

export interface AccessTokenPayload extends JWTPayload {
  sub: string;
  jti: string;
  exp: number;
  iat: number;
  typ: "access";
  tenant_id: string;
  role?: string;
  email?: string;
  phone?: string;
}

export type AccessTokenClaims = {
  tenantId: string;
  audience: string;
  role?: string;
  email?: string | null;
  phone?: string | null;
};

export interface AccessTokenSigner {
  readonly ttlSec: number;
  sign(sub: string, claims: AccessTokenClaims, now?: Date): Promise<{ token: string; jti: string; exp: number }>;
  verify(token: string, audience: string): Promise<AccessTokenPayload>;
}

export function createAccessTokenSigner(opts: {
  secret: string | undefined;
  issuer: string;
  ttlSec: number;
}): AccessTokenSigner {
  if (!opts.secret) {
    // Kein unsicherer Fallback (auch nicht in dev/test)
    throw new ConfigurationError("JWT secret is not configured");
  }
  const key = new TextEncoder().encode(opts.secret);

  return {
    ttlSec: opts.ttlSec,

    async sign(sub, claims, now = new Date()) {
      const jti = crypto.randomUUID();
      const iat = Math.floor(now.getTime() / 1000);
      const exp = iat + opts.ttlSec;

      const token = await new SignJWT({
        typ: "access",
        tenant_id: claims.tenantId,
        ...(claims.role ? { role: claims.role } : {}),
        ...(claims.email ? { email: claims.email } : {}),
        ...(claims.phone ? { phone: claims.phone } : {}),
      })
        .setProtectedHeader({ alg: "HS256" })
        .setSubject(sub)
        .setJti(jti)
        .setIssuedAt(iat)
        .setExpirationTime(exp)
        .setIssuer(opts.issuer)
        .setAudience(claims.audience)
        .sign(key);

      return { token, jti, exp };
    },

    async verify(token, audience) {
      const { payload } = await jwtVerify(token, key, { issuer: opts.issuer, audience });

      if (payload.typ !== "access") throw new Error("invalid_token_type");
      if (typeof payload.sub !== "string") throw new Error("sub_missing");
      if (typeof payload.jti !== "string") throw new Error("jti_missing");
      if (typeof payload.exp !== "number" || typeof payload.iat !== "number") {
        throw new Error("exp_missing");
      }
      if (typeof payload.tenant_id !== "string") throw new Error("tenant_id_missing");

      return {
        iss: payload.iss,
        aud: payload.aud,
        sub: payload.sub,
        jti: payload.jti,
        exp: payload.exp,
        iat: payload.iat,
        typ: "access",
        tenant_id: payload.tenant_id,
        ...(typeof payload.role === "string" ? { role: payload.role } : {}),
        ...(typeof payload.email === "string" ? { email: payload.email } : {}),
        ...(typeof payload.phone === "string" ? { phone: payload.phone } : {}),
      };
    },
  };
}
