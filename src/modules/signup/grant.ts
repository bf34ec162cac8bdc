// src/modules/signup/grant.ts
// ============================================================================
// Access-Grant nach vollstaendiger Bestaetigung
// ----------------------------------------------------------------------------
// - Access-Token: JWT (libs/jwt.ts), Audience = aud des Nutzers
// - Refresh-Token: opaque, nur der Hash landet in auth.tokens
// ============================================================================

import { randomBytes } from "node:crypto";
import { hashOpaqueToken } from "../../libs/crypto.js";
import type { AccessTokenSigner } from "../../libs/jwt.js";
import type { RefreshTokenRepository } from "../tokens/types.js";
import { toPublicUser, type UserRow } from "../users/types.js";
import type { AccessGrant } from "./types.js";

export async function issueAccessGrant(
  tokens: RefreshTokenRepository,
  signer: AccessTokenSigner,
  user: UserRow,
  opts: { refreshTtlSec: number; now: Date },
): Promise<AccessGrant> {
  const { token, exp } = await signer.sign(
    user.id,
    {
      tenantId: user.tenant_id,
      audience: user.aud,
      role: user.role,
      email: user.email,
      phone: user.phone,
    },
    opts.now,
  );

  const refreshToken = randomBytes(32).toString("base64url");
  await tokens.create({
    userId: user.id,
    tokenHash: hashOpaqueToken(refreshToken),
    expiresAt: new Date(opts.now.getTime() + opts.refreshTtlSec * 1000),
    now: opts.now,
  });

  return {
    accessToken: token,
    tokenType: "bearer",
    expiresIn: signer.ttlSec,
    expiresAt: exp,
    refreshToken,
    user: toPublicUser(user),
  };
}
