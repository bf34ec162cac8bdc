// src/modules/signup/routes.ts
// ============================================================================
// Signup-Routen
// ----------------------------------------------------------------------------
// POST /auth/signup         → ausstehende Bestaetigung (User) oder Access-Grant
// GET  /auth/signup/health  → Modul-Health (DB)
//
// Fachliche Fehler (AuthCoreError) wirft der Service, das Mapping auf HTTP
// uebernimmt der zentrale Error-Handler in app.ts.
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { sendApiError } from "../../libs/error-response.js";
import { recordOtpIssued, recordSignup } from "../../libs/metrics.js";
import type { PublicUser } from "../users/types.js";
import { signup } from "./service.js";
import type { AccessGrant, SignupDeps, SignupResult } from "./types.js";

export type HealthCheck = () => Promise<{ ok: boolean; error?: string }>;

export type SignupRouteOptions = {
  deps: SignupDeps;
  dbHealth: HealthCheck;
};

const SignupBody = z.object({
  email: z.string().max(255).optional(),
  phone: z.string().max(32).optional(),
  password: z.string().max(1024),
  data: z.record(z.unknown()).optional(),
});

// ---------------------------------------------------------------------------
// Serialisierung (snake_case im API)
// ---------------------------------------------------------------------------

export function serializeUser(user: PublicUser) {
  return {
    id: user.id,
    aud: user.aud,
    role: user.role,
    email: user.email,
    phone: user.phone,
    email_confirmed_at: user.emailConfirmedAt,
    phone_confirmed_at: user.phoneConfirmedAt,
    confirmation_sent_at: user.confirmationSentAt,
    phone_confirmation_sent_at: user.phoneConfirmationSentAt,
    app_metadata: user.appMetadata,
    user_metadata: user.userMetadata,
    created_at: user.createdAt,
    updated_at: user.updatedAt,
  };
}

export function serializeGrant(grant: AccessGrant) {
  return {
    access_token: grant.accessToken,
    token_type: grant.tokenType,
    expires_in: grant.expiresIn,
    expires_at: grant.expiresAt,
    refresh_token: grant.refreshToken,
    user: serializeUser(grant.user),
  };
}

export default async function signupRoutes(app: FastifyInstance, opts: SignupRouteOptions) {
  // /auth/signup
  app.post("/signup", { config: { tenant: true } }, async (req, reply) => {
    const parse = SignupBody.safeParse(req.body);
    if (!parse.success) {
      return sendApiError(reply, 422, "INVALID_FORMAT", "Invalid signup payload.", parse.error.flatten());
    }

    const tenantId = req.requestedTenantId;
    if (!tenantId) {
      return sendApiError(reply, 400, "INVALID_FORMAT", "Tenant context not set.");
    }

    let result: SignupResult;
    try {
      result = await signup(opts.deps, {
        tenantId,
        aud: req.audience,
        ...parse.data,
      });
    } catch (err) {
      recordSignup("rejected");
      throw err;
    }

    recordSignup(result.kind);
    for (const channel of result.issued) recordOtpIssued(channel);

    if (result.kind === "granted") {
      req.log.info({ user_id: result.grant.user.id, outcome: result.kind }, "signup_completed");
      return reply.send(serializeGrant(result.grant));
    }

    req.log.info(
      { user_id: result.user.id, outcome: result.kind, issued: result.issued },
      "signup_completed",
    );
    return reply.send(serializeUser(result.user));
  });

  // /auth/signup/health
  app.get("/signup/health", async (_req, reply) => {
    const db = await opts.dbHealth();
    return reply.code(db.ok ? 200 : 503).send({
      module: "signup",
      healthy: db.ok,
      db,
    });
  });
}
