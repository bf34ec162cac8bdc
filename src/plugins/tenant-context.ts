// src/plugins/tenant-context.ts
// ============================================================================
// Tenant- & Audience-Kontext (Header Intake)
// ----------------------------------------------------------------------------
// Verantwortung:
// - Liest X-Tenant-Id, validiert UUID-Format → request.requestedTenantId
// - Liest X-JWT-AUD (optional)             → request.audience
//   Fehlt der Header, gilt JWT_AUDIENCE (SignupConfig.defaultAudience).
//
// Nur Routen mit config.tenant === true verlangen den Tenant-Header.
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyInstance, FastifyPluginAsync, FastifyRequest } from "fastify";
import { isHealthPath } from "../libs/http.js";
import { sendApiError } from "../libs/error-response.js";

const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

const AUD_MAX_LENGTH = 255;

function needsTenant(req: FastifyRequest): boolean {
  return req.routeOptions.config.tenant === true;
}

function normalizeHeader(v: unknown): string | undefined {
  if (typeof v === "string") {
    const t = v.trim();
    return t.length > 0 ? t : undefined;
  }
  if (Array.isArray(v) && typeof v[0] === "string") {
    const t = v[0].trim();
    return t.length > 0 ? t : undefined;
  }
  return undefined;
}

const tenantContextPlugin: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  fastify.addHook("preHandler", async (request, reply) => {
    if (isHealthPath(request)) return;

    const headerTenant = normalizeHeader(request.headers["x-tenant-id"]);

    if (needsTenant(request)) {
      if (!headerTenant || !UUID_RE.test(headerTenant)) {
        return sendApiError(
          reply,
          400,
          "INVALID_FORMAT",
          "Missing or invalid X-Tenant-Id header.",
        );
      }
    }

    request.requestedTenantId = headerTenant ? headerTenant.toLowerCase() : undefined;

    const aud = normalizeHeader(request.headers["x-jwt-aud"]);
    if (aud !== undefined && aud.length > AUD_MAX_LENGTH) {
      return sendApiError(reply, 400, "INVALID_FORMAT", "X-JWT-AUD header is too long.");
    }
    request.audience = aud;
  });
};

export default fp(tenantContextPlugin, { name: "tenant-context" });
