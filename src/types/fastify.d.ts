// src/types/fastify.d.ts
// ============================================================================
// Fastify Type Augmentation
// ----------------------------------------------------------------------------
// - Route Config: config.tenant
// - Request Decorations aus plugins/tenant-context.ts und app.ts
// Nur Type-Imports, keine Runtime-Imports.
// ============================================================================

import "fastify";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Wenn true: X-Tenant-Id ist Pflicht (tenant-context.ts) */
    tenant?: boolean;
  }

  interface FastifyRequest {
    /** Validierter, kleingeschriebener X-Tenant-Id-Header */
    requestedTenantId?: string;

    /** X-JWT-AUD, falls gesetzt */
    audience?: string;

    requestStartedAtNs?: bigint;
  }
}
