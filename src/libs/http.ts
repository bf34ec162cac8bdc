// ============================================================================
// src/libs/http.ts
// ----------------------------------------------------------------------------
// HTTP-Hilfsfunktionen (Logging, Metriken)
// ============================================================================
import type { FastifyRequest } from "fastify";

/** Liefert eine stabile Routen-ID (für Logs/Metriken). */
export function getRouteId(req: FastifyRequest): string {
  return req.routeOptions.url ?? "unknown";
}

/** Ermittelt, ob die Anfrage einen Health-Endpoint adressiert. */
export function isHealthPath(req: FastifyRequest): boolean {
  const url = req.raw.url ?? "";
  return (
    url === "/health" ||
    url === "/healthz" ||
    url === "/readyz" ||
    url.startsWith("/health/") ||
    url.endsWith("/health")
  );
}
