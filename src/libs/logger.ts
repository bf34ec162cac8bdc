// src/libs/logger.ts
// ============================================================================
// Logger-Typ fuer Services
// ----------------------------------------------------------------------------
// Services bekommen den Fastify-Logger (pino) injiziert, Tests einen stillen
// pino-Logger. Beide erfuellen dieselbe schmale Schnittstelle.
// ============================================================================

import pino from "pino";
import type { FastifyBaseLogger } from "fastify";

export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export function createLogger(level: string): pino.Logger {
  return pino({
    level,
    base: { service: "signup-otp-service" },
    redact: {
      paths: ["req.headers.authorization", "password", "*.password", "secret", "*.secret"],
      censor: "[redacted]",
    },
  });
}
