// src/libs/error-response.ts
// ============================================================================
// Einheitliches Fehlerformat: { status, error: { code, message }, details? }
// ============================================================================

import type { FastifyReply } from "fastify";
import { ThrottledError, type AuthCoreError } from "./errors.js";

export type ApiErrorBody = {
  status: number;
  error: {
    code: string;
    message: string;
  };
  details?: unknown;
};

export function apiError(
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ApiErrorBody {
  const base: ApiErrorBody = {
    status,
    error: {
      code,
      message,
    },
  };

  if (details !== undefined) {
    base.details = details;
  }

  return base;
}

export function sendApiError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
) {
  return reply.code(status).send(apiError(status, code, message, details));
}

/**
 * AuthCoreError → HTTP. Interne Fehler (500) geben keine Details preis.
 */
export function sendAuthError(reply: FastifyReply, err: AuthCoreError) {
  if (err instanceof ThrottledError) {
    reply.header("Retry-After", String(err.retryAfterSec));
    return sendApiError(reply, err.statusCode, err.code, err.message, {
      retry_after_sec: err.retryAfterSec,
    });
  }

  if (err.code === "DELIVERY_FAILED") {
    return sendApiError(reply, err.statusCode, err.code, "Error sending confirmation message.");
  }

  const message = err.statusCode >= 500 ? "Internal server error." : err.message;
  return sendApiError(reply, err.statusCode, err.code, message);
}
