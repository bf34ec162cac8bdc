// src/libs/error-map.ts
// ============================================================================
// pg-Fehler → PersistenceError
// ----------------------------------------------------------------------------
// Repositories werfen nie rohe pg-Fehler nach oben. SQLSTATE bleibt als
// dbCode erhalten (Logs), der Client sieht nur INTERNAL_PERSISTENCE_ERROR.
// ============================================================================

import { AuthCoreError, PersistenceError } from "./errors.js";

function readStringField(err: unknown, field: "code" | "constraint"): string | undefined {
  if (typeof err !== "object" || err === null || !(field in err)) return undefined;
  const value: unknown = Reflect.get(err, field);
  return typeof value === "string" ? value : undefined;
}

export function dbErrorCode(err: unknown): string | undefined {
  return readStringField(err, "code");
}

export function dbConstraint(err: unknown): string | undefined {
  return readStringField(err, "constraint");
}

export function isUniqueViolation(err: unknown): boolean {
  return dbErrorCode(err) === "23505";
}

export function toPersistenceError(err: unknown, operation: string): AuthCoreError {
  if (err instanceof AuthCoreError) return err;

  const code = dbErrorCode(err);
  switch (code) {
    case "23505":
      return new PersistenceError(`${operation}: unique constraint violated`, code, { cause: err });
    case "23503":
    case "23514":
    case "23502":
    case "22P02":
      return new PersistenceError(`${operation}: constraint violated`, code, { cause: err });
    default:
      return new PersistenceError(`${operation} failed`, code, { cause: err });
  }
}
