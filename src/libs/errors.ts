// src/libs/errors.ts
// ============================================================================
// Fehler-Taxonomie fuer Signup / OTP
// ----------------------------------------------------------------------------
// - Jeder fachliche Fehler traegt einen stabilen code + HTTP-Status
// - Routen mappen AuthCoreError 1:1 auf ApiErrorBody (libs/error-response.ts)
// - "Nicht gefunden" ist kein Fehler, sondern Lookup<T> (libs/db.ts)
// - Kein Fehler wird im Core automatisch wiederholt
// ============================================================================

export type AuthErrorCode =
  | "INVALID_FORMAT"
  | "IDENTIFIER_MISMATCH"
  | "UNSUPPORTED_OTP_TYPE"
  | "THROTTLED"
  | "ALREADY_REGISTERED"
  | "SIGNUP_DISABLED"
  | "DELIVERY_FAILED"
  | "INTERNAL_PERSISTENCE_ERROR"
  | "INTERNAL";

export abstract class AuthCoreError extends Error {
  abstract readonly code: AuthErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AuthCoreError {
  readonly statusCode = 422;
  readonly code: "INVALID_FORMAT" | "IDENTIFIER_MISMATCH" | "UNSUPPORTED_OTP_TYPE";

  constructor(
    message: string,
    code: "INVALID_FORMAT" | "IDENTIFIER_MISMATCH" | "UNSUPPORTED_OTP_TYPE" = "INVALID_FORMAT",
  ) {
    super(message);
    this.code = code;
  }
}

export class ThrottledError extends AuthCoreError {
  readonly statusCode = 429;
  readonly code = "THROTTLED";

  constructor(
    readonly channel: "email" | "phone",
    readonly retryAfterSec: number,
  ) {
    super(
      `For security purposes, you can only request this after ${retryAfterSec} seconds`,
    );
  }
}

export class AlreadyRegisteredError extends AuthCoreError {
  readonly statusCode = 400;
  readonly code = "ALREADY_REGISTERED";

  constructor(readonly channel: "email" | "phone") {
    super(
      channel === "email"
        ? "A user with this email address has already been registered"
        : "A user with this phone number has already been registered",
    );
  }
}

export class SignupDisabledError extends AuthCoreError {
  readonly statusCode = 403;
  readonly code = "SIGNUP_DISABLED";

  constructor() {
    super("Signups not allowed for this instance");
  }
}

export class DeliveryError extends AuthCoreError {
  readonly statusCode = 502;
  readonly code = "DELIVERY_FAILED";

  constructor(
    readonly channel: "email" | "phone",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class PersistenceError extends AuthCoreError {
  readonly statusCode = 500;
  readonly code = "INTERNAL_PERSISTENCE_ERROR";

  constructor(
    message: string,
    readonly dbCode?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

// Entschluesselung/Authentisierung fehlgeschlagen: Datenkorruption oder
// falscher Schluessel. Immer fatal fuer den Request.
export class CryptoError extends AuthCoreError {
  readonly statusCode = 500;
  readonly code = "INTERNAL";
}

export class ConfigurationError extends AuthCoreError {
  readonly statusCode = 500;
  readonly code = "INTERNAL";
}

export function isAuthCoreError(err: unknown): err is AuthCoreError {
  return err instanceof AuthCoreError;
}
