// src/libs/env.ts
// ============================================================================
// Zentrale Umgebungsvariablen-Verwaltung (Docker + Secrets-first) mit Zod
// ----------------------------------------------------------------------------
// Ziele
// - Keine .env-Abhängigkeit (kein dotenv)
// - Secrets bevorzugt aus *_FILE (Docker secrets) lesen
// - Fail-fast nur beim echten Service-Start (nicht bei Test-Imports)
// - Keine Secret-Werte loggen (nur [set]/[unset])
//
// Fachliche Konfiguration (OTP, Cooldowns, Auto-Confirm) wird NICHT direkt
// aus env gelesen, sondern ueber buildSignupConfig() explizit an die
// Services uebergeben.
// ============================================================================

import { readFileSync } from "node:fs";
import { z } from "zod";

// ----------------------------------------------------------------------------
// Helpers: Secrets lesen
// ----------------------------------------------------------------------------

/**
 * Liest ein Secret aus einer Datei (Docker secrets: /run/secrets/*).
 * - trimmt Whitespace
 * - entfernt trailing newlines
 * - wirft Fehler, wenn Datei nicht lesbar / leer
 */
function readSecretFile(filePath: string | undefined, label: string): string | undefined {
  if (!filePath) return undefined;

  let value: string;
  try {
    value = readFileSync(filePath, "utf8");
  } catch (err) {
    throw new Error(`${label} nicht lesbar: ${filePath}`, { cause: err });
  }

  const trimmed = value.replace(/\r?\n+$/, "").trim();
  if (!trimmed) throw new Error(`${label} ist leer: ${filePath}`);

  return trimmed;
}

/**
 * Entscheidet: *_FILE wird bevorzugt gelesen, ENV ist Fallback.
 */
function resolveFromFileOrEnv(opts: {
  envValue?: string;
  filePath?: string;
  label: string;
}): string | undefined {
  const fromFile = readSecretFile(opts.filePath, opts.label);
  if (fromFile && fromFile.trim() !== "") return fromFile;
  if (opts.envValue && opts.envValue.trim() !== "") return opts.envValue;
  return undefined;
}

/**
 * Maskiert sensible Werte für Logs.
 */
function mask(value: unknown): string {
  if (value === undefined || value === null || value === "") return "[unset]";
  return "[set]";
}

// "true"/"1" → true, alles andere → false (z.coerce.boolean macht aus "false" true)
const Flag = z
  .string()
  .optional()
  .transform((v) => v === "true" || v === "1");

// ----------------------------------------------------------------------------
// Schema
// ----------------------------------------------------------------------------

const EnvSchema = z.object({
  // --------------------------------------------------------------------------
  // Laufzeit / Server
  // --------------------------------------------------------------------------
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.string().default("info"),

  // --------------------------------------------------------------------------
  // HTTP
  // --------------------------------------------------------------------------
  CORS_ORIGIN: z.string().default("*"),
  REQUEST_ID_HEADER: z.string().default("x-request-id"),
  TRUST_PROXY: Flag,
  METRICS_ENABLED: z
    .string()
    .optional()
    .transform((v) => v !== "false" && v !== "0"),

  // --------------------------------------------------------------------------
  // PostgreSQL
  // --------------------------------------------------------------------------
  DATABASE_URL: z.string().optional(),
  DATABASE_URL_FILE: z.string().optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),

  // --------------------------------------------------------------------------
  // SMTP / Mail
  // --------------------------------------------------------------------------
  SMTP_HOST: z.string().default("localhost"),
  SMTP_PORT: z.coerce.number().int().default(1025),
  SMTP_SECURE: Flag,
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_USER_FILE: z.string().optional(),
  SMTP_PASS_FILE: z.string().optional(),
  SMTP_FROM: z.string().default("Auth Service <no-reply@local.test>"),

  // --------------------------------------------------------------------------
  // SMS
  // - console: Code nur ins Log (nicht in production erlaubt)
  // - twilio:  Twilio Messages API
  // --------------------------------------------------------------------------
  SMS_PROVIDER: z.enum(["console", "twilio"]).default("console"),
  TWILIO_ACCOUNT_SID: z.string().optional(),
  TWILIO_AUTH_TOKEN: z.string().optional(),
  TWILIO_AUTH_TOKEN_FILE: z.string().optional(),
  TWILIO_MESSAGE_SERVICE_SID: z.string().optional(),
  SMS_TEMPLATE: z.string().default("Your code is {code}"),

  // --------------------------------------------------------------------------
  // OTP / Signup
  // --------------------------------------------------------------------------
  SECRET_PASSPHRASE: z.string().optional(),
  SECRET_PASSPHRASE_FILE: z.string().optional(),
  OTP_ISSUER: z.string().default("auth-service"),
  OTP_PERIOD_SEC: z.coerce.number().int().positive().default(30),
  OTP_DIGITS: z.coerce.number().int().min(6).max(8).default(6),
  SMS_OTP_COOLDOWN_SEC: z.coerce.number().int().min(0).default(60),
  EMAIL_CONFIRM_COOLDOWN_SEC: z.coerce.number().int().min(0).default(60),
  MAILER_AUTOCONFIRM: Flag,
  SMS_AUTOCONFIRM: Flag,
  SIGNUP_DISABLED: Flag,
  PASSWORD_MIN_LENGTH: z.coerce.number().int().min(1).default(8),
  DEFAULT_ROLE: z.string().default("authenticated"),
  DELIVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CONFIRMATION_URL_BASE: z.string().url().default("http://localhost:8080/verify"),

  // --------------------------------------------------------------------------
  // JWT (Access-Grant nach Auto-Confirm)
  // --------------------------------------------------------------------------
  JWT_SECRET_ACTIVE: z.string().optional(),
  JWT_SECRET_ACTIVE_FILE: z.string().optional(),
  JWT_ISSUER: z.string().default("auth-service"),
  JWT_AUDIENCE: z.string().default("auth-client"),
  JWT_ACCESS_TTL: z.coerce.number().int().positive().default(900),
  REFRESH_TTL_SEC: z.coerce.number().int().positive().default(60 * 60 * 24 * 30),

  // --------------------------------------------------------------------------
  // Event-Hooks (Outbox): kommaseparierte Liste aus validate,signup,login
  // --------------------------------------------------------------------------
  HOOK_EVENTS: z
    .string()
    .default("validate,signup,login")
    .transform((v) =>
      v
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s !== ""),
    )
    .pipe(z.array(z.enum(["validate", "signup", "login"]))),

  // --------------------------------------------------------------------------
  // Startup-Validation Switch (nur als String; wir interpretieren unten)
  // --------------------------------------------------------------------------
  STARTUP_VALIDATE_ENV: z.string().optional(),
});

// ----------------------------------------------------------------------------
// Secret-Resolution: *_FILE → konkrete Werte
// ----------------------------------------------------------------------------

const resolvedDatabaseUrl = resolveFromFileOrEnv({
  envValue: process.env.DATABASE_URL,
  filePath: process.env.DATABASE_URL_FILE,
  label: "DATABASE_URL_FILE",
});

const resolvedSmtpUser = resolveFromFileOrEnv({
  envValue: process.env.SMTP_USER,
  filePath: process.env.SMTP_USER_FILE,
  label: "SMTP_USER_FILE",
});

const resolvedSmtpPass = resolveFromFileOrEnv({
  envValue: process.env.SMTP_PASS,
  filePath: process.env.SMTP_PASS_FILE,
  label: "SMTP_PASS_FILE",
});

const resolvedTwilioAuthToken = resolveFromFileOrEnv({
  envValue: process.env.TWILIO_AUTH_TOKEN,
  filePath: process.env.TWILIO_AUTH_TOKEN_FILE,
  label: "TWILIO_AUTH_TOKEN_FILE",
});

const resolvedSecretPassphrase = resolveFromFileOrEnv({
  envValue: process.env.SECRET_PASSPHRASE,
  filePath: process.env.SECRET_PASSPHRASE_FILE,
  label: "SECRET_PASSPHRASE_FILE",
});

const resolvedJwtSecretActive = resolveFromFileOrEnv({
  envValue: process.env.JWT_SECRET_ACTIVE,
  filePath: process.env.JWT_SECRET_ACTIVE_FILE,
  label: "JWT_SECRET_ACTIVE_FILE",
});

// ----------------------------------------------------------------------------
// Parse & Normalize
// ----------------------------------------------------------------------------

const raw = EnvSchema.parse({
  ...process.env,
  DATABASE_URL: resolvedDatabaseUrl,
  SMTP_USER: resolvedSmtpUser,
  SMTP_PASS: resolvedSmtpPass,
  TWILIO_AUTH_TOKEN: resolvedTwilioAuthToken,
  SECRET_PASSPHRASE: resolvedSecretPassphrase,
  JWT_SECRET_ACTIVE: resolvedJwtSecretActive,
});

export const env = {
  ...raw,
  REQUEST_ID_HEADER: raw.REQUEST_ID_HEADER.toLowerCase(),
};

export type Env = typeof env;

// ----------------------------------------------------------------------------
// Fail-fast: nur wenn Service wirklich startet
// ----------------------------------------------------------------------------
//
// Vitest importiert Module, bevor Setup-Dateien laufen → nicht in test crashen.
//
// Schalter:
// - STARTUP_VALIDATE_ENV=1 -> immer validieren (typisch im Container)
// - sonst: validate in development/production, nicht in test
//
const shouldValidate =
  process.env.STARTUP_VALIDATE_ENV === "1" ? true : env.NODE_ENV !== "test";

if (shouldValidate) {
  if (!env.DATABASE_URL) {
    throw new Error("DATABASE_URL fehlt: setze DATABASE_URL oder DATABASE_URL_FILE.");
  }
  if (!env.SECRET_PASSPHRASE) {
    throw new Error(
      "SECRET_PASSPHRASE fehlt: setze SECRET_PASSPHRASE oder SECRET_PASSPHRASE_FILE (32 Byte).",
    );
  }
  if (!env.JWT_SECRET_ACTIVE) {
    throw new Error(
      "JWT Secret fehlt: setze JWT_SECRET_ACTIVE oder JWT_SECRET_ACTIVE_FILE.",
    );
  }
  if (env.SMS_PROVIDER === "twilio" && (!env.TWILIO_ACCOUNT_SID || !env.TWILIO_AUTH_TOKEN)) {
    throw new Error("Twilio ist nicht konfiguriert: TWILIO_ACCOUNT_SID / TWILIO_AUTH_TOKEN.");
  }
}

// ----------------------------------------------------------------------------
// Fachliche Konfiguration fuer Signup/OTP
// ----------------------------------------------------------------------------

export type SignupConfig = {
  signupDisabled: boolean;
  passwordMinLength: number;
  defaultRole: string;
  defaultAudience: string;
  otp: {
    issuer: string;
    periodSec: number;
    digits: number;
  };
  cooldownSec: {
    email: number;
    phone: number;
  };
  autoconfirm: {
    email: boolean;
    phone: boolean;
  };
  deliveryTimeoutMs: number;
  confirmationUrlBase: string;
  smsTemplate: string;
  refreshTtlSec: number;
  hookEvents: ReadonlyArray<"validate" | "signup" | "login">;
};

export function buildSignupConfig(source: Env = env): SignupConfig {
  return {
    signupDisabled: source.SIGNUP_DISABLED,
    passwordMinLength: source.PASSWORD_MIN_LENGTH,
    defaultRole: source.DEFAULT_ROLE,
    defaultAudience: source.JWT_AUDIENCE,
    otp: {
      issuer: source.OTP_ISSUER,
      periodSec: source.OTP_PERIOD_SEC,
      digits: source.OTP_DIGITS,
    },
    cooldownSec: {
      email: source.EMAIL_CONFIRM_COOLDOWN_SEC,
      phone: source.SMS_OTP_COOLDOWN_SEC,
    },
    autoconfirm: {
      email: source.MAILER_AUTOCONFIRM,
      phone: source.SMS_AUTOCONFIRM,
    },
    deliveryTimeoutMs: source.DELIVERY_TIMEOUT_MS,
    confirmationUrlBase: source.CONFIRMATION_URL_BASE,
    smsTemplate: source.SMS_TEMPLATE,
    refreshTtlSec: source.REFRESH_TTL_SEC,
    hookEvents: source.HOOK_EVENTS,
  };
}

// ----------------------------------------------------------------------------
// Debug-Ausgabe ohne Secrets
// ----------------------------------------------------------------------------

/**
 * Gibt eine sichere Zusammenfassung der Konfiguration aus (ohne Secrets).
 */
export function logEnvSummary(log: (obj: Record<string, unknown>, msg: string) => void) {
  const summary = {
    NODE_ENV: env.NODE_ENV,
    HOST: env.HOST,
    PORT: env.PORT,
    LOG_LEVEL: env.LOG_LEVEL,

    CORS_ORIGIN: env.CORS_ORIGIN,
    REQUEST_ID_HEADER: env.REQUEST_ID_HEADER,
    METRICS_ENABLED: env.METRICS_ENABLED,

    DATABASE_URL: mask(env.DATABASE_URL),

    SMTP_HOST: env.SMTP_HOST,
    SMTP_PORT: env.SMTP_PORT,
    SMTP_USER: mask(env.SMTP_USER),
    SMTP_PASS: mask(env.SMTP_PASS),

    SMS_PROVIDER: env.SMS_PROVIDER,
    TWILIO_AUTH_TOKEN: mask(env.TWILIO_AUTH_TOKEN),

    SECRET_PASSPHRASE: mask(env.SECRET_PASSPHRASE),
    OTP_PERIOD_SEC: env.OTP_PERIOD_SEC,
    OTP_DIGITS: env.OTP_DIGITS,
    SMS_OTP_COOLDOWN_SEC: env.SMS_OTP_COOLDOWN_SEC,
    EMAIL_CONFIRM_COOLDOWN_SEC: env.EMAIL_CONFIRM_COOLDOWN_SEC,
    MAILER_AUTOCONFIRM: env.MAILER_AUTOCONFIRM,
    SMS_AUTOCONFIRM: env.SMS_AUTOCONFIRM,
    SIGNUP_DISABLED: env.SIGNUP_DISABLED,
    HOOK_EVENTS: env.HOOK_EVENTS,

    JWT_SECRET_ACTIVE: mask(env.JWT_SECRET_ACTIVE),
    JWT_ISSUER: env.JWT_ISSUER,
    JWT_AUDIENCE: env.JWT_AUDIENCE,
  };

  log(summary, "env_configuration_summary");
}
