// src/modules/signup/service.ts
// ============================================================================
// Signup-Orchestrator
// ----------------------------------------------------------------------------
// Ablauf signup():
//   1) Eingabe pruefen + normalisieren (ohne DB)
//   2) Transaktion A: Nutzer finden/anlegen, Kanaele reservieren
//      (Cooldown), dann je Kanal zustellen oder auto-bestaetigen
//   3) Nach COMMIT: sind alle registrierten Kanaele bestaetigt, folgt
//      Transaktion B mit Audit "login", login-Event und Access-Grant
//
// Ein Fehler in Transaktion A hinterlaesst keinerlei Aenderung.
// ============================================================================

import { z } from "zod";
import { recordAuditEntry } from "../../libs/audit.js";
import type { Lookup } from "../../libs/db.js";
import type { Channel } from "../../libs/delivery.js";
import type { SignupConfig } from "../../libs/env.js";
import {
  AlreadyRegisteredError,
  SignupDisabledError,
  ValidationError,
} from "../../libs/errors.js";
import { normalizePhone, validatePhoneFormat } from "../../libs/otp.js";
import { fireEvent } from "../../libs/outbox.js";
import type { TxContext } from "../../libs/unit-of-work.js";
import type { IssuanceReservation } from "../totp-secrets/service.js";
import { toPublicUser, type UserPatch, type UserRepository, type UserRow } from "../users/types.js";
import {
  autoConfirmChannel,
  reserveChannel,
  sendEmailConfirmation,
  sendPhoneConfirmation,
} from "./confirmation.js";
import { issueAccessGrant } from "./grant.js";
import type {
  SignupDeps,
  SignupInput,
  SignupParams,
  SignupResult,
  SignupStepsOutcome,
} from "./types.js";

const EmailSchema = z.string().email();

// ---------------------------------------------------------------------------
// 1) Eingabe
// ---------------------------------------------------------------------------

export function prepareSignup(
  config: SignupConfig,
  input: SignupInput,
  provider?: "email" | "phone",
): SignupParams {
  if (config.signupDisabled) throw new SignupDisabledError();

  if (!input.password) {
    throw new ValidationError("Signup requires a valid password");
  }
  if (input.password.length < config.passwordMinLength) {
    throw new ValidationError(`Password should be at least ${config.passwordMinLength} characters`);
  }

  const email = input.email?.trim().toLowerCase() || null;
  const phone = input.phone?.trim() ? normalizePhone(input.phone) : null;

  if (email === null && phone === null) {
    throw new ValidationError("Signup requires an email address or a phone number");
  }
  if (email !== null && !EmailSchema.safeParse(email).success) {
    throw new ValidationError("Invalid email address format");
  }
  if (phone !== null && !validatePhoneFormat(phone)) {
    throw new ValidationError("Invalid phone number format (E.164 required)");
  }

  return {
    tenantId: input.tenantId,
    aud: input.aud?.trim() || config.defaultAudience,
    email,
    phone,
    password: input.password,
    data: input.data ?? null,
    provider: provider ?? (phone !== null ? "phone" : "email"),
  };
}

// ---------------------------------------------------------------------------
// 2) Nutzer finden / anlegen / zusammenfuehren
// ---------------------------------------------------------------------------

async function findExistingUser(
  users: UserRepository,
  params: SignupParams,
): Promise<Lookup<UserRow>> {
  if (params.email !== null) {
    const byEmail = await users.findByEmail(params.email, params.aud);
    if (byEmail.found) return byEmail;
  }
  if (params.phone !== null) {
    return users.findByPhone(params.phone, params.aud);
  }
  return { found: false };
}

export async function registerNewUser(
  tx: TxContext,
  deps: SignupDeps,
  params: SignupParams,
  now: Date,
): Promise<UserRow> {
  const providers: Array<"email" | "phone"> = [];
  if (params.email !== null) providers.push("email");
  if (params.phone !== null) providers.push("phone");

  const user = await tx.users.create({
    aud: params.aud,
    role: deps.config.defaultRole,
    email: params.email,
    phone: params.phone,
    encryptedPassword: await deps.hashPassword(params.password),
    appMetaData: { provider: params.provider, providers },
    userMetaData: params.data ?? {},
    now,
  });

  await fireEvent(tx.outbox, "validate", user, deps.config);
  return user;
}

async function mergeIntoExistingUser(
  tx: TxContext,
  user: UserRow,
  params: SignupParams,
  now: Date,
): Promise<UserRow> {
  if (params.email !== null && user.email_confirmed_at !== null) {
    throw new AlreadyRegisteredError("email");
  }
  if (params.phone !== null && user.phone_confirmed_at !== null) {
    throw new AlreadyRegisteredError("phone");
  }

  const patch: UserPatch = {};

  if (params.email !== null) {
    if (user.email === null) {
      const taken = await tx.users.findByEmail(params.email, params.aud);
      if (taken.found) throw new AlreadyRegisteredError("email");
      patch.email = params.email;
    } else if (user.email !== params.email) {
      throw new ValidationError(
        "Email address does not match the account registered with this phone number",
        "IDENTIFIER_MISMATCH",
      );
    }
  }

  if (params.phone !== null) {
    if (user.phone === null) {
      const taken = await tx.users.findByPhone(params.phone, params.aud);
      if (taken.found) throw new AlreadyRegisteredError("phone");
      patch.phone = params.phone;
    } else if (user.phone !== params.phone) {
      throw new ValidationError(
        "Phone number does not match the account registered with this email address",
        "IDENTIFIER_MISMATCH",
      );
    }
  }

  if (params.data !== null) {
    patch.raw_user_meta_data = { ...user.raw_user_meta_data, ...params.data };
  }

  if (Object.keys(patch).length === 0) return user;
  return tx.users.update(user.id, patch, now);
}

// ---------------------------------------------------------------------------
// 2) Transaktion A
// ---------------------------------------------------------------------------

export async function runSignupSteps(
  tx: TxContext,
  deps: SignupDeps,
  params: SignupParams,
  autoconfirm: SignupConfig["autoconfirm"] = deps.config.autoconfirm,
): Promise<SignupStepsOutcome> {
  const now = deps.now();

  const existing = await findExistingUser(tx.users, params);
  let user = existing.found
    ? await mergeIntoExistingUser(tx, existing.row, params, now)
    : await registerNewUser(tx, deps, params, now);

  // Alle Cooldowns pruefen, bevor irgendetwas zugestellt wird
  let emailReservation: IssuanceReservation | null = null;
  let phoneReservation: IssuanceReservation | null = null;
  if (params.email !== null && !autoconfirm.email) {
    emailReservation = await reserveChannel(tx, deps, user, "email", params.email, now);
  }
  if (params.phone !== null && !autoconfirm.phone) {
    phoneReservation = await reserveChannel(tx, deps, user, "phone", params.phone, now);
  }

  const issued: Channel[] = [];

  if (params.email !== null) {
    if (emailReservation) {
      user = await sendEmailConfirmation(tx, deps, user, params.email, emailReservation, now);
      issued.push("email");
    } else {
      user = await autoConfirmChannel(tx, deps, user, "email", now);
    }
  }

  if (params.phone !== null) {
    if (phoneReservation) {
      user = await sendPhoneConfirmation(tx, deps, user, params.phone, phoneReservation, now);
      issued.push("phone");
    } else {
      user = await autoConfirmChannel(tx, deps, user, "phone", now);
    }
  }

  return { user, issued };
}

// ---------------------------------------------------------------------------
// 3) Transaktion B (nur wenn vollstaendig bestaetigt)
// ---------------------------------------------------------------------------

export function isFullyConfirmed(user: UserRow): boolean {
  const emailOk = user.email === null || user.email_confirmed_at !== null;
  const phoneOk = user.phone === null || user.phone_confirmed_at !== null;
  return emailOk && phoneOk;
}

export async function finalizeSignup(
  deps: SignupDeps,
  tenantId: string,
  outcome: SignupStepsOutcome,
): Promise<SignupResult> {
  const { user, issued } = outcome;
  if (!isFullyConfirmed(user)) {
    return { kind: "pending", user: toPublicUser(user), issued };
  }

  const now = deps.now();
  const grant = await deps.uow.run(tenantId, async (tx) => {
    await recordAuditEntry(tx.audit, user, "login", now);
    await fireEvent(tx.outbox, "login", user, deps.config);
    return issueAccessGrant(tx.tokens, deps.tokens, user, {
      refreshTtlSec: deps.config.refreshTtlSec,
      now,
    });
  });

  return { kind: "granted", grant, issued };
}

// ---------------------------------------------------------------------------
// Einstieg
// ---------------------------------------------------------------------------

export async function signup(deps: SignupDeps, input: SignupInput): Promise<SignupResult> {
  const params = prepareSignup(deps.config, input);
  const outcome = await deps.uow.run(params.tenantId, (tx) => runSignupSteps(tx, deps, params));
  return finalizeSignup(deps, params.tenantId, outcome);
}
