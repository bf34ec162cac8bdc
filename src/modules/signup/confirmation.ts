// src/modules/signup/confirmation.ts
// ============================================================================
// Bestaetigung pro Kanal (E-Mail-Link / SMS-Code)
// ----------------------------------------------------------------------------
// Zwei Phasen, beide innerhalb der Signup-Transaktion:
//   1) reserveChannel(): Cooldown pruefen, Secret bei Bedarf anlegen
//   2) send*Confirmation(): Token/Code erzeugen, Zeitstempel schreiben,
//      zustellen. Scheitert die Zustellung, wird der Schreibvorgang explizit
//      zurueckgesetzt und der DeliveryError weitergeworfen (→ ROLLBACK).
// Auto-Confirm ueberspringt beide Phasen.
// ============================================================================

import { recordAuditEntry } from "../../libs/audit.js";
import { hashOpaqueToken } from "../../libs/crypto.js";
import { deliverWithDeadline, type Channel, type DeliveryMessage } from "../../libs/delivery.js";
import type { SignupConfig } from "../../libs/env.js";
import { currentCode, secureToken } from "../../libs/otp.js";
import { fireEvent } from "../../libs/outbox.js";
import type { TxContext } from "../../libs/unit-of-work.js";
import { recordIssuance, reserveIssuance, type IssuanceReservation } from "../totp-secrets/service.js";
import type { UserPatch, UserRow } from "../users/types.js";
import type { PendingChange, SignupDeps } from "./types.js";

type EmailTokenState = Pick<UserRow, "confirmation_token_hash" | "confirmation_sent_at">;
type PhoneOtpState = Pick<UserRow, "phone_confirmation_sent_at">;

// ---------------------------------------------------------------------------
// Nachrichten
// ---------------------------------------------------------------------------

export function buildConfirmationMail(config: SignupConfig, token: string): DeliveryMessage {
  const url = new URL(config.confirmationUrlBase);
  url.searchParams.set("token", token);
  url.searchParams.set("type", "signup");

  return {
    subject: "Confirm your signup",
    text: `Follow this link to confirm your email address:\n${url.toString()}\n`,
  };
}

export function buildOtpSms(config: SignupConfig, code: string): DeliveryMessage {
  return {
    subject: "Verification code",
    text: config.smsTemplate.replaceAll("{code}", code),
  };
}

// ---------------------------------------------------------------------------
// Phase 1
// ---------------------------------------------------------------------------

export function reserveChannel(
  tx: TxContext,
  deps: SignupDeps,
  user: UserRow,
  channel: Channel,
  destination: string,
  now: Date,
): Promise<IssuanceReservation> {
  return reserveIssuance(tx.secrets, deps.cipher, {
    userId: user.id,
    channel,
    accountName: destination,
    cooldownSec: deps.config.cooldownSec[channel],
    otp: deps.config.otp,
    now,
  });
}

// ---------------------------------------------------------------------------
// Phase 2
// ---------------------------------------------------------------------------

async function deliverOrRestore<T extends UserPatch>(
  tx: TxContext,
  deps: SignupDeps,
  userId: string,
  change: PendingChange<T>,
  deliver: () => Promise<void>,
  now: Date,
): Promise<void> {
  try {
    await deliver();
  } catch (err) {
    try {
      await tx.users.update(userId, change.before, now);
    } catch (restoreErr) {
      // Die Transaktion wird ohnehin zurueckgerollt
      deps.log.error({ err: restoreErr, user_id: userId }, "pending_change_restore_failed");
    }
    throw err;
  }
}

export async function sendEmailConfirmation(
  tx: TxContext,
  deps: SignupDeps,
  user: UserRow,
  email: string,
  reservation: IssuanceReservation,
  now: Date,
): Promise<UserRow> {
  const token = secureToken();
  const change: PendingChange<EmailTokenState> = {
    before: {
      confirmation_token_hash: user.confirmation_token_hash,
      confirmation_sent_at: user.confirmation_sent_at,
    },
    after: {
      confirmation_token_hash: hashOpaqueToken(token),
      confirmation_sent_at: now,
    },
  };

  const updated = await tx.users.update(user.id, change.after, now);
  await recordIssuance(tx.secrets, reservation.secret, now);

  await deliverOrRestore(
    tx,
    deps,
    user.id,
    change,
    () =>
      deliverWithDeadline(
        deps.delivery.email,
        email,
        buildConfirmationMail(deps.config, token),
        deps.config.deliveryTimeoutMs,
      ),
    now,
  );

  await recordAuditEntry(tx.audit, updated, "user_confirmation_requested", now, { channel: "email" });
  return updated;
}

export async function sendPhoneConfirmation(
  tx: TxContext,
  deps: SignupDeps,
  user: UserRow,
  phone: string,
  reservation: IssuanceReservation,
  now: Date,
): Promise<UserRow> {
  const code = currentCode(reservation.keyUrl, now, deps.config.otp.periodSec, deps.config.otp.digits);
  const change: PendingChange<PhoneOtpState> = {
    before: { phone_confirmation_sent_at: user.phone_confirmation_sent_at },
    after: { phone_confirmation_sent_at: now },
  };

  await recordIssuance(tx.secrets, reservation.secret, now);
  const updated = await tx.users.update(user.id, change.after, now);

  await deliverOrRestore(
    tx,
    deps,
    user.id,
    change,
    () =>
      deliverWithDeadline(
        deps.delivery.phone,
        phone,
        buildOtpSms(deps.config, code),
        deps.config.deliveryTimeoutMs,
      ),
    now,
  );

  await recordAuditEntry(tx.audit, updated, "user_confirmation_requested", now, { channel: "phone" });
  return updated;
}

// ---------------------------------------------------------------------------
// Auto-Confirm
// ---------------------------------------------------------------------------

export async function autoConfirmChannel(
  tx: TxContext,
  deps: SignupDeps,
  user: UserRow,
  channel: Channel,
  now: Date,
): Promise<UserRow> {
  const patch: UserPatch =
    channel === "email" ? { email_confirmed_at: now } : { phone_confirmed_at: now };

  const confirmed = await tx.users.update(user.id, patch, now);
  await recordAuditEntry(tx.audit, confirmed, "user_signedup", now, { channel });
  await fireEvent(tx.outbox, "signup", confirmed, deps.config);
  return confirmed;
}
