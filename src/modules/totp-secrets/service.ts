// src/modules/totp-secrets/service.ts
// ============================================================================
// Secret-Store & Rate-Limiter
// ----------------------------------------------------------------------------
// - Secrets werden vor dem Schreiben verschluesselt, nach dem Lesen
//   entschluesselt (SecretCipher wird injiziert, kein env-Zugriff)
// - Cooldown pro (Nutzer, Kanal) auf Basis von otp_last_requested_at
// - Alle Funktionen laufen innerhalb der Transaktion des Aufrufers
// ============================================================================

import { z } from "zod";
import { PersistenceError, ThrottledError, ValidationError } from "../../libs/errors.js";
import type { Lookup } from "../../libs/db.js";
import type { Channel } from "../../libs/delivery.js";
import { generateTotpKey } from "../../libs/otp.js";
import type { SecretCipher } from "../../libs/secret-cipher.js";
import type { CooldownDecision, TotpSecretRepository, TotpSecretRow } from "./types.js";

// ---------------------------------------------------------------------------
// Rate-Limiter
// ---------------------------------------------------------------------------

/**
 * Erlaubt, wenn noch nie ausgestellt wurde oder mindestens `cooldownSec`
 * vergangen sind. retryAfterSec ist aufgerundet und nie groesser als der
 * Cooldown selbst (auch bei Zeitstempeln aus der Zukunft).
 */
export function checkCooldown(
  lastIssuedAt: Date | null,
  now: Date,
  cooldownSec: number,
): CooldownDecision {
  if (lastIssuedAt === null || cooldownSec <= 0) return { allowed: true };

  const remainingMs = cooldownSec * 1000 - (now.getTime() - lastIssuedAt.getTime());
  if (remainingMs <= 0) return { allowed: true };

  return {
    allowed: false,
    retryAfterSec: Math.min(cooldownSec, Math.ceil(remainingMs / 1000)),
  };
}

// ---------------------------------------------------------------------------
// Secret-Store
// ---------------------------------------------------------------------------

const NewSecretInput = z.object({
  userId: z.string().min(1, "userId is required"),
  plaintext: z.string().min(1, "secret must not be empty"),
});

export function findSecret(
  repo: TotpSecretRepository,
  userId: string,
  channel: Channel,
): Promise<Lookup<TotpSecretRow>> {
  return repo.findForUpdate(userId, channel);
}

export async function createSecret(
  repo: TotpSecretRepository,
  cipher: SecretCipher,
  input: { userId: string; channel: Channel; plaintext: string; now: Date },
): Promise<{ row: TotpSecretRow; created: boolean }> {
  const parsed = NewSecretInput.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? "invalid secret input");
  }

  const outcome = await repo.insertIfAbsent({
    userId: input.userId,
    channel: input.channel,
    encryptedPayload: cipher.encrypt(input.plaintext),
    keyVersion: cipher.keyVersion,
    now: input.now,
  });
  if (outcome.inserted) return { row: outcome.row, created: true };

  // Parallel angelegt: Zeile des Gewinners lesen (wartet auf dessen Commit)
  const existing = await repo.findForUpdate(input.userId, input.channel);
  if (!existing.found) {
    throw new PersistenceError("totp secret vanished after insert conflict");
  }
  return { row: existing.row, created: false };
}

export function decryptSecret(cipher: SecretCipher, row: TotpSecretRow): string {
  return cipher.decrypt(row.encrypted_payload, row.key_version).toString("utf8");
}

export function recordIssuance(
  repo: TotpSecretRepository,
  secret: TotpSecretRow,
  at: Date,
): Promise<TotpSecretRow> {
  return repo.updateLastRequestedAt(secret.id, at);
}

// ---------------------------------------------------------------------------
// Reservierung: Cooldown pruefen + Secret bereitstellen
// ---------------------------------------------------------------------------

export type IssuanceReservation = {
  channel: Channel;
  secret: TotpSecretRow;
  /** entschluesselte otpauth://-URL */
  keyUrl: string;
};

export async function reserveIssuance(
  repo: TotpSecretRepository,
  cipher: SecretCipher,
  opts: {
    userId: string;
    channel: Channel;
    accountName: string;
    cooldownSec: number;
    otp: { issuer: string; periodSec: number; digits: number };
    now: Date;
  },
): Promise<IssuanceReservation> {
  const current = await findSecret(repo, opts.userId, opts.channel);

  let secret: TotpSecretRow;
  if (current.found) {
    secret = current.row;
  } else {
    const key = generateTotpKey({
      issuer: opts.otp.issuer,
      accountName: opts.accountName,
      period: opts.otp.periodSec,
      digits: opts.otp.digits,
    });
    ({ row: secret } = await createSecret(repo, cipher, {
      userId: opts.userId,
      channel: opts.channel,
      plaintext: key.url,
      now: opts.now,
    }));
  }

  const decision = checkCooldown(secret.otp_last_requested_at, opts.now, opts.cooldownSec);
  if (!decision.allowed) {
    throw new ThrottledError(opts.channel, decision.retryAfterSec);
  }

  return { channel: opts.channel, secret, keyUrl: decryptSecret(cipher, secret) };
}
