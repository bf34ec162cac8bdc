// src/modules/totp-secrets/types.ts
// ============================================================================
// Typen fuer auth.totp_secrets
// ----------------------------------------------------------------------------
// Pro (user_id, tenant_id, channel) genau ein Secret. encrypted_payload ist
// nonce || ciphertext || tag (libs/secret-cipher.ts), nie Klartext.
// ============================================================================

import type { Lookup } from "../../libs/db.js";
import type { Channel } from "../../libs/delivery.js";

export interface TotpSecretRow {
  id: string;
  user_id: string;
  tenant_id: string;
  channel: Channel;
  encrypted_payload: Buffer;
  key_version: number;
  otp_last_requested_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export type NewTotpSecret = {
  userId: string;
  channel: Channel;
  encryptedPayload: Buffer;
  keyVersion: number;
  now: Date;
};

export type InsertOutcome = { inserted: true; row: TotpSecretRow } | { inserted: false };

export interface TotpSecretRepository {
  /** Sperrt die Zeile bis zum Ende der Transaktion. */
  findForUpdate(userId: string, channel: Channel): Promise<Lookup<TotpSecretRow>>;
  /** ON CONFLICT DO NOTHING: bei parallelem Anlegen gewinnt genau einer. */
  insertIfAbsent(input: NewTotpSecret): Promise<InsertOutcome>;
  updateLastRequestedAt(secretId: string, at: Date): Promise<TotpSecretRow>;
}

export type CooldownDecision = { allowed: true } | { allowed: false; retryAfterSec: number };
