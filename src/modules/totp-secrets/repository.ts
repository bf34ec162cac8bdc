// src/modules/totp-secrets/repository.ts
// ============================================================================
// Persistence-Layer fuer auth.totp_secrets
// ----------------------------------------------------------------------------
// - Lesen immer mit FOR UPDATE (Cooldown-Pruefung + Zeitstempel-Update sind
//   damit pro Nutzer/Kanal serialisiert)
// - Anlegen per INSERT ... ON CONFLICT DO NOTHING; der Verlierer liest danach
//   die Zeile des Gewinners
// ============================================================================

import type { DbClient } from "../../libs/db.js";
import { lookupOf } from "../../libs/db.js";
import { PersistenceError } from "../../libs/errors.js";
import { toPersistenceError } from "../../libs/error-map.js";
import type { TotpSecretRepository, TotpSecretRow } from "./types.js";

const SECRET_COLUMNS = `
  id,
  user_id,
  tenant_id,
  channel,
  encrypted_payload,
  key_version,
  otp_last_requested_at,
  created_at,
  updated_at
`;

export function createPgTotpSecretRepository(
  client: DbClient,
  tenantId: string,
): TotpSecretRepository {
  return {
    async findForUpdate(userId, channel) {
      try {
        const { rows } = await client.query<TotpSecretRow>(
          `
            SELECT ${SECRET_COLUMNS}
            FROM auth.totp_secrets
            WHERE tenant_id = $1
              AND user_id = $2
              AND channel = $3
            FOR UPDATE;
          `,
          [tenantId, userId, channel],
        );
        return lookupOf(rows[0]);
      } catch (err) {
        throw toPersistenceError(err, "find totp secret");
      }
    },

    async insertIfAbsent(input) {
      try {
        const { rows } = await client.query<TotpSecretRow>(
          `
            INSERT INTO auth.totp_secrets (
              tenant_id,
              user_id,
              channel,
              encrypted_payload,
              key_version,
              created_at,
              updated_at
            )
            VALUES ($1, $2, $3, $4, $5, $6, $6)
            ON CONFLICT (user_id, tenant_id, channel) DO NOTHING
            RETURNING ${SECRET_COLUMNS};
          `,
          [tenantId, input.userId, input.channel, input.encryptedPayload, input.keyVersion, input.now],
        );

        const row = rows[0];
        return row ? { inserted: true, row } : { inserted: false };
      } catch (err) {
        throw toPersistenceError(err, "insert totp secret");
      }
    },

    async updateLastRequestedAt(secretId, at) {
      try {
        const { rows } = await client.query<TotpSecretRow>(
          `
            UPDATE auth.totp_secrets
            SET otp_last_requested_at = $3,
                updated_at = $3
            WHERE tenant_id = $1
              AND id = $2
            RETURNING ${SECRET_COLUMNS};
          `,
          [tenantId, secretId, at],
        );

        const row = rows[0];
        if (!row) throw new PersistenceError("update totp secret: row not found");
        return row;
      } catch (err) {
        throw toPersistenceError(err, "update totp secret");
      }
    },
  };
}
