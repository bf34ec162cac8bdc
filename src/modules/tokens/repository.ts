// src/modules/tokens/repository.ts
// ============================================================================
// Token-Repository (auth.tokens)
// ----------------------------------------------------------------------------
// - Tabelle: auth.tokens(tenant_id, user_id, type, token_hash, expires_at, created_at)
// - Hier nur das Ausstellen von Refresh-Tokens beim Access-Grant
// ============================================================================

import type { DbClient } from "../../libs/db.js";
import { PersistenceError } from "../../libs/errors.js";
import { toPersistenceError } from "../../libs/error-map.js";
import type { RefreshTokenRepository, RefreshTokenRow } from "./types.js";

export function createPgRefreshTokenRepository(
  client: DbClient,
  tenantId: string,
): RefreshTokenRepository {
  return {
    async create(input) {
      try {
        const { rows } = await client.query<RefreshTokenRow>(
          `
            INSERT INTO auth.tokens (tenant_id, user_id, type, token_hash, expires_at, created_at)
            VALUES ($1, $2, 'refresh', $3, $4, $5)
            RETURNING
              id,
              tenant_id,
              user_id,
              type,
              token_hash,
              expires_at,
              created_at;
          `,
          [tenantId, input.userId, input.tokenHash, input.expiresAt, input.now],
        );

        const row = rows[0];
        if (!row) throw new PersistenceError("insert refresh token returned no row");
        return row;
      } catch (err) {
        throw toPersistenceError(err, "insert refresh token");
      }
    },
  };
}
