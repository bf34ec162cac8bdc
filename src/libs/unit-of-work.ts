// src/libs/unit-of-work.ts
// ============================================================================
// Unit of Work: eine DB-Transaktion pro fachlichem Schritt
// ----------------------------------------------------------------------------
// Ablauf je run():
//   BEGIN
//   SELECT set_config('app.tenant', $1, true);   -- RLS (transaction-local)
//   SET LOCAL ROLE app_auth;
//   ... fn(tx) ...
//   COMMIT   (bei Erfolg)
//   ROLLBACK (bei jedem Fehler, danach wird der Fehler weitergeworfen)
//
// Die Transaktion haengt nicht am Request-Lebenszyklus: bricht der Client
// ab, laeuft run() trotzdem bis COMMIT/ROLLBACK durch.
// ============================================================================

import type pg from "pg";
import type { DbClient } from "./db.js";
import { toPersistenceError } from "./error-map.js";
import type { Logger } from "./logger.js";
import { createPgAuditLog, type AuditLogWriter } from "./audit.js";
import { createPgOutbox, type OutboxWriter } from "./outbox.js";
import { createPgUserRepository } from "../modules/users/repository.js";
import type { UserRepository } from "../modules/users/types.js";
import { createPgTotpSecretRepository } from "../modules/totp-secrets/repository.js";
import type { TotpSecretRepository } from "../modules/totp-secrets/types.js";
import { createPgRefreshTokenRepository } from "../modules/tokens/repository.js";
import type { RefreshTokenRepository } from "../modules/tokens/types.js";

export type TxContext = {
  tenantId: string;
  users: UserRepository;
  secrets: TotpSecretRepository;
  tokens: RefreshTokenRepository;
  audit: AuditLogWriter;
  outbox: OutboxWriter;
};

export interface UnitOfWork {
  run<T>(tenantId: string, fn: (tx: TxContext) => Promise<T>): Promise<T>;
}

function createPgTxContext(client: DbClient, tenantId: string): TxContext {
  return {
    tenantId,
    users: createPgUserRepository(client, tenantId),
    secrets: createPgTotpSecretRepository(client, tenantId),
    tokens: createPgRefreshTokenRepository(client, tenantId),
    audit: createPgAuditLog(client, tenantId),
    outbox: createPgOutbox(client, tenantId),
  };
}

export function createPgUnitOfWork(pool: pg.Pool, log: Logger): UnitOfWork {
  return {
    async run(tenantId, fn) {
      let client: DbClient;
      try {
        client = await pool.connect();
      } catch (err) {
        throw toPersistenceError(err, "acquire db connection");
      }

      let inTx = false;
      try {
        await client.query("BEGIN");
        inTx = true;

        await client.query("SELECT set_config('app.tenant', $1, true);", [tenantId]);
        await client.query("SET LOCAL ROLE app_auth;");

        const result = await fn(createPgTxContext(client, tenantId));

        await client.query("COMMIT");
        inTx = false;
        return result;
      } catch (err) {
        if (inTx) {
          try {
            await client.query("ROLLBACK");
          } catch (rollbackErr) {
            // Verbindung ist ohnehin unbrauchbar; Originalfehler hat Vorrang
            log.error({ err: rollbackErr }, "db_tx_rollback_failed");
          }
        }
        throw toPersistenceError(err, "transaction");
      } finally {
        client.release();
      }
    },
  };
}
