// src/libs/audit.ts
// ============================================================================
// Audit-Log (auth.audit_log_entries)
// ----------------------------------------------------------------------------
// Eintraege werden in der laufenden Transaktion geschrieben: ein Rollback
// entfernt auch den Audit-Eintrag.
// ============================================================================

import type { DbClient } from "./db.js";
import { toPersistenceError } from "./error-map.js";
import type { UserRow } from "../modules/users/types.js";

export type AuditAction = "user_signedup" | "user_confirmation_requested" | "login";

export type AuditEntryInput = {
  actorId: string;
  action: AuditAction;
  traits: Record<string, unknown>;
  createdAt: Date;
};

export interface AuditLogWriter {
  append(entry: AuditEntryInput): Promise<void>;
}

export function createPgAuditLog(db: DbClient, tenantId: string): AuditLogWriter {
  return {
    async append(entry) {
      try {
        await db.query(
          `
            INSERT INTO auth.audit_log_entries (tenant_id, actor_id, action, traits, created_at)
            VALUES ($1, $2, $3, $4::jsonb, $5);
          `,
          [tenantId, entry.actorId, entry.action, JSON.stringify(entry.traits), entry.createdAt],
        );
      } catch (err) {
        throw toPersistenceError(err, "append audit entry");
      }
    },
  };
}

export async function recordAuditEntry(
  audit: AuditLogWriter,
  user: UserRow,
  action: AuditAction,
  now: Date,
  traits: Record<string, unknown> = {},
): Promise<void> {
  await audit.append({
    actorId: user.id,
    action,
    traits: { provider: user.raw_app_meta_data.provider, ...traits },
    createdAt: now,
  });
}
