// src/libs/outbox.ts
// ============================================================================
// Event-Hooks ueber auth.outbox_events
// ----------------------------------------------------------------------------
// - Events werden in derselben Transaktion wie die fachliche Aenderung
//   geschrieben; ein Relay liefert sie spaeter aus
// - "validate" + "signup" sind pro Nutzer idempotent (idempotency_key),
//   "login" wird bei jedem Grant geschrieben
// - Welche Events geschrieben werden, steuert HOOK_EVENTS
// ============================================================================

import type { DbClient } from "./db.js";
import { toPersistenceError } from "./error-map.js";
import { hashEmailForLog } from "./pii.js";
import type { UserRow } from "../modules/users/types.js";

export type HookEventKind = "validate" | "signup" | "login";

export type OutboxEventInput = {
  eventType: string;
  aggregateType?: string;
  aggregateId?: string | null;
  payload?: Record<string, unknown>;
  idempotencyKey?: string | null;
};

export interface OutboxWriter {
  append(event: OutboxEventInput): Promise<void>;
}

export function createPgOutbox(db: DbClient, tenantId: string): OutboxWriter {
  return {
    async append(event) {
      try {
        await db.query(
          `
            INSERT INTO auth.outbox_events (
              tenant_id,
              event_type,
              aggregate_type,
              aggregate_id,
              payload,
              idempotency_key,
              created_at
            )
            VALUES ($1, $2, $3, $4, $5::jsonb, $6, now())
            ON CONFLICT (tenant_id, event_type, idempotency_key)
            DO NOTHING;
          `,
          [
            tenantId,
            event.eventType,
            event.aggregateType ?? "user",
            event.aggregateId ?? null,
            JSON.stringify(event.payload ?? {}),
            event.idempotencyKey ?? null,
          ],
        );
      } catch (err) {
        throw toPersistenceError(err, "append outbox event");
      }
    },
  };
}

export async function fireEvent(
  outbox: OutboxWriter,
  kind: HookEventKind,
  user: UserRow,
  config: { hookEvents: ReadonlyArray<HookEventKind> },
): Promise<void> {
  if (!config.hookEvents.includes(kind)) return;

  await outbox.append({
    eventType: `user.${kind}`,
    aggregateType: "user",
    aggregateId: user.id,
    idempotencyKey: kind === "login" ? null : `${kind}:${user.id}`,
    payload: {
      event: kind,
      user_id: user.id,
      aud: user.aud,
      role: user.role,
      email_hash: user.email ? hashEmailForLog(user.email) : null,
      has_phone: user.phone !== null,
      provider: user.raw_app_meta_data.provider,
    },
  });
}
