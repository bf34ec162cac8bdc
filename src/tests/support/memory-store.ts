// In-Memory-Ersatz fuer PostgreSQL hinter dem UnitOfWork-Interface.
// - Transaktionen laufen strikt nacheinander (entspricht FOR UPDATE auf
//   derselben Zeile)
// - Rollback stellt den Snapshot vom Transaktionsbeginn wieder her
// - failOn() simuliert Infrastrukturfehler einzelner Operationen
// - conflictOn() simuliert eine parallel committete Transaktion, an deren
//   Unique-Index die laufende scheitert

import { randomUUID } from "node:crypto";
import type { AuditEntryInput } from "../../libs/audit.js";
import { lookupOf } from "../../libs/db.js";
import { AlreadyRegisteredError, PersistenceError } from "../../libs/errors.js";
import type { OutboxEventInput } from "../../libs/outbox.js";
import type { TxContext, UnitOfWork } from "../../libs/unit-of-work.js";
import type { RefreshTokenRow } from "../../modules/tokens/types.js";
import type { TotpSecretRow } from "../../modules/totp-secrets/types.js";
import type { UserRow } from "../../modules/users/types.js";

export type StoredAuditEntry = AuditEntryInput & { tenantId: string };
export type StoredOutboxEvent = OutboxEventInput & { tenantId: string };

export type Tables = {
  users: UserRow[];
  secrets: TotpSecretRow[];
  tokens: RefreshTokenRow[];
  audit: StoredAuditEntry[];
  outbox: StoredOutboxEvent[];
};

function emptyTables(): Tables {
  return { users: [], secrets: [], tokens: [], audit: [], outbox: [] };
}

function cloneUser(row: UserRow): UserRow {
  return {
    ...row,
    raw_app_meta_data: structuredClone(row.raw_app_meta_data),
    raw_user_meta_data: structuredClone(row.raw_user_meta_data),
  };
}

function cloneSecret(row: TotpSecretRow): TotpSecretRow {
  return { ...row, encrypted_payload: Buffer.from(row.encrypted_payload) };
}

export function cloneTables(t: Tables): Tables {
  return {
    users: t.users.map(cloneUser),
    secrets: t.secrets.map(cloneSecret),
    tokens: t.tokens.map((r) => ({ ...r })),
    audit: t.audit.map((e) => ({ ...e, traits: structuredClone(e.traits) })),
    outbox: t.outbox.map((e) => ({ ...e })),
  };
}

export class MemoryStore implements UnitOfWork {
  tables: Tables = emptyTables();
  commits = 0;
  rollbacks = 0;

  private queue: Promise<unknown> = Promise.resolve();
  private failing = new Set<string>();
  private conflicts = new Map<string, { concurrent: (tables: Tables) => void; error: Error }>();
  private committedMeanwhile: Array<(tables: Tables) => void> = [];

  /** Naechster Aufruf von `operation` (z. B. "users.update") wirft PersistenceError. */
  failOn(operation: string) {
    this.failing.add(operation);
  }

  /**
   * Naechster Aufruf von `operation` wirft `error`; `concurrent` gilt danach
   * als von einer anderen Transaktion committet (ueberlebt den Rollback).
   */
  conflictOn(operation: string, concurrent: (tables: Tables) => void, error: Error) {
    this.conflicts.set(operation, { concurrent, error });
  }

  run<T>(tenantId: string, fn: (tx: TxContext) => Promise<T>): Promise<T> {
    const result = this.queue.then(() => this.runExclusive(tenantId, fn));
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async runExclusive<T>(tenantId: string, fn: (tx: TxContext) => Promise<T>): Promise<T> {
    const snapshot = cloneTables(this.tables);
    try {
      const result = await fn(this.createTx(tenantId));
      this.commits += 1;
      return result;
    } catch (err) {
      this.tables = snapshot;
      this.rollbacks += 1;
      throw err;
    } finally {
      for (const apply of this.committedMeanwhile.splice(0)) apply(this.tables);
    }
  }

  private check(operation: string) {
    const conflict = this.conflicts.get(operation);
    if (conflict) {
      this.conflicts.delete(operation);
      this.committedMeanwhile.push(conflict.concurrent);
      throw conflict.error;
    }
    if (this.failing.delete(operation)) {
      throw new PersistenceError(`${operation} failed`, "08006");
    }
  }

  private createTx(tenantId: string): TxContext {
    const store = this;

    const findUser = (predicate: (u: UserRow) => boolean) =>
      lookupOf(store.tables.users.find((u) => u.tenant_id === tenantId && predicate(u)));

    const assertUnique = (candidate: Pick<UserRow, "id" | "email" | "phone" | "aud">) => {
      for (const u of store.tables.users) {
        if (u.tenant_id !== tenantId || u.id === candidate.id || u.aud !== candidate.aud) continue;
        if (candidate.email !== null && u.email === candidate.email) {
          throw new AlreadyRegisteredError("email");
        }
        if (candidate.phone !== null && u.phone === candidate.phone) {
          throw new AlreadyRegisteredError("phone");
        }
      }
    };

    return {
      tenantId,

      users: {
        async findByEmail(email, aud) {
          store.check("users.findByEmail");
          const found = findUser((u) => u.email === email.toLowerCase() && u.aud === aud);
          return found.found ? { found: true, row: cloneUser(found.row) } : found;
        },
        async findByPhone(phone, aud) {
          store.check("users.findByPhone");
          const found = findUser((u) => u.phone === phone && u.aud === aud);
          return found.found ? { found: true, row: cloneUser(found.row) } : found;
        },
        async create(input) {
          store.check("users.create");
          const row: UserRow = {
            id: randomUUID(),
            tenant_id: tenantId,
            aud: input.aud,
            role: input.role,
            email: input.email?.toLowerCase() ?? null,
            phone: input.phone,
            encrypted_password: input.encryptedPassword,
            email_confirmed_at: null,
            confirmation_token_hash: null,
            confirmation_sent_at: null,
            phone_confirmed_at: null,
            phone_confirmation_sent_at: null,
            raw_app_meta_data: structuredClone(input.appMetaData),
            raw_user_meta_data: structuredClone(input.userMetaData),
            created_at: input.now,
            updated_at: input.now,
          };
          assertUnique(row);
          store.tables.users.push(row);
          return cloneUser(row);
        },
        async update(userId, patch, now) {
          store.check("users.update");
          const index = store.tables.users.findIndex((u) => u.tenant_id === tenantId && u.id === userId);
          const current = store.tables.users[index];
          if (!current) throw new PersistenceError("update user: row not found");

          const next: UserRow = { ...current, updated_at: now };
          if (patch.email !== undefined) next.email = patch.email;
          if (patch.phone !== undefined) next.phone = patch.phone;
          if (patch.email_confirmed_at !== undefined) next.email_confirmed_at = patch.email_confirmed_at;
          if (patch.confirmation_token_hash !== undefined) {
            next.confirmation_token_hash = patch.confirmation_token_hash;
          }
          if (patch.confirmation_sent_at !== undefined) next.confirmation_sent_at = patch.confirmation_sent_at;
          if (patch.phone_confirmed_at !== undefined) next.phone_confirmed_at = patch.phone_confirmed_at;
          if (patch.phone_confirmation_sent_at !== undefined) {
            next.phone_confirmation_sent_at = patch.phone_confirmation_sent_at;
          }
          if (patch.raw_user_meta_data !== undefined) {
            next.raw_user_meta_data = structuredClone(patch.raw_user_meta_data);
          }

          assertUnique(next);
          store.tables.users[index] = next;
          return cloneUser(next);
        },
      },

      secrets: {
        async findForUpdate(userId, channel) {
          store.check("secrets.findForUpdate");
          const row = store.tables.secrets.find(
            (s) => s.tenant_id === tenantId && s.user_id === userId && s.channel === channel,
          );
          return lookupOf(row ? cloneSecret(row) : undefined);
        },
        async insertIfAbsent(input) {
          store.check("secrets.insertIfAbsent");
          const exists = store.tables.secrets.some(
            (s) => s.tenant_id === tenantId && s.user_id === input.userId && s.channel === input.channel,
          );
          if (exists) return { inserted: false };

          const row: TotpSecretRow = {
            id: randomUUID(),
            user_id: input.userId,
            tenant_id: tenantId,
            channel: input.channel,
            encrypted_payload: Buffer.from(input.encryptedPayload),
            key_version: input.keyVersion,
            otp_last_requested_at: null,
            created_at: input.now,
            updated_at: input.now,
          };
          store.tables.secrets.push(row);
          return { inserted: true, row: cloneSecret(row) };
        },
        async updateLastRequestedAt(secretId, at) {
          store.check("secrets.updateLastRequestedAt");
          const row = store.tables.secrets.find((s) => s.tenant_id === tenantId && s.id === secretId);
          if (!row) throw new PersistenceError("update totp secret: row not found");
          row.otp_last_requested_at = at;
          row.updated_at = at;
          return cloneSecret(row);
        },
      },

      tokens: {
        async create(input) {
          store.check("tokens.create");
          const row: RefreshTokenRow = {
            id: randomUUID(),
            tenant_id: tenantId,
            user_id: input.userId,
            type: "refresh",
            token_hash: input.tokenHash,
            expires_at: input.expiresAt,
            created_at: input.now,
          };
          store.tables.tokens.push(row);
          return { ...row };
        },
      },

      audit: {
        async append(entry) {
          store.check("audit.append");
          store.tables.audit.push({ ...entry, tenantId });
        },
      },

      outbox: {
        async append(event) {
          store.check("outbox.append");
          const duplicate =
            event.idempotencyKey != null &&
            store.tables.outbox.some(
              (e) =>
                e.tenantId === tenantId &&
                e.eventType === event.eventType &&
                e.idempotencyKey === event.idempotencyKey,
            );
          if (!duplicate) store.tables.outbox.push({ ...event, tenantId });
        },
      },
    };
  }
}
