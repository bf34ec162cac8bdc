// src/modules/users/repository.ts
// ============================================================================
// Persistence-Layer fuer auth.users
// ----------------------------------------------------------------------------
// - Direkter SQL-Zugriff ueber den Transaktions-Client (libs/unit-of-work.ts)
// - Lesende Zugriffe sperren die Zeile (FOR UPDATE): Signup und OTP-Anfrage
//   fuer denselben Nutzer laufen dadurch seriell
// - tenant_id wird explizit gefiltert, zusaetzlich greift RLS (app.tenant)
// - Keine Business-Logik, nur Datenzugriff
// ============================================================================

import type { DbClient } from "../../libs/db.js";
import { lookupOf, type Lookup } from "../../libs/db.js";
import { AlreadyRegisteredError, PersistenceError } from "../../libs/errors.js";
import { dbConstraint, isUniqueViolation, toPersistenceError } from "../../libs/error-map.js";
import type { NewUser, UserPatch, UserRepository, UserRow } from "./types.js";

const USER_COLUMNS = `
  id,
  tenant_id,
  aud,
  role,
  email,
  phone,
  encrypted_password,
  email_confirmed_at,
  confirmation_token_hash,
  confirmation_sent_at,
  phone_confirmed_at,
  phone_confirmation_sent_at,
  raw_app_meta_data,
  raw_user_meta_data,
  created_at,
  updated_at
`;

const PATCHABLE_COLUMNS = [
  "email",
  "phone",
  "email_confirmed_at",
  "confirmation_token_hash",
  "confirmation_sent_at",
  "phone_confirmed_at",
  "phone_confirmation_sent_at",
  "raw_user_meta_data",
] as const satisfies ReadonlyArray<keyof UserPatch>;

export function createPgUserRepository(client: DbClient, tenantId: string): UserRepository {
  async function findOneBy(
    column: "email" | "phone",
    value: string,
    aud: string,
  ): Promise<Lookup<UserRow>> {
    try {
      const { rows } = await client.query<UserRow>(
        `
          SELECT ${USER_COLUMNS}
          FROM auth.users
          WHERE tenant_id = $1
            AND ${column} = $2
            AND aud = $3
          LIMIT 1
          FOR UPDATE;
        `,
        [tenantId, value, aud],
      );
      return lookupOf(rows[0]);
    } catch (err) {
      throw toPersistenceError(err, `find user by ${column}`);
    }
  }

  return {
    findByEmail(email, aud) {
      return findOneBy("email", email.toLowerCase(), aud);
    },

    findByPhone(phone, aud) {
      return findOneBy("phone", phone, aud);
    },

    async create(input: NewUser) {
      try {
        const { rows } = await client.query<UserRow>(
          `
            INSERT INTO auth.users (
              tenant_id,
              aud,
              role,
              email,
              phone,
              encrypted_password,
              raw_app_meta_data,
              raw_user_meta_data,
              created_at,
              updated_at
            )
            VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::jsonb, $9, $9)
            RETURNING ${USER_COLUMNS};
          `,
          [
            tenantId,
            input.aud,
            input.role,
            input.email?.toLowerCase() ?? null,
            input.phone,
            input.encryptedPassword,
            JSON.stringify(input.appMetaData),
            JSON.stringify(input.userMetaData),
            input.now,
          ],
        );

        const row = rows[0];
        if (!row) throw new PersistenceError("insert user returned no row");
        return row;
      } catch (err) {
        // Paralleler Signup mit derselben Adresse/Nummer
        if (isUniqueViolation(err)) {
          throw new AlreadyRegisteredError(
            dbConstraint(err)?.includes("phone") ? "phone" : "email",
          );
        }
        throw toPersistenceError(err, "insert user");
      }
    },

    async update(userId: string, patch: UserPatch, now: Date) {
      const sets: string[] = [];
      const values: unknown[] = [tenantId, userId];

      for (const column of PATCHABLE_COLUMNS) {
        const value = patch[column];
        if (value === undefined) continue;

        if (column === "raw_user_meta_data") {
          values.push(JSON.stringify(value));
          sets.push(`${column} = $${values.length}::jsonb`);
        } else {
          values.push(value);
          sets.push(`${column} = $${values.length}`);
        }
      }

      values.push(now);
      sets.push(`updated_at = $${values.length}`);

      try {
        const { rows } = await client.query<UserRow>(
          `
            UPDATE auth.users
            SET ${sets.join(", ")}
            WHERE tenant_id = $1
              AND id = $2
            RETURNING ${USER_COLUMNS};
          `,
          values,
        );

        const row = rows[0];
        if (!row) throw new PersistenceError("update user: row not found");
        return row;
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new AlreadyRegisteredError(
            dbConstraint(err)?.includes("phone") ? "phone" : "email",
          );
        }
        throw toPersistenceError(err, "update user");
      }
    },
  };
}
