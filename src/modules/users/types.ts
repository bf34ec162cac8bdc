// src/modules/users/types.ts
// ============================================================================
// Typen fuer auth.users
// ----------------------------------------------------------------------------
// - UserRow: 1:1 die DB-Spalten (intern)
// - PublicUser: datensparsame Sicht fuer das API (kein Passwort-Hash,
//   kein Token-Hash, keine tenant_id)
// ============================================================================

import type { Lookup } from "../../libs/db.js";

export type AppMetaData = {
  provider: "email" | "phone";
  providers: Array<"email" | "phone">;
};

export interface UserRow {
  id: string;
  tenant_id: string;
  aud: string;
  role: string;
  email: string | null;
  phone: string | null;
  encrypted_password: string;
  email_confirmed_at: Date | null;
  confirmation_token_hash: string | null;
  confirmation_sent_at: Date | null;
  phone_confirmed_at: Date | null;
  phone_confirmation_sent_at: Date | null;
  raw_app_meta_data: AppMetaData;
  raw_user_meta_data: Record<string, unknown>;
  created_at: Date;
  updated_at: Date;
}

export type NewUser = {
  aud: string;
  role: string;
  email: string | null;
  phone: string | null;
  encryptedPassword: string;
  appMetaData: AppMetaData;
  userMetaData: Record<string, unknown>;
  now: Date;
};

/** Spalten, die nach dem Anlegen geaendert werden duerfen. */
export type UserPatch = Partial<
  Pick<
    UserRow,
    | "email"
    | "phone"
    | "email_confirmed_at"
    | "confirmation_token_hash"
    | "confirmation_sent_at"
    | "phone_confirmed_at"
    | "phone_confirmation_sent_at"
    | "raw_user_meta_data"
  >
>;

export interface UserRepository {
  findByEmail(email: string, aud: string): Promise<Lookup<UserRow>>;
  findByPhone(phone: string, aud: string): Promise<Lookup<UserRow>>;
  create(input: NewUser): Promise<UserRow>;
  update(userId: string, patch: UserPatch, now: Date): Promise<UserRow>;
}

export interface PublicUser {
  id: string;
  aud: string;
  role: string;
  email: string | null;
  phone: string | null;
  emailConfirmedAt: Date | null;
  phoneConfirmedAt: Date | null;
  confirmationSentAt: Date | null;
  phoneConfirmationSentAt: Date | null;
  appMetadata: AppMetaData;
  userMetadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export function toPublicUser(row: UserRow): PublicUser {
  return {
    id: row.id,
    aud: row.aud,
    role: row.role,
    email: row.email,
    phone: row.phone,
    emailConfirmedAt: row.email_confirmed_at,
    phoneConfirmedAt: row.phone_confirmed_at,
    confirmationSentAt: row.confirmation_sent_at,
    phoneConfirmationSentAt: row.phone_confirmation_sent_at,
    appMetadata: row.raw_app_meta_data,
    userMetadata: row.raw_user_meta_data,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
