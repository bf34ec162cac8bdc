// src/modules/signup/types.ts
// ============================================================================
// Typen fuer Signup / Bestaetigung / Access-Grant
// ============================================================================

import type { DeliveryGateway, Channel } from "../../libs/delivery.js";
import type { SignupConfig } from "../../libs/env.js";
import type { AccessTokenSigner } from "../../libs/jwt.js";
import type { Logger } from "../../libs/logger.js";
import type { SecretCipher } from "../../libs/secret-cipher.js";
import type { UnitOfWork } from "../../libs/unit-of-work.js";
import type { PublicUser, UserRow } from "../users/types.js";

// ---------------------------------------------------------------------------
// Abhaengigkeiten (werden in app.ts einmal gebaut, in Tests ersetzt)
// ---------------------------------------------------------------------------

export type SignupDeps = {
  uow: UnitOfWork;
  cipher: SecretCipher;
  delivery: { email: DeliveryGateway; phone: DeliveryGateway };
  tokens: AccessTokenSigner;
  hashPassword: (plain: string) => Promise<string>;
  config: SignupConfig;
  log: Logger;
  now: () => Date;
};

// ---------------------------------------------------------------------------
// Ein-/Ausgaben
// ---------------------------------------------------------------------------

export type SignupInput = {
  tenantId: string;
  aud?: string;
  email?: string;
  phone?: string;
  password: string;
  data?: Record<string, unknown>;
};

/** Validierte + normalisierte Eingabe. */
export type SignupParams = {
  tenantId: string;
  aud: string;
  email: string | null;
  phone: string | null;
  password: string;
  data: Record<string, unknown> | null;
  provider: "email" | "phone";
};

/** Ergebnis der Signup-Transaktion. */
export type SignupStepsOutcome = {
  user: UserRow;
  /** Kanaele, an die in dieser Transaktion tatsaechlich versendet wurde */
  issued: Channel[];
};

export type AccessGrant = {
  accessToken: string;
  tokenType: "bearer";
  expiresIn: number;
  expiresAt: number;
  refreshToken: string;
  user: PublicUser;
};

export type SignupResult =
  | { kind: "pending"; user: PublicUser; issued: Channel[] }
  | { kind: "granted"; grant: AccessGrant; issued: Channel[] };

/** Vorher/Nachher einer Schreiboperation, die bei Versandfehler zurueckgesetzt wird. */
export type PendingChange<T> = {
  before: T;
  after: T;
};
