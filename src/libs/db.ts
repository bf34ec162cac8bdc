// src/libs/db.ts
// ============================================================================
// PostgreSQL Connector
// - Ein zentraler Connection-Pool pro Prozess
// - Lookup<T>: "nicht gefunden" als typisiertes Ergebnis (kein Fehler)
// - Healthcheck-Funktionen für /health & Startup-Checks
// - Graceful Shutdown für geordnetes Beenden (z. B. bei SIGTERM)
// ============================================================================

import pg from "pg";
import { env } from "./env.js";

const { Pool } = pg;

// ============================================================================
// Typen
// ============================================================================

/**
 * DbClient
 * - Dedizierter Client pro Transaktion (BEGIN/COMMIT in unit-of-work.ts).
 */
export type DbClient = pg.PoolClient;

/**
 * Ergebnis eines find-one: "nicht gefunden" ist ein normaler Ausgang,
 * Infrastrukturfehler werden dagegen geworfen (PersistenceError).
 */
export type Lookup<T> = { found: true; row: T } | { found: false };

export function lookupOf<T>(row: T | undefined): Lookup<T> {
  return row === undefined ? { found: false } : { found: true, row };
}

// ============================================================================
// Connection-Pool
// ----------------------------------------------------------------------------
// EIN Pool pro Prozess. Verbindungen werden erst beim ersten connect() geöffnet.
// ============================================================================

export const pool = new Pool({
  connectionString: env.DATABASE_URL,
  max: env.DB_POOL_MAX,
  idleTimeoutMillis: 10_000,
  connectionTimeoutMillis: 5_000,
});

// ============================================================================
// Healthcheck für /health
// ============================================================================

/**
 * Führt einen einfachen Healthcheck gegen die Datenbank aus.
 *
 * @returns { ok: true } wenn die DB erreichbar ist,
 *          { ok: false, error: string } bei Fehler
 */
export async function dbHealth(): Promise<{ ok: boolean; error?: string }> {
  try {
    await pool.query("SELECT 1;");
    return { ok: true };
  } catch (err: unknown) {
    const message =
      err instanceof Error ? err.message : "unknown database error";

    return {
      ok: false,
      error: message,
    };
  }
}

// ============================================================================
// Graceful Shutdown
// ============================================================================

/**
 * Beendet den globalen Connection-Pool.
 */
export async function closeDb(): Promise<void> {
  await pool.end();
}
