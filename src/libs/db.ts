// src/libs/db.ts
// ============================================================================
// PostgreSQL Connector
// - Ein Connection-Pool pro Prozess (wird in server.ts / Skripten erzeugt)
// - Typsicheres query<T>() für einfache Statements
// - Healthcheck für /health
// - Zeitstempel: "timestamp without time zone" wird als UTC gelesen
// ============================================================================

import pg, { type QueryResultRow } from "pg";
import { toUtcInstant } from "./time.js";

const { Pool, types } = pg;

export type DbPool = pg.Pool;

// OID 1114 = timestamp (ohne Zone). Default-Parser von pg nimmt Server-Lokalzeit
// an; wir normalisieren hier zentral auf UTC.
const TIMESTAMP_OID = 1114;
types.setTypeParser(TIMESTAMP_OID, (value: string) => toUtcInstant(value));

/**
 * Erzeugt den Connection-Pool.
 *
 * Hinweise:
 * - max: maximale Anzahl gleichzeitiger Verbindungen im Pool
 * - idleTimeoutMillis: wie lange ein ungenutzter Client offen bleibt
 * - connectionTimeoutMillis: Timeout für Verbindungsaufbau
 */
export function createPool(connectionString: string): DbPool {
  return new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 10_000,
    connectionTimeoutMillis: 5_000,
  });
}

/**
 * Führt ein SQL-Statement aus und gibt die Ergebniszeilen typisiert zurück.
 *
 * @example
 *   const users = await query<{ id: string }>(pool, "SELECT id FROM users WHERE role = $1", ["admin"]);
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  pool: DbPool,
  sql: string,
  params: unknown[] = [],
): Promise<T[]> {
  const res = await pool.query<T>(sql, params);
  return res.rows;
}

export async function dbHealth(pool: DbPool): Promise<{ ok: boolean; error?: string }> {
  try {
    await pool.query("SELECT 1;");
    return { ok: true };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : "unknown database error";
    return { ok: false, error: message };
  }
}

export async function closeDb(pool: DbPool): Promise<void> {
  await pool.end();
}
