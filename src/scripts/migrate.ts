// src/scripts/migrate.ts
// ============================================================================
// Migrations-Runner
// - wendet migrations/*.sql in lexikografischer Reihenfolge an
// - jede Datei genau einmal (Tabelle schema_migrations), je in einer Transaktion
// ============================================================================

import { readdir, readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import path from "node:path";
import { loadEnv, assertStartupEnv } from "../libs/env.js";
import { closeDb, createPool, query } from "../libs/db.js";

// src/scripts -> ../../migrations (gilt ebenso für dist/scripts)
const MIGRATIONS_DIR = fileURLToPath(new URL("../../migrations/", import.meta.url));

async function main() {
  const env = loadEnv();
  assertStartupEnv(env);
  const pool = createPool(env.DATABASE_URL ?? "");

  try {
    await query(
      pool,
      `
        CREATE TABLE IF NOT EXISTS schema_migrations (
          name        text PRIMARY KEY,
          applied_at  timestamptz NOT NULL DEFAULT now()
        );
      `,
    );

    const applied = new Set(
      (await query<{ name: string }>(pool, "SELECT name FROM schema_migrations;")).map(
        (row) => row.name,
      ),
    );

    const files = (await readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith(".sql")).sort();

    for (const file of files) {
      if (applied.has(file)) {
        console.log(`[migrate] skip ${file}`);
        continue;
      }

      const sql = await readFile(path.join(MIGRATIONS_DIR, file), "utf8");
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        await client.query(sql);
        await client.query("INSERT INTO schema_migrations (name) VALUES ($1);", [file]);
        await client.query("COMMIT");
        console.log(`[migrate] applied ${file}`);
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      } finally {
        client.release();
      }
    }
  } finally {
    await closeDb(pool);
  }
}

main().catch((err: unknown) => {
  console.error("Migration fehlgeschlagen:", err);
  process.exit(1);
});
