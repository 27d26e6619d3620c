// src/scripts/set-role.ts
// ============================================================================
// Rolle eines Users setzen (Bootstrap des ersten Admins)
//
//   npm run set-role -- <username> <user|admin>
//
// Widerruft danach alle Credentials des Users, damit die neue Rolle
// mit frischen Tokens wirksam wird.
// ============================================================================

import { loadEnv, assertStartupEnv } from "../libs/env.js";
import { closeDb, createPool } from "../libs/db.js";
import { PgUserStore } from "../modules/users/repository.js";
import { RevocationController } from "../modules/auth/revocation.js";
import { USER_ROLES, type UserRole } from "../modules/users/types.js";

function isRole(value: string | undefined): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

async function main() {
  const [username, role] = process.argv.slice(2);
  if (!username || !isRole(role)) {
    console.error(`Aufruf: set-role <username> <${USER_ROLES.join("|")}>`);
    process.exit(2);
  }

  const env = loadEnv();
  assertStartupEnv(env);
  const pool = createPool(env.DATABASE_URL ?? "");
  const store = new PgUserStore(pool);

  try {
    const user = await store.findByUsername(username);
    if (!user) {
      console.error(`User "${username}" nicht gefunden.`);
      process.exitCode = 1;
      return;
    }

    await store.updateAccount(user.id, { role });
    const version = await new RevocationController(store).revokeAll(user);
    console.log(`Rolle von ${username} ist jetzt "${role}" (token_version=${version}).`);
  } finally {
    await closeDb(pool);
  }
}

main().catch((err: unknown) => {
  console.error("set-role fehlgeschlagen:", err);
  process.exit(1);
});
