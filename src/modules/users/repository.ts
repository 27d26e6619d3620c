// src/modules/users/repository.ts
// ============================================================================
// User-Repository (PostgreSQL)
// ----------------------------------------------------------------------------
// - Zugriff auf public.users
// - KEINE Business-Logik, nur Datenzugriff
// - Jede Schreiboperation ist ein einzelnes UPDATE ... WHERE ... RETURNING,
//   d. h. Postgres serialisiert konkurrierende Writes auf dieselbe Zeile
//   (Row-Lock). Rotation = Compare-and-Swap auf refresh_token_hash.
// - Treiberfehler: 23505 -> DuplicateIdentityError, Rest -> StoreUnavailableError
// ============================================================================

import type { DbPool } from "../../libs/db.js";
import { DuplicateIdentityError, StoreUnavailableError } from "../../libs/errors.js";
import { dbHealth } from "../../libs/db.js";
import { toUtcInstant } from "../../libs/time.js";
import type {
  AccountPatch,
  ExternalTokenState,
  NewUser,
  RefreshTokenExpectation,
  RefreshTokenState,
  UserRecord,
  UserRow,
  UserStore,
} from "./types.js";

const USER_COLUMNS = `
  id,
  username,
  email,
  password_hash,
  is_active,
  role,
  refresh_token_hash,
  refresh_token_expires_at,
  token_version,
  external_access_token,
  external_refresh_token,
  external_open_id,
  external_token_expires_at,
  created_at,
  updated_at
`;

const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

function requireInstant(value: Date | string, column: string): Date {
  const instant = toUtcInstant(value);
  if (!instant) {
    throw new Error(`invalid_timestamp:${column}`);
  }
  return instant;
}

function mapExternalToken(row: UserRow): ExternalTokenState | null {
  if (row.external_access_token === null || row.external_open_id === null) return null;
  return {
    accessToken: row.external_access_token,
    refreshToken: row.external_refresh_token,
    openId: row.external_open_id,
    expiresAt: toUtcInstant(row.external_token_expires_at),
  };
}

export function mapUserRow(row: UserRow): UserRecord {
  const expiresAt = toUtcInstant(row.refresh_token_expires_at);
  const hasRefresh = row.refresh_token_hash !== null && expiresAt !== null;

  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    isActive: row.is_active,
    role: row.role,
    // Paar-Invariante: halber Refresh-State zählt als "kein Token"
    refreshTokenHash: hasRefresh ? row.refresh_token_hash : null,
    refreshTokenExpiresAt: hasRefresh ? expiresAt : null,
    tokenVersion: Number(row.token_version),
    externalToken: mapExternalToken(row),
    createdAt: requireInstant(row.created_at, "created_at"),
    updatedAt: requireInstant(row.updated_at, "updated_at"),
  };
}

function sqlState(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export class PgUserStore implements UserStore {
  constructor(private readonly pool: DbPool) {}

  private async run<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (sqlState(err) === "23505") {
        throw new DuplicateIdentityError();
      }
      throw new StoreUnavailableError({ cause: err });
    }
  }

  private async one(sql: string, params: unknown[]): Promise<UserRecord | null> {
    return this.run(async () => {
      const { rows } = await this.pool.query<UserRow>(sql, params);
      const row = rows[0];
      return row ? mapUserRow(row) : null;
    });
  }

  // ---------------------------------------------------------------------------
  // Lesen
  // ---------------------------------------------------------------------------

  async findById(id: string): Promise<UserRecord | null> {
    // Ungültige UUID würde in Postgres 22P02 werfen -> vorher abfangen
    if (!UUID_RE.test(id)) return null;

    return this.one(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1 LIMIT 1;`, [id]);
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    return this.one(`SELECT ${USER_COLUMNS} FROM users WHERE username = $1 LIMIT 1;`, [
      username,
    ]);
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    return this.one(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1 LIMIT 1;`, [
      email.trim().toLowerCase(),
    ]);
  }

  // ---------------------------------------------------------------------------
  // Anlegen
  // ---------------------------------------------------------------------------

  async insert(user: NewUser): Promise<UserRecord> {
    const created = await this.one(
      `
        INSERT INTO users (username, email, password_hash, role, is_active)
        VALUES ($1, $2, $3, $4, $5)
        RETURNING ${USER_COLUMNS};
      `,
      [
        user.username,
        user.email.trim().toLowerCase(),
        user.passwordHash,
        user.role ?? "user",
        user.isActive ?? true,
      ],
    );

    if (!created) {
      throw new StoreUnavailableError({ cause: new Error("insert_returned_no_row") });
    }
    return created;
  }

  // ---------------------------------------------------------------------------
  // Refresh-State
  // ---------------------------------------------------------------------------

  async replaceRefreshToken(
    userId: string,
    expectedTokenVersion: number,
    next: RefreshTokenState,
  ): Promise<boolean> {
    return this.run(async () => {
      const res = await this.pool.query(
        `
          UPDATE users
          SET
            refresh_token_hash = $2,
            refresh_token_expires_at = $3,
            updated_at = now()
          WHERE id = $1
            AND token_version = $4;
        `,
        [userId, next.hash, next.expiresAt, expectedTokenVersion],
      );
      return (res.rowCount ?? 0) === 1;
    });
  }

  async swapRefreshToken(
    userId: string,
    expected: RefreshTokenExpectation,
    next: RefreshTokenState,
  ): Promise<boolean> {
    return this.run(async () => {
      const res = await this.pool.query(
        `
          UPDATE users
          SET
            refresh_token_hash = $4,
            refresh_token_expires_at = $5,
            updated_at = now()
          WHERE id = $1
            AND refresh_token_hash = $2
            AND token_version = $3;
        `,
        [userId, expected.hash, expected.tokenVersion, next.hash, next.expiresAt],
      );
      return (res.rowCount ?? 0) === 1;
    });
  }

  async revokeAll(userId: string): Promise<number | null> {
    return this.run(async () => {
      const { rows } = await this.pool.query<{ token_version: number }>(
        `
          UPDATE users
          SET
            token_version = token_version + 1,
            refresh_token_hash = NULL,
            refresh_token_expires_at = NULL,
            updated_at = now()
          WHERE id = $1
          RETURNING token_version;
        `,
        [userId],
      );
      const row = rows[0];
      return row ? Number(row.token_version) : null;
    });
  }

  // ---------------------------------------------------------------------------
  // Account-Verwaltung (Admin)
  // ---------------------------------------------------------------------------

  async updateAccount(userId: string, patch: AccountPatch): Promise<UserRecord | null> {
    return this.one(
      `
        UPDATE users
        SET
          role = COALESCE($2, role),
          is_active = COALESCE($3, is_active),
          updated_at = now()
        WHERE id = $1
        RETURNING ${USER_COLUMNS};
      `,
      [userId, patch.role ?? null, patch.isActive ?? null],
    );
  }

  // ---------------------------------------------------------------------------
  // Externe Plattform (Token aus dem OAuth-Callback)
  // ---------------------------------------------------------------------------

  async setExternalToken(userId: string, state: ExternalTokenState): Promise<UserRecord | null> {
    return this.one(
      `
        UPDATE users
        SET
          external_access_token = $2,
          external_refresh_token = $3,
          external_open_id = $4,
          external_token_expires_at = $5,
          updated_at = now()
        WHERE id = $1
        RETURNING ${USER_COLUMNS};
      `,
      [userId, state.accessToken, state.refreshToken, state.openId, state.expiresAt],
    );
  }

  async clearExternalToken(userId: string): Promise<boolean> {
    return this.run(async () => {
      const res = await this.pool.query(
        `
          UPDATE users
          SET
            external_access_token = NULL,
            external_refresh_token = NULL,
            external_open_id = NULL,
            external_token_expires_at = NULL,
            updated_at = now()
          WHERE id = $1;
        `,
        [userId],
      );
      return (res.rowCount ?? 0) === 1;
    });
  }

  async health(): Promise<{ ok: boolean; error?: string }> {
    return dbHealth(this.pool);
  }
}
