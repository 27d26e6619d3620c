// src/modules/users/types.ts
// ============================================================================
// Typen für User-Identität (users-Tabelle) + Store-Vertrag
// ----------------------------------------------------------------------------
// - UserRow spiegelt 1:1 die Tabelle (snake_case, Rohdaten aus Postgres)
// - UserRecord ist die normalisierte Form für den Auth-Kern
//   (Zeitstempel als UTC-Date, camelCase)
// - PublicUser ist die einzige Form, die nach außen geht (keine Hashes)
// ============================================================================

export const USER_ROLES = ["user", "admin"] as const;
export type UserRole = (typeof USER_ROLES)[number];

// -----------------------------
// DB-Row-Typ
// -----------------------------

export interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  is_active: boolean;
  role: UserRole;
  refresh_token_hash: string | null;
  refresh_token_expires_at: Date | string | null;
  token_version: number;
  external_access_token: string | null;
  external_refresh_token: string | null;
  external_open_id: string | null;
  external_token_expires_at: Date | string | null;
  created_at: Date | string;
  updated_at: Date | string;
}

// -----------------------------
// Domain
// -----------------------------

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  isActive: boolean;
  role: UserRole;
  refreshTokenHash: string | null;
  refreshTokenExpiresAt: Date | null;
  tokenVersion: number;
  /** Verbindung zur externen Plattform; null = nicht verbunden. */
  externalToken: ExternalTokenState | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  role?: UserRole;
  isActive?: boolean;
}

/** Digest + Ablauf werden immer gemeinsam geschrieben. */
export interface RefreshTokenState {
  hash: string;
  expiresAt: Date;
}

/** Erwarteter Zustand für Compare-and-Swap bei der Rotation. */
export interface RefreshTokenExpectation {
  hash: string;
  tokenVersion: number;
}

/**
 * Token der externen Plattform, wie ihn der OAuth-Callback liefert.
 * Wird nur gespeichert und ersetzt, nie vom Auth-Kern verwendet.
 */
export interface ExternalTokenState {
  accessToken: string;
  refreshToken: string | null;
  openId: string;
  expiresAt: Date | null;
}

export interface AccountPatch {
  role?: UserRole;
  isActive?: boolean;
}

export interface PublicUser {
  id: string;
  username: string;
  email: string;
  role: UserRole;
  is_active: boolean;
  created_at: string;
}

// -----------------------------
// Store-Vertrag
// -----------------------------
//
// Jede schreibende Operation ist EIN atomarer Schritt auf genau einer Zeile.
// Refresh-Felder werden ausschließlich über replaceRefreshToken,
// swapRefreshToken und revokeAll verändert, die external_*-Felder nur über
// setExternalToken / clearExternalToken.
//
// Fehler:
// - insert: DuplicateIdentityError bei Username/E-Mail-Kollision
// - alle: StoreUnavailableError, wenn die Persistenz nicht erreichbar ist
//

export interface UserStore {
  findById(id: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;

  insert(user: NewUser): Promise<UserRecord>;

  /**
   * Setzt Refresh-State (Login), solange token_version noch dem Stand beim
   * Laden des Users entspricht. false = User fehlt oder wurde inzwischen
   * widerrufen.
   */
  replaceRefreshToken(
    userId: string,
    expectedTokenVersion: number,
    next: RefreshTokenState,
  ): Promise<boolean>;

  /**
   * Ersetzt den Refresh-State nur, wenn Digest UND token_version noch dem
   * erwarteten Stand entsprechen. false = Rotation verloren (Replay/Race/Revoke).
   */
  swapRefreshToken(
    userId: string,
    expected: RefreshTokenExpectation,
    next: RefreshTokenState,
  ): Promise<boolean>;

  /** token_version + 1, Refresh-State löschen. Liefert neue Version oder null. */
  revokeAll(userId: string): Promise<number | null>;

  updateAccount(userId: string, patch: AccountPatch): Promise<UserRecord | null>;

  /** Ersetzt alle vier external_*-Felder. null = User existiert nicht. */
  setExternalToken(userId: string, state: ExternalTokenState): Promise<UserRecord | null>;

  /** Löscht alle external_*-Felder. false = User existiert nicht. */
  clearExternalToken(userId: string): Promise<boolean>;

  health(): Promise<{ ok: boolean; error?: string }>;
}

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    is_active: user.isActive,
    created_at: user.createdAt.toISOString(),
  };
}
