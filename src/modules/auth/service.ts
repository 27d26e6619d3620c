// src/modules/auth/service.ts
// ============================================================================
// Auth-Service
// ----------------------------------------------------------------------------
// Verantwortlichkeiten:
// - Registrierung (Username/E-Mail eindeutig, Passwort-Hash)
// - Login mit Username/Passwort -> Access-Token (mit aktueller Epoch)
//   + Refresh-Token (ersetzt ein evtl. vorhandenes)
// - Refresh über opakes Refresh-Token (Rotation, Single-Use)
// - Logout = Widerruf aller Credentials des Users (Epoch + Refresh-State)
// ============================================================================

import type { CredentialHasher } from "../../libs/crypto.js";
import type { AccessTokenCodec } from "../../libs/jwt.js";
import {
  DuplicateIdentityError,
  InactiveAccountError,
  InvalidCredentialsError,
} from "../../libs/errors.js";
import { systemClock, toEpochSeconds, type Clock } from "../../libs/time.js";
import type { UserRecord, UserStore } from "../users/types.js";
import { RefreshTokenManager } from "./refresh-tokens.js";
import type { RevocationController } from "./revocation.js";
import type { LoginInput, RegisterInput, TokenSet } from "./types.js";

export interface AuthServiceDeps {
  store: UserStore;
  hasher: CredentialHasher;
  codec: AccessTokenCodec;
  refreshTokens: RefreshTokenManager;
  revocation: RevocationController;
  clock?: Clock;
}

export class AuthService {
  private readonly clock: Clock;

  constructor(private readonly deps: AuthServiceDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  // ---------------------------------------------------------------------------
  // Registrierung
  // ---------------------------------------------------------------------------

  async register(input: RegisterInput): Promise<UserRecord> {
    const { store, hasher } = this.deps;
    const username = input.username.trim();
    const email = input.email.trim().toLowerCase();

    const [byUsername, byEmail] = await Promise.all([
      store.findByUsername(username),
      store.findByEmail(email),
    ]);
    if (byUsername || byEmail) {
      throw new DuplicateIdentityError();
    }

    const passwordHash = await hasher.hash(input.password);

    // Race (paralleles Register): UNIQUE-Constraint im Store -> DuplicateIdentityError
    return store.insert({ username, email, passwordHash, role: "user", isActive: true });
  }

  // ---------------------------------------------------------------------------
  // Login
  // ---------------------------------------------------------------------------

  async login(input: LoginInput): Promise<{ user: UserRecord; tokens: TokenSet }> {
    const { store, hasher, refreshTokens } = this.deps;
    const user = await store.findByUsername(input.username.trim());

    // Timing-Hardening: auch bei unbekanntem User wird eine Verifikation ausgeführt.
    const digest = user?.passwordHash ?? (await hasher.dummy());
    const ok = await hasher.verify(input.password, digest);

    if (!user || !ok) {
      throw new InvalidCredentialsError("login_failed");
    }
    if (!user.isActive) {
      throw new InactiveAccountError();
    }

    const access = await this.mintAccess(user.username, user.tokenVersion);
    const refresh = await refreshTokens.issue(user);

    return {
      user,
      tokens: {
        accessToken: access.token,
        accessTokenExpiresAt: access.exp,
        refreshToken: refresh.token,
        refreshTokenExpiresAt: toEpochSeconds(refresh.expiresAt),
      },
    };
  }

  // ---------------------------------------------------------------------------
  // Refresh (Rotation)
  // ---------------------------------------------------------------------------

  async refresh(rawRefreshToken: string): Promise<{ user: UserRecord; tokens: TokenSet }> {
    const { store, refreshTokens } = this.deps;

    const userId = RefreshTokenManager.parseSelector(rawRefreshToken);
    if (!userId) {
      throw new InvalidCredentialsError("refresh_malformed");
    }

    const user = await store.findById(userId);
    if (!user) {
      throw new InvalidCredentialsError("refresh_user_missing");
    }
    if (!user.isActive) {
      throw new InactiveAccountError();
    }

    // Swap gelingt nur, wenn token_version unverändert ist -> Access-Token
    // mit user.tokenVersion ist garantiert aktuell zum Commit-Zeitpunkt.
    const refresh = await refreshTokens.rotate(user, rawRefreshToken);
    const access = await this.mintAccess(user.username, user.tokenVersion);

    return {
      user,
      tokens: {
        accessToken: access.token,
        accessTokenExpiresAt: access.exp,
        refreshToken: refresh.token,
        refreshTokenExpiresAt: toEpochSeconds(refresh.expiresAt),
      },
    };
  }

  // ---------------------------------------------------------------------------
  // Logout
  // ---------------------------------------------------------------------------

  async logout(user: Pick<UserRecord, "id">): Promise<number> {
    return this.deps.revocation.revokeAll(user);
  }

  private mintAccess(username: string, epoch: number) {
    return this.deps.codec.mint(username, epoch, this.clock.now());
  }
}
