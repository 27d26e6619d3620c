// src/modules/auth/refresh-tokens.ts
// ============================================================================
// Refresh-Token-Manager
// ----------------------------------------------------------------------------
// Format (für den Client opak):  <user-id>.<32 Byte Zufall, base64url>
// - user-id ist nur Selector für den Lookup, kein Geheimnis
// - gespeichert wird ausschließlich der argon2id-Digest des gesamten Tokens
//   plus absolutes Ablaufdatum (users.refresh_token_*)
// - pro User existiert höchstens EIN lebendes Refresh-Token
//
// Rotation (einziger Weg zu einem neuen Token-Paar):
//   1) Digest vorhanden?          sonst -> reject (verbraucht / nie ausgestellt)
//   2) expires_at > now (UTC)?    sonst -> reject
//   3) argon2.verify(presented)   sonst -> reject
//   4) Compare-and-Swap auf (digest, token_version) -> neuer Digest
// Verlorener Swap (paralleler Refresh / Logout) -> reject. Alles einheitlich
// InvalidCredentialsError.
// ============================================================================

import { randomBytes } from "node:crypto";
import type { CredentialHasher } from "../../libs/crypto.js";
import { InvalidCredentialsError } from "../../libs/errors.js";
import { addSeconds, systemClock, type Clock } from "../../libs/time.js";
import type { UserRecord, UserStore } from "../users/types.js";

const SECRET_BYTES = 32;
const SELECTOR_RE =
  /^([0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12})\.([A-Za-z0-9_-]{43})$/i;

export interface IssuedRefreshToken {
  token: string;
  expiresAt: Date;
}

export interface RefreshTokenManagerDeps {
  store: UserStore;
  hasher: CredentialHasher;
  ttlSec: number;
  clock?: Clock;
}

export class RefreshTokenManager {
  private readonly store: UserStore;
  private readonly hasher: CredentialHasher;
  private readonly ttlSec: number;
  private readonly clock: Clock;

  constructor(deps: RefreshTokenManagerDeps) {
    this.store = deps.store;
    this.hasher = deps.hasher;
    this.ttlSec = deps.ttlSec;
    this.clock = deps.clock ?? systemClock;
  }

  /** Liefert die User-ID aus dem Selector-Teil oder null bei kaputtem Format. */
  static parseSelector(raw: string): string | null {
    const match = SELECTOR_RE.exec(raw.trim());
    return match?.[1] ? match[1].toLowerCase() : null;
  }

  /**
   * Neues Refresh-Token für den User (Login). Ersetzt ein evtl. vorhandenes,
   * aber nur auf derselben token_version wie `user`: ein Widerruf zwischen
   * Laden und Schreiben gewinnt. Der Klartext wird genau einmal zurückgegeben.
   */
  async issue(user: UserRecord): Promise<IssuedRefreshToken> {
    const next = await this.mint(user.id);

    const stored = await this.store.replaceRefreshToken(user.id, user.tokenVersion, {
      hash: next.hash,
      expiresAt: next.expiresAt,
    });
    if (!stored) {
      throw new InvalidCredentialsError("refresh_issue_lost");
    }

    return { token: next.token, expiresAt: next.expiresAt };
  }

  /**
   * Tauscht das präsentierte Token gegen ein neues. Das alte ist danach
   * sofort unbrauchbar (Replay-Schutz).
   */
  async rotate(user: UserRecord, presented: string): Promise<IssuedRefreshToken> {
    const storedHash = user.refreshTokenHash;
    const storedExpiry = user.refreshTokenExpiresAt;

    // 1) kein Digest -> bereits verbraucht, widerrufen oder nie ausgestellt
    if (!storedHash || !storedExpiry) {
      throw new InvalidCredentialsError("refresh_not_found");
    }

    // 2) Ablauf (beide Seiten UTC-Instants, siehe libs/time.ts)
    if (storedExpiry.getTime() <= this.clock.now().getTime()) {
      throw new InvalidCredentialsError("refresh_expired");
    }

    // 3) erst jetzt der teure Hash-Vergleich
    const matches = await this.hasher.verify(presented, storedHash);
    if (!matches) {
      throw new InvalidCredentialsError("refresh_mismatch");
    }

    // 4) atomar ersetzen, nur wenn niemand dazwischen rotiert/widerrufen hat
    const next = await this.mint(user.id);
    const swapped = await this.store.swapRefreshToken(
      user.id,
      { hash: storedHash, tokenVersion: user.tokenVersion },
      { hash: next.hash, expiresAt: next.expiresAt },
    );
    if (!swapped) {
      throw new InvalidCredentialsError("refresh_rotation_lost");
    }

    return { token: next.token, expiresAt: next.expiresAt };
  }

  private async mint(userId: string): Promise<IssuedRefreshToken & { hash: string }> {
    const token = `${userId}.${randomBytes(SECRET_BYTES).toString("base64url")}`;
    const hash = await this.hasher.hash(token);
    const expiresAt = addSeconds(this.clock.now(), this.ttlSec);
    return { token, hash, expiresAt };
  }
}
