// src/libs/jwt.ts
// ============================================================================
// Access-Token Codec (JOSE)
// ----------------------------------------------------------------------------
// Design:
// - HMAC (HS256/384/512) mit prozessweitem Secret aus AuthConfig
// - sub = username, ver = token_version (Revocation-Epoch), typ = "access"
// - JTI pro Token (Audit / Log-Korrelation)
// - verify() beweist nur "wurde von uns ausgestellt und ist nicht abgelaufen".
//   Ob ver noch der aktuellen token_version entspricht, prüft das Gate.
// - Jeder Fehler -> InvalidCredentialsError (ein einheitlicher Fehler nach außen)
// ============================================================================

import { randomUUID } from "node:crypto";
import { SignJWT, jwtVerify, type JWTPayload } from "jose";
import type { AuthConfig } from "./env.js";
import { InvalidCredentialsError } from "./errors.js";
import { toEpochSeconds } from "./time.js";

export interface AccessTokenClaims extends JWTPayload {
  sub: string;   // username
  ver: number;   // token_version zum Ausstellungszeitpunkt
  jti: string;
  exp: number;   // Unix-Sekunden
  iat: number;
  typ: "access";
}

export interface MintedAccessToken {
  token: string;
  jti: string;
  exp: number;
}

export class AccessTokenCodec {
  constructor(private readonly cfg: AuthConfig["jwt"]) {
    if (cfg.secret.byteLength === 0) {
      throw new Error("JWT Secret fehlt: leeres Secret ist nicht erlaubt.");
    }
  }

  async mint(
    username: string,
    epoch: number,
    now: Date = new Date(),
    ttlSec: number = this.cfg.accessTtlSec,
  ): Promise<MintedAccessToken> {
    if (!username) throw new Error("sub_missing");
    if (!Number.isInteger(epoch) || epoch < 0) throw new Error("ver_invalid");

    const jti = randomUUID();
    const iat = toEpochSeconds(now);
    const exp = iat + ttlSec;

    const token = await new SignJWT({ typ: "access", ver: epoch })
      .setProtectedHeader({ alg: this.cfg.algorithm, typ: "JWT" })
      .setSubject(username)
      .setJti(jti)
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .setIssuer(this.cfg.issuer)
      .setAudience(this.cfg.audience)
      .sign(this.cfg.secret);

    return { token, jti, exp };
  }

  async verify(token: string, now: Date = new Date()): Promise<AccessTokenClaims> {
    let payload: JWTPayload;
    try {
      const verified = await jwtVerify(token, this.cfg.secret, {
        algorithms: [this.cfg.algorithm],
        issuer: this.cfg.issuer,
        audience: this.cfg.audience,
        clockTolerance: this.cfg.clockSkewSec,
        currentDate: now,
        requiredClaims: ["sub", "exp", "iat", "jti"],
      });
      payload = verified.payload;
    } catch {
      throw new InvalidCredentialsError("token_verification_failed");
    }

    return toAccessTokenClaims(payload);
  }
}

function toAccessTokenClaims(payload: JWTPayload): AccessTokenClaims {
  const { sub, jti, exp, iat } = payload;
  const ver = payload.ver;

  if (payload.typ !== "access") {
    throw new InvalidCredentialsError("invalid_token_type");
  }
  if (typeof sub !== "string" || sub.length === 0) {
    throw new InvalidCredentialsError("sub_missing");
  }
  if (typeof ver !== "number" || !Number.isInteger(ver) || ver < 0) {
    throw new InvalidCredentialsError("ver_missing");
  }
  if (typeof jti !== "string" || typeof exp !== "number" || typeof iat !== "number") {
    throw new InvalidCredentialsError("claims_incomplete");
  }

  return { ...payload, sub, ver, jti, exp, iat, typ: "access" };
}
