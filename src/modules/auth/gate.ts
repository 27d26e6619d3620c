// src/modules/auth/gate.ts
// ============================================================================
// Authentication-Gate (pro Request)
// ----------------------------------------------------------------------------
// Explizite, geordnete Kette von Stufen über einen Kontext-Wert. Jede Stufe
// bekommt den Kontext der vorherigen und liefert entweder einen angereicherten
// Kontext oder einen Fehler (Kurzschluss):
//
//   1) extractBearer      Authorization: Bearer <token>   -> 401
//   2) decodeAccessToken  Signatur / exp / Claims         -> 401
//   3) resolveSubject     User zu sub laden               -> 401
//   4) checkEpoch         ver === token_version           -> 401
//   5) requireActive      is_active                       -> 400
//   6) requireAdmin       role === "admin"                -> 403
//
// Level:
//   identity = 1..4, active = 1..5, admin = 1..6
// Spätere Level bauen immer auf den früheren auf.
// ============================================================================

import type { AccessTokenClaims, AccessTokenCodec } from "../../libs/jwt.js";
import {
  AuthError,
  ForbiddenRoleError,
  InactiveAccountError,
  InvalidCredentialsError,
} from "../../libs/errors.js";
import { systemClock, type Clock } from "../../libs/time.js";
import type { UserRecord, UserStore } from "../users/types.js";

export const GATE_LEVELS = ["identity", "active", "admin"] as const;
export type GateLevel = (typeof GATE_LEVELS)[number];

export type StageOutcome<T> = { ok: true; value: T } | { ok: false; error: AuthError };

export interface BearerContext {
  token: string;
}

export interface DecodedContext extends BearerContext {
  claims: AccessTokenClaims;
}

export interface IdentityContext extends DecodedContext {
  user: UserRecord;
}

export interface GateDeps {
  codec: AccessTokenCodec;
  store: UserStore;
  clock: Clock;
}

export type GateStage<In, Out> = (ctx: In, deps: GateDeps) => Promise<StageOutcome<Out>>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function pass<T>(value: T): StageOutcome<T> {
  return { ok: true, value };
}

function fail<T>(error: AuthError): StageOutcome<T> {
  return { ok: false, error };
}

/** Taxonomie-Fehler werden zu Outcomes, alles andere propagiert (-> 500). */
async function settle<T>(fn: () => Promise<T>): Promise<StageOutcome<T>> {
  try {
    return pass(await fn());
  } catch (err) {
    if (err instanceof AuthError) return fail(err);
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Stufen
// ---------------------------------------------------------------------------

export function extractBearer(authorization: string | string[] | undefined): StageOutcome<BearerContext> {
  const raw = Array.isArray(authorization) ? authorization[0] : authorization;
  if (!raw) return fail(new InvalidCredentialsError("missing_token"));

  // toleriert: "Bearer <token>", "bearer <token>", extra spaces
  const m = raw.match(/^\s*Bearer\s+(\S+)\s*$/i);
  const token = m?.[1];
  return token ? pass({ token }) : fail(new InvalidCredentialsError("malformed_authorization"));
}

export const decodeAccessToken: GateStage<BearerContext, DecodedContext> = (ctx, deps) =>
  settle(async () => ({
    ...ctx,
    claims: await deps.codec.verify(ctx.token, deps.clock.now()),
  }));

export const resolveSubject: GateStage<DecodedContext, IdentityContext> = (ctx, deps) =>
  settle(async () => {
    const user = await deps.store.findByUsername(ctx.claims.sub);
    if (!user) throw new InvalidCredentialsError("subject_unknown");
    return { ...ctx, user };
  });

export const checkEpoch: GateStage<IdentityContext, IdentityContext> = async (ctx) =>
  ctx.claims.ver === ctx.user.tokenVersion
    ? pass(ctx)
    : fail(new InvalidCredentialsError("token_version_stale"));

export const requireActive: GateStage<IdentityContext, IdentityContext> = async (ctx) =>
  ctx.user.isActive ? pass(ctx) : fail(new InactiveAccountError());

export const requireAdmin: GateStage<IdentityContext, IdentityContext> = async (ctx) =>
  ctx.user.role === "admin" ? pass(ctx) : fail(new ForbiddenRoleError());

const REFINEMENTS: Record<GateLevel, readonly GateStage<IdentityContext, IdentityContext>[]> = {
  identity: [checkEpoch],
  active: [checkEpoch, requireActive],
  admin: [checkEpoch, requireActive, requireAdmin],
};

// ---------------------------------------------------------------------------
// Gate
// ---------------------------------------------------------------------------

export class AuthenticationGate {
  private readonly deps: GateDeps;

  constructor(deps: { codec: AccessTokenCodec; store: UserStore; clock?: Clock }) {
    this.deps = { codec: deps.codec, store: deps.store, clock: deps.clock ?? systemClock };
  }

  async authenticate(
    level: GateLevel,
    authorization: string | string[] | undefined,
  ): Promise<StageOutcome<IdentityContext>> {
    const bearer = extractBearer(authorization);
    if (!bearer.ok) return bearer;

    const decoded = await decodeAccessToken(bearer.value, this.deps);
    if (!decoded.ok) return decoded;

    let current = await resolveSubject(decoded.value, this.deps);
    for (const stage of REFINEMENTS[level]) {
      if (!current.ok) return current;
      current = await stage(current.value, this.deps);
    }
    return current;
  }
}
