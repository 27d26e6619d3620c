// src/plugins/auth.ts
// ============================================================================
// Auth-Plugin (Fastify)
// ----------------------------------------------------------------------------
// - Für Routes mit config.auth = <level>:
//   Authentication-Gate bis zu diesem Level, danach req.identity = User
// - Fehler des Gates -> einheitlicher Fehler-Body + WWW-Authenticate
// - Health/System-Pfade bleiben immer ohne Auth möglich
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync, FastifyRequest } from "fastify";
import { isHealthPath } from "../libs/http.js";
import { replyAuthError } from "../libs/error-response.js";
import { InvalidCredentialsError } from "../libs/errors.js";
import { recordGateRejected } from "../libs/metrics.js";
import type { AuthenticationGate } from "../modules/auth/gate.js";
import type { UserRecord } from "../modules/users/types.js";

export interface AuthPluginOptions {
  gate: AuthenticationGate;
}

/**
 * Liefert den vom Gate gesetzten User. Nur in Handlern mit config.auth
 * aufrufen; fehlt der User trotzdem, wird wie ein fehlendes Token behandelt.
 */
export function requireIdentity(req: FastifyRequest): UserRecord {
  if (!req.identity) {
    throw new InvalidCredentialsError("identity_missing");
  }
  return req.identity;
}

const authPlugin: FastifyPluginAsync<AuthPluginOptions> = async (app, opts) => {
  app.decorateRequest("identity", undefined);

  app.addHook("preHandler", async (req, reply) => {
    if (isHealthPath(req)) return;

    const level = req.routeOptions.config.auth;
    if (!level) return;

    const outcome = await opts.gate.authenticate(level, req.headers.authorization);
    if (!outcome.ok) {
      const { error } = outcome;
      recordGateRejected(error.code);
      req.log.info(
        { level, code: error.code, reason: error.message },
        "auth_gate_rejected",
      );
      return replyAuthError(reply, error);
    }

    req.identity = outcome.value.user;
  });
};

export default fp(authPlugin, { name: "auth" });
