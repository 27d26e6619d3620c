// src/modules/auth/routes.ts
// ============================================================================
// Auth-Routen
// ----------------------------------------------------------------------------
// Endpoints (relativ zum Prefix /auth):
// - POST /register  (auth=–)         -> 201 Public User
// - POST /login     (auth=–)         -> Token-Set
// - POST /refresh   (auth=–)         -> Token-Set (Rotation, Single-Use)
// - POST /logout    (auth=identity)  -> 204, widerruft ALLE Credentials
//
// Credential-Fehler sind nach außen einheitlich 401 INVALID_CREDENTIALS;
// der konkrete Grund landet nur im Log.
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { isAuthError } from "../../libs/errors.js";
import { replyAuthError, replyError } from "../../libs/error-response.js";
import { delayWithJitter } from "../../libs/http.js";
import { logFingerprint, loginAttemptLogFields } from "../../libs/pii.js";
import { recordAuthLogin, recordAuthLogout, recordAuthRefresh } from "../../libs/metrics.js";
import { requireIdentity } from "../../plugins/auth.js";
import { toPublicUser } from "../users/types.js";
import { toTokenSetResponse } from "./types.js";

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const RegisterBodySchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, "Username muss mindestens 3 Zeichen lang sein.")
    .max(50, "Username darf maximal 50 Zeichen lang sein.")
    .regex(/^[A-Za-z0-9_.-]+$/, "Username darf nur Buchstaben, Ziffern, _ . - enthalten."),
  email: z.string().trim().email("Bitte eine gültige E-Mail-Adresse angeben."),
  password: z
    .string()
    .min(8, "Passwort muss mindestens 8 Zeichen lang sein.")
    .max(128, "Passwort darf maximal 128 Zeichen lang sein."),
});

const LoginBodySchema = z.object({
  username: z.string().min(1, "Username ist Pflicht."),
  password: z.string().min(1, "Passwort ist Pflicht."),
});

const RefreshBodySchema = z.object({
  refresh_token: z.string().min(1, "refresh_token ist Pflicht."),
});

export default async function authRoutes(app: FastifyInstance) {
  const { service, config } = app.auth;

  // -------------------------------------------------------------------------
  // POST /auth/register
  // -------------------------------------------------------------------------
  app.post("/register", async (req, reply) => {
    const parsed = RegisterBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return replyError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid register payload.",
        parsed.error.flatten(),
      );
    }

    const user = await service.register(parsed.data);
    req.log.info(
      { user_id: user.id, username_hash: logFingerprint("username", user.username) },
      "register_success",
    );

    return reply.code(201).send(toPublicUser(user));
  });

  // -------------------------------------------------------------------------
  // POST /auth/login
  // -------------------------------------------------------------------------
  app.post("/login", async (req, reply) => {
    const parsed = LoginBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return replyError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid login payload.",
        parsed.error.flatten(),
      );
    }

    const attempt = loginAttemptLogFields(parsed.data.username, req.ip);

    try {
      const { user, tokens } = await service.login(parsed.data);
      recordAuthLogin(true);
      req.log.info({ user_id: user.id, username_hash: attempt.username_hash }, "login_success");
      return reply.send(toTokenSetResponse(tokens));
    } catch (err) {
      // Store-Ausfall ist kein Login-Fehlschlag -> Error-Handler (503)
      if (!isAuthError(err) || err.code === "STORE_UNAVAILABLE") throw err;

      recordAuthLogin(false);
      req.log.warn(
        {
          code: err.code,
          reason: err.message,
          ...attempt,
        },
        "login_failed",
      );

      await delayWithJitter(config.loginFailureDelayMs.min, config.loginFailureDelayMs.max);
      return replyAuthError(reply, err);
    }
  });

  // -------------------------------------------------------------------------
  // POST /auth/refresh
  // -------------------------------------------------------------------------
  app.post("/refresh", async (req, reply) => {
    const parsed = RefreshBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return replyError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid refresh payload.",
        parsed.error.flatten(),
      );
    }

    try {
      const { user, tokens } = await service.refresh(parsed.data.refresh_token);
      recordAuthRefresh(true);
      req.log.info({ user_id: user.id }, "refresh_success");
      return reply.send(toTokenSetResponse(tokens));
    } catch (err) {
      if (!isAuthError(err) || err.code === "STORE_UNAVAILABLE") throw err;

      recordAuthRefresh(false);
      req.log.warn({ code: err.code, reason: err.message }, "refresh_failed");
      return replyAuthError(reply, err);
    }
  });

  // -------------------------------------------------------------------------
  // POST /auth/logout  (Gate: identity)
  // -------------------------------------------------------------------------
  app.post("/logout", { config: { auth: "identity" } }, async (req, reply) => {
    const user = requireIdentity(req);
    const tokenVersion = await service.logout(user);

    recordAuthLogout();
    req.log.info({ user_id: user.id, token_version: tokenVersion }, "logout_success");

    return reply.code(204).send();
  });
}
