// src/modules/users/routes.ts
// ============================================================================
// User-Routen (Prefix /users, Gate: active)
// ----------------------------------------------------------------------------
// - GET    /me                 -> Public User des Token-Inhabers
// - GET    /me/external-token  -> Verbindungsstatus zur externen Plattform
// - PUT    /me/external-token  -> Token aus dem OAuth-Callback hinterlegen
// - DELETE /me/external-token  -> Verbindung trennen (alle Felder NULL)
//
// Der Code-Exchange mit der Plattform passiert außerhalb; hier wird nur das
// Ergebnis am User gespeichert. Die Tokens selbst gehen nie zurück an den
// Client.
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { replyError } from "../../libs/error-response.js";
import { addSeconds } from "../../libs/time.js";
import { requireIdentity } from "../../plugins/auth.js";
import { toPublicUser, type ExternalTokenState } from "./types.js";

// Obergrenze für expires_in: ein Jahr
const MAX_EXTERNAL_TTL_SEC = 365 * 24 * 60 * 60;

const ExternalTokenBodySchema = z
  .object({
    access_token: z.string().trim().min(1).max(4096),
    refresh_token: z.string().trim().min(1).max(4096).nullable().optional(),
    open_id: z.string().trim().min(1).max(255),
    expires_in: z.number().int().positive().max(MAX_EXTERNAL_TTL_SEC).optional(),
  })
  .strict();

function toConnectionView(token: ExternalTokenState | null) {
  return {
    connected: token !== null,
    open_id: token?.openId ?? null,
    expires_at: token?.expiresAt ? token.expiresAt.toISOString() : null,
  };
}

export default async function userRoutes(app: FastifyInstance) {
  const { store, clock } = app.auth;

  app.get("/me", { config: { auth: "active" } }, async (req) => toPublicUser(requireIdentity(req)));

  app.get("/me/external-token", { config: { auth: "active" } }, async (req) =>
    toConnectionView(requireIdentity(req).externalToken),
  );

  // -------------------------------------------------------------------------
  // PUT /users/me/external-token
  // -------------------------------------------------------------------------
  app.put("/me/external-token", { config: { auth: "active" } }, async (req, reply) => {
    const user = requireIdentity(req);

    const parsed = ExternalTokenBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return replyError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid external token payload.",
        parsed.error.flatten(),
      );
    }

    const { access_token, refresh_token, open_id, expires_in } = parsed.data;
    const updated = await store.setExternalToken(user.id, {
      accessToken: access_token,
      refreshToken: refresh_token ?? null,
      openId: open_id,
      expiresAt: expires_in === undefined ? null : addSeconds(clock.now(), expires_in),
    });
    if (!updated) {
      return replyError(reply, 404, "NOT_FOUND", "User not found.");
    }

    req.log.info({ user_id: user.id, open_id }, "external_token_attached");
    return reply.send(toConnectionView(updated.externalToken));
  });

  // -------------------------------------------------------------------------
  // DELETE /users/me/external-token
  // -------------------------------------------------------------------------
  app.delete("/me/external-token", { config: { auth: "active" } }, async (req, reply) => {
    const user = requireIdentity(req);

    const cleared = await store.clearExternalToken(user.id);
    if (!cleared) {
      return replyError(reply, 404, "NOT_FOUND", "User not found.");
    }

    req.log.info({ user_id: user.id }, "external_token_detached");
    return reply.code(204).send();
  });
}
