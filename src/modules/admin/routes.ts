// src/modules/admin/routes.ts
// ============================================================================
// Account-Verwaltung (Prefix /admin/users, Gate: admin)
// ----------------------------------------------------------------------------
// - GET   /:username         -> Public User
// - PATCH /:username         -> role / is_active setzen
// - POST  /:username/revoke  -> alle Credentials des Users widerrufen
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { replyError } from "../../libs/error-response.js";
import { requireIdentity } from "../../plugins/auth.js";
import { USER_ROLES, toPublicUser } from "../users/types.js";

const ParamsSchema = z.object({
  username: z.string().trim().min(1),
});

const PatchBodySchema = z
  .object({
    role: z.enum(USER_ROLES).optional(),
    is_active: z.boolean().optional(),
  })
  .strict()
  .refine((body) => body.role !== undefined || body.is_active !== undefined, {
    message: "role oder is_active ist Pflicht.",
  });

export default async function adminRoutes(app: FastifyInstance) {
  const { store, revocation } = app.auth;

  // -------------------------------------------------------------------------
  // GET /admin/users/:username
  // -------------------------------------------------------------------------
  app.get("/:username", { config: { auth: "admin" } }, async (req, reply) => {
    const params = ParamsSchema.safeParse(req.params);
    if (!params.success) {
      return replyError(reply, 400, "VALIDATION_FAILED", "Invalid path.", params.error.flatten());
    }

    const user = await store.findByUsername(params.data.username);
    if (!user) {
      return replyError(reply, 404, "NOT_FOUND", "User not found.");
    }
    return reply.send(toPublicUser(user));
  });

  // -------------------------------------------------------------------------
  // PATCH /admin/users/:username
  // -------------------------------------------------------------------------
  app.patch("/:username", { config: { auth: "admin" } }, async (req, reply) => {
    const params = ParamsSchema.safeParse(req.params);
    const body = PatchBodySchema.safeParse(req.body);
    if (!params.success || !body.success) {
      return replyError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid account patch.",
        body.success ? undefined : body.error.flatten(),
      );
    }

    const target = await store.findByUsername(params.data.username);
    if (!target) {
      return replyError(reply, 404, "NOT_FOUND", "User not found.");
    }

    const updated = await store.updateAccount(target.id, {
      role: body.data.role,
      isActive: body.data.is_active,
    });
    if (!updated) {
      return replyError(reply, 404, "NOT_FOUND", "User not found.");
    }

    req.log.info(
      {
        actor_id: requireIdentity(req).id,
        user_id: updated.id,
        role: updated.role,
        is_active: updated.isActive,
      },
      "admin_account_updated",
    );
    return reply.send(toPublicUser(updated));
  });

  // -------------------------------------------------------------------------
  // POST /admin/users/:username/revoke
  // -------------------------------------------------------------------------
  app.post("/:username/revoke", { config: { auth: "admin" } }, async (req, reply) => {
    const params = ParamsSchema.safeParse(req.params);
    if (!params.success) {
      return replyError(reply, 400, "VALIDATION_FAILED", "Invalid path.", params.error.flatten());
    }

    const target = await store.findByUsername(params.data.username);
    if (!target) {
      return replyError(reply, 404, "NOT_FOUND", "User not found.");
    }

    const tokenVersion = await revocation.revokeAll(target);
    req.log.info(
      { actor_id: requireIdentity(req).id, user_id: target.id, token_version: tokenVersion },
      "admin_revoke_all",
    );
    return reply.send({ token_version: tokenVersion });
  });
}
