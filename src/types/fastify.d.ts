// src/types/fastify.d.ts
// ============================================================================
// Fastify Type Augmentation
// ----------------------------------------------------------------------------
// - Route Config: config.auth = Gate-Level (identity | active | admin)
// - request.identity: User aus dem Authentication-Gate
// - app.auth: Auth-Komponenten (Service, Gate, Store), in buildApp() dekoriert
//
// Hinweis: nur Type-Imports, keine Runtime-Imports.
// ============================================================================

import "fastify";

declare module "fastify" {
  interface FastifyContextConfig {
    /**
     * Wenn gesetzt, läuft das Authentication-Gate bis zu diesem Level:
     * - identity: Bearer + Signatur + User + Epoch
     * - active:   zusätzlich is_active
     * - admin:    zusätzlich role === "admin"
     */
    auth?: import("../modules/auth/gate.js").GateLevel;
  }

  interface FastifyRequest {
    /** Verifizierter User (nur auf Routen mit config.auth). */
    identity?: import("../modules/users/types.js").UserRecord;

    requestStartedAtNs?: bigint;
  }

  interface FastifyInstance {
    auth: import("../app.js").AuthComponents;
  }
}
