// src/server.ts
// ============================================================================
// Bootstrap für den Auth-Kern (Fastify / PostgreSQL)
// ----------------------------------------------------------------------------
// Aufgaben:
//  - Env laden + AuthConfig bauen (fehlendes Secret -> Abbruch)
//  - pg-Pool + UserStore, optional Redis für das Rate-Limit
//  - Prozessstart: buildApp() + listen()
//  - Prozessweite Fehlerwächter (unhandledRejection / uncaughtException)
//  - Geordneter Shutdown mit Timeout-Guard (SIGINT, SIGTERM, SIGUSR2)
// ============================================================================

import type { FastifyInstance } from "fastify";
import { buildApp, setReady } from "./app.js";
import { assertStartupEnv, buildAuthConfig, loadEnv, logEnvSummary } from "./libs/env.js";
import { closeDb, createPool } from "./libs/db.js";
import { createRedis } from "./libs/redis.js";
import { PgUserStore } from "./modules/users/repository.js";

// Maximale Wartezeit für geordnetes Beenden, bevor hart terminiert wird.
const SHUTDOWN_TIMEOUT_MS = Number(process.env.SHUTDOWN_TIMEOUT_MS ?? 10_000);

// HTTP-Timeouts (Node-Server-Ebene, zusätzlich zu Fastify-Optionen)
const HEADERS_TIMEOUT_MS = 61_000;
const KEEPALIVE_TIMEOUT_MS = 65_000;

let app: FastifyInstance | undefined;
let shuttingDown = false;

function log(level: "info" | "warn" | "error", msg: string, extra: Record<string, unknown> = {}) {
  if (app) {
    app.log[level]({ ctx: "server", ...extra }, msg);
    return;
  }
  const fn = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
  fn(msg, extra);
}

// ============================================================================
// Prozessweite Fehlerwächter
// ============================================================================

process.on("unhandledRejection", (reason) => {
  log("error", "unhandled_rejection", { reason });
});

process.on("uncaughtException", (err) => {
  log("error", "uncaught_exception", { err });
  void shutdown("uncaughtException");
});

// ============================================================================
// Start & Listen
// ============================================================================

async function start() {
  const env = loadEnv();
  assertStartupEnv(env);
  const config = buildAuthConfig(env);
  logEnvSummary(env);

  // assertStartupEnv garantiert DATABASE_URL
  const pool = createPool(env.DATABASE_URL ?? "");
  const store = new PgUserStore(pool);
  const redis = env.REDIS_URL ? createRedis(env.REDIS_URL) : undefined;

  app = await buildApp({
    env,
    config,
    store,
    redis,
    onClose: () => closeDb(pool),
  });

  app.server.headersTimeout = HEADERS_TIMEOUT_MS;
  app.server.keepAliveTimeout = KEEPALIVE_TIMEOUT_MS;

  app.log.info(
    {
      env: env.NODE_ENV,
      pid: process.pid,
      node: process.version,
      host: env.HOST,
      port: env.PORT,
    },
    "auth_service_bootstrap",
  );

  await app.listen({ host: env.HOST, port: env.PORT });
  app.log.info({ address: app.server.address() }, "auth_service_listening");
}

// ============================================================================
// Geordneter Shutdown
// ============================================================================

async function shutdown(reason: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  // Fail-Safe: falls irgendwas hängt, nach Timeout hart beenden
  const killTimer = setTimeout(() => {
    log("error", "shutdown_forced_exit", { timeoutMs: SHUTDOWN_TIMEOUT_MS, reason });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  killTimer.unref();

  try {
    log("info", "shutdown_received", { reason });

    // 1) Readiness sofort degradieren -> Loadbalancer nimmt Instanz raus
    setReady(false);

    // 2) HTTP-Server schließen; onClose schließt Pool + Redis
    if (app) {
      await app.close();
      log("info", "server_closed");
    }

    clearTimeout(killTimer);
    process.exit(0);
  } catch (err) {
    log("error", "shutdown_error", { err });
    clearTimeout(killTimer);
    process.exit(1);
  }
}

// SIGINT  = Ctrl+C / `docker stop`
// SIGTERM = Standard-Stop in Docker/Kubernetes
// SIGUSR2 = nodemon im Dev-Modus
process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));
process.once("SIGUSR2", () => void shutdown("SIGUSR2"));

start().catch((err: unknown) => {
  // Startfehler -> Exit, damit der Orchestrator neu starten kann
  console.error("server_start_failed", err);
  process.exitCode = 1;
  setTimeout(() => process.exit(1), 50);
});
