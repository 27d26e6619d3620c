// src/app.ts
// ============================================================================
// Auth-Kern des Post-Schedulers (Fastify)
// ----------------------------------------------------------------------------
// Verantwortlichkeiten:
//  - Zentrales Fastify-Setup (Logger, Request-IDs, CORS, Rate-Limit)
//  - Auth-Komponenten aus AuthConfig + UserStore zusammenstecken
//    (Hasher, Codec, Refresh-Manager, Revocation, Gate, Service)
//  - /health, /health/live, /health/ready, /metrics, /openapi.json
//  - Routen: /auth, /users, /admin/users
//  - Ressourcen-Shutdown über onClose (Pool / Redis werden von außen übergeben)
// ============================================================================

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { randomUUID } from "node:crypto";

import rateLimitPlugin from "./plugins/rate-limit.js";
import authPlugin from "./plugins/auth.js";

import type { AuthConfig, Env } from "./libs/env.js";
import { CredentialHasher } from "./libs/crypto.js";
import { AccessTokenCodec } from "./libs/jwt.js";
import { systemClock, type Clock } from "./libs/time.js";
import {
  codeForStatus,
  errorEnvelope,
  replyAuthError,
  replyError,
  RETRY_AFTER_SEC,
} from "./libs/error-response.js";
import { isAuthError } from "./libs/errors.js";
import { mapError } from "./libs/error-map.js";
import { getRouteId } from "./libs/http.js";
import { recordHttpRequest, renderPrometheusMetrics } from "./libs/metrics.js";
import { ensureRedis, quitRedis, redisHealth, type RedisClient } from "./libs/redis.js";

import type { UserStore } from "./modules/users/types.js";
import { RefreshTokenManager } from "./modules/auth/refresh-tokens.js";
import { RevocationController } from "./modules/auth/revocation.js";
import { AuthenticationGate } from "./modules/auth/gate.js";
import { AuthService } from "./modules/auth/service.js";

import authRoutes from "./modules/auth/routes.js";
import userRoutes from "./modules/users/routes.js";
import adminRoutes from "./modules/admin/routes.js";

// ---------------------------------------------------------------------------
// Readiness-Flag (von server.ts über setReady() manipulierbar)
// ---------------------------------------------------------------------------

let isReady = false;

export function setReady(ready: boolean) {
  isReady = ready;
}

export interface AuthComponents {
  config: AuthConfig;
  clock: Clock;
  store: UserStore;
  hasher: CredentialHasher;
  codec: AccessTokenCodec;
  refreshTokens: RefreshTokenManager;
  revocation: RevocationController;
  gate: AuthenticationGate;
  service: AuthService;
}

export interface AppOptions {
  env: Env;
  config: AuthConfig;
  store: UserStore;
  clock?: Clock;
  redis?: RedisClient;
  logger?: FastifyServerOptions["logger"];
  enableCors?: boolean;
  /** Wird in onClose aufgerufen (z. B. Pool schließen). */
  onClose?: () => Promise<void>;
}

export function createAuthComponents(
  config: AuthConfig,
  store: UserStore,
  clock: Clock = systemClock,
): AuthComponents {
  const hasher = new CredentialHasher(config.hashing);
  const codec = new AccessTokenCodec(config.jwt);
  const refreshTokens = new RefreshTokenManager({
    store,
    hasher,
    ttlSec: config.refreshTtlSec,
    clock,
  });
  const revocation = new RevocationController(store);
  const gate = new AuthenticationGate({ codec, store, clock });
  const service = new AuthService({ store, hasher, codec, refreshTokens, revocation, clock });

  return { config, clock, store, hasher, codec, refreshTokens, revocation, gate, service };
}

// ---------------------------------------------------------------------------
// Health- und Observability-Routen
// ---------------------------------------------------------------------------

type ServiceState = "ok" | "down" | "disabled";

async function registerHealthRoutes(app: FastifyInstance, env: Env, redis?: RedisClient) {
  const checkServices = async () => {
    const services: Record<"db" | "redis", ServiceState> = { db: "down", redis: "disabled" };

    try {
      const dh = await app.auth.store.health();
      services.db = dh.ok ? "ok" : "down";
      if (!dh.ok) app.log.warn({ error: dh.error }, "health_db_failed");
    } catch (err) {
      app.log.error({ err }, "health_db_failed");
    }

    if (redis) {
      const rh = await redisHealth(redis);
      services.redis = rh.ok ? "ok" : "down";
    }

    return services;
  };

  app.get("/openapi.json", async (_req, reply) => {
    if (!env.OPENAPI_ENABLED) {
      return replyError(reply, 404, "NOT_FOUND", "Not found.");
    }

    return reply.send({
      openapi: "3.0.3",
      info: {
        title: "Post Scheduler Auth API",
        version: "1.0.0",
      },
      components: {
        securitySchemes: {
          bearerAuth: { type: "http", scheme: "bearer", bearerFormat: "JWT" },
        },
        schemas: {
          ErrorResponse: {
            type: "object",
            properties: {
              status: { type: "integer" },
              error: {
                type: "object",
                properties: {
                  code: { type: "string" },
                  message: { type: "string" },
                },
                required: ["code", "message"],
              },
            },
            required: ["status", "error"],
          },
        },
      },
      paths: {
        "/auth/register": { post: { summary: "Register a new user" } },
        "/auth/login": { post: { summary: "Login with username/password" } },
        "/auth/refresh": { post: { summary: "Rotate refresh token" } },
        "/auth/logout": { post: { summary: "Revoke all credentials of the caller" } },
        "/users/me": { get: { summary: "Current user" } },
        "/users/me/external-token": {
          get: { summary: "External platform connection status" },
          put: { summary: "Attach external platform token" },
          delete: { summary: "Detach external platform token" },
        },
        "/admin/users/{username}": {
          get: { summary: "Read account" },
          patch: { summary: "Change role / active flag" },
        },
        "/admin/users/{username}/revoke": { post: { summary: "Revoke all credentials of a user" } },
        "/health/live": { get: { summary: "Liveness" } },
        "/health/ready": { get: { summary: "Readiness" } },
      },
    });
  });

  app.get("/metrics", async (_req, reply) => {
    if (!env.METRICS_ENABLED) {
      return replyError(reply, 404, "NOT_FOUND", "Not found.");
    }
    reply.type("text/plain; version=0.0.4; charset=utf-8");
    return reply.send(renderPrometheusMetrics());
  });

  // Liveness – lebt der Prozess?
  app.get("/health/live", async () => ({ status: "alive", pid: process.pid }));

  // Aggregat
  app.get("/health", async (_req, reply) => {
    const services = await checkServices();
    const down = services.db === "down" || services.redis === "down";
    const overall = down ? "down" : isReady ? "ok" : "degraded";

    return reply.code(down ? 503 : 200).send({
      status: overall,
      env: env.NODE_ENV,
      ready: isReady,
      services,
      ts: new Date().toISOString(),
    });
  });

  // Readiness – für Loadbalancer/K8s (Redis ist optional, DB nicht)
  app.get("/health/ready", async (_req, reply) => {
    if (!isReady) {
      return reply.code(503).send({ status: "starting", ready: false });
    }

    const services = await checkServices();
    if (services.db !== "ok") {
      return reply.code(503).send({ status: "degraded", ready: false, services });
    }
    return reply.send({ status: "ready", ready: true });
  });
}

// ---------------------------------------------------------------------------
// Fehlerdetails aus unbekannten Throw-Werten (Fastify-, Plugin-, Fremdfehler)
// ---------------------------------------------------------------------------

interface ErrorInfo {
  statusCode?: number;
  validation?: unknown;
  message: string;
}

export function describeError(err: unknown): ErrorInfo {
  if (typeof err !== "object" || err === null) {
    return { message: typeof err === "string" ? err : "" };
  }

  const info: ErrorInfo = {
    message: "message" in err && typeof err.message === "string" ? err.message : "",
  };
  if (
    "statusCode" in err &&
    typeof err.statusCode === "number" &&
    Number.isInteger(err.statusCode) &&
    err.statusCode >= 400 &&
    err.statusCode <= 599
  ) {
    info.statusCode = err.statusCode;
  }
  if ("validation" in err && err.validation !== undefined && err.validation !== null) {
    info.validation = err.validation;
  }
  return info;
}

// ---------------------------------------------------------------------------
// Haupt-Fabrikfunktion: baut eine Fastify-Instanz
// ---------------------------------------------------------------------------

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const {
    env,
    config,
    store,
    clock = systemClock,
    redis,
    enableCors = true,
    logger = { level: env.LOG_LEVEL },
  } = opts;

  const app = Fastify({
    logger,
    trustProxy: env.TRUST_PROXY,
    requestIdHeader: env.REQUEST_ID_HEADER,
    requestIdLogLabel: "request_id",
    genReqId: () => randomUUID(),
    requestTimeout: 30_000,
    connectionTimeout: 10_000,
    keepAliveTimeout: 65_000,
  });

  app.decorate("auth", createAuthComponents(config, store, clock));

  app.addHook("onRequest", async (request, reply) => {
    request.requestStartedAtNs = process.hrtime.bigint();
    reply.header(env.REQUEST_ID_HEADER, request.id);
  });

  app.addHook("onSend", async (_request, reply, payload) => {
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("Referrer-Policy", "no-referrer");
    reply.header("X-Frame-Options", "DENY");
    reply.header("Cache-Control", "no-store");
    return payload;
  });

  app.addHook("onResponse", async (request, reply) => {
    const started = request.requestStartedAtNs;
    if (!started) return;

    const durationSeconds = Number(process.hrtime.bigint() - started) / 1_000_000_000;
    recordHttpRequest(request.method, getRouteId(request), reply.statusCode, durationSeconds);
  });

  // Error-/NotFound-Handler vor allen register()-Aufrufen: Kind-Kontexte
  // übernehmen den Handler nur, wenn er beim Registrieren schon gesetzt ist.
  app.setErrorHandler((err, req, reply) => {
    if (isAuthError(err)) {
      req.log.warn({ code: err.code, reason: err.message, err: err.cause }, "auth_error");
      return replyAuthError(reply, err);
    }

    const mapped = mapError(err);
    if (mapped.code !== "INTERNAL") {
      req.log.warn({ err }, "request_failed");
      if (mapped.status === 503) reply.header("Retry-After", String(RETRY_AFTER_SEC));
      return replyError(reply, mapped.status, mapped.code, mapped.message);
    }

    const info = describeError(err);
    const status = info.statusCode ?? (info.validation !== undefined ? 400 : 500);
    if (status >= 500) {
      req.log.error({ err }, "unhandled_error");
      return replyError(reply, status, "INTERNAL", "Internal server error.");
    }

    req.log.info({ err }, "request_rejected");
    return replyError(
      reply,
      status,
      codeForStatus(status),
      info.message || "Request failed.",
      info.validation,
    );
  });

  app.setNotFoundHandler((req, reply) => {
    reply
      .code(404)
      .send(errorEnvelope(404, "NOT_FOUND", `Route ${req.method}:${req.url} not found`));
  });

  if (enableCors) {
    const allowAll = env.CORS_ORIGIN_ITEMS.includes("*");
    await app.register(cors, {
      origin: allowAll ? true : env.CORS_ORIGIN_ITEMS,
      methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      credentials: !allowAll,
      maxAge: 86_400,
    });
  }

  await app.register(rateLimitPlugin, {
    max: env.RATE_LIMIT_MAX,
    sensitiveMax: env.RATE_LIMIT_AUTH_MAX,
    windowSec: env.RATE_LIMIT_WINDOW,
    redis,
  });

  // Gate als preHandler, danach erst Routen (damit der Hook greift)
  await app.register(authPlugin, { gate: app.auth.gate });

  await app.register(authRoutes, { prefix: "/auth" });
  await app.register(userRoutes, { prefix: "/users" });
  await app.register(adminRoutes, { prefix: "/admin/users" });

  await registerHealthRoutes(app, env, redis);

  app.addHook("onReady", async () => {
    if (redis) {
      try {
        await ensureRedis(redis);
        app.log.info("Redis connection established");
      } catch (err) {
        // Rate-Limit läuft mit skipOnError weiter
        app.log.error({ err }, "Redis initialization failed");
      }
    }
    isReady = true;
  });

  app.addHook("onClose", async () => {
    isReady = false;

    if (redis) {
      await quitRedis(redis);
      app.log.info("Redis connection closed");
    }

    if (opts.onClose) {
      try {
        await opts.onClose();
        app.log.info("Store resources closed");
      } catch (err) {
        app.log.warn({ err }, "Store shutdown failed");
      }
    }
  });

  return app;
}
