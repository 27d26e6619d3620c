// src/plugins/rate-limit.ts
// ============================================================================
// Rate-Limit (@fastify/rate-limit)
// ----------------------------------------------------------------------------
// - globales Limit pro IP (max / timeWindow)
// - strengeres Limit pro IP + Route für Credential-Endpunkte
// - optional geteilter Store über Redis (mehrere Instanzen)
// - Health/System-Pfade sind ausgenommen
// ============================================================================

import fp from "fastify-plugin";
import rateLimit from "@fastify/rate-limit";
import type { FastifyPluginAsync, FastifyRequest } from "fastify";
import type { RedisClient } from "../libs/redis.js";
import { getRouteId } from "../libs/http.js";

export interface RateLimitPluginOptions {
  /** Requests pro Fenster (alle Routen) */
  max: number;
  /** Requests pro Fenster auf Login/Refresh/Register */
  sensitiveMax: number;
  /** Fenster in Sekunden */
  windowSec: number;
  redis?: RedisClient;
}

const SENSITIVE_ROUTES = new Set<string>(["/auth/login", "/auth/refresh", "/auth/register"]);

const SKIP = new Set<string>([
  "/health",
  "/health/live",
  "/health/ready",
  "/metrics",
  "/openapi.json",
]);

function isSensitive(req: FastifyRequest): boolean {
  return SENSITIVE_ROUTES.has(getRouteId(req));
}

const rateLimitPlugin: FastifyPluginAsync<RateLimitPluginOptions> = async (app, opts) => {
  await app.register(rateLimit, {
    global: true,
    max: (req) => (isSensitive(req) ? opts.sensitiveMax : opts.max),
    timeWindow: opts.windowSec * 1000,
    redis: opts.redis,
    nameSpace: "post-scheduler-auth:rl:",
    skipOnError: true,
    allowList: (req) => SKIP.has((req.raw.url ?? "/").split("?")[0]),
    keyGenerator: (req) => (isSensitive(req) ? `${req.ip}:${getRouteId(req)}` : req.ip),
    errorResponseBuilder: (_req, context) => ({
      statusCode: context.statusCode,
      code: "RATE_LIMITED",
      message: `Too many requests, retry in ${context.after}.`,
    }),
  });
};

export default fp(rateLimitPlugin, { name: "rate-limit" });
