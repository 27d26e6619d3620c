// src/libs/env.ts
// ============================================================================
// Zentrale Umgebungsvariablen-Verwaltung (Docker + Secrets-first) mit Zod
// ----------------------------------------------------------------------------
// Ziele
// - Keine .env-Abhängigkeit (kein dotenv)
// - Secrets bevorzugt aus *_FILE (Docker secrets) lesen
// - ENV wird genau einmal beim Prozessstart geparst (loadEnv) und danach als
//   explizites AuthConfig-Objekt an die Komponenten übergeben
// - Keine Secret-Werte loggen (nur [set]/[unset])
// ============================================================================

import { readFileSync } from "node:fs";
import { z } from "zod";

// ----------------------------------------------------------------------------
// Helpers: Secrets lesen
// ----------------------------------------------------------------------------

/**
 * Liest ein Secret aus einer Datei (Docker secrets: /run/secrets/*).
 * - trimmt Whitespace
 * - wirft Fehler, wenn Datei nicht lesbar / leer
 */
function readSecretFile(filePath: string | undefined, label: string): string | undefined {
  if (!filePath) return undefined;

  let value: string;
  try {
    value = readFileSync(filePath, "utf8");
  } catch {
    throw new Error(`${label} nicht lesbar: ${filePath}`);
  }

  const trimmed = value.replace(/\r?\n+$/, "").trim();
  if (!trimmed) throw new Error(`${label} ist leer: ${filePath}`);

  return trimmed;
}

/** *_FILE wird bevorzugt gelesen, ENV ist Fallback. */
function resolveFromFileOrEnv(opts: {
  envValue?: string;
  filePath?: string;
  label: string;
}): string | undefined {
  const fromFile = readSecretFile(opts.filePath, opts.label);
  if (fromFile) return fromFile;
  if (opts.envValue && opts.envValue.trim() !== "") return opts.envValue;
  return undefined;
}

function mask(value: unknown): string {
  if (value === undefined || value === null || value === "") return "[unset]";
  return "[set]";
}

// "false"/"0" sollen wirklich false ergeben (z.coerce.boolean macht daraus true)
const booleanFlag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value) => {
      if (value === undefined || value === "") return fallback;
      if (typeof value === "boolean") return value;
      return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
    });

// ----------------------------------------------------------------------------
// Schema
// ----------------------------------------------------------------------------

export const JWT_ALGORITHMS = ["HS256", "HS384", "HS512"] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

const EnvSchema = z.object({
  // --------------------------------------------------------------------------
  // Laufzeit / Server
  // --------------------------------------------------------------------------
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.string().default("info"),

  // --------------------------------------------------------------------------
  // HTTP / Observability
  // --------------------------------------------------------------------------
  CORS_ORIGIN: z.string().default("*"),
  REQUEST_ID_HEADER: z.string().default("x-request-id"),
  TRUST_PROXY: booleanFlag(true),
  OPENAPI_ENABLED: booleanFlag(true),
  METRICS_ENABLED: booleanFlag(true),

  // --------------------------------------------------------------------------
  // Persistenz
  // --------------------------------------------------------------------------
  DATABASE_URL: z.string().optional(),

  // Redis nur als geteilter Rate-Limit-Store (optional)
  REDIS_URL: z.string().optional(),

  // --------------------------------------------------------------------------
  // Rate Limit
  // --------------------------------------------------------------------------
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),
  RATE_LIMIT_AUTH_MAX: z.coerce.number().int().positive().default(20),
  LOGIN_FAILURE_DELAY_MIN_MS: z.coerce.number().int().min(0).default(200),
  LOGIN_FAILURE_DELAY_MAX_MS: z.coerce.number().int().min(0).default(400),

  // --------------------------------------------------------------------------
  // JWT / Tokens
  // --------------------------------------------------------------------------
  JWT_SECRET: z.string().optional(),
  JWT_ALGORITHM: z.enum(JWT_ALGORITHMS).default("HS256"),
  JWT_ISSUER: z.string().default("post-scheduler-auth"),
  JWT_AUDIENCE: z.string().default("post-scheduler-api"),
  JWT_ACCESS_TTL: z.coerce.number().int().positive().default(30 * 60),
  JWT_CLOCK_SKEW_SEC: z.coerce.number().int().min(0).max(300).default(30),
  REFRESH_TOKEN_TTL: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),

  // --------------------------------------------------------------------------
  // Argon2id (Passwörter + Refresh-Token-Digests)
  // --------------------------------------------------------------------------
  ARGON2_MEMORY_COST: z.coerce.number().int().min(1024).default(2 ** 16),
  ARGON2_TIME_COST: z.coerce.number().int().min(2).default(3),
  ARGON2_PARALLELISM: z.coerce.number().int().min(1).default(1),
});

export type Env = ReturnType<typeof normalizeEnv>;

function normalizeEnv(raw: z.infer<typeof EnvSchema>) {
  return {
    ...raw,
    REQUEST_ID_HEADER: raw.REQUEST_ID_HEADER.toLowerCase(),
    CORS_ORIGIN_ITEMS: raw.CORS_ORIGIN.split(",")
      .map((value) => value.trim())
      .filter(Boolean),
  };
}

// ----------------------------------------------------------------------------
// Parse & Normalize
// ----------------------------------------------------------------------------

/**
 * Liest und validiert die Umgebung. Wird einmal beim Start aufgerufen
 * (server.ts / Skripte), Tests bauen sich ihr Env über dieselbe Funktion.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const raw = EnvSchema.parse({
    ...source,
    DATABASE_URL: resolveFromFileOrEnv({
      envValue: source.DATABASE_URL,
      filePath: source.DATABASE_URL_FILE,
      label: "DATABASE_URL_FILE",
    }),
    JWT_SECRET: resolveFromFileOrEnv({
      envValue: source.JWT_SECRET,
      filePath: source.JWT_SECRET_FILE,
      label: "JWT_SECRET_FILE",
    }),
  });

  return normalizeEnv(raw);
}

// ----------------------------------------------------------------------------
// AuthConfig: explizite Konfiguration für Codec / Hasher / Refresh-Manager
// ----------------------------------------------------------------------------

export interface AuthConfig {
  jwt: {
    secret: Uint8Array;
    algorithm: JwtAlgorithm;
    issuer: string;
    audience: string;
    accessTtlSec: number;
    clockSkewSec: number;
  };
  refreshTtlSec: number;
  hashing: {
    memoryCost: number;
    timeCost: number;
    parallelism: number;
  };
  loginFailureDelayMs: {
    min: number;
    max: number;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function buildAuthConfig(env: Env): AuthConfig {
  const secret = env.JWT_SECRET?.trim();
  if (!secret) {
    // Kein unsicherer Fallback (auch nicht in dev/test)
    throw new ConfigError("JWT Secret fehlt: setze JWT_SECRET oder JWT_SECRET_FILE.");
  }

  if (env.LOGIN_FAILURE_DELAY_MAX_MS < env.LOGIN_FAILURE_DELAY_MIN_MS) {
    throw new ConfigError(
      "LOGIN_FAILURE_DELAY_MAX_MS muss >= LOGIN_FAILURE_DELAY_MIN_MS sein.",
    );
  }

  return {
    jwt: {
      secret: new TextEncoder().encode(secret),
      algorithm: env.JWT_ALGORITHM,
      issuer: env.JWT_ISSUER,
      audience: env.JWT_AUDIENCE,
      accessTtlSec: env.JWT_ACCESS_TTL,
      clockSkewSec: env.JWT_CLOCK_SKEW_SEC,
    },
    refreshTtlSec: env.REFRESH_TOKEN_TTL,
    hashing: {
      memoryCost: env.ARGON2_MEMORY_COST,
      timeCost: env.ARGON2_TIME_COST,
      parallelism: env.ARGON2_PARALLELISM,
    },
    loginFailureDelayMs: {
      min: env.LOGIN_FAILURE_DELAY_MIN_MS,
      max: env.LOGIN_FAILURE_DELAY_MAX_MS,
    },
  };
}

// ----------------------------------------------------------------------------
// Fail-fast beim echten Service-Start
// ----------------------------------------------------------------------------

export function assertStartupEnv(env: Env): void {
  if (!env.DATABASE_URL) {
    throw new ConfigError("DATABASE_URL fehlt: setze DATABASE_URL oder DATABASE_URL_FILE.");
  }

  if (env.NODE_ENV === "production" && env.CORS_ORIGIN === "*") {
    // eslint-disable-next-line no-console
    console.warn("[env] WARNUNG: In Production sollte CORS_ORIGIN nicht '*' sein.");
  }
}

// ----------------------------------------------------------------------------
// Debug-Ausgabe ohne Secrets
// ----------------------------------------------------------------------------

export function logEnvSummary(
  env: Env,
  log: (msg: string, extra?: unknown) => void = console.info,
) {
  const summary = {
    NODE_ENV: env.NODE_ENV,
    HOST: env.HOST,
    PORT: env.PORT,
    LOG_LEVEL: env.LOG_LEVEL,

    CORS_ORIGIN: env.CORS_ORIGIN,
    REQUEST_ID_HEADER: env.REQUEST_ID_HEADER,
    TRUST_PROXY: env.TRUST_PROXY,
    OPENAPI_ENABLED: env.OPENAPI_ENABLED,
    METRICS_ENABLED: env.METRICS_ENABLED,

    DATABASE_URL: mask(env.DATABASE_URL),
    REDIS_URL: mask(env.REDIS_URL),

    RATE_LIMIT_WINDOW: env.RATE_LIMIT_WINDOW,
    RATE_LIMIT_MAX: env.RATE_LIMIT_MAX,
    RATE_LIMIT_AUTH_MAX: env.RATE_LIMIT_AUTH_MAX,

    JWT_SECRET: mask(env.JWT_SECRET),
    JWT_ALGORITHM: env.JWT_ALGORITHM,
    JWT_ISSUER: env.JWT_ISSUER,
    JWT_AUDIENCE: env.JWT_AUDIENCE,
    JWT_ACCESS_TTL: env.JWT_ACCESS_TTL,
    JWT_CLOCK_SKEW_SEC: env.JWT_CLOCK_SKEW_SEC,
    REFRESH_TOKEN_TTL: env.REFRESH_TOKEN_TTL,
  };

  log("[env] configuration summary", summary);
}
