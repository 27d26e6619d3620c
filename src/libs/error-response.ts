// src/libs/error-response.ts
// ============================================================================
// Fehler-Envelope der API
// ----------------------------------------------------------------------------
//  - Form: { status, error: { code, message }, details? }
//  - errorEnvelope(): reiner Body-Builder (auch für reply.send ohne Hilfsfunktion)
//  - replyError():    Status + Body setzen
//  - replyAuthError(): Taxonomie-Fehler, ergänzt WWW-Authenticate / Retry-After
//  - codeForStatus(): Fallback-Code für Fastify-/Plugin-Fehler ohne eigenen Code
// ============================================================================

import type { FastifyReply } from "fastify";
import type { AuthError } from "./errors.js";

export interface ErrorEnvelope {
  status: number;
  error: { code: string; message: string };
  details?: unknown;
}

// Sekunden bis zum nächsten Versuch bei 503 STORE_UNAVAILABLE
export const RETRY_AFTER_SEC = 5;

const FALLBACK_CODES: Readonly<Record<number, string>> = {
  400: "VALIDATION_FAILED",
  401: "INVALID_CREDENTIALS",
  403: "FORBIDDEN",
  404: "NOT_FOUND",
  413: "PAYLOAD_TOO_LARGE",
  415: "UNSUPPORTED_MEDIA_TYPE",
  429: "RATE_LIMITED",
};

export function codeForStatus(status: number): string {
  return FALLBACK_CODES[status] ?? "INTERNAL";
}

export function errorEnvelope(
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ErrorEnvelope {
  return details === undefined
    ? { status, error: { code, message } }
    : { status, error: { code, message }, details };
}

export function replyError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
) {
  return reply
    .code(status)
    .type("application/json")
    .send(errorEnvelope(status, code, message, details));
}

export function replyAuthError(reply: FastifyReply, err: AuthError) {
  switch (err.statusCode) {
    case 401:
      reply.header("WWW-Authenticate", "Bearer");
      break;
    case 503:
      reply.header("Retry-After", String(RETRY_AFTER_SEC));
      break;
  }
  return replyError(reply, err.statusCode, err.code, err.publicMessage);
}
