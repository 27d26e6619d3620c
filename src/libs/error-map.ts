// src/libs/error-map.ts
// ============================================================================
// Mapping unbekannter Fehler (Taxonomie + PostgreSQL SQLSTATE) auf API-Fehler
// ============================================================================

import { isAuthError } from "./errors.js";

export type MappedError = {
  status: number;
  code: string;
  message: string;
};

function sqlState(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function mapError(err: unknown): MappedError {
  if (isAuthError(err)) {
    return { status: err.statusCode, code: err.code, message: err.publicMessage };
  }

  const code = sqlState(err);

  switch (code) {
    case "23505":
      return {
        status: 400,
        code: "DUPLICATE_IDENTITY",
        message: "User with this email or username already exists.",
      };
    case "23503":
    case "23514":
    case "23502":
    case "22P02":
      return {
        status: 400,
        code: "VALIDATION_FAILED",
        message: "Invalid input data.",
      };
    default:
      break;
  }

  // Verbindungsabbruch / Server-Shutdown (Klasse 08 + 57P0x) bzw. Node-Netzfehler
  if (
    code !== undefined &&
    (code.startsWith("08") || code.startsWith("57P") || code === "ECONNREFUSED" || code === "ETIMEDOUT")
  ) {
    return {
      status: 503,
      code: "STORE_UNAVAILABLE",
      message: "Service temporarily unavailable.",
    };
  }

  return {
    status: 500,
    code: "INTERNAL",
    message: "Internal server error.",
  };
}
