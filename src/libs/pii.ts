// src/libs/pii.ts
// ============================================================================
// Pseudonyme Log-Felder für personenbezogene Daten
// ----------------------------------------------------------------------------
//  - Benutzernamen und Client-IPs landen nie im Klartext im Log
//  - Fingerprint = erste 16 Hex-Zeichen von sha256("<art>:<normalisierter Wert>")
//  - Das Präfix trennt die Arten: gleicher String als Name und als IP ergibt
//    verschiedene Fingerprints
// ============================================================================

import { createHash } from "node:crypto";

export type PiiKind = "username" | "ip";

const FINGERPRINT_LENGTH = 16;

function normalize(kind: PiiKind, value: string): string {
  const trimmed = value.trim();
  // Benutzernamen sind für die Korrelation case-insensitiv
  return kind === "username" ? trimmed.toLowerCase() : trimmed;
}

export function logFingerprint(kind: PiiKind, value: string): string {
  return createHash("sha256")
    .update(`${kind}:${normalize(kind, value)}`, "utf8")
    .digest("hex")
    .slice(0, FINGERPRINT_LENGTH);
}

/** Log-Kontext für Login-Versuche (Name + Quelle, beide pseudonymisiert). */
export function loginAttemptLogFields(username: string, ip: string | undefined) {
  return {
    username_hash: logFingerprint("username", username),
    ip_hash: logFingerprint("ip", ip || "unknown"),
  };
}
