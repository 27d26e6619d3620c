// src/libs/crypto.ts
// ============================================================================
// Credential-Hashing & -Verifikation (argon2id)
// ----------------------------------------------------------------------------
// - Ein Hasher für Passwörter UND Refresh-Token-Digests
// - Salt steckt im Digest (PHC-String), gleiche Eingabe -> anderer Digest
// - verify() wirft nie, kaputte Digests ergeben false
// ============================================================================

import { randomBytes } from "node:crypto";
import argon2 from "argon2";
import type { AuthConfig } from "./env.js";

export type HashingParams = AuthConfig["hashing"];

export class CredentialHasher {
  private dummyDigest?: Promise<string>;

  constructor(private readonly params: HashingParams) {}

  async hash(secret: string): Promise<string> {
    return argon2.hash(secret, {
      type: argon2.argon2id,
      memoryCost: this.params.memoryCost,
      timeCost: this.params.timeCost,
      parallelism: this.params.parallelism,
    });
  }

  async verify(secret: string, digest: string): Promise<boolean> {
    try {
      return await argon2.verify(digest, secret);
    } catch {
      return false;
    }
  }

  /**
   * Timing-Hardening: Login mit unbekanntem User verifiziert gegen diesen
   * Digest (gleiche Kostenparameter wie echte Hashes). Ein fehlgeschlagener
   * Hash wird nicht gecacht; der nächste Aufruf versucht es erneut.
   */
  dummy(): Promise<string> {
    if (!this.dummyDigest) {
      const pending = this.hash(randomBytes(16).toString("hex"));
      this.dummyDigest = pending;
      void pending.catch(() => {
        if (this.dummyDigest === pending) this.dummyDigest = undefined;
      });
    }
    return this.dummyDigest;
  }
}
