// src/modules/auth/revocation.ts
// ============================================================================
// Revocation-Controller
// ----------------------------------------------------------------------------
// revokeAll(user):
// - token_version + 1   -> jedes zuvor ausgestellte Access-Token ist stale
// - Refresh-State NULL  -> das ausstehende Refresh-Token ist tot
// - beides in EINEM Statement (kein Blacklist-Eintrag pro Token)
//
// Trade-off: O(1)-Widerruf, aber immer alle Sessions eines Users.
// ============================================================================

import { InvalidCredentialsError } from "../../libs/errors.js";
import type { UserRecord, UserStore } from "../users/types.js";

export class RevocationController {
  constructor(private readonly store: UserStore) {}

  /** Liefert die neue token_version. */
  async revokeAll(user: Pick<UserRecord, "id">): Promise<number> {
    const next = await this.store.revokeAll(user.id);
    if (next === null) {
      throw new InvalidCredentialsError("revoke_user_missing");
    }
    return next;
  }
}
