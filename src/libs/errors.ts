// src/libs/errors.ts
// ============================================================================
// Fehler-Taxonomie des Auth-Kerns
// ----------------------------------------------------------------------------
// - Jede Klasse trägt code + statusCode + feste Public-Message
// - Credential-Fehler sind nach außen einheitlich (kein Orakel, welcher Check
//   fehlgeschlagen ist); der interne Grund geht nur ins Log (reason)
// - Store-Ausfälle sind bewusst KEIN Credential-Fehler (503, retrybar)
// ============================================================================

export type AuthErrorCode =
  | "INVALID_CREDENTIALS"
  | "INACTIVE_ACCOUNT"
  | "FORBIDDEN_ROLE"
  | "DUPLICATE_IDENTITY"
  | "STORE_UNAVAILABLE";

export abstract class AuthError extends Error {
  abstract readonly code: AuthErrorCode;
  abstract readonly statusCode: number;
  abstract readonly publicMessage: string;
}

export class InvalidCredentialsError extends AuthError {
  readonly code = "INVALID_CREDENTIALS";
  readonly statusCode = 401;
  readonly publicMessage = "Could not validate credentials.";

  constructor(readonly reason: string = "invalid_credentials") {
    super(reason);
    this.name = "InvalidCredentialsError";
  }
}

export class InactiveAccountError extends AuthError {
  readonly code = "INACTIVE_ACCOUNT";
  readonly statusCode = 400;
  readonly publicMessage = "Inactive account.";

  constructor() {
    super("inactive_account");
    this.name = "InactiveAccountError";
  }
}

export class ForbiddenRoleError extends AuthError {
  readonly code = "FORBIDDEN_ROLE";
  readonly statusCode = 403;
  readonly publicMessage = "Insufficient role for this operation.";

  constructor() {
    super("forbidden_role");
    this.name = "ForbiddenRoleError";
  }
}

export class DuplicateIdentityError extends AuthError {
  readonly code = "DUPLICATE_IDENTITY";
  readonly statusCode = 400;
  readonly publicMessage = "User with this email or username already exists.";

  constructor() {
    super("duplicate_identity");
    this.name = "DuplicateIdentityError";
  }
}

export class StoreUnavailableError extends AuthError {
  readonly code = "STORE_UNAVAILABLE";
  readonly statusCode = 503;
  readonly publicMessage = "Service temporarily unavailable.";

  constructor(options?: { cause?: unknown }) {
    super("store_unavailable", options);
    this.name = "StoreUnavailableError";
  }
}

export function isAuthError(err: unknown): err is AuthError {
  return err instanceof AuthError;
}
