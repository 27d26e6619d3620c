// src/modules/auth/types.ts
// ============================================================================
// DTOs für den Auth-Service / Routes
// ============================================================================

export interface RegisterInput {
  username: string;
  email: string;
  password: string;
}

export interface LoginInput {
  username: string;
  password: string;
}

export interface TokenSet {
  accessToken: string;
  accessTokenExpiresAt: number;  // Unix-Sekunden (exp aus JWT)
  refreshToken: string;          // opakes Secret, nur einmal sichtbar
  refreshTokenExpiresAt: number; // Unix-Sekunden
}

export interface TokenSetResponse {
  access_token: string;
  access_expires_at: number;
  refresh_token: string;
  refresh_expires_at: number;
  token_type: "bearer";
}

export function toTokenSetResponse(tokens: TokenSet): TokenSetResponse {
  return {
    access_token: tokens.accessToken,
    access_expires_at: tokens.accessTokenExpiresAt,
    refresh_token: tokens.refreshToken,
    refresh_expires_at: tokens.refreshTokenExpiresAt,
    token_type: "bearer",
  };
}
