import { describe, expect, it } from "vitest";
import { mapUserRow } from "../../modules/users/repository.js";
import type { UserRow } from "../../modules/users/types.js";

const ROW: UserRow = {
  id: "6f1c2a8e-3b7d-4c1e-9a2f-0d5e8b7c6a41",
  username: "dave",
  email: "dave@example.test",
  password_hash: "$argon2id$stub",
  is_active: true,
  role: "user",
  refresh_token_hash: "$argon2id$refresh",
  refresh_token_expires_at: "2030-01-08 00:00:00",
  token_version: 2,
  external_access_token: null,
  external_refresh_token: null,
  external_open_id: null,
  external_token_expires_at: null,
  created_at: "2030-01-01 00:00:00+00",
  updated_at: new Date("2030-01-02T00:00:00Z"),
};

describe("mapUserRow", () => {
  it("normalizes timestamps to UTC instants", () => {
    const user = mapUserRow(ROW);

    expect(user.refreshTokenExpiresAt?.toISOString()).toBe("2030-01-08T00:00:00.000Z");
    expect(user.createdAt.toISOString()).toBe("2030-01-01T00:00:00.000Z");
    expect(user.updatedAt.toISOString()).toBe("2030-01-02T00:00:00.000Z");
    expect(user).toMatchObject({ passwordHash: "$argon2id$stub", isActive: true, tokenVersion: 2 });
  });

  it("treats a half-set refresh pair as no token", () => {
    const user = mapUserRow({ ...ROW, refresh_token_expires_at: null });

    expect(user.refreshTokenHash).toBeNull();
    expect(user.refreshTokenExpiresAt).toBeNull();
  });

  it("maps a connected external platform token", () => {
    const user = mapUserRow({
      ...ROW,
      external_access_token: "test-external-access",
      external_refresh_token: "test-external-refresh",
      external_open_id: "open-123",
      external_token_expires_at: "2030-01-01 02:00:00",
    });

    expect(user.externalToken).toEqual({
      accessToken: "test-external-access",
      refreshToken: "test-external-refresh",
      openId: "open-123",
      expiresAt: new Date("2030-01-01T02:00:00.000Z"),
    });
  });

  it("treats missing external fields as not connected", () => {
    expect(mapUserRow(ROW).externalToken).toBeNull();
    expect(mapUserRow({ ...ROW, external_access_token: "test-external-access" }).externalToken).toBeNull();
  });

  it("fails loudly on an unreadable timestamp", () => {
    expect(() => mapUserRow({ ...ROW, created_at: "garbage" })).toThrow("invalid_timestamp:created_at");
  });
});
