import { beforeEach, describe, expect, it } from "vitest";
import { createTestAuth, type TestAuth } from "../support/test-app.js";
import { InvalidCredentialsError } from "../../libs/errors.js";

let auth: TestAuth;

beforeEach(async () => {
  auth = createTestAuth();
  await auth.service.register({
    username: "erin",
    email: "  Erin@Example.TEST ",
    password: "erin-password",
  });
});

describe("AuthService.register", () => {
  it("normalizes the email and stores a hash, never the password", async () => {
    const erin = await auth.store.findByUsername("erin");

    expect(erin).toMatchObject({ email: "erin@example.test", role: "user", isActive: true, tokenVersion: 0 });
    expect(erin?.passwordHash).not.toBe("erin-password");
    await expect(auth.hasher.verify("erin-password", erin?.passwordHash ?? "")).resolves.toBe(true);
  });

  it("rejects a taken username or email", async () => {
    await expect(
      auth.service.register({ username: "erin", email: "other@example.test", password: "x".repeat(8) }),
    ).rejects.toMatchObject({ code: "DUPLICATE_IDENTITY" });
    await expect(
      auth.service.register({ username: "erin2", email: "ERIN@example.test", password: "x".repeat(8) }),
    ).rejects.toMatchObject({ code: "DUPLICATE_IDENTITY" });
  });
});

describe("AuthService.login", () => {
  it("returns a token set bound to the current epoch", async () => {
    await auth.store.revokeAll((await auth.store.findByUsername("erin"))?.id ?? "");

    const { tokens } = await auth.service.login({ username: "erin", password: "erin-password" });
    const claims = await auth.codec.verify(tokens.accessToken, auth.clock.now());

    expect(claims).toMatchObject({ sub: "erin", ver: 1 });
    expect(tokens.refreshTokenExpiresAt - tokens.accessTokenExpiresAt).toBe(604800 - 1800);
  });

  it("gives the same error for unknown user and wrong password", async () => {
    // nacheinander: jede Rejection hat sofort einen Handler
    const unknown = await auth.service
      .login({ username: "nobody", password: "erin-password" })
      .then(() => null, (err: unknown) => err);
    const wrong = await auth.service
      .login({ username: "erin", password: "not-erins" })
      .then(() => null, (err: unknown) => err);

    expect(unknown).toBeInstanceOf(InvalidCredentialsError);
    expect(unknown).toMatchObject({ code: "INVALID_CREDENTIALS", reason: "login_failed" });
    expect(wrong).toBeInstanceOf(InvalidCredentialsError);
    expect(wrong).toMatchObject({ code: "INVALID_CREDENTIALS", reason: "login_failed" });
  });

  it("refuses an inactive account after a correct password", async () => {
    const erin = await auth.store.findByUsername("erin");
    await auth.store.updateAccount(erin?.id ?? "", { isActive: false });

    await expect(
      auth.service.login({ username: "erin", password: "erin-password" }),
    ).rejects.toMatchObject({ code: "INACTIVE_ACCOUNT" });
  });
});

describe("AuthService.refresh", () => {
  it("rejects a malformed token before touching the store", async () => {
    auth.store.unavailable = true;
    await expect(auth.service.refresh("garbage")).rejects.toMatchObject({ reason: "refresh_malformed" });
  });

  it("does not consume the token of an inactive account", async () => {
    const { tokens } = await auth.service.login({ username: "erin", password: "erin-password" });
    const erin = await auth.store.findByUsername("erin");

    await auth.store.updateAccount(erin?.id ?? "", { isActive: false });
    await expect(auth.service.refresh(tokens.refreshToken)).rejects.toMatchObject({
      code: "INACTIVE_ACCOUNT",
    });

    await auth.store.updateAccount(erin?.id ?? "", { isActive: true });
    await expect(auth.service.refresh(tokens.refreshToken)).resolves.toMatchObject({
      user: { username: "erin" },
    });
  });

  it("rejects every token after logout", async () => {
    const { user, tokens } = await auth.service.login({ username: "erin", password: "erin-password" });

    await expect(auth.service.logout(user)).resolves.toBe(1);
    await expect(auth.service.refresh(tokens.refreshToken)).rejects.toMatchObject({
      reason: "refresh_not_found",
    });
    await expect(
      auth.gate.authenticate("identity", `Bearer ${tokens.accessToken}`),
    ).resolves.toMatchObject({ ok: false, error: { reason: "token_version_stale" } });
  });
});
