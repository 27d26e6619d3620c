import { beforeEach, describe, expect, it } from "vitest";
import { extractBearer } from "../../modules/auth/gate.js";
import type { UserRecord } from "../../modules/users/types.js";
import { createTestAuth, type TestAuth } from "../support/test-app.js";

let auth: TestAuth;
let carol: UserRecord;

async function bearerFor(user: UserRecord): Promise<string> {
  const { token } = await auth.codec.mint(user.username, user.tokenVersion, auth.clock.now());
  return `Bearer ${token}`;
}

beforeEach(async () => {
  auth = createTestAuth();
  carol = await auth.store.insert({
    username: "carol",
    email: "carol@example.test",
    passwordHash: "unused",
  });
});

describe("extractBearer", () => {
  it("accepts case-insensitive scheme and surrounding whitespace", () => {
    expect(extractBearer("  bearer abc.def.ghi ")).toEqual({ ok: true, value: { token: "abc.def.ghi" } });
    expect(extractBearer(["Bearer first", "Bearer second"])).toEqual({
      ok: true,
      value: { token: "first" },
    });
  });

  it("rejects a missing or malformed header", () => {
    expect(extractBearer(undefined)).toMatchObject({ ok: false, error: { reason: "missing_token" } });
    expect(extractBearer("")).toMatchObject({ ok: false, error: { reason: "missing_token" } });
    expect(extractBearer("Basic dXNlcjpwdw==")).toMatchObject({
      ok: false,
      error: { reason: "malformed_authorization" },
    });
    expect(extractBearer("Bearer a b")).toMatchObject({
      ok: false,
      error: { reason: "malformed_authorization" },
    });
  });
});

describe("AuthenticationGate", () => {
  it("resolves the stored user at every level", async () => {
    await auth.store.updateAccount(carol.id, { role: "admin" });
    const header = await bearerFor(carol);

    for (const level of ["identity", "active", "admin"] as const) {
      const outcome = await auth.gate.authenticate(level, header);
      expect(outcome).toMatchObject({ ok: true, value: { user: { id: carol.id, role: "admin" } } });
    }
  });

  it("fails with 401 for an unknown subject", async () => {
    const { token } = await auth.codec.mint("nobody", 0, auth.clock.now());
    const outcome = await auth.gate.authenticate("identity", `Bearer ${token}`);

    expect(outcome).toMatchObject({
      ok: false,
      error: { statusCode: 401, reason: "subject_unknown" },
    });
  });

  it("fails with 401 for an expired token", async () => {
    const header = await bearerFor(carol);
    auth.clock.advance(1800 + 30);

    const outcome = await auth.gate.authenticate("identity", header);
    expect(outcome).toMatchObject({ ok: false, error: { reason: "token_verification_failed" } });
  });

  it("fails with 401 for a stale epoch", async () => {
    const header = await bearerFor(carol);
    await auth.store.revokeAll(carol.id);

    const outcome = await auth.gate.authenticate("identity", header);
    expect(outcome).toMatchObject({ ok: false, error: { reason: "token_version_stale" } });
  });

  it("lets an inactive user through identity but not active", async () => {
    const header = await bearerFor(carol);
    await auth.store.updateAccount(carol.id, { isActive: false });

    await expect(auth.gate.authenticate("identity", header)).resolves.toMatchObject({ ok: true });
    await expect(auth.gate.authenticate("active", header)).resolves.toMatchObject({
      ok: false,
      error: { code: "INACTIVE_ACCOUNT", statusCode: 400 },
    });
  });

  it("reports inactive before forbidden role", async () => {
    const header = await bearerFor(carol);
    await auth.store.updateAccount(carol.id, { isActive: false });

    await expect(auth.gate.authenticate("admin", header)).resolves.toMatchObject({
      ok: false,
      error: { code: "INACTIVE_ACCOUNT" },
    });
  });

  it("rejects a non-admin at admin level with 403", async () => {
    const outcome = await auth.gate.authenticate("admin", await bearerFor(carol));
    expect(outcome).toMatchObject({
      ok: false,
      error: { code: "FORBIDDEN_ROLE", statusCode: 403 },
    });
  });

  it("reads the role from the store, not from the token", async () => {
    const header = await bearerFor(carol);
    await auth.store.updateAccount(carol.id, { role: "admin" });

    await expect(auth.gate.authenticate("admin", header)).resolves.toMatchObject({ ok: true });
  });

  it("surfaces a store outage as 503", async () => {
    const header = await bearerFor(carol);
    auth.store.unavailable = true;

    await expect(auth.gate.authenticate("identity", header)).resolves.toMatchObject({
      ok: false,
      error: { code: "STORE_UNAVAILABLE", statusCode: 503 },
    });
  });
});
