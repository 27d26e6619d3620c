import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildTestApp } from "../support/test-app.js";
import type { ManualClock } from "../support/manual-clock.js";

type TokenSetBody = {
  access_token: string;
  access_expires_at: number;
  refresh_token: string;
  refresh_expires_at: number;
  token_type: string;
};

let app: FastifyInstance;
let clock: ManualClock;

function refresh(refreshToken: string) {
  return app.inject({ method: "POST", url: "/auth/refresh", payload: { refresh_token: refreshToken } });
}

describe("Refresh token rotation", () => {
  let initial: TokenSetBody;

  beforeAll(async () => {
    ({ app, clock } = await buildTestApp());

    await app.inject({
      method: "POST",
      url: "/auth/register",
      payload: { username: "bob", email: "bob@example.test", password: "bob-password" },
    });

    const res = await app.inject({
      method: "POST",
      url: "/auth/login",
      payload: { username: "bob", password: "bob-password" },
    });
    expect(res.statusCode).toBe(200);
    initial = res.json<TokenSetBody>();
  });

  afterAll(async () => {
    await app.close();
  });

  it("returns a bearer token set on login", () => {
    // ManualClock startet bei 2030-01-01T00:00:00Z = 1893456000
    expect(initial).toMatchObject({
      token_type: "bearer",
      access_expires_at: 1893456000 + 1800,
      refresh_expires_at: 1893456000 + 604800,
    });
    expect(initial.refresh_token).toMatch(/^[0-9a-f-]{36}\.[A-Za-z0-9_-]{43}$/);
  });

  it("rotates once and rejects the replay", async () => {
    clock.advance(60);

    const rotated = await refresh(initial.refresh_token);
    expect(rotated.statusCode).toBe(200);
    const next = rotated.json<TokenSetBody>();
    expect(next.refresh_token).not.toBe(initial.refresh_token);
    expect(next.access_expires_at).toBe(1893456000 + 60 + 1800);

    const replay = await refresh(initial.refresh_token);
    expect(replay.statusCode).toBe(401);
    expect(replay.json()).toMatchObject({ error: { code: "INVALID_CREDENTIALS" } });

    const me = await app.inject({
      method: "GET",
      url: "/users/me",
      headers: { authorization: `Bearer ${next.access_token}` },
    });
    expect(me.statusCode).toBe(200);

    // Rotation ist kein Widerruf: das erste Access-Token bleibt bis exp gültig
    const oldAccess = await app.inject({
      method: "GET",
      url: "/users/me",
      headers: { authorization: `Bearer ${initial.access_token}` },
    });
    expect(oldAccess.statusCode).toBe(200);

    initial = next;
  });

  it("rejects an expired refresh token", async () => {
    clock.advance(604800);
    const res = await refresh(initial.refresh_token);
    expect(res.statusCode).toBe(401);
  });

  it("rejects malformed refresh payloads", async () => {
    const empty = await app.inject({ method: "POST", url: "/auth/refresh", payload: {} });
    expect(empty.statusCode).toBe(400);
    expect(empty.json()).toMatchObject({ error: { code: "VALIDATION_FAILED" } });

    const garbage = await refresh("garbage");
    expect(garbage.statusCode).toBe(401);
  });
});
