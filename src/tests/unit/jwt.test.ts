import { describe, expect, it } from "vitest";
import { SignJWT } from "jose";
import { AccessTokenCodec } from "../../libs/jwt.js";
import { testConfig } from "../support/test-app.js";

const config = testConfig();
const codec = new AccessTokenCodec(config.jwt);
const NOW = new Date("2030-01-01T00:00:00Z");
const NOW_SEC = Math.floor(NOW.getTime() / 1000);

function addSec(seconds: number): Date {
  return new Date(NOW.getTime() + seconds * 1000);
}

async function signRaw(claims: Record<string, unknown>, opts: { jti?: boolean } = {}) {
  const jwt = new SignJWT(claims)
    .setProtectedHeader({ alg: "HS256" })
    .setSubject("alice")
    .setIssuedAt(NOW_SEC)
    .setExpirationTime(NOW_SEC + 600)
    .setIssuer(config.jwt.issuer)
    .setAudience(config.jwt.audience);
  if (opts.jti !== false) jwt.setJti("jti-1");
  return jwt.sign(config.jwt.secret);
}

describe("AccessTokenCodec", () => {
  it("round-trips subject and epoch", async () => {
    const minted = await codec.mint("alice", 3, NOW);
    const claims = await codec.verify(minted.token, NOW);

    expect(claims).toMatchObject({
      sub: "alice",
      ver: 3,
      typ: "access",
      jti: minted.jti,
      iat: NOW_SEC,
      exp: NOW_SEC + config.jwt.accessTtlSec,
      iss: "post-scheduler-auth",
      aud: "post-scheduler-api",
    });
    expect(minted.exp).toBe(NOW_SEC + 1800);
  });

  it("issues a unique jti per token", async () => {
    const [a, b] = await Promise.all([codec.mint("alice", 0, NOW), codec.mint("alice", 0, NOW)]);
    expect(a.jti).not.toBe(b.jti);
  });

  it("accepts a token inside the clock-skew window and rejects it after", async () => {
    const { token } = await codec.mint("alice", 0, NOW);

    // exp = NOW + 1800, Toleranz 30 s
    await expect(codec.verify(token, addSec(1829))).resolves.toMatchObject({ sub: "alice" });
    await expect(codec.verify(token, addSec(1830))).rejects.toMatchObject({
      code: "INVALID_CREDENTIALS",
      reason: "token_verification_failed",
    });
  });

  it("honours a custom ttl", async () => {
    const { token, exp } = await codec.mint("alice", 0, NOW, 60);

    expect(exp).toBe(NOW_SEC + 60);
    await expect(codec.verify(token, addSec(120))).rejects.toMatchObject({
      reason: "token_verification_failed",
    });
  });

  it("rejects a tampered payload", async () => {
    const { token } = await codec.mint("alice", 0, NOW);
    const [header, , signature] = token.split(".");
    const forged = Buffer.from(
      JSON.stringify({ sub: "mallory", ver: 0, typ: "access", jti: "x", iat: NOW_SEC, exp: NOW_SEC + 600 }),
    ).toString("base64url");

    await expect(codec.verify(`${header}.${forged}.${signature}`, NOW)).rejects.toMatchObject({
      reason: "token_verification_failed",
    });
  });

  it("rejects a token signed with another secret", async () => {
    const other = new AccessTokenCodec({ ...config.jwt, secret: new TextEncoder().encode("other-secret") });
    const { token } = await other.mint("alice", 0, NOW);

    await expect(codec.verify(token, NOW)).rejects.toMatchObject({
      reason: "token_verification_failed",
    });
  });

  it("rejects an algorithm other than the configured one", async () => {
    const hs512 = new AccessTokenCodec({ ...config.jwt, algorithm: "HS512" });
    const { token } = await hs512.mint("alice", 0, NOW);

    await expect(codec.verify(token, NOW)).rejects.toMatchObject({
      reason: "token_verification_failed",
    });
    await expect(hs512.verify(token, NOW)).resolves.toMatchObject({ sub: "alice" });
  });

  it("rejects a token without jti", async () => {
    const token = await signRaw({ typ: "access", ver: 0 }, { jti: false });
    await expect(codec.verify(token, NOW)).rejects.toMatchObject({
      reason: "token_verification_failed",
    });
  });

  it("rejects a token without ver", async () => {
    const token = await signRaw({ typ: "access" });
    await expect(codec.verify(token, NOW)).rejects.toMatchObject({ reason: "ver_missing" });
  });

  it("rejects a non-access token type", async () => {
    const token = await signRaw({ typ: "refresh", ver: 0 });
    await expect(codec.verify(token, NOW)).rejects.toMatchObject({ reason: "invalid_token_type" });
  });

  it("rejects garbage", async () => {
    await expect(codec.verify("not.a.jwt", NOW)).rejects.toMatchObject({
      code: "INVALID_CREDENTIALS",
    });
  });

  it("refuses to start with an empty secret", () => {
    expect(() => new AccessTokenCodec({ ...config.jwt, secret: new Uint8Array() })).toThrow(
      /leeres Secret/,
    );
  });

  it("refuses to mint a negative epoch", async () => {
    await expect(codec.mint("alice", -1, NOW)).rejects.toThrow("ver_invalid");
  });
});
