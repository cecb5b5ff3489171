import { describe, expect, it } from "vitest";
import { SignJWT } from "jose";
import { env } from "../../libs/env.js";
import { signAccessToken, verifyAccessToken } from "../../libs/jwt.js";

const encoder = new TextEncoder();

const USER_ID = "00000000-0000-4000-8000-000000000002";
const SESSION_ID = "00000000-0000-4000-8000-000000000001";

function baseToken(claims: Record<string, unknown> = {}) {
  return new SignJWT({ typ: "access", sid: SESSION_ID, ...claims })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(USER_ID)
    .setJti("00000000-0000-4000-8000-000000000003")
    .setIssuedAt()
    .setIssuer(env.JWT_ISSUER)
    .setAudience(env.JWT_AUDIENCE);
}

describe("JWT clock skew", () => {
  const secret = encoder.encode(env.JWT_SECRET_ACTIVE ?? "test-secret");

  it("accepts token slightly in the future within tolerance", async () => {
    const token = await baseToken().setNotBefore("45s").setExpirationTime("15m").sign(secret);

    await expect(verifyAccessToken(token)).resolves.toMatchObject({
      typ: "access",
      sub: USER_ID,
      sid: SESSION_ID,
      ver: 1,
    });
  });

  it("rejects token far in the future beyond tolerance", async () => {
    const token = await baseToken().setNotBefore("5m").setExpirationTime("20m").sign(secret);

    await expect(verifyAccessToken(token)).rejects.toBeDefined();
  });
});

describe("Access token claims", () => {
  const secret = encoder.encode(env.JWT_SECRET_ACTIVE ?? "test-secret");

  it("round-trips sub and sid", async () => {
    const { token, exp } = await signAccessToken(USER_ID, SESSION_ID, 60);
    const payload = await verifyAccessToken(token);

    expect(payload.sub).toBe(USER_ID);
    expect(payload.sid).toBe(SESSION_ID);
    expect(payload.exp).toBe(exp);
  });

  it("rejects a token without sid", async () => {
    const token = await new SignJWT({ typ: "access" })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject(USER_ID)
      .setJti("jti-1")
      .setIssuedAt()
      .setExpirationTime("5m")
      .setIssuer(env.JWT_ISSUER)
      .setAudience(env.JWT_AUDIENCE)
      .sign(secret);

    await expect(verifyAccessToken(token)).rejects.toThrow("sid_missing");
  });

  it("rejects a refresh-typed token", async () => {
    const token = await baseToken({ typ: "refresh" }).setExpirationTime("5m").sign(secret);

    await expect(verifyAccessToken(token)).rejects.toThrow("invalid_token_type");
  });

  it("rejects a token signed with another secret", async () => {
    const token = await baseToken()
      .setExpirationTime("5m")
      .sign(encoder.encode("other-test-secret"));

    await expect(verifyAccessToken(token)).rejects.toBeDefined();
  });

  it("refuses to sign for a non-uuid subject", async () => {
    await expect(signAccessToken("user-1", SESSION_ID)).rejects.toThrow("sub_invalid");
  });
});
