import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  AttemptsExceededError,
  ConcurrencyConflictError,
  DuplicateRegistrationError,
  ExpiredError,
  InvalidCodeError,
  RegistrationNotFoundError,
  ResendCooldownError,
} from "../../libs/errors.js";
import {
  getOtpStatus,
  issueOtpChallenge,
  resendOtpChallenge,
  verifyOtpChallenge,
} from "../../modules/otp/service.js";
import { MemoryCredentialStore } from "../support/memory-store.js";
import { TEST_POLICY } from "../support/test-app.js";

const T0 = new Date("2026-03-01T10:00:00.000Z");
const EMAIL = "a@x.com";
const PHONE = "+1555";

function wrongCode(code: string): string {
  return code === "111111" ? "222222" : "111111";
}

describe("OTP issuer + verifier", () => {
  let store: MemoryCredentialStore;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(T0);
    store = new MemoryCredentialStore();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("stores only a hash with ttl and attempt budget", async () => {
    const { challenge, code } = await issueOtpChallenge(
      store,
      { email: " A@X.com ", phone: PHONE, name: "Ada" },
      TEST_POLICY,
    );

    expect(code).toMatch(/^\d{6}$/);
    expect(challenge.email).toBe(EMAIL);
    expect(challenge.code_hash).not.toContain(code);
    expect(challenge.code_hash).toMatch(/^[0-9a-f]{64}$/);
    expect(challenge.expires_at.toISOString()).toBe("2026-03-01T10:10:00.000Z");
    expect(challenge.max_attempts).toBe(3);
    expect(challenge.attempts).toBe(0);
  });

  it("exhausts after three wrong codes and stays exhausted for the right one", async () => {
    const { code } = await issueOtpChallenge(
      store,
      { email: EMAIL, phone: PHONE, name: "Ada" },
      TEST_POLICY,
    );
    const wrong = wrongCode(code);

    await expect(verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code: wrong }))
      .rejects.toMatchObject({ code: "OTP_INVALID", remainingAttempts: 2 });
    await expect(verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code: wrong }))
      .rejects.toMatchObject({ code: "OTP_INVALID", remainingAttempts: 1 });
    await expect(verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code: wrong }))
      .rejects.toBeInstanceOf(AttemptsExceededError);
    await expect(verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code }))
      .rejects.toBeInstanceOf(AttemptsExceededError);

    const [stored] = [...store.challenges.values()];
    expect(stored?.attempts).toBe(3);
    expect(stored?.verified_at).toBeNull();
    expect(store.users.size).toBe(0);
  });

  it("creates the user with a verified phone on the correct code", async () => {
    const { code } = await issueOtpChallenge(
      store,
      { email: EMAIL, phone: PHONE, name: "Ada", locale: "de" },
      TEST_POLICY,
    );

    const { user, challenge } = await verifyOtpChallenge(store, {
      email: EMAIL,
      phone: PHONE,
      code,
    });

    expect(user).toMatchObject({
      email: EMAIL,
      phone: PHONE,
      name: "Ada",
      locale: "de",
      is_phone_verified: true,
    });
    expect(challenge.verified_at?.toISOString()).toBe(T0.toISOString());

    // Verbraucht: zweiter Versuch ist ungültig, kein zweiter User
    await expect(verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code }))
      .rejects.toBeInstanceOf(InvalidCodeError);
    expect(store.users.size).toBe(1);
  });

  it("rejects an expired code even when it matches", async () => {
    const { code } = await issueOtpChallenge(
      store,
      { email: EMAIL, phone: PHONE, name: "Ada" },
      TEST_POLICY,
    );

    vi.setSystemTime(new Date(T0.getTime() + 10 * 60_000 + 1000));

    await expect(verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code }))
      .rejects.toBeInstanceOf(ExpiredError);
    expect(store.users.size).toBe(0);
  });

  it("answers an unknown pair like a wrong code", async () => {
    await expect(
      verifyOtpChallenge(store, { email: "nobody@x.com", phone: PHONE, code: "123456" }),
    ).rejects.toMatchObject({ code: "OTP_INVALID", remainingAttempts: undefined });
  });

  it("refuses registration for an existing email or phone", async () => {
    store.seedUser({ email: EMAIL, phone: "+4915100000000" });
    store.seedUser({ email: "b@x.com", phone: PHONE });

    await expect(
      issueOtpChallenge(store, { email: EMAIL, phone: "+1999", name: "Ada" }, TEST_POLICY),
    ).rejects.toMatchObject({ field: "email" });
    await expect(
      issueOtpChallenge(store, { email: "c@x.com", phone: PHONE, name: "Ada" }, TEST_POLICY),
    ).rejects.toBeInstanceOf(DuplicateRegistrationError);
    expect(store.challenges.size).toBe(0);
  });

  it("supersedes the previous challenge on reissue", async () => {
    const first = await issueOtpChallenge(
      store,
      { email: EMAIL, phone: PHONE, name: "Ada" },
      TEST_POLICY,
    );
    vi.setSystemTime(new Date(T0.getTime() + 1000));
    const second = await issueOtpChallenge(
      store,
      { email: EMAIL, phone: PHONE, name: "Ada" },
      TEST_POLICY,
    );

    expect(store.challenges.get(first.challenge.id)?.superseded_at).not.toBeNull();

    if (first.code !== second.code) {
      await expect(
        verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code: first.code }),
      ).rejects.toBeInstanceOf(InvalidCodeError);
    }
    const { user } = await verifyOtpChallenge(store, {
      email: EMAIL,
      phone: PHONE,
      code: second.code,
    });
    expect(user.email).toBe(EMAIL);
  });

  describe("resend", () => {
    it("enforces the cooldown", async () => {
      await issueOtpChallenge(store, { email: EMAIL, phone: PHONE, name: "Ada" }, TEST_POLICY);
      vi.setSystemTime(new Date(T0.getTime() + 20_000));

      await expect(
        resendOtpChallenge(store, { email: EMAIL, phone: PHONE }, TEST_POLICY),
      ).rejects.toMatchObject({ code: "OTP_RESEND_COOLDOWN", retryAfterSec: 40 });
    });

    it("issues a fresh challenge with the stored name after the cooldown", async () => {
      await issueOtpChallenge(
        store,
        { email: EMAIL, phone: PHONE, name: "Ada", locale: "de" },
        TEST_POLICY,
      );
      vi.setSystemTime(new Date(T0.getTime() + 61_000));

      const { challenge } = await resendOtpChallenge(
        store,
        { email: EMAIL, phone: PHONE },
        TEST_POLICY,
      );

      expect(challenge).toMatchObject({ name: "Ada", locale: "de", attempts: 0 });
      expect(store.challenges.size).toBe(2);
    });

    it("fails without a pending registration", async () => {
      await expect(
        resendOtpChallenge(store, { email: EMAIL, phone: PHONE }, TEST_POLICY),
      ).rejects.toBeInstanceOf(RegistrationNotFoundError);
    });

    it("exposes the retry delay in the error details", () => {
      expect(new ResendCooldownError(5).details).toEqual({ retry_after_seconds: 5 });
    });
  });

  describe("status", () => {
    it("reports remaining lifetime, attempts and cooldown", async () => {
      const { code } = await issueOtpChallenge(
        store,
        { email: EMAIL, phone: PHONE, name: "Ada" },
        TEST_POLICY,
      );
      await expect(
        verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code: wrongCode(code) }),
      ).rejects.toBeInstanceOf(InvalidCodeError);
      vi.setSystemTime(new Date(T0.getTime() + 30_000));

      await expect(
        getOtpStatus(store, { email: EMAIL, phone: PHONE }, TEST_POLICY),
      ).resolves.toEqual({
        pending: true,
        expires_in_seconds: 570,
        attempts_remaining: 2,
        resend_available_in_seconds: 30,
      });
    });

    it("reports nothing pending for an unknown pair", async () => {
      await expect(
        getOtpStatus(store, { email: EMAIL, phone: PHONE }, TEST_POLICY),
      ).resolves.toEqual({
        pending: false,
        expires_in_seconds: 0,
        attempts_remaining: 0,
        resend_available_in_seconds: 0,
      });
    });
  });

  describe("concurrent verification", () => {
    it("verifies exactly once when the right code races wrong ones", async () => {
      const { code } = await issueOtpChallenge(
        store,
        { email: EMAIL, phone: PHONE, name: "Ada" },
        TEST_POLICY,
      );
      const wrong = wrongCode(code);

      const results = await Promise.allSettled([
        verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code: wrong }),
        verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code }),
        verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code: wrong }),
      ]);

      expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
      expect(store.users.size).toBe(1);
    });

    it("never counts more attempts than the maximum", async () => {
      const { code } = await issueOtpChallenge(
        store,
        { email: EMAIL, phone: PHONE, name: "Ada" },
        TEST_POLICY,
      );
      const wrong = wrongCode(code);

      const results = await Promise.allSettled(
        Array.from({ length: 5 }, () =>
          verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code: wrong }),
        ),
      );

      expect(results.every((r) => r.status === "rejected")).toBe(true);
      const [stored] = [...store.challenges.values()];
      expect(stored?.attempts).toBe(3);
    });

    it("gives up with a conflict after five lost compare-and-updates", async () => {
      const { code } = await issueOtpChallenge(
        store,
        { email: EMAIL, phone: PHONE, name: "Ada" },
        TEST_POLICY,
      );
      const lost = vi.spyOn(store, "recordOtpAttempt").mockResolvedValue(false);

      await expect(
        verifyOtpChallenge(store, { email: EMAIL, phone: PHONE, code: wrongCode(code) }),
      ).rejects.toBeInstanceOf(ConcurrencyConflictError);
      expect(lost).toHaveBeenCalledTimes(5);
    });
  });
});
