import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ExpiredError, InvalidMagicLinkTokenError } from "../../libs/errors.js";
import {
  buildMagicLinkUrl,
  issueMagicLink,
  requestMagicLink,
  verifyMagicLink,
} from "../../modules/magic-link/service.js";
import { MemoryCredentialStore } from "../support/memory-store.js";
import { TEST_POLICY } from "../support/test-app.js";

const T0 = new Date("2026-03-01T10:00:00.000Z");

describe("Magic-Link service", () => {
  let store: MemoryCredentialStore;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(T0);
    store = new MemoryCredentialStore();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("builds the verify url on the configured base", () => {
    expect(buildMagicLinkUrl("https://app.example.test/ignored", "abc-123")).toBe(
      "https://app.example.test/auth/verify-magic-link?token=abc-123",
    );
  });

  it("issues a link for an active user and stores only the hash", async () => {
    const user = store.seedUser({ email: "ml@x.com" });

    const result = await requestMagicLink(
      store,
      { email: " ML@x.com", ip: "10.0.0.1" },
      TEST_POLICY,
    );

    expect(result?.user.id).toBe(user.id);
    const issued = result?.issued;
    expect(issued?.link.token_hash).not.toBe(issued?.token);
    expect(issued?.link.expires_at.toISOString()).toBe("2026-03-01T10:15:00.000Z");
    expect(issued?.link.ip).toBe("10.0.0.1");
    expect(issued?.url).toBe(`http://localhost:3000/auth/verify-magic-link?token=${issued?.token}`);
  });

  it("is a silent no-op for unknown and inactive users", async () => {
    store.seedUser({ email: "off@x.com", is_active: false });

    await expect(requestMagicLink(store, { email: "nobody@x.com" }, TEST_POLICY)).resolves.toBeNull();
    await expect(requestMagicLink(store, { email: "off@x.com" }, TEST_POLICY)).resolves.toBeNull();
    expect(store.magicLinks.size).toBe(0);
  });

  it("verifies once and rejects the second use", async () => {
    const user = store.seedUser({ email: "ml@x.com" });
    const { token } = await issueMagicLink(store, user, {}, TEST_POLICY);

    await expect(verifyMagicLink(store, token)).resolves.toMatchObject({ id: user.id });
    await expect(verifyMagicLink(store, token)).rejects.toBeInstanceOf(InvalidMagicLinkTokenError);
  });

  it("reports expiry after the ttl", async () => {
    const user = store.seedUser({ email: "ml@x.com" });
    const { token, link } = await issueMagicLink(store, user, {}, TEST_POLICY);

    vi.setSystemTime(new Date(T0.getTime() + 16 * 60_000));

    await expect(verifyMagicLink(store, token)).rejects.toBeInstanceOf(ExpiredError);
    expect(store.magicLinks.get(link.id)?.consumed_at).toBeNull();
  });

  it("accepts the link at the exact expiry instant", async () => {
    const user = store.seedUser({ email: "ml@x.com" });
    const { token } = await issueMagicLink(store, user, {}, TEST_POLICY);

    vi.setSystemTime(new Date(T0.getTime() + 15 * 60_000));

    await expect(verifyMagicLink(store, token)).resolves.toMatchObject({ id: user.id });
  });

  it("rejects unknown and empty tokens alike", async () => {
    await expect(verifyMagicLink(store, "not-a-token")).rejects.toBeInstanceOf(
      InvalidMagicLinkTokenError,
    );
    await expect(verifyMagicLink(store, "   ")).rejects.toBeInstanceOf(InvalidMagicLinkTokenError);
  });

  it("keeps earlier links valid unless supersede is enabled", async () => {
    const user = store.seedUser({ email: "ml@x.com" });

    const first = await issueMagicLink(store, user, {}, TEST_POLICY);
    await issueMagicLink(store, user, {}, TEST_POLICY);
    await expect(verifyMagicLink(store, first.token)).resolves.toMatchObject({ id: user.id });

    const policy = { ...TEST_POLICY, magicLinkSupersede: true };
    const older = await issueMagicLink(store, user, {}, policy);
    const newer = await issueMagicLink(store, user, {}, policy);

    await expect(verifyMagicLink(store, older.token)).rejects.toBeInstanceOf(
      InvalidMagicLinkTokenError,
    );
    await expect(verifyMagicLink(store, newer.token)).resolves.toMatchObject({ id: user.id });
  });

  it("refuses a link whose user was deactivated", async () => {
    const user = store.seedUser({ email: "ml@x.com" });
    const { token } = await issueMagicLink(store, user, {}, TEST_POLICY);
    const row = store.users.get(user.id);
    if (row) row.is_active = false;

    await expect(verifyMagicLink(store, token)).rejects.toBeInstanceOf(InvalidMagicLinkTokenError);
  });

  it("lets exactly one of two parallel verifications win", async () => {
    const user = store.seedUser({ email: "ml@x.com" });
    const { token } = await issueMagicLink(store, user, {}, TEST_POLICY);

    const results = await Promise.allSettled([
      verifyMagicLink(store, token),
      verifyMagicLink(store, token),
    ]);

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
  });
});
