// src/tests/http/sessions.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AUTH_EVENTS_STREAM } from "../../libs/audit.js";
import type { UserRow } from "../../modules/identity/types.js";
import { revokeSession } from "../../modules/sessions/service.js";
import { bearer, buildTestApp, loginAs, type TestContext } from "../support/test-app.js";

describe("Session routes", () => {
  let ctx: TestContext;
  let user: UserRow;

  beforeEach(async () => {
    ctx = await buildTestApp();
    user = ctx.store.seedUser({ email: "sess@example.test" });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await ctx.app.close();
  });

  it("lists own sessions without token material", async () => {
    const current = await loginAs(ctx, user);
    await loginAs(ctx, user);

    const res = await ctx.app.inject({
      method: "GET",
      url: "/auth/sessions?limit=10",
      headers: bearer(current),
    });

    expect(res.statusCode).toBe(200);
    const { sessions } = res.json();
    expect(sessions).toHaveLength(2);
    expect(sessions.filter((s: { current: boolean }) => s.current)).toHaveLength(1);
    expect(JSON.stringify(sessions)).not.toContain("refresh");
  });

  it("rejects an invalid limit", async () => {
    const current = await loginAs(ctx, user);

    const res = await ctx.app.inject({
      method: "GET",
      url: "/auth/sessions?limit=0",
      headers: bearer(current),
    });

    expect(res.statusCode).toBe(400);
  });

  it("revokes another own session and cuts off its access token", async () => {
    const current = await loginAs(ctx, user);
    const other = await loginAs(ctx, user);

    const res = await ctx.app.inject({
      method: "POST",
      url: "/auth/sessions/revoke",
      headers: bearer(current),
      payload: { session_id: other.session_id },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ revoked: true });

    const me = await ctx.app.inject({ method: "GET", url: "/auth/me", headers: bearer(other) });
    expect(me.statusCode).toBe(401);

    const stillMe = await ctx.app.inject({
      method: "GET",
      url: "/auth/me",
      headers: bearer(current),
    });
    expect(stillMe.statusCode).toBe(200);
  });

  it("keeps a revoked access token out for the whole clock skew window", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    const start = new Date("2026-03-01T10:00:00Z");
    vi.setSystemTime(start);

    const instance = ctx.store.seedInstance({ name: "Skew" });
    ctx.store.seedMembership(instance.id, user.id, "staff");
    const credentials = await loginAs(ctx, user);
    await revokeSession(ctx.store, ctx.cache, credentials.session_id, "logout", ctx.deps.policy);

    const request = () =>
      ctx.app.inject({
        method: "GET",
        url: "/auth/tenants/current",
        headers: { ...bearer(credentials), "x-tenant-id": instance.id },
      });

    expect((await request()).statusCode).toBe(401);

    // exp (900 s) + 30 s: Token liegt noch in der Skew-Toleranz von 60 s
    vi.setSystemTime(new Date(start.getTime() + 930_000));
    expect((await request()).statusCode).toBe(401);
  });

  it("answers 404 for sessions of other users", async () => {
    const current = await loginAs(ctx, user);
    const stranger = ctx.store.seedUser({ email: "stranger@example.test" });
    const foreign = await loginAs(ctx, stranger);

    const res = await ctx.app.inject({
      method: "POST",
      url: "/auth/sessions/revoke",
      headers: bearer(current),
      payload: { session_id: foreign.session_id },
    });

    expect(res.statusCode).toBe(404);
    expect(ctx.store.sessions.get(foreign.session_id)?.revoked_at).toBeNull();
  });

  it("refuses strict-session routes once the session record is revoked", async () => {
    const current = await loginAs(ctx, user);
    await ctx.store.revokeSessionRecord(current.session_id, "admin", new Date());

    const res = await ctx.app.inject({
      method: "GET",
      url: "/auth/sessions",
      headers: bearer(current),
    });

    expect(res.statusCode).toBe(401);
  });

  it("detects refresh token reuse and revokes the session", async () => {
    const first = await loginAs(ctx, user);

    const rotated = await ctx.app.inject({
      method: "POST",
      url: "/auth/refresh",
      payload: { refresh_token: first.refresh_token },
    });
    expect(rotated.statusCode).toBe(200);

    const replay = await ctx.app.inject({
      method: "POST",
      url: "/auth/refresh",
      payload: { refresh_token: first.refresh_token },
    });
    expect(replay.statusCode).toBe(401);

    const next = await ctx.app.inject({
      method: "POST",
      url: "/auth/refresh",
      payload: { refresh_token: rotated.json().refresh_token },
    });
    expect(next.statusCode).toBe(401);

    expect(ctx.store.sessions.get(first.session_id)?.revoke_reason).toBe("refresh_reuse");
    expect(ctx.cache.events(AUTH_EVENTS_STREAM).map((e) => e.type)).toEqual([
      "refresh_reuse_detected",
    ]);
  });

  it("validates the refresh payload", async () => {
    const res = await ctx.app.inject({ method: "POST", url: "/auth/refresh", payload: {} });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe("VALIDATION_FAILED");
  });
});
