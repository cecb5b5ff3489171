// ============================================================================
// src/libs/redis.ts
// ----------------------------------------------------------------------------
// Redis-Integration (ioredis v5) hinter dem AuthCache-Interface
// - Rate-Limit-Counter
// - Session-Denylist (sofortige Wirkung von Revocation auf Access-Tokens)
// - Audit-Stream (auth-events)
// - Tests nutzen MemoryCache (src/tests/support) statt Redis
// ============================================================================

import { Redis } from "ioredis";
import { createHash } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";

const SERVICE_NS = "auth";
const KEY_PART_RE = /^[a-z0-9:_-]{1,128}$/;

export type RateLimitResult = { count: number; ttl: number; blocked: boolean };

export type CacheHealth = { ok: boolean; mode?: string; error?: string };

export interface AuthCache {
  incrLimit(routeId: string, ip: string, windowSec: number, max: number): Promise<RateLimitResult>;
  denySession(sessionId: string, ttlSec: number): Promise<void>;
  isSessionDenied(sessionId: string): Promise<boolean>;
  streamAdd(stream: string, fields: Record<string, string | number>): Promise<void>;
  connect(): Promise<void>;
  health(): Promise<CacheHealth>;
  quit(): Promise<void>;
}

// -----------------------------
// Key-Helper
// -----------------------------
function hashKeyPart(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

export function normalizedKeyPart(input: string): string {
  const value = input.trim().toLowerCase();
  if (KEY_PART_RE.test(value)) return value;
  return hashKeyPart(input);
}

export function cacheKey(namespace: string, ...parts: (string | number)[]): string {
  return [namespace, SERVICE_NS, ...parts].join(":");
}

// -----------------------------
// Redis-Implementierung
// -----------------------------
export function createRedisCache(opts: {
  url: string;
  namespace: string;
  log?: FastifyBaseLogger;
}): AuthCache {
  const redis = new Redis(opts.url, {
    lazyConnect: true,
    enableReadyCheck: true,
    enableAutoPipelining: true,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => Math.min(1000 * times, 10_000),
  });

  const key = (...parts: (string | number)[]) => cacheKey(opts.namespace, ...parts);

  redis.on("ready", () => opts.log?.info("redis_ready"));
  redis.on("error", (err) => opts.log?.error({ err }, "redis_error"));
  redis.on("end", () => opts.log?.info("redis_end"));

  return {
    async incrLimit(routeId, ip, windowSec, max) {
      const rateKey = key("rate", normalizedKeyPart(routeId), normalizedKeyPart(ip));
      const count = await redis.incr(rateKey);
      if (count === 1) await redis.expire(rateKey, windowSec);
      const ttl = await redis.ttl(rateKey);
      return { count, ttl, blocked: count > max };
    },

    async denySession(sessionId, ttlSec) {
      await redis.set(key("deny", "session", sessionId), "1", "EX", Math.max(1, ttlSec));
    },

    async isSessionDenied(sessionId) {
      return (await redis.exists(key("deny", "session", sessionId))) === 1;
    },

    async streamAdd(stream, fields) {
      const flat: string[] = [];
      for (const [k, v] of Object.entries(fields)) flat.push(k, String(v));
      await redis.xadd(key("stream", stream), "*", ...flat);
    },

    async connect() {
      if (redis.status === "wait" || redis.status === "end") {
        await redis.connect();
      }
      await redis.ping();
    },

    async health() {
      try {
        const pong = await redis.ping();
        return { ok: pong === "PONG", mode: redis.status };
      } catch (err) {
        return {
          ok: false,
          mode: redis.status,
          error: err instanceof Error ? err.message : "redis_ping_failed",
        };
      }
    },

    async quit() {
      try {
        await redis.quit();
      } catch (err) {
        opts.log?.warn({ err }, "redis_quit_failed");
        redis.disconnect();
      }
    },
  };
}
