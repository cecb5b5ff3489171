// src/plugins/rate-limit.ts
import fp from "fastify-plugin";
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import { env } from "../libs/env.js";
import { apiError } from "../libs/error-response.js";

const SENSITIVE_ROUTES = new Set<string>([
  "/auth/register",
  "/auth/verify-otp",
  "/auth/resend-otp",
  "/auth/otp/status",
  "/auth/request-magic-link",
  "/auth/verify-magic-link",
  "/auth/refresh",
  "/auth/phone/request",
  "/auth/phone/confirm",
]);

// Health-Routen zuverlässig ausnehmen (ohne Query-String)
const SKIP = new Set<string>([
  "/",
  "/health",
  "/health/live",
  "/health/ready",
  "/health/redis",
  "/health/db",
  "/health/smtp",
  "/metrics",
  "/openapi.json",
]);

/** In onRequest ist die Route noch nicht "resolved": rohe URL ohne Query. */
function getStablePath(req: FastifyRequest): string {
  const raw = (req.raw.url ?? req.url).split("?")[0];
  return raw.replace(/\/{2,}/g, "/");
}

const rateLimitPlugin: FastifyPluginAsync = async (app) => {
  const window = env.RATE_LIMIT_WINDOW;

  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    const route = getStablePath(request);
    if (SKIP.has(route)) return;
    const maxForRoute = SENSITIVE_ROUTES.has(route) ? env.RATE_LIMIT_AUTH_MAX : env.RATE_LIMIT_MAX;

    let count = 0, ttl = 0, blocked = false;

    try {
      const res = await app.deps.cache.incrLimit(route, request.ip, window, maxForRoute);
      count   = res.count;
      ttl     = res.ttl;
      blocked = res.blocked;
    } catch (err) {
      // Fail-Open: bei Redis-Fehler nicht blockieren
      request.log.warn({ err }, "rate_limit_store_error");
      count = 1; ttl = window; blocked = false;
    }

    request.rate = { count, ttl, blocked, max: maxForRoute };

    if (blocked) {
      reply
        .header("RateLimit-Limit", String(maxForRoute))
        .header("RateLimit-Remaining", "0")
        .header("RateLimit-Reset", String(Math.max(1, ttl)))
        .header("Retry-After", String(Math.max(1, ttl)));

      return reply.status(429).send({
        ...apiError(429, "RATE_LIMITED", "Too many requests."),
        reset_in_seconds: ttl,
      });
    }
  });

  // Header immer setzen (auch wenn nicht geblockt)
  app.addHook("onSend", async (request, reply, payload) => {
    if (request.rate) {
      const { count, ttl, max } = request.rate;
      const remaining = Math.max(0, max - count);

      reply
        .header("RateLimit-Limit", String(max))
        .header("RateLimit-Remaining", String(remaining))
        .header("RateLimit-Reset", String(Math.max(0, ttl)));
    }
    return payload;
  });
};

export default fp(rateLimitPlugin, { name: "rate-limit" });
