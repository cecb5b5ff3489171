// src/app.ts
// ============================================================================
// Tenant-Auth-Service (Fastify)
// ----------------------------------------------------------------------------
// Verantwortlichkeiten:
//  - Zentrales Fastify-Setup (Logger, Timeouts, CORS, Rate-Limit)
//  - Abhängigkeiten (Store, Cache, Kanäle) als app.deps; Tests injizieren Fakes
//  - /health, /health/* , /metrics, /openapi.json
//  - Registrierung aller Auth-Module mit Auth-/Tenant-Kette
//  - Fehler-Übersetzung (AuthServiceError → Envelope, Store down → 503)
//  - Graceful Shutdown (Cache + Store via onClose)
// ============================================================================

import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
  type FastifyServerOptions,
} from "fastify";
import cors from "@fastify/cors";
import { randomUUID } from "node:crypto";

import rateLimitPlugin from "./plugins/rate-limit.js";

// Reihenfolge / Auth-Chain
import authPlugin from "./plugins/auth.js";
import tenantContextPlugin from "./plugins/tenant-context.js";
import tenantGuardPlugin from "./plugins/tenant-guard.js";
import authorizationPlugin from "./plugins/authorization.js";

import { createDefaultDeps, type AppDeps } from "./libs/deps.js";
import { env } from "./libs/env.js";
import { apiError, sendApiError, sendDomainError } from "./libs/error-response.js";
import { isStoreUnavailable, mapDbError } from "./libs/error-map.js";
import { AuthServiceError } from "./libs/errors.js";
import { getRouteId } from "./libs/http.js";
import { recordHttpRequest, renderPrometheusMetrics } from "./libs/metrics.js";

// Auth-Module (Routen-Plugins)
import identityRoutes from "./modules/identity/routes.js";
import registerRoutes from "./modules/register/routes.js";
import magicLinkRoutes from "./modules/magic-link/routes.js";
import otpRoutes from "./modules/otp/routes.js";
import phoneRoutes from "./modules/phone/routes.js";
import sessionsRoutes from "./modules/sessions/routes.js";
import tenantsRoutes from "./modules/tenants/routes.js";

// ---------------------------------------------------------------------------
// Readiness-Flag (von server.ts über setReady() manipulierbar)
// ---------------------------------------------------------------------------

let isReady = false;

export function setReady(ready: boolean) {
  isReady = ready;
}

// Optionale Start-Parameter für Tests / spezielle Umgebungen
export type AppOptions = FastifyServerOptions & {
  deps?: AppDeps;
  enableCors?: boolean;
};

// ---------------------------------------------------------------------------
// Hilfsfunktion: Auth-Module registrieren (Auth → Tenant → Guard → Rollen)
// ---------------------------------------------------------------------------

async function registerAuthModules(app: FastifyInstance) {
  await app.register(async (instance) => {
    // Kette (wichtig, preHandler in Registrierungsreihenfolge):
    // 1) Auth (Bearer → request.user, Denylist, strictSession)
    instance.register(authPlugin);

    // 2) Tenant aus Header (x-tenant-id), nur Intake
    instance.register(tenantContextPlugin);

    // 3) Guard: Membership + Instanz-Status → request.tenant / tenantScope
    instance.register(tenantGuardPlugin);

    // 4) Rollen (config.roles)
    instance.register(authorizationPlugin);

    // Danach erst Routes registrieren (damit Hooks greifen)

    // Profil (/auth/me)
    instance.register(identityRoutes, { prefix: "/auth" });

    // Registrierung + OTP-Verifikation
    instance.register(registerRoutes, { prefix: "/auth" });

    // OTP-Status
    instance.register(otpRoutes, { prefix: "/auth/otp" });

    // Telefon-Verifikation (angemeldet)
    instance.register(phoneRoutes, { prefix: "/auth/phone" });

    // Magic-Link Login
    instance.register(magicLinkRoutes, { prefix: "/auth" });

    // Refresh / Logout / Sessions-Übersicht
    instance.register(sessionsRoutes, { prefix: "/auth" });

    // Instanzen + Mitglieder
    instance.register(tenantsRoutes, { prefix: "/auth/tenants" });
  });
}

// ---------------------------------------------------------------------------
// Hilfsfunktion: Health- und Observability-Routen registrieren
// ---------------------------------------------------------------------------

type ServiceState = "ok" | "degraded" | "down" | "unknown";

async function registerHealthRoutes(app: FastifyInstance) {
  const { deps } = app;

  const smtpHealth = async (): Promise<{ ok: boolean; reason?: string }> =>
    deps.mailHealth ? deps.mailHealth() : { ok: false, reason: "smtp_not_configured" };

  // Basis-Info / Root
  app.get("/", async () => ({
    ok: true,
    service: "tenant-auth-service",
    ts: Date.now(),
  }));

  // OpenAPI Contract (optional per config)
  app.get("/openapi.json", async (_req, reply) => {
    if (!env.OPENAPI_ENABLED) {
      return reply.code(404).send(apiError(404, "NOT_FOUND", "Not found."));
    }

    return reply.send({
      openapi: "3.0.3",
      info: {
        title: "Tenant Auth Service API",
        version: "1.0.0",
      },
      components: {
        schemas: {
          ErrorResponse: {
            type: "object",
            properties: {
              status: { type: "integer" },
              error: {
                type: "object",
                properties: {
                  code: { type: "string" },
                  message: { type: "string" },
                },
                required: ["code", "message"],
              },
              details: {},
            },
            required: ["status", "error"],
          },
        },
      },
      paths: {
        "/auth/register": { post: { summary: "Start registration, send OTP via email + SMS" } },
        "/auth/verify-otp": { post: { summary: "Verify OTP, create user + session" } },
        "/auth/resend-otp": { post: { summary: "Issue a new OTP after cooldown" } },
        "/auth/otp/status": { post: { summary: "Status of the pending OTP challenge" } },
        "/auth/phone/request": { post: { summary: "Send a code to confirm a phone number" } },
        "/auth/phone/confirm": { post: { summary: "Confirm the phone number with the code" } },
        "/auth/phone/cooldown": { get: { summary: "Resend cooldown for phone codes" } },
        "/auth/request-magic-link": { post: { summary: "Send a sign-in link" } },
        "/auth/verify-magic-link": { post: { summary: "Consume a sign-in link" } },
        "/auth/refresh": { post: { summary: "Rotate refresh token" } },
        "/auth/logout": { post: { summary: "Revoke current session" } },
        "/auth/me": {
          get: { summary: "Current profile" },
          patch: { summary: "Update name / locale" },
        },
        "/auth/sessions": { get: { summary: "List own sessions" } },
        "/auth/sessions/revoke": { post: { summary: "Revoke own session" } },
        "/auth/tenants": {
          get: { summary: "Instances of the caller" },
          post: { summary: "Create instance (caller becomes owner)" },
        },
        "/auth/tenants/current": { get: { summary: "Instance from X-Tenant-Id" } },
        "/auth/tenants/members": {
          get: { summary: "Members of the current instance" },
          post: { summary: "Add an existing user" },
        },
        "/auth/tenants/members/{userId}": { delete: { summary: "Remove a member" } },
        "/health/live": { get: { summary: "Liveness" } },
        "/health/ready": { get: { summary: "Readiness" } },
      },
    });
  });

  // Prometheus endpoint (optional per config)
  app.get("/metrics", async (_req, reply) => {
    if (!env.METRICS_ENABLED) {
      return reply.code(404).send(apiError(404, "NOT_FOUND", "Not found."));
    }
    reply.type("text/plain; version=0.0.4; charset=utf-8");
    return reply.send(renderPrometheusMetrics());
  });

  // Liveness-Check – lebt der Prozess?
  app.get("/health/live", async () => ({ status: "alive", pid: process.pid }));

  // Zentrales Health-Aggregat – Docker-Healthcheck hängt an /health
  app.get("/health", async (_req, reply) => {
    const services: Record<"redis" | "db" | "smtp", ServiceState> = {
      redis: "unknown",
      db: "unknown",
      smtp: "unknown",
    };

    let overall: "ok" | "degraded" | "down" = isReady ? "ok" : "degraded";

    const [redis, db, smtp] = await Promise.all([
      deps.cache.health(),
      deps.store.health(),
      smtpHealth(),
    ]);

    services.redis = redis.ok ? "ok" : "down";
    services.db = db.ok ? "ok" : "down";
    if (!redis.ok || !db.ok) overall = "down";

    // SMTP-Ausfall degradiert nur (SMS/Log bleiben)
    services.smtp = smtp.ok ? "ok" : "degraded";
    if (!smtp.ok && overall === "ok") overall = "degraded";

    return reply.code(overall === "down" ? 503 : 200).send({
      status: overall,
      env: env.NODE_ENV,
      ready: isReady,
      services,
      ts: new Date().toISOString(),
    });
  });

  // Readiness – für Loadbalancer/K8s
  app.get("/health/ready", async (_req, reply) => {
    if (!isReady) {
      return reply.code(503).send({ status: "starting", ready: false });
    }

    const [redis, db] = await Promise.all([deps.cache.health(), deps.store.health()]);
    if (!redis.ok || !db.ok) {
      return reply.code(503).send({ status: "degraded", redis, db, ready: false });
    }

    return reply.send({ status: "ready", ready: true });
  });

  // Detail-Endpoints
  app.get("/health/redis", async (_req, reply) => {
    const rh = await deps.cache.health();
    return reply.code(rh.ok ? 200 : 503).send({ status: rh.ok ? "ok" : "down", ...rh });
  });

  app.get("/health/db", async (_req, reply) => {
    const dh = await deps.store.health();
    return reply.code(dh.ok ? 200 : 503).send({ status: dh.ok ? "ok" : "down", ...dh });
  });

  app.get("/health/smtp", async (_req, reply) => {
    const sh = await smtpHealth();
    return reply.send({ status: sh.ok ? "ok" : "degraded", ...sh });
  });
}

// ---------------------------------------------------------------------------
// Fehler-Übersetzung
// ---------------------------------------------------------------------------

function handleError(err: FastifyError, req: FastifyRequest, reply: FastifyReply) {
  if (err instanceof AuthServiceError) {
    req.log.info({ code: err.code, status: err.statusCode }, "request_rejected");
    return sendDomainError(reply, err);
  }

  if (isStoreUnavailable(err)) {
    req.log.error({ err }, "store_unavailable");
    return sendApiError(reply, 503, "SERVICE_UNAVAILABLE", "Service temporarily unavailable.");
  }

  req.log.error({ err }, "unhandled_error");

  // pg-Fehler tragen einen SQLSTATE-Code, aber keinen statusCode
  if (!err.statusCode && typeof err.code === "string") {
    const mapped = mapDbError(err);
    if (mapped.code !== "INTERNAL") {
      return sendApiError(reply, mapped.status, mapped.code, mapped.message);
    }
  }

  const status = err.statusCode ?? (err.validation ? 400 : 500);
  const code =
    status === 400
      ? "VALIDATION_FAILED"
      : status === 404
        ? "NOT_FOUND"
        : status === 413
          ? "PAYLOAD_TOO_LARGE"
          : status === 415
            ? "UNSUPPORTED_MEDIA_TYPE"
            : "INTERNAL";
  const message = status >= 500 ? "Internal server error." : err.message || "Request failed.";

  return sendApiError(reply, status, code, message, err.validation);
}

// ---------------------------------------------------------------------------
// Haupt-Fabrikfunktion: baut eine Fastify-Instanz
// ---------------------------------------------------------------------------

export async function buildApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const {
    deps: injectedDeps,
    enableCors = true,
    logger = { level: env.LOG_LEVEL },
    ...rest
  } = opts;

  const app = Fastify({
    logger,
    trustProxy: env.TRUST_PROXY,
    requestIdHeader: env.REQUEST_ID_HEADER,
    requestIdLogLabel: "request_id",
    genReqId: () => randomUUID(),
    requestTimeout: 30_000,
    connectionTimeout: 10_000,
    keepAliveTimeout: 65_000,
    ...rest,
  });

  app.decorate("deps", injectedDeps ?? createDefaultDeps(app.log));

  // Error-/NotFound-Handler (vor den Routen, die ihn erben)
  app.setErrorHandler((err, req, reply) => handleError(err, req, reply));

  app.setNotFoundHandler((req, reply) => {
    reply
      .code(404)
      .send(apiError(404, "NOT_FOUND", `Route ${req.method}:${req.url} not found`));
  });

  app.addHook("onRequest", async (request, reply) => {
    request.requestStartedAtNs = process.hrtime.bigint();
    reply.header(env.REQUEST_ID_HEADER, request.id);
  });

  app.addHook("onSend", async (_request, reply, payload) => {
    // Baseline Security Headers for auth endpoints.
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("Referrer-Policy", "no-referrer");
    reply.header("X-Frame-Options", "DENY");
    reply.header("Cache-Control", "no-store");
    reply.header("Content-Security-Policy", "frame-ancestors 'none'");
    return payload;
  });

  app.addHook("onResponse", async (request, reply) => {
    const started = request.requestStartedAtNs;
    if (!started) return;

    const durationNs = process.hrtime.bigint() - started;
    const durationSeconds = Number(durationNs) / 1_000_000_000;
    recordHttpRequest(
      request.method,
      getRouteId(request),
      reply.statusCode,
      durationSeconds,
    );
  });

  // Basis-Plugins (CORS, Rate-Limit)
  const DEFAULT_CORS_ORIGINS = [
    "http://localhost:5173", // Vite dev
    "http://localhost:3000", // Docker lokal
  ];

  const corsAllowlist =
    env.CORS_ORIGIN === "*"
      ? DEFAULT_CORS_ORIGINS
      : env.CORS_ORIGIN
          .split(",")
          .map((o) => o.trim())
          .filter(Boolean);

  if (enableCors) {
    await app.register(cors, {
      origin: (origin: string | undefined, cb: (err: Error | null, ok: boolean) => void) => {
        if (!origin) return cb(null, true);
        return cb(null, corsAllowlist.includes(origin));
      },
      methods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
      credentials: true,
      maxAge: 86_400,
    });
  }

  await app.register(rateLimitPlugin);

  // Cache-Initialisierung (onReady-Hook)
  app.addHook("onReady", async () => {
    try {
      await app.deps.cache.connect();
      app.log.info("cache_connected");
    } catch (err) {
      app.log.error({ err }, "cache_connect_failed");
    }

    isReady = true;
    app.log.debug(app.printRoutes());
  });

  // Auth-Module (Auth → Tenant → Guard → Rollen)
  await registerAuthModules(app);

  // Health & Observability
  await registerHealthRoutes(app);

  // Graceful Shutdown Hooks (werden von server.ts via app.close() getriggert)
  app.addHook("onClose", async () => {
    try {
      await app.deps.cache.quit();
      app.log.info("cache_closed");
    } catch (err) {
      app.log.warn({ err }, "cache_shutdown_failed");
    }

    try {
      await app.deps.store.close();
      app.log.info("store_closed");
    } catch (err) {
      app.log.warn({ err }, "store_shutdown_failed");
    }
  });

  return app;
}
