// src/modules/sessions/routes.ts
// ============================================================================
// Session-Routen als Fastify-Plugin
// ----------------------------------------------------------------------------
// Prefix /auth:
// - POST /auth/refresh            → Refresh-Rotation
// - POST /auth/logout             → aktuelle Session widerrufen
// - GET  /auth/sessions           → eigene Sessions listen
// - POST /auth/sessions/revoke    → eigene Session widerrufen
// - GET  /auth/sessions/health    → Modul-Healthcheck
//
// Sicherheit:
// - Kein Zugriff auf Sessions anderer User (user_id-Prüfung im Service)
// - Kein Token-Material in Listen
// ============================================================================

import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";

import { auditEvent } from "../../libs/audit.js";
import { sendApiError } from "../../libs/error-response.js";
import { AuthenticationError } from "../../libs/errors.js";
import type { AccessTokenPayload } from "../../libs/jwt.js";
import { sendModuleHealth } from "../../libs/module-health.js";
import { listSessions, refreshSession, revokeOwnSession, revokeSession } from "./service.js";

// ---------------------------------------------------------------------------
// Zod-Schemas
// ---------------------------------------------------------------------------

const RefreshBodySchema = z.object({
  refresh_token: z.string().trim().min(1, "refresh_token ist Pflicht.").max(512),
});

// GET /auth/sessions?limit=...
const SessionsListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

// POST /auth/sessions/revoke
const SessionRevokeBodySchema = z.object({
  session_id: z.string().uuid("session_id muss eine UUID sein."),
});

function authedUser(req: FastifyRequest): AccessTokenPayload {
  // auth.ts setzt req.user für alle config.auth-Routen
  if (!req.user) throw new AuthenticationError("missing_auth_context");
  return req.user;
}

// ---------------------------------------------------------------------------
// Routen-Plugin
// ---------------------------------------------------------------------------
//
//   await app.register(sessionsRoutes, { prefix: "/auth" });
// ---------------------------------------------------------------------------

export default async function sessionsRoutes(app: FastifyInstance) {
  // -------------------------------------------------------------------------
  // POST /auth/refresh
  // -------------------------------------------------------------------------
  app.post("/refresh", async (req, reply) => {
    const parsed = RefreshBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid refresh payload.",
        parsed.error.flatten(),
      );
    }

    try {
      const credentials = await refreshSession(
        app.deps.store,
        app.deps.cache,
        parsed.data.refresh_token,
        app.deps.policy,
      );
      return reply.send(credentials);
    } catch (err) {
      if (err instanceof AuthenticationError) {
        req.log.warn({ reason: err.reason }, "refresh_failed");
        if (err.reason === "refresh_reuse") {
          await auditEvent(app, { type: "refresh_reuse_detected" });
        }
      }
      throw err;
    }
  });

  // -------------------------------------------------------------------------
  // POST /auth/logout
  // -------------------------------------------------------------------------
  app.post(
    "/logout",
    { config: { auth: true, strictSession: true } },
    async (req, reply) => {
      const user = authedUser(req);
      await revokeSession(app.deps.store, app.deps.cache, user.sid, "logout", app.deps.policy);
      await auditEvent(app, { type: "logout", sub: user.sub });
      return reply.send({ ok: true });
    },
  );

  // -------------------------------------------------------------------------
  // GET /auth/sessions
  // -------------------------------------------------------------------------
  app.get(
    "/sessions",
    { config: { auth: true, strictSession: true } },
    async (req, reply) => {
      const parsed = SessionsListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendApiError(
          reply,
          400,
          "VALIDATION_FAILED",
          "Invalid query parameters.",
          parsed.error.flatten(),
        );
      }

      const user = authedUser(req);
      const sessions = await listSessions(app.deps.store, {
        userId: user.sub,
        currentSessionId: user.sid,
        limit: parsed.data.limit,
      });

      return reply.send({ sessions });
    },
  );

  // -------------------------------------------------------------------------
  // POST /auth/sessions/revoke
  // -------------------------------------------------------------------------
  app.post(
    "/sessions/revoke",
    { config: { auth: true, strictSession: true } },
    async (req, reply) => {
      const parsed = SessionRevokeBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return sendApiError(
          reply,
          400,
          "VALIDATION_FAILED",
          "Invalid session revoke payload.",
          parsed.error.flatten(),
        );
      }

      const user = authedUser(req);
      const result = await revokeOwnSession(
        app.deps.store,
        app.deps.cache,
        { userId: user.sub, sessionId: parsed.data.session_id },
        app.deps.policy,
      );

      return reply.code(200).send(result);
    },
  );

  // -------------------------------------------------------------------------
  // GET /auth/sessions/health
  // -------------------------------------------------------------------------
  app.get("/sessions/health", async (_req, reply) => sendModuleHealth(app, reply, "sessions"));
}
