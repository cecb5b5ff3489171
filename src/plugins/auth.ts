// src/plugins/auth.ts
// ============================================================================
// Auth-Plugin (Fastify)
// ----------------------------------------------------------------------------
// Für Routes mit config.auth === true oder config.tenant === true:
// - Bearer Token extrahieren + verifizieren (jwt.ts)
// - sid gegen die Session-Denylist prüfen (sofortige Revocation)
// - config.strictSession: zusätzlich den Session-Datensatz laden
// - req.user setzen
//
// Nicht in diesem Plugin:
// - Tenant Header / Membership (tenant-context.ts, tenant-guard.ts)
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync, FastifyRequest } from "fastify";
import { sendDomainError } from "../libs/error-response.js";
import { AuthenticationError } from "../libs/errors.js";
import { isHealthPath } from "../libs/http.js";
import { verifyAccessToken, type AccessTokenPayload } from "../libs/jwt.js";
import { assertSessionActive } from "../modules/sessions/service.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function routeNeedsAuth(req: FastifyRequest): boolean {
  const cfg = req.routeOptions.config;
  return cfg.auth === true || cfg.tenant === true;
}

function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) return null;

  // toleriert: "Bearer <token>", "bearer <token>", extra spaces
  const m = authHeader.match(/^\s*Bearer\s+(.+)\s*$/i);
  const token = m?.[1]?.trim();
  return token && token.length > 0 ? token : null;
}

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

const authPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("preHandler", async (req, reply) => {
    if (isHealthPath(req)) return;
    if (!routeNeedsAuth(req)) return;

    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      return sendDomainError(reply, new AuthenticationError("missing_token"));
    }

    let payload: AccessTokenPayload;
    try {
      payload = await verifyAccessToken(token);
    } catch (err) {
      // Keine internen Details nach außen
      req.log.debug({ err }, "access_token_rejected");
      return sendDomainError(reply, new AuthenticationError("invalid_token"));
    }

    if (await app.deps.cache.isSessionDenied(payload.sid)) {
      return sendDomainError(reply, new AuthenticationError("session_revoked"));
    }

    if (req.routeOptions.config.strictSession === true) {
      try {
        await assertSessionActive(app.deps.store, payload.sid, payload.sub);
      } catch (err) {
        if (err instanceof AuthenticationError) return sendDomainError(reply, err);
        throw err;
      }
    }

    req.user = payload;
  });
};

export default fp(authPlugin, { name: "auth" });
