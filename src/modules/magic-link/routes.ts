// src/modules/magic-link/routes.ts
// ============================================================================
// Magic-Link-Routen als Fastify-Plugin
// ----------------------------------------------------------------------------
// - POST /auth/request-magic-link   → Link anstoßen (immer 200)
// - POST /auth/verify-magic-link    → Token einlösen (Login)
// - GET  /auth/magic-link/health    → Modul-Healthcheck
//
// Sicherheit / Datenschutz:
// - Keine Aussage, ob eine E-Mail existiert (Request ist immer "ok")
// - Tokens werden nicht geloggt, nur Hash/Metadaten
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { auditEvent } from "../../libs/audit.js";
import { sendApiError } from "../../libs/error-response.js";
import { AuthServiceError } from "../../libs/errors.js";
import { deviceMetaFrom } from "../../libs/http.js";
import { sendModuleHealth } from "../../libs/module-health.js";
import { EmailSchema } from "../../libs/normalize.js";
import { hashEmailForLog } from "../../libs/pii.js";
import { toPublicUser } from "../identity/types.js";
import { createSession } from "../sessions/service.js";
import { requestMagicLink, sendMagicLinkInBackground, verifyMagicLink } from "./service.js";

// ---------------------------------------------------------------------------
// Zod-Schemas
// ---------------------------------------------------------------------------

const MagicLinkRequestBodySchema = z.object({
  email: EmailSchema,
});

const MagicLinkVerifyBodySchema = z.object({
  token: z.string().trim().min(1, "Token ist Pflicht.").max(512),
});

// ---------------------------------------------------------------------------
// Routen-Plugin
// ---------------------------------------------------------------------------
//
//   await app.register(magicLinkRoutes, { prefix: "/auth" });
// ---------------------------------------------------------------------------

export default async function magicLinkRoutes(app: FastifyInstance) {
  // -------------------------------------------------------------------------
  // POST /auth/request-magic-link
  // -------------------------------------------------------------------------
  app.post("/request-magic-link", async (req, reply) => {
    const parsed = MagicLinkRequestBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid magic-link request payload.",
        parsed.error.flatten(),
      );
    }

    const { email } = parsed.data;
    const { deps } = app;
    const result = await requestMagicLink(
      deps.store,
      { email, ...deviceMetaFrom(req) },
      deps.policy,
    );

    if (result) {
      // Antwortzeit darf nicht vom Mailversand abhängen
      void sendMagicLinkInBackground(deps.channels, result, {
        ttlSec: deps.policy.magicLinkTtlSec,
        timeoutMs: deps.policy.notifyTimeoutMs,
        log: req.log,
      });
    }

    await auditEvent(app, {
      type: "magic_link_requested",
      email_hash: hashEmailForLog(email),
      status: result ? "accepted" : "ignored",
    });

    // Generische Antwort – kein Leak, ob Adresse existiert
    return reply.code(200).send({ ok: true });
  });

  // -------------------------------------------------------------------------
  // POST /auth/verify-magic-link
  // -------------------------------------------------------------------------
  app.post("/verify-magic-link", async (req, reply) => {
    const parsed = MagicLinkVerifyBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid magic-link verify payload.",
        parsed.error.flatten(),
      );
    }

    try {
      const user = await verifyMagicLink(app.deps.store, parsed.data.token);
      const credentials = await createSession(
        app.deps.store,
        user,
        deviceMetaFrom(req),
        app.deps.policy,
      );

      await auditEvent(app, { type: "magic_link_consumed", sub: user.id });

      return reply.code(200).send({ ...credentials, user: toPublicUser(user) });
    } catch (err) {
      if (err instanceof AuthServiceError) {
        req.log.info({ code: err.code }, "magic_link_verify_failed");
      }
      throw err;
    }
  });

  // -------------------------------------------------------------------------
  // GET /auth/magic-link/health
  // -------------------------------------------------------------------------
  app.get("/magic-link/health", async (_req, reply) =>
    sendModuleHealth(app, reply, "magic-link"),
  );
}
