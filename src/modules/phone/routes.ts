// src/modules/phone/routes.ts
// ============================================================================
// Telefon-Verifikation (nur mit Bearer)
// - POST /auth/phone/request   → Code per SMS an die angegebene Nummer
// - POST /auth/phone/confirm   → Code prüfen, Nummer am Profil setzen
// - GET  /auth/phone/cooldown  → Cooldown / aktiver Code
// - GET  /auth/phone/health    → Modul-Healthcheck
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { auditEvent } from "../../libs/audit.js";
import { sendApiError } from "../../libs/error-response.js";
import { AuthenticationError } from "../../libs/errors.js";
import { sendModuleHealth } from "../../libs/module-health.js";
import { PhoneSchema } from "../../libs/normalize.js";
import { hashPhoneForLog } from "../../libs/pii.js";
import { toPublicUser } from "../identity/types.js";
import {
  confirmPhoneVerification,
  getPhoneVerificationStatus,
  requestPhoneVerification,
} from "./service.js";

const RequestBodySchema = z.object({ phone: PhoneSchema }).strict();

const ConfirmBodySchema = z
  .object({
    code: z.string().trim().regex(/^\d{6}$/, "Code muss 6 Ziffern haben."),
  })
  .strict();

export default async function phoneRoutes(app: FastifyInstance) {
  app.post("/request", { config: { auth: true } }, async (req, reply) => {
    const parsed = RequestBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid phone payload.",
        parsed.error.flatten(),
      );
    }

    if (!req.user) throw new AuthenticationError("missing_auth_context");
    const result = await requestPhoneVerification(
      app.deps,
      { userId: req.user.sub, phone: parsed.data.phone },
      req.log,
    );

    req.log.info(
      { sub: req.user.sub, phone_hash: hashPhoneForLog(result.phone), channels: result.channels },
      "phone_verification_requested",
    );
    await auditEvent(app, {
      type: "phone_verification_requested",
      sub: req.user.sub,
      phone_hash: hashPhoneForLog(result.phone),
    });

    return reply.send(result);
  });

  app.post("/confirm", { config: { auth: true } }, async (req, reply) => {
    const parsed = ConfirmBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid verification payload.",
        parsed.error.flatten(),
      );
    }

    if (!req.user) throw new AuthenticationError("missing_auth_context");
    const user = await confirmPhoneVerification(app.deps.store, {
      userId: req.user.sub,
      code: parsed.data.code,
    });

    await auditEvent(app, {
      type: "phone_verified",
      sub: user.id,
      phone_hash: hashPhoneForLog(user.phone ?? ""),
    });

    return reply.send({ user: toPublicUser(user) });
  });

  app.get("/cooldown", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) throw new AuthenticationError("missing_auth_context");
    const status = await getPhoneVerificationStatus(app.deps.store, req.user.sub, app.deps.policy);
    return reply.send(status);
  });

  app.get("/health", async (_req, reply) => sendModuleHealth(app, reply, "phone"));
}
