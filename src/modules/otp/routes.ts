// src/modules/otp/routes.ts
// ============================================================================
// OTP-Routen
// - POST /auth/otp/status   → Status der offenen Challenge (ohne Code-Material)
// - GET  /auth/otp/health   → Modul-Healthcheck
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { sendApiError } from "../../libs/error-response.js";
import { sendModuleHealth } from "../../libs/module-health.js";
import { EmailSchema, PhoneSchema } from "../../libs/normalize.js";
import { getOtpStatus } from "./service.js";

const OtpStatusBody = z.object({
  email: EmailSchema,
  phone: PhoneSchema,
});

export default async function otpRoutes(app: FastifyInstance) {
  app.post("/status", async (req, reply) => {
    const parse = OtpStatusBody.safeParse(req.body);
    if (!parse.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid OTP status payload.",
        parse.error.flatten(),
      );
    }

    const status = await getOtpStatus(app.deps.store, parse.data, app.deps.policy);
    return reply.send(status);
  });

  app.get("/health", async (_req, reply) => sendModuleHealth(app, reply, "otp"));
}
