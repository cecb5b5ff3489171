// src/modules/register/routes.ts
// ============================================================================
// Fastify-Routen für Registrierung
// ----------------------------------------------------------------------------
// - POST /auth/register     → Challenge + Code per E-Mail und SMS
// - POST /auth/verify-otp   → Code prüfen, User + Session anlegen (201)
// - POST /auth/resend-otp   → neuen Code anfordern (Cooldown)
// - GET  /auth/register/health
//
// Sicherheit / Datenschutz:
// - Strikte Eingabevalidierung mit Zod
// - Duplikate liefern eine generische Antwort (REGISTER_NOT_POSSIBLE, ohne Feld)
// - Logs/Events nur mit gehashter E-Mail
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { auditEvent } from "../../libs/audit.js";
import { sendApiError } from "../../libs/error-response.js";
import { AuthServiceError, DuplicateRegistrationError } from "../../libs/errors.js";
import { deviceMetaFrom } from "../../libs/http.js";
import { sendModuleHealth } from "../../libs/module-health.js";
import { EmailSchema, LocaleSchema, PhoneSchema } from "../../libs/normalize.js";
import { hashEmailForLog } from "../../libs/pii.js";
import { completeRegistration, resendRegistration, startRegistration } from "./service.js";

// ---------------------------------------------------------------------------
// Zod-Schemas
// ---------------------------------------------------------------------------

const RegisterBodySchema = z.object({
  email: EmailSchema,
  phone: PhoneSchema,
  name: z.string().trim().min(1, "Name ist Pflicht.").max(120),
  locale: LocaleSchema.optional(),
  // Wird akzeptiert und ignoriert (passwortloser Flow)
  password: z.string().max(256).optional(),
});

const VerifyOtpBodySchema = z.object({
  email: EmailSchema,
  phone: PhoneSchema,
  otp_code: z.string().trim().regex(/^\d{6}$/, "Code muss 6 Ziffern haben."),
});

const ResendOtpBodySchema = z.object({
  email: EmailSchema,
  phone: PhoneSchema,
});

type RegisterBody = z.infer<typeof RegisterBodySchema>;
type VerifyOtpBody = z.infer<typeof VerifyOtpBodySchema>;
type ResendOtpBody = z.infer<typeof ResendOtpBodySchema>;

// ---------------------------------------------------------------------------
// Routen-Plugin
// ---------------------------------------------------------------------------
//
//   await app.register(registerRoutes, { prefix: "/auth" });
// ---------------------------------------------------------------------------

export default async function registerRoutes(app: FastifyInstance) {
  // -------------------------------------------------------------------------
  // POST /auth/register
  // -------------------------------------------------------------------------
  app.post<{ Body: RegisterBody }>("/register", async (req, reply) => {
    const parsed = RegisterBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid registration payload.",
        parsed.error.flatten(),
      );
    }

    const { email, phone, name, locale } = parsed.data;
    let result: Awaited<ReturnType<typeof startRegistration>>;
    try {
      result = await startRegistration(app.deps, { email, phone, name, locale, ip: req.ip }, req.log);
    } catch (err) {
      if (err instanceof DuplicateRegistrationError) {
        req.log.info(
          { email_hash: hashEmailForLog(email), field: err.field },
          "registration_duplicate",
        );
      }
      throw err;
    }

    req.log.info(
      { email_hash: hashEmailForLog(email), channels: result.channels },
      "registration_started",
    );
    await auditEvent(app, {
      type: "registration_started",
      email_hash: hashEmailForLog(email),
    });

    return reply.code(200).send(result);
  });

  // -------------------------------------------------------------------------
  // POST /auth/verify-otp
  // -------------------------------------------------------------------------
  app.post<{ Body: VerifyOtpBody }>("/verify-otp", async (req, reply) => {
    const parsed = VerifyOtpBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid verification payload.",
        parsed.error.flatten(),
      );
    }

    const { email, phone, otp_code: code } = parsed.data;

    try {
      const result = await completeRegistration(
        app.deps,
        { email, phone, code },
        deviceMetaFrom(req),
        req.log,
      );

      await auditEvent(app, { type: "user_registered", sub: result.user.id });
      return reply.code(201).send(result);
    } catch (err) {
      if (err instanceof AuthServiceError) {
        req.log.warn(
          { email_hash: hashEmailForLog(email), code: err.code },
          "otp_verify_failed",
        );
      }
      throw err;
    }
  });

  // -------------------------------------------------------------------------
  // POST /auth/resend-otp
  // -------------------------------------------------------------------------
  app.post<{ Body: ResendOtpBody }>("/resend-otp", async (req, reply) => {
    const parsed = ResendOtpBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid resend payload.",
        parsed.error.flatten(),
      );
    }

    const result = await resendRegistration(
      app.deps,
      { ...parsed.data, ip: req.ip },
      req.log,
    );

    await auditEvent(app, {
      type: "otp_resent",
      email_hash: hashEmailForLog(parsed.data.email),
    });

    return reply.code(200).send(result);
  });

  // -------------------------------------------------------------------------
  // GET /auth/register/health
  // -------------------------------------------------------------------------
  app.get("/register/health", async (_req, reply) => sendModuleHealth(app, reply, "register"));
}
