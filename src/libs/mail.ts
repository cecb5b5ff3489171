// src/libs/mail.ts
// ============================================================================
// SMTP-Integration (nodemailer) als E-Mail-Kanal
// - Healthcheck via transporter.verify()
// ============================================================================

import nodemailer, { type Transporter } from "nodemailer";
import { env } from "./env.js";
import {
  renderSubject,
  renderText,
  type NotificationChannel,
  type NotificationMessage,
} from "./notify.js";

export function createMailTransport(): Transporter {
  return nodemailer.createTransport({
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_SECURE,
    auth:
      env.SMTP_USER && env.SMTP_PASS
        ? {
            user: env.SMTP_USER,
            pass: env.SMTP_PASS,
          }
        : undefined,
  });
}

export function createEmailChannel(
  transporter: Transporter,
  from: string = env.SMTP_FROM,
): NotificationChannel {
  return {
    name: "email",
    accepts: (message: NotificationMessage) =>
      message.type !== "phone_code" && message.email.length > 0,
    async send(message) {
      if (message.type === "phone_code") return;
      await transporter.sendMail({
        from,
        to: message.email,
        subject: renderSubject(message),
        text: renderText(message),
      });
    },
  };
}

// Health-Check für /health und /health/smtp
export async function mailHealth(transporter: Transporter): Promise<{
  ok: boolean;
  reason?: string;
}> {
  try {
    await transporter.verify();
    return { ok: true };
  } catch (err: unknown) {
    return {
      ok: false,
      reason: err instanceof Error ? err.message : "smtp_verify_failed",
    };
  }
}
