// src/libs/sms.ts
// ============================================================================
// SMS-Kanal (Twilio)
// - Ohne TWILIO_* meldet der Kanal "skipped" statt zu scheitern
// - Nur Codes (Registrierung, Telefon-Verifikation) gehen per SMS raus
// ============================================================================

import twilio from "twilio";
import { env } from "./env.js";
import { renderText, type NotificationChannel } from "./notify.js";

export type SmsSender = (to: string, body: string) => Promise<void>;

export function createTwilioSender(): SmsSender | undefined {
  const { TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, TWILIO_FROM_NUMBER } = env;
  if (!TWILIO_ACCOUNT_SID || !TWILIO_AUTH_TOKEN || !TWILIO_FROM_NUMBER) {
    return undefined;
  }

  const client = twilio(TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN);
  return async (to, body) => {
    await client.messages.create({ to, from: TWILIO_FROM_NUMBER, body });
  };
}

export function createSmsChannel(sender: SmsSender | undefined): NotificationChannel {
  return {
    name: "sms",
    accepts: (message) =>
      sender !== undefined && (message.type === "otp_code" || message.type === "phone_code"),
    async send(message) {
      if (!sender || (message.type !== "otp_code" && message.type !== "phone_code")) return;
      await sender(message.phone, renderText(message));
    },
  };
}
