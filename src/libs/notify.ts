// src/libs/notify.ts
// ============================================================================
// Notification Dispatcher
// ----------------------------------------------------------------------------
// - Kanäle (E-Mail, SMS) hängen hinter NotificationChannel
// - Jeder Kanal läuft mit eigenem Timeout, unabhängig vom Request
// - dispatchNotification() wirft nie: Fehler landen als "failed" in der
//   Zusammenfassung, im Log und in den Metriken
// ============================================================================

import type { FastifyBaseLogger } from "fastify";
import { NotificationDispatchError } from "./errors.js";
import { recordNotificationDispatch } from "./metrics.js";

export type ChannelName = "email" | "sms";

export type NotificationMessage =
  | {
      type: "otp_code";
      email: string;
      phone: string;
      name: string;
      code: string;
      expiresInMinutes: number;
    }
  | {
      type: "magic_link";
      email: string;
      name: string;
      url: string;
      expiresInMinutes: number;
    }
  | {
      type: "phone_code";
      phone: string;
      name: string;
      code: string;
      expiresInMinutes: number;
    }
  | {
      type: "welcome";
      email: string;
      name: string;
    };

export interface NotificationChannel {
  readonly name: ChannelName;
  /** false → Kanal ist für diese Nachricht nicht zuständig oder nicht konfiguriert */
  accepts(message: NotificationMessage): boolean;
  send(message: NotificationMessage): Promise<void>;
}

export type ChannelStatus = "sent" | "failed" | "skipped";

export type ChannelResult = {
  channel: ChannelName;
  status: ChannelStatus;
  error?: string;
};

export type DispatchSummary = Partial<Record<ChannelName, ChannelStatus>>;

// ---------------------------------------------------------------------------
// Timeout
// ---------------------------------------------------------------------------

function withTimeout<T>(work: Promise<T>, ms: number, channel: ChannelName): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new NotificationDispatchError(channel, `timeout after ${ms}ms`)),
      ms,
    );
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export async function dispatchNotification(
  channels: readonly NotificationChannel[],
  message: NotificationMessage,
  opts: { timeoutMs: number; log: FastifyBaseLogger },
): Promise<ChannelResult[]> {
  return Promise.all(
    channels.map(async (channel): Promise<ChannelResult> => {
      if (!channel.accepts(message)) {
        return { channel: channel.name, status: "skipped" };
      }

      try {
        await withTimeout(channel.send(message), opts.timeoutMs, channel.name);
        recordNotificationDispatch(channel.name, message.type, "sent");
        return { channel: channel.name, status: "sent" };
      } catch (err) {
        const failure =
          err instanceof NotificationDispatchError
            ? err
            : new NotificationDispatchError(
                channel.name,
                err instanceof Error ? err.message : "send_failed",
              );
        opts.log.warn(
          { err: failure, channel: channel.name, type: message.type },
          "notification_channel_failed",
        );
        recordNotificationDispatch(channel.name, message.type, "failed");
        return { channel: channel.name, status: "failed", error: failure.message };
      }
    }),
  );
}

export function summarizeDispatch(results: readonly ChannelResult[]): DispatchSummary {
  const summary: DispatchSummary = {};
  for (const result of results) summary[result.channel] = result.status;
  return summary;
}

// ---------------------------------------------------------------------------
// Texte (Plaintext)
// ---------------------------------------------------------------------------

export function renderSubject(message: NotificationMessage): string {
  switch (message.type) {
    case "otp_code":
    case "phone_code":
      return "Your verification code";
    case "magic_link":
      return "Your sign-in link";
    case "welcome":
      return "Welcome";
  }
}

export function renderText(message: NotificationMessage): string {
  switch (message.type) {
    case "otp_code":
      return `Hello ${message.name}, your verification code is ${message.code}. It expires in ${message.expiresInMinutes} minutes.`;
    case "phone_code":
      return `Hello ${message.name}, your code to confirm this phone number is ${message.code}. It expires in ${message.expiresInMinutes} minutes.`;
    case "magic_link":
      return `Hello ${message.name}, sign in with this link: ${message.url}\nThe link expires in ${message.expiresInMinutes} minutes and can be used once.`;
    case "welcome":
      return `Hello ${message.name}, your account is ready.`;
  }
}
