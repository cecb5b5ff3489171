// src/tests/support/recording-channel.ts
// ============================================================================
// NotificationChannel-Fake: zeichnet Nachrichten auf, kann fehlschlagen oder
// hängen (Timeout-Tests)
// ============================================================================

import type {
  ChannelName,
  NotificationChannel,
  NotificationMessage,
} from "../../libs/notify.js";

export type ChannelMode = "ok" | "fail" | "hang";

export class RecordingChannel implements NotificationChannel {
  readonly sent: NotificationMessage[] = [];
  mode: ChannelMode = "ok";
  private gate: Promise<void> | undefined;

  constructor(
    readonly name: ChannelName,
    private readonly types: readonly NotificationMessage["type"][] = [
      "otp_code",
      "magic_link",
      "welcome",
    ],
  ) {}

  accepts(message: NotificationMessage): boolean {
    return this.types.includes(message.type);
  }

  async send(message: NotificationMessage): Promise<void> {
    if (this.mode === "fail") throw new Error(`${this.name}_down`);
    if (this.mode === "hang") {
      await new Promise<void>(() => undefined);
    }
    if (this.gate) await this.gate;
    this.sent.push(message);
  }

  /** Hält Sends an, bis die zurückgegebene Funktion aufgerufen wird */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = () => {
        this.gate = undefined;
        resolve();
      };
    });
    return release;
  }

  /** Letzter OTP-Code, der über diesen Kanal ging */
  lastCode(): string | undefined {
    for (let i = this.sent.length - 1; i >= 0; i--) {
      const message = this.sent[i];
      if (message?.type === "otp_code" || message?.type === "phone_code") return message.code;
    }
    return undefined;
  }

  lastMagicLinkToken(): string | undefined {
    for (let i = this.sent.length - 1; i >= 0; i--) {
      const message = this.sent[i];
      if (message?.type === "magic_link") {
        return new URL(message.url).searchParams.get("token") ?? undefined;
      }
    }
    return undefined;
  }
}
