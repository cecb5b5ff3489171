// src/libs/env.ts
// ============================================================================
// Zentrale Umgebungsvariablen-Verwaltung (Secrets-first) mit Zod
// ----------------------------------------------------------------------------
// - Keine .env-Abhängigkeit (kein dotenv)
// - Secrets bevorzugt aus *_FILE (Docker secrets) lesen
// - Fail-fast nur beim echten Service-Start (nicht bei Test-Imports)
// - Keine Secret-Werte loggen (nur [set]/[unset])
// - TTLs für Magic-Links, OTP und Sessions kommen ausschließlich von hier
// ============================================================================

import { readFileSync } from "node:fs";
import { z } from "zod";

// ----------------------------------------------------------------------------
// Helpers: Secrets lesen
// ----------------------------------------------------------------------------

/**
 * Liest ein Secret aus einer Datei (Docker secrets: /run/secrets/*).
 * Wirft, wenn die Datei nicht lesbar oder leer ist.
 */
function readSecretFile(filePath: string | undefined, label: string): string | undefined {
  if (!filePath) return undefined;

  let value: string;
  try {
    value = readFileSync(filePath, "utf8");
  } catch {
    throw new Error(`${label} nicht lesbar: ${filePath}`);
  }

  const trimmed = value.replace(/\r?\n+$/, "").trim();
  if (!trimmed) throw new Error(`${label} ist leer: ${filePath}`);

  return trimmed;
}

/** *_FILE wird bevorzugt gelesen, ENV ist Fallback. */
function resolveFromFileOrEnv(opts: {
  envValue?: string;
  filePath?: string;
  label: string;
}): string | undefined {
  const fromFile = readSecretFile(opts.filePath, opts.label);
  if (fromFile && fromFile.trim() !== "") return fromFile;
  if (opts.envValue && opts.envValue.trim() !== "") return opts.envValue;
  return undefined;
}

function mask(value: unknown): string {
  if (value === undefined || value === null || value === "") return "[unset]";
  return "[set]";
}

// "false"/"0" sollen wirklich false sein (z.coerce.boolean macht daraus true)
const booleanFlag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value) => {
      if (value === undefined || value === "") return fallback;
      if (typeof value === "boolean") return value;
      return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
    });

// ----------------------------------------------------------------------------
// Schema
// ----------------------------------------------------------------------------

const EnvSchema = z.object({
  // --------------------------------------------------------------------------
  // Laufzeit / Server
  // --------------------------------------------------------------------------
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.string().default("info"),

  // --------------------------------------------------------------------------
  // HTTP / Observability
  // --------------------------------------------------------------------------
  CORS_ORIGIN: z.string().default("*"),
  REQUEST_ID_HEADER: z.string().default("x-request-id"),
  TRUST_PROXY: booleanFlag(true),
  OPENAPI_ENABLED: booleanFlag(true),
  METRICS_ENABLED: booleanFlag(true),

  // --------------------------------------------------------------------------
  // Redis (REDIS_URL komplett oder granular)
  // --------------------------------------------------------------------------
  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: z.coerce.number().int().optional(),
  REDIS_USERNAME: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_NAMESPACE: z.string().default("tenant-auth"),

  // --------------------------------------------------------------------------
  // PostgreSQL (Credential Store)
  // --------------------------------------------------------------------------
  DATABASE_URL: z.string().optional(),

  // --------------------------------------------------------------------------
  // Rate Limit
  // --------------------------------------------------------------------------
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_AUTH_MAX: z.coerce.number().int().positive().default(10),

  // --------------------------------------------------------------------------
  // SMTP (E-Mail-Kanal)
  // --------------------------------------------------------------------------
  SMTP_HOST: z.string().default("localhost"),
  SMTP_PORT: z.coerce.number().int().default(1025),
  SMTP_SECURE: booleanFlag(false),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_FROM: z.string().default("Auth <no-reply@localhost>"),

  // --------------------------------------------------------------------------
  // SMS (Twilio) – ohne Credentials meldet der Kanal "skipped"
  // --------------------------------------------------------------------------
  TWILIO_ACCOUNT_SID: z.string().optional(),
  TWILIO_AUTH_TOKEN: z.string().optional(),
  TWILIO_FROM_NUMBER: z.string().optional(),

  // --------------------------------------------------------------------------
  // Benachrichtigungen
  // --------------------------------------------------------------------------
  APP_BASE_URL: z.string().url().default("http://localhost:3000"),
  NOTIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

  // --------------------------------------------------------------------------
  // JWT / Pepper (active/previous erlaubt Rotation ohne Downtime)
  // --------------------------------------------------------------------------
  JWT_SECRET_ACTIVE: z.string().optional(),
  JWT_SECRET_PREVIOUS: z.string().optional(),
  JWT_ACTIVE_KID: z.string().optional(),
  JWT_ISSUER: z.string().default("tenant-auth"),
  JWT_AUDIENCE: z.string().default("tenant-auth-client"),
  JWT_CLOCK_SKEW_SEC: z.coerce.number().int().min(0).max(300).default(60),
  TOKEN_PEPPER_ACTIVE: z.string().optional(),
  TOKEN_PEPPER_PREVIOUS: z.string().optional(),

  // --------------------------------------------------------------------------
  // Lebensdauern (Sekunden)
  // --------------------------------------------------------------------------
  SESSION_ACCESS_TTL_SEC: z.coerce.number().int().positive().default(900),
  SESSION_REFRESH_TTL_SEC: z.coerce.number().int().positive().default(60 * 60 * 24),
  SESSION_ABSOLUTE_TTL_SEC: z.coerce.number().int().positive().default(60 * 60 * 24 * 30),
  MAGIC_LINK_TTL_SEC: z.coerce.number().int().positive().default(60 * 15),
  MAGIC_LINK_SUPERSEDE: booleanFlag(false),
  OTP_TTL_SEC: z.coerce.number().int().positive().default(60 * 10),
  OTP_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  OTP_RESEND_COOLDOWN_SEC: z.coerce.number().int().min(0).default(60),
  PHONE_VERIFICATION_COOLDOWN_SEC: z.coerce.number().int().min(0).default(60 * 10),
  CREDENTIAL_RETENTION_SEC: z.coerce.number().int().min(0).default(60 * 60 * 24 * 7),

  STARTUP_VALIDATE_ENV: z.string().optional(),
});

// ----------------------------------------------------------------------------
// Secret-Resolution: *_FILE → konkrete Werte
// ----------------------------------------------------------------------------

const secretsFromFiles = {
  REDIS_PASSWORD: resolveFromFileOrEnv({
    envValue: process.env.REDIS_PASSWORD,
    filePath: process.env.REDIS_PASSWORD_FILE,
    label: "REDIS_PASSWORD_FILE",
  }),
  DATABASE_URL: resolveFromFileOrEnv({
    envValue: process.env.DATABASE_URL,
    filePath: process.env.DATABASE_URL_FILE,
    label: "DATABASE_URL_FILE",
  }),
  SMTP_USER: resolveFromFileOrEnv({
    envValue: process.env.SMTP_USER,
    filePath: process.env.SMTP_USER_FILE,
    label: "SMTP_USER_FILE",
  }),
  SMTP_PASS: resolveFromFileOrEnv({
    envValue: process.env.SMTP_PASS,
    filePath: process.env.SMTP_PASS_FILE,
    label: "SMTP_PASS_FILE",
  }),
  TWILIO_AUTH_TOKEN: resolveFromFileOrEnv({
    envValue: process.env.TWILIO_AUTH_TOKEN,
    filePath: process.env.TWILIO_AUTH_TOKEN_FILE,
    label: "TWILIO_AUTH_TOKEN_FILE",
  }),
  JWT_SECRET_ACTIVE: resolveFromFileOrEnv({
    envValue: process.env.JWT_SECRET_ACTIVE,
    filePath: process.env.JWT_SECRET_ACTIVE_FILE,
    label: "JWT_SECRET_ACTIVE_FILE",
  }),
  JWT_SECRET_PREVIOUS: resolveFromFileOrEnv({
    envValue: process.env.JWT_SECRET_PREVIOUS,
    filePath: process.env.JWT_SECRET_PREVIOUS_FILE,
    label: "JWT_SECRET_PREVIOUS_FILE",
  }),
  TOKEN_PEPPER_ACTIVE: resolveFromFileOrEnv({
    envValue: process.env.TOKEN_PEPPER_ACTIVE,
    filePath: process.env.TOKEN_PEPPER_ACTIVE_FILE,
    label: "TOKEN_PEPPER_ACTIVE_FILE",
  }),
  TOKEN_PEPPER_PREVIOUS: resolveFromFileOrEnv({
    envValue: process.env.TOKEN_PEPPER_PREVIOUS,
    filePath: process.env.TOKEN_PEPPER_PREVIOUS_FILE,
    label: "TOKEN_PEPPER_PREVIOUS_FILE",
  }),
};

const raw = EnvSchema.parse({ ...process.env, ...secretsFromFiles });

function buildRedisUrl(input: {
  REDIS_URL?: string;
  REDIS_HOST?: string;
  REDIS_PORT?: number;
  REDIS_USERNAME?: string;
  REDIS_PASSWORD?: string;
}): string | undefined {
  if (input.REDIS_URL) return input.REDIS_URL;

  const { REDIS_HOST, REDIS_PORT, REDIS_USERNAME, REDIS_PASSWORD } = input;
  if (!REDIS_HOST || !REDIS_PORT) return undefined;

  const credentials =
    REDIS_USERNAME && REDIS_PASSWORD
      ? `${encodeURIComponent(REDIS_USERNAME)}:${encodeURIComponent(REDIS_PASSWORD)}@`
      : "";
  return `redis://${credentials}${REDIS_HOST}:${REDIS_PORT}`;
}

export const env = {
  ...raw,
  REQUEST_ID_HEADER: raw.REQUEST_ID_HEADER.toLowerCase(),
  REDIS_URL: buildRedisUrl(raw),
};

// ----------------------------------------------------------------------------
// Fail-fast: nur wenn der Service wirklich startet
// ----------------------------------------------------------------------------
//
// STARTUP_VALIDATE_ENV=1 -> immer validieren, sonst nicht in test.
//
const shouldValidate =
  process.env.STARTUP_VALIDATE_ENV === "1" ? true : env.NODE_ENV !== "test";

if (shouldValidate) {
  if (!env.DATABASE_URL) {
    throw new Error("DATABASE_URL fehlt: setze DATABASE_URL oder DATABASE_URL_FILE.");
  }
  if (!env.REDIS_URL) {
    throw new Error("Redis-Konfiguration fehlt: setze REDIS_URL oder REDIS_HOST/REDIS_PORT.");
  }
  if (env.NODE_ENV === "production" && !env.JWT_SECRET_ACTIVE) {
    throw new Error("JWT Secret fehlt: setze JWT_SECRET_ACTIVE oder JWT_SECRET_ACTIVE_FILE.");
  }
  if (env.NODE_ENV === "production" && !env.TOKEN_PEPPER_ACTIVE) {
    throw new Error("Pepper fehlt: setze TOKEN_PEPPER_ACTIVE oder TOKEN_PEPPER_ACTIVE_FILE.");
  }
  if (env.SESSION_ACCESS_TTL_SEC >= env.SESSION_REFRESH_TTL_SEC) {
    throw new Error("SESSION_ACCESS_TTL_SEC muss kleiner als SESSION_REFRESH_TTL_SEC sein.");
  }
}

// ----------------------------------------------------------------------------
// Debug-Ausgabe ohne Secrets
// ----------------------------------------------------------------------------

export function logEnvSummary(
  log: (msg: string, extra?: unknown) => void = console.info,
) {
  log("[env] configuration summary", {
    NODE_ENV: env.NODE_ENV,
    HOST: env.HOST,
    PORT: env.PORT,
    LOG_LEVEL: env.LOG_LEVEL,
    CORS_ORIGIN: env.CORS_ORIGIN,
    TRUST_PROXY: env.TRUST_PROXY,
    METRICS_ENABLED: env.METRICS_ENABLED,

    REDIS_URL: mask(env.REDIS_URL),
    REDIS_NAMESPACE: env.REDIS_NAMESPACE,
    DATABASE_URL: mask(env.DATABASE_URL),

    SMTP_HOST: env.SMTP_HOST,
    SMTP_PORT: env.SMTP_PORT,
    SMTP_USER: mask(env.SMTP_USER),
    SMTP_PASS: mask(env.SMTP_PASS),
    TWILIO_ACCOUNT_SID: mask(env.TWILIO_ACCOUNT_SID),
    TWILIO_AUTH_TOKEN: mask(env.TWILIO_AUTH_TOKEN),
    NOTIFY_TIMEOUT_MS: env.NOTIFY_TIMEOUT_MS,

    JWT_SECRET_ACTIVE: mask(env.JWT_SECRET_ACTIVE),
    JWT_SECRET_PREVIOUS: mask(env.JWT_SECRET_PREVIOUS),
    TOKEN_PEPPER_ACTIVE: mask(env.TOKEN_PEPPER_ACTIVE),
    TOKEN_PEPPER_PREVIOUS: mask(env.TOKEN_PEPPER_PREVIOUS),
    JWT_ISSUER: env.JWT_ISSUER,
    JWT_AUDIENCE: env.JWT_AUDIENCE,

    SESSION_ACCESS_TTL_SEC: env.SESSION_ACCESS_TTL_SEC,
    SESSION_REFRESH_TTL_SEC: env.SESSION_REFRESH_TTL_SEC,
    MAGIC_LINK_TTL_SEC: env.MAGIC_LINK_TTL_SEC,
    MAGIC_LINK_SUPERSEDE: env.MAGIC_LINK_SUPERSEDE,
    OTP_TTL_SEC: env.OTP_TTL_SEC,
    OTP_MAX_ATTEMPTS: env.OTP_MAX_ATTEMPTS,
    OTP_RESEND_COOLDOWN_SEC: env.OTP_RESEND_COOLDOWN_SEC,
    PHONE_VERIFICATION_COOLDOWN_SEC: env.PHONE_VERIFICATION_COOLDOWN_SEC,
  });
}

export type Env = typeof env;
