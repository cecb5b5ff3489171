// src/libs/error-response.ts
// ============================================================================
// Einheitliches Fehler-Envelope: { status, error: { code, message }, details? }
// ============================================================================

import type { FastifyReply } from "fastify";
import { AuthenticationError, type AuthServiceError } from "./errors.js";

export type ApiErrorBody = {
  status: number;
  error: {
    code: string;
    message: string;
  };
  details?: unknown;
};

export function apiError(
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ApiErrorBody {
  const base: ApiErrorBody = {
    status,
    error: {
      code,
      message,
    },
  };

  if (details !== undefined) {
    base.details = details;
  }

  return base;
}

export function sendApiError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
) {
  return reply.code(status).send(apiError(status, code, message, details));
}

/** Übersetzt einen fachlichen Fehler in die HTTP-Antwort. */
export function sendDomainError(reply: FastifyReply, err: AuthServiceError) {
  if (err instanceof AuthenticationError) {
    reply.header("WWW-Authenticate", 'Bearer error="invalid_token"');
  }
  return sendApiError(reply, err.statusCode, err.code, err.message, err.details);
}
