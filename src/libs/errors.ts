// src/libs/errors.ts
// ============================================================================
// Fehler-Taxonomie des Auth-Service
// ----------------------------------------------------------------------------
// - Jede fachliche Fehlerklasse trägt statusCode + code (API-Vertrag)
// - Übersetzung ins HTTP-Format passiert zentral im Error-Handler (app.ts)
//   bzw. in Plugins via sendDomainError()
// - NotificationDispatchError wird nie an den Client gereicht, sondern nur
//   in der Dispatch-Zusammenfassung + Log erfasst
// ============================================================================

export abstract class AuthServiceError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;
  details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    if (details !== undefined) this.details = details;
  }
}

// ---------------------------------------------------------------------------
// Eingabe / Registrierung
// ---------------------------------------------------------------------------

export class ValidationError extends AuthServiceError {
  readonly statusCode = 400;
  readonly code = "VALIDATION_FAILED";
}

export class DuplicateRegistrationError extends AuthServiceError {
  readonly statusCode = 400;
  readonly code = "REGISTER_NOT_POSSIBLE";

  // field nur fürs Log, nie in der Antwort
  constructor(readonly field: "email" | "phone") {
    super("Registration is not possible with these details.");
  }
}

export class RegistrationNotFoundError extends AuthServiceError {
  readonly statusCode = 404;
  readonly code = "REGISTRATION_NOT_FOUND";

  constructor() {
    super("No pending registration for this email and phone.");
  }
}

export class ResendCooldownError extends AuthServiceError {
  readonly statusCode = 429;
  readonly code = "OTP_RESEND_COOLDOWN";

  constructor(readonly retryAfterSec: number) {
    super("Please wait before requesting a new code.", {
      retry_after_seconds: retryAfterSec,
    });
  }
}

export class PhoneTakenError extends AuthServiceError {
  readonly statusCode = 409;
  readonly code = "PHONE_TAKEN";

  constructor() {
    super("Phone number is already registered with another account.");
  }
}

// ---------------------------------------------------------------------------
// Verifier
// ---------------------------------------------------------------------------

// Gleiche Antwort für "falscher Code" und "bereits verbraucht"
export class InvalidCodeError extends AuthServiceError {
  readonly statusCode = 400;
  readonly code = "OTP_INVALID";

  constructor(readonly remainingAttempts?: number) {
    super(
      "The code is invalid.",
      remainingAttempts === undefined ? undefined : { remaining_attempts: remainingAttempts },
    );
  }
}

export class ExpiredError extends AuthServiceError {
  readonly statusCode = 410;
  readonly code: "OTP_EXPIRED" | "MAGIC_LINK_EXPIRED";

  constructor(readonly kind: "otp" | "magic_link") {
    super(kind === "otp" ? "The code has expired." : "The magic link has expired.");
    this.code = kind === "otp" ? "OTP_EXPIRED" : "MAGIC_LINK_EXPIRED";
  }
}

export class AttemptsExceededError extends AuthServiceError {
  readonly statusCode = 410;
  readonly code = "OTP_ATTEMPTS_EXCEEDED";

  constructor() {
    super("Too many incorrect attempts. Request a new code.");
  }
}

export class InvalidMagicLinkTokenError extends AuthServiceError {
  readonly statusCode = 400;
  readonly code = "MAGIC_LINK_INVALID_TOKEN";

  constructor() {
    super("The magic link token is invalid.");
  }
}

export class ConcurrencyConflictError extends AuthServiceError {
  readonly statusCode = 409;
  readonly code = "CONFLICT";

  constructor() {
    super("The record was modified concurrently. Please retry.");
  }
}

// ---------------------------------------------------------------------------
// Auth / Tenant (nach außen generisch, kein Tenant-Enumerating)
// ---------------------------------------------------------------------------

export class AuthenticationError extends AuthServiceError {
  readonly statusCode = 401;
  readonly code = "UNAUTHORIZED";

  constructor(readonly reason = "invalid_credential") {
    super("Authentication required.");
  }
}

export class TenantMissingError extends AuthServiceError {
  readonly statusCode = 400;
  readonly code = "TENANT_REQUIRED";

  constructor() {
    super("Missing X-Tenant-Id header.");
  }
}

export class TenantMismatchError extends AuthServiceError {
  readonly statusCode = 403;
  readonly code = "TENANT_ACCESS_DENIED";

  constructor() {
    super("Access to this tenant is not permitted.");
  }
}

export class TenantSuspendedError extends AuthServiceError {
  readonly statusCode = 403;
  readonly code = "TENANT_SUSPENDED";

  constructor() {
    super("This tenant is not active.");
  }
}

export class PermissionDeniedError extends AuthServiceError {
  readonly statusCode = 403;
  readonly code = "PERMISSION_DENIED";

  constructor() {
    super("Missing required role.");
  }
}

// ---------------------------------------------------------------------------
// Allgemein
// ---------------------------------------------------------------------------

export class NotFoundError extends AuthServiceError {
  readonly statusCode = 404;
  readonly code = "NOT_FOUND";
}

export class ConflictError extends AuthServiceError {
  readonly statusCode = 409;
  readonly code = "CONFLICT";
}

export class BadRequestError extends AuthServiceError {
  readonly statusCode = 400;
  readonly code = "BAD_REQUEST";
}

export class NotificationDispatchError extends AuthServiceError {
  readonly statusCode = 502;
  readonly code = "NOTIFICATION_DISPATCH_FAILED";

  constructor(
    readonly channel: string,
    message: string,
  ) {
    super(message);
  }
}
