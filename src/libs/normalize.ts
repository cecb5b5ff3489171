// src/libs/normalize.ts
// ============================================================================
// Normalisierung von Kontaktdaten (E-Mail, Telefon)
// ----------------------------------------------------------------------------
// Telefon: nur Ziffern und "+", fehlendes "+" wird ergänzt (E.164-ähnlich).
// ============================================================================

import { z } from "zod";

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function normalizePhone(phone: string): string {
  const cleaned = phone.trim().replace(/[^\d+]/g, "");
  const digits = cleaned.replace(/\+/g, "");
  return `+${digits}`;
}

export const EmailSchema = z
  .string()
  .trim()
  .email("Bitte eine gültige E-Mail-Adresse angeben.")
  .max(254)
  .transform(normalizeEmail);

export const PhoneSchema = z
  .string()
  .trim()
  .min(1, "Telefonnummer ist Pflicht.")
  .transform(normalizePhone)
  .refine((value) => /^\+\d{1,15}$/.test(value), {
    message: "Bitte eine gültige Telefonnummer angeben.",
  });

export const LocaleSchema = z
  .string()
  .trim()
  .regex(/^[a-z]{2}(-[A-Z]{2})?$/, "Ungültige Locale.");
