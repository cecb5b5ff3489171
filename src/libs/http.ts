// ============================================================================
// src/libs/http.ts
// ----------------------------------------------------------------------------
// HTTP-Hilfsfunktionen (Logging, Keys, Metriken, Device-Metadaten)
// ============================================================================
import type { FastifyRequest } from "fastify";

/** Liefert eine stabile Routen-ID (für Logs/Keys/Metriken). */
export function getRouteId(req: FastifyRequest): string {
  return req.routeOptions?.url || req.raw?.url?.split("?")[0] || "unknown";
}

/** Ermittelt, ob die Anfrage einen Health-Endpoint adressiert. */
export function isHealthPath(req: FastifyRequest): boolean {
  const url = req.raw.url ?? "";
  return url === "/health" || url.startsWith("/health/");
}

export function readHeader(req: FastifyRequest, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

export type DeviceMeta = {
  ip?: string;
  userAgent?: string;
};

export function deviceMetaFrom(req: FastifyRequest): DeviceMeta {
  return {
    ip: req.ip,
    userAgent: readHeader(req, "user-agent")?.slice(0, 512),
  };
}
