// src/plugins/tenant-context.ts
// ============================================================================
// Tenant Context (Header Intake Only)
// ----------------------------------------------------------------------------
// - Liest X-Tenant-Id für Routen mit config.tenant === true
// - Fehlender Header → 400 TENANT_REQUIRED
// - Speichert den Wert NUR als "requestedTenantId"; verifiziert wird er
//   erst in tenant-guard.ts über die Membership
//
// Reihenfolge:
// auth -> tenant-context -> tenant-guard -> authorization
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import { sendDomainError } from "../libs/error-response.js";
import { TenantMissingError } from "../libs/errors.js";
import { isHealthPath, readHeader } from "../libs/http.js";

export const TENANT_HEADER = "x-tenant-id";

const tenantContextPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("preHandler", async (request, reply) => {
    if (isHealthPath(request)) return;
    if (request.routeOptions.config.tenant !== true) return;

    const headerTenant = readHeader(request, TENANT_HEADER);
    if (!headerTenant) {
      return sendDomainError(reply, new TenantMissingError());
    }

    request.requestedTenantId = headerTenant.toLowerCase();
  });
};

export default fp(tenantContextPlugin, { name: "tenant-context", dependencies: ["auth"] });
