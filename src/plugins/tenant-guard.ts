// src/plugins/tenant-guard.ts
// ============================================================================
// Tenant Guard (Fastify)
// ----------------------------------------------------------------------------
// - Für Routen mit config.tenant === true
// - Membership (user, requestedTenantId) laden:
//     * keine UUID / keine / inaktive Membership → 403 TENANT_ACCESS_DENIED
//       (gleiche Antwort, ob die Instanz existiert oder nicht)
//     * Instanz suspended/cancelled → 403 TENANT_SUSPENDED
// - Erfolg: request.tenant (frozen) + request.tenantScope
//
// Handler lesen den Header danach nie wieder.
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import { sendDomainError } from "../libs/error-response.js";
import { AuthenticationError, AuthServiceError, TenantMissingError } from "../libs/errors.js";
import { hashIpForLog } from "../libs/pii.js";
import { isHealthPath } from "../libs/http.js";
import { createTenantScope } from "../modules/tenants/scope.js";
import { resolveTenantAccess } from "../modules/tenants/service.js";

const tenantGuardPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("preHandler", async (request, reply) => {
    if (isHealthPath(request)) return;
    if (request.routeOptions.config.tenant !== true) return;

    const user = request.user;
    if (!user) {
      return sendDomainError(reply, new AuthenticationError("missing_auth_context"));
    }

    const requested = request.requestedTenantId;
    if (!requested) {
      return sendDomainError(reply, new TenantMissingError());
    }

    try {
      const context = await resolveTenantAccess(app.deps.store, user.sub, requested);
      request.tenant = context;
      request.tenantScope = createTenantScope(app.deps.store, context);
    } catch (err) {
      if (err instanceof AuthServiceError) {
        request.log.warn(
          { code: err.code, ip_hash: hashIpForLog(request.ip) },
          "tenant_access_denied",
        );
        return sendDomainError(reply, err);
      }
      throw err;
    }
  });
};

export default fp(tenantGuardPlugin, {
  name: "tenant-guard",
  dependencies: ["auth", "tenant-context"],
});
