// src/plugins/authorization.ts
// ============================================================================
// Rollen-Prüfung (Fastify)
// - config.roles: erlaubte Membership-Rollen im aktuellen Tenant
// - läuft nach tenant-guard.ts (request.tenant muss gesetzt sein)
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import { sendDomainError } from "../libs/error-response.js";
import { PermissionDeniedError } from "../libs/errors.js";
import { isHealthPath } from "../libs/http.js";

const authorizationPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("preHandler", async (request, reply) => {
    if (isHealthPath(request)) return;

    const roles = request.routeOptions.config.roles;
    if (!roles || roles.length === 0) return;

    const role = request.tenant?.role;
    if (!role || !roles.includes(role)) {
      return sendDomainError(reply, new PermissionDeniedError());
    }
  });
};

export default fp(authorizationPlugin, {
  name: "authorization",
  dependencies: ["tenant-guard"],
});
