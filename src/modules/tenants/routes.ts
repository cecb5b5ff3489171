// src/modules/tenants/routes.ts
// ============================================================================
// Tenant-Routen als Fastify-Plugin
// ----------------------------------------------------------------------------
// - GET    /auth/tenants                    → eigene Instanzen + Rolle
// - POST   /auth/tenants                    → Instanz anlegen (Caller = owner)
// - GET    /auth/tenants/current            → Instanz aus X-Tenant-Id
// - GET    /auth/tenants/members            → Mitglieder der aktuellen Instanz
// - POST   /auth/tenants/members            → bestehenden User hinzufügen
// - DELETE /auth/tenants/members/:userId    → Mitglied entfernen
// - GET    /auth/tenants/health             → Modul-Healthcheck
//
// Tenant-Routen lesen den Header nie selbst: req.tenant / req.tenantScope
// kommen aus tenant-guard.ts.
// ============================================================================

import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";

import { auditEvent } from "../../libs/audit.js";
import { sendApiError } from "../../libs/error-response.js";
import { AuthenticationError, TenantMismatchError } from "../../libs/errors.js";
import { sendModuleHealth } from "../../libs/module-health.js";
import { EmailSchema } from "../../libs/normalize.js";
import {
  addMemberByEmail,
  createTenant,
  getCurrentTenant,
  listMembers,
  listTenantsForUser,
  removeMember,
} from "./service.js";
import type { TenantContext, TenantScope } from "./types.js";

// ---------------------------------------------------------------------------
// Zod-Schemas
// ---------------------------------------------------------------------------

const TenantCreateBodySchema = z.object({
  name: z.string().trim().min(3).max(120),
  slug: z
    .string()
    .trim()
    .min(3)
    .max(48)
    .regex(/^[a-z0-9-]+$/, "Slug: nur a-z, 0-9 und '-'.")
    .optional(),
});

const MemberAddBodySchema = z.object({
  email: EmailSchema,
  role: z.enum(["admin", "manager", "staff"]),
});

const MemberParamsSchema = z.object({
  userId: z.string().trim().min(1),
});

const MANAGE_MEMBERS = ["owner", "admin"] as const;

function scoped(req: FastifyRequest): { context: TenantContext; scope: TenantScope } {
  // tenant-guard.ts setzt beides für config.tenant-Routen
  if (!req.tenant || !req.tenantScope) throw new TenantMismatchError();
  return { context: req.tenant, scope: req.tenantScope };
}

// ---------------------------------------------------------------------------
// Routen-Plugin
// ---------------------------------------------------------------------------
//
//   await app.register(tenantsRoutes, { prefix: "/auth/tenants" });
// ---------------------------------------------------------------------------

export default async function tenantsRoutes(app: FastifyInstance) {
  // -------------------------------------------------------------------------
  // GET /auth/tenants
  // -------------------------------------------------------------------------
  app.get("/", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) throw new AuthenticationError("missing_auth_context");
    const tenants = await listTenantsForUser(app.deps.store, req.user.sub);
    return reply.send({ tenants });
  });

  // -------------------------------------------------------------------------
  // POST /auth/tenants
  // -------------------------------------------------------------------------
  //
  // Tenant-Header ist hier NICHT erforderlich (Instanz wird erzeugt).
  //
  app.post("/", { config: { auth: true } }, async (req, reply) => {
    const parsed = TenantCreateBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid tenant payload.",
        parsed.error.flatten(),
      );
    }

    if (!req.user) throw new AuthenticationError("missing_auth_context");
    const result = await createTenant(app.deps.store, req.user.sub, parsed.data);

    await auditEvent(app, {
      type: "instance_created",
      sub: req.user.sub,
      instance_id: result.instance.id,
    });

    return reply.code(201).send(result);
  });

  // -------------------------------------------------------------------------
  // GET /auth/tenants/current
  // -------------------------------------------------------------------------
  app.get("/current", { config: { tenant: true } }, async (req, reply) => {
    const { context, scope } = scoped(req);
    return reply.send(await getCurrentTenant(scope, context));
  });

  // -------------------------------------------------------------------------
  // GET /auth/tenants/members
  // -------------------------------------------------------------------------
  app.get("/members", { config: { tenant: true } }, async (req, reply) => {
    const { scope } = scoped(req);
    return reply.send({ members: await listMembers(scope) });
  });

  // -------------------------------------------------------------------------
  // POST /auth/tenants/members
  // -------------------------------------------------------------------------
  app.post(
    "/members",
    { config: { tenant: true, roles: MANAGE_MEMBERS } },
    async (req, reply) => {
      const parsed = MemberAddBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return sendApiError(
          reply,
          400,
          "VALIDATION_FAILED",
          "Invalid member payload.",
          parsed.error.flatten(),
        );
      }

      const { context, scope } = scoped(req);
      const member = await addMemberByEmail(app.deps.store, scope, parsed.data);

      await auditEvent(app, {
        type: "member_added",
        sub: context.userId,
        instance_id: context.instanceId,
        member_id: member.userId,
      });

      return reply.code(201).send(member);
    },
  );

  // -------------------------------------------------------------------------
  // DELETE /auth/tenants/members/:userId
  // -------------------------------------------------------------------------
  app.delete(
    "/members/:userId",
    { config: { tenant: true, roles: MANAGE_MEMBERS } },
    async (req, reply) => {
      const parsed = MemberParamsSchema.safeParse(req.params);
      if (!parsed.success) {
        return sendApiError(
          reply,
          400,
          "VALIDATION_FAILED",
          "Invalid member id.",
          parsed.error.flatten(),
        );
      }

      const { context, scope } = scoped(req);
      const result = await removeMember(scope, context, parsed.data.userId.toLowerCase());

      await auditEvent(app, {
        type: "member_removed",
        sub: context.userId,
        instance_id: context.instanceId,
        member_id: parsed.data.userId,
      });

      return reply.send(result);
    },
  );

  // -------------------------------------------------------------------------
  // GET /auth/tenants/health
  // -------------------------------------------------------------------------
  app.get("/health", async (_req, reply) => sendModuleHealth(app, reply, "tenants"));
}
