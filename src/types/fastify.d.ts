// src/types/fastify.d.ts
// ============================================================================
// Fastify Type Augmentation
// ----------------------------------------------------------------------------
// - Route Config: config.auth / config.tenant / config.strictSession / config.roles
// - Request Decorations:
//   - request.user: verifiziertes Access-Token (plugins/auth.ts)
//   - request.requestedTenantId: roher X-Tenant-Id Header (plugins/tenant-context.ts)
//   - request.tenant / request.tenantScope: verifizierter Tenant (plugins/tenant-guard.ts)
// - Instance Decoration: app.deps (Store, Cache, Kanäle, Policy)
//
// Sie sollte KEINE Runtime-Imports auslösen (nur Type-Imports).
// ============================================================================

import "fastify";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Bearer-Token Pflicht (auth.ts) */
    auth?: boolean;

    /**
     * Tenant-Kontext Pflicht: impliziert auth, danach X-Tenant-Id +
     * Membership-Prüfung (tenant-context.ts, tenant-guard.ts)
     */
    tenant?: boolean;

    /** Session-Datensatz zusätzlich zur Denylist prüfen (revoked / absolute TTL) */
    strictSession?: boolean;

    /** Erlaubte Membership-Rollen (authorization.ts) */
    roles?: readonly import("../modules/tenants/types.js").MembershipRole[];
  }

  interface FastifyRequest {
    user?: import("../libs/jwt.js").AccessTokenPayload;
    requestedTenantId?: string;
    tenant?: import("../modules/tenants/types.js").TenantContext;
    tenantScope?: import("../modules/tenants/types.js").TenantScope;
    requestStartedAtNs?: bigint;
    rate?: { count: number; ttl: number; blocked: boolean; max: number };
  }

  interface FastifyInstance {
    deps: import("../libs/deps.js").AppDeps;
  }
}
