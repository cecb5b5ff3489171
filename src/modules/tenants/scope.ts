// src/modules/tenants/scope.ts
// ============================================================================
// TenantScope: Repository-Fassade für genau eine Instanz
// ----------------------------------------------------------------------------
// Handler bekommen nur req.tenantScope; jede Methode ist an
// context.instanceId gebunden, eine fremde Instanz ist nicht adressierbar.
// ============================================================================

import type { TenantContext, TenantRepository, TenantScope } from "./types.js";

export function createTenantScope(
  store: TenantRepository,
  context: TenantContext,
): TenantScope {
  const { instanceId } = context;

  return Object.freeze({
    instanceId,

    instance: () => store.findInstanceById(instanceId),

    async membership(userId: string) {
      const found = await store.findMembership(userId, instanceId);
      return found?.membership ?? null;
    },

    members: () => store.listMembers(instanceId),

    addMember: (userId, role) => store.addMember({ instanceId, userId, role }),

    removeMember: (userId) => store.removeMember(instanceId, userId),
  } satisfies TenantScope);
}
