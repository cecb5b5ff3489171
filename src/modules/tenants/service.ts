// src/modules/tenants/service.ts
// ============================================================================
// Business-Logik für Instanzen (Tenants)
// ----------------------------------------------------------------------------
// UseCases:
// - resolveTenantAccess: Membership-Prüfung für tenant-guard.ts
// - listTenantsForUser / createTenant
// - getCurrentTenant / listMembers / addMemberByEmail / removeMember
//   (laufen ausschließlich über den TenantScope)
// ============================================================================

import {
  BadRequestError,
  ConflictError,
  NotFoundError,
  TenantMismatchError,
  TenantSuspendedError,
} from "../../libs/errors.js";
import { isUuid } from "../../libs/jwt.js";
import { normalizeEmail } from "../../libs/normalize.js";
import type { UserRepository } from "../identity/types.js";
import {
  BLOCKED_INSTANCE_STATUSES,
  toPublicInstance,
  type InstanceRow,
  type MemberView,
  type MembershipRole,
  type PublicInstance,
  type TenantContext,
  type TenantRepository,
  type TenantScope,
} from "./types.js";

const MAX_SLUG_ATTEMPTS = 20;

// ---------------------------------------------------------------------------
// Tenant-Auflösung (Guard)
// ---------------------------------------------------------------------------

/**
 * Prüft, ob `userId` in `rawInstanceId` arbeiten darf.
 *
 * Nicht-UUID, fehlende und inaktive Membership liefern denselben Fehler,
 * unabhängig davon, ob die Instanz existiert.
 */
export async function resolveTenantAccess(
  store: TenantRepository,
  userId: string,
  rawInstanceId: string,
): Promise<TenantContext> {
  if (!isUuid(rawInstanceId)) {
    throw new TenantMismatchError();
  }

  const found = await store.findMembership(userId, rawInstanceId.toLowerCase());
  if (!found || !found.membership.is_active) {
    throw new TenantMismatchError();
  }

  if (BLOCKED_INSTANCE_STATUSES.includes(found.instance.status)) {
    throw new TenantSuspendedError();
  }

  return Object.freeze({
    instanceId: found.instance.id,
    role: found.membership.role,
    userId,
  });
}

// ---------------------------------------------------------------------------
// Instanzen des Users
// ---------------------------------------------------------------------------

export async function listTenantsForUser(
  store: TenantRepository,
  userId: string,
): Promise<Array<PublicInstance & { role: MembershipRole }>> {
  const rows = await store.listInstancesForUser(userId);
  return rows.map(({ instance, role }) => ({ ...toPublicInstance(instance), role }));
}

export function slugify(input: string): string {
  const slug = input
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 48)
    .replace(/-+$/g, "");
  return slug || "instance";
}

export async function createTenant(
  store: TenantRepository,
  ownerId: string,
  input: { name: string; slug?: string },
): Promise<{ instance: PublicInstance; role: MembershipRole }> {
  const base = slugify(input.slug ?? input.name);

  for (let attempt = 1; attempt <= MAX_SLUG_ATTEMPTS; attempt += 1) {
    const slug = attempt === 1 ? base : `${base}-${attempt}`;
    const instance = await store.createInstanceWithOwner({
      name: input.name.trim(),
      slug,
      ownerId,
    });
    if (instance) {
      return { instance: toPublicInstance(instance), role: "owner" };
    }
  }

  throw new ConflictError("Could not allocate a unique slug.");
}

// ---------------------------------------------------------------------------
// Scoped UseCases
// ---------------------------------------------------------------------------

export async function getCurrentTenant(
  scope: TenantScope,
  context: TenantContext,
): Promise<{ instance: PublicInstance; role: MembershipRole }> {
  const instance: InstanceRow | null = await scope.instance();
  if (!instance) {
    throw new NotFoundError("Instance not found.");
  }
  return { instance: toPublicInstance(instance), role: context.role };
}

export function listMembers(scope: TenantScope): Promise<MemberView[]> {
  return scope.members();
}

export async function addMemberByEmail(
  users: UserRepository,
  scope: TenantScope,
  input: { email: string; role: Exclude<MembershipRole, "owner"> },
): Promise<{ userId: string; role: MembershipRole }> {
  const user = await users.findUserByEmail(normalizeEmail(input.email));
  if (!user || !user.is_active) {
    throw new NotFoundError("User not found.");
  }

  const membership = await scope.addMember(user.id, input.role);
  if (!membership) {
    throw new ConflictError("User is already a member.");
  }

  return { userId: user.id, role: membership.role };
}

export async function removeMember(
  scope: TenantScope,
  context: TenantContext,
  targetUserId: string,
): Promise<{ removed: true }> {
  if (targetUserId === context.userId) {
    throw new BadRequestError("You cannot remove yourself.");
  }

  const membership = isUuid(targetUserId) ? await scope.membership(targetUserId) : null;
  if (!membership) {
    throw new NotFoundError("Member not found.");
  }
  if (membership.role === "owner") {
    throw new BadRequestError("The owner cannot be removed.");
  }

  await scope.removeMember(targetUserId);
  return { removed: true };
}
