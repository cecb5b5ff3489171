// src/modules/tenants/types.ts
// ============================================================================
// Typen für Instanzen (Tenants) und Mitgliedschaften
// ----------------------------------------------------------------------------
// - Intern: InstanceRow / MembershipRow (auth.instances, auth.instance_memberships)
// - TenantContext: verifizierter Tenant eines Requests (tenant-guard.ts)
// - TenantScope: Repository-Fassade, fest an context.instanceId gebunden
// ============================================================================

export const INSTANCE_STATUSES = ["trial", "active", "suspended", "cancelled"] as const;
export type InstanceStatus = (typeof INSTANCE_STATUSES)[number];

export const MEMBERSHIP_ROLES = ["owner", "admin", "manager", "staff"] as const;
export type MembershipRole = (typeof MEMBERSHIP_ROLES)[number];

/** Status, in denen Mitglieder nicht arbeiten dürfen */
export const BLOCKED_INSTANCE_STATUSES: readonly InstanceStatus[] = ["suspended", "cancelled"];

// ---------------------------------------------------------------------------
// DB-Rows
// ---------------------------------------------------------------------------

export interface InstanceRow {
  id: string;
  name: string;
  slug: string;
  status: InstanceStatus;
  created_at: Date;
  updated_at: Date;
}

export interface MembershipRow {
  id: string;
  instance_id: string;
  user_id: string;
  role: MembershipRole;
  is_active: boolean;
  created_at: Date;
}

export interface MembershipWithInstance {
  membership: MembershipRow;
  instance: InstanceRow;
}

export interface MemberView {
  user_id: string;
  email: string;
  name: string;
  role: MembershipRole;
  is_active: boolean;
  joined_at: Date;
}

export interface TenantRepository {
  findMembership(userId: string, instanceId: string): Promise<MembershipWithInstance | null>;
  listInstancesForUser(userId: string): Promise<Array<{ instance: InstanceRow; role: MembershipRole }>>;
  findInstanceById(instanceId: string): Promise<InstanceRow | null>;
  /** null → Slug bereits vergeben */
  createInstanceWithOwner(input: {
    name: string;
    slug: string;
    ownerId: string;
  }): Promise<InstanceRow | null>;
  listMembers(instanceId: string): Promise<MemberView[]>;
  /** null → User ist bereits Mitglied */
  addMember(input: {
    instanceId: string;
    userId: string;
    role: MembershipRole;
  }): Promise<MembershipRow | null>;
  removeMember(instanceId: string, userId: string): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Request-Kontext
// ---------------------------------------------------------------------------

export type TenantContext = Readonly<{
  instanceId: string;
  role: MembershipRole;
  userId: string;
}>;

export interface TenantScope {
  readonly instanceId: string;
  instance(): Promise<InstanceRow | null>;
  membership(userId: string): Promise<MembershipRow | null>;
  members(): Promise<MemberView[]>;
  addMember(userId: string, role: MembershipRole): Promise<MembershipRow | null>;
  removeMember(userId: string): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Öffentliche Typen
// ---------------------------------------------------------------------------

export interface PublicInstance {
  id: string;
  name: string;
  slug: string;
  status: InstanceStatus;
  createdAt: Date;
}

export function toPublicInstance(row: InstanceRow): PublicInstance {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    status: row.status,
    createdAt: row.created_at,
  };
}
