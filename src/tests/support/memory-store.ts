// src/tests/support/memory-store.ts
// ============================================================================
// In-Memory CredentialStore für Tests
// ----------------------------------------------------------------------------
// - Gleiche Semantik wie die pg-Repositories (Compare-and-update, Supersession,
//   Unique-Constraints), aber ohne Datenbank
// - Jede Operation gibt Kopien zurück; jede await-Grenze erlaubt Interleaving
//   paralleler Requests (Promise.all in Tests)
// ============================================================================

import { randomUUID } from "node:crypto";
import { DuplicateRegistrationError, PhoneTakenError } from "../../libs/errors.js";
import type { CredentialStore, StoreHealth } from "../../libs/store.js";
import type { PurgeCounts } from "../../modules/housekeeping/types.js";
import type { ProfilePatch, UserRow } from "../../modules/identity/types.js";
import type { MagicLinkRow, NewMagicLink } from "../../modules/magic-link/types.js";
import type {
  CompleteRegistrationInput,
  NewOtpChallenge,
  OtpChallengeRow,
} from "../../modules/otp/types.js";
import type {
  CompletePhoneVerificationInput,
  NewPhoneVerification,
  PhoneVerificationRow,
} from "../../modules/phone/types.js";
import type {
  NewSession,
  RevokeReason,
  RotateRefreshInput,
  SessionRow,
} from "../../modules/sessions/types.js";
import type {
  InstanceRow,
  InstanceStatus,
  MemberView,
  MembershipRole,
  MembershipRow,
  MembershipWithInstance,
} from "../../modules/tenants/types.js";

const copy = <T extends object>(row: T): T => ({ ...row });

// Mikrotask-Grenze wie bei einem echten I/O-Roundtrip
const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

export class MemoryCredentialStore implements CredentialStore {
  readonly users = new Map<string, UserRow>();
  readonly challenges = new Map<string, OtpChallengeRow>();
  readonly magicLinks = new Map<string, MagicLinkRow>();
  readonly phoneVerifications = new Map<string, PhoneVerificationRow>();
  readonly sessions = new Map<string, SessionRow>();
  readonly instances = new Map<string, InstanceRow>();
  readonly memberships = new Map<string, MembershipRow>();

  healthy = true;
  closed = false;

  // -------------------------------------------------------------------------
  // Seeds
  // -------------------------------------------------------------------------

  seedUser(fields: Partial<UserRow> & { email: string }): UserRow {
    const now = new Date();
    const row: UserRow = {
      id: randomUUID(),
      phone: null,
      name: "Test User",
      locale: "en",
      is_active: true,
      is_phone_verified: false,
      created_at: now,
      updated_at: now,
      last_login_at: null,
      ...fields,
    };
    this.users.set(row.id, row);
    return copy(row);
  }

  seedInstance(fields: Partial<InstanceRow> & { name: string }): InstanceRow {
    const now = new Date();
    const row: InstanceRow = {
      id: randomUUID(),
      slug: fields.name.toLowerCase().replace(/[^a-z0-9]+/g, "-"),
      status: "active",
      created_at: now,
      updated_at: now,
      ...fields,
    };
    this.instances.set(row.id, row);
    return copy(row);
  }

  seedMembership(
    instanceId: string,
    userId: string,
    role: MembershipRole,
    isActive = true,
  ): MembershipRow {
    const row: MembershipRow = {
      id: randomUUID(),
      instance_id: instanceId,
      user_id: userId,
      role,
      is_active: isActive,
      created_at: new Date(),
    };
    this.memberships.set(row.id, row);
    return copy(row);
  }

  setInstanceStatus(instanceId: string, status: InstanceStatus): void {
    const row = this.instances.get(instanceId);
    if (!row) throw new Error(`unknown instance ${instanceId}`);
    row.status = status;
  }

  // -------------------------------------------------------------------------
  // Users
  // -------------------------------------------------------------------------

  async findUserById(id: string) {
    await tick();
    const row = this.users.get(id);
    return row ? copy(row) : null;
  }

  async findUserByEmail(email: string) {
    await tick();
    const needle = email.toLowerCase();
    const row = [...this.users.values()].find((user) => user.email === needle);
    return row ? copy(row) : null;
  }

  async findUserByPhone(phone: string) {
    await tick();
    const row = [...this.users.values()].find((user) => user.phone === phone);
    return row ? copy(row) : null;
  }

  async updateUserProfile(id: string, patch: ProfilePatch) {
    await tick();
    const row = this.users.get(id);
    if (!row) return null;
    if (patch.name !== undefined) row.name = patch.name;
    if (patch.locale !== undefined) row.locale = patch.locale;
    row.updated_at = new Date();
    return copy(row);
  }

  async touchLastLogin(id: string, at: Date) {
    await tick();
    const row = this.users.get(id);
    if (row) row.last_login_at = at;
  }

  // -------------------------------------------------------------------------
  // OTP
  // -------------------------------------------------------------------------

  async insertOtpChallenge(input: NewOtpChallenge) {
    await tick();
    for (const row of this.challenges.values()) {
      if (
        row.email === input.email &&
        row.phone === input.phone &&
        row.verified_at === null &&
        row.superseded_at === null
      ) {
        row.superseded_at = input.issuedAt;
        row.version += 1;
      }
    }

    const row: OtpChallengeRow = {
      id: randomUUID(),
      email: input.email,
      phone: input.phone,
      name: input.name,
      locale: input.locale,
      code_hash: input.codeHash,
      issued_at: input.issuedAt,
      expires_at: input.expiresAt,
      verified_at: null,
      superseded_at: null,
      attempts: 0,
      max_attempts: input.maxAttempts,
      ip: input.ip,
      version: 0,
    };
    this.challenges.set(row.id, row);
    return copy(row);
  }

  private latestChallenge(
    email: string,
    phone: string,
    predicate: (row: OtpChallengeRow) => boolean,
  ): OtpChallengeRow | null {
    const rows = [...this.challenges.values()]
      .filter((row) => row.email === email && row.phone === phone && predicate(row))
      .sort((a, b) => b.issued_at.getTime() - a.issued_at.getTime());
    return rows[0] ? copy(rows[0]) : null;
  }

  async findActiveOtpChallenge(email: string, phone: string) {
    await tick();
    return this.latestChallenge(
      email,
      phone,
      (row) => row.verified_at === null && row.superseded_at === null,
    );
  }

  async findLatestPendingOtpChallenge(email: string, phone: string) {
    await tick();
    return this.latestChallenge(email, phone, (row) => row.verified_at === null);
  }

  async recordOtpAttempt(id: string, expectedVersion: number, attempts: number) {
    await tick();
    const row = this.challenges.get(id);
    if (
      !row ||
      row.version !== expectedVersion ||
      row.verified_at !== null ||
      row.superseded_at !== null
    ) {
      return false;
    }
    row.attempts = attempts;
    row.version += 1;
    return true;
  }

  async completeRegistration(input: CompleteRegistrationInput) {
    await tick();
    const row = this.challenges.get(input.challengeId);
    if (
      !row ||
      row.version !== input.expectedVersion ||
      row.verified_at !== null ||
      row.superseded_at !== null
    ) {
      return null;
    }

    const users = [...this.users.values()];
    if (users.some((user) => user.email === input.user.email)) {
      throw new DuplicateRegistrationError("email");
    }
    if (users.some((user) => user.phone === input.user.phone)) {
      throw new DuplicateRegistrationError("phone");
    }

    row.verified_at = input.verifiedAt;
    row.version += 1;

    return this.seedUser({
      email: input.user.email,
      phone: input.user.phone,
      name: input.user.name,
      locale: input.user.locale,
      is_phone_verified: input.user.isPhoneVerified,
    });
  }

  // -------------------------------------------------------------------------
  // Magic-Links
  // -------------------------------------------------------------------------

  async insertMagicLink(input: NewMagicLink) {
    await tick();
    if (input.supersedePrevious) {
      for (const row of this.magicLinks.values()) {
        if (row.user_id === input.userId && row.consumed_at === null && row.superseded_at === null) {
          row.superseded_at = input.issuedAt;
        }
      }
    }

    const row: MagicLinkRow = {
      id: randomUUID(),
      user_id: input.userId,
      token_hash: input.tokenHash,
      issued_at: input.issuedAt,
      expires_at: input.expiresAt,
      consumed_at: null,
      superseded_at: null,
      ip: input.ip,
      user_agent: input.userAgent,
    };
    this.magicLinks.set(row.id, row);
    return copy(row);
  }

  async consumeMagicLink(tokenHash: string, now: Date) {
    await tick();
    const row = [...this.magicLinks.values()].find((link) => link.token_hash === tokenHash);
    if (
      !row ||
      row.consumed_at !== null ||
      row.superseded_at !== null ||
      row.expires_at.getTime() < now.getTime()
    ) {
      return null;
    }
    row.consumed_at = now;
    return copy(row);
  }

  async findMagicLinkByHash(tokenHash: string) {
    await tick();
    const row = [...this.magicLinks.values()].find((link) => link.token_hash === tokenHash);
    return row ? copy(row) : null;
  }

  // -------------------------------------------------------------------------
  // Telefon-Verifikation
  // -------------------------------------------------------------------------

  private phoneVerificationOf(userId: string): PhoneVerificationRow | undefined {
    return [...this.phoneVerifications.values()].find((row) => row.user_id === userId);
  }

  async findPhoneVerification(userId: string) {
    await tick();
    const row = this.phoneVerificationOf(userId);
    return row ? copy(row) : null;
  }

  async upsertPhoneVerification(input: NewPhoneVerification) {
    await tick();
    const existing = this.phoneVerificationOf(input.userId);
    const row: PhoneVerificationRow = {
      id: existing?.id ?? randomUUID(),
      user_id: input.userId,
      phone: input.phone,
      code_hash: input.codeHash,
      issued_at: input.issuedAt,
      expires_at: input.expiresAt,
      verified_at: null,
      attempts: 0,
      max_attempts: input.maxAttempts,
      version: existing ? existing.version + 1 : 0,
    };
    this.phoneVerifications.set(row.id, row);
    return copy(row);
  }

  async recordPhoneVerificationAttempt(id: string, expectedVersion: number, attempts: number) {
    await tick();
    const row = this.phoneVerifications.get(id);
    if (!row || row.version !== expectedVersion || row.verified_at !== null) return false;
    row.attempts = attempts;
    row.version += 1;
    return true;
  }

  async completePhoneVerification(input: CompletePhoneVerificationInput) {
    await tick();
    const row = this.phoneVerifications.get(input.verificationId);
    if (!row || row.version !== input.expectedVersion || row.verified_at !== null) return null;

    const user = this.users.get(input.userId);
    if (!user) return null;
    if ([...this.users.values()].some((other) => other.id !== user.id && other.phone === input.phone)) {
      throw new PhoneTakenError();
    }

    row.verified_at = input.verifiedAt;
    row.version += 1;
    user.phone = input.phone;
    user.is_phone_verified = true;
    user.updated_at = input.verifiedAt;
    return copy(user);
  }

  // -------------------------------------------------------------------------
  // Sessions
  // -------------------------------------------------------------------------

  async insertSession(input: NewSession) {
    await tick();
    const row: SessionRow = {
      id: randomUUID(),
      user_id: input.userId,
      refresh_token_hash: input.refreshTokenHash,
      previous_refresh_token_hash: null,
      refresh_expires_at: input.refreshExpiresAt,
      expires_at: input.expiresAt,
      ip: input.ip,
      user_agent: input.userAgent,
      device_type: input.deviceType,
      created_at: input.createdAt,
      last_seen_at: input.createdAt,
      revoked_at: null,
      revoke_reason: null,
    };
    this.sessions.set(row.id, row);
    return copy(row);
  }

  private findSessionBy(predicate: (row: SessionRow) => boolean): SessionRow | null {
    const row = [...this.sessions.values()].find(predicate);
    return row ? copy(row) : null;
  }

  async findSessionById(id: string) {
    await tick();
    return this.findSessionBy((row) => row.id === id);
  }

  async findSessionByRefreshHash(hash: string) {
    await tick();
    return this.findSessionBy((row) => row.refresh_token_hash === hash);
  }

  async findSessionByPreviousRefreshHash(hash: string) {
    await tick();
    return this.findSessionBy((row) => row.previous_refresh_token_hash === hash);
  }

  async rotateRefreshToken(input: RotateRefreshInput) {
    await tick();
    const row = this.sessions.get(input.sessionId);
    if (!row || row.refresh_token_hash !== input.expectedHash || row.revoked_at !== null) {
      return null;
    }
    row.previous_refresh_token_hash = row.refresh_token_hash;
    row.refresh_token_hash = input.nextHash;
    row.refresh_expires_at = input.refreshExpiresAt;
    row.last_seen_at = input.now;
    return copy(row);
  }

  async revokeSessionRecord(id: string, reason: RevokeReason, now: Date) {
    await tick();
    const row = this.sessions.get(id);
    if (!row || row.revoked_at !== null) return false;
    row.revoked_at = now;
    row.revoke_reason = reason;
    return true;
  }

  async listSessionsByUserId(userId: string, limit: number) {
    await tick();
    return [...this.sessions.values()]
      .filter((row) => row.user_id === userId)
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .slice(0, limit)
      .map(copy);
  }

  // -------------------------------------------------------------------------
  // Tenants
  // -------------------------------------------------------------------------

  private membershipOf(userId: string, instanceId: string): MembershipRow | undefined {
    return [...this.memberships.values()].find(
      (row) => row.user_id === userId && row.instance_id === instanceId,
    );
  }

  async findMembership(userId: string, instanceId: string): Promise<MembershipWithInstance | null> {
    await tick();
    const membership = this.membershipOf(userId, instanceId);
    const instance = this.instances.get(instanceId);
    if (!membership || !instance) return null;
    return { membership: copy(membership), instance: copy(instance) };
  }

  async listInstancesForUser(userId: string) {
    await tick();
    return [...this.memberships.values()]
      .filter((row) => row.user_id === userId && row.is_active)
      .flatMap((row) => {
        const instance = this.instances.get(row.instance_id);
        return instance ? [{ instance: copy(instance), role: row.role }] : [];
      })
      .sort((a, b) => a.instance.created_at.getTime() - b.instance.created_at.getTime());
  }

  async findInstanceById(instanceId: string) {
    await tick();
    const row = this.instances.get(instanceId);
    return row ? copy(row) : null;
  }

  async createInstanceWithOwner(input: { name: string; slug: string; ownerId: string }) {
    await tick();
    if ([...this.instances.values()].some((row) => row.slug === input.slug)) return null;
    const instance = this.seedInstance({ name: input.name, slug: input.slug, status: "trial" });
    this.seedMembership(instance.id, input.ownerId, "owner");
    return instance;
  }

  async listMembers(instanceId: string): Promise<MemberView[]> {
    await tick();
    return [...this.memberships.values()]
      .filter((row) => row.instance_id === instanceId)
      .sort((a, b) => a.created_at.getTime() - b.created_at.getTime())
      .flatMap((row) => {
        const user = this.users.get(row.user_id);
        if (!user) return [];
        return [
          {
            user_id: user.id,
            email: user.email,
            name: user.name,
            role: row.role,
            is_active: row.is_active,
            joined_at: row.created_at,
          },
        ];
      });
  }

  async addMember(input: { instanceId: string; userId: string; role: MembershipRole }) {
    await tick();
    if (this.membershipOf(input.userId, input.instanceId)) return null;
    return this.seedMembership(input.instanceId, input.userId, input.role);
  }

  async removeMember(instanceId: string, userId: string) {
    await tick();
    const row = this.membershipOf(userId, instanceId);
    if (!row) return false;
    this.memberships.delete(row.id);
    return true;
  }

  // -------------------------------------------------------------------------
  // Housekeeping
  // -------------------------------------------------------------------------

  async purgeExpiredBefore(cutoff: Date): Promise<PurgeCounts> {
    await tick();
    const before = (date: Date | null) => date !== null && date.getTime() < cutoff.getTime();
    const purge = <T extends { id: string }>(
      table: Map<string, T>,
      expired: (row: T) => boolean,
    ): number => {
      let count = 0;
      for (const row of [...table.values()]) {
        if (expired(row)) {
          table.delete(row.id);
          count++;
        }
      }
      return count;
    };

    return {
      otp_challenges: purge(this.challenges, (row) => before(row.expires_at)),
      magic_links: purge(this.magicLinks, (row) => before(row.expires_at)),
      phone_verifications: purge(this.phoneVerifications, (row) => before(row.expires_at)),
      sessions: purge(this.sessions, (row) => before(row.expires_at) || before(row.revoked_at)),
    };
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async health(): Promise<StoreHealth> {
    return this.healthy ? { ok: true } : { ok: false, error: "store_unavailable" };
  }

  async close() {
    this.closed = true;
  }
}
