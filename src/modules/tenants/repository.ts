// src/modules/tenants/repository.ts
// ============================================================================
// Persistence-Layer für Instanzen + Mitgliedschaften
// ----------------------------------------------------------------------------
// - KEINE Business-Logik, nur Datenzugriff
// - Jede Mitglieder-Query filtert explizit auf instance_id
// ============================================================================

import { isUniqueViolation, withTransaction, type DbPool } from "../../libs/db.js";
import type {
  InstanceRow,
  MemberView,
  MembershipRole,
  MembershipRow,
  MembershipWithInstance,
  TenantRepository,
} from "./types.js";

const INSTANCE_COLUMNS = `id, name, slug, status, created_at, updated_at`;
const MEMBERSHIP_COLUMNS = `id, instance_id, user_id, role, is_active, created_at`;

type MembershipJoinRow = {
  m_id: string;
  m_instance_id: string;
  m_user_id: string;
  m_role: MembershipRole;
  m_is_active: boolean;
  m_created_at: Date;
} & InstanceRow;

export function createPgTenantRepository(pool: DbPool): TenantRepository {
  return {
    async findMembership(userId: string, instanceId: string) {
      const { rows } = await pool.query<MembershipJoinRow>(
        `
          SELECT
            m.id          AS m_id,
            m.instance_id AS m_instance_id,
            m.user_id     AS m_user_id,
            m.role        AS m_role,
            m.is_active   AS m_is_active,
            m.created_at  AS m_created_at,
            i.id,
            i.name,
            i.slug,
            i.status,
            i.created_at,
            i.updated_at
          FROM auth.instance_memberships m
          JOIN auth.instances i
            ON i.id = m.instance_id
          WHERE m.user_id = $1
            AND m.instance_id = $2
          LIMIT 1;
        `,
        [userId, instanceId],
      );

      const row = rows[0];
      if (!row) return null;

      const result: MembershipWithInstance = {
        membership: {
          id: row.m_id,
          instance_id: row.m_instance_id,
          user_id: row.m_user_id,
          role: row.m_role,
          is_active: row.m_is_active,
          created_at: row.m_created_at,
        },
        instance: {
          id: row.id,
          name: row.name,
          slug: row.slug,
          status: row.status,
          created_at: row.created_at,
          updated_at: row.updated_at,
        },
      };
      return result;
    },

    async listInstancesForUser(userId: string) {
      const { rows } = await pool.query<InstanceRow & { role: MembershipRole }>(
        `
          SELECT
            i.id,
            i.name,
            i.slug,
            i.status,
            i.created_at,
            i.updated_at,
            m.role
          FROM auth.instance_memberships m
          JOIN auth.instances i
            ON i.id = m.instance_id
          WHERE m.user_id = $1
            AND m.is_active = true
          ORDER BY i.created_at ASC;
        `,
        [userId],
      );

      return rows.map(({ role, ...instance }) => ({ instance, role }));
    },

    async findInstanceById(instanceId: string) {
      const { rows } = await pool.query<InstanceRow>(
        `SELECT ${INSTANCE_COLUMNS} FROM auth.instances WHERE id = $1 LIMIT 1;`,
        [instanceId],
      );
      return rows[0] ?? null;
    },

    async createInstanceWithOwner(input) {
      try {
        return await withTransaction(pool, async (client) => {
          const { rows } = await client.query<InstanceRow>(
            `
              INSERT INTO auth.instances (name, slug, status)
              VALUES ($1, $2, 'trial')
              RETURNING ${INSTANCE_COLUMNS};
            `,
            [input.name, input.slug],
          );
          const instance = rows[0];

          await client.query(
            `
              INSERT INTO auth.instance_memberships (instance_id, user_id, role)
              VALUES ($1, $2, 'owner');
            `,
            [instance.id, input.ownerId],
          );

          return instance;
        });
      } catch (err) {
        if (isUniqueViolation(err, "instances_slug_key")) return null;
        throw err;
      }
    },

    async listMembers(instanceId: string) {
      const { rows } = await pool.query<MemberView>(
        `
          SELECT
            u.id         AS user_id,
            u.email,
            u.name,
            m.role,
            m.is_active,
            m.created_at AS joined_at
          FROM auth.instance_memberships m
          JOIN auth.users u
            ON u.id = m.user_id
          WHERE m.instance_id = $1
          ORDER BY m.created_at ASC;
        `,
        [instanceId],
      );
      return rows;
    },

    async addMember(input) {
      const { rows } = await pool.query<MembershipRow>(
        `
          INSERT INTO auth.instance_memberships (instance_id, user_id, role)
          VALUES ($1, $2, $3)
          ON CONFLICT ON CONSTRAINT instance_memberships_pair_key DO NOTHING
          RETURNING ${MEMBERSHIP_COLUMNS};
        `,
        [input.instanceId, input.userId, input.role],
      );
      return rows[0] ?? null;
    },

    async removeMember(instanceId: string, userId: string) {
      const res = await pool.query(
        `
          DELETE FROM auth.instance_memberships
          WHERE instance_id = $1
            AND user_id = $2;
        `,
        [instanceId, userId],
      );
      return (res.rowCount ?? 0) > 0;
    },
  };
}
