import { EntityOwnershipLookup } from "../../modules/tenancy/entities/EntityOwnershipLookup";
import { TenantGuardConfigurationError } from "../../modules/tenancy/errors/TenantAccessError";
import { Queryable } from "../database/pool";

/**
 * Resource type to the table holding it. Table names never come from
 * callers, only from this map.
 */
export const DEFAULT_OWNERSHIP_TABLES: Readonly<Record<string, string>> = {
  asset: "assets",
  workOrder: "work_orders",
  school: "schools",
  report: "reports",
  user: "users",
};

interface OwnershipRow {
  id: string;
  company_id: string;
}

export class PgEntityOwnershipRepository implements EntityOwnershipLookup {
  constructor(
    private readonly db: Queryable,
    private readonly tables: Readonly<Record<string, string>> = DEFAULT_OWNERSHIP_TABLES,
  ) {}

  async findOwners(resourceType: string, ids: readonly string[]): Promise<Map<string, string>> {
    const table = Object.prototype.hasOwnProperty.call(this.tables, resourceType)
      ? this.tables[resourceType]
      : undefined;
    if (table === undefined) {
      throw new TenantGuardConfigurationError(
        `No ownership table is mapped for resource type '${resourceType}'`,
      );
    }

    const owners = new Map<string, string>();
    if (ids.length === 0) {
      return owners;
    }

    const result = await this.db.query<OwnershipRow>(
      `SELECT id, company_id FROM ${table} WHERE id = ANY($1::uuid[]) AND deleted_at IS NULL`,
      [[...ids]],
    );

    for (const row of result.rows) {
      owners.set(String(row.id).toLowerCase(), String(row.company_id).toLowerCase());
    }
    return owners;
  }
}
