import { TenantProfile, TenantStatusLookup } from "../../modules/tenancy/context/TenantContextService";
import { Queryable } from "../database/pool";

export type CompanyStatus =
  | "ACTIVE"
  | "INACTIVE"
  | "SUSPENDED"
  | "TRIAL"
  | "PENDING_SETUP";

interface CompanyStatusRow {
  status: CompanyStatus;
  is_active: boolean;
  deleted_at: Date | null;
}

interface CompanyProfileRow {
  name: string;
  status: CompanyStatus;
  subscription_plan: SubscriptionPlan | null;
}

export type SubscriptionPlan = "FREE" | "BASIC" | "PROFESSIONAL" | "ENTERPRISE";

export interface CompanyStatusRecord {
  id: string;
  status: CompanyStatus;
  isActive: boolean;
  deleted: boolean;
}

/**
 * Company registry lookups backing tenant status validation
 */
export class PgCompanyStatusRepository implements TenantStatusLookup {
  constructor(private readonly db: Queryable) {}

  async findStatus(companyId: string): Promise<CompanyStatusRecord | null> {
    const result = await this.db.query<CompanyStatusRow>(
      `SELECT status, is_active, deleted_at FROM companies WHERE id = $1`,
      [companyId],
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      id: companyId,
      status: row.status,
      isActive: row.is_active,
      deleted: row.deleted_at !== null,
    };
  }

  async findProfile(companyId: string): Promise<TenantProfile | null> {
    const result = await this.db.query<CompanyProfileRow>(
      `SELECT name, status, subscription_plan FROM companies WHERE id = $1 AND deleted_at IS NULL`,
      [companyId],
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      name: row.name,
      status: row.status,
      subscriptionPlan: row.subscription_plan,
    };
  }

  /**
   * A company may operate only when it exists, is flagged active, has
   * status ACTIVE and is not soft-deleted.
   */
  async isActive(tenantId: string): Promise<boolean> {
    const record = await this.findStatus(tenantId);
    return (
      record !== null &&
      record.isActive &&
      record.status === "ACTIVE" &&
      !record.deleted
    );
  }
}
