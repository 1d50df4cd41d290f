/**
 * Tenant-Aware capability
 *
 * Implemented by every record that belongs to exactly one tenant. A record
 * is accessible by its owner; the system tenant reaches it only when the
 * caller passes allowSystemTenant for that specific check.
 */

export interface TenantAccessOptions {
  allowSystemTenant?: boolean;
  systemTenantId?: string;
}

export interface TenantAware {
  ownerTenantId(): string | null;
  isAccessibleBy(tenantId: string, options?: TenantAccessOptions): boolean;
}

export const DEFAULT_SYSTEM_TENANT_ID = "00000000-0000-0000-0000-000000000001";

export function evaluateTenantAccess(
  ownerTenantId: string | null,
  tenantId: string,
  options: TenantAccessOptions = {},
): boolean {
  const requester = tenantId.toLowerCase();
  const systemTenantId = (options.systemTenantId ?? DEFAULT_SYSTEM_TENANT_ID).toLowerCase();

  if (options.allowSystemTenant === true && requester === systemTenantId) {
    return true;
  }
  if (ownerTenantId === null) {
    return false;
  }
  return ownerTenantId.toLowerCase() === requester;
}

export function isTenantAware(value: unknown): value is TenantAware {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "ownerTenantId" in value &&
    typeof value.ownerTenantId === "function" &&
    "isAccessibleBy" in value &&
    typeof value.isAccessibleBy === "function"
  );
}

/**
 * Base class for domain records owned by a company (tenant)
 */
export abstract class TenantOwnedEntity implements TenantAware {
  protected constructor(protected companyId: string | null) {}

  ownerTenantId(): string | null {
    return this.companyId;
  }

  hasTenant(): boolean {
    return this.companyId !== null;
  }

  belongsToTenant(tenantId: string): boolean {
    return this.companyId !== null && this.companyId.toLowerCase() === tenantId.toLowerCase();
  }

  isAccessibleBy(tenantId: string, options?: TenantAccessOptions): boolean {
    return evaluateTenantAccess(this.companyId, tenantId, options);
  }

  describeTenant(): string {
    return `${this.constructor.name}[tenant=${this.companyId ?? "unassigned"}]`;
  }
}
