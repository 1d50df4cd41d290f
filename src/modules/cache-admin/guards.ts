import { ComponentGuardDefinition } from "../tenancy/validation/TenantGuardRegistry";
import { TenantValidationMode } from "../tenancy/validation/TenantValidationDeclaration";

export const CACHE_ADMIN_COMPONENT = "CacheAdministration";

/**
 * A tenant administers only its own caches; the system tenant may
 * administer any tenant's. Warm-up loads data, so it also needs the target
 * tenant to be active.
 */
export const cacheAdminGuards: ComponentGuardDefinition = {
  defaults: {
    mode: TenantValidationMode.VALIDATE_TENANT_ID,
    tenantIdParam: "tenantId",
    allowSystemTenant: true,
    validateTenantStatus: false,
    resourceType: "cache",
  },
  operations: {
    warmUp: {
      mode: TenantValidationMode.VALIDATE_TENANT_ID,
      tenantIdParam: "tenantId",
      allowSystemTenant: true,
      validateTenantStatus: true,
      resourceType: "cache",
      operation: "WARM_UP",
    },
  },
};
