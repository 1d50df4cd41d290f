/**
 * Tenancy Module
 *
 * Tenant context propagation, tenant access validation and tenant-scoped
 * caching.
 */

export * from "./errors/TenantAccessError";
export * from "./context/TenantContext";
export * from "./context/TenantContextService";
export * from "./entities/TenantAware";
export * from "./entities/EntityOwnershipLookup";
export * from "./audit/TenantAuditLog";
export * from "./validation/TenantValidationDeclaration";
export * from "./validation/TenantGuardRegistry";
export * from "./validation/TenantAccessValidator";
export * from "./cache/NamedCache";
export * from "./cache/TenantScopedCache";
export * from "./cache/TenantCacheManager";
