export * from "./modules/tenancy";
export { createApp } from "./app";
export type { AppDependencies } from "./app";
export { RedisCacheProvider, RedisNamedCache } from "./infrastructure/redis/RedisCacheProvider";
export { RedisService } from "./infrastructure/services/RedisService";
export type { KeyValueStore } from "./infrastructure/services/RedisService";
export { createDatabasePool } from "./infrastructure/database/pool";
export type { Queryable } from "./infrastructure/database/pool";
export { PgCompanyStatusRepository } from "./infrastructure/repositories/PgCompanyStatusRepository";
export { PgEntityOwnershipRepository } from "./infrastructure/repositories/PgEntityOwnershipRepository";
export { PgTenantAuditRepository } from "./infrastructure/repositories/PgTenantAuditRepository";
export {
  PgTenantSession,
  TENANT_SESSION_SETTING,
  clearDatabaseTenantContext,
  getDatabaseTenantContext,
  setDatabaseTenantContext,
} from "./infrastructure/database/tenantSession";
export type { ConnectionPool, PooledConnection } from "./infrastructure/database/tenantSession";
