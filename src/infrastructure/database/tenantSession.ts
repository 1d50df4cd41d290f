/**
 * Database session tenant context
 *
 * Mirrors the unit of work's tenant into the Postgres session setting
 * app.current_company_id, which row level security policies read.
 */

import { structuredLogger } from "../../core/logger/structuredLogger";
import { TenantContextService } from "../../modules/tenancy/context/TenantContextService";
import { UnitOfWork, normalizeTenantId } from "../../modules/tenancy/context/TenantContext";
import { Queryable } from "./pool";

export const TENANT_SESSION_SETTING = "app.current_company_id";

/**
 * A checked-out client; release(err) discards it instead of returning it to the pool
 */
export interface PooledConnection extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ConnectionPool {
  connect(): Promise<PooledConnection>;
}

export async function setDatabaseTenantContext(db: Queryable, tenantId: string): Promise<void> {
  await db.query("SELECT set_config($1, $2, false)", [TENANT_SESSION_SETTING, tenantId]);
}

export async function clearDatabaseTenantContext(db: Queryable): Promise<void> {
  await db.query("SELECT set_config($1, $2, false)", [TENANT_SESSION_SETTING, ""]);
}

/**
 * Tenant currently set on the session, or null when unset or not a UUID
 */
export async function getDatabaseTenantContext(db: Queryable): Promise<string | null> {
  const result = await db.query<{ company_id: string | null }>(
    "SELECT current_setting($1, true) AS company_id",
    [TENANT_SESSION_SETTING],
  );
  return normalizeTenantId(result.rows[0]?.company_id);
}

export class PgTenantSession {
  constructor(
    private readonly pool: ConnectionPool,
    private readonly contextService: TenantContextService,
  ) {}

  /**
   * Check out a client carrying the unit of work's tenant, run the work on
   * it and clear the setting before the client goes back to the pool.
   */
  async run<T>(uow: UnitOfWork, work: (db: Queryable) => Promise<T>): Promise<T> {
    const tenantId = this.contextService.getCurrentTenant(uow);
    const client = await this.pool.connect();
    let releaseError: Error | undefined;

    try {
      await setDatabaseTenantContext(client, tenantId);
      structuredLogger.debug("Database tenant context set", {
        tenantId,
        correlationId: uow.id,
        module: "database",
        action: "setDatabaseTenantContext",
      });
      return await work(client);
    } finally {
      try {
        await clearDatabaseTenantContext(client);
      } catch (error) {
        releaseError = error instanceof Error ? error : new Error(String(error));
        structuredLogger.error("Failed to clear database tenant context", releaseError, {
          tenantId,
          correlationId: uow.id,
          module: "database",
          action: "clearDatabaseTenantContext",
        });
      }
      client.release(releaseError);
    }
  }
}
