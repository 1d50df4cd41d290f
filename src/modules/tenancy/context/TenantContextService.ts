/**
 * Tenant Context Service
 *
 * Owns the lifecycle of the tenant context on a unit of work: setting it,
 * reading it, scoped switching (executeWithTenant) and tenant status checks
 * against the company registry.
 */

import { structuredLogger } from "../../../core/logger/structuredLogger";
import { NoTenantContextError } from "../errors/TenantAccessError";
import {
  TenantContext,
  UnitOfWork,
  createTenantContext,
  requireTenantId,
} from "./TenantContext";

/**
 * Collaborator answering whether a tenant may currently operate
 * (exists, active, not deleted).
 */
export interface TenantStatusLookup {
  isActive(tenantId: string): Promise<boolean>;
  /** Descriptive company data; lookups without it report the tenant as unknown */
  findProfile?(tenantId: string): Promise<TenantProfile | null>;
}

export interface TenantProfile {
  name: string;
  status: string;
  subscriptionPlan: string | null;
}

export interface TenantInfo {
  tenantId: string;
  companyName: string;
  status: string | null;
  subscriptionPlan: string | null;
  isSystemTenant: boolean;
  accessible: boolean;
}

export interface TenantStatusResult {
  tenantId: string;
  active: boolean;
  reason?: string;
}

export interface TenantContextServiceOptions {
  systemTenantId: string;
  statusLookupTimeoutMs: number;
}

export type TenantScopedWork<T> = (uow: UnitOfWork) => T | Promise<T>;

export class TenantContextService {
  private readonly options: TenantContextServiceOptions;
  private readonly systemTenantId: string;

  constructor(
    private readonly statusLookup: TenantStatusLookup,
    options: Partial<TenantContextServiceOptions> = {},
  ) {
    this.options = {
      systemTenantId: "00000000-0000-0000-0000-000000000001",
      statusLookupTimeoutMs: 2000,
      ...options,
    };
    this.systemTenantId = requireTenantId(this.options.systemTenantId);
  }

  getSystemTenantId(): string {
    return this.systemTenantId;
  }

  beginUnitOfWork(label?: string): UnitOfWork {
    return new UnitOfWork(label);
  }

  endUnitOfWork(uow: UnitOfWork): void {
    uow.end();
  }

  /**
   * Replace the active tenant context of the unit of work
   */
  setCurrentTenant(uow: UnitOfWork, tenantId: string): TenantContext {
    const context = createTenantContext(
      requireTenantId(tenantId),
      this.systemTenantId,
    );
    uow.install(context);
    structuredLogger.debug("Tenant context set", {
      tenantId: context.tenantId,
      module: "tenant-context",
      correlationId: uow.id,
      action: "setCurrentTenant",
    });
    return context;
  }

  getCurrentContext(uow: UnitOfWork): TenantContext {
    const context = uow.context;
    if (!context) {
      throw new NoTenantContextError();
    }
    return context;
  }

  getCurrentTenant(uow: UnitOfWork): string {
    return this.getCurrentContext(uow).tenantId;
  }

  hasTenantContext(uow: UnitOfWork): boolean {
    return uow.context !== null;
  }

  isSystemTenant(uow: UnitOfWork): boolean {
    return uow.context?.isSystemTenant ?? false;
  }

  /**
   * Move the unit of work to another tenant, but only when that tenant may
   * operate. Returns false and leaves the context untouched otherwise.
   */
  async switchTenant(uow: UnitOfWork, tenantId: string): Promise<boolean> {
    const target = requireTenantId(tenantId);
    const status = await this.checkTenantStatus(target);
    if (!status.active) {
      structuredLogger.warn("Cannot switch to an inactive tenant", {
        tenantId: target,
        correlationId: uow.id,
        module: "tenant-context",
        action: "switchTenant",
        metadata: { reason: status.reason },
      });
      return false;
    }

    const previousTenantId = uow.context?.tenantId;
    this.setCurrentTenant(uow, target);
    structuredLogger.info("Switched tenant", {
      tenantId: target,
      correlationId: uow.id,
      module: "tenant-context",
      action: "switchTenant",
      metadata: { previousTenantId },
    });
    return true;
  }

  async getTenantInfo(uow: UnitOfWork): Promise<TenantInfo> {
    const context = this.getCurrentContext(uow);
    const profile = this.statusLookup.findProfile
      ? await this.statusLookup.findProfile(context.tenantId)
      : null;
    const status = await this.checkTenantStatus(context.tenantId);

    return {
      tenantId: context.tenantId,
      companyName: profile?.name ?? "Unknown",
      status: profile?.status ?? null,
      subscriptionPlan: profile?.subscriptionPlan ?? null,
      isSystemTenant: context.isSystemTenant,
      accessible: status.active,
    };
  }

  clearTenantContext(uow: UnitOfWork): void {
    uow.install(null);
  }

  belongsToCurrentTenant(uow: UnitOfWork, resourceTenantId: string | null): boolean {
    const context = uow.context;
    if (!context || resourceTenantId === null) {
      return false;
    }
    return context.tenantId === resourceTenantId.toLowerCase();
  }

  /**
   * Ask the company registry whether the tenant may operate. Lookup errors
   * and timeouts resolve to an inactive result.
   */
  async checkTenantStatus(tenantId: string): Promise<TenantStatusResult> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new Error(
              `Tenant status lookup timed out after ${this.options.statusLookupTimeoutMs}ms`,
            ),
          ),
        this.options.statusLookupTimeoutMs,
      );
    });

    try {
      const active = await Promise.race([
        this.statusLookup.isActive(tenantId),
        timeout,
      ]);
      return active
        ? { tenantId, active: true }
        : { tenantId, active: false, reason: "Tenant is not active" };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      structuredLogger.error("Tenant status lookup failed", err, {
        tenantId,
        module: "tenant-context",
        action: "checkTenantStatus",
      });
      return {
        tenantId,
        active: false,
        reason: `Tenant status could not be verified: ${err.message}`,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  async validateTenantAccess(tenantId: string): Promise<boolean> {
    const result = await this.checkTenantStatus(requireTenantId(tenantId));
    return result.active;
  }

  async validateCurrentTenantAccess(uow: UnitOfWork): Promise<boolean> {
    return this.validateTenantAccess(this.getCurrentTenant(uow));
  }

  /**
   * Run work as the given tenant on a child scope of the unit of work. The
   * caller's unit of work keeps its own context throughout, and the scope
   * ends when the work settles, whichever way it settles.
   */
  async executeWithTenant<T>(
    uow: UnitOfWork,
    tenantId: string,
    work: TenantScopedWork<T>,
  ): Promise<T> {
    const context = createTenantContext(
      requireTenantId(tenantId),
      this.systemTenantId,
    );
    const scope = uow.openScope(context);

    structuredLogger.debug("Entered tenant scope", {
      tenantId: context.tenantId,
      correlationId: uow.id,
      module: "tenant-context",
      action: "executeWithTenant",
      metadata: { scope: scope.id, depth: scope.depth, previousTenantId: uow.context?.tenantId },
    });

    try {
      return await work(scope);
    } finally {
      scope.end();
    }
  }

  async executeWithSystemTenant<T>(
    uow: UnitOfWork,
    work: TenantScopedWork<T>,
  ): Promise<T> {
    return this.executeWithTenant(uow, this.systemTenantId, work);
  }
}
