/**
 * Tenant Scoped Cache
 *
 * View of a named cache bound to one unit of work. Every call resolves the
 * unit of work's current tenant from the context service; a view for the
 * scope handed out by executeWithTenant reads and writes that tenant's entries.
 *
 * undefined is reserved for "not cached" and cannot be stored.
 */

import { structuredLogger } from "../../../core/logger/structuredLogger";
import { AppError, ErrorCode } from "../../../shared/errors/AppError";
import type { UnitOfWork } from "../context/TenantContext";
import type { TenantContextService } from "../context/TenantContextService";
import type { NamedCache } from "./NamedCache";

export interface TenantCacheEnvelope<T> {
  tenantId: string;
  value: T;
}

export interface TenantCacheMetricsRecorder {
  recordHit(tenantId: string): void;
  recordMiss(tenantId: string): void;
  recordPreload(tenantId: string): void;
  recordError(tenantId: string): void;
}

export function tenantKeyPrefix(tenantId: string): string {
  return `t:${tenantId}:`;
}

export function isTenantCacheEnvelope(value: unknown): value is TenantCacheEnvelope<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "tenantId" in value &&
    typeof value.tenantId === "string" &&
    "value" in value
  );
}

export interface TenantScopedCacheOptions {
  /** Count puts as preloads (set while warming up) */
  preload?: boolean;
}

export class TenantScopedCache {
  constructor(
    private readonly delegate: NamedCache,
    private readonly contextService: TenantContextService,
    private readonly uow: UnitOfWork,
    private readonly metrics: TenantCacheMetricsRecorder,
    private readonly options: TenantScopedCacheOptions = {},
  ) {}

  get name(): string {
    return this.delegate.name;
  }

  async get<T>(key: string): Promise<T | undefined> {
    const tenantId = this.contextService.getCurrentTenant(this.uow);

    let stored: TenantCacheEnvelope<T> | undefined;
    try {
      stored = await this.delegate.get<TenantCacheEnvelope<T>>(tenantKeyPrefix(tenantId) + key);
    } catch (error) {
      this.metrics.recordError(tenantId);
      structuredLogger.warn("Failed to read tenant cache entry", {
        tenantId,
        module: "tenant-cache",
        action: "get",
        metadata: { cache: this.name, key, error: errorMessage(error) },
      });
      return undefined;
    }

    if (stored === undefined) {
      this.metrics.recordMiss(tenantId);
      return undefined;
    }

    if (!isTenantCacheEnvelope(stored) || stored.tenantId !== tenantId || stored.value === undefined) {
      this.metrics.recordError(tenantId);
      this.metrics.recordMiss(tenantId);
      structuredLogger.logSecurity("CACHE_TENANT_MISMATCH", {
        tenantId,
        severity: "HIGH",
        metadata: {
          cache: this.name,
          key,
          storedTenantId: isTenantCacheEnvelope(stored) ? stored.tenantId : null,
        },
      });
      return undefined;
    }

    this.metrics.recordHit(tenantId);
    return stored.value;
  }

  async put(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const tenantId = this.contextService.getCurrentTenant(this.uow);
    if (value === undefined) {
      throw AppError.fromErrorCode(ErrorCode.VALIDATION_ERROR, "Cannot cache an undefined value", {
        cacheName: this.name,
        key,
      });
    }
    const envelope: TenantCacheEnvelope<unknown> = { tenantId, value };

    try {
      await this.delegate.put(tenantKeyPrefix(tenantId) + key, envelope, ttlSeconds);
    } catch (error) {
      this.metrics.recordError(tenantId);
      structuredLogger.warn("Failed to write tenant cache entry", {
        tenantId,
        module: "tenant-cache",
        action: "put",
        metadata: { cache: this.name, key, error: errorMessage(error) },
      });
      return;
    }

    if (this.options.preload) {
      this.metrics.recordPreload(tenantId);
    }
  }

  async evict(key: string): Promise<boolean> {
    const tenantId = this.contextService.getCurrentTenant(this.uow);
    return this.delegate.evict(tenantKeyPrefix(tenantId) + key);
  }

  /**
   * Return the cached value, loading and caching it on a miss. A loader
   * result of undefined is returned without being cached.
   */
  async getOrLoad<T>(key: string, loader: () => Promise<T>, ttlSeconds?: number): Promise<T> {
    const cached = await this.get<T>(key);
    if (cached !== undefined) {
      return cached;
    }
    const loaded = await loader();
    if (loaded !== undefined) {
      await this.put(key, loaded, ttlSeconds);
    }
    return loaded;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
