/**
 * Tenant Cache Manager
 *
 * Per-tenant operations over the named caches: tenant-scoped views,
 * eviction, warm-up, metrics, health and integrity. Entries are isolated
 * by the `t:{tenantId}:` key prefix written by TenantScopedCache.
 *
 * Metric counters are only mutated synchronously on the event loop, so
 * concurrent units of work cannot lose increments.
 */

import { structuredLogger } from "../../../core/logger/structuredLogger";
import { AppError, ErrorCode } from "../../../shared/errors/AppError";
import { UnitOfWork, requireTenantId } from "../context/TenantContext";
import { TenantContextService } from "../context/TenantContextService";
import { CacheProvider, NamedCache, isEnumerableCache } from "./NamedCache";
import {
  TenantCacheMetricsRecorder,
  TenantScopedCache,
  isTenantCacheEnvelope,
  tenantKeyPrefix,
} from "./TenantScopedCache";

export type CacheHealthLevel = "EXCELLENT" | "GOOD" | "FAIR" | "POOR";
export type EvictionPrecision = "PRECISE" | "COARSE";

export interface TenantCacheMetrics {
  tenantId: string;
  hits: number;
  misses: number;
  evictions: number;
  preloads: number;
  errors: number;
  lastUpdated: Date;
}

export interface TenantCacheHealth {
  tenantId: string;
  level: CacheHealthLevel;
  hitRatio: number;
  totalOps: number;
  evictions: number;
  errors: number;
  healthy: boolean;
  evictionPrecision: EvictionPrecision;
}

export interface CacheEvictionResult {
  cacheName: string;
  tenantId: string;
  precision: EvictionPrecision;
  /** Entries removed; null when the whole cache was cleared */
  removedEntries: number | null;
}

export interface TenantEvictionReport {
  tenantId: string;
  caches: CacheEvictionResult[];
  failed: Array<{ cacheName: string; error: string }>;
}

export interface CacheIntegrityViolation {
  cacheName: string;
  key: string;
  storedTenantId: string | null;
}

export interface CacheIntegrityReport {
  tenantId: string;
  valid: boolean;
  checkedEntries: number;
  violations: CacheIntegrityViolation[];
  unverifiableCaches: string[];
}

export interface WarmUpReport {
  tenantId: string;
  warmers: string[];
  failed: Array<{ warmer: string; error: string }>;
}

/**
 * Access handed to warmers and request handlers: tenant-scoped views of
 * the named caches for one unit of work.
 */
export interface TenantCacheAccess {
  getCache(name: string): TenantScopedCache;
  getCacheNames(): string[];
}

export type CacheWarmer = (caches: TenantCacheAccess, uow: UnitOfWork) => Promise<void>;

export interface TenantCacheManagerOptions {
  warmers?: Record<string, CacheWarmer>;
  now?: () => Date;
}

const logger = structuredLogger.child({ module: "tenant-cache" });

export function classifyHitRatio(hitRatio: number): CacheHealthLevel {
  if (hitRatio > 0.8) return "EXCELLENT";
  if (hitRatio > 0.6) return "GOOD";
  if (hitRatio > 0.4) return "FAIR";
  return "POOR";
}

export class TenantCacheManager implements TenantCacheMetricsRecorder {
  private readonly metrics = new Map<string, TenantCacheMetrics>();
  private readonly warmers = new Map<string, CacheWarmer>();
  private readonly now: () => Date;

  constructor(
    private readonly provider: CacheProvider,
    private readonly contextService: TenantContextService,
    options: TenantCacheManagerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    for (const [name, warmer] of Object.entries(options.warmers ?? {})) {
      this.warmers.set(name, warmer);
    }
  }

  registerWarmer(name: string, warmer: CacheWarmer): this {
    this.warmers.set(name, warmer);
    return this;
  }

  forUnitOfWork(uow: UnitOfWork): TenantCacheAccess {
    return this.createAccess(uow, false);
  }

  // ---------------------------------------------------------------------------
  // Eviction
  // ---------------------------------------------------------------------------

  /**
   * Evict the tenant's entries from every cache and reset its metrics. A
   * failing cache does not stop the others; when any failed, the error
   * raised afterwards carries the full report.
   */
  async evictAllForTenant(tenantId: string): Promise<TenantEvictionReport> {
    const normalized = requireTenantId(tenantId);
    const caches: CacheEvictionResult[] = [];
    const failed: TenantEvictionReport["failed"] = [];

    for (const name of this.provider.getCacheNames()) {
      try {
        caches.push(await this.evictCache(this.requireCache(name), normalized));
      } catch (error) {
        failed.push({ cacheName: name, error: error instanceof Error ? error.message : String(error) });
      }
    }

    this.metrics.delete(normalized);

    if (failed.length > 0) {
      const names = failed.map((failure) => failure.cacheName).join(", ");
      throw AppError.fromErrorCode(
        ErrorCode.CACHE_EVICTION_FAILED,
        `Cache eviction failed for tenant ${normalized}: ${names}`,
        { tenantId: normalized, caches, failed },
      );
    }

    logger.info("Evicted all caches for tenant", {
      action: "evictAllForTenant",
      metadata: { tenantId: normalized, caches: caches.length },
    });
    return { tenantId: normalized, caches, failed };
  }

  async evictCacheForTenant(cacheName: string, tenantId: string): Promise<CacheEvictionResult> {
    const normalized = requireTenantId(tenantId);
    return this.evictCache(this.requireCache(cacheName), normalized);
  }

  async evictAllForCurrentTenant(uow: UnitOfWork): Promise<TenantEvictionReport> {
    return this.evictAllForTenant(this.contextService.getCurrentTenant(uow));
  }

  async evictCacheForCurrentTenant(uow: UnitOfWork, cacheName: string): Promise<CacheEvictionResult> {
    return this.evictCacheForTenant(cacheName, this.contextService.getCurrentTenant(uow));
  }

  private async evictCache(cache: NamedCache, tenantId: string): Promise<CacheEvictionResult> {
    try {
      if (isEnumerableCache(cache)) {
        const keys = await cache.keys(tenantKeyPrefix(tenantId));
        for (const key of keys) {
          await cache.evict(key);
        }
        this.recordEviction(tenantId);
        return { cacheName: cache.name, tenantId, precision: "PRECISE", removedEntries: keys.length };
      }

      logger.warn("Cache cannot enumerate keys, clearing it for every tenant", {
        action: "evictCacheForTenant",
        metadata: { tenantId, cache: cache.name },
      });
      await cache.clear();
      this.recordEviction(tenantId);
      return { cacheName: cache.name, tenantId, precision: "COARSE", removedEntries: null };
    } catch (error) {
      this.recordError(tenantId);
      logger.error(
        "Failed to evict tenant cache entries",
        error instanceof Error ? error : new Error(String(error)),
        { action: "evictCacheForTenant", metadata: { tenantId, cache: cache.name } },
      );
      throw error;
    }
  }

  // ---------------------------------------------------------------------------
  // Warm-up
  // ---------------------------------------------------------------------------

  /**
   * Run every registered warmer as the tenant on a dedicated unit of work.
   * A failing warmer is counted and reported; the others still run.
   */
  async warmUpForTenant(tenantId: string): Promise<WarmUpReport> {
    const normalized = requireTenantId(tenantId);
    const uow = this.contextService.beginUnitOfWork(`cache-warm-up:${normalized}`);
    const failed: WarmUpReport["failed"] = [];

    try {
      await this.contextService.executeWithTenant(uow, normalized, async (scoped) => {
        const access = this.createAccess(scoped, true);
        for (const [name, warmer] of this.warmers) {
          try {
            await warmer(access, scoped);
          } catch (error) {
            const err = error instanceof Error ? error : new Error(String(error));
            this.recordError(normalized);
            logger.error("Cache warmer failed", err, {
              action: "warmUpForTenant",
              metadata: { tenantId: normalized, warmer: name },
            });
            failed.push({ warmer: name, error: err.message });
          }
        }
      });
    } finally {
      this.contextService.endUnitOfWork(uow);
    }

    logger.info("Cache warm-up completed", {
      action: "warmUpForTenant",
      metadata: { tenantId: normalized, warmers: this.warmers.size, failed: failed.length },
    });
    return { tenantId: normalized, warmers: [...this.warmers.keys()], failed };
  }

  // ---------------------------------------------------------------------------
  // Metrics and health
  // ---------------------------------------------------------------------------

  getMetricsForTenant(tenantId: string): TenantCacheMetrics {
    const normalized = requireTenantId(tenantId);
    const metrics = this.metrics.get(normalized);
    return metrics ? { ...metrics } : this.emptyMetrics(normalized);
  }

  getMetricsForCurrentTenant(uow: UnitOfWork): TenantCacheMetrics {
    return this.getMetricsForTenant(this.contextService.getCurrentTenant(uow));
  }

  clearAllMetrics(): void {
    this.metrics.clear();
  }

  getHealthForTenant(tenantId: string): TenantCacheHealth {
    const metrics = this.getMetricsForTenant(tenantId);
    const totalOps = metrics.hits + metrics.misses;
    const hitRatio = totalOps === 0 ? 0 : metrics.hits / totalOps;
    const level = classifyHitRatio(hitRatio);

    return {
      tenantId: metrics.tenantId,
      level,
      hitRatio,
      totalOps,
      evictions: metrics.evictions,
      errors: metrics.errors,
      healthy: level === "EXCELLENT" || level === "GOOD",
      evictionPrecision: this.evictionPrecision(),
    };
  }

  recordHit(tenantId: string): void {
    this.mutate(tenantId, (m) => m.hits++);
  }

  recordMiss(tenantId: string): void {
    this.mutate(tenantId, (m) => m.misses++);
  }

  recordPreload(tenantId: string): void {
    this.mutate(tenantId, (m) => m.preloads++);
  }

  recordError(tenantId: string): void {
    this.mutate(tenantId, (m) => m.errors++);
  }

  recordEviction(tenantId: string): void {
    this.mutate(tenantId, (m) => m.evictions++);
  }

  // ---------------------------------------------------------------------------
  // Integrity
  // ---------------------------------------------------------------------------

  /**
   * Check that every entry addressable under the tenant's prefix is owned by
   * the tenant. Caches that cannot enumerate keys are reported unverifiable.
   */
  async inspectIntegrityForTenant(tenantId: string): Promise<CacheIntegrityReport> {
    const normalized = requireTenantId(tenantId);
    const prefix = tenantKeyPrefix(normalized);
    const violations: CacheIntegrityViolation[] = [];
    const unverifiableCaches: string[] = [];
    let checkedEntries = 0;

    for (const name of this.provider.getCacheNames()) {
      const cache = this.requireCache(name);
      if (!isEnumerableCache(cache)) {
        unverifiableCaches.push(name);
        continue;
      }

      try {
        for (const key of await cache.keys(prefix)) {
          const stored = await cache.get<unknown>(key);
          if (stored === undefined) {
            continue;
          }
          checkedEntries++;
          if (!isTenantCacheEnvelope(stored) || stored.tenantId !== normalized) {
            violations.push({
              cacheName: name,
              key,
              storedTenantId: isTenantCacheEnvelope(stored) ? stored.tenantId : null,
            });
          }
        }
      } catch (error) {
        this.recordError(normalized);
        logger.error(
          "Cache integrity inspection failed",
          error instanceof Error ? error : new Error(String(error)),
          { action: "inspectIntegrityForTenant", metadata: { tenantId: normalized, cache: name } },
        );
        unverifiableCaches.push(name);
      }
    }

    if (violations.length > 0) {
      structuredLogger.logSecurity("CACHE_INTEGRITY_VIOLATION", {
        tenantId: normalized,
        severity: "CRITICAL",
        metadata: { violations: violations.length },
      });
    }

    return {
      tenantId: normalized,
      valid: violations.length === 0 && unverifiableCaches.length === 0,
      checkedEntries,
      violations,
      unverifiableCaches,
    };
  }

  async validateIntegrityForTenant(tenantId: string): Promise<boolean> {
    const report = await this.inspectIntegrityForTenant(tenantId);
    return report.valid;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private createAccess(uow: UnitOfWork, preload: boolean): TenantCacheAccess {
    return {
      getCache: (name) =>
        new TenantScopedCache(this.requireCache(name), this.contextService, uow, this, { preload }),
      getCacheNames: () => this.provider.getCacheNames(),
    };
  }

  private requireCache(name: string): NamedCache {
    const cache = this.provider.getCache(name);
    if (!cache) {
      throw AppError.fromErrorCode(ErrorCode.CACHE_NOT_FOUND, `Cache not found: ${name}`, {
        cacheName: name,
      });
    }
    return cache;
  }

  private evictionPrecision(): EvictionPrecision {
    const coarse = this.provider
      .getCacheNames()
      .some((name) => {
        const cache = this.provider.getCache(name);
        return cache !== undefined && !isEnumerableCache(cache);
      });
    return coarse ? "COARSE" : "PRECISE";
  }

  private emptyMetrics(tenantId: string): TenantCacheMetrics {
    return {
      tenantId,
      hits: 0,
      misses: 0,
      evictions: 0,
      preloads: 0,
      errors: 0,
      lastUpdated: this.now(),
    };
  }

  private mutate(tenantId: string, update: (metrics: TenantCacheMetrics) => void): void {
    let metrics = this.metrics.get(tenantId);
    if (!metrics) {
      metrics = this.emptyMetrics(tenantId);
      this.metrics.set(tenantId, metrics);
    }
    update(metrics);
    metrics.lastUpdated = this.now();
  }
}
