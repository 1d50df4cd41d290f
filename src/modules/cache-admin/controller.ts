import { Request, Response, NextFunction } from "express";
import { AppError, ErrorCode } from "../../shared/errors/AppError";
import { UnitOfWork } from "../tenancy/context/TenantContext";
import { TenantCacheManager } from "../tenancy/cache/TenantCacheManager";
import {
  TenantAccessValidator,
  TenantGuard,
  createTenantGuard,
} from "../tenancy/validation/TenantAccessValidator";
import { CACHE_ADMIN_COMPONENT } from "./guards";
import { EvictTenantCacheBody, TenantCacheParams } from "./schemas";
import "../../types/express";

function requireUnitOfWork(req: Request): UnitOfWork {
  if (!req.unitOfWork) {
    throw AppError.fromErrorCode(
      ErrorCode.INTERNAL_SERVER_ERROR,
      "Unit of work middleware is not installed",
    );
  }
  return req.unitOfWork;
}

export class CacheAdminController {
  private readonly guard: TenantGuard;

  constructor(
    private readonly cacheManager: TenantCacheManager,
    validator: TenantAccessValidator,
  ) {
    this.guard = createTenantGuard(validator, CACHE_ADMIN_COMPONENT);
  }

  async getMetrics(req: Request<TenantCacheParams>, res: Response, next: NextFunction) {
    try {
      const { tenantId } = req.params;
      await this.guard(requireUnitOfWork(req), "getMetrics", { tenantId });
      const metrics = this.cacheManager.getMetricsForTenant(tenantId);
      res.status(200).json({ success: true, data: metrics });
    } catch (error) {
      next(error);
    }
  }

  async getHealth(req: Request<TenantCacheParams>, res: Response, next: NextFunction) {
    try {
      const { tenantId } = req.params;
      await this.guard(requireUnitOfWork(req), "getHealth", { tenantId });
      res.status(200).json({
        success: true,
        data: this.cacheManager.getHealthForTenant(tenantId),
      });
    } catch (error) {
      next(error);
    }
  }

  async getIntegrity(req: Request<TenantCacheParams>, res: Response, next: NextFunction) {
    try {
      const { tenantId } = req.params;
      await this.guard(requireUnitOfWork(req), "getIntegrity", { tenantId });
      const report = await this.cacheManager.inspectIntegrityForTenant(tenantId);
      res.status(200).json({ success: true, data: report });
    } catch (error) {
      next(error);
    }
  }

  async evict(
    req: Request<TenantCacheParams, unknown, EvictTenantCacheBody | undefined>,
    res: Response,
    next: NextFunction,
  ) {
    try {
      const { tenantId } = req.params;
      await this.guard(requireUnitOfWork(req), "evict", { tenantId });

      const cacheName = req.body?.cacheName;
      const data = cacheName
        ? await this.cacheManager.evictCacheForTenant(cacheName, tenantId)
        : await this.cacheManager.evictAllForTenant(tenantId);
      res.status(200).json({ success: true, data });
    } catch (error) {
      next(error);
    }
  }

  async warmUp(req: Request<TenantCacheParams>, res: Response, next: NextFunction) {
    try {
      const { tenantId } = req.params;
      await this.guard(requireUnitOfWork(req), "warmUp", { tenantId });
      const report = await this.cacheManager.warmUpForTenant(tenantId);
      res.status(report.failed.length > 0 ? 207 : 200).json({ success: report.failed.length === 0, data: report });
    } catch (error) {
      next(error);
    }
  }
}
