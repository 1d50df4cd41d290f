/**
 * Cache Administration Routes
 *
 * Operational endpoints over one tenant's cache entries:
 * - GET  /tenants/:tenantId/metrics   - Hit/miss/eviction counters
 * - GET  /tenants/:tenantId/health    - Health level from the hit ratio
 * - GET  /tenants/:tenantId/integrity - Ownership check of cached entries
 * - POST /tenants/:tenantId/evict     - Evict one named cache or all of them
 * - POST /tenants/:tenantId/warm-up   - Run the registered cache warmers
 */

import { Router, Request } from "express";
import { validateRequest } from "../../shared/middleware/validation";
import { CacheAdminController } from "./controller";
import {
  EvictTenantCacheBody,
  TenantCacheParams,
  evictTenantCacheSchema,
  tenantCacheQuerySchema,
} from "./schemas";

export function createCacheAdminRoutes(controller: CacheAdminController): Router {
  const router = Router();

  router.get(
    "/tenants/:tenantId/metrics",
    validateRequest(tenantCacheQuerySchema),
    (req: Request<TenantCacheParams>, res, next) => {
      controller.getMetrics(req, res, next).catch(next);
    },
  );

  router.get(
    "/tenants/:tenantId/health",
    validateRequest(tenantCacheQuerySchema),
    (req: Request<TenantCacheParams>, res, next) => {
      controller.getHealth(req, res, next).catch(next);
    },
  );

  router.get(
    "/tenants/:tenantId/integrity",
    validateRequest(tenantCacheQuerySchema),
    (req: Request<TenantCacheParams>, res, next) => {
      controller.getIntegrity(req, res, next).catch(next);
    },
  );

  router.post(
    "/tenants/:tenantId/evict",
    validateRequest(evictTenantCacheSchema),
    (req: Request<TenantCacheParams, unknown, EvictTenantCacheBody | undefined>, res, next) => {
      controller.evict(req, res, next).catch(next);
    },
  );

  router.post(
    "/tenants/:tenantId/warm-up",
    validateRequest(tenantCacheQuerySchema),
    (req: Request<TenantCacheParams>, res, next) => {
      controller.warmUp(req, res, next).catch(next);
    },
  );

  return router;
}
