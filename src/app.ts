import express, { Express } from "express";
import { CacheAdminController, cacheAdminGuards, CACHE_ADMIN_COMPONENT, createCacheAdminRoutes } from "./modules/cache-admin";
import { HealthController, HealthProbe, createHealthRoutes } from "./modules/health";
import { TenantCacheManager } from "./modules/tenancy/cache/TenantCacheManager";
import { TenantContextService } from "./modules/tenancy/context/TenantContextService";
import { TenantAccessValidator } from "./modules/tenancy/validation/TenantAccessValidator";
import { errorHandler, notFoundHandler } from "./shared/middleware/errorHandler";
import { TenantResolver, createUnitOfWorkMiddleware } from "./shared/middleware/unitOfWork";

export interface AppDependencies {
  contextService: TenantContextService;
  validator: TenantAccessValidator;
  cacheManager: TenantCacheManager;
  healthProbes?: Record<string, HealthProbe>;
  /**
   * Middleware establishing req.user (token verification lives in the
   * identity layer, not here)
   */
  authenticate?: express.RequestHandler;
  resolveTenant?: TenantResolver;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(express.json());

  app.use("/health", createHealthRoutes(new HealthController(deps.healthProbes)));

  if (deps.authenticate) {
    app.use(deps.authenticate);
  }
  app.use(createUnitOfWorkMiddleware(deps.contextService, deps.resolveTenant));

  const registry = deps.validator.getRegistry();
  if (!registry.has(CACHE_ADMIN_COMPONENT)) {
    registry.register(CACHE_ADMIN_COMPONENT, cacheAdminGuards);
  }
  app.use(
    "/admin/cache",
    createCacheAdminRoutes(new CacheAdminController(deps.cacheManager, deps.validator)),
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
