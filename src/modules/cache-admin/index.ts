export { CacheAdminController } from "./controller";
export { createCacheAdminRoutes } from "./routes";
export { CACHE_ADMIN_COMPONENT, cacheAdminGuards } from "./guards";
