import { createApp } from "./app";
import { config } from "./shared/config";
import { structuredLogger } from "./core/logger/structuredLogger";
import { createDatabasePool } from "./infrastructure/database/pool";
import { PgCompanyStatusRepository } from "./infrastructure/repositories/PgCompanyStatusRepository";
import { PgEntityOwnershipRepository } from "./infrastructure/repositories/PgEntityOwnershipRepository";
import { PgTenantAuditRepository } from "./infrastructure/repositories/PgTenantAuditRepository";
import { RedisCacheProvider } from "./infrastructure/redis/RedisCacheProvider";
import { RedisService } from "./infrastructure/services/RedisService";
import { HealthProbe } from "./modules/health";
import {
  CacheProvider,
  CompositeAuditSink,
  InMemoryCacheProvider,
  StructuredLogAuditSink,
  TenantAccessValidator,
  TenantCacheManager,
  TenantContextService,
} from "./modules/tenancy";

const logger = structuredLogger;

async function start(): Promise<void> {
  const pool = createDatabasePool();
  const healthProbes: Record<string, HealthProbe> = {
    database: async () => {
      await pool.query("SELECT 1");
    },
  };

  let redis: RedisService | null = null;
  let cacheProvider: CacheProvider;
  if (config.cacheBackend === "redis") {
    const redisService = new RedisService(config.redisUrl, config.redisPassword);
    await redisService.connect();
    redis = redisService;
    cacheProvider = new RedisCacheProvider(redisService);
    healthProbes.cache = async () => {
      await redisService.get("health:probe");
    };
  } else {
    cacheProvider = new InMemoryCacheProvider();
  }

  const contextService = new TenantContextService(new PgCompanyStatusRepository(pool), {
    systemTenantId: config.systemTenantId,
    statusLookupTimeoutMs: config.tenantStatusTimeoutMs,
  });
  const validator = new TenantAccessValidator(
    contextService,
    new CompositeAuditSink([new StructuredLogAuditSink(), new PgTenantAuditRepository(pool)]),
    {
      ownershipLookup: new PgEntityOwnershipRepository(pool),
      auditEnabled: config.auditLogEnabled,
    },
  );
  const cacheManager = new TenantCacheManager(cacheProvider, contextService);

  const app = createApp({ contextService, validator, cacheManager, healthProbes });

  const server = app.listen(config.port, config.appHost, () => {
    logger.info(`Server is running on port ${config.port}`, {
      module: "server",
      action: "running",
      metadata: { cacheBackend: config.cacheBackend },
    });
  });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down`, {
      module: "server",
      action: "shutdown",
    });
    server.close();
    await pool.end();
    if (redis) {
      await redis.disconnect();
    }
    process.exit(0);
  };

  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((error: Error) =>
      logger.error("Shutdown failed", error, { module: "server", action: "shutdown" }),
    );
  });
  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((error: Error) =>
      logger.error("Shutdown failed", error, { module: "server", action: "shutdown" }),
    );
  });
}

start().catch((error: Error) => {
  logger.error("Server failed to start", error, { module: "server", action: "start" });
  process.exit(1);
});
