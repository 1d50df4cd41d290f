import * as dotenv from "dotenv";

// Load environment variables
dotenv.config();

export type CacheBackend = "memory" | "redis";

interface Config {
  // Server
  port: number;
  nodeEnv: string;
  appHost: string;

  // Database
  databaseUrl: string;
  databasePoolSize: number;

  // Redis
  redisUrl: string;
  redisPassword?: string;

  // Cache
  cacheBackend: CacheBackend;

  // Logging
  logLevel: string;
  jsonLogFormat: boolean;
  auditLogEnabled: boolean;

  // Tenancy
  systemTenantId: string;
  tenantStatusTimeoutMs: number;
}

const parseCacheBackend = (value: string | undefined): CacheBackend => {
  if (value === undefined || value === "") return "memory";
  if (value === "memory" || value === "redis") return value;
  throw new Error(
    `CACHE_BACKEND must be "memory" or "redis", received "${value}"`,
  );
};

const config: Config = {
  // Server
  port: parseInt(process.env.PORT || "3000", 10),
  nodeEnv: process.env.NODE_ENV || "development",
  appHost: process.env.APP_HOST || "0.0.0.0",

  // Database
  databaseUrl: process.env.DATABASE_URL || "",
  databasePoolSize: parseInt(process.env.DATABASE_POOL_SIZE || "10", 10),

  // Redis
  redisUrl: process.env.REDIS_URL || "redis://localhost:6379",
  redisPassword: process.env.REDIS_PASSWORD,

  // Cache
  cacheBackend: parseCacheBackend(process.env.CACHE_BACKEND),

  // Logging
  logLevel: process.env.LOG_LEVEL || "INFO",
  jsonLogFormat: process.env.JSON_LOG_FORMAT !== "false",
  auditLogEnabled: process.env.AUDIT_LOG_ENABLED !== "false",

  // Tenancy
  systemTenantId: (
    process.env.SYSTEM_TENANT_ID || "00000000-0000-0000-0000-000000000001"
  ).toLowerCase(),
  tenantStatusTimeoutMs: parseInt(
    process.env.TENANT_STATUS_TIMEOUT_MS || "2000",
    10,
  ),
};

// Validate required environment variables
if (config.nodeEnv === "production") {
  const requiredEnvVars = ["DATABASE_URL"];
  const missingEnvVars = requiredEnvVars.filter(
    (envVar) => !process.env[envVar],
  );

  if (missingEnvVars.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingEnvVars.join(", ")}`,
    );
  }
}

if (!Number.isFinite(config.tenantStatusTimeoutMs) || config.tenantStatusTimeoutMs <= 0) {
  throw new Error("TENANT_STATUS_TIMEOUT_MS must be a positive integer");
}

export { config };
