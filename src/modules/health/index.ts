/**
 * Health Module
 *
 * Liveness and readiness endpoints; readiness runs the probes supplied by
 * the server (database, cache backend).
 */

export { HealthController } from "./health.controller";
export type { HealthProbe } from "./health.controller";
export { createHealthRoutes } from "./routes";
