/**
 * Health Check Controller
 *
 * - Liveness probe: Is the process running?
 * - Readiness probe: Are the database and cache backend reachable?
 */

import { Request, Response } from "express";
import { structuredLogger } from "../../core/logger/structuredLogger";

export type HealthProbe = () => Promise<void>;

interface CheckResult {
  name: string;
  status: "healthy" | "unhealthy";
  message?: string;
  latencyMs: number;
}

export class HealthController {
  private readonly startTime: Date;

  constructor(private readonly probes: Record<string, HealthProbe> = {}) {
    this.startTime = new Date();
  }

  async liveness(req: Request, res: Response): Promise<void> {
    res.status(200).json({
      status: "OK",
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime.getTime()) / 1000),
    });
  }

  async readiness(req: Request, res: Response): Promise<void> {
    const checks = await Promise.all(
      Object.entries(this.probes).map(([name, probe]) => this.runProbe(name, probe)),
    );
    const ready = checks.every((check) => check.status === "healthy");

    res.status(ready ? 200 : 503).json({
      status: ready ? "READY" : "NOT_READY",
      timestamp: new Date().toISOString(),
      checks,
    });
  }

  private async runProbe(name: string, probe: HealthProbe): Promise<CheckResult> {
    const started = Date.now();
    try {
      await probe();
      return { name, status: "healthy", latencyMs: Date.now() - started };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      structuredLogger.error("Readiness check failed", err, {
        module: "health",
        action: name,
      });
      return {
        name,
        status: "unhealthy",
        message: err.message,
        latencyMs: Date.now() - started,
      };
    }
  }
}
