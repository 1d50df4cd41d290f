/**
 * Cache Administration Integration Tests
 * Tenant-guarded cache endpoints and health checks over HTTP
 */

import request from "supertest";
import express, { Express } from "express";
import { createApp } from "../../src/app";
import { SYSTEM_TENANT, TENANT_A, TENANT_B, createTenancyHarness } from "../utils/test-helpers";

const TENANT_HEADER = "x-test-tenant";

/**
 * Stands in for the identity layer: the tenant comes from a test header
 */
const authenticate: express.RequestHandler = (req, res, next) => {
  const tenantId = req.header(TENANT_HEADER);
  if (tenantId) {
    req.user = { id: "user-1", tenantId };
  }
  next();
};

describe("Cache Administration Integration Tests", () => {
  let app: Express;
  let harness: ReturnType<typeof createTenancyHarness>;
  let readinessFailure: Error | null;

  beforeEach(() => {
    harness = createTenancyHarness({ activeTenants: [TENANT_A, SYSTEM_TENANT] });
    readinessFailure = null;
    app = createApp({
      contextService: harness.contextService,
      validator: harness.validator,
      cacheManager: harness.cacheManager,
      authenticate,
      healthProbes: {
        database: async () => {
          if (readinessFailure) throw readinessFailure;
        },
      },
    });
  });

  describe("GET /admin/cache/tenants/:tenantId/metrics", () => {
    it("should return the tenant's own metrics", async () => {
      harness.cacheManager.recordHit(TENANT_A);

      const response = await request(app)
        .get(`/admin/cache/tenants/${TENANT_A}/metrics`)
        .set(TENANT_HEADER, TENANT_A);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        success: true,
        data: { tenantId: TENANT_A, hits: 1, misses: 0, evictions: 0 },
      });
    });

    it("should refuse another tenant's metrics", async () => {
      const response = await request(app)
        .get(`/admin/cache/tenants/${TENANT_A}/metrics`)
        .set(TENANT_HEADER, TENANT_B);

      expect(response.status).toBe(403);
      expect(response.body).toEqual({
        error: `Tenant ID mismatch: current tenant ${TENANT_B}, requested ${TENANT_A}`,
        code: "TENANT_MISMATCH",
      });
      expect(harness.auditSink.find({ component: "CacheAdministration", result: "FAILED" })).toHaveLength(1);
    });

    it("should refuse a request without a tenant", async () => {
      const response = await request(app).get(`/admin/cache/tenants/${TENANT_A}/metrics`);

      expect(response.status).toBe(403);
      expect(response.body).toEqual({
        error: "No tenant context for CacheAdministration.getMetrics",
        code: "NO_TENANT_CONTEXT",
      });
    });

    it("should reject a tenant id that is not a UUID", async () => {
      const response = await request(app)
        .get("/admin/cache/tenants/acme/metrics")
        .set(TENANT_HEADER, TENANT_A);

      expect(response.status).toBe(400);
      expect(response.body.code).toBe("VALIDATION_ERROR");
    });

    it("should reject a principal with a malformed tenant", async () => {
      const response = await request(app)
        .get(`/admin/cache/tenants/${TENANT_A}/metrics`)
        .set(TENANT_HEADER, "acme");

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: "Invalid tenant identifier: acme",
        code: "INVALID_TENANT_ID",
      });
    });
  });

  describe("GET /admin/cache/tenants/:tenantId/health", () => {
    it("should let the system tenant read any tenant's health", async () => {
      const response = await request(app)
        .get(`/admin/cache/tenants/${TENANT_B}/health`)
        .set(TENANT_HEADER, SYSTEM_TENANT);

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        tenantId: TENANT_B,
        level: "POOR",
        hitRatio: 0,
        totalOps: 0,
        evictions: 0,
        errors: 0,
        healthy: false,
        evictionPrecision: "PRECISE",
      });
      expect(harness.auditSink.getRecords()[0]).toMatchObject({
        tenantId: SYSTEM_TENANT,
        systemTenantBypass: true,
        result: "SUCCESS",
      });
    });
  });

  describe("GET /admin/cache/tenants/:tenantId/integrity", () => {
    it("should report a clean cache as valid", async () => {
      const response = await request(app)
        .get(`/admin/cache/tenants/${TENANT_A}/integrity`)
        .set(TENANT_HEADER, TENANT_A);

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        tenantId: TENANT_A,
        valid: true,
        checkedEntries: 0,
        violations: [],
        unverifiableCaches: [],
      });
    });
  });

  describe("POST /admin/cache/tenants/:tenantId/evict", () => {
    it("should evict every cache when no cache is named", async () => {
      const response = await request(app)
        .post(`/admin/cache/tenants/${TENANT_A}/evict`)
        .set(TENANT_HEADER, TENANT_A);

      expect(response.status).toBe(200);
      expect(response.body.data.tenantId).toBe(TENANT_A);
      expect(response.body.data.caches).toHaveLength(harness.cacheProvider.getCacheNames().length);
    });

    it("should evict one named cache", async () => {
      const response = await request(app)
        .post(`/admin/cache/tenants/${TENANT_A}/evict`)
        .set(TENANT_HEADER, TENANT_A)
        .send({ cacheName: "reports" });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        cacheName: "reports",
        tenantId: TENANT_A,
        precision: "PRECISE",
        removedEntries: 0,
      });
    });

    it("should return 404 for an unknown cache", async () => {
      const response = await request(app)
        .post(`/admin/cache/tenants/${TENANT_A}/evict`)
        .set(TENANT_HEADER, TENANT_A)
        .send({ cacheName: "sessions" });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        error: "Cache not found: sessions",
        code: "CACHE_NOT_FOUND",
        details: { cacheName: "sessions" },
      });
    });
  });

  describe("POST /admin/cache/tenants/:tenantId/warm-up", () => {
    it("should report a partial warm-up with 207", async () => {
      harness.cacheManager
        .registerWarmer("users", async (caches) => {
          await caches.getCache("users").put("u1", { name: "Ada" });
        })
        .registerWarmer("reports", async () => {
          throw new Error("report source unavailable");
        });

      const response = await request(app)
        .post(`/admin/cache/tenants/${TENANT_A}/warm-up`)
        .set(TENANT_HEADER, TENANT_A);

      expect(response.status).toBe(207);
      expect(response.body).toEqual({
        success: false,
        data: {
          tenantId: TENANT_A,
          warmers: ["users", "reports"],
          failed: [{ warmer: "reports", error: "report source unavailable" }],
        },
      });
      expect(harness.auditSink.getRecords()[0].operation).toBe("WARM_UP");
    });

    it("should refuse to warm an inactive tenant", async () => {
      const response = await request(app)
        .post(`/admin/cache/tenants/${TENANT_B}/warm-up`)
        .set(TENANT_HEADER, TENANT_B);

      expect(response.status).toBe(403);
      expect(response.body).toEqual({
        error: `Tenant ${TENANT_B} is not active (Tenant is not active)`,
        code: "INACTIVE_TENANT",
      });
    });
  });

  describe("Health endpoints", () => {
    it("should answer the liveness check", async () => {
      const response = await request(app).get("/health/live");

      expect(response.status).toBe(200);
      expect(response.body.status).toBe("OK");
    });

    it("should report readiness from the dependency checks", async () => {
      const ready = await request(app).get("/health/ready");
      expect(ready.status).toBe(200);
      expect(ready.body.status).toBe("READY");

      readinessFailure = new Error("connection refused");
      const notReady = await request(app).get("/health/ready");

      expect(notReady.status).toBe(503);
      expect(notReady.body.checks).toEqual([
        expect.objectContaining({ name: "database", status: "unhealthy", message: "connection refused" }),
      ]);
    });
  });

  it("should return 404 for unknown routes", async () => {
    const response = await request(app).get("/admin/cache/unknown").set(TENANT_HEADER, TENANT_A);

    expect(response.status).toBe(404);
    expect(response.body.code).toBe("RESOURCE_NOT_FOUND");
  });
});
