/**
 * Unit Tests for Tenant Access Validator
 */

import { structuredLogger } from "../../src/core/logger/structuredLogger";
import {
  CrossTenantAccessDeniedError,
  CustomRuleRejectedError,
  EntityOwnershipLookup,
  InactiveTenantError,
  InMemoryTenantAuditSink,
  InvalidGuardArgumentError,
  NoTenantContextError,
  NotTenantAwareError,
  TenantAccessValidator,
  TenantGuardConfigurationError,
  TenantMismatchError,
  TenantOwnedEntity,
  TenantValidationMode,
  TenantValidationOptions,
  UnitOfWork,
  createTenantGuard,
  declareTenantValidation,
} from "../../src/modules/tenancy";
import {
  SYSTEM_TENANT,
  TENANT_A,
  TENANT_B,
  WorkOrder,
  createTenancyHarness,
} from "../utils/test-helpers";

class UnreadableWorkOrder extends TenantOwnedEntity {
  constructor() {
    super(TENANT_A);
  }

  isAccessibleBy(): boolean {
    throw new Error("ownership service unavailable");
  }
}

const ASSET_OWNED_BY_A = "aaaaaaaa-0000-0000-0000-00000000000a";
const ASSET_OWNED_BY_B = "bbbbbbbb-0000-0000-0000-00000000000b";
const UNKNOWN_ASSET = "cccccccc-0000-0000-0000-00000000000c";

describe("TenantAccessValidator", () => {
  let harness: ReturnType<typeof createTenancyHarness>;
  let uow: UnitOfWork;

  const validate = (options: TenantValidationOptions, args: Record<string, unknown> = {}) =>
    harness.validator.validate(uow, declareTenantValidation(options), {
      component: "WorkOrderService",
      operation: "update",
      args,
    });

  beforeEach(() => {
    harness = createTenancyHarness();
    harness.ownership
      .register("asset", ASSET_OWNED_BY_A, TENANT_A)
      .register("asset", ASSET_OWNED_BY_B, TENANT_B);
    uow = harness.contextService.beginUnitOfWork("test");
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("context requirement", () => {
    it("should fail with NoTenantContext when no tenant is set", async () => {
      await expect(validate({})).rejects.toThrow(NoTenantContextError);
      await expect(validate({})).rejects.toThrow("No tenant context for WorkOrderService.update");
    });

    it("should raise NoTenantContext even when throwOnFailure is disabled", async () => {
      await expect(validate({ throwOnFailure: false })).rejects.toThrow(NoTenantContextError);
      expect(harness.auditSink.getRecords()[0]).toMatchObject({
        result: "FAILED",
        tenantId: undefined,
        mode: TenantValidationMode.REQUIRE_CONTEXT,
      });
    });

    it("should let context-free reads through when the context is optional", async () => {
      const outcome = await validate({
        mode: TenantValidationMode.READ_ACCESS,
        requireTenantContext: false,
      });

      expect(outcome.allowed).toBe(true);
      expect(outcome.audit).toMatchObject({ result: "SUCCESS", tenantId: undefined });
      expect(harness.statusLookup.calls).toEqual([]);
    });

    it("should pass for an active tenant and check its status once", async () => {
      harness.contextService.setCurrentTenant(uow, TENANT_A);

      const outcome = await validate({});

      expect(outcome.allowed).toBe(true);
      expect(outcome.systemTenantBypass).toBe(false);
      expect(harness.statusLookup.calls).toEqual([TENANT_A]);
    });

    it("should skip the status lookup when validateTenantStatus is disabled", async () => {
      harness.contextService.setCurrentTenant(uow, TENANT_A);

      await validate({ validateTenantStatus: false });

      expect(harness.statusLookup.calls).toEqual([]);
    });

    it("should reject an inactive tenant", async () => {
      harness.statusLookup.active.delete(TENANT_A);
      harness.contextService.setCurrentTenant(uow, TENANT_A);

      await expect(validate({})).rejects.toThrow(
        new InactiveTenantError(`Tenant ${TENANT_A} is not active (Tenant is not active)`),
      );
    });
  });

  describe("access modes", () => {
    beforeEach(() => {
      harness.statusLookup.active.delete(TENANT_A);
      harness.contextService.setCurrentTenant(uow, TENANT_A);
    });

    it("should allow reads for an inactive tenant when status is not validated", async () => {
      const outcome = await validate({
        mode: TenantValidationMode.READ_ACCESS,
        validateTenantStatus: false,
      });

      expect(outcome.allowed).toBe(true);
    });

    it("should always require an active tenant for writes", async () => {
      await expect(
        validate({ mode: TenantValidationMode.WRITE_ACCESS, validateTenantStatus: false }),
      ).rejects.toThrow(
        `Write access denied: tenant ${TENANT_A} is not active (Tenant is not active)`,
      );
      expect(harness.statusLookup.calls).toEqual([TENANT_A]);
    });

    it("should always require an active tenant for deletes", async () => {
      await expect(
        validate({ mode: TenantValidationMode.DELETE_ACCESS, validateTenantStatus: false }),
      ).rejects.toThrow(
        `Delete access denied: tenant ${TENANT_A} is not active (Tenant is not active)`,
      );
    });

    it("should treat a failing status lookup as inactive", async () => {
      harness.statusLookup.active.add(TENANT_A);
      harness.statusLookup.failWith = new Error("db down");

      await expect(validate({ mode: TenantValidationMode.WRITE_ACCESS })).rejects.toThrow(
        `Write access denied: tenant ${TENANT_A} is not active (Tenant status could not be verified: db down)`,
      );
    });
  });

  describe("VALIDATE_TENANT_ID", () => {
    const declaration: TenantValidationOptions = {
      mode: TenantValidationMode.VALIDATE_TENANT_ID,
      tenantIdParam: "companyId",
      validateTenantStatus: false,
    };

    beforeEach(() => {
      harness.contextService.setCurrentTenant(uow, TENANT_A);
    });

    it("should pass when the parameter names the current tenant", async () => {
      const outcome = await validate(declaration, { companyId: TENANT_A.toUpperCase() });

      expect(outcome.allowed).toBe(true);
    });

    it("should reject another tenant's id", async () => {
      await expect(validate(declaration, { companyId: TENANT_B })).rejects.toThrow(
        new TenantMismatchError(`Tenant ID mismatch: current tenant ${TENANT_A}, requested ${TENANT_B}`),
      );
    });

    it("should reject a missing or malformed parameter", async () => {
      await expect(validate(declaration, {})).rejects.toThrow(
        "Tenant ID parameter 'companyId' is missing or not a valid UUID",
      );
      await expect(validate(declaration, { companyId: 42 })).rejects.toThrow(TenantMismatchError);
    });
  });

  describe("VALIDATE_ENTITY_TENANT", () => {
    const declaration: TenantValidationOptions = {
      mode: TenantValidationMode.VALIDATE_ENTITY_TENANT,
      entityParam: "order",
      resourceType: "workOrder",
      validateTenantStatus: false,
    };

    beforeEach(() => {
      harness.contextService.setCurrentTenant(uow, TENANT_A);
    });

    it("should pass for the tenant's own entity", async () => {
      const outcome = await validate(declaration, { order: new WorkOrder("wo-1", TENANT_A) });

      expect(outcome.allowed).toBe(true);
    });

    it("should deny another tenant's entity", async () => {
      await expect(
        validate(declaration, { order: new WorkOrder("wo-2", TENANT_B) }),
      ).rejects.toThrow(
        new CrossTenantAccessDeniedError(
          `Cross-tenant access denied: workOrder owned by ${TENANT_B} is not accessible by tenant ${TENANT_A}`,
        ),
      );
    });

    it("should reject arguments without tenant ownership", async () => {
      await expect(validate(declaration, { order: { id: "wo-3" } })).rejects.toThrow(
        new NotTenantAwareError("Parameter 'order' does not carry tenant ownership"),
      );
    });

    it("should refuse and audit an entity whose ownership cannot be read", async () => {
      const outcome = validate(declaration, { order: new UnreadableWorkOrder() });

      await expect(outcome).rejects.toThrow(
        new NotTenantAwareError(
          "Tenant ownership of parameter 'order' could not be determined: ownership service unavailable",
        ),
      );
      expect(harness.auditSink.getRecords()[0]).toMatchObject({
        result: "FAILED",
        errorDetail:
          "Tenant ownership of parameter 'order' could not be determined: ownership service unavailable",
      });
    });

    it("should reject a missing entity", async () => {
      await expect(validate(declaration, { order: null })).rejects.toThrow(
        new InvalidGuardArgumentError("Entity parameter 'order' is missing"),
      );
    });
  });

  describe("system tenant", () => {
    const declaration: TenantValidationOptions = {
      mode: TenantValidationMode.VALIDATE_ENTITY_TENANT,
      entityParam: "order",
    };

    beforeEach(() => {
      harness.contextService.setCurrentTenant(uow, SYSTEM_TENANT);
    });

    it("should bypass every check when allow-listed", async () => {
      const outcome = await validate(
        { ...declaration, allowSystemTenant: true },
        { order: new WorkOrder("wo-4", TENANT_B) },
      );

      expect(outcome.allowed).toBe(true);
      expect(outcome.systemTenantBypass).toBe(true);
      expect(outcome.audit?.systemTenantBypass).toBe(true);
      expect(harness.statusLookup.calls).toEqual([]);
    });

    it("should get no implicit access when not allow-listed", async () => {
      await expect(
        validate(declaration, { order: new WorkOrder("wo-5", TENANT_B) }),
      ).rejects.toThrow(CrossTenantAccessDeniedError);
    });
  });

  describe("VALIDATE_ENTITY_IDS", () => {
    const declaration: TenantValidationOptions = {
      mode: TenantValidationMode.VALIDATE_ENTITY_IDS,
      entityIdsParam: "assetIds",
      resourceType: "asset",
      validateTenantStatus: false,
    };

    beforeEach(() => {
      harness.contextService.setCurrentTenant(uow, TENANT_A);
    });

    it("should pass when every id belongs to the tenant", async () => {
      const outcome = await validate(declaration, {
        assetIds: [ASSET_OWNED_BY_A, ASSET_OWNED_BY_A.toUpperCase()],
      });

      expect(outcome.allowed).toBe(true);
    });

    it("should accept a Set of ids", async () => {
      const outcome = await validate(declaration, { assetIds: new Set([ASSET_OWNED_BY_A]) });

      expect(outcome.allowed).toBe(true);
    });

    it("should deny when any id belongs to another tenant", async () => {
      await expect(
        validate(declaration, { assetIds: [ASSET_OWNED_BY_A, ASSET_OWNED_BY_B] }),
      ).rejects.toThrow(
        `Cross-tenant access denied: 1 of 2 asset id(s) are not owned by tenant ${TENANT_A}`,
      );
    });

    it("should deny unknown ids", async () => {
      await expect(validate(declaration, { assetIds: [UNKNOWN_ASSET] })).rejects.toThrow(
        CrossTenantAccessDeniedError,
      );
    });

    it("should pass an absent or empty collection", async () => {
      await expect(validate(declaration, {})).resolves.toMatchObject({ allowed: true });
      await expect(validate(declaration, { assetIds: [] })).resolves.toMatchObject({ allowed: true });
    });

    it("should reject values that are not collections of UUIDs", async () => {
      await expect(validate(declaration, { assetIds: ASSET_OWNED_BY_A })).rejects.toThrow(
        "Entity ID parameter 'assetIds' must be an array or a Set",
      );
      await expect(validate(declaration, { assetIds: ["asset-1"] })).rejects.toThrow(
        "Entity ID parameter 'assetIds' contains a value that is not a UUID",
      );
    });

    it("should deny when ownership cannot be verified", async () => {
      const failingLookup: EntityOwnershipLookup = {
        findOwners: async () => {
          throw new Error("timeout");
        },
      };
      const validator = new TenantAccessValidator(harness.contextService, harness.auditSink, {
        ownershipLookup: failingLookup,
      });

      await expect(
        validator.validate(uow, declareTenantValidation(declaration), {
          component: "AssetService",
          operation: "bulkUpdate",
          args: { assetIds: [ASSET_OWNED_BY_A] },
        }),
      ).rejects.toThrow(new CrossTenantAccessDeniedError("Ownership of asset ids could not be verified"));
    });

    it("should raise a configuration error without an ownership lookup", async () => {
      const validator = new TenantAccessValidator(harness.contextService, harness.auditSink);

      await expect(
        validator.validate(uow, declareTenantValidation({ ...declaration, throwOnFailure: false }), {
          component: "AssetService",
          operation: "bulkUpdate",
          args: { assetIds: [ASSET_OWNED_BY_A] },
        }),
      ).rejects.toThrow(TenantGuardConfigurationError);
    });
  });

  describe("CUSTOM", () => {
    beforeEach(() => {
      harness.contextService.setCurrentTenant(uow, TENANT_A);
    });

    it("should pass the context and arguments to the custom check", async () => {
      const customCheck = jest.fn().mockResolvedValue(true);

      const outcome = await validate(
        { mode: TenantValidationMode.CUSTOM, customCheck, validateTenantStatus: false },
        { amount: 10 },
      );

      expect(outcome.allowed).toBe(true);
      expect(customCheck).toHaveBeenCalledWith({
        context: { tenantId: TENANT_A, isSystemTenant: false },
        component: "WorkOrderService",
        operation: "update",
        args: { amount: 10 },
      });
    });

    it("should reject when the custom check refuses", async () => {
      await expect(
        validate({ mode: TenantValidationMode.CUSTOM, customCheck: () => false }),
      ).rejects.toThrow(new CustomRuleRejectedError("Custom tenant rule rejected WorkOrderService.update"));
    });

    it("should reject when the custom check throws", async () => {
      await expect(
        validate({
          mode: TenantValidationMode.CUSTOM,
          customCheck: () => {
            throw new Error("budget service unavailable");
          },
        }),
      ).rejects.toThrow(
        "Custom tenant rule failed for WorkOrderService.update: budget service unavailable",
      );
    });
  });

  describe("failure handling", () => {
    const mismatch: TenantValidationOptions = {
      mode: TenantValidationMode.VALIDATE_TENANT_ID,
      tenantIdParam: "companyId",
      validateTenantStatus: false,
      resourceType: "workOrder",
    };

    beforeEach(() => {
      harness.contextService.setCurrentTenant(uow, TENANT_A);
    });

    it("should use the declared message", async () => {
      await expect(
        validate({ ...mismatch, message: "Work order belongs to another company" }, { companyId: TENANT_B }),
      ).rejects.toThrow(new TenantMismatchError("Work order belongs to another company"));
    });

    it("should let the call proceed with a warning when throwOnFailure is disabled", async () => {
      const warn = jest.spyOn(structuredLogger, "warn");

      const outcome = await validate({ ...mismatch, throwOnFailure: false }, { companyId: TENANT_B });

      expect(outcome.allowed).toBe(true);
      expect(outcome.error).toBeInstanceOf(TenantMismatchError);
      expect(harness.auditSink.getRecords()).toHaveLength(1);
      expect(harness.auditSink.getRecords()[0]).toMatchObject({
        tenantId: TENANT_A,
        result: "FAILED",
        errorDetail: `Tenant ID mismatch: current tenant ${TENANT_A}, requested ${TENANT_B}`,
      });
      expect(warn).toHaveBeenCalledWith(
        "Tenant validation failed, continuing because throwOnFailure is disabled",
        expect.objectContaining({ tenantId: TENANT_A, module: "tenant-validation" }),
      );
    });

    it("should audit an unexpected error before propagating it", async () => {
      const args = {
        get companyId(): string {
          throw new Error("argument unreadable");
        },
      };

      await expect(validate({ ...mismatch, throwOnFailure: false }, args)).rejects.toThrow(
        "argument unreadable",
      );
      expect(harness.auditSink.getRecords()).toHaveLength(1);
      expect(harness.auditSink.getRecords()[0]).toMatchObject({
        tenantId: TENANT_A,
        result: "FAILED",
        errorDetail: "argument unreadable",
      });
    });

    it("should carry the invocation on the raised error", async () => {
      const failure = await validate(mismatch, { companyId: TENANT_B }).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(TenantMismatchError);
      expect(failure).toMatchObject({
        tenantId: TENANT_A,
        component: "WorkOrderService",
        operation: "update",
      });
    });
  });

  describe("audit", () => {
    beforeEach(() => {
      harness.contextService.setCurrentTenant(uow, TENANT_A);
    });

    it("should record a failed validation", async () => {
      await validate(
        {
          mode: TenantValidationMode.VALIDATE_TENANT_ID,
          tenantIdParam: "companyId",
          validateTenantStatus: false,
          resourceType: "workOrder",
          operation: "UPDATE_WORK_ORDER",
        },
        { companyId: TENANT_B },
      ).catch(() => undefined);

      expect(harness.auditSink.getRecords()).toHaveLength(1);
      expect(harness.auditSink.getRecords()[0]).toMatchObject({
        component: "WorkOrderService",
        operation: "UPDATE_WORK_ORDER",
        mode: TenantValidationMode.VALIDATE_TENANT_ID,
        tenantId: TENANT_A,
        result: "FAILED",
        resourceType: "workOrder",
        errorDetail: `Tenant ID mismatch: current tenant ${TENANT_A}, requested ${TENANT_B}`,
        systemTenantBypass: false,
      });
    });

    it("should record a successful validation with an unknown resource type", async () => {
      const outcome = await validate({});

      expect(outcome.audit).toMatchObject({ result: "SUCCESS", resourceType: "unknown" });
      expect(harness.auditSink.find({ tenantId: TENANT_A, result: "SUCCESS" })).toHaveLength(1);
    });

    it("should not record when auditLog is disabled", async () => {
      const outcome = await validate({ auditLog: false });

      expect(outcome.audit).toBeUndefined();
      expect(harness.auditSink.size).toBe(0);
    });

    it("should not record when auditing is switched off", async () => {
      const sink = new InMemoryTenantAuditSink();
      const validator = new TenantAccessValidator(harness.contextService, sink, { auditEnabled: false });

      await validator.validate(uow, declareTenantValidation({}), {
        component: "WorkOrderService",
        operation: "update",
      });

      expect(sink.size).toBe(0);
    });

    it("should not fail the call when the sink fails", async () => {
      const validator = new TenantAccessValidator(harness.contextService, {
        append: () => {
          throw new Error("disk full");
        },
      });

      const outcome = await validator.validate(uow, declareTenantValidation({}), {
        component: "WorkOrderService",
        operation: "update",
      });

      expect(outcome.allowed).toBe(true);
    });
  });

  describe("registered guards", () => {
    beforeEach(() => {
      harness.registry.register("WorkOrderService", {
        defaults: { mode: TenantValidationMode.READ_ACCESS, validateTenantStatus: false },
        operations: {
          remove: { mode: TenantValidationMode.DELETE_ACCESS },
        },
      });
      harness.contextService.setCurrentTenant(uow, TENANT_A);
    });

    it("should let unregistered operations through without an audit record", async () => {
      const outcome = await harness.validator.guard(uow, {
        component: "ReportService",
        operation: "export",
      });

      expect(outcome).toEqual({ allowed: true, systemTenantBypass: false, declaration: null });
      expect(harness.auditSink.size).toBe(0);
    });

    it("should apply the operation declaration over the component default", async () => {
      harness.statusLookup.active.delete(TENANT_A);
      const guard = createTenantGuard(harness.validator, "WorkOrderService");

      await expect(guard(uow, "list")).resolves.toMatchObject({ allowed: true });
      await expect(guard(uow, "remove")).rejects.toThrow(InactiveTenantError);
    });
  });
});
