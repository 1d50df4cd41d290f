/**
 * Tenant Access Validator
 *
 * Runs the tenant check declared for a component operation before the
 * operation executes. Resolution order for every invocation:
 *
 * 1. no tenant context: NoTenantContext, always raised unless the
 *    declaration disables requireTenantContext
 * 2. system tenant with allowSystemTenant: success, no further checks
 * 3. tenant status (when declared, and always for write/delete)
 * 4. the mode-specific check
 *
 * Failures are audited, logged as security events and raised unless the
 * declaration disables throwOnFailure. An unexpected error thrown while
 * checking is audited as a failure and propagated as is.
 */

import { structuredLogger } from "../../../core/logger/structuredLogger";
import {
  TenantAuditRecord,
  TenantAuditSink,
  appendSafely,
  createAuditRecord,
} from "../audit/TenantAuditLog";
import { TenantContext, UnitOfWork, normalizeTenantId, normalizeUuid } from "../context/TenantContext";
import { TenantContextService } from "../context/TenantContextService";
import { EntityOwnershipLookup } from "../entities/EntityOwnershipLookup";
import { isTenantAware } from "../entities/TenantAware";
import {
  CrossTenantAccessDeniedError,
  CustomRuleRejectedError,
  InactiveTenantError,
  InvalidGuardArgumentError,
  NoTenantContextError,
  NotTenantAwareError,
  TenantAccessError,
  TenantAccessErrorCode,
  TenantAccessErrorDetails,
  TenantGuardConfigurationError,
  TenantMismatchError,
} from "../errors/TenantAccessError";
import { TenantGuardRegistry } from "./TenantGuardRegistry";
import {
  TenantValidationDeclaration,
  TenantValidationMode,
  requiresActiveTenant,
} from "./TenantValidationDeclaration";

export interface GuardInvocation {
  component: string;
  operation: string;
  args?: Readonly<Record<string, unknown>>;
}

export interface GuardOutcome {
  /** Whether the guarded operation may run */
  allowed: boolean;
  systemTenantBypass: boolean;
  declaration: TenantValidationDeclaration | null;
  /** Failure that was not raised because throwOnFailure is disabled; the call still runs */
  error?: TenantAccessError;
  audit?: TenantAuditRecord;
}

export interface TenantAccessValidatorOptions {
  registry?: TenantGuardRegistry;
  ownershipLookup?: EntityOwnershipLookup;
  auditEnabled?: boolean;
}

const NON_NEGOTIABLE_FAILURES: ReadonlySet<TenantAccessErrorCode> = new Set([
  TenantAccessErrorCode.NO_TENANT_CONTEXT,
  TenantAccessErrorCode.GUARD_MISCONFIGURED,
]);

interface CheckScope {
  context: TenantContext;
  declaration: TenantValidationDeclaration;
  invocation: GuardInvocation;
  operation: string;
  details: TenantAccessErrorDetails;
  message: (generated: string) => string;
}

export class TenantAccessValidator {
  private readonly registry: TenantGuardRegistry;
  private readonly ownershipLookup?: EntityOwnershipLookup;
  private readonly auditEnabled: boolean;

  constructor(
    private readonly contextService: TenantContextService,
    private readonly auditSink: TenantAuditSink,
    options: TenantAccessValidatorOptions = {},
  ) {
    this.registry = options.registry ?? new TenantGuardRegistry();
    this.ownershipLookup = options.ownershipLookup;
    this.auditEnabled = options.auditEnabled ?? true;
  }

  getRegistry(): TenantGuardRegistry {
    return this.registry;
  }

  /**
   * Validate an invocation against the declaration registered for it.
   * Unregistered operations pass without an audit record.
   */
  async guard(uow: UnitOfWork, invocation: GuardInvocation): Promise<GuardOutcome> {
    const declaration = this.registry.resolve(invocation.component, invocation.operation);
    if (!declaration) {
      return { allowed: true, systemTenantBypass: false, declaration: null };
    }
    return this.validate(uow, declaration, invocation);
  }

  async validate(
    uow: UnitOfWork,
    declaration: TenantValidationDeclaration,
    invocation: GuardInvocation,
  ): Promise<GuardOutcome> {
    const context = uow.context;
    const operation = declaration.operation ?? invocation.operation;
    const details: TenantAccessErrorDetails = {
      tenantId: context?.tenantId,
      component: invocation.component,
      operation,
    };
    const message = (generated: string): string => declaration.message ?? generated;

    let systemTenantBypass = false;
    let failure: TenantAccessError | undefined;

    try {
      if (!context) {
        if (!declaration.requireTenantContext) {
          const audit = await this.recordAudit(declaration, invocation, operation, uow, false, undefined);
          return { allowed: true, systemTenantBypass: false, declaration, audit };
        }
        throw new NoTenantContextError(
          message(`No tenant context for ${invocation.component}.${operation}`),
          details,
        );
      }
      if (declaration.allowSystemTenant && context.isSystemTenant) {
        systemTenantBypass = true;
      } else {
        await this.runChecks({ context, declaration, invocation, operation, details, message });
      }
    } catch (error) {
      if (!(error instanceof TenantAccessError)) {
        const err = error instanceof Error ? error : new Error(String(error));
        await this.recordAudit(declaration, invocation, operation, uow, systemTenantBypass, err.message);
        structuredLogger.error("Tenant validation raised an unexpected error", err, {
          correlationId: uow.id,
          tenantId: context?.tenantId,
          module: "tenant-validation",
          action: declaration.mode,
          metadata: { component: invocation.component, operation },
        });
        throw error;
      }
      failure = error;
    }

    const audit = await this.recordAudit(
      declaration,
      invocation,
      operation,
      uow,
      systemTenantBypass,
      failure?.message,
    );

    if (!failure) {
      structuredLogger.debug("Tenant validation passed", {
        correlationId: uow.id,
        tenantId: context?.tenantId,
        module: "tenant-validation",
        action: declaration.mode,
        metadata: { component: invocation.component, operation, systemTenantBypass },
      });
      return { allowed: true, systemTenantBypass, declaration, audit };
    }

    structuredLogger.logSecurity("TENANT_VALIDATION_FAILED", {
      correlationId: uow.id,
      tenantId: context?.tenantId,
      severity: failure.code === TenantAccessErrorCode.CROSS_TENANT_ACCESS_DENIED ? "HIGH" : "MEDIUM",
      metadata: {
        component: invocation.component,
        operation,
        mode: declaration.mode,
        code: failure.code,
        reason: failure.message,
      },
    });

    if (declaration.throwOnFailure || NON_NEGOTIABLE_FAILURES.has(failure.code)) {
      throw failure;
    }

    structuredLogger.warn("Tenant validation failed, continuing because throwOnFailure is disabled", {
      correlationId: uow.id,
      tenantId: context?.tenantId,
      module: "tenant-validation",
      action: declaration.mode,
      metadata: { component: invocation.component, operation, code: failure.code },
    });
    return { allowed: true, systemTenantBypass, declaration, error: failure, audit };
  }

  private async runChecks(scope: CheckScope): Promise<void> {
    const { declaration } = scope;

    if (declaration.validateTenantStatus || requiresActiveTenant(declaration.mode)) {
      await this.checkActive(scope);
    }

    switch (declaration.mode) {
      case TenantValidationMode.REQUIRE_CONTEXT:
      case TenantValidationMode.READ_ACCESS:
      case TenantValidationMode.WRITE_ACCESS:
      case TenantValidationMode.DELETE_ACCESS:
        return;
      case TenantValidationMode.VALIDATE_TENANT_ID:
        return this.checkTenantId(scope);
      case TenantValidationMode.VALIDATE_ENTITY_TENANT:
        return this.checkEntityTenant(scope);
      case TenantValidationMode.VALIDATE_ENTITY_IDS:
        return this.checkEntityIds(scope);
      case TenantValidationMode.CUSTOM:
        return this.checkCustom(scope);
    }
  }

  private async checkActive({ context, declaration, details, message }: CheckScope): Promise<void> {
    const status = await this.contextService.checkTenantStatus(context.tenantId);
    if (status.active) {
      return;
    }

    const reason = status.reason ?? "Tenant is not active";
    let generated: string;
    switch (declaration.mode) {
      case TenantValidationMode.WRITE_ACCESS:
        generated = `Write access denied: tenant ${context.tenantId} is not active (${reason})`;
        break;
      case TenantValidationMode.DELETE_ACCESS:
        generated = `Delete access denied: tenant ${context.tenantId} is not active (${reason})`;
        break;
      default:
        generated = `Tenant ${context.tenantId} is not active (${reason})`;
    }
    throw new InactiveTenantError(message(generated), details);
  }

  private checkTenantId({ context, declaration, invocation, details, message }: CheckScope): void {
    const param = declaration.tenantIdParam ?? "";
    const supplied = normalizeTenantId(invocation.args?.[param]);

    if (supplied === null) {
      throw new TenantMismatchError(
        message(`Tenant ID parameter '${param}' is missing or not a valid UUID`),
        details,
      );
    }
    if (supplied !== context.tenantId) {
      throw new TenantMismatchError(
        message(`Tenant ID mismatch: current tenant ${context.tenantId}, requested ${supplied}`),
        details,
      );
    }
  }

  private checkEntityTenant({ context, declaration, invocation, details, message }: CheckScope): void {
    const param = declaration.entityParam ?? "";
    const entity = invocation.args?.[param];

    if (entity === undefined || entity === null) {
      throw new InvalidGuardArgumentError(
        message(`Entity parameter '${param}' is missing`),
        details,
      );
    }
    if (!isTenantAware(entity)) {
      throw new NotTenantAwareError(
        message(`Parameter '${param}' does not carry tenant ownership`),
        details,
      );
    }

    let accessible: boolean;
    let owner: string | null;
    try {
      accessible = entity.isAccessibleBy(context.tenantId, {
        allowSystemTenant: declaration.allowSystemTenant,
        systemTenantId: this.contextService.getSystemTenantId(),
      });
      owner = entity.ownerTenantId();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new NotTenantAwareError(
        message(`Tenant ownership of parameter '${param}' could not be determined: ${reason}`),
        details,
      );
    }

    if (!accessible) {
      const resource = declaration.resourceType ?? "entity";
      throw new CrossTenantAccessDeniedError(
        message(
          `Cross-tenant access denied: ${resource} owned by ${owner ?? "no tenant"} is not accessible by tenant ${context.tenantId}`,
        ),
        details,
      );
    }
  }

  private async checkEntityIds({ context, declaration, invocation, details, message }: CheckScope): Promise<void> {
    const param = declaration.entityIdsParam ?? "";
    const resourceType = declaration.resourceType ?? "";
    const value = invocation.args?.[param];

    if (value === undefined || value === null) {
      return;
    }

    let entries: unknown[];
    if (Array.isArray(value)) {
      entries = value;
    } else if (value instanceof Set) {
      entries = [...value];
    } else {
      throw new InvalidGuardArgumentError(
        message(`Entity ID parameter '${param}' must be an array or a Set`),
        details,
      );
    }
    if (entries.length === 0) {
      return;
    }

    const ids: string[] = [];
    for (const entry of entries) {
      const id = normalizeUuid(entry);
      if (id === null) {
        throw new InvalidGuardArgumentError(
          message(`Entity ID parameter '${param}' contains a value that is not a UUID`),
          details,
        );
      }
      if (!ids.includes(id)) {
        ids.push(id);
      }
    }

    if (!this.ownershipLookup) {
      throw new TenantGuardConfigurationError(
        `No entity ownership lookup is configured for ${resourceType}`,
        details,
      );
    }

    let owners: Map<string, string>;
    try {
      owners = await this.ownershipLookup.findOwners(resourceType, ids);
    } catch (error) {
      if (error instanceof TenantAccessError) {
        throw error;
      }
      structuredLogger.error(
        "Entity ownership lookup failed",
        error instanceof Error ? error : new Error(String(error)),
        {
          tenantId: context.tenantId,
          module: "tenant-validation",
          action: "checkEntityIds",
          metadata: { resourceType, count: ids.length },
        },
      );
      throw new CrossTenantAccessDeniedError(
        message(`Ownership of ${resourceType} ids could not be verified`),
        details,
      );
    }

    const foreign = ids.filter((id) => owners.get(id) !== context.tenantId);
    if (foreign.length > 0) {
      throw new CrossTenantAccessDeniedError(
        message(
          `Cross-tenant access denied: ${foreign.length} of ${ids.length} ${resourceType} id(s) are not owned by tenant ${context.tenantId}`,
        ),
        details,
      );
    }
  }

  private async checkCustom({ context, declaration, invocation, operation, details, message }: CheckScope): Promise<void> {
    if (!declaration.customCheck) {
      return;
    }

    let allowed: boolean;
    try {
      allowed = await declaration.customCheck({
        context,
        component: invocation.component,
        operation,
        args: invocation.args ?? {},
      });
    } catch (error) {
      if (error instanceof TenantAccessError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new CustomRuleRejectedError(
        message(`Custom tenant rule failed for ${invocation.component}.${operation}: ${reason}`),
        details,
      );
    }

    if (!allowed) {
      throw new CustomRuleRejectedError(
        message(`Custom tenant rule rejected ${invocation.component}.${operation}`),
        details,
      );
    }
  }

  private async recordAudit(
    declaration: TenantValidationDeclaration,
    invocation: GuardInvocation,
    operation: string,
    uow: UnitOfWork,
    systemTenantBypass: boolean,
    errorDetail: string | undefined,
  ): Promise<TenantAuditRecord | undefined> {
    if (!declaration.auditLog || !this.auditEnabled) {
      return undefined;
    }

    const record = createAuditRecord({
      component: invocation.component,
      operation,
      mode: declaration.mode,
      tenantId: uow.context?.tenantId,
      result: errorDetail === undefined ? "SUCCESS" : "FAILED",
      resourceType: declaration.resourceType ?? "unknown",
      errorDetail,
      systemTenantBypass,
    });
    await appendSafely(this.auditSink, record);
    return record;
  }
}

export type TenantGuard = (
  uow: UnitOfWork,
  operation: string,
  args?: Readonly<Record<string, unknown>>,
) => Promise<GuardOutcome>;

/**
 * Guard function for one component, called at the top of each operation
 */
export function createTenantGuard(
  validator: TenantAccessValidator,
  component: string,
): TenantGuard {
  return (uow, operation, args) => validator.guard(uow, { component, operation, args });
}
