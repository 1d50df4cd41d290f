/**
 * Tenant Access Errors
 *
 * Every refusal raised by the tenancy core belongs to the TenantAccessError
 * family so callers can surface them uniformly as access-denied.
 */

/**
 * Tenant Access Error Codes
 */
export enum TenantAccessErrorCode {
  NO_TENANT_CONTEXT = "NO_TENANT_CONTEXT",
  TENANT_MISMATCH = "TENANT_MISMATCH",
  NOT_TENANT_AWARE = "NOT_TENANT_AWARE",
  CROSS_TENANT_ACCESS_DENIED = "CROSS_TENANT_ACCESS_DENIED",
  INACTIVE_TENANT = "INACTIVE_TENANT",
  INVALID_TENANT_ID = "INVALID_TENANT_ID",
  INVALID_GUARD_ARGUMENT = "INVALID_GUARD_ARGUMENT",
  GUARD_MISCONFIGURED = "GUARD_MISCONFIGURED",
  CUSTOM_RULE_REJECTED = "CUSTOM_RULE_REJECTED",
}

export interface TenantAccessErrorDetails {
  tenantId?: string;
  component?: string;
  operation?: string;
}

/**
 * Base Tenant Access Error ("tenant access denied")
 */
export class TenantAccessError extends Error {
  public readonly tenantId?: string;
  public readonly component?: string;
  public readonly operation?: string;

  constructor(
    message: string,
    public readonly code: TenantAccessErrorCode,
    details: TenantAccessErrorDetails = {},
  ) {
    super(message);
    this.name = "TenantAccessError";
    this.tenantId = details.tenantId;
    this.component = details.component;
    this.operation = details.operation;
  }
}

/**
 * No tenant context is active for the unit of work
 */
export class NoTenantContextError extends TenantAccessError {
  constructor(
    message = "No tenant context is set for the current unit of work",
    details?: TenantAccessErrorDetails,
  ) {
    super(message, TenantAccessErrorCode.NO_TENANT_CONTEXT, details);
    this.name = "NoTenantContextError";
  }
}

/**
 * A tenant identifier argument disagrees with the current tenant
 */
export class TenantMismatchError extends TenantAccessError {
  constructor(message: string, details?: TenantAccessErrorDetails) {
    super(message, TenantAccessErrorCode.TENANT_MISMATCH, details);
    this.name = "TenantMismatchError";
  }
}

/**
 * An argument expected to carry tenant ownership does not
 */
export class NotTenantAwareError extends TenantAccessError {
  constructor(message: string, details?: TenantAccessErrorDetails) {
    super(message, TenantAccessErrorCode.NOT_TENANT_AWARE, details);
    this.name = "NotTenantAwareError";
  }
}

/**
 * Data owned by another tenant was addressed
 */
export class CrossTenantAccessDeniedError extends TenantAccessError {
  constructor(message: string, details?: TenantAccessErrorDetails) {
    super(message, TenantAccessErrorCode.CROSS_TENANT_ACCESS_DENIED, details);
    this.name = "CrossTenantAccessDeniedError";
  }
}

/**
 * The current tenant is not active (or its status could not be confirmed)
 */
export class InactiveTenantError extends TenantAccessError {
  constructor(message: string, details?: TenantAccessErrorDetails) {
    super(message, TenantAccessErrorCode.INACTIVE_TENANT, details);
    this.name = "InactiveTenantError";
  }
}

/**
 * A value offered as a tenant identifier is not a UUID
 */
export class InvalidTenantIdError extends TenantAccessError {
  constructor(value: unknown) {
    super(
      `Invalid tenant identifier: ${String(value)}`,
      TenantAccessErrorCode.INVALID_TENANT_ID,
    );
    this.name = "InvalidTenantIdError";
  }
}

/**
 * A guarded argument has an unusable shape
 */
export class InvalidGuardArgumentError extends TenantAccessError {
  constructor(message: string, details?: TenantAccessErrorDetails) {
    super(message, TenantAccessErrorCode.INVALID_GUARD_ARGUMENT, details);
    this.name = "InvalidGuardArgumentError";
  }
}

/**
 * A validation declaration or its collaborators are misconfigured
 */
export class TenantGuardConfigurationError extends TenantAccessError {
  constructor(message: string, details?: TenantAccessErrorDetails) {
    super(message, TenantAccessErrorCode.GUARD_MISCONFIGURED, details);
    this.name = "TenantGuardConfigurationError";
  }
}

/**
 * An operation-specific rule refused the call
 */
export class CustomRuleRejectedError extends TenantAccessError {
  constructor(message: string, details?: TenantAccessErrorDetails) {
    super(message, TenantAccessErrorCode.CUSTOM_RULE_REJECTED, details);
    this.name = "CustomRuleRejectedError";
  }
}

export function isTenantAccessError(error: unknown): error is TenantAccessError {
  return error instanceof TenantAccessError;
}
