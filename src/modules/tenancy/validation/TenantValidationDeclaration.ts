/**
 * Tenant validation declarations
 *
 * A declaration states which tenant check guards an operation. Declarations
 * are completed with defaults and frozen when declared; a declaration that
 * names no parameter for a mode that needs one is rejected here rather than
 * when the operation is first called.
 */

import type { TenantContext } from "../context/TenantContext";
import { TenantGuardConfigurationError } from "../errors/TenantAccessError";

export enum TenantValidationMode {
  REQUIRE_CONTEXT = "REQUIRE_CONTEXT",
  VALIDATE_TENANT_ID = "VALIDATE_TENANT_ID",
  VALIDATE_ENTITY_TENANT = "VALIDATE_ENTITY_TENANT",
  VALIDATE_ENTITY_IDS = "VALIDATE_ENTITY_IDS",
  READ_ACCESS = "READ_ACCESS",
  WRITE_ACCESS = "WRITE_ACCESS",
  DELETE_ACCESS = "DELETE_ACCESS",
  CUSTOM = "CUSTOM",
}

export interface CustomCheckInput {
  context: TenantContext;
  component: string;
  operation: string;
  args: Readonly<Record<string, unknown>>;
}

export type CustomTenantCheck = (input: CustomCheckInput) => boolean | Promise<boolean>;

export interface TenantValidationDeclaration {
  readonly mode: TenantValidationMode;
  readonly tenantIdParam?: string;
  readonly entityParam?: string;
  readonly entityIdsParam?: string;
  /** When false, a call without tenant context passes unchecked */
  readonly requireTenantContext: boolean;
  readonly allowSystemTenant: boolean;
  readonly validateTenantStatus: boolean;
  readonly throwOnFailure: boolean;
  readonly auditLog: boolean;
  readonly message?: string;
  readonly resourceType?: string;
  readonly operation?: string;
  readonly customCheck?: CustomTenantCheck;
}

export type TenantValidationOptions = Partial<TenantValidationDeclaration>;

const DEFAULT_DECLARATION = {
  mode: TenantValidationMode.REQUIRE_CONTEXT,
  requireTenantContext: true,
  allowSystemTenant: false,
  validateTenantStatus: true,
  throwOnFailure: true,
  auditLog: true,
} as const;

// Modes whose check needs no tenant to compare against
const CONTEXT_OPTIONAL_MODES: ReadonlySet<TenantValidationMode> = new Set([
  TenantValidationMode.REQUIRE_CONTEXT,
  TenantValidationMode.READ_ACCESS,
]);

const blank = (value: string | undefined): boolean =>
  value === undefined || value.trim() === "";

export function declareTenantValidation(
  options: TenantValidationOptions = {},
): TenantValidationDeclaration {
  const declaration: TenantValidationDeclaration = {
    ...DEFAULT_DECLARATION,
    ...options,
  };

  switch (declaration.mode) {
    case TenantValidationMode.VALIDATE_TENANT_ID:
      if (blank(declaration.tenantIdParam)) {
        throw new TenantGuardConfigurationError(
          "VALIDATE_TENANT_ID requires tenantIdParam",
        );
      }
      break;
    case TenantValidationMode.VALIDATE_ENTITY_TENANT:
      if (blank(declaration.entityParam)) {
        throw new TenantGuardConfigurationError(
          "VALIDATE_ENTITY_TENANT requires entityParam",
        );
      }
      break;
    case TenantValidationMode.VALIDATE_ENTITY_IDS:
      if (blank(declaration.entityIdsParam)) {
        throw new TenantGuardConfigurationError(
          "VALIDATE_ENTITY_IDS requires entityIdsParam",
        );
      }
      if (blank(declaration.resourceType)) {
        throw new TenantGuardConfigurationError(
          "VALIDATE_ENTITY_IDS requires resourceType",
        );
      }
      break;
    default:
      break;
  }

  if (!declaration.requireTenantContext && !CONTEXT_OPTIONAL_MODES.has(declaration.mode)) {
    throw new TenantGuardConfigurationError(
      `requireTenantContext cannot be disabled for ${declaration.mode}`,
    );
  }

  return Object.freeze(declaration);
}

/**
 * Modes that need the tenant to be active whatever validateTenantStatus says
 */
export function requiresActiveTenant(mode: TenantValidationMode): boolean {
  return (
    mode === TenantValidationMode.WRITE_ACCESS ||
    mode === TenantValidationMode.DELETE_ACCESS
  );
}
