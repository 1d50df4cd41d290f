/**
 * Tenant Context Module
 *
 * The tenant a unit of work is executing as, and the unit of work that
 * carries it. A UnitOfWork is created per request or per background job and
 * handed explicitly to every operation that needs the current tenant; no
 * context is ever read from process-wide state.
 */

import crypto from "crypto";
import { z } from "zod";
import { InvalidTenantIdError } from "../errors/TenantAccessError";

export interface TenantContext {
  readonly tenantId: string;
  readonly isSystemTenant: boolean;
}

export const uuidSchema = z.string().trim().uuid();

/**
 * Parse an identifier to its canonical lower-case UUID form, or null when
 * the value is not a UUID string.
 */
export function normalizeUuid(value: unknown): string | null {
  const parsed = uuidSchema.safeParse(value);
  return parsed.success ? parsed.data.toLowerCase() : null;
}

export const normalizeTenantId = normalizeUuid;

export function requireTenantId(value: unknown): string {
  const tenantId = normalizeTenantId(value);
  if (tenantId === null) {
    throw new InvalidTenantIdError(value);
  }
  return tenantId;
}

export function createTenantContext(
  tenantId: string,
  systemTenantId: string,
): TenantContext {
  return Object.freeze({
    tenantId,
    isSystemTenant: tenantId === systemTenantId,
  });
}

/**
 * One logical task executing as at most one tenant. A scope opened with
 * openScope is a child unit of work carrying its own context; the parent is
 * never modified, so sibling scopes cannot observe each other's tenant.
 */
export class UnitOfWork {
  readonly id: string;
  readonly startedAt: Date;
  private current: TenantContext | null = null;
  private ended = false;

  constructor(
    readonly label?: string,
    readonly parent: UnitOfWork | null = null,
  ) {
    this.id = crypto.randomUUID();
    this.startedAt = new Date();
  }

  get context(): TenantContext | null {
    return this.isEnded ? null : this.current;
  }

  /**
   * Number of enclosing tenant scopes; 0 for a root unit of work
   */
  get depth(): number {
    return this.parent ? this.parent.depth + 1 : 0;
  }

  /**
   * A scope ends with its parent
   */
  get isEnded(): boolean {
    return this.ended || (this.parent?.isEnded ?? false);
  }

  install(context: TenantContext | null): void {
    this.assertOpen();
    this.current = context;
  }

  openScope(context: TenantContext): UnitOfWork {
    this.assertOpen();
    const scope = new UnitOfWork(this.label, this);
    scope.current = context;
    return scope;
  }

  end(): void {
    this.current = null;
    this.ended = true;
  }

  private assertOpen(): void {
    if (this.isEnded) {
      throw new Error(`Unit of work ${this.id} has already ended`);
    }
  }
}
