import { createHash } from "crypto";
import {
  TenantAuditRecord,
  TenantAuditSink,
} from "../../modules/tenancy/audit/TenantAuditLog";
import { Queryable } from "../database/pool";

/**
 * Append-only persistence of tenant validation audit records. Each row
 * carries a SHA-256 digest of its content so later tampering is detectable.
 */
export class PgTenantAuditRepository implements TenantAuditSink {
  constructor(private readonly db: Queryable) {}

  async append(record: TenantAuditRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO tenant_audit_log
        (id, occurred_at, component, operation, mode, tenant_id, result, resource_type, error_detail, system_tenant_bypass, hash)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
      [
        record.id,
        record.timestamp,
        record.component,
        record.operation,
        record.mode,
        record.tenantId ?? null,
        record.result,
        record.resourceType,
        record.errorDetail ?? null,
        record.systemTenantBypass,
        this.generateHash(record),
      ],
    );
  }

  generateHash(record: TenantAuditRecord): string {
    const content = JSON.stringify([
      record.id,
      record.timestamp.toISOString(),
      record.component,
      record.operation,
      record.mode,
      record.tenantId ?? null,
      record.result,
      record.resourceType,
      record.errorDetail ?? null,
      record.systemTenantBypass,
    ]);
    return createHash("sha256").update(content).digest("hex");
  }
}
