/**
 * Tenant validation audit trail
 *
 * One record per validated invocation whose declaration enables auditLog.
 * Sinks are append-only; a sink that fails is reported through the
 * structured logger and never fails the guarded call.
 */

import crypto from "crypto";
import { structuredLogger } from "../../../core/logger/structuredLogger";
import type { TenantValidationMode } from "../validation/TenantValidationDeclaration";

export type TenantAuditResult = "SUCCESS" | "FAILED";

export interface TenantAuditRecord {
  readonly id: string;
  readonly timestamp: Date;
  readonly component: string;
  readonly operation: string;
  readonly mode: TenantValidationMode;
  readonly tenantId?: string;
  readonly result: TenantAuditResult;
  readonly resourceType: string;
  readonly errorDetail?: string;
  readonly systemTenantBypass: boolean;
}

export type TenantAuditRecordInput = Omit<TenantAuditRecord, "id" | "timestamp">;

export function createAuditRecord(input: TenantAuditRecordInput): TenantAuditRecord {
  return Object.freeze({
    id: crypto.randomUUID(),
    timestamp: new Date(),
    ...input,
  });
}

export interface TenantAuditSink {
  append(record: TenantAuditRecord): void | Promise<void>;
}

export interface TenantAuditQuery {
  tenantId?: string;
  result?: TenantAuditResult;
  component?: string;
}

/**
 * Keeps records in memory, in arrival order
 */
export class InMemoryTenantAuditSink implements TenantAuditSink {
  private readonly records: TenantAuditRecord[] = [];

  append(record: TenantAuditRecord): void {
    this.records.push(record);
  }

  getRecords(): readonly TenantAuditRecord[] {
    return [...this.records];
  }

  find(query: TenantAuditQuery): TenantAuditRecord[] {
    return this.records.filter(
      (record) =>
        (query.tenantId === undefined || record.tenantId === query.tenantId) &&
        (query.result === undefined || record.result === query.result) &&
        (query.component === undefined || record.component === query.component),
    );
  }

  get size(): number {
    return this.records.length;
  }
}

/**
 * Writes each record as a structured audit log line
 */
export class StructuredLogAuditSink implements TenantAuditSink {
  append(record: TenantAuditRecord): void {
    structuredLogger.logAuditEvent({
      id: record.id,
      timestamp: record.timestamp,
      tenantId: record.tenantId,
      action: `TENANT_VALIDATION:${record.mode}`,
      resource: `${record.component}.${record.operation}`,
      outcome: record.result === "SUCCESS" ? "SUCCESS" : "FAILURE",
      errorMessage: record.errorDetail,
      details: {
        resourceType: record.resourceType,
        systemTenantBypass: record.systemTenantBypass,
      },
    });
  }
}

/**
 * Fans records out to several sinks; each sink is isolated from the others
 */
export class CompositeAuditSink implements TenantAuditSink {
  constructor(private readonly sinks: readonly TenantAuditSink[]) {}

  async append(record: TenantAuditRecord): Promise<void> {
    for (const sink of this.sinks) {
      await appendSafely(sink, record);
    }
  }
}

export async function appendSafely(
  sink: TenantAuditSink,
  record: TenantAuditRecord,
): Promise<void> {
  try {
    await sink.append(record);
  } catch (error) {
    structuredLogger.error(
      "Failed to persist tenant audit record",
      error instanceof Error ? error : new Error(String(error)),
      {
        tenantId: record.tenantId,
        module: "tenant-validation",
        action: "appendAuditRecord",
        metadata: { auditId: record.id, component: record.component, operation: record.operation },
      },
    );
  }
}
