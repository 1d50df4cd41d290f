/**
 * Structured Logger - JSON logging for the tenancy core
 * Log levels and tenant-aware logging context. The correlation id travels
 * in the context of each call (the unit of work id), never in logger state.
 */

import { config } from "../../shared/config";

export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

export interface LogContext {
  correlationId?: string;
  userId?: string;
  tenantId?: string;
  module?: string;
  action?: string;
  metadata?: Record<string, unknown>;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  userId?: string;
  tenantId?: string;
  module?: string;
  action?: string;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  jsonFormat: boolean;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

const parseLogLevel = (value: string): LogLevel => {
  switch (value.toUpperCase()) {
    case "DEBUG":
      return "DEBUG";
    case "WARN":
      return "WARN";
    case "ERROR":
      return "ERROR";
    default:
      return "INFO";
  }
};

export class StructuredLogger {
  private config: LoggerConfig;
  private static instance: StructuredLogger;

  private constructor(loggerConfig?: Partial<LoggerConfig>) {
    this.config = {
      level: loggerConfig?.level ?? "INFO",
      jsonFormat: loggerConfig?.jsonFormat ?? true,
    };
  }

  /**
   * Get singleton instance of the structured logger
   */
  static getInstance(loggerConfig?: Partial<LoggerConfig>): StructuredLogger {
    if (!StructuredLogger.instance) {
      StructuredLogger.instance = new StructuredLogger(loggerConfig);
    }
    return StructuredLogger.instance;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_VALUES[level] >= LEVEL_VALUES[this.config.level];
  }

  /**
   * Create a log entry with all context
   */
  private createLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext & { error?: Error },
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (context) {
      if (context.correlationId) entry.correlationId = context.correlationId;
      if (context.userId) entry.userId = context.userId;
      if (context.tenantId) entry.tenantId = context.tenantId;
      if (context.module) entry.module = context.module;
      if (context.action) entry.action = context.action;
      if (context.metadata) entry.metadata = context.metadata;

      if (context.error) {
        entry.error = {
          name: context.error.name,
          message: context.error.message,
          stack: context.error.stack,
        };
      }
    }

    return entry;
  }

  private formatLogEntry(entry: LogEntry): string {
    if (this.config.jsonFormat) {
      return JSON.stringify(entry);
    }

    const { timestamp, level, message, ...rest } = entry;
    const restStr =
      Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
    return `[${timestamp}] ${level}: ${message}${restStr}`;
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog("INFO")) {
      console.log(this.formatLogEntry(this.createLogEntry("INFO", message, context)));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog("WARN")) {
      console.warn(this.formatLogEntry(this.createLogEntry("WARN", message, context)));
    }
  }

  error(message: string, error?: Error, context?: LogContext): void {
    if (this.shouldLog("ERROR")) {
      const entry = this.createLogEntry("ERROR", message, {
        ...context,
        error,
      });
      console.error(this.formatLogEntry(entry));
    }
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog("DEBUG")) {
      console.debug(this.formatLogEntry(this.createLogEntry("DEBUG", message, context)));
    }
  }

  /**
   * Log security event
   */
  logSecurity(
    event: string,
    details?: {
      correlationId?: string;
      userId?: string;
      tenantId?: string;
      severity?: "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";
      metadata?: Record<string, unknown>;
    },
  ): void {
    this.warn(`Security Event: ${event}`, {
      correlationId: details?.correlationId,
      userId: details?.userId,
      tenantId: details?.tenantId,
      module: "security",
      action: event,
      metadata: {
        severity: details?.severity || "MEDIUM",
        ...details?.metadata,
      },
    });
  }

  /**
   * Log audit event. Failed outcomes are written at WARN so they survive
   * an INFO-suppressed production level.
   */
  logAuditEvent(entry: {
    id: string;
    timestamp: Date;
    tenantId?: string;
    action: string;
    resource: string;
    outcome: "SUCCESS" | "FAILURE";
    errorMessage?: string;
    details?: Record<string, unknown>;
  }): void {
    const context: LogContext = {
      tenantId: entry.tenantId,
      module: "audit",
      action: entry.action,
      metadata: {
        auditId: entry.id,
        resource: entry.resource,
        outcome: entry.outcome,
        errorMessage: entry.errorMessage,
        details: entry.details,
        timestamp: entry.timestamp.toISOString(),
      },
    };
    const message = `Audit: ${entry.action} on ${entry.resource}`;

    if (entry.outcome === "FAILURE") {
      this.warn(message, context);
    } else {
      this.info(message, context);
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: { userId?: string; tenantId?: string; module?: string }): ChildLogger {
    return new ChildLogger(this, context);
  }
}

/**
 * Child logger that automatically includes context in all logs
 */
export class ChildLogger {
  constructor(
    private parent: StructuredLogger,
    private context: {
      userId?: string;
      tenantId?: string;
      module?: string;
    },
  ) {}

  info(message: string, context?: { action?: string; metadata?: Record<string, unknown> }): void {
    this.parent.info(message, { ...this.context, ...context });
  }

  warn(message: string, context?: { action?: string; metadata?: Record<string, unknown> }): void {
    this.parent.warn(message, { ...this.context, ...context });
  }

  error(
    message: string,
    error?: Error,
    context?: { action?: string; metadata?: Record<string, unknown> },
  ): void {
    this.parent.error(message, error, { ...this.context, ...context });
  }

  debug(message: string, context?: { action?: string; metadata?: Record<string, unknown> }): void {
    this.parent.debug(message, { ...this.context, ...context });
  }
}

// Export singleton instance
export const structuredLogger = StructuredLogger.getInstance({
  level: parseLogLevel(config.logLevel),
  jsonFormat: config.jsonLogFormat,
});
