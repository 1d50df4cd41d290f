export enum ErrorCode {
  // Validation errors
  VALIDATION_ERROR = "VALIDATION_ERROR",

  // Resource errors
  RESOURCE_NOT_FOUND = "RESOURCE_NOT_FOUND",
  CACHE_NOT_FOUND = "CACHE_NOT_FOUND",

  // System errors
  INTERNAL_SERVER_ERROR = "INTERNAL_SERVER_ERROR",
  DATABASE_ERROR = "DATABASE_ERROR",
  REDIS_ERROR = "REDIS_ERROR",
  CACHE_EVICTION_FAILED = "CACHE_EVICTION_FAILED",
  SERVICE_UNAVAILABLE = "SERVICE_UNAVAILABLE",
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  static fromErrorCode(
    code: ErrorCode,
    message?: string,
    details?: Record<string, unknown>,
  ): AppError {
    const errorConfig = ERROR_STATUS_MAP[code];
    return new AppError(
      code,
      message || errorConfig.defaultMessage,
      errorConfig.statusCode,
      true,
      details,
    );
  }
}

// Status code mapping for error codes
const ERROR_STATUS_MAP: Record<
  ErrorCode,
  { statusCode: number; defaultMessage: string }
> = {
  [ErrorCode.VALIDATION_ERROR]: {
    statusCode: 400,
    defaultMessage: "Validation failed",
  },
  [ErrorCode.RESOURCE_NOT_FOUND]: {
    statusCode: 404,
    defaultMessage: "Resource not found",
  },
  [ErrorCode.CACHE_NOT_FOUND]: {
    statusCode: 404,
    defaultMessage: "Cache not found",
  },
  [ErrorCode.INTERNAL_SERVER_ERROR]: {
    statusCode: 500,
    defaultMessage: "Internal server error",
  },
  [ErrorCode.DATABASE_ERROR]: {
    statusCode: 500,
    defaultMessage: "Database operation failed",
  },
  [ErrorCode.REDIS_ERROR]: {
    statusCode: 500,
    defaultMessage: "Cache backend operation failed",
  },
  [ErrorCode.CACHE_EVICTION_FAILED]: {
    statusCode: 500,
    defaultMessage: "Cache eviction failed",
  },
  [ErrorCode.SERVICE_UNAVAILABLE]: {
    statusCode: 503,
    defaultMessage: "Service temporarily unavailable",
  },
};
