import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { AppError } from "../errors/AppError";
import { structuredLogger } from "../../core/logger/structuredLogger";
import "../../types/express";
import {
  TenantAccessError,
  TenantAccessErrorCode,
} from "../../modules/tenancy/errors/TenantAccessError";

const BAD_REQUEST_TENANT_CODES: ReadonlySet<TenantAccessErrorCode> = new Set([
  TenantAccessErrorCode.INVALID_TENANT_ID,
  TenantAccessErrorCode.INVALID_GUARD_ARGUMENT,
]);

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  const tenantId = req.unitOfWork?.context?.tenantId;

  if (error instanceof TenantAccessError) {
    const status = BAD_REQUEST_TENANT_CODES.has(error.code) ? 400 : 403;
    structuredLogger.warn("Tenant access refused", {
      tenantId,
      module: "http",
      action: `${req.method} ${req.path}`,
      metadata: { code: error.code, status },
    });
    return res.status(status).json({
      error: error.message,
      code: error.code,
    });
  }

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      structuredLogger.error("Request failed", error, {
        tenantId,
        module: "http",
        action: `${req.method} ${req.path}`,
      });
    }
    return res.status(error.statusCode).json({
      error: error.message,
      code: error.code,
      ...(error.details && { details: error.details }),
    });
  }

  if (error instanceof ZodError) {
    return res.status(400).json({
      error: "Validation failed",
      code: "VALIDATION_ERROR",
      details: error.flatten(),
    });
  }

  structuredLogger.error("Unhandled request error", error, {
    tenantId,
    module: "http",
    action: `${req.method} ${req.path}`,
  });

  res.status(500).json({
    error: "Internal server error",
    code: "INTERNAL_SERVER_ERROR",
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: "Route not found",
    code: "RESOURCE_NOT_FOUND",
    path: req.path,
    method: req.method,
  });
};
