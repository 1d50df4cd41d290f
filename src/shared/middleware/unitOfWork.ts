import { Request, Response, NextFunction, RequestHandler } from "express";
import { TenantContextService } from "../../modules/tenancy/context/TenantContextService";
import "../../types/express";

export type TenantResolver = (req: Request) => string | undefined;

const tenantFromPrincipal: TenantResolver = (req) => req.user?.tenantId;

/**
 * Opens one unit of work per request and installs the tenant of the
 * authenticated principal. The unit of work ends when the response is
 * finished or the connection closes, so no context outlives its request.
 */
export function createUnitOfWorkMiddleware(
  contextService: TenantContextService,
  resolveTenant: TenantResolver = tenantFromPrincipal,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const uow = contextService.beginUnitOfWork(`${req.method} ${req.path}`);
    req.unitOfWork = uow;

    const release = () => contextService.endUnitOfWork(uow);
    res.once("finish", release);
    res.once("close", release);

    const tenantId = resolveTenant(req);
    if (tenantId !== undefined) {
      try {
        contextService.setCurrentTenant(uow, tenantId);
      } catch (error) {
        next(error);
        return;
      }
    }
    next();
  };
}
