import type { UnitOfWork } from "../modules/tenancy/context/TenantContext";

declare global {
  namespace Express {
    interface Request {
      /** Principal established by the identity layer in front of this service */
      user?: {
        id: string;
        tenantId: string;
      };
      unitOfWork?: UnitOfWork;
    }
  }
}

export {};
