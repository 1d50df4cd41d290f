import { z } from "zod";

const tenantParams = z.object({
  tenantId: z.string().uuid("tenantId must be a UUID"),
});

export const tenantCacheQuerySchema = z.object({
  params: tenantParams,
});

export const evictTenantCacheSchema = z.object({
  params: tenantParams,
  body: z
    .object({
      cacheName: z.string().min(1).max(100).optional(),
    })
    .optional(),
});

export type TenantCacheParams = z.infer<typeof tenantParams>;
export type EvictTenantCacheBody = NonNullable<
  z.infer<typeof evictTenantCacheSchema>["body"]
>;
