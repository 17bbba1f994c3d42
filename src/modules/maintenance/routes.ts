import { FastifyInstance } from "fastify";
import { z } from "zod";
import { sendValidationError } from "../../http/api-error";
import { requireIngestKey } from "../../http/auth-guards";
import type { AppServices } from "../../services/container";

const purgeSchema = z.object({
  olderThanDays: z.coerce.number().int().min(1).max(3650).default(30),
  batchSize: z.coerce.number().int().min(1).max(500).default(500),
  dryRun: z.boolean().default(false)
});

const thresholdsSchema = z.object({
  staleHours: z.coerce.number().int().min(1).max(168).default(2),
  lowBatteryPct: z.coerce.number().int().min(1).max(100).default(20)
});

const tenantStatsSchema = thresholdsSchema.extend({
  tenantId: z.string().trim().min(1)
});

export async function maintenanceRoutes(
  server: FastifyInstance,
  options: { services: AppServices }
): Promise<void> {
  const { services } = options;
  const preHandler = requireIngestKey(services.config.ingestApiKey);

  server.post("/purge-readings", { preHandler }, async (request, reply) => {
    const parsed = purgeSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }
    return services.maintenance.purgeReadings(parsed.data);
  });

  server.post("/recompute-tenant-stats", { preHandler }, async (request, reply) => {
    const parsed = tenantStatsSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }
    const { tenantId, ...thresholds } = parsed.data;
    const stats = await services.maintenance.recomputeTenantStats(tenantId, thresholds);
    return { status: "ok", ...stats };
  });

  server.post("/recompute-all-tenant-stats", { preHandler }, async (request, reply) => {
    const parsed = thresholdsSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }
    const tenants = await services.maintenance.recomputeAllTenantStats(parsed.data);
    return { status: "ok", tenants };
  });
}
