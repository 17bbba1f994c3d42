import { FastifyInstance } from "fastify";
import { z } from "zod";
import { sendValidationError } from "../../http/api-error";
import { requireIngestKey } from "../../http/auth-guards";
import type { AppServices } from "../../services/container";
import { RANGE_KEYS } from "../../services/telemetry-read-service";

const sensorParamsSchema = z.object({
  tenantId: z.string().min(1).max(128),
  sensorId: z.string().min(1).max(128)
});

const readingsQuerySchema = z.object({
  range: z.enum(RANGE_KEYS).default("1d"),
  limit: z.coerce.number().int().min(1).max(5000).default(500)
});

const dailyQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(3660).default(365)
});

export async function readingRoutes(
  server: FastifyInstance,
  options: { services: AppServices }
): Promise<void> {
  const { services } = options;
  const ingestKeyGuard = requireIngestKey(services.config.ingestApiKey);

  server.get("/:tenantId/sensors/:sensorId/readings", { preHandler: ingestKeyGuard }, async (request, reply) => {
    const params = sensorParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error, "Invalid sensor path.");
    }
    const query = readingsQuerySchema.safeParse(request.query);
    if (!query.success) {
      return sendValidationError(reply, query.error, "Invalid query.");
    }
    return services.reads.listReadings(
      params.data.tenantId,
      params.data.sensorId,
      query.data.range,
      query.data.limit
    );
  });

  server.get(
    "/:tenantId/sensors/:sensorId/daily-aggregates",
    { preHandler: ingestKeyGuard },
    async (request, reply) => {
      const params = sensorParamsSchema.safeParse(request.params);
      if (!params.success) {
        return sendValidationError(reply, params.error, "Invalid sensor path.");
      }
      const query = dailyQuerySchema.safeParse(request.query);
      if (!query.success) {
        return sendValidationError(reply, query.error, "Invalid query.");
      }
      return services.reads.listDailyAggregates(params.data.tenantId, params.data.sensorId, query.data.days);
    }
  );
}
