import { FastifyInstance } from "fastify";
import { z } from "zod";
import { listSampleFamilies } from "../../domain/sample-families";
import { sendValidationError } from "../../http/api-error";
import { requireIngestKey } from "../../http/auth-guards";
import type { AppServices } from "../../services/container";

const hardwareParamsSchema = z.object({
  hardwareId: z.string().trim().min(1).max(64)
});

const ackSchema = z
  .object({
    id: z.string().trim().min(1).max(64),
    ok: z.number().int().nullish(),
    m: z.string().max(500).nullish(),
    av: z.number().int().nullish(),
    ac: z.string().max(16).nullish(),
    nv: z.number().int().nullish(),
    nc: z.string().max(16).nullish()
  })
  .passthrough();

export async function ingestRoutes(
  server: FastifyInstance,
  options: { services: AppServices }
): Promise<void> {
  const { services } = options;
  const ingestKeyGuard = requireIngestKey(services.config.ingestApiKey);

  for (const family of listSampleFamilies()) {
    server.post(`/sensors/${family.route}`, { preHandler: ingestKeyGuard }, async (request, reply) => {
      const parsed = family.batchSchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error, "Invalid telemetry batch.");
      }
      return services.ingest.ingestBatch(family, parsed.data);
    });
  }

  server.post("/sensors/ack/:hardwareId", { preHandler: ingestKeyGuard }, async (request, reply) => {
    const params = hardwareParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error, "Invalid hardware id.");
    }
    const parsed = ackSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error, "Invalid ack payload.");
    }
    return services.ingest.recordAck(params.data.hardwareId, parsed.data);
  });

  server.get("/devices/:hardwareId/resolve", { preHandler: ingestKeyGuard }, async (request, reply) => {
    const params = hardwareParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error, "Invalid hardware id.");
    }
    return services.ingest.resolveDevice(params.data.hardwareId);
  });
}
