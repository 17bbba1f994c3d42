import { FastifyInstance } from "fastify";
import { z } from "zod";
import { sendValidationError } from "../../http/api-error";
import { authenticate, requireTenantRole } from "../../http/auth-guards";
import type { AppServices } from "../../services/container";

const tenantParamsSchema = z.object({
  tenantId: z.string().min(1).max(128)
});

const sensorParamsSchema = tenantParamsSchema.extend({
  sensorId: z.string().min(1).max(128)
});

const versionParamsSchema = sensorParamsSchema.extend({
  ver: z.coerce.number().int().min(1)
});

const createSensorSchema = z.object({
  name: z.string().trim().min(1).max(120),
  fieldId: z.string().trim().min(1).max(128).nullish(),
  location: z.record(z.number().finite()).nullish()
});

export async function adminRoutes(
  server: FastifyInstance,
  options: { services: AppServices }
): Promise<void> {
  const { services } = options;
  const preHandlers = [authenticate, requireTenantRole(services.store, "tech")];

  server.post("/:tenantId/sensors", { preHandler: preHandlers }, async (request, reply) => {
    const params = tenantParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error, "Invalid tenant id.");
    }
    const parsed = createSensorSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const created = await services.sensorAdmin.createSensor(params.data.tenantId, parsed.data);
    return reply.code(201).send(created);
  });

  server.post(
    "/:tenantId/sensors/:sensorId/configs/publish",
    { preHandler: preHandlers },
    async (request, reply) => {
      const params = sensorParamsSchema.safeParse(request.params);
      if (!params.success) {
        return sendValidationError(reply, params.error, "Invalid sensor path.");
      }
      return services.sensorAdmin.publishConfig(
        params.data.tenantId,
        params.data.sensorId,
        request.body,
        request.user.uid
      );
    }
  );

  server.post(
    "/:tenantId/sensors/:sensorId/configs/:ver/republish",
    { preHandler: preHandlers },
    async (request, reply) => {
      const params = versionParamsSchema.safeParse(request.params);
      if (!params.success) {
        return sendValidationError(reply, params.error, "Invalid config version.");
      }
      return services.sensorAdmin.republishConfig(
        params.data.tenantId,
        params.data.sensorId,
        params.data.ver,
        request.user.uid
      );
    }
  );
}
