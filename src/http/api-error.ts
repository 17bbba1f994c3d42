import { FastifyInstance, FastifyReply } from "fastify";
import { ZodError } from "zod";
import { metricsService } from "../services/metrics-service";
import { isServiceError } from "../services/service-error";

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: string,
  message: string,
  details?: unknown
) {
  metricsService.observeApiError({ statusCode, code });
  return reply.code(statusCode).send({
    code,
    message,
    details: details ?? null,
    request_id: reply.request.id
  });
}

export function sendValidationError(reply: FastifyReply, error: ZodError, message = "Invalid request body.") {
  return sendApiError(reply, 400, "validation_error", message, error.flatten());
}

/**
 * Service errors become their API error; Fastify's own validation errors a
 * 400; anything else is logged and reported as a 500.
 */
export function registerErrorHandler(server: FastifyInstance): void {
  server.setErrorHandler((error, request, reply) => {
    if (isServiceError(error)) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error, cause: error.cause }, "service_error");
      }
      return sendApiError(reply, error.statusCode, error.code, error.message, error.details);
    }
    if (error.validation) {
      return sendApiError(reply, 400, "validation_error", error.message);
    }
    if (typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500) {
      return sendApiError(reply, error.statusCode, error.code ?? "bad_request", error.message);
    }

    request.log.error({ err: error }, "unhandled_error");
    return sendApiError(reply, 500, "internal_error", "Internal server error.");
  });
}
