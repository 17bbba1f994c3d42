import fastify from "fastify";
import jwt from "@fastify/jwt";
import type { AppConfig } from "./config/env";
import type { TelemetryStore } from "./db/telemetry-store";
import { registerErrorHandler } from "./http/api-error";
import { adminRoutes } from "./modules/admin/routes";
import { ingestRoutes } from "./modules/ingest/routes";
import { maintenanceRoutes } from "./modules/maintenance/routes";
import { readingRoutes } from "./modules/readings/routes";
import { createServices } from "./services/container";
import { metricsService } from "./services/metrics-service";
import type { RetainedPublisher } from "./services/mqtt-publisher";
import type { Clock } from "./utils/time";

export type BuildAppOptions = {
  config: AppConfig;
  store: TelemetryStore;
  publisher: RetainedPublisher;
  clock?: Clock;
};

export function buildApp(options: BuildAppOptions) {
  const { config, store, publisher, clock } = options;

  const app = fastify({
    logger: config.logLevel === false ? false : { level: config.logLevel },
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "request_id",
    trustProxy: config.trustProxy
  });

  app.register(jwt, {
    secret: config.jwtSecret
  });
  registerErrorHandler(app);

  const services = createServices({ config, store, publisher, logger: app.log, clock });

  app.get("/health", async () => {
    await store.ping();
    return {
      status: "ok",
      uptime_seconds: process.uptime(),
      now: new Date().toISOString()
    };
  });

  app.get("/metrics", async (_request, reply) => {
    const uptime = process.uptime().toFixed(3);
    reply.type("text/plain; version=0.0.4");
    return [
      "# HELP telemetry_uptime_seconds Process uptime in seconds.",
      "# TYPE telemetry_uptime_seconds gauge",
      `telemetry_uptime_seconds ${uptime}`,
      metricsService.renderPrometheus()
    ].join("\n");
  });

  app.register(ingestRoutes, { services });
  app.register(readingRoutes, { prefix: "/tenants", services });
  app.register(adminRoutes, { prefix: "/tenants", services });
  app.register(maintenanceRoutes, { prefix: "/maintenance", services });

  app.addHook("onClose", async () => {
    await publisher.close();
  });

  return app;
}
