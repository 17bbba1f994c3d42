import type { FastifyBaseLogger } from "fastify";
import type { AppConfig } from "../config/env";
import type { TelemetryStore } from "../db/telemetry-store";
import type { Clock } from "../utils/time";
import { ConfigPublisher } from "./config-publisher";
import { IngestService } from "./ingest-service";
import { MaintenanceService } from "./maintenance-service";
import type { RetainedPublisher } from "./mqtt-publisher";
import { SensorAdminService } from "./sensor-admin-service";
import { TelemetryReadService } from "./telemetry-read-service";

export type AppServices = {
  config: AppConfig;
  store: TelemetryStore;
  ingest: IngestService;
  reads: TelemetryReadService;
  sensorAdmin: SensorAdminService;
  maintenance: MaintenanceService;
};

export function createServices(params: {
  config: AppConfig;
  store: TelemetryStore;
  publisher: RetainedPublisher;
  logger: FastifyBaseLogger;
  clock?: Clock;
}): AppServices {
  const { config, store, publisher, logger, clock } = params;

  return {
    config,
    store,
    ingest: new IngestService({
      store,
      defaultIntervalSec: config.defaultIntervalSec,
      rawRetentionDays: config.rawRetentionDays,
      aggregateMaxAttempts: config.aggregateMaxAttempts,
      clock,
      logger
    }),
    reads: new TelemetryReadService(store, clock),
    sensorAdmin: new SensorAdminService({
      store,
      configPublisher: new ConfigPublisher(publisher, logger),
      clock,
      logger
    }),
    maintenance: new MaintenanceService(store, { clock, logger })
  };
}
