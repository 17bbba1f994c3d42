import type { FastifyBaseLogger } from "fastify";
import type { SensorRecord, TelemetryStore } from "../db/telemetry-store";
import { newId, randomHardwareId } from "../utils/crypto";
import { systemClock, type Clock } from "../utils/time";
import { ConfigPublisher, renderPlan, type PublishedConfig, type RetainedConfig } from "./config-publisher";
import { normalizeHardwareId } from "./device-index";
import { metricsService } from "./metrics-service";
import { crc32Hex } from "./plan-codec";
import { planSchema } from "./plan-schema";
import { ServiceError, isServiceError } from "./service-error";

const HARDWARE_ID_PATTERN = /^[0-9A-F]{6}$/;
const MAX_HARDWARE_ID_ATTEMPTS = 20;

export type CreateSensorInput = {
  name: string;
  fieldId?: string | null;
  location?: Record<string, number> | null;
};

export type CreatedSensor = {
  sensorId: string;
  hardwareId: string;
};

export type SensorAdminDeps = {
  store: TelemetryStore;
  configPublisher: ConfigPublisher;
  clock?: Clock;
  logger?: FastifyBaseLogger;
  generateHardwareId?: () => string;
  generateSensorId?: () => string;
};

export class SensorAdminService {
  private readonly clock: Clock;

  constructor(private readonly deps: SensorAdminDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async createSensor(tenantId: string, input: CreateSensorInput): Promise<CreatedSensor> {
    const generateHardwareId = this.deps.generateHardwareId ?? randomHardwareId;
    const sensorId = (this.deps.generateSensorId ?? newId)();
    const createdAt = this.clock().toISOString();

    for (let attempt = 1; attempt <= MAX_HARDWARE_ID_ATTEMPTS; attempt += 1) {
      const hardwareId = normalizeHardwareId(generateHardwareId());
      if (!HARDWARE_ID_PATTERN.test(hardwareId)) {
        continue;
      }

      const created = await this.deps.store.insertSensor({
        tenantId,
        sensorId,
        name: input.name,
        fieldId: input.fieldId ?? null,
        hardwareId,
        location: input.location ?? null,
        createdAt
      });
      if (created) {
        this.deps.logger?.info(
          { tenant_id: tenantId, sensor_id: sensorId, hardware_id: hardwareId, attempt },
          "sensor_created"
        );
        return { sensorId, hardwareId };
      }
    }

    throw new ServiceError(
      "conflict",
      "hardware_id_exhausted",
      `Failed to allocate a hardware id after ${MAX_HARDWARE_ID_ATTEMPTS} attempts.`
    );
  }

  private async requireSensorHardwareId(tenantId: string, sensorId: string): Promise<SensorRecord> {
    const sensor = await this.deps.store.getSensor(tenantId, sensorId);
    if (!sensor) {
      throw new ServiceError("not_found", "sensor_not_found", "Sensor not found.", { tenantId, sensorId });
    }
    if (!HARDWARE_ID_PATTERN.test(normalizeHardwareId(sensor.hardwareId))) {
      throw new ServiceError("internal", "sensor_hardware_id_invalid", "Sensor hardware id is invalid.", {
        tenantId,
        sensorId
      });
    }
    return sensor;
  }

  /** The active version's stored bytes, which are what the device topics hold. */
  private async retainedConfigOf(sensor: SensorRecord): Promise<RetainedConfig | null> {
    if (sensor.activeConfig.ver <= 0) {
      return null;
    }
    const stored = await this.deps.store.getConfigVersion(sensor.tenantId, sensor.sensorId, sensor.activeConfig.ver);
    return stored ? { ver: stored.ver, json: stored.json, cc: stored.cc } : null;
  }

  /**
   * Validates the plan, stores it as the next (pending) version and publishes
   * it. Nothing reaches the broker unless validation and the store write
   * succeed; the version becomes active only once both messages landed.
   */
  async publishConfig(
    tenantId: string,
    sensorId: string,
    planInput: unknown,
    uid: string | null
  ): Promise<PublishedConfig> {
    const parsed = planSchema.safeParse(planInput);
    if (!parsed.success) {
      throw new ServiceError("invalid_input", "invalid_plan", "Invalid plan.", parsed.error.flatten());
    }
    const plan = parsed.data;

    const sensor = await this.requireSensorHardwareId(tenantId, sensorId);
    const stored = await this.deps.store.createConfigVersion({
      tenantId,
      sensorId,
      createdByUid: uid,
      createdAt: this.clock().toISOString(),
      render: (ver) => renderPlan(plan, ver)
    });

    const published = await this.emit("publish", sensor, stored);
    await this.activate(tenantId, sensorId, published);
    return published;
  }

  /** Re-emits a stored version's bytes and makes it the active one. */
  async republishConfig(
    tenantId: string,
    sensorId: string,
    ver: number,
    uid: string | null
  ): Promise<PublishedConfig> {
    const sensor = await this.requireSensorHardwareId(tenantId, sensorId);
    const stored = await this.deps.store.getConfigVersion(tenantId, sensorId, ver);
    if (!stored) {
      throw new ServiceError("not_found", "config_not_found", `Config version ${ver} not found.`, {
        tenantId,
        sensorId,
        ver
      });
    }
    if (crc32Hex(stored.json) !== stored.cc) {
      throw new ServiceError("internal", "stored_config_invalid", "Stored config checksum does not match.", {
        ver
      });
    }

    const published = await this.emit("republish", sensor, stored);
    await this.deps.store.markConfigRepublished(tenantId, sensorId, ver, {
      uid,
      at: this.clock().toISOString()
    });
    await this.activate(tenantId, sensorId, published);
    return published;
  }

  private async activate(tenantId: string, sensorId: string, published: PublishedConfig): Promise<void> {
    await this.deps.store.activateConfigVersion(tenantId, sensorId, {
      ver: published.ver,
      cc: published.cc,
      at: this.clock().toISOString()
    });
  }

  private async emit(
    kind: "publish" | "republish",
    sensor: SensorRecord,
    config: RetainedConfig
  ): Promise<PublishedConfig> {
    const hardwareId = normalizeHardwareId(sensor.hardwareId);
    const previous = await this.retainedConfigOf(sensor);
    try {
      const published = await this.deps.configPublisher.publishRendered(
        hardwareId,
        config.ver,
        { json: config.json, cc: config.cc },
        previous
      );
      metricsService.observeConfigPublish(kind, "ok");
      return published;
    } catch (error) {
      metricsService.observeConfigPublish(kind, "error");
      if (isServiceError(error)) {
        throw error;
      }
      throw new ServiceError("publish_failed", "publish_failed", "Config publish failed.", { ver: config.ver }, {
        cause: error
      });
    }
  }
}
