import type { FastifyBaseLogger } from "fastify";
import type { DeviceIndexEntry, TelemetryStore } from "../db/telemetry-store";
import { systemClock, type Clock } from "../utils/time";
import { ServiceError } from "./service-error";

export function normalizeHardwareId(hardwareId: string): string {
  return hardwareId.trim().toUpperCase();
}

/**
 * Hardware id → (tenant, sensor, field) lookups. The index table is a cache
 * over the sensors table; a miss falls back to a scan by hardware id and
 * rewrites the entry.
 */
export class DeviceIndex {
  private readonly clock: Clock;

  constructor(
    private readonly store: TelemetryStore,
    private readonly options: { clock?: Clock; logger?: FastifyBaseLogger } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async resolve(hardwareId: string): Promise<DeviceIndexEntry> {
    const normalized = normalizeHardwareId(hardwareId);
    if (normalized.length === 0) {
      throw new ServiceError("invalid_input", "invalid_hardware_id", "Hardware id is required.", {
        field: "id"
      });
    }

    const cached = await this.store.getDeviceIndexEntry(normalized);
    if (cached) {
      return cached;
    }

    const matches = await this.store.findSensorsByHardwareId(normalized, 2);
    if (matches.length === 0) {
      throw new ServiceError(
        "not_found",
        "sensor_not_registered",
        `No sensor is registered for hardware id ${normalized}.`,
        { hardwareId: normalized }
      );
    }
    if (matches.length > 1) {
      throw new ServiceError(
        "conflict",
        "duplicate_hardware_id",
        `Hardware id ${normalized} is assigned to more than one sensor.`,
        { hardwareId: normalized }
      );
    }

    const sensor = matches[0];
    const entry: DeviceIndexEntry = {
      tenantId: sensor.tenantId,
      sensorId: sensor.sensorId,
      fieldId: sensor.fieldId
    };
    await this.store.putDeviceIndexEntry(normalized, entry, this.clock().toISOString());
    this.options.logger?.info(
      { hardware_id: normalized, tenant_id: entry.tenantId, sensor_id: entry.sensorId },
      "device_index_repaired"
    );
    return entry;
  }
}
