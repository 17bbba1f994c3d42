import type { LastReading, SensorStatus, TelemetryStore } from "../db/telemetry-store";

export type StatusFields = {
  batteryPct?: number | null;
  rssi?: number | null;
  lat?: number | null;
  lon?: number | null;
  seenAt: Date;
};

/** Status fields the batch carried; absent ones keep their stored value. */
export function toStatusPatch(fields: StatusFields): SensorStatus {
  const status: SensorStatus = { lastSeenAt: fields.seenAt.toISOString() };
  if (typeof fields.batteryPct === "number") {
    status.batteryPct = fields.batteryPct;
  }
  if (typeof fields.rssi === "number") {
    status.rssi = fields.rssi;
  }
  if (typeof fields.lat === "number") {
    status.lastLat = fields.lat;
  }
  if (typeof fields.lon === "number") {
    status.lastLon = fields.lon;
  }
  return status;
}

export class SensorStateUpdater {
  constructor(private readonly store: TelemetryStore) {}

  async updateStatus(
    tenantId: string,
    sensorId: string,
    statusFields: StatusFields,
    lastReading: LastReading
  ): Promise<void> {
    await this.store.updateSensorState(tenantId, sensorId, {
      status: toStatusPatch(statusFields),
      lastReading,
      updatedAt: statusFields.seenAt.toISOString()
    });
  }

  async recordAck(
    tenantId: string,
    sensorId: string,
    ack: { at: Date; ok: number | null; message: string | null }
  ): Promise<void> {
    await this.store.updateSensorState(tenantId, sensorId, {
      status: {
        lastAckAt: ack.at.toISOString(),
        lastAckOk: ack.ok,
        lastAckMsg: ack.message
      },
      updatedAt: ack.at.toISOString()
    });
  }
}
