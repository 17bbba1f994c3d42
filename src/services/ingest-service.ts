import type { FastifyBaseLogger } from "fastify";
import type { MetricValues, SampleFamily, SampleFamilyName, TelemetryBatch } from "../domain/sample-families";
import type { ReadingMeta, SensorRecord, TelemetryStore } from "../db/telemetry-store";
import { sha256 } from "../utils/crypto";
import { systemClock, type Clock } from "../utils/time";
import { Aggregator, type BucketValues } from "./aggregator";
import { DeviceIndex, normalizeHardwareId } from "./device-index";
import { metricsService } from "./metrics-service";
import { ReadingMerger } from "./reading-merger";
import { SensorStateUpdater } from "./sensor-state";
import { ServiceError } from "./service-error";
import { bucketize, resolveIntervalSec } from "./time-bucketer";

export type IngestResult = {
  status: "success";
  tenantId: string;
  sensorId: string;
  fieldId: string | null;
  type: SampleFamilyName;
  ingested: number;
  bucketIds: string[];
  updatedDailyAggDays: string[];
  foldsApplied: number;
  foldsSkipped: number;
};

export type AckPayload = {
  id: string;
  ok?: number | null;
  m?: string | null;
  av?: number | null;
  ac?: string | null;
  nv?: number | null;
  nc?: string | null;
};

export type AckResult = {
  ok: true;
  ackId: string;
  tenantId: string;
  sensorId: string;
};

export type ResolvedDevice = {
  deviceId: string;
  tenantId: string;
  sensorId: string;
  sensor: SensorRecord | null;
};

type BucketWrite = {
  bucketId: string;
  dayId: string;
  timestamp: Date;
  values: MetricValues;
};

export type IngestServiceDeps = {
  store: TelemetryStore;
  defaultIntervalSec: number;
  rawRetentionDays: number;
  aggregateMaxAttempts: number;
  clock?: Clock;
  logger?: FastifyBaseLogger;
};

/**
 * Samples of one batch that share a minute collapse into one write; later
 * samples win on shared metric keys and on the bucket timestamp.
 */
function groupByBucket(
  slots: Array<{ bucketId: string; dayId: string; timestamp: Date }>,
  metrics: MetricValues[]
): BucketWrite[] {
  const byBucket = new Map<string, BucketWrite>();
  slots.forEach((slot, index) => {
    const existing = byBucket.get(slot.bucketId);
    if (existing) {
      existing.values = { ...existing.values, ...metrics[index] };
      existing.timestamp = slot.timestamp;
      return;
    }
    byBucket.set(slot.bucketId, {
      bucketId: slot.bucketId,
      dayId: slot.dayId,
      timestamp: slot.timestamp,
      values: { ...metrics[index] }
    });
  });
  return [...byBucket.values()];
}

function groupByDay(writes: BucketWrite[]): Map<string, BucketValues[]> {
  const byDay = new Map<string, BucketValues[]>();
  for (const write of writes) {
    const list = byDay.get(write.dayId) ?? [];
    list.push({ bucketId: write.bucketId, values: write.values });
    byDay.set(write.dayId, list);
  }
  return byDay;
}

export class IngestService {
  readonly deviceIndex: DeviceIndex;
  private readonly merger: ReadingMerger;
  private readonly aggregator: Aggregator;
  private readonly sensorState: SensorStateUpdater;
  private readonly clock: Clock;

  constructor(private readonly deps: IngestServiceDeps) {
    this.clock = deps.clock ?? systemClock;
    this.deviceIndex = new DeviceIndex(deps.store, { clock: this.clock, logger: deps.logger });
    this.merger = new ReadingMerger(deps.store, deps.rawRetentionDays);
    this.aggregator = new Aggregator(deps.store, {
      maxAttempts: deps.aggregateMaxAttempts,
      clock: this.clock,
      logger: deps.logger
    });
    this.sensorState = new SensorStateUpdater(deps.store);
  }

  async ingestBatch(family: SampleFamily, batch: TelemetryBatch): Promise<IngestResult> {
    const startedAt = Date.now();
    if (batch.metrics.length === 0) {
      throw new ServiceError("invalid_input", "samples_empty", "samples must not be empty.", {
        field: "samples"
      });
    }

    const receivedAt = this.clock();
    const deviceId = normalizeHardwareId(batch.id);
    const identity = await this.deviceIndex.resolve(deviceId);
    const intervalSec = resolveIntervalSec(batch.intervalSec, this.deps.defaultIntervalSec);
    const slots = bucketize(receivedAt, intervalSec, batch.metrics.length);

    const meta: ReadingMeta = {
      deviceId,
      batteryPct: batch.b ?? null,
      rssi: batch.s ?? null,
      lat: batch.la ?? null,
      lon: batch.lo ?? null,
      intervalSec,
      lastType: family.name
    };

    const writes = groupByBucket(slots, batch.metrics);
    const byDay = groupByDay(writes);

    const [, foldResults] = await Promise.all([
      Promise.all(
        writes.map((write) =>
          this.merger.mergeReading({
            tenantId: identity.tenantId,
            sensorId: identity.sensorId,
            bucketId: write.bucketId,
            timestamp: write.timestamp,
            values: write.values,
            meta,
            writtenAt: receivedAt
          })
        )
      ),
      Promise.all(
        [...byDay.entries()].map(([dayId, buckets]) =>
          this.aggregator.foldBuckets(
            { tenantId: identity.tenantId, sensorId: identity.sensorId, dayId },
            buckets
          )
        )
      )
    ]);

    const lastSlot = slots[slots.length - 1];
    await this.sensorState.updateStatus(
      identity.tenantId,
      identity.sensorId,
      {
        batteryPct: batch.b,
        rssi: batch.s,
        lat: batch.la,
        lon: batch.lo,
        seenAt: receivedAt
      },
      {
        ts: lastSlot.timestamp.toISOString(),
        values: batch.metrics[batch.metrics.length - 1],
        type: family.name
      }
    );

    const foldsApplied = foldResults.reduce((total, result) => total + result.applied, 0);
    const foldsSkipped = foldResults.reduce((total, result) => total + result.skipped, 0);

    metricsService.observeIngest({
      family: family.name,
      samples: batch.metrics.length,
      latencyMs: Date.now() - startedAt
    });
    this.deps.logger?.info(
      {
        hardware_id: deviceId,
        tenant_id: identity.tenantId,
        sensor_id: identity.sensorId,
        family: family.name,
        samples: batch.metrics.length,
        buckets: writes.length,
        folds_applied: foldsApplied,
        folds_skipped: foldsSkipped
      },
      "ingest_batch_written"
    );

    return {
      status: "success",
      tenantId: identity.tenantId,
      sensorId: identity.sensorId,
      fieldId: identity.fieldId,
      type: family.name,
      ingested: batch.metrics.length,
      bucketIds: writes.map((write) => write.bucketId),
      updatedDailyAggDays: [...byDay.keys()],
      foldsApplied,
      foldsSkipped
    };
  }

  async resolveDevice(hardwareId: string): Promise<ResolvedDevice> {
    const deviceId = normalizeHardwareId(hardwareId);
    const identity = await this.deviceIndex.resolve(deviceId);
    const sensor = await this.deps.store.getSensor(identity.tenantId, identity.sensorId);
    return {
      deviceId,
      tenantId: identity.tenantId,
      sensorId: identity.sensorId,
      sensor
    };
  }

  async recordAck(hardwareIdParam: string, payload: AckPayload): Promise<AckResult> {
    const hardwareId = normalizeHardwareId(hardwareIdParam);
    if (normalizeHardwareId(payload.id) !== hardwareId) {
      throw new ServiceError(
        "invalid_input",
        "hardware_id_mismatch",
        "Hardware id in the path does not match payload id.",
        { field: "id" }
      );
    }

    const identity = await this.deviceIndex.resolve(hardwareId);
    const receivedAt = this.clock();
    const payloadRaw = JSON.stringify(payload);
    const hash = sha256(payloadRaw);
    const ackId = `${Math.floor(receivedAt.getTime() / 1000)}-${hash.slice(0, 8)}`;

    await this.deps.store.recordAck(identity.tenantId, identity.sensorId, {
      ackId,
      receivedAt: receivedAt.toISOString(),
      hash,
      payloadRaw,
      ok: payload.ok ?? null,
      message: payload.m ?? null,
      nv: payload.nv ?? null
    });
    await this.sensorState.recordAck(identity.tenantId, identity.sensorId, {
      at: receivedAt,
      ok: payload.ok ?? null,
      message: payload.m ?? null
    });

    return { ok: true, ackId, tenantId: identity.tenantId, sensorId: identity.sensorId };
  }
}
