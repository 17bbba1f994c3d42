import type { MetricValues } from "../domain/sample-families";
import type { ReadingMeta, TelemetryStore } from "../db/telemetry-store";
import { addDays } from "../utils/time";

/**
 * Writes one minute bucket of raw values. Keys in `values` replace the stored
 * ones, every other stored metric key survives; `meta` is replaced whole.
 */
export class ReadingMerger {
  constructor(
    private readonly store: TelemetryStore,
    private readonly retentionDays: number
  ) {}

  async mergeReading(params: {
    tenantId: string;
    sensorId: string;
    bucketId: string;
    timestamp: Date;
    values: MetricValues;
    meta: ReadingMeta;
    writtenAt: Date;
  }): Promise<void> {
    await this.store.mergeReading(
      {
        tenantId: params.tenantId,
        sensorId: params.sensorId,
        bucketId: params.bucketId
      },
      {
        ts: params.timestamp.toISOString(),
        values: { ...params.values },
        meta: { ...params.meta },
        expiresAt: addDays(params.timestamp, this.retentionDays).toISOString(),
        updatedAt: params.writtenAt.toISOString()
      }
    );
  }
}
