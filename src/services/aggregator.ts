import type { FastifyBaseLogger } from "fastify";
import type { MetricValues } from "../domain/sample-families";
import type { DailyAggregateDoc, DailyAggregateKey, MetricStats, TelemetryStore } from "../db/telemetry-store";
import { systemClock, type Clock } from "../utils/time";
import { metricsService } from "./metrics-service";
import { ServiceError } from "./service-error";
import { dayIdOfBucket } from "./time-bucketer";

export type BucketValues = {
  bucketId: string;
  values: MetricValues;
};

export type FoldResult = {
  applied: number;
  skipped: number;
  attempts: number;
};

export function emptyDailyAggregate(dayId: string, updatedAt: string): DailyAggregateDoc {
  return { dayId, metrics: {}, seen: {}, updatedAt };
}

function insertSorted(list: string[], value: string): void {
  let index = list.length;
  while (index > 0 && list[index - 1] > value) {
    index -= 1;
  }
  list.splice(index, 0, value);
}

/**
 * Folds bucket values into a copy of `doc`. A (bucket, metric) pair already
 * listed in that metric's seen set is skipped, so replaying the same buckets
 * leaves the statistics unchanged.
 */
export function applyFold(
  doc: DailyAggregateDoc,
  buckets: BucketValues[],
  updatedAt: string
): { doc: DailyAggregateDoc; applied: number; skipped: number } {
  const metrics: Record<string, MetricStats> = {};
  for (const [name, stats] of Object.entries(doc.metrics)) {
    metrics[name] = { ...stats };
  }
  const seen: Record<string, string[]> = {};
  for (const [name, bucketIds] of Object.entries(doc.seen)) {
    seen[name] = [...bucketIds];
  }

  let applied = 0;
  let skipped = 0;

  for (const bucket of buckets) {
    for (const [name, value] of Object.entries(bucket.values)) {
      const seenForMetric = seen[name] ?? [];
      if (seenForMetric.includes(bucket.bucketId)) {
        skipped += 1;
        continue;
      }

      const current = metrics[name];
      metrics[name] = current
        ? {
            min: Math.min(current.min, value),
            max: Math.max(current.max, value),
            sum: current.sum + value,
            count: current.count + 1
          }
        : { min: value, max: value, sum: value, count: 1 };

      insertSorted(seenForMetric, bucket.bucketId);
      seen[name] = seenForMetric;
      applied += 1;
    }
  }

  return {
    doc: { dayId: doc.dayId, metrics, seen, updatedAt: applied > 0 ? updatedAt : doc.updatedAt },
    applied,
    skipped
  };
}

/**
 * Maintains per-day min/max/sum/count per metric. Each write is a
 * compare-and-set on the aggregate's revision; a lost race re-reads and
 * re-folds, so a bucket is never counted twice and never dropped.
 */
export class Aggregator {
  constructor(
    private readonly store: TelemetryStore,
    private readonly options: {
      maxAttempts: number;
      clock?: Clock;
      logger?: FastifyBaseLogger;
    }
  ) {}

  async foldIntoDaily(
    tenantId: string,
    sensorId: string,
    dayId: string,
    bucketId: string,
    metricValues: MetricValues
  ): Promise<FoldResult> {
    return this.foldBuckets({ tenantId, sensorId, dayId }, [{ bucketId, values: metricValues }]);
  }

  async foldBuckets(key: DailyAggregateKey, buckets: BucketValues[]): Promise<FoldResult> {
    for (const bucket of buckets) {
      if (dayIdOfBucket(bucket.bucketId) !== key.dayId) {
        throw new ServiceError(
          "invalid_input",
          "bucket_outside_day",
          `Bucket ${bucket.bucketId} does not belong to day ${key.dayId}.`,
          { bucketId: bucket.bucketId, dayId: key.dayId }
        );
      }
    }

    const clock = this.options.clock ?? systemClock;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt += 1) {
      const current = await this.store.getDailyAggregate(key);
      const updatedAt = clock().toISOString();
      const base = current?.doc ?? emptyDailyAggregate(key.dayId, updatedAt);
      const folded = applyFold(base, buckets, updatedAt);

      if (folded.applied === 0) {
        metricsService.observeAggregateFolds({ applied: 0, skipped: folded.skipped });
        return { applied: 0, skipped: folded.skipped, attempts: attempt };
      }

      const saved = await this.store.saveDailyAggregate(key, folded.doc, current ? current.revision : null);
      if (saved) {
        metricsService.observeAggregateFolds({ applied: folded.applied, skipped: folded.skipped });
        return { applied: folded.applied, skipped: folded.skipped, attempts: attempt };
      }

      metricsService.observeAggregateConflict();
      this.options.logger?.warn(
        {
          tenant_id: key.tenantId,
          sensor_id: key.sensorId,
          day_id: key.dayId,
          attempt
        },
        "daily_aggregate_conflict_retry"
      );
    }

    throw new ServiceError(
      "store_unavailable",
      "aggregate_contention",
      `Daily aggregate ${key.dayId} could not be updated after ${this.options.maxAttempts} attempts.`,
      { dayId: key.dayId, attempts: this.options.maxAttempts }
    );
  }
}
