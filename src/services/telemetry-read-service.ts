import type { MetricStats, ReadingRecord, TelemetryStore } from "../db/telemetry-store";
import { systemClock, type Clock } from "../utils/time";
import { ServiceError } from "./service-error";
import { dayStartUtc, formatDayId } from "./time-bucketer";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const RANGE_KEYS = ["1h", "6h", "12h", "1d", "1w", "1m", "3m", "6m", "1y"] as const;

export type RangeKey = (typeof RANGE_KEYS)[number];

export const RANGE_WINDOWS_MS: Record<RangeKey, number> = {
  "1h": HOUR_MS,
  "6h": 6 * HOUR_MS,
  "12h": 12 * HOUR_MS,
  "1d": DAY_MS,
  "1w": 7 * DAY_MS,
  "1m": 30 * DAY_MS,
  "3m": 90 * DAY_MS,
  "6m": 180 * DAY_MS,
  "1y": 365 * DAY_MS
};

export type DailyAggregateView = {
  dayId: string;
  day: string;
  metrics: Record<string, MetricStats & { avg: number }>;
  updatedAt: string;
};

export type ReadingsPage = {
  tenantId: string;
  sensorId: string;
  range: RangeKey;
  from: string;
  to: string;
  items: ReadingRecord[];
};

export type DailyAggregatePage = {
  tenantId: string;
  sensorId: string;
  days: number;
  items: DailyAggregateView[];
};

export class TelemetryReadService {
  private readonly clock: Clock;

  constructor(
    private readonly store: TelemetryStore,
    clock?: Clock
  ) {
    this.clock = clock ?? systemClock;
  }

  private async requireSensor(tenantId: string, sensorId: string): Promise<void> {
    const sensor = await this.store.getSensor(tenantId, sensorId);
    if (!sensor) {
      throw new ServiceError("not_found", "sensor_not_found", "Sensor not found.", { tenantId, sensorId });
    }
  }

  async listReadings(tenantId: string, sensorId: string, range: RangeKey, limit: number): Promise<ReadingsPage> {
    await this.requireSensor(tenantId, sensorId);
    const to = this.clock();
    const from = new Date(to.getTime() - RANGE_WINDOWS_MS[range]);
    const items = await this.store.listReadings(tenantId, sensorId, {
      from: from.toISOString(),
      to: to.toISOString(),
      limit
    });
    return {
      tenantId,
      sensorId,
      range,
      from: from.toISOString(),
      to: to.toISOString(),
      items
    };
  }

  async listDailyAggregates(tenantId: string, sensorId: string, days: number): Promise<DailyAggregatePage> {
    await this.requireSensor(tenantId, sensorId);
    const start = new Date(dayStartUtc(this.clock()).getTime() - (days - 1) * DAY_MS);
    const docs = await this.store.listDailyAggregates(tenantId, sensorId, {
      fromDayId: formatDayId(start),
      limit: days + 10
    });

    const items = docs.map((doc): DailyAggregateView => {
      const metrics: DailyAggregateView["metrics"] = {};
      for (const [name, stats] of Object.entries(doc.metrics)) {
        metrics[name] = { ...stats, avg: stats.count > 0 ? stats.sum / stats.count : 0 };
      }
      const day = `${doc.dayId.slice(0, 4)}-${doc.dayId.slice(4, 6)}-${doc.dayId.slice(6, 8)}T00:00:00.000Z`;
      return { dayId: doc.dayId, day, metrics, updatedAt: doc.updatedAt };
    });

    return { tenantId, sensorId, days, items };
  }
}
