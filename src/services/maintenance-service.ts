import type { FastifyBaseLogger } from "fastify";
import type { PurgeResult, SensorCounts, SensorStatus, TelemetryStore, TenantStats } from "../db/telemetry-store";
import { addDays, systemClock, type Clock } from "../utils/time";

const HOUR_MS = 60 * 60 * 1000;

export type PurgeReadingsResult = PurgeResult & {
  cutoff: string;
  dryRun: boolean;
};

export type StatsThresholds = {
  staleHours: number;
  lowBatteryPct: number;
};

/**
 * A sensor is active when it was seen within `staleHours` of `now`; every
 * other sensor, including one never seen, is stale.
 */
export function countSensors(statuses: SensorStatus[], now: Date, thresholds: StatsThresholds): SensorCounts {
  const staleCutoff = now.getTime() - thresholds.staleHours * HOUR_MS;
  let active = 0;
  let batteryLow = 0;

  for (const status of statuses) {
    const lastSeen = status.lastSeenAt ? Date.parse(status.lastSeenAt) : Number.NaN;
    if (Number.isFinite(lastSeen) && lastSeen >= staleCutoff) {
      active += 1;
    }
    if (typeof status.batteryPct === "number" && status.batteryPct < thresholds.lowBatteryPct) {
      batteryLow += 1;
    }
  }

  return { total: statuses.length, active, stale: statuses.length - active, batteryLow };
}

export class MaintenanceService {
  private readonly clock: Clock;

  constructor(
    private readonly store: TelemetryStore,
    private readonly options: { clock?: Clock; logger?: FastifyBaseLogger } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /** Deletes (or with `dryRun`, lists) up to `batchSize` of the oldest readings before the cutoff. */
  async purgeReadings(params: {
    olderThanDays: number;
    batchSize: number;
    dryRun: boolean;
  }): Promise<PurgeReadingsResult> {
    const cutoff = addDays(this.clock(), -params.olderThanDays).toISOString();
    const result = await this.store.purgeReadings({
      before: cutoff,
      limit: params.batchSize,
      dryRun: params.dryRun
    });

    this.options.logger?.info(
      { cutoff, dry_run: params.dryRun, count: result.count },
      params.dryRun ? "readings_purge_preview" : "readings_purged"
    );
    return { cutoff, dryRun: params.dryRun, ...result };
  }

  async recomputeTenantStats(tenantId: string, thresholds: StatsThresholds): Promise<TenantStats> {
    const now = this.clock();
    const statuses = await this.store.listSensorStatuses(tenantId);
    const stats: TenantStats = {
      tenantId,
      staleMs: thresholds.staleHours * HOUR_MS,
      sensors: countSensors(statuses, now, thresholds),
      updatedAt: now.toISOString()
    };
    await this.store.saveTenantStats(stats);

    this.options.logger?.info({ tenant_id: tenantId, ...stats.sensors }, "tenant_stats_recomputed");
    return stats;
  }

  /** Recomputes every tenant that owns at least one sensor, one after another. */
  async recomputeAllTenantStats(thresholds: StatsThresholds): Promise<TenantStats[]> {
    const tenantIds = await this.store.listTenantIds();
    const results: TenantStats[] = [];
    for (const tenantId of tenantIds) {
      results.push(await this.recomputeTenantStats(tenantId, thresholds));
    }
    return results;
  }
}
