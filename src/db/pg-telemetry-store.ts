import { Pool } from "pg";
import { z } from "zod";
import { SAMPLE_FAMILY_NAMES } from "../domain/sample-families";
import { ServiceError, isServiceError, storeUnavailable } from "../services/service-error";
import { withTransaction } from "./connection";
import type {
  ConfigAckRecord,
  DailyAggregateDoc,
  DailyAggregateKey,
  DeviceIndexEntry,
  NewSensor,
  PurgeResult,
  ReadingKey,
  ReadingRecord,
  ReadingWrite,
  RenderedConfig,
  SensorRecord,
  SensorStatePatch,
  SensorStatus,
  StoredConfig,
  TelemetryStore,
  TenantStats,
  UserProfile,
  VersionedDailyAggregate
} from "./telemetry-store";

type SensorRow = {
  tenant_id: string;
  sensor_id: string;
  name: string;
  field_id: string | null;
  hardware_id: string;
  location: unknown;
  status: unknown;
  last_reading: unknown;
  active_config: unknown;
  created_at: Date | string;
  updated_at: Date | string;
};

type ReadingRow = {
  tenant_id: string;
  sensor_id: string;
  bucket_id: string;
  ts: Date | string;
  metric_values: unknown;
  meta: unknown;
  expires_at: Date | string;
  updated_at: Date | string;
};

type DailyAggregateRow = {
  day_id: string;
  metrics: unknown;
  seen: unknown;
  revision: number;
  updated_at: Date | string;
};

type ConfigRow = {
  tenant_id: string;
  sensor_id: string;
  ver: number;
  cc: string;
  plan_json: string;
  created_by_uid: string | null;
  created_at: Date | string;
  republished_at: Date | string | null;
  republished_by_uid: string | null;
};

const metricValuesSchema = z.record(z.number());

const sensorStatusSchema = z
  .object({
    batteryPct: z.number().optional(),
    rssi: z.number().optional(),
    lastSeenAt: z.string().optional(),
    lastLat: z.number().optional(),
    lastLon: z.number().optional(),
    lastAckAt: z.string().optional(),
    lastAckOk: z.number().nullable().optional(),
    lastAckMsg: z.string().nullable().optional()
  })
  .catch({});

const lastReadingSchema = z
  .object({
    ts: z.string(),
    values: metricValuesSchema,
    type: z.enum(SAMPLE_FAMILY_NAMES)
  })
  .nullable()
  .catch(null);

const activeConfigSchema = z
  .object({
    ver: z.number().int().default(0),
    cc: z.string().nullable().default(null),
    updatedAt: z.string().default("")
  })
  .catch({ ver: 0, cc: null, updatedAt: "" });

const readingMetaSchema = z.object({
  deviceId: z.string(),
  batteryPct: z.number().nullable(),
  rssi: z.number().nullable(),
  lat: z.number().nullable(),
  lon: z.number().nullable(),
  intervalSec: z.number(),
  lastType: z.enum(SAMPLE_FAMILY_NAMES)
});

const metricStatsSchema = z.record(
  z.object({ min: z.number(), max: z.number(), sum: z.number(), count: z.number().int() })
);
const seenSchema = z.record(z.array(z.string()));
const locationSchema = z.record(z.number()).nullable().catch(null);

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function toIsoOrNull(value: Date | string | null): string | null {
  return value === null ? null : toIso(value);
}

function mapSensor(row: SensorRow): SensorRecord {
  const activeConfig = activeConfigSchema.parse(row.active_config);
  return {
    tenantId: row.tenant_id,
    sensorId: row.sensor_id,
    name: row.name,
    fieldId: row.field_id,
    hardwareId: row.hardware_id,
    location: locationSchema.parse(row.location),
    status: sensorStatusSchema.parse(row.status),
    lastReading: lastReadingSchema.parse(row.last_reading),
    activeConfig: {
      ...activeConfig,
      updatedAt: activeConfig.updatedAt || toIso(row.updated_at)
    },
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at)
  };
}

function mapReading(row: ReadingRow): ReadingRecord {
  return {
    tenantId: row.tenant_id,
    sensorId: row.sensor_id,
    bucketId: row.bucket_id,
    ts: toIso(row.ts),
    values: metricValuesSchema.parse(row.metric_values),
    meta: readingMetaSchema.parse(row.meta),
    expiresAt: toIso(row.expires_at),
    updatedAt: toIso(row.updated_at)
  };
}

function mapDailyAggregate(row: DailyAggregateRow): DailyAggregateDoc {
  return {
    dayId: row.day_id,
    metrics: metricStatsSchema.parse(row.metrics),
    seen: seenSchema.parse(row.seen),
    updatedAt: toIso(row.updated_at)
  };
}

function mapConfig(row: ConfigRow): StoredConfig {
  return {
    tenantId: row.tenant_id,
    sensorId: row.sensor_id,
    ver: row.ver,
    cc: row.cc,
    json: row.plan_json,
    createdByUid: row.created_by_uid,
    createdAt: toIso(row.created_at),
    republishedAt: toIsoOrNull(row.republished_at),
    republishedByUid: row.republished_by_uid
  };
}

const SENSOR_COLUMNS = `tenant_id, sensor_id, name, field_id, hardware_id, location, status,
  last_reading, active_config, created_at, updated_at`;

export class PgTelemetryStore implements TelemetryStore {
  constructor(private readonly pool: Pool) {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isServiceError(error)) {
        throw error;
      }
      throw storeUnavailable(operation, error);
    }
  }

  async ping(): Promise<void> {
    await this.run("ping", () => this.pool.query("SELECT 1"));
  }

  async getDeviceIndexEntry(hardwareId: string): Promise<DeviceIndexEntry | null> {
    return this.run("device index read", async () => {
      const result = await this.pool.query<{ tenant_id: string; sensor_id: string; field_id: string | null }>(
        `SELECT tenant_id, sensor_id, field_id
         FROM device_index
         WHERE hardware_id = $1
         LIMIT 1`,
        [hardwareId]
      );
      const row = result.rows[0];
      return row ? { tenantId: row.tenant_id, sensorId: row.sensor_id, fieldId: row.field_id } : null;
    });
  }

  async putDeviceIndexEntry(hardwareId: string, entry: DeviceIndexEntry, updatedAt: string): Promise<void> {
    await this.run("device index write", () =>
      this.pool.query(
        `INSERT INTO device_index (hardware_id, tenant_id, sensor_id, field_id, updated_at)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (hardware_id) DO UPDATE
         SET tenant_id = EXCLUDED.tenant_id,
             sensor_id = EXCLUDED.sensor_id,
             field_id = EXCLUDED.field_id,
             updated_at = EXCLUDED.updated_at`,
        [hardwareId, entry.tenantId, entry.sensorId, entry.fieldId, updatedAt]
      )
    );
  }

  async findSensorsByHardwareId(hardwareId: string, limit: number): Promise<SensorRecord[]> {
    return this.run("sensor scan", async () => {
      const result = await this.pool.query<SensorRow>(
        `SELECT ${SENSOR_COLUMNS}
         FROM sensors
         WHERE hardware_id = $1
         ORDER BY tenant_id, sensor_id
         LIMIT $2`,
        [hardwareId, limit]
      );
      return result.rows.map(mapSensor);
    });
  }

  async getSensor(tenantId: string, sensorId: string): Promise<SensorRecord | null> {
    return this.run("sensor read", async () => {
      const result = await this.pool.query<SensorRow>(
        `SELECT ${SENSOR_COLUMNS}
         FROM sensors
         WHERE tenant_id = $1 AND sensor_id = $2
         LIMIT 1`,
        [tenantId, sensorId]
      );
      const row = result.rows[0];
      return row ? mapSensor(row) : null;
    });
  }

  async insertSensor(sensor: NewSensor): Promise<boolean> {
    return this.run("sensor create", () =>
      withTransaction(this.pool, async (client) => {
        const claimed = await client.query(
          `INSERT INTO device_index (hardware_id, tenant_id, sensor_id, field_id, updated_at)
           VALUES ($1, $2, $3, $4, $5)
           ON CONFLICT (hardware_id) DO NOTHING`,
          [sensor.hardwareId, sensor.tenantId, sensor.sensorId, sensor.fieldId, sensor.createdAt]
        );
        if (!claimed.rowCount) {
          return false;
        }

        await client.query(
          `INSERT INTO sensors (
             tenant_id, sensor_id, name, field_id, hardware_id, location,
             status, last_reading, active_config, created_at, updated_at
           ) VALUES ($1, $2, $3, $4, $5, $6::jsonb, '{}'::jsonb, NULL, $7::jsonb, $8, $8)`,
          [
            sensor.tenantId,
            sensor.sensorId,
            sensor.name,
            sensor.fieldId,
            sensor.hardwareId,
            sensor.location === null ? null : JSON.stringify(sensor.location),
            JSON.stringify({ ver: 0, cc: null, updatedAt: sensor.createdAt }),
            sensor.createdAt
          ]
        );
        return true;
      })
    );
  }

  async updateSensorState(tenantId: string, sensorId: string, patch: SensorStatePatch): Promise<void> {
    await this.run("sensor state write", () =>
      this.pool.query(
        `UPDATE sensors
         SET status = status || $3::jsonb,
             last_reading = COALESCE($4::jsonb, last_reading),
             updated_at = $5
         WHERE tenant_id = $1 AND sensor_id = $2`,
        [
          tenantId,
          sensorId,
          JSON.stringify(patch.status),
          patch.lastReading ? JSON.stringify(patch.lastReading) : null,
          patch.updatedAt
        ]
      )
    );
  }

  async listTenantIds(): Promise<string[]> {
    return this.run("tenant list", async () => {
      const result = await this.pool.query<{ tenant_id: string }>(
        `SELECT DISTINCT tenant_id
         FROM sensors
         ORDER BY tenant_id ASC`
      );
      return result.rows.map((row) => row.tenant_id);
    });
  }

  async listSensorStatuses(tenantId: string): Promise<SensorStatus[]> {
    return this.run("sensor status list", async () => {
      const result = await this.pool.query<{ status: unknown }>(
        `SELECT status
         FROM sensors
         WHERE tenant_id = $1`,
        [tenantId]
      );
      return result.rows.map((row) => sensorStatusSchema.parse(row.status));
    });
  }

  async saveTenantStats(stats: TenantStats): Promise<void> {
    await this.run("tenant stats write", () =>
      this.pool.query(
        `INSERT INTO tenant_stats (tenant_id, stale_ms, sensors, updated_at)
         VALUES ($1, $2, $3::jsonb, $4)
         ON CONFLICT (tenant_id)
         DO UPDATE SET
           stale_ms = EXCLUDED.stale_ms,
           sensors = EXCLUDED.sensors,
           updated_at = EXCLUDED.updated_at`,
        [stats.tenantId, stats.staleMs, JSON.stringify(stats.sensors), stats.updatedAt]
      )
    );
  }

  async mergeReading(key: ReadingKey, write: ReadingWrite): Promise<void> {
    await this.run("reading merge", () =>
      this.pool.query(
        `INSERT INTO readings (
           tenant_id, sensor_id, bucket_id, ts, metric_values, meta, expires_at, updated_at
         ) VALUES ($1, $2, $3, $4, $5::jsonb, $6::jsonb, $7, $8)
         ON CONFLICT (tenant_id, sensor_id, bucket_id) DO UPDATE
         SET ts = EXCLUDED.ts,
             metric_values = readings.metric_values || EXCLUDED.metric_values,
             meta = EXCLUDED.meta,
             expires_at = EXCLUDED.expires_at,
             updated_at = EXCLUDED.updated_at`,
        [
          key.tenantId,
          key.sensorId,
          key.bucketId,
          write.ts,
          JSON.stringify(write.values),
          JSON.stringify(write.meta),
          write.expiresAt,
          write.updatedAt
        ]
      )
    );
  }

  async listReadings(
    tenantId: string,
    sensorId: string,
    window: { from: string; to: string; limit: number }
  ): Promise<ReadingRecord[]> {
    return this.run("reading range read", async () => {
      const result = await this.pool.query<ReadingRow>(
        `SELECT tenant_id, sensor_id, bucket_id, ts, metric_values, meta, expires_at, updated_at
         FROM readings
         WHERE tenant_id = $1 AND sensor_id = $2 AND ts >= $3 AND ts <= $4
         ORDER BY ts DESC
         LIMIT $5`,
        [tenantId, sensorId, window.from, window.to, window.limit]
      );
      return result.rows.map(mapReading);
    });
  }

  async purgeReadings(params: { before: string; limit: number; dryRun: boolean }): Promise<PurgeResult> {
    return this.run("reading purge", async () => {
      const result = await this.pool.query<{ tenant_id: string; sensor_id: string; bucket_id: string }>(
        params.dryRun
          ? `SELECT tenant_id, sensor_id, bucket_id
             FROM readings
             WHERE ts < $1
             ORDER BY ts ASC
             LIMIT $2`
          : `WITH doomed AS (
               SELECT tenant_id, sensor_id, bucket_id, ts
               FROM readings
               WHERE ts < $1
               ORDER BY ts ASC
               LIMIT $2
             )
             DELETE FROM readings r
             USING doomed d
             WHERE r.tenant_id = d.tenant_id
               AND r.sensor_id = d.sensor_id
               AND r.bucket_id = d.bucket_id
             RETURNING r.tenant_id, r.sensor_id, r.bucket_id, d.ts`,
        [params.before, params.limit]
      );
      const keys = result.rows.map((row) => ({
        tenantId: row.tenant_id,
        sensorId: row.sensor_id,
        bucketId: row.bucket_id
      }));
      // DELETE ... RETURNING gives no order guarantee.
      keys.sort((a, b) => a.bucketId.localeCompare(b.bucketId));
      return {
        count: keys.length,
        first: keys[0] ?? null,
        last: keys[keys.length - 1] ?? null
      };
    });
  }

  async getDailyAggregate(key: DailyAggregateKey): Promise<VersionedDailyAggregate | null> {
    return this.run("daily aggregate read", async () => {
      const result = await this.pool.query<DailyAggregateRow>(
        `SELECT day_id, metrics, seen, revision, updated_at
         FROM daily_aggregates
         WHERE tenant_id = $1 AND sensor_id = $2 AND day_id = $3
         LIMIT 1`,
        [key.tenantId, key.sensorId, key.dayId]
      );
      const row = result.rows[0];
      return row ? { doc: mapDailyAggregate(row), revision: row.revision } : null;
    });
  }

  async saveDailyAggregate(
    key: DailyAggregateKey,
    doc: DailyAggregateDoc,
    expectedRevision: number | null
  ): Promise<boolean> {
    return this.run("daily aggregate write", async () => {
      const params = [
        key.tenantId,
        key.sensorId,
        key.dayId,
        JSON.stringify(doc.metrics),
        JSON.stringify(doc.seen),
        doc.updatedAt
      ];

      if (expectedRevision === null) {
        const inserted = await this.pool.query(
          `INSERT INTO daily_aggregates (tenant_id, sensor_id, day_id, metrics, seen, revision, updated_at)
           VALUES ($1, $2, $3, $4::jsonb, $5::jsonb, 1, $6)
           ON CONFLICT (tenant_id, sensor_id, day_id) DO NOTHING`,
          params
        );
        return Boolean(inserted.rowCount);
      }

      const updated = await this.pool.query(
        `UPDATE daily_aggregates
         SET metrics = $4::jsonb,
             seen = $5::jsonb,
             revision = revision + 1,
             updated_at = $6
         WHERE tenant_id = $1 AND sensor_id = $2 AND day_id = $3 AND revision = $7`,
        [...params, expectedRevision]
      );
      return Boolean(updated.rowCount);
    });
  }

  async listDailyAggregates(
    tenantId: string,
    sensorId: string,
    range: { fromDayId: string; limit: number }
  ): Promise<DailyAggregateDoc[]> {
    return this.run("daily aggregate range read", async () => {
      const result = await this.pool.query<DailyAggregateRow>(
        `SELECT day_id, metrics, seen, revision, updated_at
         FROM daily_aggregates
         WHERE tenant_id = $1 AND sensor_id = $2 AND day_id >= $3
         ORDER BY day_id ASC
         LIMIT $4`,
        [tenantId, sensorId, range.fromDayId, range.limit]
      );
      return result.rows.map(mapDailyAggregate);
    });
  }

  async getUserProfile(uid: string): Promise<UserProfile | null> {
    return this.run("user profile read", async () => {
      const result = await this.pool.query<{
        uid: string;
        role: string;
        tenant_id: string | null;
        tenant_ids: string[] | null;
      }>(
        `SELECT uid, role, tenant_id, tenant_ids
         FROM users
         WHERE uid = $1
         LIMIT 1`,
        [uid]
      );
      const row = result.rows[0];
      if (!row) {
        return null;
      }
      return {
        uid: row.uid,
        role: row.role,
        tenantId: row.tenant_id,
        tenantIds: row.tenant_ids ?? []
      };
    });
  }

  async createConfigVersion(params: {
    tenantId: string;
    sensorId: string;
    createdByUid: string | null;
    createdAt: string;
    render: (ver: number) => RenderedConfig;
  }): Promise<StoredConfig> {
    return this.run("config version create", () =>
      withTransaction(this.pool, async (client) => {
        const sensor = await client.query(
          `SELECT 1
           FROM sensors
           WHERE tenant_id = $1 AND sensor_id = $2
           FOR UPDATE`,
          [params.tenantId, params.sensorId]
        );
        if (sensor.rowCount === 0) {
          throw new ServiceError("not_found", "sensor_not_found", "Sensor not found.");
        }

        const latest = await client.query<{ max_ver: number | null }>(
          `SELECT MAX(ver) AS max_ver
           FROM sensor_configs
           WHERE tenant_id = $1 AND sensor_id = $2`,
          [params.tenantId, params.sensorId]
        );
        const ver = (latest.rows[0]?.max_ver ?? 0) + 1;
        const rendered = params.render(ver);

        const inserted = await client.query<ConfigRow>(
          `INSERT INTO sensor_configs (
             tenant_id, sensor_id, ver, cc, plan_json, created_by_uid, created_at
           ) VALUES ($1, $2, $3, $4, $5, $6, $7)
           RETURNING tenant_id, sensor_id, ver, cc, plan_json, created_by_uid, created_at,
                     republished_at, republished_by_uid`,
          [params.tenantId, params.sensorId, ver, rendered.cc, rendered.json, params.createdByUid, params.createdAt]
        );

        return mapConfig(inserted.rows[0]);
      })
    );
  }

  async getConfigVersion(tenantId: string, sensorId: string, ver: number): Promise<StoredConfig | null> {
    return this.run("config version read", async () => {
      const result = await this.pool.query<ConfigRow>(
        `SELECT tenant_id, sensor_id, ver, cc, plan_json, created_by_uid, created_at,
                republished_at, republished_by_uid
         FROM sensor_configs
         WHERE tenant_id = $1 AND sensor_id = $2 AND ver = $3
         LIMIT 1`,
        [tenantId, sensorId, ver]
      );
      const row = result.rows[0];
      return row ? mapConfig(row) : null;
    });
  }

  async activateConfigVersion(
    tenantId: string,
    sensorId: string,
    active: { ver: number; cc: string; at: string }
  ): Promise<void> {
    await this.run("config version activate", () =>
      this.pool.query(
        `UPDATE sensors
         SET active_config = $3::jsonb,
             updated_at = $4
         WHERE tenant_id = $1 AND sensor_id = $2`,
        [tenantId, sensorId, JSON.stringify({ ver: active.ver, cc: active.cc, updatedAt: active.at }), active.at]
      )
    );
  }

  async markConfigRepublished(
    tenantId: string,
    sensorId: string,
    ver: number,
    params: { uid: string | null; at: string }
  ): Promise<void> {
    await this.run("config republish mark", () =>
      this.pool.query(
        `UPDATE sensor_configs
         SET republished_at = $4,
             republished_by_uid = $5
         WHERE tenant_id = $1 AND sensor_id = $2 AND ver = $3`,
        [tenantId, sensorId, ver, params.at, params.uid]
      )
    );
  }

  async recordAck(tenantId: string, sensorId: string, ack: ConfigAckRecord): Promise<void> {
    await this.run("config ack write", () =>
      this.pool.query(
        `INSERT INTO sensor_acks (
           tenant_id, sensor_id, ack_id, received_at, payload_hash, payload_raw, ok, message, nv
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         ON CONFLICT (tenant_id, sensor_id, ack_id) DO NOTHING`,
        [
          tenantId,
          sensorId,
          ack.ackId,
          ack.receivedAt,
          ack.hash,
          ack.payloadRaw,
          ack.ok,
          ack.message,
          ack.nv
        ]
      )
    );
  }
}
