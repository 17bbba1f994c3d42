import type { MetricValues, SampleFamilyName } from "../domain/sample-families";

export type DeviceIndexEntry = {
  tenantId: string;
  sensorId: string;
  fieldId: string | null;
};

export type SensorStatus = {
  batteryPct?: number;
  rssi?: number;
  lastSeenAt?: string;
  lastLat?: number;
  lastLon?: number;
  lastAckAt?: string;
  lastAckOk?: number | null;
  lastAckMsg?: string | null;
};

export type LastReading = {
  ts: string;
  values: MetricValues;
  type: SampleFamilyName;
};

export type ActiveConfig = {
  ver: number;
  cc: string | null;
  updatedAt: string;
};

export type SensorRecord = {
  tenantId: string;
  sensorId: string;
  name: string;
  fieldId: string | null;
  hardwareId: string;
  location: Record<string, number> | null;
  status: SensorStatus;
  lastReading: LastReading | null;
  activeConfig: ActiveConfig;
  createdAt: string;
  updatedAt: string;
};

export type NewSensor = Pick<SensorRecord, "tenantId" | "sensorId" | "name" | "fieldId" | "hardwareId" | "location"> & {
  createdAt: string;
};

export type SensorStatePatch = {
  status: SensorStatus;
  lastReading?: LastReading;
  updatedAt: string;
};

export type ReadingMeta = {
  deviceId: string;
  batteryPct: number | null;
  rssi: number | null;
  lat: number | null;
  lon: number | null;
  intervalSec: number;
  lastType: SampleFamilyName;
};

export type ReadingKey = {
  tenantId: string;
  sensorId: string;
  bucketId: string;
};

export type ReadingWrite = {
  ts: string;
  values: MetricValues;
  meta: ReadingMeta;
  expiresAt: string;
  updatedAt: string;
};

export type ReadingRecord = ReadingKey & ReadingWrite;

export type MetricStats = {
  min: number;
  max: number;
  sum: number;
  count: number;
};

/** Per-day rollup; `seen` lists, per metric, the bucket ids already counted. */
export type DailyAggregateDoc = {
  dayId: string;
  metrics: Record<string, MetricStats>;
  seen: Record<string, string[]>;
  updatedAt: string;
};

export type DailyAggregateKey = {
  tenantId: string;
  sensorId: string;
  dayId: string;
};

export type VersionedDailyAggregate = {
  doc: DailyAggregateDoc;
  revision: number;
};

export type UserProfile = {
  uid: string;
  role: string;
  tenantId: string | null;
  tenantIds: string[];
};

export type StoredConfig = {
  tenantId: string;
  sensorId: string;
  ver: number;
  cc: string;
  json: string;
  createdByUid: string | null;
  createdAt: string;
  republishedAt: string | null;
  republishedByUid: string | null;
};

export type RenderedConfig = {
  cc: string;
  json: string;
};

export type ConfigAckRecord = {
  ackId: string;
  receivedAt: string;
  hash: string;
  payloadRaw: string;
  ok: number | null;
  message: string | null;
  nv: number | null;
};

export type PurgeResult = {
  count: number;
  first: ReadingKey | null;
  last: ReadingKey | null;
};

export type SensorCounts = {
  total: number;
  active: number;
  stale: number;
  batteryLow: number;
};

export type TenantStats = {
  tenantId: string;
  staleMs: number;
  sensors: SensorCounts;
  updatedAt: string;
};

/**
 * Key-structured persistence the ingestion engine runs against. Every method
 * is a single bounded round trip; failures surface as `store_unavailable`
 * service errors and are never retried here.
 */
export interface TelemetryStore {
  ping(): Promise<void>;

  getDeviceIndexEntry(hardwareId: string): Promise<DeviceIndexEntry | null>;
  putDeviceIndexEntry(hardwareId: string, entry: DeviceIndexEntry, updatedAt: string): Promise<void>;
  findSensorsByHardwareId(hardwareId: string, limit: number): Promise<SensorRecord[]>;

  getSensor(tenantId: string, sensorId: string): Promise<SensorRecord | null>;
  /** Claims the hardware id in the device index and creates the sensor together; false when the id is taken. */
  insertSensor(sensor: NewSensor): Promise<boolean>;
  updateSensorState(tenantId: string, sensorId: string, patch: SensorStatePatch): Promise<void>;
  listTenantIds(): Promise<string[]>;
  listSensorStatuses(tenantId: string): Promise<SensorStatus[]>;
  saveTenantStats(stats: TenantStats): Promise<void>;

  mergeReading(key: ReadingKey, write: ReadingWrite): Promise<void>;
  listReadings(
    tenantId: string,
    sensorId: string,
    window: { from: string; to: string; limit: number }
  ): Promise<ReadingRecord[]>;
  purgeReadings(params: { before: string; limit: number; dryRun: boolean }): Promise<PurgeResult>;

  getDailyAggregate(key: DailyAggregateKey): Promise<VersionedDailyAggregate | null>;
  /**
   * Compare-and-set write. `expectedRevision` null means "create only";
   * returns false when another writer got there first.
   */
  saveDailyAggregate(
    key: DailyAggregateKey,
    doc: DailyAggregateDoc,
    expectedRevision: number | null
  ): Promise<boolean>;
  listDailyAggregates(
    tenantId: string,
    sensorId: string,
    range: { fromDayId: string; limit: number }
  ): Promise<DailyAggregateDoc[]>;

  getUserProfile(uid: string): Promise<UserProfile | null>;

  /**
   * Allocates the next version after the highest stored one, renders the plan
   * for it and stores it as a pending version. The sensor's active config is
   * left alone until {@link TelemetryStore.activateConfigVersion}.
   */
  createConfigVersion(params: {
    tenantId: string;
    sensorId: string;
    createdByUid: string | null;
    createdAt: string;
    render: (ver: number) => RenderedConfig;
  }): Promise<StoredConfig>;
  getConfigVersion(tenantId: string, sensorId: string, ver: number): Promise<StoredConfig | null>;
  /** Points the sensor's active config at a version once both retained messages landed. */
  activateConfigVersion(
    tenantId: string,
    sensorId: string,
    active: { ver: number; cc: string; at: string }
  ): Promise<void>;
  markConfigRepublished(
    tenantId: string,
    sensorId: string,
    ver: number,
    params: { uid: string | null; at: string }
  ): Promise<void>;

  recordAck(tenantId: string, sensorId: string, ack: ConfigAckRecord): Promise<void>;
}
