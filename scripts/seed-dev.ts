import { buildApp } from "../src/app";
import { loadEnv, toAppConfig } from "../src/config/env";
import { createPool } from "../src/db/connection";
import { runMigrations } from "../src/db/migrate";
import { PgTelemetryStore } from "../src/db/pg-telemetry-store";
import { normalizeHardwareId } from "../src/services/device-index";
import { MqttRetainedPublisher } from "../src/services/mqtt-publisher";
import { nowIso } from "../src/utils/time";

const env = loadEnv();
const pool = createPool(env);

async function ensureUser(uid: string, role: string, tenantId: string): Promise<void> {
  await pool.query(
    `INSERT INTO users (uid, role, tenant_id, tenant_ids)
     VALUES ($1, $2, $3, ARRAY[$3]::text[])
     ON CONFLICT (uid) DO UPDATE
     SET role = EXCLUDED.role,
         tenant_id = EXCLUDED.tenant_id,
         tenant_ids = EXCLUDED.tenant_ids`,
    [uid, role, tenantId]
  );
}

async function main(): Promise<void> {
  const tenantId = process.env.SEED_TENANT_ID ?? "dev-tenant";
  const adminUid = process.env.SEED_ADMIN_UID ?? "dev-admin";
  const sensorId = process.env.SEED_SENSOR_ID ?? "dev-sensor-001";
  const hardwareId = normalizeHardwareId(process.env.SEED_HARDWARE_ID ?? "00A001");

  await runMigrations(pool);
  const store = new PgTelemetryStore(pool);

  await ensureUser(adminUid, "admin", tenantId);
  const existing = await store.getSensor(tenantId, sensorId);
  if (!existing) {
    const created = await store.insertSensor({
      tenantId,
      sensorId,
      name: "Dev sensor",
      fieldId: null,
      hardwareId,
      location: null,
      createdAt: nowIso()
    });
    if (!created) {
      throw new Error(`Hardware id ${hardwareId} is already assigned to another sensor.`);
    }
  }

  const app = buildApp({
    config: { ...toAppConfig(env), logLevel: false },
    store,
    publisher: MqttRetainedPublisher.fromEnv(env)
  });
  await app.ready();
  const token = app.jwt.sign({ uid: adminUid });
  await app.close();

  // eslint-disable-next-line no-console
  console.log("Seed complete.");
  // eslint-disable-next-line no-console
  console.log(`Tenant: ${tenantId}`);
  // eslint-disable-next-line no-console
  console.log(`Sensor: ${sensorId} (hardware id ${hardwareId})`);
  // eslint-disable-next-line no-console
  console.log(`Admin uid: ${adminUid}`);
  // eslint-disable-next-line no-console
  console.log(`Admin bearer token: ${token}`);
}

main()
  .catch((error) => {
    // eslint-disable-next-line no-console
    console.error(error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
