import assert from "node:assert/strict";
import test from "node:test";
import type { SensorStatus } from "../../src/db/telemetry-store";
import { MaintenanceService, countSensors } from "../../src/services/maintenance-service";
import { isServiceError } from "../../src/services/service-error";
import { fixedClock } from "../support/fixtures";
import { MemoryTelemetryStore } from "../support/memory-telemetry-store";

const NOW = "2024-03-05T12:00:00.000Z";

function addSensorWithStatus(store: MemoryTelemetryStore, tenantId: string, sensorId: string, status: SensorStatus) {
  store.addSensor({
    tenantId,
    sensorId,
    name: sensorId,
    fieldId: null,
    hardwareId: sensorId.toUpperCase(),
    location: null,
    createdAt: "2024-03-01T00:00:00.000Z"
  });
  const sensor = store.sensors.get(`${tenantId}/${sensorId}`);
  if (sensor) {
    sensor.status = status;
  }
}

test("maintenance: sensor counts split active and stale at the cutoff", () => {
  const counts = countSensors(
    [
      { lastSeenAt: "2024-03-05T11:30:00.000Z", batteryPct: 15 },
      { lastSeenAt: "2024-03-05T10:00:00.000Z", batteryPct: 20 },
      { lastSeenAt: "2024-03-05T09:59:59.000Z", batteryPct: 5 },
      {}
    ],
    new Date(NOW),
    { staleHours: 2, lowBatteryPct: 20 }
  );

  assert.deepEqual(counts, { total: 4, active: 2, stale: 2, batteryLow: 2 });
});

test("maintenance: no sensors count as zero", () => {
  assert.deepEqual(countSensors([], new Date(NOW), { staleHours: 2, lowBatteryPct: 20 }), {
    total: 0,
    active: 0,
    stale: 0,
    batteryLow: 0
  });
});

test("maintenance: recompute stores stats for one tenant", async () => {
  const store = new MemoryTelemetryStore();
  addSensorWithStatus(store, "tenant-a", "a00001", { lastSeenAt: "2024-03-05T11:00:00.000Z", batteryPct: 80 });
  addSensorWithStatus(store, "tenant-a", "a00002", { batteryPct: 9 });
  addSensorWithStatus(store, "tenant-b", "b00001", { lastSeenAt: "2024-03-05T11:59:00.000Z" });
  const service = new MaintenanceService(store, { clock: fixedClock(NOW) });

  const stats = await service.recomputeTenantStats("tenant-a", { staleHours: 6, lowBatteryPct: 10 });

  assert.deepEqual(stats, {
    tenantId: "tenant-a",
    staleMs: 21600000,
    sensors: { total: 2, active: 1, stale: 1, batteryLow: 1 },
    updatedAt: NOW
  });
  assert.deepEqual(store.tenantStats.get("tenant-a"), stats);
  assert.equal(store.tenantStats.has("tenant-b"), false);
});

test("maintenance: recompute all covers every tenant with sensors", async () => {
  const store = new MemoryTelemetryStore();
  addSensorWithStatus(store, "tenant-b", "b00001", { lastSeenAt: "2024-03-05T11:59:00.000Z" });
  addSensorWithStatus(store, "tenant-a", "a00001", { lastSeenAt: "2024-03-04T11:00:00.000Z" });
  const service = new MaintenanceService(store, { clock: fixedClock(NOW) });

  const all = await service.recomputeAllTenantStats({ staleHours: 2, lowBatteryPct: 20 });

  assert.deepEqual(
    all.map((stats) => [stats.tenantId, stats.sensors.active, stats.sensors.stale]),
    [
      ["tenant-a", 0, 1],
      ["tenant-b", 1, 0]
    ]
  );
  assert.equal(store.tenantStats.size, 2);
});

test("maintenance: store failure while counting saves nothing", async () => {
  const store = new MemoryTelemetryStore();
  addSensorWithStatus(store, "tenant-a", "a00001", {});
  store.failing.add("listSensorStatuses");
  const service = new MaintenanceService(store, { clock: fixedClock(NOW) });

  await assert.rejects(
    service.recomputeTenantStats("tenant-a", { staleHours: 2, lowBatteryPct: 20 }),
    (error: unknown) => isServiceError(error) && error.kind === "store_unavailable"
  );
  assert.equal(store.tenantStats.size, 0);
});
