import assert from "node:assert/strict";
import test from "node:test";
import { buildApp } from "../../src/app";
import { SAMPLE_PLAN_CC, TEST_INGEST_KEY, fixedClock, samplePlanInput, testConfig } from "../support/fixtures";
import { MemoryTelemetryStore } from "../support/memory-telemetry-store";
import { RecordingPublisher } from "../support/recording-publisher";

async function setup() {
  const store = new MemoryTelemetryStore();
  store.addSensor({
    tenantId: "tenant-a",
    sensorId: "s-1",
    name: "North block",
    fieldId: null,
    hardwareId: "A1B2C3",
    location: null,
    createdAt: "2024-03-01T00:00:00.000Z"
  });
  store.addUser({ uid: "admin-a", role: "admin", tenantId: "tenant-a", tenantIds: [] });
  store.addUser({ uid: "tech-a", role: "tech", tenantId: null, tenantIds: ["tenant-a"] });
  store.addUser({ uid: "farmer-a", role: "farmer", tenantId: "tenant-a", tenantIds: ["tenant-a"] });
  store.addUser({ uid: "farmer-multi", role: "farmer", tenantId: null, tenantIds: ["tenant-a", "tenant-b"] });

  const publisher = new RecordingPublisher();
  const app = buildApp({
    config: testConfig(),
    store,
    publisher,
    clock: fixedClock("2024-03-05T12:00:00.000Z")
  });
  await app.ready();

  const bearer = (uid: string) => ({ authorization: `Bearer ${app.jwt.sign({ uid })}` });
  return { app, store, publisher, bearer };
}

test("admin api: token required", async () => {
  const { app } = await setup();
  try {
    const response = await app.inject({
      method: "POST",
      url: "/tenants/tenant-a/sensors",
      payload: { name: "South block" }
    });
    assert.equal(response.statusCode, 401);
    assert.equal(response.json().message, "Authentication required.");

    const forged = await app.inject({
      method: "POST",
      url: "/tenants/tenant-a/sensors",
      headers: { authorization: "Bearer not-a-token" },
      payload: { name: "South block" }
    });
    assert.equal(forged.statusCode, 401);
  } finally {
    await app.close();
  }
});

test("admin api: tenant and role checks", async () => {
  const { app, bearer } = await setup();
  const create = (uid: string, tenantId: string) =>
    app.inject({
      method: "POST",
      url: `/tenants/${tenantId}/sensors`,
      headers: bearer(uid),
      payload: { name: "South block" }
    });
  try {
    const multi = await create("farmer-multi", "tenant-a");
    assert.equal(multi.statusCode, 403);
    assert.deepEqual(multi.json().details, { reason: "farmer_multi_tenant" });

    const farmer = await create("farmer-a", "tenant-a");
    assert.equal(farmer.statusCode, 403);
    assert.deepEqual(farmer.json().details, { reason: "insufficient_role" });

    const outsider = await create("tech-a", "tenant-b");
    assert.equal(outsider.statusCode, 403);
    assert.deepEqual(outsider.json().details, { reason: "not_member" });

    const unknown = await create("ghost", "tenant-a");
    assert.equal(unknown.statusCode, 403);
    assert.equal(unknown.json().message, "User profile not found.");
  } finally {
    await app.close();
  }
});

test("admin api: created sensor can ingest right away", async () => {
  const { app, bearer } = await setup();
  try {
    const created = await app.inject({
      method: "POST",
      url: "/tenants/tenant-a/sensors",
      headers: bearer("tech-a"),
      payload: { name: "South block", fieldId: "field-2" }
    });
    assert.equal(created.statusCode, 201);
    const body = created.json();
    assert.match(body.hardwareId, /^[0-9A-F]{6}$/);
    assert.equal(typeof body.sensorId, "string");

    const ingest = await app.inject({
      method: "POST",
      url: "/sensors/rain-gauge",
      headers: { "x-api-key": TEST_INGEST_KEY },
      payload: { id: body.hardwareId.toLowerCase(), samples: [{ r: 0.4 }] }
    });
    assert.equal(ingest.statusCode, 200);
    assert.equal(ingest.json().sensorId, body.sensorId);
    assert.equal(ingest.json().fieldId, "field-2");

    const invalid = await app.inject({
      method: "POST",
      url: "/tenants/tenant-a/sensors",
      headers: bearer("tech-a"),
      payload: { name: "" }
    });
    assert.equal(invalid.statusCode, 400);
  } finally {
    await app.close();
  }
});

test("admin api: publish and republish a config", async () => {
  const { app, store, publisher, bearer } = await setup();
  try {
    const published = await app.inject({
      method: "POST",
      url: "/tenants/tenant-a/sensors/s-1/configs/publish",
      headers: bearer("tech-a"),
      payload: samplePlanInput()
    });
    assert.equal(published.statusCode, 200);
    assert.deepEqual(published.json(), {
      ver: 1,
      cc: SAMPLE_PLAN_CC[1],
      topics: { config: "/sensors/config/A1B2C3", meta: "/sensors/config-meta/A1B2C3" }
    });
    assert.equal(store.configs.get("tenant-a/s-1/1")?.createdByUid, "tech-a");

    const republished = await app.inject({
      method: "POST",
      url: "/tenants/tenant-a/sensors/s-1/configs/1/republish",
      headers: bearer("admin-a")
    });
    assert.equal(republished.statusCode, 200);
    assert.equal(republished.json().cc, SAMPLE_PLAN_CC[1]);
    assert.deepEqual(
      publisher.messages.map((message) => message.topic),
      [
        "/sensors/config/A1B2C3",
        "/sensors/config-meta/A1B2C3",
        "/sensors/config/A1B2C3",
        "/sensors/config-meta/A1B2C3"
      ]
    );
    assert.equal(publisher.messages[2].payload, publisher.messages[0].payload);

    const missing = await app.inject({
      method: "POST",
      url: "/tenants/tenant-a/sensors/s-1/configs/9/republish",
      headers: bearer("admin-a")
    });
    assert.equal(missing.statusCode, 404);
    assert.equal(missing.json().code, "config_not_found");
  } finally {
    await app.close();
  }
});

test("admin api: invalid plan and broker failure", async () => {
  const { app, publisher, bearer } = await setup();
  try {
    const invalid = await app.inject({
      method: "POST",
      url: "/tenants/tenant-a/sensors/s-1/configs/publish",
      headers: bearer("tech-a"),
      payload: { channels: [], fields: ["n"], steps: [] }
    });
    assert.equal(invalid.statusCode, 400);
    assert.equal(invalid.json().code, "invalid_plan");

    publisher.failTopics.add("/sensors/config/A1B2C3");
    const failed = await app.inject({
      method: "POST",
      url: "/tenants/tenant-a/sensors/s-1/configs/publish",
      headers: bearer("tech-a"),
      payload: samplePlanInput()
    });
    assert.equal(failed.statusCode, 502);
    assert.equal(failed.json().code, "publish_failed");
    assert.deepEqual(publisher.messages, []);
  } finally {
    await app.close();
  }
});
