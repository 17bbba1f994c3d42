import assert from "node:assert/strict";
import test from "node:test";
import { Aggregator, applyFold, emptyDailyAggregate } from "../../src/services/aggregator";
import { isServiceError } from "../../src/services/service-error";
import { fixedClock } from "../support/fixtures";
import { MemoryTelemetryStore } from "../support/memory-telemetry-store";

const KEY = { tenantId: "t", sensorId: "s", dayId: "20240305" };
const STORE_KEY = "t/s/20240305";
const clock = fixedClock("2024-03-05T12:00:00.000Z");

test("aggregator: fold is pure and tracks seen buckets per metric", () => {
  const base = emptyDailyAggregate("20240305", "2024-03-05T00:00:00.000Z");
  const result = applyFold(
    base,
    [
      { bucketId: "202403050905", values: { vwc_percent: 20 } },
      { bucketId: "202403050900", values: { vwc_percent: 10, air_temp_c: 18 } }
    ],
    "2024-03-05T12:00:00.000Z"
  );

  assert.deepEqual(base.metrics, {});
  assert.equal(result.applied, 3);
  assert.equal(result.skipped, 0);
  assert.deepEqual(result.doc, {
    dayId: "20240305",
    metrics: {
      vwc_percent: { min: 10, max: 20, sum: 30, count: 2 },
      air_temp_c: { min: 18, max: 18, sum: 18, count: 1 }
    },
    seen: {
      vwc_percent: ["202403050900", "202403050905"],
      air_temp_c: ["202403050900"]
    },
    updatedAt: "2024-03-05T12:00:00.000Z"
  });
});

test("aggregator: a later metric in an already seen bucket still counts", () => {
  const first = applyFold(
    emptyDailyAggregate("20240305", "2024-03-05T00:00:00.000Z"),
    [{ bucketId: "202403050900", values: { vwc_percent: 20 } }],
    "2024-03-05T12:00:00.000Z"
  );
  const second = applyFold(
    first.doc,
    [{ bucketId: "202403050900", values: { vwc_percent: 20, air_temp_c: 18 } }],
    "2024-03-05T12:01:00.000Z"
  );

  assert.equal(second.applied, 1);
  assert.equal(second.skipped, 1);
  assert.equal(second.doc.metrics.vwc_percent.count, 1);
  assert.equal(second.doc.metrics.air_temp_c.count, 1);
});

test("aggregator: replaying a bucket does not double count", async () => {
  const store = new MemoryTelemetryStore();
  const aggregator = new Aggregator(store, { maxAttempts: 3, clock });

  const first = await aggregator.foldIntoDaily("t", "s", "20240305", "202403050900", { vwc_percent: 20.1 });
  const replay = await aggregator.foldIntoDaily("t", "s", "20240305", "202403050900", { vwc_percent: 20.1 });

  assert.deepEqual(first, { applied: 1, skipped: 0, attempts: 1 });
  assert.deepEqual(replay, { applied: 0, skipped: 1, attempts: 1 });
  assert.equal(store.aggregates.get(STORE_KEY)?.revision, 1);
  assert.deepEqual(store.aggregates.get(STORE_KEY)?.doc.metrics.vwc_percent, {
    min: 20.1,
    max: 20.1,
    sum: 20.1,
    count: 1
  });
});

test("aggregator: count equals distinct buckets and bounds hold", async () => {
  const store = new MemoryTelemetryStore();
  const aggregator = new Aggregator(store, { maxAttempts: 3, clock });
  const values = [5, 2, 9, 4];

  for (const [index, value] of values.entries()) {
    await aggregator.foldIntoDaily("t", "s", "20240305", `2024030509${String(index).padStart(2, "0")}`, {
      temperature_c: value
    });
  }

  const stats = store.aggregates.get(STORE_KEY)?.doc.metrics.temperature_c;
  assert.deepEqual(stats, { min: 2, max: 9, sum: 20, count: 4 });
});

test("aggregator: rejects buckets from another day", async () => {
  const aggregator = new Aggregator(new MemoryTelemetryStore(), { maxAttempts: 3, clock });
  await assert.rejects(
    aggregator.foldIntoDaily("t", "s", "20240305", "202403060000", { vwc_percent: 1 }),
    (error: unknown) => isServiceError(error) && error.code === "bucket_outside_day"
  );
});

test("aggregator: lost race re-reads and keeps both writes", async () => {
  const store = new MemoryTelemetryStore();
  store.beforeSaveDailyAggregate = () => {
    store.beforeSaveDailyAggregate = null;
    store.aggregates.set(STORE_KEY, {
      doc: {
        dayId: "20240305",
        metrics: { vwc_percent: { min: 10, max: 10, sum: 10, count: 1 } },
        seen: { vwc_percent: ["202403050900"] },
        updatedAt: "2024-03-05T11:00:00.000Z"
      },
      revision: 1
    });
  };
  const aggregator = new Aggregator(store, { maxAttempts: 3, clock });

  const result = await aggregator.foldBuckets(KEY, [{ bucketId: "202403050905", values: { vwc_percent: 20 } }]);

  assert.deepEqual(result, { applied: 1, skipped: 0, attempts: 2 });
  const stored = store.aggregates.get(STORE_KEY);
  assert.equal(stored?.revision, 2);
  assert.deepEqual(stored?.doc.metrics.vwc_percent, { min: 10, max: 20, sum: 30, count: 2 });
  assert.deepEqual(stored?.doc.seen.vwc_percent, ["202403050900", "202403050905"]);
});

test("aggregator: concurrent folds of distinct buckets all land", async () => {
  const store = new MemoryTelemetryStore();
  const aggregator = new Aggregator(store, { maxAttempts: 5, clock });

  const results = await Promise.all(
    [1, 2, 3, 4, 5].map((minute) =>
      aggregator.foldBuckets(KEY, [{ bucketId: `2024030510${String(minute).padStart(2, "0")}`, values: { rh_percent: minute * 10 } }])
    )
  );

  assert.deepEqual(
    results.map((result) => result.attempts).sort((a, b) => a - b),
    [1, 2, 3, 4, 5]
  );
  assert.deepEqual(store.aggregates.get(STORE_KEY)?.doc.metrics.rh_percent, {
    min: 10,
    max: 50,
    sum: 150,
    count: 5
  });
});

test("aggregator: identical concurrent folds count the bucket once", async () => {
  const store = new MemoryTelemetryStore();
  const aggregator = new Aggregator(store, { maxAttempts: 5, clock });
  const bucket = { bucketId: "202403051015", values: { rh_percent: 64 } };

  const results = await Promise.all([1, 2, 3].map(() => aggregator.foldBuckets(KEY, [bucket])));

  assert.deepEqual(
    results.map((result) => result.applied).sort((a, b) => a - b),
    [0, 0, 1]
  );
  const stored = store.aggregates.get(STORE_KEY);
  assert.equal(stored?.revision, 1);
  assert.deepEqual(stored?.doc.metrics.rh_percent, { min: 64, max: 64, sum: 64, count: 1 });
  assert.deepEqual(stored?.doc.seen.rh_percent, ["202403051015"]);
});

test("aggregator: exhausted retries surface as store unavailable", async () => {
  const store = new MemoryTelemetryStore();
  let competingRevision = 0;
  store.beforeSaveDailyAggregate = () => {
    competingRevision += 1;
    store.aggregates.set(STORE_KEY, {
      doc: emptyDailyAggregate("20240305", "2024-03-05T11:00:00.000Z"),
      revision: competingRevision
    });
  };
  const aggregator = new Aggregator(store, { maxAttempts: 2, clock });

  await assert.rejects(
    aggregator.foldBuckets(KEY, [{ bucketId: "202403050905", values: { vwc_percent: 20 } }]),
    (error: unknown) =>
      isServiceError(error) && error.code === "aggregate_contention" && error.statusCode === 503
  );
  assert.equal(store.callCount("saveDailyAggregate"), 2);
});
