import assert from "node:assert/strict";
import test from "node:test";
import { isServiceError } from "../../src/services/service-error";
import {
  bucketize,
  dayIdOfBucket,
  dayStartUtc,
  formatBucketId,
  formatDayId,
  resolveIntervalSec
} from "../../src/services/time-bucketer";

test("time bucketer: ids are UTC minute and day", () => {
  const date = new Date("2024-03-05T07:09:59.999Z");
  assert.equal(formatBucketId(date), "202403050709");
  assert.equal(formatDayId(date), "20240305");
  assert.equal(dayIdOfBucket("202403050709"), "20240305");
  assert.equal(dayStartUtc(date).toISOString(), "2024-03-05T00:00:00.000Z");
});

test("time bucketer: newest sample lands on receipt time, oldest first", () => {
  const receivedAt = new Date("2024-03-05T10:00:30.000Z");
  const slots = bucketize(receivedAt, 300, 2);

  assert.deepEqual(
    slots.map((slot) => [slot.index, slot.bucketId, slot.dayId, slot.timestamp.toISOString()]),
    [
      [0, "202403050955", "20240305", "2024-03-05T09:55:30.000Z"],
      [1, "202403051000", "20240305", "2024-03-05T10:00:30.000Z"]
    ]
  );
});

test("time bucketer: same input gives the same slots", () => {
  const receivedAt = new Date("2024-03-05T10:00:30.000Z");
  assert.deepEqual(bucketize(receivedAt, 60, 5), bucketize(receivedAt, 60, 5));
});

test("time bucketer: batch spanning midnight splits days", () => {
  const slots = bucketize(new Date("2024-03-06T00:02:00.000Z"), 300, 2);
  assert.deepEqual(
    slots.map((slot) => [slot.bucketId, slot.dayId]),
    [
      ["202403052357", "20240305"],
      ["202403060002", "20240306"]
    ]
  );
});

test("time bucketer: sub-minute intervals share a bucket", () => {
  const slots = bucketize(new Date("2024-03-05T10:00:45.000Z"), 30, 3);
  assert.deepEqual(
    slots.map((slot) => slot.bucketId),
    ["202403050959", "202403051000", "202403051000"]
  );
});

test("time bucketer: missing or non-positive interval falls back", () => {
  assert.equal(resolveIntervalSec(undefined), 300);
  assert.equal(resolveIntervalSec(null), 300);
  assert.equal(resolveIntervalSec(0), 300);
  assert.equal(resolveIntervalSec(-5), 300);
  assert.equal(resolveIntervalSec(null, 120), 120);
  assert.equal(resolveIntervalSec(86400), 86400);

  const slots = bucketize(new Date("2024-03-05T10:00:00.000Z"), 0, 2);
  assert.equal(slots[0].timestamp.toISOString(), "2024-03-05T09:55:00.000Z");
});

test("time bucketer: rejects bad intervals and empty batches", () => {
  assert.throws(
    () => resolveIntervalSec(86401),
    (error: unknown) => isServiceError(error) && error.code === "invalid_interval" && error.statusCode === 400
  );
  assert.throws(
    () => resolveIntervalSec(1.5),
    (error: unknown) => isServiceError(error) && error.code === "invalid_interval"
  );
  assert.throws(
    () => bucketize(new Date("2024-03-05T10:00:00.000Z"), 300, 0),
    (error: unknown) => isServiceError(error) && error.code === "invalid_sample_count"
  );
});
