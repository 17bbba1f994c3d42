import { MAX_INTERVAL_SEC } from "../domain/sample-families";
import { ServiceError } from "./service-error";

export const DEFAULT_INTERVAL_SEC = 300;

export type SampleSlot = {
  index: number;
  bucketId: string;
  dayId: string;
  timestamp: Date;
};

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** `YYYYMMDD` of the UTC calendar day. */
export function formatDayId(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

/** `YYYYMMDDHHMM` of the UTC minute; sorts lexicographically in time order. */
export function formatBucketId(date: Date): string {
  return `${formatDayId(date)}${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}`;
}

export function dayIdOfBucket(bucketId: string): string {
  return bucketId.slice(0, 8);
}

export function dayStartUtc(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function resolveIntervalSec(
  intervalSec: number | null | undefined,
  fallback = DEFAULT_INTERVAL_SEC
): number {
  if (intervalSec === null || intervalSec === undefined || intervalSec <= 0) {
    return fallback;
  }
  if (!Number.isInteger(intervalSec) || intervalSec > MAX_INTERVAL_SEC) {
    throw new ServiceError(
      "invalid_input",
      "invalid_interval",
      `intervalSec must be an integer no greater than ${MAX_INTERVAL_SEC}.`,
      { field: "intervalSec", value: intervalSec }
    );
  }
  return intervalSec;
}

/**
 * Reconstructs sample timestamps for a batch. Sample `i` of `n` is placed
 * `(n - 1 - i) * interval` seconds before the receipt time, so the newest
 * sample lands on `receivedAt` itself. The result is ordered oldest first.
 */
export function bucketize(
  receivedAt: Date,
  intervalSec: number | null | undefined,
  sampleCount: number,
  fallbackIntervalSec = DEFAULT_INTERVAL_SEC
): SampleSlot[] {
  if (!Number.isInteger(sampleCount) || sampleCount < 1) {
    throw new ServiceError(
      "invalid_input",
      "invalid_sample_count",
      "A batch must contain at least one sample.",
      { field: "samples", value: sampleCount }
    );
  }
  if (Number.isNaN(receivedAt.getTime())) {
    throw new ServiceError("invalid_input", "invalid_received_at", "Batch receipt time is invalid.");
  }

  const interval = resolveIntervalSec(intervalSec, fallbackIntervalSec);
  const anchorMs = receivedAt.getTime();
  const slots: SampleSlot[] = [];

  for (let index = 0; index < sampleCount; index += 1) {
    const timestamp = new Date(anchorMs - (sampleCount - 1 - index) * interval * 1000);
    slots.push({
      index,
      bucketId: formatBucketId(timestamp),
      dayId: formatDayId(timestamp),
      timestamp
    });
  }

  return slots;
}
