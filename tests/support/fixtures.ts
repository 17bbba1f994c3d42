import type { AppConfig } from "../../src/config/env";

export const TEST_INGEST_KEY = "test-ingest-key-0001";
export const TEST_JWT_SECRET = "test-secret-test-secret-test-secret";

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ingestApiKey: TEST_INGEST_KEY,
    jwtSecret: TEST_JWT_SECRET,
    trustProxy: false,
    logLevel: false,
    defaultIntervalSec: 300,
    rawRetentionDays: 60,
    aggregateMaxAttempts: 5,
    ...overrides
  };
}

export function fixedClock(iso: string): () => Date {
  return () => new Date(iso);
}

/** Plan input as an operator would send it; defaults are filled in by the schema. */
export function samplePlanInput(): Record<string, unknown> {
  return {
    channels: [{ gpio: 4 }, { gpio: 5, active_high: false }, { gpio: 6, warmup_ms: 1000 }],
    fields: ["n", "p"],
    steps: [
      {
        ch: 0,
        modbus: { addr: 1, reg: 30, count: 2 },
        decode: [
          { idx: 0, type: "u16", reg_ofs: 0 },
          { idx: 1, type: "s16", reg_ofs: 1, scale: 0.1 }
        ]
      }
    ]
  };
}

/** Canonical text of {@link samplePlanInput} rendered for version 1. */
export const SAMPLE_PLAN_V1_JSON =
  '{"channels":[{"active_high":true,"gpio":4,"warmup_ms":800},{"active_high":false,"gpio":5,"warmup_ms":800},' +
  '{"active_high":true,"gpio":6,"warmup_ms":1000}],"fields":["n","p"],"steps":[{"ch":0,"decode":[' +
  '{"idx":0,"offset":0,"reg_ofs":0,"scale":1,"type":"u16"},{"idx":1,"offset":0,"reg_ofs":1,"scale":0.1,"type":"s16"}],' +
  '"modbus":{"addr":1,"count":2,"reg":30,"timeout_ms":200}}],"ver":1}';

export const SAMPLE_PLAN_CC = {
  1: "08fd8365",
  2: "23d0d0a6",
  3: "3acbe1e7"
} as const;
