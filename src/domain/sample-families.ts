import { z } from "zod";

export type MetricValues = Record<string, number>;

export const MAX_SAMPLES_PER_BATCH = 1440;
export const MAX_INTERVAL_SEC = 86400;

const optionalNumber = z.number().finite().nullish();

export const batchEnvelopeSchema = z.object({
  id: z.string().trim().min(1).max(64),
  la: optionalNumber,
  lo: optionalNumber,
  b: optionalNumber,
  s: optionalNumber,
  intervalSec: z.number().int().max(MAX_INTERVAL_SEC).nullish()
});

export type BatchEnvelope = z.infer<typeof batchEnvelopeSchema>;

/**
 * A validated batch: the envelope plus one canonical metric map per sample,
 * oldest sample first.
 */
export type TelemetryBatch = BatchEnvelope & {
  metrics: MetricValues[];
};

export const SAMPLE_FAMILY_NAMES = [
  "npk",
  "soil_moisture",
  "fertirrigation",
  "hygrometer",
  "leaf_wetness",
  "rain_gauge",
  "thermal_stress"
] as const;

export type SampleFamilyName = (typeof SAMPLE_FAMILY_NAMES)[number];

export type SampleFamily = {
  name: SampleFamilyName;
  route: string;
  batchSchema: z.ZodType<TelemetryBatch, z.ZodTypeDef, unknown>;
};

function defineFamily<S extends z.ZodTypeAny>(
  name: SampleFamilyName,
  route: string,
  sampleSchema: S,
  toMetrics: (sample: z.output<S>) => MetricValues
): SampleFamily {
  const samplesSchema: z.ZodType<MetricValues[], z.ZodTypeDef, unknown> = z
    .array(sampleSchema)
    .min(1)
    .max(MAX_SAMPLES_PER_BATCH)
    .transform((samples) => samples.map((sample) => toMetrics(sample)));

  const batchSchema = batchEnvelopeSchema
    .extend({ samples: samplesSchema })
    .transform(({ samples, ...envelope }): TelemetryBatch => ({
      ...envelope,
      metrics: samples
    }));

  return { name, route, batchSchema };
}

const reading = z.number().finite();

/** Firmware sends flags as JSON booleans or as 0/1. */
const flag = z
  .union([z.boolean(), z.literal(0), z.literal(1)])
  .transform((value) => (value === true || value === 1 ? 1 : 0));

export const SAMPLE_FAMILIES: Record<SampleFamilyName, SampleFamily> = {
  npk: defineFamily(
    "npk",
    "npk",
    z.object({ n: reading, p: reading, k: reading }),
    (sample) => ({
      nitrogen_mgkg: sample.n,
      phosphorus_mgkg: sample.p,
      potassium_mgkg: sample.k
    })
  ),
  soil_moisture: defineFamily(
    "soil_moisture",
    "soil-moisture",
    z.object({ v: reading }),
    (sample) => ({ vwc_percent: sample.v })
  ),
  fertirrigation: defineFamily(
    "fertirrigation",
    "fertirrigation",
    z.object({ ec: reading, st: reading.nullish() }),
    (sample) => {
      const values: MetricValues = { ec_mscm: sample.ec };
      if (sample.st !== null && sample.st !== undefined) {
        values.solution_temp_c = sample.st;
      }
      return values;
    }
  ),
  hygrometer: defineFamily(
    "hygrometer",
    "hygrometer",
    z.object({ at: reading, rh: reading }),
    (sample) => ({ air_temp_c: sample.at, rh_percent: sample.rh })
  ),
  leaf_wetness: defineFamily(
    "leaf_wetness",
    "leaf-wetness",
    z.object({ w: flag, wd: reading.nullish() }),
    (sample) => {
      const values: MetricValues = { wet: sample.w };
      if (sample.wd !== null && sample.wd !== undefined) {
        values.wet_duration_s = sample.wd;
      }
      return values;
    }
  ),
  rain_gauge: defineFamily(
    "rain_gauge",
    "rain-gauge",
    z.object({ r: reading, ri: reading.nullish() }),
    (sample) => {
      const values: MetricValues = { rainfall_mm: sample.r };
      if (sample.ri !== null && sample.ri !== undefined) {
        values.intensity_mm_h = sample.ri;
      }
      return values;
    }
  ),
  thermal_stress: defineFamily(
    "thermal_stress",
    "thermal-stress",
    z.object({ tt: reading }),
    (sample) => ({ temperature_c: sample.tt })
  )
};

export function listSampleFamilies(): SampleFamily[] {
  return SAMPLE_FAMILY_NAMES.map((name) => SAMPLE_FAMILIES[name]);
}
