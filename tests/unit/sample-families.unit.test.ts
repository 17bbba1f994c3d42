import assert from "node:assert/strict";
import test from "node:test";
import { SAMPLE_FAMILIES, listSampleFamilies } from "../../src/domain/sample-families";

test("sample families: every family has a distinct route", () => {
  const routes = listSampleFamilies().map((family) => family.route);
  assert.deepEqual(routes, [
    "npk",
    "soil-moisture",
    "fertirrigation",
    "hygrometer",
    "leaf-wetness",
    "rain-gauge",
    "thermal-stress"
  ]);
});

test("sample families: npk maps wire fields to metric keys", () => {
  const parsed = SAMPLE_FAMILIES.npk.batchSchema.parse({
    id: "a1b2c3",
    b: 87,
    s: -71,
    intervalSec: 600,
    samples: [
      { n: 12, p: 7.5, k: 30 },
      { n: 13, p: 8, k: 31 }
    ]
  });

  assert.deepEqual(parsed, {
    id: "a1b2c3",
    b: 87,
    s: -71,
    intervalSec: 600,
    metrics: [
      { nitrogen_mgkg: 12, phosphorus_mgkg: 7.5, potassium_mgkg: 30 },
      { nitrogen_mgkg: 13, phosphorus_mgkg: 8, potassium_mgkg: 31 }
    ]
  });
});

test("sample families: optional fields are omitted when absent", () => {
  const fert = SAMPLE_FAMILIES.fertirrigation.batchSchema.parse({
    id: "AAA111",
    samples: [{ ec: 1.8 }, { ec: 1.9, st: 21.5 }, { ec: 2, st: null }]
  });
  assert.deepEqual(fert.metrics, [
    { ec_mscm: 1.8 },
    { ec_mscm: 1.9, solution_temp_c: 21.5 },
    { ec_mscm: 2 }
  ]);

  const rain = SAMPLE_FAMILIES.rain_gauge.batchSchema.parse({
    id: "AAA111",
    samples: [{ r: 0.2, ri: 2.4 }, { r: 0 }]
  });
  assert.deepEqual(rain.metrics, [{ rainfall_mm: 0.2, intensity_mm_h: 2.4 }, { rainfall_mm: 0 }]);
});

test("sample families: leaf wetness flag becomes 1 or 0", () => {
  const parsed = SAMPLE_FAMILIES.leaf_wetness.batchSchema.parse({
    id: "AAA111",
    samples: [{ w: true, wd: 120 }, { w: false }]
  });
  assert.deepEqual(parsed.metrics, [{ wet: 1, wet_duration_s: 120 }, { wet: 0 }]);
});

test("sample families: leaf wetness accepts 0 and 1 as the flag", () => {
  const schema = SAMPLE_FAMILIES.leaf_wetness.batchSchema;
  const parsed = schema.parse({ id: "000001", samples: [{ w: 1 }, { w: 0, wd: 30 }] });
  assert.deepEqual(parsed.metrics, [{ wet: 1 }, { wet: 0, wet_duration_s: 30 }]);
  assert.equal(schema.safeParse({ id: "000001", samples: [{ w: 2 }] }).success, false);
  assert.equal(schema.safeParse({ id: "000001", samples: [{ w: "yes" }] }).success, false);
});

test("sample families: rejects empty, malformed and oversize batches", () => {
  const schema = SAMPLE_FAMILIES.soil_moisture.batchSchema;
  assert.equal(schema.safeParse({ id: "AAA111", samples: [] }).success, false);
  assert.equal(schema.safeParse({ id: "AAA111", samples: [{ v: "wet" }] }).success, false);
  assert.equal(schema.safeParse({ id: "", samples: [{ v: 1 }] }).success, false);
  assert.equal(schema.safeParse({ id: "AAA111", intervalSec: 86401, samples: [{ v: 1 }] }).success, false);
  assert.equal(
    schema.safeParse({ id: "AAA111", samples: Array.from({ length: 1441 }, () => ({ v: 1 })) }).success,
    false
  );
  assert.equal(
    schema.safeParse({ id: "AAA111", samples: Array.from({ length: 1440 }, () => ({ v: 1 })) }).success,
    true
  );
});
