// configure() / tryConfigure(): derived quantities and rejections.

import assert from "node:assert";

import { GeneratorConfigRejected, configure, tryConfigure } from "../index";
import { zeroNoiseParams } from "./fixtures";

const cfg = configure(zeroNoiseParams);

assert.deepEqual(cfg.base, { vibration: 0.5, temperature: 40, acoustic: 30 });
assert.deepEqual(cfg.target, { vibration: 3, temperature: 50, acoustic: 60 });
assert.deepEqual(cfg.ramp_step, { vibration: 0.5, temperature: 2, acoustic: 6 });
assert.deepEqual(cfg.temperature_range, [38, 42]);

// Frequency defaults
assert.deepEqual(cfg.idle_frequency_band_hz, [55, 65]);
assert.equal(cfg.anomaly_dominant_frequency_hz, 121.0);
assert.equal(cfg.anomaly_signature_frequency_hz, 121.38);

// temperature_flex_c defaults to 2
const { temperature_flex_c: _flex, ...withoutFlex } = zeroNoiseParams;
assert.deepEqual(configure(withoutFlex).temperature_range, [38, 42]);

// --- Rejections ---
function firstError(input: unknown) {
  const r = tryConfigure(input);
  assert.equal(r.ok, false, "expected rejection");
  if (r.ok) throw new Error("unreachable");
  return r.errors[0];
}

const inverted = firstError({ ...zeroNoiseParams, vibration_normal_range: [0.75, 0.25] });
assert.equal(inverted?.code, "RANGE_INVERTED");
assert.equal(inverted?.path, "vibration_normal_range");

assert.equal(firstError({ ...zeroNoiseParams, colour: "blue" })?.code, "UNKNOWN_KEYS");
assert.equal(firstError({ ...zeroNoiseParams, base_temperature_c: Number.NaN })?.code, "INVALID_PARAMS");
assert.equal(firstError({ ...zeroNoiseParams, acoustic_anomaly_factor: Number.POSITIVE_INFINITY })?.code, "INVALID_PARAMS");
assert.equal(firstError({ ...zeroNoiseParams, ramp_duration_ticks: 0 })?.path, "ramp_duration_ticks");
assert.equal(firstError({ ...zeroNoiseParams, hold_duration_ticks: 2.5 })?.path, "hold_duration_ticks");
assert.equal(firstError({ ...zeroNoiseParams, anomaly_start_probability: 1.5 })?.path, "anomaly_start_probability");

// 0.75 * 0.5 = 0.375 is below the vibration base of 0.5
const lowTarget = firstError({ ...zeroNoiseParams, anomaly_vibration_factor: 0.5 });
assert.equal(lowTarget?.code, "TARGET_NOT_ABOVE_BASE");
assert.equal(lowTarget?.path, "vibration");

const noIncrease = firstError({ ...zeroNoiseParams, temperature_critical_increase_c: 0 });
assert.equal(noIncrease?.path, "temperature");

// configure() throws with the same error list
assert.throws(
  () => configure({ ...zeroNoiseParams, acoustic_normal_range: [40, 20] }),
  (err: unknown) =>
    err instanceof GeneratorConfigRejected &&
    err.errors.length === 1 &&
    err.errors[0]?.code === "RANGE_INVERTED" &&
    err.message === "RANGE_INVERTED:acoustic_normal_range",
);

// Frozen
assert.equal(Object.isFrozen(cfg), true);
