// Zero-noise lifecycle: every value is exact, so the whole cycle is pinned tick by tick.

import assert from "node:assert";

import { SensorReadingV1Z } from "@pdm/contracts";

import type { Phase, StepResult } from "../index";
import { configure, createSeededRng, createSensorState, step } from "../index";
import { FIXED_NOW_MS, zeroNoiseParams } from "./fixtures";

const cfg = configure(zeroNoiseParams);
const state = createSensorState(cfg);
const rng = createSeededRng(7);

assert.deepEqual(state, {
  phase: "NORMAL",
  vibration: 0.5,
  temperature: 40,
  acoustic: 30,
  hold_tick_count: 0,
  normal_tick_count: 0,
});

const phases: Phase[] = [];
const results: StepResult[] = [];
for (let i = 1; i <= 22; i++) {
  const r = step(state, cfg, rng, FIXED_NOW_MS);
  results.push(r);
  phases.push(state.phase);
  assert.equal(r.reading.status === "ANOMALY", state.phase !== "NORMAL", `status/phase mismatch at tick ${i}`);
  assert.equal(r.reading.signature_frequency_hz !== null, state.phase !== "NORMAL");
  assert.ok(SensorReadingV1Z.safeParse(r.reading).success, `invalid reading at tick ${i}`);
}

// ticks 1-3 guaranteed normal; start gate fires at tick 4 (probability 1)
assert.deepEqual(phases.slice(0, 3), ["NORMAL", "NORMAL", "NORMAL"]);
assert.equal(results[2]?.guaranteed_normal_ended, true);
assert.equal(results[1]?.guaranteed_normal_ended, false);
assert.deepEqual(results[3]?.transition, { from: "NORMAL", to: "RAMP_UP" });

// Values on the transition tick are still the Normal ones
assert.equal(results[3]?.reading.vibration_g, 0.5);
assert.equal(results[3]?.reading.dominant_frequency_hz, 121);
assert.equal(results[3]?.reading.signature_frequency_hz, 121.38);

// five ramp steps reach target exactly at tick 9
assert.deepEqual(phases.slice(3, 8), ["RAMP_UP", "RAMP_UP", "RAMP_UP", "RAMP_UP", "RAMP_UP"]);
assert.equal(results[4]?.reading.vibration_g, 1.0);
assert.equal(results[4]?.reading.temperature_c, 42);
assert.equal(results[4]?.reading.acoustic_db, 36);
assert.deepEqual(results[8]?.transition, { from: "RAMP_UP", to: "HOLD" });
assert.equal(results[8]?.reading.vibration_g, 3);
assert.equal(results[8]?.reading.temperature_c, 50);
assert.equal(results[8]?.reading.acoustic_db, 60);

// Hold lasts hold_duration_ticks (4) readings: ticks 9-12
assert.deepEqual(phases.slice(8, 12), ["HOLD", "HOLD", "HOLD", "HOLD"]);
assert.deepEqual(results[12]?.transition, { from: "HOLD", to: "RAMP_DOWN" });

// ramp-down takes ceil((3.0 - 0.5) / 0.5) = 5 ticks (14-18); tick 18 snaps to base
assert.deepEqual(phases.slice(12, 17), ["RAMP_DOWN", "RAMP_DOWN", "RAMP_DOWN", "RAMP_DOWN", "RAMP_DOWN"]);
assert.equal(results[16]?.reading.vibration_g, 1.0);
assert.deepEqual(results[17]?.transition, { from: "RAMP_DOWN", to: "NORMAL" });
assert.equal(results[17]?.reading.status, "NORMAL");
assert.equal(results[17]?.reading.signature_frequency_hz, null);

// guaranteed-normal period applies again after each return (ticks 19-21), start at 22
assert.deepEqual(phases.slice(17, 21), ["NORMAL", "NORMAL", "NORMAL", "NORMAL"]);
assert.equal(phases[21], "RAMP_UP");
assert.equal(state.normal_tick_count, 0);

// Normal readings report an idle frequency within the band
for (const r of results) {
  if (r.reading.status === "NORMAL") {
    assert.ok(r.reading.dominant_frequency_hz >= 55 && r.reading.dominant_frequency_hz <= 65);
  }
}

// Timestamp carries the injected clock
assert.equal(results[0]?.reading.timestamp, "2026-01-15T08:30:00.125Z");
assert.equal(results[0]?.reading.asset_id, "TestCo_Turbine001");
