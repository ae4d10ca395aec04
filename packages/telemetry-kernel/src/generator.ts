/**
 * File: packages/telemetry-kernel/src/generator.ts
 *
 * Anomaly lifecycle state machine.
 *
 * Per tick (in this order):
 *   1) advance(): apply the current phase's value rule, then maybe move to the next phase
 *   2) emit(): build the Reading from the post-tick state
 *
 * Determinism:
 * - All randomness comes from the injected Rng; the wall clock only feeds `timestamp`.
 * - RNG draw order is fixed: NORMAL draws shared, vibration, temperature, acoustic,
 *   then (past the guaranteed-normal period) one uniform for the start gate; emit
 *   draws one uniform for the idle frequency when the post-tick phase is NORMAL.
 *
 * Rounding happens in emit() only; SensorState keeps full precision.
 */

import type { SensorReadingV1 } from "@pdm/contracts";

import type { Channel, ChannelTriple } from "./channels";
import { CHANNELS, clamp, roundTo } from "./channels";
import type { GeneratorConfig } from "./config/generator_config";
import type { Rng } from "./rng/rng";
import type { Phase, PhaseTransition, SensorState } from "./state/sensor_state";
import { isAnomalous } from "./state/sensor_state";

const RAMP_UP_OVERSHOOT = 1.1;
const HOLD_JITTER_MULTIPLIER = 1.5;
const RETURN_EPSILON = 0.001;
const EMIT_DP = 4;

export type StepResult = {
  reading: SensorReadingV1;
  transition: PhaseTransition | null;
  guaranteed_normal_ended: boolean; // true on the tick the initial normal period completes
};

function write(state: SensorState, ch: Channel, v: number, cfg: GeneratorConfig): void {
  state[ch] = Number.isFinite(v) ? v : cfg.base[ch];
}

function normalBounds(cfg: GeneratorConfig, ch: Channel): readonly [number, number] {
  if (ch === "vibration") return cfg.vibration_normal_range;
  if (ch === "acoustic") return cfg.acoustic_normal_range;
  return cfg.temperature_range;
}

function anomalyStd(cfg: GeneratorConfig, ch: Channel): number {
  return cfg.normal_noise_std[ch] * cfg.anomaly_jitter_factor;
}

function all(pred: (ch: Channel) => boolean): boolean {
  return CHANNELS.every(pred);
}

type AdvanceOutcome = { next: Phase; guaranteed_normal_ended: boolean };

function advanceNormal(state: SensorState, cfg: GeneratorConfig, rng: Rng): AdvanceOutcome {
  const shared = rng.gauss(0, cfg.shared_noise_std);
  for (const ch of CHANNELS) {
    const v = state[ch] + shared * cfg.shared_influence_scale[ch] + rng.gauss(0, cfg.normal_noise_std[ch]);
    write(state, ch, v, cfg);
    const [lo, hi] = normalBounds(cfg, ch);
    state[ch] = clamp(state[ch], lo, hi);
  }

  if (state.normal_tick_count < cfg.initial_normal_ticks) {
    state.normal_tick_count += 1;
    return { next: "NORMAL", guaranteed_normal_ended: state.normal_tick_count === cfg.initial_normal_ticks };
  }

  if (rng.uniform() < cfg.anomaly_start_probability) {
    state.hold_tick_count = 0;
    state.normal_tick_count = 0;
    return { next: "RAMP_UP", guaranteed_normal_ended: false };
  }
  return { next: "NORMAL", guaranteed_normal_ended: false };
}

function advanceRampUp(state: SensorState, cfg: GeneratorConfig, rng: Rng): Phase {
  for (const ch of CHANNELS) {
    const v = state[ch] + cfg.ramp_step[ch] + rng.gauss(0, anomalyStd(cfg, ch));
    write(state, ch, v, cfg);
    state[ch] = Math.min(state[ch], cfg.target[ch] * RAMP_UP_OVERSHOOT);
  }
  return all((ch) => state[ch] >= cfg.target[ch]) ? "HOLD" : "RAMP_UP";
}

function advanceHold(state: SensorState, cfg: GeneratorConfig, rng: Rng): Phase {
  for (const ch of CHANNELS) {
    write(state, ch, cfg.target[ch] + rng.gauss(0, anomalyStd(cfg, ch) * HOLD_JITTER_MULTIPLIER), cfg);
  }
  state.hold_tick_count += 1;
  return state.hold_tick_count >= cfg.hold_duration_ticks ? "RAMP_DOWN" : "HOLD";
}

function advanceRampDown(state: SensorState, cfg: GeneratorConfig, rng: Rng): Phase {
  // No clamp: values may dip below base so the return condition is reachable under noise.
  for (const ch of CHANNELS) {
    const v = state[ch] - (cfg.ramp_step[ch] + rng.gauss(0, anomalyStd(cfg, ch)));
    write(state, ch, v, cfg);
  }
  if (!all((ch) => state[ch] <= cfg.base[ch] + RETURN_EPSILON)) return "RAMP_DOWN";

  for (const ch of CHANNELS) state[ch] = cfg.base[ch];
  state.normal_tick_count = 0;
  return "NORMAL";
}

function advance(state: SensorState, cfg: GeneratorConfig, rng: Rng): AdvanceOutcome {
  switch (state.phase) {
    case "NORMAL":
      return advanceNormal(state, cfg, rng);
    case "RAMP_UP":
      return { next: advanceRampUp(state, cfg, rng), guaranteed_normal_ended: false };
    case "HOLD":
      return { next: advanceHold(state, cfg, rng), guaranteed_normal_ended: false };
    case "RAMP_DOWN":
      return { next: advanceRampDown(state, cfg, rng), guaranteed_normal_ended: false };
  }
}

function emit(state: SensorState, cfg: GeneratorConfig, rng: Rng, nowMs: number): SensorReadingV1 {
  const anomalous = isAnomalous(state.phase);
  const [idleLo, idleHi] = cfg.idle_frequency_band_hz;
  const dominant = anomalous ? cfg.anomaly_dominant_frequency_hz : idleLo + rng.uniform() * (idleHi - idleLo);

  return {
    asset_id: cfg.asset_id,
    timestamp: new Date(nowMs).toISOString(),
    vibration_g: roundTo(state.vibration, EMIT_DP),
    temperature_c: roundTo(state.temperature, EMIT_DP),
    acoustic_db: roundTo(state.acoustic, EMIT_DP),
    dominant_frequency_hz: roundTo(dominant, EMIT_DP),
    signature_frequency_hz: anomalous ? roundTo(cfg.anomaly_signature_frequency_hz, EMIT_DP) : null,
    status: anomalous ? "ANOMALY" : "NORMAL",
    anomaly_active: anomalous,
  };
}

/**
 * Advances `state` by exactly one tick (in place) and returns the Reading
 * for the post-tick state together with the phase transition, if any.
 */
export function step(state: SensorState, cfg: GeneratorConfig, rng: Rng, nowMs: number = Date.now()): StepResult {
  const from = state.phase;
  const out = advance(state, cfg, rng);
  state.phase = out.next;

  return {
    reading: emit(state, cfg, rng, nowMs),
    transition: out.next === from ? null : { from, to: out.next },
    guaranteed_normal_ended: out.guaranteed_normal_ended,
  };
}

export function tick(state: SensorState, cfg: GeneratorConfig, rng: Rng, nowMs?: number): SensorReadingV1 {
  return step(state, cfg, rng, nowMs).reading;
}

/** Current channel values (unrounded). */
export function channelValues(state: SensorState): ChannelTriple {
  return { vibration: state.vibration, temperature: state.temperature, acoustic: state.acoustic };
}
