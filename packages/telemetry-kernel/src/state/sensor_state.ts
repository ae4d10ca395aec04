/**
 * File: packages/telemetry-kernel/src/state/sensor_state.ts
 *
 * SensorState is the only mutable entity of the generator. One instance per
 * sensor process; tick() mutates it in place.
 *
 * Phase cycle (strict, no skips):
 *   NORMAL -> RAMP_UP -> HOLD -> RAMP_DOWN -> NORMAL
 */

import type { GeneratorConfig } from "../config/generator_config";

export type Phase = "NORMAL" | "RAMP_UP" | "HOLD" | "RAMP_DOWN";

export const PHASE_CYCLE: ReadonlyArray<Phase> = ["NORMAL", "RAMP_UP", "HOLD", "RAMP_DOWN"];

export type SensorState = {
  phase: Phase;
  vibration: number; // g
  temperature: number; // deg C
  acoustic: number; // dB
  hold_tick_count: number; // ticks spent in HOLD
  normal_tick_count: number; // ticks in NORMAL since last return (guaranteed-normal gate)
};

export type PhaseTransition = { from: Phase; to: Phase };

export function createSensorState(config: GeneratorConfig): SensorState {
  return {
    phase: "NORMAL",
    vibration: config.base.vibration,
    temperature: config.base.temperature,
    acoustic: config.base.acoustic,
    hold_tick_count: 0,
    normal_tick_count: 0,
  };
}

export function nextPhase(p: Phase): Phase {
  const i = PHASE_CYCLE.indexOf(p);
  return PHASE_CYCLE[(i + 1) % PHASE_CYCLE.length] ?? "NORMAL";
}

export function isAnomalous(p: Phase): boolean {
  return p !== "NORMAL";
}
