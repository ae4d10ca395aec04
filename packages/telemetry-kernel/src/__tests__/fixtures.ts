import type { GeneratorParams, Rng } from "../index";

export const FIXED_NOW_MS = Date.UTC(2026, 0, 15, 8, 30, 0, 125);

// base: vib 0.5, temp 40, acou 30; target: vib 3.0, temp 50, acou 60
// ramp_step: vib 0.5, temp 2, acou 6
export const zeroNoiseParams: GeneratorParams = {
  asset_id: "TestCo_Turbine001",
  vibration_normal_range: [0.25, 0.75],
  acoustic_normal_range: [20, 40],
  base_temperature_c: 40,
  temperature_flex_c: 2,
  anomaly_vibration_factor: 4,
  temperature_critical_increase_c: 10,
  acoustic_anomaly_factor: 1.5,
  ramp_duration_ticks: 5,
  hold_duration_ticks: 4,
  initial_normal_ticks: 3,
  anomaly_start_probability: 1,
  normal_noise_std: { vibration: 0, temperature: 0, acoustic: 0 },
  anomaly_jitter_factor: 3,
  shared_noise_std: 0,
  shared_influence_scale: { vibration: 1, temperature: 1, acoustic: 1 },
};

export const noisyParams: GeneratorParams = {
  ...zeroNoiseParams,
  ramp_duration_ticks: 1,
  hold_duration_ticks: 3,
  initial_normal_ticks: 2,
  anomaly_start_probability: 0.3,
  normal_noise_std: { vibration: 0.01, temperature: 0.1, acoustic: 0.5 },
  anomaly_jitter_factor: 2,
  shared_noise_std: 0.05,
  shared_influence_scale: { vibration: 0.1, temperature: 0.5, acoustic: 0.3 },
};

/**
 * Rng that replays queued standard-normal values and uniforms.
 * Throws when a queue runs dry so an unexpected draw fails the test.
 */
export function scriptedRng(zs: number[], uniforms: number[]): Rng {
  const zq = [...zs];
  const uq = [...uniforms];
  return {
    uniform(): number {
      const u = uq.shift();
      if (u === undefined) throw new Error("scriptedRng: uniform queue empty");
      return u;
    },
    gauss(mean: number, std: number): number {
      const z = zq.shift();
      if (z === undefined) throw new Error("scriptedRng: gauss queue empty");
      return mean + std * z;
    },
  };
}
