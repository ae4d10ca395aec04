// packages/telemetry-kernel/src/config/generator_config.ts
//
// Generator configuration: raw params -> validated, derived GeneratorConfig.
//
// Contract:
// - configure() runs once at startup; tick() never re-reads raw params.
// - Derived values: base (normal midpoint / base temperature), target
//   (anomaly peak) and ramp_step = (target - base) / ramp_duration_ticks.
// - Every channel's target must be strictly above its base, otherwise the
//   ramp-up could never reach Hold and ramp_step would be <= 0.

import { z } from "zod";

import type { Channel, ChannelTriple, Range } from "../channels";
import { CHANNELS } from "../channels";

const FiniteZ = z.number().finite();
const NonNegZ = FiniteZ.nonnegative();
const RangeZ = z.tuple([FiniteZ, FiniteZ]);

const ChannelTripleZ = <T extends z.ZodTypeAny>(v: T) =>
  z.object({ vibration: v, temperature: v, acoustic: v }).strict();

export const GeneratorParamsZ = z
  .object({
    asset_id: z.string().min(1),

    vibration_normal_range: RangeZ, // g
    acoustic_normal_range: RangeZ, // dB
    base_temperature_c: FiniteZ,
    temperature_flex_c: NonNegZ.default(2.0), // Normal clamp: base_temperature_c +/- flex

    anomaly_vibration_factor: FiniteZ, // x upper vibration bound
    temperature_critical_increase_c: FiniteZ, // + base temperature
    acoustic_anomaly_factor: FiniteZ, // x upper acoustic bound

    ramp_duration_ticks: z.number().int().positive(),
    hold_duration_ticks: z.number().int().positive(),
    initial_normal_ticks: z.number().int().nonnegative(),
    anomaly_start_probability: FiniteZ.min(0).max(1),

    normal_noise_std: ChannelTripleZ(NonNegZ),
    anomaly_jitter_factor: NonNegZ,
    shared_noise_std: NonNegZ,
    shared_influence_scale: ChannelTripleZ(FiniteZ),

    idle_frequency_band_hz: RangeZ.default([55, 65]),
    anomaly_dominant_frequency_hz: FiniteZ.positive().default(121.0),
    anomaly_signature_frequency_hz: FiniteZ.positive().default(121.38),
  })
  .strict();

/** Raw params as written by callers (defaults may be omitted). */
export type GeneratorParams = z.input<typeof GeneratorParamsZ>;

export type GeneratorConfig = Readonly<{
  asset_id: string;

  vibration_normal_range: Range;
  acoustic_normal_range: Range;
  temperature_range: Range; // base +/- flex

  base: ChannelTriple;
  target: ChannelTriple;
  ramp_step: ChannelTriple;

  ramp_duration_ticks: number;
  hold_duration_ticks: number;
  initial_normal_ticks: number;
  anomaly_start_probability: number;

  normal_noise_std: ChannelTriple;
  anomaly_jitter_factor: number;
  shared_noise_std: number;
  shared_influence_scale: ChannelTriple;

  idle_frequency_band_hz: Range;
  anomaly_dominant_frequency_hz: number;
  anomaly_signature_frequency_hz: number;
}>;

export type ConfigValidationError = {
  code: "INVALID_PARAMS" | "UNKNOWN_KEYS" | "RANGE_INVERTED" | "TARGET_NOT_ABOVE_BASE";
  path: string;
  message: string;
};

export class GeneratorConfigRejected extends Error {
  public readonly errors: ConfigValidationError[];

  constructor(errors: ConfigValidationError[]) {
    super(errors.map((e) => `${e.code}:${e.path}`).join(","));
    this.name = "GeneratorConfigRejected";
    this.errors = errors;
  }
}

export type ConfigureResult =
  | { ok: true; config: GeneratorConfig }
  | { ok: false; errors: ConfigValidationError[] };

function zodErrors(err: z.ZodError): ConfigValidationError[] {
  return err.issues.map((issue) => ({
    code: issue.code === z.ZodIssueCode.unrecognized_keys ? "UNKNOWN_KEYS" : "INVALID_PARAMS",
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function checkRange(path: string, r: Range, out: ConfigValidationError[]): void {
  if (r[0] > r[1]) out.push({ code: "RANGE_INVERTED", path, message: `${path} lower bound ${r[0]} exceeds upper bound ${r[1]}` });
}

function midpoint(r: Range): number {
  return (r[0] + r[1]) / 2.0;
}

export function tryConfigure(input: unknown): ConfigureResult {
  const parsed = GeneratorParamsZ.safeParse(input);
  if (!parsed.success) return { ok: false, errors: zodErrors(parsed.error) };
  const p = parsed.data;

  const errors: ConfigValidationError[] = [];
  checkRange("vibration_normal_range", p.vibration_normal_range, errors);
  checkRange("acoustic_normal_range", p.acoustic_normal_range, errors);
  checkRange("idle_frequency_band_hz", p.idle_frequency_band_hz, errors);
  if (errors.length) return { ok: false, errors };

  const base: ChannelTriple = {
    vibration: midpoint(p.vibration_normal_range),
    temperature: p.base_temperature_c,
    acoustic: midpoint(p.acoustic_normal_range),
  };
  const target: ChannelTriple = {
    vibration: p.vibration_normal_range[1] * p.anomaly_vibration_factor,
    temperature: p.base_temperature_c + p.temperature_critical_increase_c,
    acoustic: p.acoustic_normal_range[1] * p.acoustic_anomaly_factor,
  };

  for (const ch of CHANNELS) {
    // RAMP_UP caps at target * 1.1, which only sits above target for positive targets.
    if (!(target[ch] > base[ch]) || !(target[ch] > 0) || !Number.isFinite(target[ch])) {
      errors.push({
        code: "TARGET_NOT_ABOVE_BASE",
        path: ch,
        message: `${ch} anomaly target ${target[ch]} must be positive and above its base ${base[ch]}`,
      });
    }
  }
  if (errors.length) return { ok: false, errors };

  const step = (ch: Channel): number => (target[ch] - base[ch]) / p.ramp_duration_ticks;

  const config: GeneratorConfig = Object.freeze({
    asset_id: p.asset_id,
    vibration_normal_range: p.vibration_normal_range,
    acoustic_normal_range: p.acoustic_normal_range,
    temperature_range: [p.base_temperature_c - p.temperature_flex_c, p.base_temperature_c + p.temperature_flex_c] as const,
    base,
    target,
    ramp_step: { vibration: step("vibration"), temperature: step("temperature"), acoustic: step("acoustic") },
    ramp_duration_ticks: p.ramp_duration_ticks,
    hold_duration_ticks: p.hold_duration_ticks,
    initial_normal_ticks: p.initial_normal_ticks,
    anomaly_start_probability: p.anomaly_start_probability,
    normal_noise_std: p.normal_noise_std,
    anomaly_jitter_factor: p.anomaly_jitter_factor,
    shared_noise_std: p.shared_noise_std,
    shared_influence_scale: p.shared_influence_scale,
    idle_frequency_band_hz: p.idle_frequency_band_hz,
    anomaly_dominant_frequency_hz: p.anomaly_dominant_frequency_hz,
    anomaly_signature_frequency_hz: p.anomaly_signature_frequency_hz,
  });
  return { ok: true, config };
}

/**
 * Validates raw generator params and derives the fixed quantities.
 * Throws GeneratorConfigRejected listing every problem found.
 */
export function configure(input: unknown): GeneratorConfig {
  const r = tryConfigure(input);
  if (!r.ok) throw new GeneratorConfigRejected(r.errors);
  return r.config;
}
