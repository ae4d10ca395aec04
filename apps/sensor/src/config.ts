// apps/sensor/src/config.ts
//
// Sensor area config (config/sensor/<profile>.json).
//
// Contract:
// - File values are validated once; unknown keys are rejected.
// - Env overrides apply after validation and are re-validated with the same schema.
// - generator{} carries every kernel input except asset_id, which is derived
//   from asset_id_prefix + default_asset_number.

import { z } from "zod";

import type { LoadConfigOptions, LoadedConfig } from "@pdm/runtime";
import { envInt, envString, formatTemplate, loadAreaConfig, zeroPad } from "@pdm/runtime";
import { GeneratorParamsZ } from "@pdm/telemetry-kernel";
import type { GeneratorParams } from "@pdm/telemetry-kernel";

const PLACEHOLDER_TOKENS = new Set(["", "YOUR_DASHBOARD_DEVICE_TOKEN", "PASTE_YOUR_REAL_DEVICE_TOKEN_HERE"]);

export const MqttTargetZ = z
  .object({
    host: z.string().min(1),
    port: z.number().int().positive(),
  })
  .strict();

export const SensorAreaConfigZ = z
  .object({
    company_name_short: z.string().min(1).default("DefaultCo"),
    asset_id_prefix: z.string().min(1).default("{company_name_short}_Turbine"),
    default_asset_number: z.number().int().nonnegative().default(7),
    data_interval_seconds: z.number().positive().default(10),
    seed: z.number().int().nullable().default(null),
    generator: GeneratorParamsZ.omit({ asset_id: true }),
    mqtt: MqttTargetZ.extend({
      sensor_topic: z.string().min(1),
      client_id_prefix: z.string().min(1).default("Internal"),
    }).strict(),
    dashboard: MqttTargetZ.extend({
      enabled: z.boolean().default(true),
      device_token: z.string().default(""),
      topic: z.string().min(1).default("v1/devices/me/telemetry"),
    }).strict(),
  })
  .strict();

export type SensorAreaConfig = z.output<typeof SensorAreaConfigZ>;

export function buildAssetId(cfg: Pick<SensorAreaConfig, "asset_id_prefix" | "company_name_short" | "default_asset_number">): string {
  const prefix = formatTemplate(cfg.asset_id_prefix, { company_name_short: cfg.company_name_short });
  return `${prefix}${zeroPad(cfg.default_asset_number, 3)}`;
}

export function toGeneratorParams(cfg: SensorAreaConfig): GeneratorParams {
  return { ...cfg.generator, asset_id: buildAssetId(cfg) };
}

export function isUsableDeviceToken(token: string): boolean {
  return !PLACEHOLDER_TOKENS.has(token.trim());
}

export function applySensorEnv(cfg: SensorAreaConfig, env: NodeJS.ProcessEnv = process.env): SensorAreaConfig {
  return SensorAreaConfigZ.parse({
    ...cfg,
    seed: envInt("SIM_SEED", env) ?? cfg.seed,
    mqtt: {
      ...cfg.mqtt,
      host: envString("MQTT_HOST", env) ?? cfg.mqtt.host,
      port: envInt("MQTT_PORT", env) ?? cfg.mqtt.port,
    },
    dashboard: {
      ...cfg.dashboard,
      host: envString("DASHBOARD_MQTT_HOST", env) ?? cfg.dashboard.host,
      port: envInt("DASHBOARD_MQTT_PORT", env) ?? cfg.dashboard.port,
      device_token: envString("DASHBOARD_DEVICE_TOKEN", env) ?? cfg.dashboard.device_token,
    },
  });
}

export function loadSensorConfig(opts: LoadConfigOptions = {}): LoadedConfig<SensorAreaConfig> {
  const loaded = loadAreaConfig("sensor", SensorAreaConfigZ, opts);
  return { ...loaded, config: applySensorEnv(loaded.config) };
}
