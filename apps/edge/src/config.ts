import { z } from "zod";

import type { LoadConfigOptions, LoadedConfig } from "@pdm/runtime";
import { envInt, envString, formatTemplate, loadAreaConfig } from "@pdm/runtime";

export const EdgeThresholdsZ = z
  .object({
    temperature_critical_c: z.number().finite(),
    vibration_amplitude_gross_g: z.number().finite(),
    vibration_anomaly_freq_hz: z.number().finite(),
  })
  .strict();

export type EdgeThresholds = z.infer<typeof EdgeThresholdsZ>;

export const EdgeAreaConfigZ = z
  .object({
    company_name_short: z.string().min(1).default("DefaultCo"),
    device_id_template: z.string().min(1).default("Edge_Sim_{company_name_short}_Node{id:03d}"),
    default_device_id_num: z.number().int().nonnegative().default(1),
    agent_trigger_endpoint: z.string().url(),
    trigger_timeout_ms: z.number().int().positive().default(10_000),
    thresholds: EdgeThresholdsZ,
    mqtt: z
      .object({
        host: z.string().min(1),
        port: z.number().int().positive(),
        sensor_topic: z.string().min(1),
        client_id: z.string().min(1).default("edge-simulator-01"),
      })
      .strict(),
    http: z
      .object({
        host: z.string().min(1).default("0.0.0.0"),
        port: z.number().int().nonnegative().default(8081),
      })
      .strict(),
  })
  .strict();

export type EdgeAreaConfig = z.output<typeof EdgeAreaConfigZ>;

export function buildDeviceId(cfg: Pick<EdgeAreaConfig, "device_id_template" | "company_name_short" | "default_device_id_num">): string {
  return formatTemplate(cfg.device_id_template, { company_name_short: cfg.company_name_short, id: cfg.default_device_id_num });
}

export function applyEdgeEnv(cfg: EdgeAreaConfig, env: NodeJS.ProcessEnv = process.env): EdgeAreaConfig {
  return EdgeAreaConfigZ.parse({
    ...cfg,
    agent_trigger_endpoint: envString("AGENT_TRIGGER_ENDPOINT", env) ?? cfg.agent_trigger_endpoint,
    mqtt: {
      ...cfg.mqtt,
      host: envString("MQTT_HOST", env) ?? cfg.mqtt.host,
      port: envInt("MQTT_PORT", env) ?? cfg.mqtt.port,
    },
    http: {
      host: envString("HOST", env) ?? cfg.http.host,
      port: envInt("PORT", env) ?? cfg.http.port,
    },
  });
}

export function loadEdgeConfig(opts: LoadConfigOptions = {}): LoadedConfig<EdgeAreaConfig> {
  const loaded = loadAreaConfig("edge", EdgeAreaConfigZ, opts);
  return { ...loaded, config: applyEdgeEnv(loaded.config) };
}
