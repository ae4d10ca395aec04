// apps/sensor/src/main.ts
//
// Simulated turbine sensor: one SensorState, ticked every data_interval_seconds,
// each Reading published to the internal broker and (optionally) the dashboard device.

import path from "node:path";
import { fileURLToPath } from "node:url";

import { createLogger, loadEnv, resolveRepoRoot } from "@pdm/runtime";
import { configure, createMathRng, createSeededRng } from "@pdm/telemetry-kernel";

import { isUsableDeviceToken, loadSensorConfig, toGeneratorParams } from "./config";
import { toDashboardTelemetry } from "./dashboard";
import type { ReadingPublisher } from "./publisher";
import { MqttReadingPublisher, connectMqtt } from "./publisher";
import { SensorLoop } from "./sensor_loop";

const log = createLogger("sensor");

async function main(): Promise<void> {
  const appDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
  const repoRoot = resolveRepoRoot("sensor");
  loadEnv(repoRoot, appDir);

  const { config: cfg, config_hash, source } = loadSensorConfig({ repoRoot });
  log.info({ config_hash, source }, "config loaded");

  const generator = configure(toGeneratorParams(cfg));
  const rng = cfg.seed === null ? createMathRng() : createSeededRng(cfg.seed);
  log.info({ asset_id: generator.asset_id, seed: cfg.seed, base: generator.base, target: generator.target }, "generator configured");

  const unixSeconds = Math.floor(Date.now() / 1000);
  const publishers: ReadingPublisher[] = [
    new MqttReadingPublisher(
      "internal",
      connectMqtt("internal", { host: cfg.mqtt.host, port: cfg.mqtt.port, clientId: `${cfg.mqtt.client_id_prefix}-${unixSeconds}` }, log),
      cfg.mqtt.sensor_topic,
      (reading) => reading,
      log,
    ),
  ];

  if (cfg.dashboard.enabled) {
    const token = cfg.dashboard.device_token;
    if (!isUsableDeviceToken(token)) log.warn("dashboard device token is a placeholder; connecting without credentials");
    const baseTemperatureC = generator.base.temperature;
    publishers.push(
      new MqttReadingPublisher(
        "dashboard",
        connectMqtt(
          "dashboard",
          { host: cfg.dashboard.host, port: cfg.dashboard.port, clientId: "", username: isUsableDeviceToken(token) ? token : undefined },
          log,
        ),
        cfg.dashboard.topic,
        (reading) => toDashboardTelemetry(reading, baseTemperatureC),
        log,
      ),
    );
  }

  const loop = new SensorLoop({ config: generator, rng, publishers, log, intervalMs: cfg.data_interval_seconds * 1000 });
  loop.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, "shutting down");
    loop.stop();
    await Promise.all(publishers.map((p) => p.close()));
    log.info("clean shutdown complete");
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error({ err }, "shutdown failed");
          process.exit(1);
        });
    });
  }
}

main().catch((err) => {
  log.error(err);
  process.exit(1);
});
