// apps/edge/src/server.ts
//
// Edge alert receiver: MQTT subscriber on the sensor topic plus an HTTP
// ingest route, both feeding one EdgeMonitor.

import path from "node:path";
import { fileURLToPath } from "node:url";

import Fastify from "fastify";

import { LoggerOpsLogSink, loadEnv, resolveRepoRoot } from "@pdm/runtime";

import { buildDeviceId, loadEdgeConfig } from "./config";
import { HttpTriggerForwarder } from "./forwarder";
import { EdgeMonitor } from "./monitor";
import { registerEdgeRoutes } from "./routes";
import { subscribeReadings } from "./subscriber";

const app = Fastify({ logger: true });

async function main(): Promise<void> {
  const appDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
  const repoRoot = resolveRepoRoot("edge");
  loadEnv(repoRoot, appDir);

  const { config: cfg, config_hash, source } = loadEdgeConfig({ repoRoot });
  const deviceId = buildDeviceId(cfg);
  app.log.info({ config_hash, source, device_id: deviceId, trigger_endpoint: cfg.agent_trigger_endpoint }, "edge config loaded");

  const monitor = new EdgeMonitor({
    deviceId,
    thresholds: cfg.thresholds,
    forwarder: new HttpTriggerForwarder(cfg.agent_trigger_endpoint, cfg.trigger_timeout_ms),
    ops: new LoggerOpsLogSink(deviceId, app.log),
    log: app.log,
  });
  registerEdgeRoutes(app, monitor);

  const subscription = subscribeReadings(
    { host: cfg.mqtt.host, port: cfg.mqtt.port, clientId: cfg.mqtt.client_id, topic: cfg.mqtt.sensor_topic },
    monitor,
    app.log,
  );
  app.addHook("onClose", async () => {
    await subscription.close();
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "edge shutting down");
      app
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          app.log.error({ err }, "shutdown failed");
          process.exit(1);
        });
    });
  }

  await app.listen({ port: cfg.http.port, host: cfg.http.host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
