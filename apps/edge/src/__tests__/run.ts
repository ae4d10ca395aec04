// Minimal test runner for @pdm/edge.
//
// Plain script executed with tsx; forwarding is faked and routes are exercised with app.inject.

import assert from "node:assert";

import Fastify from "fastify";

import { AnomalyTriggerV1Z } from "@pdm/contracts";
import type { AnomalyTriggerV1, SensorReadingV1 } from "@pdm/contracts";
import { RecordingOpsLogSink, loadAreaConfig, silentLogger } from "@pdm/runtime";

import { EdgeAreaConfigZ, applyEdgeEnv, buildDeviceId } from "../config";
import type { EdgeThresholds } from "../config";
import { detectGrossAnomalies } from "../detect";
import { HttpTriggerForwarder } from "../forwarder";
import type { TriggerForwarder } from "../forwarder";
import { EdgeMonitor } from "../monitor";
import { registerEdgeRoutes } from "../routes";
import { decodeReadingMessage, handleReadingMessage } from "../subscriber";

const log = silentLogger();
const thresholds: EdgeThresholds = { temperature_critical_c: 55, vibration_amplitude_gross_g: 1.5, vibration_anomaly_freq_hz: 120 };
const FIXED_NOW = Date.UTC(2026, 2, 3, 9, 0, 0, 0);

const normal: SensorReadingV1 = {
  asset_id: "DemoCorp_Turbine007",
  timestamp: "2026-03-03T08:59:58.000Z",
  vibration_g: 0.31,
  temperature_c: 42.4,
  acoustic_db: 27.9,
  dominant_frequency_hz: 60.1234,
  signature_frequency_hz: null,
  status: "NORMAL",
  anomaly_active: false,
};
const breach: SensorReadingV1 = {
  ...normal,
  timestamp: "2026-03-03T09:00:00.000Z",
  vibration_g: 2.6,
  temperature_c: 57.2,
  acoustic_db: 52.1,
  dominant_frequency_hz: 121,
  signature_frequency_hz: 121.38,
  status: "ANOMALY",
  anomaly_active: true,
};

// --- config ---
const { config: cfg } = loadAreaConfig("edge", EdgeAreaConfigZ);
assert.equal(buildDeviceId(cfg), "Edge_Sim_DemoCorp_Node001");
assert.equal(cfg.trigger_timeout_ms, 10000);
const env = applyEdgeEnv(cfg, { AGENT_TRIGGER_ENDPOINT: "http://agent.test:5000/api/v1/analyze_trigger", PORT: "9090" });
assert.equal(env.agent_trigger_endpoint, "http://agent.test:5000/api/v1/analyze_trigger");
assert.equal(env.http.port, 9090);
assert.equal(env.http.host, cfg.http.host);

// --- detection ---
assert.deepEqual(detectGrossAnomalies(normal, thresholds), []);
assert.deepEqual(
  detectGrossAnomalies(breach, thresholds).map((d) => d.type),
  ["CriticalTemperature", "HighAmplitudeVibration", "AnomalousVibrationFrequency"],
);
assert.deepEqual(detectGrossAnomalies(breach, thresholds)[0], {
  type: "CriticalTemperature",
  metric: "temperature_c",
  value: 57.2,
  threshold: 55,
  message: "Temperature 57.2°C exceeds threshold 55°C.",
});
// equal to the threshold is not a breach
assert.deepEqual(
  detectGrossAnomalies({ ...normal, temperature_c: 55, vibration_g: 1.5, dominant_frequency_hz: 120 }, thresholds),
  [],
);
assert.deepEqual(
  detectGrossAnomalies({ ...normal, dominant_frequency_hz: 120.0001 }, thresholds).map((d) => d.type),
  ["AnomalousVibrationFrequency"],
);

// --- monitor hysteresis ---
class FakeForwarder implements TriggerForwarder {
  readonly sent: AnomalyTriggerV1[] = [];
  failNext = false;

  async forward(trigger: AnomalyTriggerV1): Promise<unknown> {
    this.sent.push(trigger);
    if (this.failNext) {
      this.failNext = false;
      throw new Error("connect ECONNREFUSED");
    }
    return { ok: true };
  }
}

function newMonitor() {
  const forwarder = new FakeForwarder();
  const ops = new RecordingOpsLogSink("Edge_Sim_DemoCorp_Node001", () => FIXED_NOW);
  const monitor = new EdgeMonitor({ deviceId: "Edge_Sim_DemoCorp_Node001", thresholds, forwarder, ops, log, clock: () => FIXED_NOW });
  return { forwarder, ops, monitor };
}

{
  const { forwarder, ops, monitor } = newMonitor();
  const seq = [normal, breach, breach, breach, normal, normal, breach];
  const transitions: string[] = [];
  for (const r of seq) transitions.push((await monitor.process(r)).transition);
  assert.deepEqual(transitions, ["UNCHANGED", "RAISED", "UNCHANGED", "UNCHANGED", "CLEARED", "UNCHANGED", "RAISED"]);

  // one trigger per breach entry
  assert.equal(forwarder.sent.length, 2);
  const trigger = forwarder.sent[0];
  assert.ok(AnomalyTriggerV1Z.safeParse(trigger).success);
  assert.equal(trigger?.source_component, "Edge_Sim_DemoCorp_Node001");
  assert.equal(trigger?.asset_id, "DemoCorp_Turbine007");
  assert.equal(trigger?.trigger_timestamp, "2026-03-03T09:00:00.000Z");
  assert.equal(trigger?.edge_detected_anomalies.length, 3);
  assert.deepEqual(trigger?.full_sensor_data_at_trigger, breach);

  // normal INFO, CRITICAL on raise, nothing while active, INFO on clear, normal INFO, CRITICAL
  assert.deepEqual(ops.levels(), ["INFO", "CRITICAL", "INFO", "INFO", "CRITICAL"]);
  assert.equal(ops.events[1]?.message, "Edge Detection: CriticalTemperature on DemoCorp_Turbine007");
  assert.equal(ops.events[1]?.source_id, "Edge_Sim_DemoCorp_Node001_DemoCorp_Turbine007");
  assert.equal(ops.events[2]?.message, "Edge Event: Anomaly Condition Cleared on DemoCorp_Turbine007");
  assert.deepEqual(monitor.activeAlerts(), ["DemoCorp_Turbine007"]);
}

// alert state is per asset
{
  const { forwarder, monitor } = newMonitor();
  await monitor.process(breach);
  const other = await monitor.process({ ...breach, asset_id: "DemoCorp_Turbine008" });
  assert.equal(other.transition, "RAISED");
  assert.equal(forwarder.sent.length, 2);
  assert.deepEqual(monitor.activeAlerts(), ["DemoCorp_Turbine007", "DemoCorp_Turbine008"]);
}

// a failed forward is logged; the alert stays active and is not re-sent
{
  const { forwarder, monitor } = newMonitor();
  forwarder.failNext = true;
  const raised = await monitor.process(breach);
  assert.equal(raised.transition, "RAISED");
  assert.equal(raised.trigger_forwarded, false);
  assert.equal(monitor.isAlertActive("DemoCorp_Turbine007"), true);
  assert.equal((await monitor.process(breach)).transition, "UNCHANGED");
  assert.equal(forwarder.sent.length, 1);
}

// --- HTTP forwarder ---
{
  const calls: string[] = [];
  const fwd = new HttpTriggerForwarder("http://agent.test/api/v1/analyze_trigger", 500, async (url, init) => {
    calls.push(`${init?.method ?? "GET"} ${url}`);
    return new Response(JSON.stringify({ status: "success" }), { status: 200 });
  });
  const { monitor } = newMonitor();
  const trigger: AnomalyTriggerV1 = {
    source_component: monitor.deviceId,
    asset_id: breach.asset_id,
    trigger_timestamp: "2026-03-03T09:00:00.000Z",
    edge_detected_anomalies: detectGrossAnomalies(breach, thresholds),
    full_sensor_data_at_trigger: breach,
  };
  assert.deepEqual(await fwd.forward(trigger), { status: "success" });
  assert.deepEqual(calls, ["POST http://agent.test/api/v1/analyze_trigger"]);

  const failing = new HttpTriggerForwarder("http://agent.test/x", 500, async () => new Response("down", { status: 502 }));
  await assert.rejects(() => failing.forward(trigger), /http 502/);
}

// --- MQTT message decoding ---
assert.equal(decodeReadingMessage("{not json").ok, false);
const invalid = decodeReadingMessage(JSON.stringify({ ...normal, vibration_g: "high" }));
assert.equal(invalid.ok, false);
if (!invalid.ok) assert.equal(invalid.error, "INVALID_READING");
const decoded = decodeReadingMessage(Buffer.from(JSON.stringify(breach), "utf8"));
assert.ok(decoded.ok);
{
  const { monitor } = newMonitor();
  assert.equal(await handleReadingMessage(monitor, log, "pdm/test", "garbage"), null);
  assert.equal((await handleReadingMessage(monitor, log, "pdm/test", JSON.stringify(breach)))?.transition, "RAISED");
}

// --- routes ---
{
  const { monitor, forwarder } = newMonitor();
  const app = Fastify({ logger: false });
  registerEdgeRoutes(app, monitor);

  const bad = await app.inject({ method: "POST", url: "/api/edge/readings", payload: { ...breach, status: "BROKEN" } });
  assert.equal(bad.statusCode, 400);
  assert.equal(bad.json().error, "INVALID_READING");

  const res = await app.inject({ method: "POST", url: "/api/edge/readings", payload: breach });
  assert.equal(res.statusCode, 200);
  const body = res.json();
  assert.equal(body.ok, true);
  assert.equal(body.transition, "RAISED");
  assert.equal(body.detections.length, 3);
  assert.equal(forwarder.sent.length, 1);

  const state = await app.inject({ method: "GET", url: "/api/edge/state" });
  assert.deepEqual(state.json(), { ok: true, device_id: "Edge_Sim_DemoCorp_Node001", active_alerts: ["DemoCorp_Turbine007"] });
  await app.close();
}

console.log("edge tests ok");
