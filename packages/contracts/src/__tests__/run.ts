// Minimal test runner for @pdm/contracts.
//
// Plain script executed with tsx; the first failed assertion throws.

import assert from "node:assert";

import {
  AnomalyTriggerV1Z,
  DiagnosisV1Z,
  LlmDiagnosisResponseZ,
  OpsEventV1Z,
  SensorReadingV1Z,
  parseSensorReadingV1,
} from "../index";

const reading = {
  asset_id: "DemoCorp_Turbine007",
  timestamp: "2024-03-01T10:00:00.250Z",
  vibration_g: 2.5123,
  temperature_c: 57.0412,
  acoustic_db: 52.5,
  dominant_frequency_hz: 121,
  signature_frequency_hz: 121.38,
  status: "ANOMALY",
  anomaly_active: true,
};

// --- Reading: happy path ---
assert.deepEqual(parseSensorReadingV1(reading), reading);

// --- Reading: status must agree with anomaly_active ---
const disagree = SensorReadingV1Z.safeParse({ ...reading, anomaly_active: false });
assert.equal(disagree.success, false);
if (!disagree.success) assert.deepEqual(disagree.error.issues[0]?.path, ["anomaly_active"]);

// --- Reading: timestamp must carry milliseconds and the Z suffix ---
assert.equal(SensorReadingV1Z.safeParse({ ...reading, timestamp: "2024-03-01T10:00:00Z" }).success, false);
assert.equal(SensorReadingV1Z.safeParse({ ...reading, timestamp: "2024-03-01T10:00:00.250+01:00" }).success, false);

// --- Reading: unknown keys rejected ---
assert.equal(SensorReadingV1Z.safeParse({ ...reading, rpm: 3600 }).success, false);

// --- Trigger: at least one detection ---
const trigger = {
  source_component: "Edge_Sim_DemoCorp_Node001",
  asset_id: reading.asset_id,
  trigger_timestamp: "2024-03-01T10:00:00.300Z",
  edge_detected_anomalies: [
    { type: "CriticalTemperature", metric: "temperature_c", value: 57.0412, threshold: 55, message: "Temperature 57.0412°C exceeds threshold 55°C." },
  ],
  full_sensor_data_at_trigger: reading,
};
assert.equal(AnomalyTriggerV1Z.safeParse(trigger).success, true);
assert.equal(AnomalyTriggerV1Z.safeParse({ ...trigger, edge_detected_anomalies: [] }).success, false);

// --- LLM response: wrongly typed text fields degrade to undefined ---
const llm = LlmDiagnosisResponseZ.parse({ diagnosis_summary: 42, reasoning: "ok", confidence_percentage: "high", extra: 1 });
assert.equal(llm.diagnosis_summary, undefined);
assert.equal(llm.reasoning, "ok");
assert.equal(llm.confidence_percentage, "high");

// --- Diagnosis: fraction confidence, known priority, no extra keys ---
const diagnosis = {
  summary: "Probable gear tooth pitting.",
  confidence: 0.825,
  reasoning: "121Hz signature.",
  recommended_actions: ["Inspect gearbox."],
  required_parts: [],
  priority: "HIGH",
  llm_ok: true,
};
assert.deepEqual(DiagnosisV1Z.parse(diagnosis), diagnosis);
assert.equal(DiagnosisV1Z.safeParse({ ...diagnosis, priority: "URGENT" }).success, false);
assert.equal(DiagnosisV1Z.safeParse({ ...diagnosis, confidence: -0.1 }).success, false);
assert.equal(DiagnosisV1Z.safeParse({ ...diagnosis, required_parts: "P/N G-5432" }).success, false);
assert.equal(DiagnosisV1Z.safeParse({ ...diagnosis, model: "llama3:8b" }).success, false);

// --- Ops event ---
const opsEvent = {
  source_id: "Edge_Sim_DemoCorp_Node001_DemoCorp_Turbine007",
  timestamp: "2024-03-01T10:00:00.300Z",
  log_level: "CRITICAL",
  asset_id: reading.asset_id,
  message: "Temperature 57.0412°C exceeds threshold 55°C.",
  details: { value: 57.0412 },
};
assert.deepEqual(OpsEventV1Z.parse(opsEvent), opsEvent);
assert.equal(OpsEventV1Z.safeParse({ ...opsEvent, log_level: "DEBUG" }).success, false);
assert.equal(OpsEventV1Z.safeParse({ ...opsEvent, timestamp: "2024-03-01T10:00:00Z" }).success, false);
assert.equal(OpsEventV1Z.safeParse({ ...opsEvent, source_id: "" }).success, false);

console.log("contracts tests ok");
