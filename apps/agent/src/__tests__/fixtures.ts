import path from "node:path";
import { fileURLToPath } from "node:url";

import type { AnomalyTriggerV1, SensorReadingV1 } from "@pdm/contracts";

import type { DiagnosisLlm, LlmResult } from "../llm";
import type { TicketSink, WorkOrderRequest, WorkOrderResult } from "../ticketing";

export const FIXTURE_KB_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures", "kb");

export const FIXED_NOW = Date.UTC(2026, 2, 3, 9, 0, 5, 0);

export const breachReading: SensorReadingV1 = {
  asset_id: "DemoCorp_Turbine007",
  timestamp: "2026-03-03T09:00:00.000Z",
  vibration_g: 2.6,
  temperature_c: 57.2,
  acoustic_db: 52.1,
  dominant_frequency_hz: 121,
  signature_frequency_hz: 121.38,
  status: "ANOMALY",
  anomaly_active: true,
};

export const trigger: AnomalyTriggerV1 = {
  source_component: "Edge_Sim_DemoCorp_Node001",
  asset_id: "DemoCorp_Turbine007",
  trigger_timestamp: "2026-03-03T09:00:00.000Z",
  edge_detected_anomalies: [
    {
      type: "CriticalTemperature",
      metric: "temperature_c",
      value: 57.2,
      threshold: 55,
      message: "Temperature 57.2°C exceeds threshold 55°C.",
    },
  ],
  full_sensor_data_at_trigger: breachReading,
};

export class FakeLlm implements DiagnosisLlm {
  readonly modelName = "fake-llm";
  readonly prompts: string[] = [];
  throwOnGenerate = false;
  reachable = true;

  constructor(public result: LlmResult) {}

  async generate(prompt: string): Promise<LlmResult> {
    this.prompts.push(prompt);
    if (this.throwOnGenerate) throw new Error("model crashed");
    return this.result;
  }

  async ping(): Promise<boolean> {
    return this.reachable;
  }
}

export class FakeTickets implements TicketSink {
  readonly requests: WorkOrderRequest[] = [];
  fail = false;

  async createWorkOrder(req: WorkOrderRequest): Promise<WorkOrderResult> {
    this.requests.push(req);
    if (this.fail) throw new Error("connect ECONNREFUSED");
    return { work_order_id: "INC0010001", raw: {} };
  }
}

export function llmAnswer(summary: string, confidencePct: number): LlmResult {
  return {
    ok: true,
    data: {
      diagnosis_summary: summary,
      confidence_percentage: confidencePct,
      reasoning: "121Hz signature with a 15.2°C rise matches KB1.",
      recommended_actions: ["Inspect gearbox."],
      required_parts: ["P/N G-5432"],
    },
  };
}
