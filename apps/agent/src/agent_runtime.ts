/**
 * File: apps/agent/src/agent_runtime.ts
 *
 * One anomaly trigger in, one diagnosis out:
 *   KB lookup -> prompt -> LLM -> interpretation -> optional work order.
 *
 * Every step is reported as an ops event. LLM and ticketing failures degrade
 * the result (default diagnosis, FAILED ticket) instead of failing the call.
 */

import type { AnomalyTriggerV1, DiagnosisV1 } from "@pdm/contracts";
import type { Log, OpsLogSink } from "@pdm/runtime";
import { describeHttpError } from "@pdm/runtime";

import { formatConfidence, interpretDiagnosis } from "./diagnosis";
import type { KnowledgeBase } from "./knowledge_base";
import type { DiagnosisLlm } from "./llm";
import { buildSearchTerms, constructDiagnosisPrompt, temperatureIncrease } from "./prompt";
import type { TicketSink } from "./ticketing";

export type TicketOutcome =
  | { status: "CREATED"; work_order_id: string }
  | { status: "FAILED"; error: string }
  | { status: "SKIPPED"; reason: "PRIORITY" | "CONFIDENCE" | "TICKETING_DISABLED" };

export type AnalysisResult = {
  asset_id: string;
  diagnosis: DiagnosisV1;
  snippets: string[];
  ticket: TicketOutcome;
};

export type AgentRuntimeDeps = {
  agentId: string;
  equipmentModel: string;
  baselineTemperatureC: number;
  confidenceThreshold: number;
  kb: KnowledgeBase;
  llm: DiagnosisLlm | null;
  tickets: TicketSink | null;
  ops: OpsLogSink;
  log: Log;
};

export class AgentNotReady extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AgentNotReady";
  }
}

export class AgentRuntime {
  constructor(private readonly deps: AgentRuntimeDeps) {}

  get agentId(): string {
    return this.deps.agentId;
  }

  get llmConfigured(): boolean {
    return this.deps.llm !== null;
  }

  get ticketingEnabled(): boolean {
    return this.deps.tickets !== null;
  }

  get kbFileCount(): number {
    return this.deps.kb.fileCount;
  }

  async llmReady(): Promise<boolean> {
    return this.deps.llm ? this.deps.llm.ping() : false;
  }

  async analyze(trigger: AnomalyTriggerV1): Promise<AnalysisResult> {
    const { llm, kb, log } = this.deps;
    if (!llm) throw new AgentNotReady("Diagnosis services not ready or LLM connection failed");

    const assetId = trigger.asset_id;
    const reading = trigger.full_sensor_data_at_trigger;
    log.info({ asset_id: assetId, source_component: trigger.source_component }, "processing anomaly trigger");
    await this.ops(assetId, "INFO", "Received edge alert. Initiating AI analysis.", {
      trigger_summary: trigger.edge_detected_anomalies,
      source_component: trigger.source_component,
    });

    const increase = temperatureIncrease(reading, this.deps.baselineTemperatureC);
    const terms = buildSearchTerms(this.deps.equipmentModel, assetId, reading.signature_frequency_hz);
    const snippets = kb.query(assetId, { signature_frequency_hz: reading.signature_frequency_hz, temperature_increase_c: increase }, terms);
    log.info({ asset_id: assetId, terms, snippet_count: snippets.length }, "knowledge base queried");
    for (const [i, s] of snippets.entries()) {
      await this.ops(assetId, "INFO", `KB Snippet ${i + 1}: '${s.slice(0, 200)}...'`);
    }

    const prompt = constructDiagnosisPrompt(assetId, reading, snippets, {
      equipmentModel: this.deps.equipmentModel,
      temperatureIncreaseC: increase,
    });
    await this.ops(assetId, "INFO", `Querying LLM (${llm.modelName}) for diagnosis...`);
    const result = await llm.generate(prompt);
    const diagnosis = interpretDiagnosis(result);

    if (diagnosis.llm_ok) {
      log.info({ asset_id: assetId, priority: diagnosis.priority, confidence: diagnosis.confidence }, "llm diagnosis received");
      await this.ops(assetId, "INFO", `LLM Reasoning: ${diagnosis.reasoning}`);
    } else {
      const detail = result.ok ? JSON.stringify(result.data) : `${result.error}${result.raw ? `: ${result.raw}` : ""}`;
      log.error({ asset_id: assetId, detail: detail.slice(0, 1000) }, "llm interaction failed or returned malformed data");
      await this.ops(assetId, "ERROR", "LLM interaction failed or returned malformed data.", { llm_error_response: detail.slice(0, 1000) });
    }

    const pct = formatConfidence(diagnosis.confidence);
    await this.ops(
      assetId,
      diagnosis.priority === "HIGH" ? "WARN" : "INFO",
      `LLM Diagnosis. Confidence: ${pct}. Summary: ${diagnosis.summary}`,
      { confidence: pct, summary: diagnosis.summary, priority: diagnosis.priority },
    );
    await this.ops(assetId, "INFO", `LLM Recommended Actions: ${diagnosis.recommended_actions.join("; ")}`, {
      actions: diagnosis.recommended_actions,
      parts: diagnosis.required_parts,
    });

    const ticket = await this.maybeOpenWorkOrder(assetId, diagnosis, llm.modelName, snippets);
    return { asset_id: assetId, diagnosis, snippets, ticket };
  }

  /** Reports an unexpected analyze() failure; never throws. */
  async reportFailure(assetId: string, err: unknown): Promise<void> {
    const name = err instanceof Error ? err.name : "Error";
    await this.ops(assetId, "CRITICAL_ERROR", `Internal agent error in analyze_trigger: ${name}`, {
      error_details: err instanceof Error ? err.message : String(err),
    });
  }

  private async maybeOpenWorkOrder(assetId: string, diagnosis: DiagnosisV1, modelName: string, snippets: string[]): Promise<TicketOutcome> {
    const { tickets, confidenceThreshold, log } = this.deps;
    const skip = (reason: "PRIORITY" | "CONFIDENCE" | "TICKETING_DISABLED"): TicketOutcome => {
      log.info(
        { asset_id: assetId, reason, priority: diagnosis.priority, confidence: diagnosis.confidence, threshold: confidenceThreshold },
        "work order skipped",
      );
      return { status: "SKIPPED", reason };
    };

    if (diagnosis.priority !== "HIGH") return skip("PRIORITY");
    if (diagnosis.confidence < confidenceThreshold) return skip("CONFIDENCE");
    if (!tickets) return skip("TICKETING_DISABLED");

    await this.ops(assetId, "INFO", "Initiating work order (High Priority/Confidence).");
    try {
      const res = await tickets.createWorkOrder({ asset_id: assetId, diagnosis, model_name: modelName, snippets });
      await this.ops(assetId, "INFO", `Work Order ${res.work_order_id} successfully created.`, { work_order_id: res.work_order_id });
      return { status: "CREATED", work_order_id: res.work_order_id };
    } catch (err) {
      const reason = describeHttpError(err);
      log.error({ err, asset_id: assetId }, "work order creation failed");
      await this.ops(assetId, "ERROR", `Failed to create work order. Error: ${reason}`);
      return { status: "FAILED", error: reason };
    }
  }

  private async ops(
    assetId: string,
    level: "INFO" | "WARN" | "ERROR" | "CRITICAL_ERROR",
    message: string,
    details?: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.deps.ops.send(assetId, level, message, details);
    } catch (err) {
      this.deps.log.warn({ err, asset_id: assetId }, "ops event not delivered");
    }
  }
}
