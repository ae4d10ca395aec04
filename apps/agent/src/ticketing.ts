// apps/agent/src/ticketing.ts
//
// Work orders in the ticketing system's Table API.
//
// Contract:
// - POST https://<instance>/api/now/table/<table>, basic auth.
// - Priority HIGH/MEDIUM/LOW maps to "1"/"2"/"3"; impact and urgency follow it.
// - Returns the record number, else its sys_id, else "N/A".

import { z } from "zod";

import type { DiagnosisPriority, DiagnosisV1 } from "@pdm/contracts";
import type { FetchLike } from "@pdm/runtime";
import { basicAuthHeader, postJson } from "@pdm/runtime";

import type { TicketCredentials, TicketingConfig } from "./config";
import { formatConfidence } from "./diagnosis";
import { hasKbMatches } from "./knowledge_base";

export type WorkOrderRequest = {
  asset_id: string;
  diagnosis: DiagnosisV1;
  model_name: string;
  snippets: string[];
};

export type WorkOrderResult = { work_order_id: string; raw: unknown };

export interface TicketSink {
  createWorkOrder(req: WorkOrderRequest): Promise<WorkOrderResult>;
}

const PRIORITY_CODE: Record<DiagnosisPriority, string> = { HIGH: "1", MEDIUM: "2", LOW: "3" };

const TableApiResponseZ = z
  .object({
    result: z
      .object({
        number: z.string().optional(),
        sys_id: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export function buildWorkOrderDescription(req: WorkOrderRequest): string {
  const d = req.diagnosis;
  const lines = [
    `AI Diagnosis (${req.model_name}):`,
    d.summary,
    "",
    `Confidence: ${formatConfidence(d.confidence)}`,
    `AI Reasoning: ${d.reasoning}`,
    "",
    "Recommended Actions:",
    ...d.recommended_actions.map((a) => `- ${a}`),
    "",
    `Potentially Required Parts: ${(d.required_parts.length ? d.required_parts : ["N/A"]).join(", ")}`,
    "",
    "Key KB Snippets Considered (up to 3):",
  ];
  if (hasKbMatches(req.snippets)) lines.push(...req.snippets.slice(0, 3).map((s) => `- ${s}`));
  else lines.push("- No specific KB articles retrieved or applicable.");
  return lines.join("\n");
}

export function buildWorkOrderPayload(cfg: TicketingConfig, callerId: string, req: WorkOrderRequest): Record<string, unknown> {
  const d = req.diagnosis;
  const code = PRIORITY_CODE[d.priority];
  const f = cfg.custom_fields;
  return {
    short_description: `AI DETECTED (${d.priority}): ${d.summary.slice(0, 80)} - ${req.asset_id}`,
    description: buildWorkOrderDescription(req),
    priority: code,
    impact: code,
    urgency: code,
    assignment_group: { display_value: cfg.default_assignment_group },
    cmdb_ci: { display_value: req.asset_id },
    caller_id: callerId,
    contact_type: "Integration",
    [f.source_system]: cfg.source_system_name,
    [f.ai_confidence]: formatConfidence(d.confidence),
    [f.ai_reasoning]: d.reasoning,
    [f.ai_recommended_actions]: d.recommended_actions.join("\n"),
    [f.required_parts]: d.required_parts.join(", "),
  };
}

export class ServiceNowTicketSink implements TicketSink {
  constructor(
    private readonly cfg: TicketingConfig,
    private readonly creds: TicketCredentials,
    private readonly opts: { timeoutMs?: number; fetchImpl?: FetchLike } = {},
  ) {}

  get endpoint(): string {
    return `https://${this.cfg.instance_hostname}/api/now/table/${this.cfg.target_table}`;
  }

  async createWorkOrder(req: WorkOrderRequest): Promise<WorkOrderResult> {
    const raw = await postJson(this.endpoint, buildWorkOrderPayload(this.cfg, this.creds.user, req), {
      timeoutMs: this.opts.timeoutMs,
      fetchImpl: this.opts.fetchImpl,
      headers: { Authorization: basicAuthHeader(this.creds.user, this.creds.password) },
    });
    const parsed = TableApiResponseZ.safeParse(raw);
    const rec = parsed.success ? parsed.data.result : undefined;
    return { work_order_id: rec?.number ?? rec?.sys_id ?? "N/A", raw };
  }
}
