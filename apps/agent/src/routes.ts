import type { FastifyInstance } from "fastify";

import { AnomalyTriggerV1Z } from "@pdm/contracts";

import { AgentNotReady } from "./agent_runtime";
import type { AgentRuntime } from "./agent_runtime";

export function registerAgentRoutes(app: FastifyInstance, agent: AgentRuntime): void {
  app.post("/api/v1/analyze_trigger", async (req, reply) => {
    const parsed = AnomalyTriggerV1Z.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        ok: false,
        status: "error",
        error: "INVALID_TRIGGER",
        message: "Invalid JSON payload from edge",
        issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
    }

    const trigger = parsed.data;
    try {
      const out = await agent.analyze(trigger);
      return reply.send({
        ok: true,
        status: "success",
        message: `LLM analysis processed for ${out.asset_id}.`,
        asset_id: out.asset_id,
        priority: out.diagnosis.priority,
        confidence: out.diagnosis.confidence,
        ticket: out.ticket.status,
        work_order_id: out.ticket.status === "CREATED" ? out.ticket.work_order_id : null,
      });
    } catch (err) {
      if (err instanceof AgentNotReady) {
        req.log.error({ asset_id: trigger.asset_id }, err.message);
        return reply.code(503).send({ ok: false, status: "error", error: "SERVICES_NOT_READY", message: err.message });
      }
      req.log.error({ err, asset_id: trigger.asset_id }, "analyze_trigger failed");
      await agent.reportFailure(trigger.asset_id, err);
      return reply.code(500).send({
        ok: false,
        status: "error",
        error: "INTERNAL",
        message: "Internal server error during AI analysis",
      });
    }
  });

  app.get("/api/v1/health", async (_req, reply) => {
    return reply.send({
      ok: true,
      agent_id: agent.agentId,
      llm_ready: await agent.llmReady(),
      kb_files: agent.kbFileCount,
      ticketing_enabled: agent.ticketingEnabled,
    });
  });
}
