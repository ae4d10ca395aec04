// apps/agent/src/server.ts
//
// Diagnosis agent: receives edge anomaly triggers over HTTP and answers
// each with a KB-grounded LLM diagnosis (and a work order when warranted).

import path from "node:path";
import { fileURLToPath } from "node:url";

import Fastify from "fastify";

import { LoggerOpsLogSink, loadEnv, resolveRepoRoot } from "@pdm/runtime";

import { AgentRuntime } from "./agent_runtime";
import { buildAgentId, loadAgentConfig, resolveTicketCredentials } from "./config";
import { KnowledgeBase } from "./knowledge_base";
import { OllamaClient } from "./llm";
import type { DiagnosisLlm } from "./llm";
import { registerAgentRoutes } from "./routes";
import { ServiceNowTicketSink } from "./ticketing";
import type { TicketSink } from "./ticketing";

const app = Fastify({ logger: true });

async function main(): Promise<void> {
  const appDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
  const repoRoot = resolveRepoRoot("agent");
  loadEnv(repoRoot, appDir);

  const { config: cfg, config_hash, source } = loadAgentConfig({ repoRoot });
  const agentId = buildAgentId(cfg);
  app.log.info({ config_hash, source, agent_id: agentId }, "agent config loaded");

  const kb = KnowledgeBase.fromDirectory(path.resolve(repoRoot, cfg.knowledge_base_path), app.log);

  let llm: DiagnosisLlm | null = null;
  const ollama = cfg.llm.ollama;
  if (cfg.llm.provider === "ollama" && ollama) {
    llm = new OllamaClient({
      baseUrl: ollama.api_base_url,
      model: ollama.model_name,
      timeoutMs: ollama.request_timeout_seconds * 1000,
    });
    if (!(await llm.ping())) {
      app.log.warn({ api_base_url: ollama.api_base_url }, "LLM server not reachable yet; diagnoses fall back to defaults until it is");
    }
  } else {
    app.log.warn("no LLM configured; analyze_trigger will answer 503");
  }

  let tickets: TicketSink | null = null;
  const creds = resolveTicketCredentials(cfg.ticketing);
  if (creds) tickets = new ServiceNowTicketSink(cfg.ticketing, creds);
  else if (cfg.ticketing.enabled) {
    app.log.warn(
      { user_var: cfg.ticketing.env_var_api_user, password_var: cfg.ticketing.env_var_api_password },
      "ticketing enabled but instance or credentials missing; work orders disabled",
    );
  }

  const agent = new AgentRuntime({
    agentId,
    equipmentModel: cfg.equipment_model,
    baselineTemperatureC: cfg.baseline_temperature_c,
    confidenceThreshold: cfg.diagnosis.confidence_threshold_for_action,
    kb,
    llm,
    tickets,
    ops: new LoggerOpsLogSink(agentId, app.log),
    log: app.log,
  });
  registerAgentRoutes(app, agent);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "agent shutting down");
      app
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          app.log.error({ err }, "shutdown failed");
          process.exit(1);
        });
    });
  }

  await app.listen({ port: cfg.listen_port, host: cfg.listen_host });
  app.log.info({ model: llm?.modelName ?? null }, "agent listening");
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
