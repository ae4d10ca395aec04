// apps/agent/src/config.ts
//
// Agent area config (config/agent/<profile>.json).
//
// Contract:
// - Unknown keys are rejected; defaults live in the schema.
// - Ticketing credentials never live in the file: the file names the env
//   variables that hold them.

import { z } from "zod";

import type { LoadConfigOptions, LoadedConfig } from "@pdm/runtime";
import { envInt, envString, formatTemplate, loadAreaConfig } from "@pdm/runtime";

const PLACEHOLDER_INSTANCES = new Set(["", "YOUR_INSTANCE.service-now.com"]);

export const OllamaConfigZ = z
  .object({
    model_name: z.string().min(1),
    api_base_url: z.string().url(),
    request_timeout_seconds: z.number().positive().default(180),
  })
  .strict();

export const TicketingConfigZ = z
  .object({
    enabled: z.boolean().default(false),
    instance_hostname: z.string().default(""),
    target_table: z.string().min(1).default("incident"),
    default_assignment_group: z.string().min(1).default("DefaultGroup"),
    env_var_api_user: z.string().min(1).default("SERVICENOW_API_USER"),
    env_var_api_password: z.string().min(1).default("SERVICENOW_API_PASSWORD"),
    source_system_name: z.string().min(1).default("Predictive Maintenance Diagnosis Agent"),
    custom_fields: z
      .object({
        source_system: z.string().min(1).default("u_source_system"),
        ai_confidence: z.string().min(1).default("u_ai_diagnosis_confidence"),
        ai_reasoning: z.string().min(1).default("u_ai_reasoning"),
        ai_recommended_actions: z.string().min(1).default("u_ai_recommended_actions"),
        required_parts: z.string().min(1).default("u_ai_required_parts"),
      })
      .strict()
      .default({}),
  })
  .strict();

export type TicketingConfig = z.output<typeof TicketingConfigZ>;

export const AgentAreaConfigZ = z
  .object({
    company_name_short: z.string().min(1).default("DefaultCo"),
    agent_id_template: z.string().min(1).default("Diagnosis_Agent_{company_name_short}"),
    listen_host: z.string().min(1).default("0.0.0.0"),
    listen_port: z.number().int().nonnegative().default(5000),
    knowledge_base_path: z.string().min(1).default("knowledge_base"),
    equipment_model: z.string().min(1).default("GRX-II"),
    baseline_temperature_c: z.number().finite(),
    llm: z
      .object({
        provider: z.enum(["ollama", "none"]).default("ollama"),
        ollama: OllamaConfigZ.optional(),
      })
      .strict(),
    ticketing: TicketingConfigZ.default({}),
    diagnosis: z
      .object({
        confidence_threshold_for_action: z.number().min(0).max(1).default(0.7),
      })
      .strict()
      .default({}),
  })
  .strict();

export type AgentAreaConfig = z.output<typeof AgentAreaConfigZ>;

export type TicketCredentials = { user: string; password: string };

export function buildAgentId(cfg: Pick<AgentAreaConfig, "agent_id_template" | "company_name_short">): string {
  return formatTemplate(cfg.agent_id_template, { company_name_short: cfg.company_name_short });
}

/**
 * Credentials for the ticketing API, or null when ticketing cannot be used
 * (disabled, placeholder instance, or either env variable unset).
 */
export function resolveTicketCredentials(t: TicketingConfig, env: NodeJS.ProcessEnv = process.env): TicketCredentials | null {
  if (!t.enabled || PLACEHOLDER_INSTANCES.has(t.instance_hostname)) return null;
  const user = envString(t.env_var_api_user, env);
  const password = envString(t.env_var_api_password, env);
  if (user === undefined || password === undefined) return null;
  return { user, password };
}

export function applyAgentEnv(cfg: AgentAreaConfig, env: NodeJS.ProcessEnv = process.env): AgentAreaConfig {
  const ollamaBase = envString("OLLAMA_BASE_URL", env);
  return AgentAreaConfigZ.parse({
    ...cfg,
    listen_host: envString("HOST", env) ?? cfg.listen_host,
    listen_port: envInt("PORT", env) ?? cfg.listen_port,
    llm: {
      ...cfg.llm,
      ollama: cfg.llm.ollama && ollamaBase ? { ...cfg.llm.ollama, api_base_url: ollamaBase } : cfg.llm.ollama,
    },
  });
}

export function loadAgentConfig(opts: LoadConfigOptions = {}): LoadedConfig<AgentAreaConfig> {
  const loaded = loadAreaConfig("agent", AgentAreaConfigZ, opts);
  return { ...loaded, config: applyAgentEnv(loaded.config) };
}
