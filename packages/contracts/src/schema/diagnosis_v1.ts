import { z } from "zod";

/**
 * LlmDiagnosisResponseZ
 *
 * Shape the agent asks the model for. Models drift from the requested
 * shape, so every field is optional here and a wrongly-typed string field
 * degrades to "absent" instead of failing the whole parse. Lists and the
 * confidence are normalized by the agent, not by this schema.
 */
export const LlmDiagnosisResponseZ = z
  .object({
    diagnosis_summary: z.string().optional().catch(undefined),
    confidence_percentage: z.unknown().optional(),
    reasoning: z.string().optional().catch(undefined),
    recommended_actions: z.unknown().optional(),
    required_parts: z.unknown().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

export type LlmDiagnosisResponse = z.infer<typeof LlmDiagnosisResponseZ>;

export const DiagnosisPriorityZ = z.enum(["HIGH", "MEDIUM", "LOW"]);

export const DiagnosisV1Z = z
  .object({
    summary: z.string(),
    confidence: z.number().min(0), // fraction, 0.825 == 82.5%
    reasoning: z.string(),
    recommended_actions: z.array(z.string()),
    required_parts: z.array(z.string()),
    priority: DiagnosisPriorityZ,
    llm_ok: z.boolean(), // false when defaults were used
  })
  .strict();

export type DiagnosisPriority = z.infer<typeof DiagnosisPriorityZ>;
export type DiagnosisV1 = z.infer<typeof DiagnosisV1Z>;
