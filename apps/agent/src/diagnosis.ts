import type { DiagnosisPriority, DiagnosisV1 } from "@pdm/contracts";

import type { LlmResult } from "./llm";

export const DEFAULT_DIAGNOSIS: Readonly<DiagnosisV1> = Object.freeze({
  summary: "LLM processing issue or no clear diagnosis.",
  confidence: 0,
  reasoning: "N/A",
  recommended_actions: ["Manual inspection required."],
  required_parts: ["N/A"],
  priority: "MEDIUM",
  llm_ok: false,
});

const URGENT_WORDS = ["critical", "severe", "urgent", "immediate", "failure"] as const;

export function priorityFor(confidence: number, summary: string): DiagnosisPriority {
  const s = summary.toLowerCase();
  if (confidence > 0.75 || URGENT_WORDS.some((w) => s.includes(w))) return "HIGH";
  if (confidence > 0.5) return "MEDIUM";
  return "LOW";
}

function asStringList(v: unknown, fallback: readonly string[]): string[] {
  if (v === undefined || v === null) return [...fallback];
  if (Array.isArray(v)) return v.map((x) => String(x));
  return [String(v)];
}

/**
 * Turns an LLM answer into a diagnosis. Failed or error-carrying answers keep
 * every default, including MEDIUM priority; a non-numeric confidence counts as 0.
 */
export function interpretDiagnosis(result: LlmResult): DiagnosisV1 {
  if (!result.ok || result.data.error !== undefined) {
    return { ...DEFAULT_DIAGNOSIS, recommended_actions: [...DEFAULT_DIAGNOSIS.recommended_actions], required_parts: [...DEFAULT_DIAGNOSIS.required_parts] };
  }
  const d = result.data;
  const pct = d.confidence_percentage;
  const confidence = typeof pct === "number" && Number.isFinite(pct) ? Math.max(0, pct / 100) : 0;
  const summary = d.diagnosis_summary ?? DEFAULT_DIAGNOSIS.summary;
  return {
    summary,
    confidence,
    reasoning: d.reasoning ?? "No reasoning from LLM.",
    recommended_actions: asStringList(d.recommended_actions, DEFAULT_DIAGNOSIS.recommended_actions),
    required_parts: asStringList(d.required_parts, DEFAULT_DIAGNOSIS.required_parts),
    priority: priorityFor(confidence, summary),
    llm_ok: true,
  };
}

export function formatConfidence(confidence: number): string {
  return `${(confidence * 100).toFixed(1)}%`;
}
