// LLM access for diagnoses.
//
// The agent asks for one JSON object per prompt. Transport errors, timeouts
// and unparseable answers all come back as { ok: false }; generate() does
// not throw.

import { z } from "zod";

import { LlmDiagnosisResponseZ } from "@pdm/contracts";
import type { LlmDiagnosisResponse } from "@pdm/contracts";
import type { FetchLike } from "@pdm/runtime";
import { describeHttpError, getJson, postJson } from "@pdm/runtime";

export type LlmResult = { ok: true; data: LlmDiagnosisResponse } | { ok: false; error: string; raw?: string };

export interface DiagnosisLlm {
  readonly modelName: string;
  generate(prompt: string): Promise<LlmResult>;
  ping(): Promise<boolean>;
}

const GenerateResponseZ = z.object({ response: z.string() }).passthrough();

const PING_TIMEOUT_MS = 5_000;

/**
 * Parses a model answer into the diagnosis shape. Falls back to the outermost
 * {...} span when the model wrapped the object in prose.
 */
export function parseDiagnosisJson(text: string): LlmResult {
  const candidates = [text];
  const lo = text.indexOf("{");
  const hi = text.lastIndexOf("}");
  if (lo >= 0 && hi > lo) candidates.push(text.slice(lo, hi + 1));

  for (const c of candidates) {
    let obj: unknown;
    try {
      obj = JSON.parse(c);
    } catch {
      continue;
    }
    const parsed = LlmDiagnosisResponseZ.safeParse(obj);
    if (parsed.success) return { ok: true, data: parsed.data };
    return { ok: false, error: "LLM response is not a JSON object", raw: text };
  }
  return { ok: false, error: "LLM response is not valid JSON", raw: text };
}

export type OllamaClientOptions = {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

export class OllamaClient implements DiagnosisLlm {
  private readonly baseUrl: string;

  constructor(private readonly opts: OllamaClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
  }

  get modelName(): string {
    return this.opts.model;
  }

  async generate(prompt: string): Promise<LlmResult> {
    let body: unknown;
    try {
      body = await postJson(
        `${this.baseUrl}/api/generate`,
        { model: this.opts.model, prompt, format: "json", stream: false },
        { timeoutMs: this.opts.timeoutMs, fetchImpl: this.opts.fetchImpl },
      );
    } catch (err) {
      return { ok: false, error: `LLM request failed: ${describeHttpError(err)}` };
    }
    const parsed = GenerateResponseZ.safeParse(body);
    if (!parsed.success) return { ok: false, error: "LLM reply has no response text", raw: JSON.stringify(body) };
    return parseDiagnosisJson(parsed.data.response);
  }

  async ping(): Promise<boolean> {
    try {
      await getJson(`${this.baseUrl}/api/tags`, { timeoutMs: PING_TIMEOUT_MS, fetchImpl: this.opts.fetchImpl });
      return true;
    } catch {
      return false;
    }
  }
}
