import type { SensorReadingV1 } from "@pdm/contracts";

import { hasKbMatches } from "./knowledge_base";

export type PromptContext = {
  equipmentModel: string;
  temperatureIncreaseC: number;
};

const BASE_TERMS = ["failure", "maintenance", "vibration", "temperature", "acoustic"] as const;

/** Keyword terms for one trigger; duplicates dropped, first occurrence kept. */
export function buildSearchTerms(equipmentModel: string, assetId: string, signatureFrequencyHz: number | null): string[] {
  const terms: string[] = [...BASE_TERMS, equipmentModel, assetId];
  if (signatureFrequencyHz) terms.push(`${Math.trunc(signatureFrequencyHz)}hz`);
  return [...new Set(terms)];
}

export function temperatureIncrease(reading: SensorReadingV1, baselineC: number): number {
  return Math.max(0, Math.round((reading.temperature_c - baselineC) * 1e4) / 1e4);
}

export function summarizeReading(assetId: string, r: SensorReadingV1, temperatureIncreaseC: number): string[] {
  const lines = [
    `Asset ID: ${assetId}`,
    `Timestamp of data: ${r.timestamp}`,
    `Temperature: ${r.temperature_c}°C (Increase from baseline: ${temperatureIncreaseC}°C)`,
    `Overall Vibration: ${r.vibration_g}g @ ${r.dominant_frequency_hz}Hz`,
  ];
  if (r.signature_frequency_hz !== null) {
    lines.push(`Specific Vibration Anomaly: ${r.vibration_g}g at ${r.signature_frequency_hz}Hz`);
  }
  lines.push(`Acoustic Critical Band: ${r.acoustic_db}dB`);
  return lines;
}

export function constructDiagnosisPrompt(assetId: string, reading: SensorReadingV1, snippets: string[], ctx: PromptContext): string {
  const kb = ["Relevant information from knowledge base (if any):"];
  if (hasKbMatches(snippets)) snippets.forEach((s, i) => kb.push(`KB${i + 1}: ${s}`));
  else kb.push("No specific highly relevant articles were found in the knowledge base for these readings.");

  return [
    `You are an expert predictive maintenance diagnostician for industrial wind turbines, model ${ctx.equipmentModel}.`,
    "Analyze the live sensor data and the knowledge base context below and diagnose the most probable fault.",
    "",
    "Current Live Sensor Data:",
    ...summarizeReading(assetId, reading, ctx.temperatureIncreaseC),
    "",
    ...kb,
    "",
    "Respond with a single valid JSON object and nothing else. It must have exactly these keys:",
    '- "diagnosis_summary": (string) concise summary of the most probable fault, or a statement that further investigation is needed.',
    '- "confidence_percentage": (number) confidence in the diagnosis as a percentage, e.g. 85.5. Use a low value when uncertain.',
    '- "reasoning": (string) short explanation referencing the sensor values and knowledge base lines used.',
    '- "recommended_actions": (array of strings) 1 to 3 actionable steps for maintenance personnel.',
    '- "required_parts": (array of strings) part numbers or names likely needed; [] when unknown, ["N/A"] when not applicable.',
    "",
    "Example:",
    JSON.stringify(
      {
        diagnosis_summary: "Probable early-stage gear tooth pitting.",
        confidence_percentage: 75.0,
        reasoning: "A 121Hz vibration signature with a 5.5°C temperature rise matches KB1.",
        recommended_actions: ["Inspect the gearbox within 72 hours.", "Take an oil sample for particle analysis."],
        required_parts: ["P/N G-5432"],
      },
      null,
      2,
    ),
    "",
    "Now output ONLY the JSON object for the data above:",
  ].join("\n");
}
