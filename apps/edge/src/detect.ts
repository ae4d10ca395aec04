import type { EdgeDetectionV1, SensorReadingV1 } from "@pdm/contracts";

import type { EdgeThresholds } from "./config";

/**
 * Static gross-anomaly checks. Strict `>`: a value equal to its threshold is healthy.
 * Order is fixed (temperature, amplitude, frequency); the first entry drives the ops alert.
 */
export function detectGrossAnomalies(reading: SensorReadingV1, t: EdgeThresholds): EdgeDetectionV1[] {
  const out: EdgeDetectionV1[] = [];

  if (reading.temperature_c > t.temperature_critical_c) {
    out.push({
      type: "CriticalTemperature",
      metric: "temperature_c",
      value: reading.temperature_c,
      threshold: t.temperature_critical_c,
      message: `Temperature ${reading.temperature_c}°C exceeds threshold ${t.temperature_critical_c}°C.`,
    });
  }

  if (reading.vibration_g > t.vibration_amplitude_gross_g) {
    out.push({
      type: "HighAmplitudeVibration",
      metric: "vibration_g",
      value: reading.vibration_g,
      threshold: t.vibration_amplitude_gross_g,
      message: `Vibration amplitude ${reading.vibration_g}g exceeds threshold ${t.vibration_amplitude_gross_g}g.`,
    });
  }

  if (reading.dominant_frequency_hz > t.vibration_anomaly_freq_hz) {
    out.push({
      type: "AnomalousVibrationFrequency",
      metric: "dominant_frequency_hz",
      value: reading.dominant_frequency_hz,
      threshold: t.vibration_anomaly_freq_hz,
      message: `Dominant vibration frequency ${reading.dominant_frequency_hz}Hz exceeds threshold ${t.vibration_anomaly_freq_hz}Hz.`,
    });
  }

  return out;
}
