import type { DashboardTelemetryV1, SensorReadingV1 } from "@pdm/contracts";
import { roundTo } from "@pdm/telemetry-kernel";

/**
 * Projects a Reading onto the dashboard device's telemetry keys.
 * Signature fields read 0 while the asset is healthy so the widgets have a flat baseline.
 */
export function toDashboardTelemetry(reading: SensorReadingV1, baseTemperatureC: number): DashboardTelemetryV1 {
  const anomalous = reading.anomaly_active;
  return {
    temperature_c: reading.temperature_c,
    acoustic_critical_band_db: reading.acoustic_db,
    is_anomaly_induced: anomalous ? "true" : "false",
    temperature_increase_c: Math.max(0, roundTo(reading.temperature_c - baseTemperatureC, 4)),
    vibration_overall_amplitude_g: reading.vibration_g,
    vibration_dominant_frequency_hz: reading.dominant_frequency_hz,
    vibration_anomaly_signature_amp_g: anomalous ? reading.vibration_g : 0,
    vibration_anomaly_signature_freq_hz: anomalous ? (reading.signature_frequency_hz ?? 0) : 0,
  };
}
