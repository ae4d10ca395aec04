import { z } from "zod"; // zod: runtime schema for the dashboard device telemetry topic

// Key names follow the dashboard widgets (device telemetry API), not the internal Reading.
export const DashboardTelemetryV1Z = z
  .object({
    temperature_c: z.number().finite(),
    acoustic_critical_band_db: z.number().finite(),
    is_anomaly_induced: z.enum(["true", "false"]), // widgets expect lowercase boolean strings
    temperature_increase_c: z.number().finite().nonnegative(), // rise above the configured base temperature
    vibration_overall_amplitude_g: z.number().finite(),
    vibration_dominant_frequency_hz: z.number().finite(),
    vibration_anomaly_signature_amp_g: z.number().finite(), // 0 when no anomaly
    vibration_anomaly_signature_freq_hz: z.number().finite(), // 0 when no anomaly
  })
  .strict();

export type DashboardTelemetryV1 = z.infer<typeof DashboardTelemetryV1Z>;
