import { z } from "zod";

import { SensorReadingV1Z } from "./sensor_reading_v1";

export const EdgeDetectionTypeZ = z.enum([
  "CriticalTemperature",
  "HighAmplitudeVibration",
  "AnomalousVibrationFrequency",
]);

export const EdgeDetectionV1Z = z
  .object({
    type: EdgeDetectionTypeZ,
    metric: z.enum(["temperature_c", "vibration_g", "dominant_frequency_hz"]),
    value: z.number().finite(),
    threshold: z.number().finite(),
    message: z.string().min(1),
  })
  .strict();

/**
 * AnomalyTriggerV1
 *
 * Sent once by the edge when an asset enters breach. The agent treats
 * `full_sensor_data_at_trigger` as the evidence for its diagnosis.
 */
export const AnomalyTriggerV1Z = z
  .object({
    source_component: z.string().min(1),
    asset_id: z.string().min(1),
    trigger_timestamp: z.string().datetime({ precision: 3 }),
    edge_detected_anomalies: z.array(EdgeDetectionV1Z).min(1),
    full_sensor_data_at_trigger: SensorReadingV1Z,
  })
  .strict();

export type EdgeDetectionType = z.infer<typeof EdgeDetectionTypeZ>;
export type EdgeDetectionV1 = z.infer<typeof EdgeDetectionV1Z>;
export type AnomalyTriggerV1 = z.infer<typeof AnomalyTriggerV1Z>;
