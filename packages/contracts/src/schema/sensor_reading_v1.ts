import { z } from "zod";

/**
 * SensorReadingV1Schema
 *
 * One reading per generator tick. Produced by the telemetry kernel,
 * published by the sensor process and consumed by the edge.
 *
 * NOTE: channel values are rounded to 4 dp by the producer; the schema
 * only enforces finiteness.
 */
export const SensorStatusZ = z.enum(["NORMAL", "ANOMALY"]);

export const SensorReadingV1Z = z
  .object({
    asset_id: z.string().min(1),
    timestamp: z.string().datetime({ precision: 3 }), // ISO-8601 UTC, ms precision, "Z" suffix
    vibration_g: z.number().finite(),
    temperature_c: z.number().finite(),
    acoustic_db: z.number().finite(),
    dominant_frequency_hz: z.number().finite(),
    signature_frequency_hz: z.number().finite().nullable(),
    status: SensorStatusZ,
    anomaly_active: z.boolean(),
  })
  .strict()
  .superRefine((v, ctx) => {
    if ((v.status === "ANOMALY") !== v.anomaly_active) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `status ${v.status} disagrees with anomaly_active=${String(v.anomaly_active)}`,
        path: ["anomaly_active"],
      });
    }
  });

export type SensorStatus = z.infer<typeof SensorStatusZ>;
export type SensorReadingV1 = z.infer<typeof SensorReadingV1Z>;

export function parseSensorReadingV1(input: unknown): SensorReadingV1 {
  return SensorReadingV1Z.parse(input);
}
