import { z } from "zod";

export const OpsLogLevelZ = z.enum(["INFO", "WARN", "ERROR", "CRITICAL", "CRITICAL_ERROR"]);

export const OpsEventV1Z = z
  .object({
    source_id: z.string().min(1), // "<component id>_<asset id>"
    timestamp: z.string().datetime({ precision: 3 }),
    log_level: OpsLogLevelZ,
    asset_id: z.string().min(1),
    message: z.string(),
    details: z.record(z.unknown()),
  })
  .strict();

export type OpsLogLevel = z.infer<typeof OpsLogLevelZ>;
export type OpsEventV1 = z.infer<typeof OpsEventV1Z>;
