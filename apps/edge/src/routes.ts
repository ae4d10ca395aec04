import type { FastifyInstance } from "fastify";

import { SensorReadingV1Z } from "@pdm/contracts";

import type { EdgeMonitor } from "./monitor";

// HTTP intake mirrors the MQTT path: same schema, same monitor.
export function registerEdgeRoutes(app: FastifyInstance, monitor: EdgeMonitor): void {
  app.post("/api/edge/readings", async (req, reply) => {
    const parsed = SensorReadingV1Z.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        ok: false,
        error: "INVALID_READING",
        issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
    }
    const out = await monitor.process(parsed.data);
    return reply.send({ ok: true, ...out });
  });

  app.get("/api/edge/state", async (_req, reply) => {
    return reply.send({ ok: true, device_id: monitor.deviceId, active_alerts: monitor.activeAlerts() });
  });
}
