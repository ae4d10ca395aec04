/**
 * File: apps/edge/src/monitor.ts
 *
 * Edge alert state per asset (hysteresis).
 *
 * Transitions:
 * - detections && !active  -> active;   RAISED    (one CRITICAL ops event + one trigger)
 * - !detections && active  -> inactive; CLEARED   (INFO ops event)
 * - otherwise              -> unchanged; UNCHANGED (INFO "normal operation" event while healthy)
 *
 * The alert flag flips before forwarding, so a failed forward still
 * suppresses repeats until the asset clears.
 */

import type { AnomalyTriggerV1, EdgeDetectionV1, SensorReadingV1 } from "@pdm/contracts";
import type { Log, OpsLogSink } from "@pdm/runtime";
import { describeHttpError, nowMs } from "@pdm/runtime";

import type { EdgeThresholds } from "./config";
import { detectGrossAnomalies } from "./detect";
import type { TriggerForwarder } from "./forwarder";

export type AlertTransition = "RAISED" | "CLEARED" | "UNCHANGED";

export type ProcessResult = {
  transition: AlertTransition;
  detections: EdgeDetectionV1[];
  trigger_forwarded: boolean;
};

export type EdgeMonitorDeps = {
  deviceId: string;
  thresholds: EdgeThresholds;
  forwarder: TriggerForwarder;
  ops: OpsLogSink;
  log: Log;
  clock?: () => number;
};

export class EdgeMonitor {
  private readonly active = new Set<string>();
  private readonly clock: () => number;

  constructor(private readonly deps: EdgeMonitorDeps) {
    this.clock = deps.clock ?? nowMs;
  }

  get deviceId(): string {
    return this.deps.deviceId;
  }

  activeAlerts(): string[] {
    return [...this.active].sort();
  }

  isAlertActive(assetId: string): boolean {
    return this.active.has(assetId);
  }

  async process(reading: SensorReadingV1): Promise<ProcessResult> {
    const { deviceId, thresholds, log } = this.deps;
    const assetId = reading.asset_id;
    const detections = detectGrossAnomalies(reading, thresholds);
    const wasActive = this.active.has(assetId);

    if (detections.length && !wasActive) {
      this.active.add(assetId);
      log.warn({ device_id: deviceId, asset_id: assetId, detections }, "new gross anomaly detected; alert ACTIVE");

      const first = detections[0];
      if (first) {
        await this.sendOps(assetId, "CRITICAL", `Edge Detection: ${first.type} on ${assetId}`, {
          triggering_anomaly: first,
          escalation: `Edge logic: ${first.message} Escalating to diagnosis agent.`,
        });
      }

      const trigger: AnomalyTriggerV1 = {
        source_component: deviceId,
        asset_id: assetId,
        trigger_timestamp: new Date(this.clock()).toISOString(),
        edge_detected_anomalies: detections,
        full_sensor_data_at_trigger: reading,
      };
      const trigger_forwarded = await this.forward(trigger);
      return { transition: "RAISED", detections, trigger_forwarded };
    }

    if (!detections.length && wasActive) {
      this.active.delete(assetId);
      log.info({ device_id: deviceId, asset_id: assetId }, "anomaly condition cleared; alert INACTIVE");
      await this.sendOps(assetId, "INFO", `Edge Event: Anomaly Condition Cleared on ${assetId}`, {
        status: "Normal",
        message: "Returning to normal operations.",
      });
      return { transition: "CLEARED", detections, trigger_forwarded: false };
    }

    log.info({ device_id: deviceId, asset_id: assetId, state: wasActive ? "Anomalous" : "Normal" }, "reading processed");
    if (!wasActive) {
      await this.sendOps(assetId, "INFO", `Edge Event: Normal operation for ${assetId}`, { reading });
    }
    return { transition: "UNCHANGED", detections, trigger_forwarded: false };
  }

  private async forward(trigger: AnomalyTriggerV1): Promise<boolean> {
    const { deviceId, forwarder, log } = this.deps;
    try {
      await forwarder.forward(trigger);
      log.info({ device_id: deviceId, asset_id: trigger.asset_id }, "anomaly trigger forwarded to agent");
      return true;
    } catch (err) {
      log.error({ device_id: deviceId, asset_id: trigger.asset_id, err, reason: describeHttpError(err) }, "anomaly trigger forward failed");
      return false;
    }
  }

  private async sendOps(assetId: string, level: "INFO" | "CRITICAL", message: string, details: Record<string, unknown>): Promise<void> {
    try {
      await this.deps.ops.send(assetId, level, message, details);
    } catch (err) {
      this.deps.log.warn({ err, asset_id: assetId }, "ops event not delivered");
    }
  }
}
