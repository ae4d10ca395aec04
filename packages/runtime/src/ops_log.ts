// Ops event log.
//
// Pipeline actions (edge alerts, agent steps) are reported as OpsEventV1
// records addressed to an operations platform. The shipped sink writes each
// event as one structured log line; sends never throw into the caller.

import type { OpsEventV1, OpsLogLevel } from "@pdm/contracts";

import type { Log } from "./logger";
import { nowMs } from "./util";

export interface OpsLogSink {
  send(assetId: string, level: OpsLogLevel, message: string, details?: Record<string, unknown>): Promise<void>;
}

export function buildOpsEvent(
  componentId: string,
  assetId: string,
  level: OpsLogLevel,
  message: string,
  details: Record<string, unknown> = {},
  atMs: number = nowMs(),
): OpsEventV1 {
  return {
    source_id: `${componentId}_${assetId}`,
    timestamp: new Date(atMs).toISOString(),
    log_level: level,
    asset_id: assetId,
    message,
    details,
  };
}

export class LoggerOpsLogSink implements OpsLogSink {
  constructor(
    private readonly componentId: string,
    private readonly log: Log,
    private readonly clock: () => number = nowMs,
  ) {}

  async send(assetId: string, level: OpsLogLevel, message: string, details: Record<string, unknown> = {}): Promise<void> {
    const ops_event = buildOpsEvent(this.componentId, assetId, level, message, details, this.clock());
    switch (level) {
      case "INFO":
        this.log.info({ ops_event }, message);
        return;
      case "WARN":
        this.log.warn({ ops_event }, message);
        return;
      case "ERROR":
      case "CRITICAL":
      case "CRITICAL_ERROR":
        this.log.error({ ops_event }, message);
        return;
    }
  }
}

/** Keeps every event in memory (tests). */
export class RecordingOpsLogSink implements OpsLogSink {
  public readonly events: OpsEventV1[] = [];

  constructor(
    private readonly componentId: string,
    private readonly clock: () => number = nowMs,
  ) {}

  async send(assetId: string, level: OpsLogLevel, message: string, details: Record<string, unknown> = {}): Promise<void> {
    this.events.push(buildOpsEvent(this.componentId, assetId, level, message, details, this.clock()));
  }

  levels(): OpsLogLevel[] {
    return this.events.map((e) => e.log_level);
  }
}
