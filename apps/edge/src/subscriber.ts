// MQTT intake: every message on the sensor topic is one JSON Reading.
// Undecodable or invalid messages are logged and dropped.

import { connect } from "mqtt";

import { SensorReadingV1Z } from "@pdm/contracts";
import type { SensorReadingV1 } from "@pdm/contracts";
import type { Log } from "@pdm/runtime";

import type { EdgeMonitor, ProcessResult } from "./monitor";

export type DecodeResult = { ok: true; reading: SensorReadingV1 } | { ok: false; error: "INVALID_JSON" | "INVALID_READING"; detail: string };

export function decodeReadingMessage(payload: Buffer | string): DecodeResult {
  let obj: unknown;
  try {
    obj = JSON.parse(typeof payload === "string" ? payload : payload.toString("utf8"));
  } catch (err) {
    return { ok: false, error: "INVALID_JSON", detail: err instanceof Error ? err.message : String(err) };
  }
  const parsed = SensorReadingV1Z.safeParse(obj);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    return { ok: false, error: "INVALID_READING", detail };
  }
  return { ok: true, reading: parsed.data };
}

export async function handleReadingMessage(
  monitor: EdgeMonitor,
  log: Log,
  topic: string,
  payload: Buffer | string,
): Promise<ProcessResult | null> {
  const decoded = decodeReadingMessage(payload);
  if (!decoded.ok) {
    log.error({ topic, error: decoded.error, detail: decoded.detail }, "dropping sensor message");
    return null;
  }
  return monitor.process(decoded.reading);
}

export type MqttSubscription = { close(): Promise<void> };

export function subscribeReadings(
  target: { host: string; port: number; clientId: string; topic: string },
  monitor: EdgeMonitor,
  log: Log,
): MqttSubscription {
  const client = connect(`mqtt://${target.host}:${target.port}`, {
    clientId: target.clientId,
    keepalive: 60,
    reconnectPeriod: 5000,
  });

  client.on("connect", () => {
    log.info({ topic: target.topic }, "connected to MQTT broker; subscribing");
    client.subscribe(target.topic, { qos: 1 }, (err) => {
      if (err) log.error({ err, topic: target.topic }, "subscribe failed");
    });
  });
  client.on("message", (topic, payload) => {
    log.debug({ topic }, "mqtt message received");
    handleReadingMessage(monitor, log, topic, payload).catch((err: unknown) => {
      log.error({ err, topic }, "error processing sensor message");
    });
  });
  client.on("close", () => log.warn("MQTT connection closed; reconnecting in background"));
  client.on("error", (err: Error) => log.error({ err }, "MQTT client error"));

  return {
    close: () => client.endAsync(),
  };
}
