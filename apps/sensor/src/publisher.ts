// apps/sensor/src/publisher.ts
//
// Reading publishers. Publishing is fire-and-forget from the generator's point
// of view: outcomes are counted and logged, never fed back into SensorState.

import { connect } from "mqtt";
import type { IClientOptions } from "mqtt";

import type { SensorReadingV1 } from "@pdm/contracts";
import type { Log } from "@pdm/runtime";

export type PublishOutcome = "PUBLISHED" | "SKIPPED";

export interface ReadingPublisher {
  readonly name: string;
  publish(reading: SensorReadingV1): Promise<PublishOutcome>;
  close(): Promise<void>;
}

/** The part of mqtt's MqttClient the publisher needs. */
export interface MqttPublishClient {
  readonly connected: boolean;
  publishAsync(topic: string, message: string, opts: { qos: 0 | 1 | 2 }): Promise<unknown>;
  endAsync(): Promise<void>;
}

export type MqttConnectTarget = {
  host: string;
  port: number;
  clientId: string;
  username?: string;
};

/**
 * Opens an MQTT client that keeps reconnecting in the background.
 * Connection state changes are logged; the caller never awaits the connect.
 */
export function connectMqtt(name: string, target: MqttConnectTarget, log: Log): MqttPublishClient {
  const opts: IClientOptions = {
    clientId: target.clientId,
    keepalive: 60,
    reconnectPeriod: 5000,
    connectTimeout: 10_000,
  };
  if (target.username) opts.username = target.username;

  log.info({ client: name, host: target.host, port: target.port }, "mqtt connecting");
  const client = connect(`mqtt://${target.host}:${target.port}`, opts);

  client.on("connect", () => log.info({ client: name }, "mqtt connected"));
  client.on("reconnect", () => log.debug({ client: name }, "mqtt reconnecting"));
  client.on("close", () => log.warn({ client: name }, "mqtt connection closed; reconnecting in background"));
  client.on("error", (err: Error) => log.error({ client: name, err }, "mqtt client error"));
  return client;
}

export class MqttReadingPublisher implements ReadingPublisher {
  constructor(
    public readonly name: string,
    private readonly client: MqttPublishClient,
    private readonly topic: string,
    private readonly encode: (reading: SensorReadingV1) => unknown,
    private readonly log: Log,
  ) {}

  async publish(reading: SensorReadingV1): Promise<PublishOutcome> {
    if (!this.client.connected) {
      this.log.warn({ publisher: this.name, topic: this.topic }, "broker not connected; skipping publish");
      return "SKIPPED";
    }
    const payload = JSON.stringify(this.encode(reading));
    await this.client.publishAsync(this.topic, payload, { qos: 1 });
    this.log.debug({ publisher: this.name, topic: this.topic, payload }, "published");
    return "PUBLISHED";
  }

  async close(): Promise<void> {
    await this.client.endAsync();
  }
}
