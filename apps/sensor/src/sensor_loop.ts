import type { SensorReadingV1 } from "@pdm/contracts";
import type { Log } from "@pdm/runtime";
import type { GeneratorConfig, Rng, SensorState, StepResult } from "@pdm/telemetry-kernel";
import { createSensorState, step } from "@pdm/telemetry-kernel";

import type { ReadingPublisher } from "./publisher";

export type SensorLoopOptions = {
  config: GeneratorConfig;
  rng: Rng;
  publishers: ReadingPublisher[];
  log: Log;
  intervalMs: number;
  clock?: () => number;
};

/**
 * Drives one SensorState on a fixed period.
 *
 * The first step runs immediately on start(). Publishers run side by side:
 * a failure is logged per publisher, and a publisher whose previous publish
 * has not settled is skipped for the tick, so a stalled broker never delays
 * the others or accumulates pending publishes.
 */
export class SensorLoop {
  public readonly state: SensorState;
  private timer: NodeJS.Timeout | null = null;
  private ticks = 0;
  private published = 0;
  private stalled = 0;
  private readonly inFlight = new Set<ReadingPublisher>();

  constructor(private readonly opts: SensorLoopOptions) {
    this.state = createSensorState(opts.config);
  }

  get tickCount(): number {
    return this.ticks;
  }

  get publishCount(): number {
    return this.published;
  }

  /** Publishes skipped because the same publisher was still busy. */
  get busySkipCount(): number {
    return this.stalled;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  async step(): Promise<StepResult> {
    const { config, rng, log } = this.opts;
    const clock = this.opts.clock ?? Date.now;
    const r = step(this.state, config, rng, clock());
    this.ticks += 1;

    if (r.guaranteed_normal_ended) {
      log.info({ ticks: config.initial_normal_ticks }, "initial normal period complete; anomaly start chance now active");
    }
    if (r.transition) {
      const ctx = { asset_id: config.asset_id, from: r.transition.from, to: r.transition.to, reading: r.reading };
      if (r.transition.from === "NORMAL") log.warn(ctx, "anomaly cycle starting");
      else log.info(ctx, "phase transition");
    }
    log.info(
      { temperature_c: r.reading.temperature_c, vibration_g: r.reading.vibration_g, status: r.reading.status },
      "generated reading",
    );

    await Promise.all(this.opts.publishers.map((p) => this.publishTo(p, r.reading)));
    return r;
  }

  start(): void {
    if (this.timer) return;
    this.opts.log.info({ asset_id: this.opts.config.asset_id, interval_ms: this.opts.intervalMs }, "sensor loop started");
    this.timer = setInterval(() => this.runStep(), this.opts.intervalMs);
    this.runStep();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.opts.log.info({ ticks: this.ticks, published: this.published }, "sensor loop stopped");
  }

  private async publishTo(p: ReadingPublisher, reading: SensorReadingV1): Promise<void> {
    const { log } = this.opts;
    if (this.inFlight.has(p)) {
      this.stalled += 1;
      log.warn({ publisher: p.name }, "previous publish still pending; skipping reading");
      return;
    }
    this.inFlight.add(p);
    try {
      if ((await p.publish(reading)) === "PUBLISHED") this.published += 1;
    } catch (err) {
      log.error({ err, publisher: p.name }, "publish failed");
    } finally {
      this.inFlight.delete(p);
    }
  }

  private runStep(): void {
    this.step().catch((err: unknown) => this.opts.log.error({ err }, "sensor step failed"));
  }
}
