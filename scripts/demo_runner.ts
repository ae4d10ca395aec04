#!/usr/bin/env node
/**
 * Local demo runner.
 *
 * Contract:
 * - Starts agent, sensor and edge as child processes (node --import tsx <entry>),
 *   pausing after the agent (HTTP server start) and after the sensor (broker connect).
 * - Stops when any child exits or on SIGINT/SIGTERM.
 * - Teardown runs in reverse start order: SIGTERM, then SIGKILL after 5 s.
 *
 * Usage:
 *   npm run demo
 */

import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { createLogger } from "@pdm/runtime";

type Component = { name: string; entry: string; settleMs: number };

type Running = { name: string; child: ChildProcess; exited: Promise<void> };

const COMPONENTS: Component[] = [
  { name: "agent", entry: "apps/agent/src/server.ts", settleMs: 5_000 },
  { name: "sensor", entry: "apps/sensor/src/main.ts", settleMs: 2_000 },
  { name: "edge", entry: "apps/edge/src/server.ts", settleMs: 0 },
];

const KILL_AFTER_MS = 5_000;

const log = createLogger("demo-runner");
const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRunning(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

function start(c: Component): Running {
  const child = spawn(process.execPath, ["--import", "tsx", c.entry], { cwd: repoRoot, stdio: "inherit", env: process.env });
  const exited = new Promise<void>((resolve) => {
    child.once("exit", (code, signal) => {
      log.info({ component: c.name, pid: child.pid, code, signal }, "component exited");
      resolve();
    });
    child.once("error", (err) => {
      log.error({ component: c.name, err }, "component failed to start");
      resolve();
    });
  });
  log.info({ component: c.name, pid: child.pid, entry: c.entry }, "component started");
  return { name: c.name, child, exited };
}

async function stop(r: Running): Promise<void> {
  if (!isRunning(r.child)) return;
  log.info({ component: r.name, pid: r.child.pid }, "terminating");
  r.child.kill("SIGTERM");
  await Promise.race([r.exited, sleep(KILL_AFTER_MS)]);
  if (isRunning(r.child)) {
    log.warn({ component: r.name, pid: r.child.pid }, "did not terminate gracefully; killing");
    r.child.kill("SIGKILL");
    await r.exited;
  }
}

async function main(): Promise<void> {
  log.info({ repo_root: repoRoot }, "demo runner starting");

  let interrupt: () => void = () => undefined;
  const interrupted = new Promise<void>((resolve) => {
    interrupt = resolve;
  });
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      log.info({ signal }, "shutdown requested");
      interrupt();
    });
  }

  const running: Running[] = [];
  let stopReason: "interrupted" | "child_exited" | null = null;
  const anyExit = () => Promise.race(running.map((r) => r.exited));

  for (const [i, c] of COMPONENTS.entries()) {
    log.info({ step: `${i + 1}/${COMPONENTS.length}`, component: c.name }, "starting component");
    running.push(start(c));
    if (c.settleMs > 0) {
      stopReason = await Promise.race([
        sleep(c.settleMs).then(() => null),
        interrupted.then(() => "interrupted" as const),
        anyExit().then(() => "child_exited" as const),
      ]);
      if (stopReason) break;
    }
  }

  if (!stopReason) {
    log.info("all components running; press Ctrl+C to stop");
    stopReason = await Promise.race([interrupted.then(() => "interrupted" as const), anyExit().then(() => "child_exited" as const)]);
  }

  log.info({ reason: stopReason }, "cleaning up");
  for (const r of [...running].reverse()) await stop(r);
  log.info("demo runner finished");
}

main().catch((err) => {
  log.error(err);
  process.exit(1);
});
