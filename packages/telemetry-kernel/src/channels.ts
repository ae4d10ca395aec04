// Channel vocabulary shared by config, state and generator.

export type Channel = "vibration" | "temperature" | "acoustic";

export const CHANNELS: ReadonlyArray<Channel> = ["vibration", "temperature", "acoustic"];

export type ChannelTriple = Readonly<Record<Channel, number>>;

export type Range = readonly [lo: number, hi: number];

export function clamp(x: number, lo: number, hi: number): number {
  if (x < lo) return lo;
  if (x > hi) return hi;
  return x;
}

/** Rounds half away from zero at `dp` decimal places (emission only). */
export function roundTo(x: number, dp: number): number {
  const f = 10 ** dp;
  return (Math.sign(x) * Math.round(Math.abs(x) * f)) / f;
}
