// Explicit randomness source for the generator.
//
// gauss() always consumes draws, even when std == 0, so the draw sequence
// of a seeded run does not depend on which noise terms are configured.

export interface Rng {
  /** Uniform in [0, 1). */
  uniform(): number;
  /** Normal sample; std 0 returns `mean`. */
  gauss(mean: number, std: number): number;
}

function boxMuller(uniform: () => number): () => number {
  return () => {
    const u1 = 1 - uniform(); // (0, 1], log() stays finite
    const u2 = uniform();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  };
}

function fromUniform(uniform: () => number): Rng {
  const normal = boxMuller(uniform);
  return {
    uniform,
    gauss(mean: number, std: number): number {
      const z = normal();
      return mean + std * z;
    },
  };
}

/** Mulberry32; same seed, same sequence. */
export function createSeededRng(seed: number): Rng {
  let a = seed >>> 0;
  const uniform = (): number => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  return fromUniform(uniform);
}

export function createMathRng(): Rng {
  return fromUniform(Math.random);
}
