// Seeded pseudo-random numbers (mulberry32) for reproducible stimuli

export type Random = () => number;

/** Uniform numbers in [0, 1), fully determined by `seed`. */
export function createRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let z = state;
    z = Math.imul(z ^ (z >>> 15), z | 1);
    z ^= z + Math.imul(z ^ (z >>> 7), z | 61);
    return ((z ^ (z >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(random: Random, bound: number): number {
  return Math.floor(random() * bound);
}
