/** A source of uniformly distributed floats in [0, 1). */
export interface RandomSource {
  next(): number;
}

// Period 2^32; the same seed always yields the same sequence.
function mulberry32(seed: number): () => number {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class SeededRng implements RandomSource {
  private readonly rng: () => number;

  constructor(seed: number) {
    this.rng = mulberry32(seed);
  }

  next(): number {
    return this.rng();
  }
}

export function createRng(seed: number): SeededRng {
  return new SeededRng(seed);
}

/** Wraps a plain `() => number` so it can be handed to the engine. */
export function fromFunction(next: () => number): RandomSource {
  return { next };
}
