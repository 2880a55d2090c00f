import { type RandomSource } from "./interface";

// Simple seedable RNG state
export type SeededRandomState = {
  seed: string;
  internalSeed: number;
};

// Create initial RNG state
export function createRandomState(seed = "default"): SeededRandomState {
  return {
    internalSeed: hashString(seed),
    seed,
  };
}

// Simple string hash (FNV-1a, 32-bit) for stable seeds
function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Simple PRNG (Linear Congruential Generator)
function nextRandom(seed: number): number {
  return (seed * 1664525 + 1013904223) % 2 ** 32;
}

export function nextInt(
  rng: SeededRandomState,
  min: number,
  max: number,
): { value: number; newRng: SeededRandomState } {
  if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
    throw new Error(
      `Invalid range [${String(min)}, ${String(max)}]`,
    );
  }
  const internalSeed = nextRandom(rng.internalSeed);
  // Use high bits mapped to [min, max] to reduce modulo bias
  const value =
    min + Math.floor(((internalSeed >>> 0) / 4294967296) * (max - min + 1));
  return { newRng: { ...rng, internalSeed }, value };
}

/**
 * Wrapper class that implements RandomSource for SeededRandomState
 */
export class SeededRandom implements RandomSource {
  constructor(private readonly state: SeededRandomState) {}

  nextInt(min: number, max: number): { value: number; next: RandomSource } {
    const result = nextInt(this.state, min, max);
    return { next: new SeededRandom(result.newRng), value: result.value };
  }

  getState(): SeededRandomState {
    return this.state;
  }
}

/**
 * Create a new seeded source with the interface
 */
export function createSeededRandom(seed = "default"): RandomSource {
  return new SeededRandom(createRandomState(seed));
}
