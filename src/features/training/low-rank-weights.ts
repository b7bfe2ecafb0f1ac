import type { LowRankWeights } from '@domain/types/adapter.js';
import type { AdapterRank } from '@domain/types/training.js';

/** mulberry32: seedable PRNG returning values in [0, 1). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * LoRA-style initialisation: A uniform with variance 1/rank, B zero, so the
 * untrained delta is exactly zero and the base behaviour is untouched.
 */
export function initLowRankWeights(dim: number, rank: AdapterRank, seed: number): LowRankWeights {
  const random = seededRandom(seed);
  const bound = Math.sqrt(3 / rank);
  const a = new Float32Array(dim * rank);
  for (let i = 0; i < a.length; i++) {
    a[i] = (random() * 2 - 1) * bound;
  }
  return { dim, rank, a, b: new Float32Array(rank * dim) };
}
