import type { AdapterRank, TrainingRun } from './training.js';

/**
 * LoRA-style weight pair: the delta applied to a feature vector x is (xA)B.
 * Row-major, A is dim×rank and B is rank×dim.
 */
export interface LowRankWeights {
  readonly dim: number;
  readonly rank: AdapterRank;
  readonly a: Float32Array;
  readonly b: Float32Array;
}

/** Fixed bytes for rank/dim/checksum framing in the serialized form. */
export const ADAPTER_HEADER_BYTES = 16;

export function serializedAdapterBytes(weights: Pick<LowRankWeights, 'a' | 'b'>): number {
  return ADAPTER_HEADER_BYTES + (weights.a.length + weights.b.length) * Float32Array.BYTES_PER_ELEMENT;
}

/**
 * A trained adapter. Exists only after a successful training run and lives
 * inside exactly one request's arena.
 */
export interface Adapter {
  readonly id: string;
  readonly weights: LowRankWeights;
  readonly rank: AdapterRank;
  readonly serializedBytes: number;
  readonly confidenceScore: number;
  readonly convergenceScore: number;
  readonly run: TrainingRun;
}
