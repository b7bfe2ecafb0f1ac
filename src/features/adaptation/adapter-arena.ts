import { randomUUID } from 'node:crypto';
import type { Adapter, LowRankWeights } from '@domain/types/adapter.js';
import type { AdapterRank, TrainingRun } from '@domain/types/training.js';
import { initLowRankWeights } from '@features/training/low-rank-weights.js';

export interface SealOptions {
  run: TrainingRun;
  serializedBytes: number;
  confidenceScore: number;
  convergenceScore: number;
}

/**
 * Request-scoped owner of adapter memory.
 *
 * Holds at most one weight allocation and at most one sealed adapter. After
 * dispose() the weights are zeroed, references dropped, and the arena refuses
 * further allocation. dispose() is idempotent.
 */
export class AdapterArena {
  private weights: LowRankWeights | null = null;
  private adapter: Adapter | null = null;
  private disposed = false;

  constructor(private readonly generateId: () => string = randomUUID) {}

  /** True while weights are held. */
  get live(): boolean {
    return this.weights !== null;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** The sealed adapter, if training produced one that has not been disposed. */
  get current(): Adapter | null {
    return this.adapter;
  }

  allocate(dim: number, rank: AdapterRank, seed: number): LowRankWeights {
    if (this.disposed) {
      throw new Error('AdapterArena: cannot allocate after dispose');
    }
    if (this.weights) {
      throw new Error('AdapterArena: an adapter is already allocated for this request');
    }
    this.weights = initLowRankWeights(dim, rank, seed);
    return this.weights;
  }

  /**
   * Turn the trained weights into the request's adapter.
   */
  seal(options: SealOptions): Adapter {
    if (!this.weights) {
      throw new Error('AdapterArena: nothing allocated to seal');
    }
    if (this.adapter) {
      throw new Error('AdapterArena: adapter already sealed');
    }
    this.adapter = Object.freeze({
      id: this.generateId(),
      weights: this.weights,
      rank: this.weights.rank,
      ...options,
    });
    return this.adapter;
  }

  dispose(): void {
    if (this.weights) {
      this.weights.a.fill(0);
      this.weights.b.fill(0);
    }
    this.weights = null;
    this.adapter = null;
    this.disposed = true;
  }
}
