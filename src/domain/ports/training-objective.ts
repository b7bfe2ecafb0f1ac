import type { LowRankWeights } from '@domain/types/adapter.js';
import type { TrainingInstance } from '@domain/types/example.js';

/**
 * Port interface for the objective the trainer optimises.
 *
 * One call is one update step over the whole synthesized batch: apply an
 * in-place update to the weights, then return the loss measured at the
 * updated weights. The recorded loss always describes the weights the
 * trainer would hand back if it stopped here.
 */
export interface ITrainingObjective {
  readonly name: string;
  step(weights: LowRankWeights, batch: readonly TrainingInstance[], learningRate: number): number;
}
