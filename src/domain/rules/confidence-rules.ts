import type { TrainingRun } from '@domain/types/training.js';

export interface ConfidenceScores {
  convergenceScore: number;
  confidenceScore: number;
}

/** Loss at which convergence reaches zero. */
export const LOSS_CEILING = 2.0;

/** Trust factor per stop mode. */
export const EARLY_STOP_FACTOR = 0.9;
export const BUDGET_STOP_FACTOR = 0.7;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Score a finished training run.
 *
 * - convergence = clamp((2 - finalLoss) / 2, 0, 1)
 * - confidence  = convergence * (0.9 if early-stopped else 0.7)
 *
 * `finalLoss` is the loss of the weights the run hands back. A run with no
 * completed steps scores zero on both.
 */
export function scoreTrainingRun(run: Pick<TrainingRun, 'finalLoss' | 'earlyStopped'>): ConfidenceScores {
  const { finalLoss } = run;
  if (finalLoss === null) {
    return { convergenceScore: 0, confidenceScore: 0 };
  }

  const convergenceScore = clamp((LOSS_CEILING - finalLoss) / LOSS_CEILING, 0, 1);
  const factor = run.earlyStopped ? EARLY_STOP_FACTOR : BUDGET_STOP_FACTOR;

  return {
    convergenceScore,
    confidenceScore: convergenceScore * factor,
  };
}
