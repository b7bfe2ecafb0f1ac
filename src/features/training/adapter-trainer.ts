import type { LowRankWeights } from '@domain/types/adapter.js';
import type { TrainingInstance } from '@domain/types/example.js';
import type { TrainingRun } from '@domain/types/training.js';
import type { ITrainingObjective } from '@domain/ports/training-objective.js';
import { ConvergenceMonitor, type ConvergenceSettings } from '@domain/services/convergence-monitor.js';
import { AdaptationCancelledError, TrainingError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export interface TrainingSettings extends ConvergenceSettings {
  learningRate: number;
}

interface Snapshot {
  a: Float32Array;
  b: Float32Array;
}

function snapshot(weights: LowRankWeights): Snapshot {
  return { a: weights.a.slice(), b: weights.b.slice() };
}

function restore(weights: LowRankWeights, saved: Snapshot): void {
  weights.a.set(saved.a);
  weights.b.set(saved.b);
}

/**
 * AdapterTrainer: the bounded, synchronous update loop.
 *
 * Before every step it checks the wall clock and the abort signal; that one
 * check per step is the only preemption point. Weights are updated in place
 * and copied whenever a step sets a new lowest loss. When training stops the
 * weights of that best step are put back, so a timed-out or diverging run
 * hands over its best-so-far adapter and `finalLoss` describes exactly those
 * weights.
 */
export class AdapterTrainer {
  constructor(
    private readonly objective: ITrainingObjective,
    private readonly clock: () => number = () => performance.now(),
  ) {}

  /**
   * @throws AdaptationCancelledError when the signal aborts between steps
   * @throws TrainingError when the objective returns a negative or non-finite loss
   */
  train(
    instances: readonly TrainingInstance[],
    weights: LowRankWeights,
    settings: TrainingSettings,
    signal?: AbortSignal,
  ): TrainingRun {
    const startedAt = this.clock();
    const monitor = new ConvergenceMonitor(settings, startedAt);
    let best: Snapshot | null = null;

    while (monitor.checkClock(this.clock())) {
      if (signal?.aborted) {
        throw new AdaptationCancelledError('training');
      }

      const loss = this.objective.step(weights, instances, settings.learningRate);
      if (!Number.isFinite(loss) || loss < 0) {
        throw new TrainingError(
          `Objective "${this.objective.name}" returned invalid loss ${loss} at step ${monitor.stepsCompleted + 1}`,
        );
      }

      monitor.record(loss);
      if (monitor.bestStep === monitor.stepsCompleted) {
        best = snapshot(weights);
      }
      logger.debug('Adapter training step', {
        step: monitor.stepsCompleted,
        loss,
        state: monitor.state,
      });
    }

    if (best && monitor.bestStep < monitor.stepsCompleted) {
      restore(weights, best);
      logger.debug('Restored best adapter step', {
        bestStep: monitor.bestStep,
        stepsCompleted: monitor.stepsCompleted,
      });
    }

    const stopMode = monitor.stopMode();
    return Object.freeze({
      losses: Object.freeze([...monitor.losses]),
      stopMode,
      earlyStopped: stopMode === 'converged',
      timedOut: stopMode === 'timed-out',
      failed: monitor.failed,
      finalLoss: monitor.bestLoss,
      bestStep: monitor.bestStep,
      elapsedMs: Math.max(0, this.clock() - startedAt),
      rank: weights.rank,
      learningRate: settings.learningRate,
    });
  }
}
