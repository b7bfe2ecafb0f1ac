import type { StopMode } from '@domain/types/training.js';

export type MonitorState = 'training' | 'converged' | 'exhausted' | 'timed-out';

export interface ConvergenceSettings {
  minSteps: number;
  maxSteps: number;
  convergenceThreshold: number;
  maxWallClockMs: number;
}

/**
 * Step-by-step stopping decision for adapter training.
 *
 * training → converged | exhausted | timed-out. Terminal states never change.
 * The clock check takes precedence over everything else and keeps the losses
 * already recorded.
 *
 * Convergence means the loss moved by less than the threshold in either
 * direction. A rise of at least the threshold is divergence: training goes on
 * and the best step seen so far is what the run keeps.
 */
export class ConvergenceMonitor {
  private _state: MonitorState = 'training';
  private readonly _losses: number[] = [];
  private _bestStep = 0;

  constructor(
    private readonly settings: ConvergenceSettings,
    private readonly startedAt: number,
  ) {}

  get state(): MonitorState {
    return this._state;
  }

  get losses(): readonly number[] {
    return this._losses;
  }

  get stepsCompleted(): number {
    return this._losses.length;
  }

  /** 1-based step with the lowest loss so far; 0 before any step. Ties keep the earlier step. */
  get bestStep(): number {
    return this._bestStep;
  }

  get bestLoss(): number | null {
    return this._bestStep === 0 ? null : (this._losses[this._bestStep - 1] ?? null);
  }

  get isTerminal(): boolean {
    return this._state !== 'training';
  }

  /** A timed-out run that never reached the minimum step count yields no adapter. */
  get failed(): boolean {
    return this._state === 'timed-out' && this._losses.length < this.settings.minSteps;
  }

  /**
   * Check the wall clock. Call before each step; returns false once training must stop.
   */
  checkClock(now: number): boolean {
    if (this.isTerminal) return false;
    if (now - this.startedAt >= this.settings.maxWallClockMs) {
      this._state = 'timed-out';
      return false;
    }
    return true;
  }

  /**
   * Record the loss of the step just completed and advance the state machine.
   */
  record(loss: number): MonitorState {
    if (this.isTerminal) {
      throw new Error(`ConvergenceMonitor: cannot record a step in terminal state "${this._state}"`);
    }

    const best = this.bestLoss;
    this._losses.push(loss);
    const k = this._losses.length;
    if (best === null || loss < best) {
      this._bestStep = k;
    }

    // Convergence is only judged once there is a previous step and the minimum is met
    if (k >= Math.max(2, this.settings.minSteps)) {
      const previous = this._losses[k - 2];
      const improvement = previous - loss;
      if (Math.abs(improvement) < this.settings.convergenceThreshold) {
        this._state = 'converged';
        return this._state;
      }
    }

    if (k >= this.settings.maxSteps) {
      this._state = 'exhausted';
    }
    return this._state;
  }

  /** Terminal stop mode. Throws if training is still in progress. */
  stopMode(): StopMode {
    if (this._state === 'training') {
      throw new Error('ConvergenceMonitor: training has not stopped');
    }
    return this._state;
  }
}
