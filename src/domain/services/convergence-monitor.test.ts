import { describe, it, expect } from 'vitest';
import { ConvergenceMonitor, type ConvergenceSettings } from './convergence-monitor.js';

const settings: ConvergenceSettings = {
  minSteps: 2,
  maxSteps: 8,
  convergenceThreshold: 0.01,
  maxWallClockMs: 5_000,
};

function feed(monitor: ConvergenceMonitor, losses: number[]): void {
  for (const loss of losses) {
    if (monitor.isTerminal) break;
    monitor.record(loss);
  }
}

describe('ConvergenceMonitor', () => {
  it('starts in training', () => {
    const monitor = new ConvergenceMonitor(settings, 0);
    expect(monitor.state).toBe('training');
    expect(monitor.stepsCompleted).toBe(0);
  });

  it('never judges convergence on the first step', () => {
    const monitor = new ConvergenceMonitor(settings, 0);
    expect(monitor.record(1.5)).toBe('training');
  });

  it('converges when a strictly decreasing trajectory flattens below the threshold', () => {
    const monitor = new ConvergenceMonitor(settings, 0);
    feed(monitor, [1.5, 1.0, 0.6, 0.595, 0.2]);
    expect(monitor.state).toBe('converged');
    expect(monitor.losses).toEqual([1.5, 1.0, 0.6, 0.595]);
    expect(monitor.stopMode()).toBe('converged');
  });

  it('treats a rise smaller than the threshold as a plateau', () => {
    const monitor = new ConvergenceMonitor(settings, 0);
    feed(monitor, [1.0, 1.005]);
    expect(monitor.state).toBe('converged');
  });

  it('keeps training through a rise of at least the threshold', () => {
    const monitor = new ConvergenceMonitor(settings, 0);
    feed(monitor, [1.0, 1.2]);
    expect(monitor.state).toBe('training');
    feed(monitor, [0.9, 0.895]);
    expect(monitor.state).toBe('converged');
    expect(monitor.stepsCompleted).toBe(4);
  });

  it('tracks the step with the lowest loss', () => {
    const monitor = new ConvergenceMonitor(settings, 0);
    expect(monitor.bestStep).toBe(0);
    expect(monitor.bestLoss).toBeNull();

    feed(monitor, [1.0, 1.5, 1.2]);
    expect(monitor.bestStep).toBe(1);
    expect(monitor.bestLoss).toBe(1.0);

    monitor.record(0.4);
    expect(monitor.bestStep).toBe(4);
    expect(monitor.bestLoss).toBe(0.4);
  });

  it('keeps the earlier step when a later loss only ties the best', () => {
    const monitor = new ConvergenceMonitor({ ...settings, minSteps: 3 }, 0);
    feed(monitor, [0.8, 1.0, 0.8]);
    expect(monitor.bestStep).toBe(1);
  });

  it('exhausts the budget when every step improves by at least the threshold', () => {
    const monitor = new ConvergenceMonitor(settings, 0);
    feed(monitor, [1.6, 1.4, 1.2, 1.0, 0.8, 0.6, 0.4, 0.2, 0.1]);
    expect(monitor.state).toBe('exhausted');
    expect(monitor.stepsCompleted).toBe(8);
  });

  it('prefers convergence when it happens on the final step', () => {
    const monitor = new ConvergenceMonitor({ ...settings, maxSteps: 3 }, 0);
    feed(monitor, [1.0, 0.5, 0.499]);
    expect(monitor.state).toBe('converged');
  });

  it('defers convergence until minSteps have run', () => {
    const monitor = new ConvergenceMonitor({ ...settings, minSteps: 4 }, 0);
    feed(monitor, [1.0, 1.0, 1.0]);
    expect(monitor.state).toBe('training');
    monitor.record(1.0);
    expect(monitor.state).toBe('converged');
  });

  it('times out and keeps the steps already computed', () => {
    const monitor = new ConvergenceMonitor(settings, 1_000);
    expect(monitor.checkClock(1_500)).toBe(true);
    monitor.record(1.4);
    monitor.record(1.0);
    monitor.record(0.7);
    expect(monitor.checkClock(6_000)).toBe(false);
    expect(monitor.state).toBe('timed-out');
    expect(monitor.losses).toEqual([1.4, 1.0, 0.7]);
    expect(monitor.failed).toBe(false);
  });

  it('marks a time-out before minSteps as failed', () => {
    const monitor = new ConvergenceMonitor(settings, 0);
    monitor.record(1.4);
    monitor.checkClock(5_000);
    expect(monitor.state).toBe('timed-out');
    expect(monitor.failed).toBe(true);
  });

  it('refuses to record once terminal', () => {
    const monitor = new ConvergenceMonitor(settings, 0);
    monitor.checkClock(10_000);
    expect(() => monitor.record(0.5)).toThrow('terminal state "timed-out"');
  });

  it('refuses to report a stop mode while training', () => {
    const monitor = new ConvergenceMonitor(settings, 0);
    expect(() => monitor.stopMode()).toThrow('has not stopped');
  });
});
