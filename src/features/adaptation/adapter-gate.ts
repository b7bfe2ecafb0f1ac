import type { GateConditionResult, GateResult } from '@domain/types/gate.js';
import type { RejectionReason } from '@domain/types/decision.js';
import type { TrainingRun } from '@domain/types/training.js';

/**
 * What the gate sees of a trained adapter before it may touch generation.
 */
export interface AdapterCandidate {
  run: Pick<TrainingRun, 'failed' | 'losses' | 'stopMode'>;
  confidenceScore: number;
  serializedBytes: number;
}

export interface GateLimits {
  confidenceThreshold: number;
  memoryLimitBytes: number;
}

/**
 * Evaluate the adapter gate.
 *
 * Conditions, in order (the first failure names the rejection reason):
 * - `training-complete`: the run is not a failed (timed out before minSteps) run → Timeout
 * - `confidence-threshold`: confidence ≥ threshold → LowConfidence
 * - `memory-limit`: serialized size ≤ limit → MemoryLimitExceeded
 *
 * The gate passes only when all three hold. Every condition is reported
 * whether or not an earlier one failed.
 */
export function evaluateAdapterGate(candidate: AdapterCandidate, limits: GateLimits): GateResult {
  const results: Array<GateConditionResult & { reason: RejectionReason }> = [
    {
      type: 'training-complete',
      reason: 'Timeout',
      passed: !candidate.run.failed,
      detail: candidate.run.failed
        ? `Training stopped (${candidate.run.stopMode}) after ${candidate.run.losses.length} step(s), below the minimum`
        : `Training ${candidate.run.stopMode} after ${candidate.run.losses.length} step(s)`,
    },
    {
      type: 'confidence-threshold',
      reason: 'LowConfidence',
      passed: candidate.confidenceScore >= limits.confidenceThreshold,
      detail: `Confidence ${candidate.confidenceScore.toFixed(3)} vs threshold ${limits.confidenceThreshold}`,
    },
    {
      type: 'memory-limit',
      reason: 'MemoryLimitExceeded',
      passed: candidate.serializedBytes <= limits.memoryLimitBytes,
      detail: `Adapter size ${candidate.serializedBytes} bytes vs limit ${limits.memoryLimitBytes}`,
    },
  ];

  const firstFailure = results.find((r) => !r.passed);

  return {
    passed: firstFailure === undefined,
    reason: firstFailure?.reason ?? null,
    results: results.map(({ type, passed, detail }) => ({ type, passed, detail })),
    evaluatedAt: new Date().toISOString(),
  };
}
