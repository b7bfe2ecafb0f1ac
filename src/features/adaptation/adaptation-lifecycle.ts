import { randomUUID } from 'node:crypto';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { Adapter } from '@domain/types/adapter.js';
import { serializedAdapterBytes } from '@domain/types/adapter.js';
import type { FrozenAdaptationConfig } from '@domain/types/config.js';
import {
  acceptedDecision,
  rejectedDecision,
  type AdaptationDecision,
  type RejectionReason,
} from '@domain/types/decision.js';
import type { ExtractionResult } from '@domain/types/example.js';
import type { GateResult } from '@domain/types/gate.js';
import type { AdaptationMetricsRecord } from '@domain/types/metrics.js';
import type { PatternMatch } from '@domain/types/pattern.js';
import type { AdaptationStatus, AdaptedResponse, TaskContext } from '@domain/types/request.js';
import type { TrainingRun } from '@domain/types/training.js';
import type { IBaseModel } from '@domain/ports/base-model.js';
import type { IMetricsSink } from '@domain/ports/metrics-sink.js';
import type { ITrainingObjective } from '@domain/ports/training-objective.js';
import { scoreTrainingRun, type ConfidenceScores } from '@domain/rules/confidence-rules.js';
import {
  AdaptationCancelledError,
  AdaptationError,
  GenerationFailureError,
  LowConfidenceError,
  MemoryLimitExceededError,
  PatternNotDetectedError,
  TrainingTimeoutError,
} from '@shared/lib/errors.js';
import { logger, type Logger } from '@shared/lib/logger.js';
import { selectPattern } from '@features/pattern-detection/pattern-detector.js';
import { extractExamples } from '@features/pattern-detection/example-extractor.js';
import { synthesizeLeaveOneOut } from '@features/synthesis/leave-one-out-synthesizer.js';
import { AdapterTrainer } from '@features/training/adapter-trainer.js';
import { evaluateAdapterGate } from './adapter-gate.js';
import { AdapterArena } from './adapter-arena.js';

export type LifecycleState =
  | 'idle'
  | 'detecting'
  | 'extracting'
  | 'synthesizing'
  | 'training'
  | 'scoring'
  | 'gating'
  | 'attached'
  | 'fallen-back';

/**
 * Dependencies injected into the lifecycle manager for testability.
 */
export interface LifecycleDeps {
  config: FrozenAdaptationConfig;
  baseModel: IBaseModel;
  objective: ITrainingObjective;
  /** Never awaited; failures are logged and dropped */
  metricsSink?: IMetricsSink;
  /** Monotonic clock in milliseconds. Defaults to performance.now(). */
  clock?: () => number;
  /** Adapter id generator. Defaults to randomUUID. */
  generateId?: () => string;
}

/**
 * Everything the pipeline learned on its way to a decision.
 */
export interface AdaptationOutcome {
  decision: AdaptationDecision;
  match: PatternMatch | null;
  extraction: ExtractionResult | null;
  run: TrainingRun | null;
  scores: ConfidenceScores | null;
  gate: GateResult | null;
  elapsedMs: number;
}

/**
 * Drives one request through adaptation. Single-use.
 *
 * idle → detecting → extracting → synthesizing → training → scoring → gating
 *      → attached | fallen-back
 *
 * Every adaptation-stage failure becomes a fallback with a recorded reason.
 * The request's AdapterArena is disposed on every exit path of respond(),
 * so no adapter outlives the request. Base model failures propagate as
 * GenerationFailureError; cancellation disposes and throws without generating.
 */
export class AdaptationLifecycleManager {
  private _state: LifecycleState = 'idle';
  private readonly _transitions: LifecycleState[] = ['idle'];
  private readonly arena: AdapterArena;
  private readonly clock: () => number;
  private readonly log: Logger;
  private used = false;

  constructor(private readonly deps: LifecycleDeps) {
    this.clock = deps.clock ?? (() => performance.now());
    this.arena = new AdapterArena(deps.generateId ?? randomUUID);
    this.log = logger.child({ component: 'adaptation' });
  }

  get state(): LifecycleState {
    return this._state;
  }

  /** Every state this request has passed through, in order. */
  get transitions(): readonly LifecycleState[] {
    return this._transitions;
  }

  /** The attached adapter, or null when fallen back or disposed. */
  get adapter(): Adapter | null {
    return this.arena.current;
  }

  /** True while the request still holds adapter memory. */
  get holdsAdapter(): boolean {
    return this.arena.live;
  }

  /**
   * Run the full request: decide, generate, dispose, report.
   *
   * @throws GenerationFailureError when the base model fails
   * @throws AdaptationCancelledError when the signal aborts
   */
  async respond(context: TaskContext, signal?: AbortSignal): Promise<AdaptedResponse> {
    const requestId = context.requestId ?? randomUUID();
    let outcome: AdaptationOutcome | undefined;

    try {
      outcome = await this.decide(context, signal);

      if (signal?.aborted) {
        outcome = this.cancel(outcome);
      }
      if (outcome.decision.reason === 'Cancelled') {
        throw new AdaptationCancelledError('generation');
      }

      let text: string;
      try {
        text = await this.generate(context, this.arena.current ?? undefined, signal);
      } catch (err) {
        if (err instanceof AdaptationCancelledError) outcome = this.cancel(outcome);
        throw err;
      }
      return { text, adaptation: toStatus(outcome) };
    } finally {
      this.dispose();
      if (outcome) {
        this.emitMetrics(toMetricsRecord(requestId, outcome, new Date().toISOString()));
      }
    }
  }

  /**
   * Walk the pipeline up to the gate decision.
   *
   * On acceptance the adapter stays attached until dispose(); on any rejection
   * or failure the arena is disposed before returning. Never throws for
   * adaptation-stage errors.
   */
  async decide(context: TaskContext, signal?: AbortSignal): Promise<AdaptationOutcome> {
    if (this.used) {
      throw new Error('AdaptationLifecycleManager is single-use; create one per request');
    }
    this.used = true;

    const { config } = this.deps;
    const startedAt = this.clock();
    const outcome: AdaptationOutcome = {
      decision: rejectedDecision('InternalError'),
      match: null,
      extraction: null,
      run: null,
      scores: null,
      gate: null,
      elapsedMs: 0,
    };

    if (context.disableAdaptation) {
      return this.fallBack(outcome, 'Disabled', startedAt);
    }

    try {
      await this.enter('detecting', signal);
      const match = selectPattern(context.query, config.patterns);
      if (!match) throw new PatternNotDetectedError();
      outcome.match = match;

      await this.enter('extracting', signal);
      const extraction = extractExamples(context.query, match.kind, config.patterns[match.kind]);
      outcome.extraction = extraction;

      await this.enter('synthesizing', signal);
      const instances = synthesizeLeaveOneOut(extraction.examples);

      await this.enter('training', signal);
      const weights = this.arena.allocate(
        config.adapter.featureDim,
        config.adapter.rank,
        config.training.seed,
      );
      const trainer = new AdapterTrainer(this.deps.objective, this.clock);
      const run = trainer.train(instances, weights, config.training, signal);
      outcome.run = run;
      if (run.failed) {
        throw new TrainingTimeoutError(run.losses.length, config.training.minSteps);
      }

      await this.enter('scoring', signal);
      const scores = scoreTrainingRun(run);
      outcome.scores = scores;

      await this.enter('gating', signal);
      const serializedBytes = serializedAdapterBytes(weights);
      const gate = evaluateAdapterGate(
        { run, confidenceScore: scores.confidenceScore, serializedBytes },
        {
          confidenceThreshold: config.gate.confidenceThreshold,
          memoryLimitBytes: config.adapter.memoryLimitBytes,
        },
      );
      outcome.gate = gate;
      if (!gate.passed) {
        throw this.gateRejection(gate, scores.confidenceScore, serializedBytes, run.losses.length);
      }

      const adapter = this.arena.seal({ run, serializedBytes, ...scores });
      this.transition('attached');
      outcome.decision = acceptedDecision(adapter.id);
      outcome.elapsedMs = this.elapsedSince(startedAt);
      this.log.info('Adapter attached', {
        pattern: match.kind,
        examples: extraction.examples.length,
        steps: run.losses.length,
        confidence: scores.confidenceScore,
      });
      return outcome;
    } catch (err) {
      if (err instanceof AdaptationError) {
        return this.fallBack(outcome, err.reason, startedAt, err.message);
      }
      this.log.error('Unexpected failure during adaptation, falling back', {
        state: this._state,
        error: err instanceof Error ? err.message : String(err),
      });
      return this.fallBack(outcome, 'InternalError', startedAt);
    }
  }

  /** Release adapter memory. Safe to call any number of times. */
  dispose(): void {
    this.arena.dispose();
  }

  private async enter(state: LifecycleState, signal?: AbortSignal): Promise<void> {
    // Let pending abort events fire between stages
    await yieldToEventLoop();
    if (signal?.aborted) {
      throw new AdaptationCancelledError(state);
    }
    this.transition(state);
  }

  private transition(state: LifecycleState): void {
    this._state = state;
    this._transitions.push(state);
  }

  private fallBack(
    outcome: AdaptationOutcome,
    reason: RejectionReason,
    startedAt: number,
    detail?: string,
  ): AdaptationOutcome {
    this.dispose();
    this.transition('fallen-back');
    outcome.decision = rejectedDecision(reason);
    outcome.elapsedMs = this.elapsedSince(startedAt);
    this.log.info('Adaptation fell back to base generation', {
      reason,
      pattern: outcome.match?.kind ?? null,
      ...(detail ? { detail } : {}),
    });
    return outcome;
  }

  /** Turn a failed gate into the error for its first failing condition. */
  private gateRejection(
    gate: GateResult,
    confidence: number,
    serializedBytes: number,
    stepsCompleted: number,
  ): AdaptationError {
    const { gate: gateSettings, adapter, training } = this.deps.config;
    switch (gate.reason) {
      case 'LowConfidence':
        return new LowConfidenceError(confidence, gateSettings.confidenceThreshold);
      case 'MemoryLimitExceeded':
        return new MemoryLimitExceededError(serializedBytes, adapter.memoryLimitBytes);
      default:
        return new TrainingTimeoutError(stepsCompleted, training.minSteps);
    }
  }

  private cancel(outcome: AdaptationOutcome): AdaptationOutcome {
    this.dispose();
    if (this._state !== 'fallen-back') this.transition('fallen-back');
    return { ...outcome, decision: rejectedDecision('Cancelled') };
  }

  /**
   * Call the base model, racing it against the abort signal. An abort
   * releases the adapter at once and rejects without waiting for the model.
   */
  private async generate(context: TaskContext, adapter?: Adapter, signal?: AbortSignal): Promise<string> {
    if (!signal) return this.callBaseModel(context, adapter);

    // Aborting `settled` detaches the listener once generation is over
    const settled = new AbortController();
    const aborted = new Promise<never>((_, reject) => {
      signal.addEventListener(
        'abort',
        () => {
          this.dispose();
          reject(new AdaptationCancelledError('generation'));
        },
        { once: true, signal: settled.signal },
      );
    });

    try {
      return await Promise.race([this.callBaseModel(context, adapter, signal), aborted]);
    } finally {
      settled.abort();
    }
  }

  private async callBaseModel(context: TaskContext, adapter?: Adapter, signal?: AbortSignal): Promise<string> {
    try {
      return await this.deps.baseModel.generate(context, adapter, signal);
    } catch (err) {
      if (signal?.aborted) throw new AdaptationCancelledError('generation');
      throw new GenerationFailureError(
        `Base model "${this.deps.baseModel.name}" failed: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
  }

  /**
   * Hand the record to the sink without waiting on it. A throwing or
   * rejecting sink is logged and otherwise ignored.
   */
  private emitMetrics(record: AdaptationMetricsRecord): void {
    const sink = this.deps.metricsSink;
    if (!sink) return;

    const warn = (err: unknown) =>
      this.log.warn('Metrics sink failed, record dropped', {
        requestId: record.requestId,
        error: err instanceof Error ? err.message : String(err),
      });

    try {
      const pending = sink.record(record);
      if (pending instanceof Promise) void pending.catch(warn);
    } catch (err) {
      warn(err);
    }
  }

  private elapsedSince(startedAt: number): number {
    return Math.max(0, this.clock() - startedAt);
  }
}

export function toStatus(outcome: AdaptationOutcome): AdaptationStatus {
  return {
    enabled: outcome.decision.accepted,
    confidence: outcome.scores?.confidenceScore ?? null,
    reason: outcome.decision.reason,
  };
}

export function toMetricsRecord(
  requestId: string,
  outcome: AdaptationOutcome,
  recordedAt: string,
): AdaptationMetricsRecord {
  return {
    requestId,
    recordedAt,
    patternDetected: outcome.match?.kind ?? null,
    examplesCount: outcome.extraction?.examples.length ?? 0,
    stepsRun: outcome.run?.losses.length ?? 0,
    elapsedMs: outcome.elapsedMs,
    confidenceScore: outcome.scores?.confidenceScore ?? null,
    convergenceScore: outcome.scores?.convergenceScore ?? null,
    accepted: outcome.decision.accepted,
    rejectionReason: outcome.decision.reason,
  };
}
