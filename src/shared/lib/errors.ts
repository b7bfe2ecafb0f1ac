import type { RejectionReason } from '@domain/types/decision.js';

export class PrimerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PrimerError';
  }
}

export class ConfigNotFoundError extends PrimerError {
  constructor(path: string) {
    super(
      `No .primer/ directory found at ${path}. Run "primer init" to initialize your project.`,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ValidationError extends PrimerError {
  constructor(
    message: string,
    public readonly issues: unknown[],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Base class for failures that end an adaptation attempt.
 *
 * Each subclass carries the rejection reason the lifecycle records when it
 * falls back to the unadapted generation path.
 */
export abstract class AdaptationError extends PrimerError {
  abstract readonly reason: RejectionReason;
}

export class PatternNotDetectedError extends AdaptationError {
  readonly reason = 'PatternNotDetected' as const;

  constructor() {
    super('No few-shot pattern detected in query');
    this.name = 'PatternNotDetectedError';
  }
}

export class ExtractionError extends AdaptationError {
  readonly reason: RejectionReason = 'ExtractionError';

  constructor(message: string) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export class InsufficientExamplesError extends ExtractionError {
  override readonly reason: RejectionReason = 'InsufficientExamples';

  constructor(
    public readonly found: number,
    public readonly required: number,
  ) {
    super(`Found ${found} usable example(s); at least ${required} required`);
    this.name = 'InsufficientExamplesError';
  }
}

export class TrainingTimeoutError extends AdaptationError {
  readonly reason = 'Timeout' as const;

  constructor(
    public readonly stepsCompleted: number,
    public readonly minSteps: number,
  ) {
    super(`Training timed out after ${stepsCompleted} step(s); ${minSteps} required for a usable adapter`);
    this.name = 'TrainingTimeoutError';
  }
}

export class TrainingError extends AdaptationError {
  readonly reason = 'InternalError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'TrainingError';
  }
}

export class MemoryLimitExceededError extends AdaptationError {
  readonly reason = 'MemoryLimitExceeded' as const;

  constructor(
    public readonly sizeBytes: number,
    public readonly limitBytes: number,
  ) {
    super(`Adapter needs ${sizeBytes} bytes; limit is ${limitBytes}`);
    this.name = 'MemoryLimitExceededError';
  }
}

export class LowConfidenceError extends AdaptationError {
  readonly reason = 'LowConfidence' as const;

  constructor(
    public readonly confidence: number,
    public readonly threshold: number,
  ) {
    super(`Adapter confidence ${confidence.toFixed(3)} is below threshold ${threshold}`);
    this.name = 'LowConfidenceError';
  }
}

export class AdaptationCancelledError extends AdaptationError {
  readonly reason = 'Cancelled' as const;

  constructor(stage: string) {
    super(`Request cancelled during ${stage}`);
    this.name = 'AdaptationCancelledError';
  }
}

/**
 * The base model failed to produce a response. Unlike adaptation errors this
 * one propagates to the caller as a request failure.
 */
export class GenerationFailureError extends PrimerError {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'GenerationFailureError';
  }
}
