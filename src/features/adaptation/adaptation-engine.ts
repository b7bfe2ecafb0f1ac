import type { FrozenAdaptationConfig } from '@domain/types/config.js';
import type { AdaptedResponse, TaskContext } from '@domain/types/request.js';
import type { IBaseModel } from '@domain/ports/base-model.js';
import type { IMetricsSink } from '@domain/ports/metrics-sink.js';
import type { ITrainingObjective } from '@domain/ports/training-objective.js';
import { FeatureRegressionObjective } from '@features/training/feature-regression-objective.js';
import {
  AdaptationLifecycleManager,
  type AdaptationOutcome,
  type LifecycleDeps,
} from './adaptation-lifecycle.js';

export interface AdaptationEngineDeps {
  config: FrozenAdaptationConfig;
  baseModel: IBaseModel;
  objective?: ITrainingObjective;
  metricsSink?: IMetricsSink;
  clock?: () => number;
  generateId?: () => string;
}

/**
 * Long-lived entry point. Holds only read-only collaborators and hands each
 * request its own lifecycle manager, so nothing mutable crosses requests.
 */
export class AdaptationEngine {
  private readonly deps: LifecycleDeps;

  constructor(deps: AdaptationEngineDeps) {
    this.deps = {
      ...deps,
      objective: deps.objective ?? new FeatureRegressionObjective(),
    };
  }

  get config(): FrozenAdaptationConfig {
    return this.deps.config;
  }

  createLifecycle(): AdaptationLifecycleManager {
    return new AdaptationLifecycleManager(this.deps);
  }

  respond(context: TaskContext, signal?: AbortSignal): Promise<AdaptedResponse> {
    return this.createLifecycle().respond(context, signal);
  }

  /**
   * Run adaptation without generating. The adapter, if any, is released
   * before this resolves; only the outcome is returned.
   */
  async evaluate(context: TaskContext, signal?: AbortSignal): Promise<AdaptationOutcome> {
    const lifecycle = this.createLifecycle();
    try {
      return await lifecycle.decide(context, signal);
    } finally {
      lifecycle.dispose();
    }
  }
}
