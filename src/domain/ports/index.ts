export type { IBaseModel } from './base-model.js';
export type { IMetricsSink } from './metrics-sink.js';
export type { ITrainingObjective } from './training-objective.js';
