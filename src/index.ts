export * from '@domain/types/index.js';
export type { IBaseModel, IMetricsSink, ITrainingObjective } from '@domain/ports/index.js';
export { scoreTrainingRun, type ConfidenceScores } from '@domain/rules/confidence-rules.js';
export { ConvergenceMonitor } from '@domain/services/convergence-monitor.js';
export { detectPatterns, selectPattern } from '@features/pattern-detection/pattern-detector.js';
export { extractExamples } from '@features/pattern-detection/example-extractor.js';
export { synthesizeLeaveOneOut } from '@features/synthesis/leave-one-out-synthesizer.js';
export { AdapterTrainer, type TrainingSettings } from '@features/training/adapter-trainer.js';
export { FeatureRegressionObjective } from '@features/training/feature-regression-objective.js';
export { evaluateAdapterGate } from '@features/adaptation/adapter-gate.js';
export { encodeAdapterWeights, decodeAdapterWeights } from '@features/adaptation/adapter-codec.js';
export {
  AdaptationLifecycleManager,
  type AdaptationOutcome,
  type LifecycleState,
} from '@features/adaptation/adaptation-lifecycle.js';
export { AdaptationEngine, type AdaptationEngineDeps } from '@features/adaptation/adaptation-engine.js';
export { summarizeMetrics } from '@features/metrics/metrics-summary.js';
export { loadAdaptationConfig } from '@infra/config/config-loader.js';
export { JsonlMetricsSink, MetricsLogError } from '@infra/metrics/jsonl-metrics-sink.js';
export { PreviewBaseModel } from '@infra/base-model/preview-base-model.js';
export { CommandBaseModel } from '@infra/base-model/command-base-model.js';
export { BaseModelResolver } from '@infra/base-model/base-model-resolver.js';
export * from '@shared/lib/errors.js';
