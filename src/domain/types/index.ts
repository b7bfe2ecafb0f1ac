// Pattern types
export {
  PatternKind,
  PATTERN_PRIORITY,
  PatternRuleSchema,
  PatternMatchSchema,
  type PatternRule,
  type PatternMatch,
  type PatternRuleSet,
} from './pattern.js';

// Example and training-instance types
export {
  ExampleSchema,
  ExtractionResultSchema,
  TrainingInstanceSchema,
  type Example,
  type ExtractionResult,
  type TrainingInstance,
} from './example.js';

// Training types
export {
  StopMode,
  AdapterRank,
  TrainingRunSchema,
  type TrainingRun,
} from './training.js';

// Adapter types
export {
  ADAPTER_HEADER_BYTES,
  serializedAdapterBytes,
  type Adapter,
  type LowRankWeights,
} from './adapter.js';

// Decision types
export {
  RejectionReason,
  AdaptationDecisionSchema,
  acceptedDecision,
  rejectedDecision,
  type AdaptationDecision,
} from './decision.js';

// Gate types
export {
  GateConditionType,
  GateConditionResultSchema,
  GateResultSchema,
  type GateConditionResult,
  type GateResult,
} from './gate.js';

// Request boundary types
export {
  TaskContextSchema,
  AdaptationStatusSchema,
  AdaptedResponseSchema,
  type TaskContext,
  type AdaptationStatus,
  type AdaptedResponse,
} from './request.js';

// Config types
export {
  BaseModelType,
  PatternRulesSchema,
  AdaptationConfigSchema,
  type PatternRules,
  type AdaptationConfig,
  type FrozenAdaptationConfig,
} from './config.js';

// Metrics types
export {
  AdaptationMetricsRecordSchema,
  MetricsSummarySchema,
  type AdaptationMetricsRecord,
  type MetricsSummary,
} from './metrics.js';
