import { z } from 'zod/v4';
import { PatternRuleSchema } from './pattern.js';
import { AdapterRank } from './training.js';

export const BaseModelType = z.enum(['preview', 'command']);

export type BaseModelType = z.infer<typeof BaseModelType>;

const rule = (weight: number, minExamples: number, maxExamples: number, minStrength: number) =>
  PatternRuleSchema.default({ weight, minExamples, maxExamples, minStrength });

export const PatternRulesSchema = z.object({
  'explicit-examples': rule(0.9, 2, 10, 1),
  'input-output-pairs': rule(0.85, 2, 10, 1),
  'numbered-sequence': rule(0.75, 2, 12, 2),
  analogy: rule(0.65, 2, 8, 2),
  'rule-chain': rule(0.55, 2, 8, 2),
});

export type PatternRules = z.infer<typeof PatternRulesSchema>;

export const AdapterSettingsSchema = z.object({
  /** Ranks a deployment may train at */
  rankSet: z.array(AdapterRank).min(1).default([8, 16, 32, 64]),
  rank: AdapterRank.default(16),
  /** Width of the frozen encoder's feature space */
  featureDim: z.number().int().min(8).max(4096).default(256),
  /** Upper bound on the serialized adapter, in bytes */
  memoryLimitBytes: z.number().int().positive().default(1_048_576),
});

export const TrainingSettingsSchema = z.object({
  minSteps: z.number().int().min(1).default(2),
  maxSteps: z.number().int().min(1).default(8),
  /** Fraction of the way B moves toward its least-squares fit on each step */
  learningRate: z.number().positive().max(1).default(0.5),
  convergenceThreshold: z.number().min(0).default(0.01),
  /** Hard wall-clock budget for training, checked before every step */
  maxWallClockMs: z.number().int().positive().default(5_000),
  /** Seed for adapter initialisation; same seed, same trajectory */
  seed: z.number().int().default(42),
});

export const GateSettingsSchema = z.object({
  /** Minimum confidence [0, 1] before an adapter may touch generation */
  confidenceThreshold: z.number().min(0).max(1).default(0.7),
});

export const BaseModelSettingsSchema = z.object({
  type: BaseModelType.default('preview'),
  /** For the command model: binary to spawn */
  command: z.string().optional(),
  /** Leading arguments passed before the prompt */
  args: z.array(z.string()).default([]),
  timeoutMs: z.number().int().positive().default(120_000),
});

export const MetricsSettingsSchema = z.object({
  enabled: z.boolean().default(true),
});

export const AdaptationConfigSchema = z
  .object({
    patterns: PatternRulesSchema.default(() => PatternRulesSchema.parse({})),
    adapter: AdapterSettingsSchema.default(() => AdapterSettingsSchema.parse({})),
    training: TrainingSettingsSchema.default(() => TrainingSettingsSchema.parse({})),
    gate: GateSettingsSchema.default(() => GateSettingsSchema.parse({})),
    baseModel: BaseModelSettingsSchema.default(() => BaseModelSettingsSchema.parse({})),
    metrics: MetricsSettingsSchema.default(() => MetricsSettingsSchema.parse({})),
  })
  .refine((c) => c.training.minSteps <= c.training.maxSteps, {
    message: 'training.minSteps must not exceed training.maxSteps',
    path: ['training', 'minSteps'],
  })
  .refine((c) => c.adapter.rankSet.includes(c.adapter.rank), {
    message: 'adapter.rank must be one of adapter.rankSet',
    path: ['adapter', 'rank'],
  });

export type AdaptationConfig = z.infer<typeof AdaptationConfigSchema>;

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** Configuration as handed to the engine, frozen at load time. */
export type FrozenAdaptationConfig = DeepReadonly<AdaptationConfig>;
