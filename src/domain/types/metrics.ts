import { z } from 'zod/v4';
import { PatternKind } from './pattern.js';
import { RejectionReason } from './decision.js';

export const AdaptationMetricsRecordSchema = z.object({
  requestId: z.string(),
  recordedAt: z.string().datetime(),
  patternDetected: PatternKind.nullable(),
  examplesCount: z.number().int().min(0),
  stepsRun: z.number().int().min(0),
  elapsedMs: z.number().min(0),
  confidenceScore: z.number().min(0).max(1).nullable(),
  convergenceScore: z.number().min(0).max(1).nullable(),
  accepted: z.boolean(),
  rejectionReason: RejectionReason.nullable(),
});

export type AdaptationMetricsRecord = z.infer<typeof AdaptationMetricsRecordSchema>;

export const MetricsSummarySchema = z.object({
  total: z.number().int().min(0),
  accepted: z.number().int().min(0),
  acceptanceRate: z.number().min(0).max(1),
  meanConfidence: z.number().min(0).max(1).nullable(),
  meanSteps: z.number().min(0),
  reasons: z.record(RejectionReason, z.number().int().min(0)),
  patterns: z.record(PatternKind, z.number().int().min(0)),
});

export type MetricsSummary = z.infer<typeof MetricsSummarySchema>;
