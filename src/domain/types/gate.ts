import { z } from 'zod/v4';
import { RejectionReason } from './decision.js';

export const GateConditionType = z.enum([
  'training-complete',
  'confidence-threshold',
  'memory-limit',
]);

export type GateConditionType = z.infer<typeof GateConditionType>;

export const GateConditionResultSchema = z.object({
  type: GateConditionType,
  passed: z.boolean(),
  detail: z.string(),
});

export type GateConditionResult = z.infer<typeof GateConditionResultSchema>;

export const GateResultSchema = z.object({
  passed: z.boolean(),
  /** First failing condition's reason, null when the gate passed */
  reason: RejectionReason.nullable(),
  results: z.array(GateConditionResultSchema),
  evaluatedAt: z.string().datetime(),
});

export type GateResult = z.infer<typeof GateResultSchema>;
