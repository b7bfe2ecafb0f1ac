import { z } from 'zod/v4';
import { RejectionReason } from './decision.js';

export const TaskContextSchema = z.object({
  query: z.string(),
  /** Caller override: skip adaptation and go straight to the base path */
  disableAdaptation: z.boolean().optional(),
  requestId: z.string().optional(),
});

export type TaskContext = z.infer<typeof TaskContextSchema>;

export const AdaptationStatusSchema = z.object({
  enabled: z.boolean(),
  confidence: z.number().min(0).max(1).nullable(),
  reason: RejectionReason.nullable(),
});

export type AdaptationStatus = z.infer<typeof AdaptationStatusSchema>;

export const AdaptedResponseSchema = z.object({
  text: z.string(),
  adaptation: AdaptationStatusSchema,
});

export type AdaptedResponse = z.infer<typeof AdaptedResponseSchema>;
