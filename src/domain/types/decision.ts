import { z } from 'zod/v4';

export const RejectionReason = z.enum([
  'PatternNotDetected',
  'InsufficientExamples',
  'ExtractionError',
  'Timeout',
  'LowConfidence',
  'MemoryLimitExceeded',
  'Disabled',
  'Cancelled',
  'InternalError',
]);

export type RejectionReason = z.infer<typeof RejectionReason>;

/**
 * The only artifact handed to the generation stage.
 * accepted ⇔ adapterId is set ⇔ reason is null.
 */
export const AdaptationDecisionSchema = z.discriminatedUnion('accepted', [
  z.object({
    accepted: z.literal(true),
    reason: z.null(),
    adapterId: z.string().min(1),
  }),
  z.object({
    accepted: z.literal(false),
    reason: RejectionReason,
    adapterId: z.null(),
  }),
]);

export type AdaptationDecision = z.infer<typeof AdaptationDecisionSchema>;

export function acceptedDecision(adapterId: string): AdaptationDecision {
  return { accepted: true, reason: null, adapterId };
}

export function rejectedDecision(reason: RejectionReason): AdaptationDecision {
  return { accepted: false, reason, adapterId: null };
}
