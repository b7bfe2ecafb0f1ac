import { z } from 'zod/v4';

/**
 * The closed set of few-shot pattern kinds, in tie-break priority order.
 */
export const PatternKind = z.enum([
  'explicit-examples',
  'input-output-pairs',
  'numbered-sequence',
  'analogy',
  'rule-chain',
]);

export type PatternKind = z.infer<typeof PatternKind>;

/** Fixed priority used to break weight ties; earlier wins. */
export const PATTERN_PRIORITY: readonly PatternKind[] = PatternKind.options;

export const PatternRuleSchema = z
  .object({
    /** Structural confidence weight, fixed per kind */
    weight: z.number().min(0).max(1),
    minExamples: z.number().int().min(1),
    maxExamples: z.number().int().min(1),
    /** Minimum structural strength (marker count) below which the kind does not match */
    minStrength: z.number().int().min(1),
  })
  .refine((r) => r.minExamples <= r.maxExamples, {
    message: 'minExamples must not exceed maxExamples',
  });

export type PatternRule = z.infer<typeof PatternRuleSchema>;

export const PatternMatchSchema = z.object({
  kind: PatternKind,
  weight: z.number().min(0).max(1),
  strength: z.number().int().min(0),
});

export type PatternMatch = z.infer<typeof PatternMatchSchema>;

/** Rules for every kind, as read from a (frozen) configuration. */
export type PatternRuleSet = Readonly<Record<PatternKind, Readonly<PatternRule>>>;
