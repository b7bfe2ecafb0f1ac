import { PATTERN_PRIORITY, type PatternMatch, type PatternRuleSet } from '@domain/types/pattern.js';
import { detectStrength } from './pattern-definitions.js';

/**
 * Every pattern kind whose structural strength reaches its threshold,
 * ordered best first: highest weight, ties broken by the fixed priority
 * explicit-examples > input-output-pairs > numbered-sequence > analogy > rule-chain.
 *
 * Pure function of the text and rules.
 */
export function detectPatterns(text: string, rules: PatternRuleSet): PatternMatch[] {
  const matches: PatternMatch[] = [];

  for (const kind of PATTERN_PRIORITY) {
    const rule = rules[kind];
    const strength = detectStrength(kind, text);
    if (strength >= rule.minStrength) {
      matches.push({ kind, weight: rule.weight, strength });
    }
  }

  return matches.sort(
    (a, b) =>
      b.weight - a.weight || PATTERN_PRIORITY.indexOf(a.kind) - PATTERN_PRIORITY.indexOf(b.kind),
  );
}

/**
 * The single active pattern for a query, or null when nothing matches.
 */
export function selectPattern(text: string, rules: PatternRuleSet): PatternMatch | null {
  return detectPatterns(text, rules)[0] ?? null;
}
