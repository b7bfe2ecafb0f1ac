import type { Example, ExtractionResult } from '@domain/types/example.js';
import type { PatternKind, PatternRule } from '@domain/types/pattern.js';
import { ExtractionError, InsufficientExamplesError } from '@shared/lib/errors.js';
import { scanPattern } from './pattern-definitions.js';

/**
 * Parse the examples of the selected pattern out of the query.
 *
 * - An item without an output is the live query when it is the last item and
 *   no explicit query marker was seen; anywhere else it is malformed.
 * - Fewer than `minExamples` → InsufficientExamplesError.
 * - More than `maxExamples` → the first `max` are kept in document order and
 *   the rest are counted in `discarded`. The live query is never discarded.
 *
 * @throws ExtractionError for malformed structure
 * @throws InsufficientExamplesError when too few examples parse
 */
export function extractExamples(
  text: string,
  kind: PatternKind,
  rule: Readonly<PatternRule>,
): ExtractionResult {
  const scan = scanPattern(kind, text);
  const examples: Example[] = [];
  let query = scan.query;

  for (const [index, item] of scan.items.entries()) {
    const isLast = index === scan.items.length - 1;

    if (item.output === null) {
      if (isLast && query === null) {
        query = item.input || null;
        continue;
      }
      throw new ExtractionError(`${kind}: item ${index + 1} has no output`);
    }
    if (!item.input) {
      throw new ExtractionError(`${kind}: item ${index + 1} has no input`);
    }

    examples.push(Object.freeze({ context: scan.context, input: item.input, output: item.output }));
  }

  if (examples.length < rule.minExamples) {
    throw new InsufficientExamplesError(examples.length, rule.minExamples);
  }

  const discarded = Math.max(0, examples.length - rule.maxExamples);

  return {
    kind,
    examples: examples.slice(0, rule.maxExamples),
    query,
    discarded,
  };
}
