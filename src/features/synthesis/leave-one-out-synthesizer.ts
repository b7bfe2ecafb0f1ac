import type { Example, TrainingInstance } from '@domain/types/example.js';
import { InsufficientExamplesError } from '@shared/lib/errors.js';

/**
 * Serialize one example in the fixed block format every prompt uses.
 */
export function formatExample(example: Pick<Example, 'input' | 'output'>): string {
  return `Input: ${example.input}\nOutput: ${example.output}`;
}

/**
 * Build the completion prompt: optional task context, the demonstration
 * examples in order, then the open input awaiting its output.
 */
export function buildCompletionPrompt(
  context: string,
  demonstrations: readonly Example[],
  input: string,
): string {
  const blocks: string[] = [];
  if (context) blocks.push(context);
  for (const example of demonstrations) {
    blocks.push(formatExample(example));
  }
  blocks.push(`Input: ${input}\nOutput:`);
  return blocks.join('\n\n');
}

/**
 * synthesizeLeaveOneOut: N examples in, exactly N training instances out.
 *
 * Instance i holds example i out as the supervised target and shows the
 * other N−1 examples, in original order, as context before its input.
 *
 * @throws InsufficientExamplesError when N < 2 (no "other" example to form context)
 */
export function synthesizeLeaveOneOut(examples: readonly Example[]): TrainingInstance[] {
  if (examples.length < 2) {
    throw new InsufficientExamplesError(examples.length, 2);
  }

  return examples.map((heldOut, heldOutIndex) => {
    const others = examples.filter((_, j) => j !== heldOutIndex);
    return Object.freeze({
      prompt: buildCompletionPrompt(heldOut.context, others, heldOut.input),
      target: heldOut.output,
      heldOutIndex,
    });
  });
}
