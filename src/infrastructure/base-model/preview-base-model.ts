import type { Adapter } from '@domain/types/adapter.js';
import type { TaskContext } from '@domain/types/request.js';
import type { IBaseModel } from '@domain/ports/base-model.js';

/**
 * The null-state default model.
 *
 * Generates nothing itself: it renders the query and the adapter that would
 * ride along, so the adaptation path can be inspected without a real model.
 */
export class PreviewBaseModel implements IBaseModel {
  readonly name = 'preview';

  async generate(context: TaskContext, adapter?: Adapter): Promise<string> {
    const lines: string[] = [];

    lines.push('--- Query ---');
    lines.push(context.query.trim());
    lines.push('');
    lines.push('--- Adapter ---');
    if (adapter) {
      lines.push(`  id:          ${adapter.id}`);
      lines.push(`  rank:        ${adapter.rank}`);
      lines.push(`  size:        ${adapter.serializedBytes} bytes`);
      lines.push(`  confidence:  ${adapter.confidenceScore.toFixed(3)}`);
      lines.push(`  training:    ${adapter.run.stopMode} after ${adapter.run.losses.length} step(s)`);
    } else {
      lines.push('  none (base generation)');
    }

    return lines.join('\n');
  }
}
