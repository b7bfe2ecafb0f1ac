import type { Adapter } from '@domain/types/adapter.js';
import type { TaskContext } from '@domain/types/request.js';

/**
 * Port interface for the frozen base model.
 *
 * The engine never replaces this call, it only decides whether an adapter
 * rides along. Implementations must treat the adapter as a per-call argument
 * and never retain it: attachment is request-scoped, not global.
 *
 * Built-in models:
 * - PreviewBaseModel: Renders the prompt and adapter summary (null-state default)
 * - CommandBaseModel: Spawns a configured binary with the prompt as its last argument
 */
export interface IBaseModel {
  /** Human-readable name of this model binding (e.g., 'preview', 'command') */
  readonly name: string;

  /**
   * Produce the response text for a request.
   *
   * @param adapter - Present only when the adapter gate accepted; omitted on fallback.
   * @param signal - Aborted when the request is cancelled; stop work and reject.
   */
  generate(context: TaskContext, adapter?: Adapter, signal?: AbortSignal): Promise<string>;
}
