import type { AdaptationMetricsRecord } from '@domain/types/metrics.js';

/**
 * Port interface for the observability collaborator.
 *
 * The lifecycle calls `record` exactly once per request, after generation,
 * and never awaits it on the request path. Failures are logged and dropped.
 */
export interface IMetricsSink {
  record(entry: AdaptationMetricsRecord): void | Promise<void>;
}
