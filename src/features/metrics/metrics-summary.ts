import type { AdaptationMetricsRecord, MetricsSummary } from '@domain/types/metrics.js';

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Aggregate per-request records into acceptance and fallback statistics.
 * Every rejection reason and pattern kind appears in the counts, zero or not.
 */
export function summarizeMetrics(records: readonly AdaptationMetricsRecord[]): MetricsSummary {
  const reasons: MetricsSummary['reasons'] = {
    PatternNotDetected: 0,
    InsufficientExamples: 0,
    ExtractionError: 0,
    Timeout: 0,
    LowConfidence: 0,
    MemoryLimitExceeded: 0,
    Disabled: 0,
    Cancelled: 0,
    InternalError: 0,
  };
  const patterns: MetricsSummary['patterns'] = {
    'explicit-examples': 0,
    'input-output-pairs': 0,
    'numbered-sequence': 0,
    analogy: 0,
    'rule-chain': 0,
  };

  let accepted = 0;
  for (const record of records) {
    if (record.accepted) accepted++;
    if (record.rejectionReason) reasons[record.rejectionReason]++;
    if (record.patternDetected) patterns[record.patternDetected]++;
  }

  const confidences = records.flatMap((r) => (r.confidenceScore === null ? [] : [r.confidenceScore]));

  return {
    total: records.length,
    accepted,
    acceptanceRate: records.length === 0 ? 0 : accepted / records.length,
    meanConfidence: mean(confidences),
    meanSteps: mean(records.map((r) => r.stepsRun)) ?? 0,
    reasons,
    patterns,
  };
}
