import type { ExtractionResult } from '@domain/types/example.js';
import type { MetricsSummary } from '@domain/types/metrics.js';
import type { PatternMatch } from '@domain/types/pattern.js';
import type { AdaptationStatus, AdaptedResponse } from '@domain/types/request.js';

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Format detected patterns, strongest first. The first line is the active one.
 */
export function formatPatternMatches(matches: readonly PatternMatch[]): string {
  if (matches.length === 0) {
    return 'No few-shot pattern detected.';
  }

  const lines = ['Detected patterns:'];
  for (const [i, match] of matches.entries()) {
    const marker = i === 0 ? '*' : ' ';
    lines.push(`  ${marker} ${match.kind} (weight ${match.weight}, strength ${match.strength})`);
  }
  return lines.join('\n');
}

export function formatExtraction(result: ExtractionResult): string {
  const lines: string[] = [];
  lines.push(`Examples (${result.examples.length}${result.discarded > 0 ? `, ${result.discarded} discarded` : ''}):`);
  if (result.examples[0]?.context) {
    lines.push(`  context: ${result.examples[0].context}`);
  }
  for (const [i, example] of result.examples.entries()) {
    lines.push(`  ${i + 1}. ${example.input} → ${example.output}`);
  }
  lines.push(`Query: ${result.query ?? '(none)'}`);
  return lines.join('\n');
}

export function formatAdaptationStatus(status: AdaptationStatus): string {
  const confidence = status.confidence === null ? 'n/a' : status.confidence.toFixed(3);
  return status.enabled
    ? `Adaptation: attached (confidence ${confidence})`
    : `Adaptation: fell back (${status.reason ?? 'unknown'}, confidence ${confidence})`;
}

export function formatAdaptedResponse(response: AdaptedResponse): string {
  return [response.text, '', formatAdaptationStatus(response.adaptation)].join('\n');
}

export function formatMetricsSummary(summary: MetricsSummary): string {
  if (summary.total === 0) {
    return 'No adaptation metrics recorded yet.';
  }

  const lines: string[] = [];
  lines.push(`Requests:        ${summary.total}`);
  lines.push(`Accepted:        ${summary.accepted} (${percent(summary.acceptanceRate)})`);
  lines.push(`Mean confidence: ${summary.meanConfidence === null ? 'n/a' : summary.meanConfidence.toFixed(3)}`);
  lines.push(`Mean steps:      ${summary.meanSteps.toFixed(1)}`);

  const reasons = Object.entries(summary.reasons).filter(([, count]) => count > 0);
  if (reasons.length > 0) {
    lines.push('Fallback reasons:');
    for (const [reason, count] of reasons) lines.push(`  ${reason}: ${count}`);
  }

  const patterns = Object.entries(summary.patterns).filter(([, count]) => count > 0);
  if (patterns.length > 0) {
    lines.push('Patterns:');
    for (const [kind, count] of patterns) lines.push(`  ${kind}: ${count}`);
  }

  return lines.join('\n');
}
