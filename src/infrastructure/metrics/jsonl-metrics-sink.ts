import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { AdaptationMetricsRecordSchema, type AdaptationMetricsRecord } from '@domain/types/metrics.js';
import type { IMetricsSink } from '@domain/ports/metrics-sink.js';
import { PRIMER_DIRS } from '@shared/constants/paths.js';
import { PrimerError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export class MetricsLogError extends PrimerError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'MetricsLogError';
  }
}

export function metricsLogPath(primerDir: string): string {
  return join(primerDir, PRIMER_DIRS.metrics, PRIMER_DIRS.metricsLog);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Adaptation metrics log: one validated record per request, one JSON object
 * per line in `.primer/metrics/adaptation.jsonl`.
 *
 * `record` writes asynchronously and returns the pending write; the lifecycle
 * never awaits it. A caller that must see the line on disk before exiting
 * awaits `flush()`.
 */
export class JsonlMetricsSink implements IMetricsSink {
  private readonly pending = new Set<Promise<void>>();

  constructor(readonly path: string) {}

  static forProject(primerDir: string): JsonlMetricsSink {
    return new JsonlMetricsSink(metricsLogPath(primerDir));
  }

  /** @throws MetricsLogError (as a rejection) when the record is invalid or the write fails */
  record(entry: AdaptationMetricsRecord): Promise<void> {
    const write = this.append(entry);
    this.pending.add(write);
    const forget = () => {
      this.pending.delete(write);
    };
    write.then(forget, forget);
    return write;
  }

  /** Resolve once every write started so far has settled. Failed writes are not re-raised here. */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  /**
   * Every valid record in file order. Lines that are not JSON or not a
   * metrics record are skipped with a warning. A missing log reads as empty.
   */
  async readAll(): Promise<AdaptationMetricsRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new MetricsLogError(`Failed to read metrics log: ${this.path}`, this.path, err);
    }

    const records: AdaptationMetricsRecord[] = [];
    for (const [index, line] of raw.split('\n').entries()) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        logger.warn('Skipping metrics line that is not JSON', { path: this.path, line: index + 1 });
        continue;
      }

      const result = AdaptationMetricsRecordSchema.safeParse(parsed);
      if (!result.success) {
        logger.warn('Skipping invalid metrics record', {
          path: this.path,
          line: index + 1,
          issues: result.error.issues.length,
        });
        continue;
      }
      records.push(result.data);
    }
    return records;
  }

  private async append(entry: AdaptationMetricsRecord): Promise<void> {
    const result = AdaptationMetricsRecordSchema.safeParse(entry);
    if (!result.success) {
      const fields = result.error.issues.map((issue) => issue.path.join('.') || '(root)').join(', ');
      throw new MetricsLogError(`Invalid metrics record for ${entry.requestId}: ${fields}`, this.path, result.error);
    }

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, JSON.stringify(result.data) + '\n', 'utf-8');
    } catch (err) {
      throw new MetricsLogError(`Failed to append to metrics log: ${this.path}`, this.path, err);
    }
  }
}
