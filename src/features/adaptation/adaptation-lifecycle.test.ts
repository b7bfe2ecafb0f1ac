import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Adapter, LowRankWeights } from '@domain/types/adapter.js';
import { AdaptationConfigSchema, type AdaptationConfig } from '@domain/types/config.js';
import type { AdaptationMetricsRecord } from '@domain/types/metrics.js';
import type { TaskContext } from '@domain/types/request.js';
import type { IBaseModel } from '@domain/ports/base-model.js';
import type { ITrainingObjective } from '@domain/ports/training-objective.js';
import { AdaptationCancelledError, GenerationFailureError } from '@shared/lib/errors.js';
import { AdaptationLifecycleManager, type LifecycleDeps } from './adaptation-lifecycle.js';

const EXPLICIT_QUERY =
  'Example 1: 2,4,6→8. Example 2: 1,3,5→7. Example 3: 10,20,30→40. Problem: 5,10,15→?';

function scripted(losses: number[]): ITrainingObjective & { calls: number } {
  return {
    name: 'scripted',
    calls: 0,
    step(_weights: LowRankWeights) {
      const loss = losses[this.calls] ?? losses[losses.length - 1] ?? 0;
      this.calls++;
      return loss;
    },
  };
}

interface RecordingModel extends IBaseModel {
  calls: Array<{ context: TaskContext; adapter: Adapter | undefined; live: boolean }>;
}

function recordingModel(lifecycle: () => AdaptationLifecycleManager | undefined): RecordingModel {
  const calls: RecordingModel['calls'] = [];
  return {
    name: 'recording',
    calls,
    async generate(context, adapter) {
      calls.push({ context, adapter, live: lifecycle()?.holdsAdapter ?? false });
      return adapter ? `adapted:${adapter.id}` : 'base';
    },
  };
}

function setup(options: {
  losses?: number[];
  config?: AdaptationConfig;
  clock?: () => number;
  baseModel?: IBaseModel;
  metricsSink?: LifecycleDeps['metricsSink'];
} = {}) {
  let manager: AdaptationLifecycleManager | undefined;
  const model = recordingModel(() => manager);
  const records: AdaptationMetricsRecord[] = [];
  manager = new AdaptationLifecycleManager({
    config: options.config ?? AdaptationConfigSchema.parse({}),
    baseModel: options.baseModel ?? model,
    objective: scripted(options.losses ?? [0.4, 0.2, 0.195]),
    metricsSink: options.metricsSink ?? { record: (entry) => void records.push(entry) },
    clock: options.clock ?? (() => 0),
    generateId: () => 'adapter-1',
  });
  return { manager, model, records };
}

/** Clock that advances by a fixed amount on every read. */
function steppingClock(increment: number): () => number {
  let t = 0;
  return () => {
    const now = t;
    t += increment;
    return now;
  };
}

describe('AdaptationLifecycleManager', () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('accepted adapter', () => {
    it('attaches the adapter to generation and reports the confidence', async () => {
      const { manager, model } = setup();

      const response = await manager.respond({ query: EXPLICIT_QUERY, requestId: 'req-1' });

      expect(response.text).toBe('adapted:adapter-1');
      expect(response.adaptation.enabled).toBe(true);
      expect(response.adaptation.reason).toBeNull();
      // (2 - 0.195) / 2 * 0.9
      expect(response.adaptation.confidence).toBeCloseTo(0.81225, 6);
      expect(model.calls).toHaveLength(1);
      expect(model.calls[0]?.adapter?.id).toBe('adapter-1');
      expect(model.calls[0]?.live).toBe(true);
    });

    it('walks every stage in order', async () => {
      const { manager } = setup();
      await manager.respond({ query: EXPLICIT_QUERY });

      expect(manager.transitions).toEqual([
        'idle',
        'detecting',
        'extracting',
        'synthesizing',
        'training',
        'scoring',
        'gating',
        'attached',
      ]);
    });

    it('disposes the adapter once the response is produced', async () => {
      const { manager } = setup();
      await manager.respond({ query: EXPLICIT_QUERY });

      expect(manager.holdsAdapter).toBe(false);
      expect(manager.adapter).toBeNull();
    });

    it('records one metrics entry for the request', async () => {
      const { manager, records } = setup();
      await manager.respond({ query: EXPLICIT_QUERY, requestId: 'req-1' });

      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        requestId: 'req-1',
        patternDetected: 'explicit-examples',
        examplesCount: 3,
        stepsRun: 3,
        elapsedMs: 0,
        accepted: true,
        rejectionReason: null,
      });
      expect(records[0]?.convergenceScore).toBeCloseTo(0.9025, 6);
    });

    it('keeps the adapter from decide() until dispose()', async () => {
      const { manager } = setup();
      const outcome = await manager.decide({ query: EXPLICIT_QUERY });

      expect(outcome.decision).toEqual({ accepted: true, reason: null, adapterId: 'adapter-1' });
      expect(outcome.gate?.passed).toBe(true);
      expect(manager.holdsAdapter).toBe(true);

      manager.dispose();
      expect(manager.holdsAdapter).toBe(false);
    });
  });

  describe('fallback', () => {
    it('falls back with PatternNotDetected on plain questions', async () => {
      const { manager, model, records } = setup();
      const response = await manager.respond({ query: 'What is the capital of France?' });

      expect(response).toEqual({
        text: 'base',
        adaptation: { enabled: false, confidence: null, reason: 'PatternNotDetected' },
      });
      expect(model.calls[0]?.adapter).toBeUndefined();
      expect(manager.transitions).toEqual(['idle', 'detecting', 'fallen-back']);
      expect(records[0]).toMatchObject({ patternDetected: null, stepsRun: 0, accepted: false });
    });

    it('falls back with InsufficientExamples when only the query is present', async () => {
      const { manager } = setup();
      const response = await manager.respond({ query: 'Input: x → Output:' });

      expect(response.adaptation.reason).toBe('InsufficientExamples');
      expect(manager.transitions).toEqual(['idle', 'detecting', 'extracting', 'fallen-back']);
    });

    it('falls back with ExtractionError on a malformed sequence', async () => {
      const { manager } = setup();
      const response = await manager.respond({
        query: 'Example 1: 2 -> 4. Example 2: what about this. Example 3: 5 -> 25',
      });

      expect(response.adaptation.reason).toBe('ExtractionError');
    });

    it('falls back with Timeout when the budget ends before the minimum steps', async () => {
      const { manager, records } = setup({ clock: steppingClock(3_000) });
      const response = await manager.respond({ query: EXPLICIT_QUERY });

      expect(response.adaptation).toEqual({ enabled: false, confidence: null, reason: 'Timeout' });
      expect(records[0]?.stepsRun).toBe(1);
      expect(manager.holdsAdapter).toBe(false);
    });

    it('falls back with LowConfidence when the final loss stays high', async () => {
      const { manager } = setup({ losses: [1.5, 1.498] });
      const response = await manager.respond({ query: EXPLICIT_QUERY });

      expect(response.adaptation.enabled).toBe(false);
      expect(response.adaptation.reason).toBe('LowConfidence');
      // (2 - 1.498) / 2 * 0.9
      expect(response.adaptation.confidence).toBeCloseTo(0.2259, 6);
      expect(process.stderr.write).toHaveBeenCalledWith(
        expect.stringContaining('"detail":"Adapter confidence 0.226 is below threshold 0.7"'),
      );
    });

    it('falls back with MemoryLimitExceeded when the adapter is too large', async () => {
      const config = AdaptationConfigSchema.parse({ adapter: { memoryLimitBytes: 1_000 } });
      const { manager } = setup({ config });
      const outcome = await manager.decide({ query: EXPLICIT_QUERY });

      expect(outcome.decision.reason).toBe('MemoryLimitExceeded');
      expect(outcome.gate?.results.map((r) => r.passed)).toEqual([true, true, false]);
      expect(manager.holdsAdapter).toBe(false);
      expect(process.stderr.write).toHaveBeenCalledWith(
        expect.stringContaining('"detail":"Adapter needs 32784 bytes; limit is 1000"'),
      );
    });

    it('skips every stage when adaptation is disabled', async () => {
      const { manager, model } = setup();
      const response = await manager.respond({ query: EXPLICIT_QUERY, disableAdaptation: true });

      expect(response.adaptation.reason).toBe('Disabled');
      expect(manager.transitions).toEqual(['idle', 'fallen-back']);
      expect(model.calls[0]?.adapter).toBeUndefined();
    });

    it('maps unexpected stage failures to InternalError', async () => {
      const objective: ITrainingObjective = {
        name: 'broken',
        step() {
          throw new RangeError('matrix shape mismatch');
        },
      };
      const manager = new AdaptationLifecycleManager({
        config: AdaptationConfigSchema.parse({}),
        baseModel: recordingModel(() => undefined),
        objective,
        clock: () => 0,
      });

      const outcome = await manager.decide({ query: EXPLICIT_QUERY });
      expect(outcome.decision.reason).toBe('InternalError');
      expect(manager.holdsAdapter).toBe(false);
    });
  });

  describe('errors that reach the caller', () => {
    it('throws AdaptationCancelledError without generating when aborted', async () => {
      const { manager, model, records } = setup();
      const controller = new AbortController();
      controller.abort();

      await expect(manager.respond({ query: EXPLICIT_QUERY }, controller.signal)).rejects.toBeInstanceOf(
        AdaptationCancelledError,
      );
      expect(model.calls).toHaveLength(0);
      expect(manager.holdsAdapter).toBe(false);
      expect(records[0]?.rejectionReason).toBe('Cancelled');
    });

    it('releases the adapter as soon as the request is aborted during generation', async () => {
      const controller = new AbortController();
      const liveAfterAbort: boolean[] = [];
      const receivedSignals: Array<AbortSignal | undefined> = [];
      let manager: AdaptationLifecycleManager | undefined;
      const stalled: IBaseModel = {
        name: 'stalled',
        generate: (_context, _adapter, signal) => {
          receivedSignals.push(signal);
          controller.abort();
          liveAfterAbort.push(manager?.holdsAdapter ?? true);
          return new Promise<string>(() => {});
        },
      };
      const records: AdaptationMetricsRecord[] = [];
      manager = new AdaptationLifecycleManager({
        config: AdaptationConfigSchema.parse({}),
        baseModel: stalled,
        objective: scripted([0.4, 0.2, 0.195]),
        metricsSink: { record: (entry) => void records.push(entry) },
        clock: () => 0,
        generateId: () => 'adapter-1',
      });

      await expect(manager.respond({ query: EXPLICIT_QUERY }, controller.signal)).rejects.toBeInstanceOf(
        AdaptationCancelledError,
      );
      expect(receivedSignals).toEqual([controller.signal]);
      expect(liveAfterAbort).toEqual([false]);
      expect(manager.transitions.at(-1)).toBe('fallen-back');
      expect(records[0]).toMatchObject({ accepted: false, rejectionReason: 'Cancelled' });
    });

    it('reports a base model that rejects because of the abort as a cancellation', async () => {
      const controller = new AbortController();
      const aborting: IBaseModel = {
        name: 'aborting',
        generate: () => {
          controller.abort();
          return Promise.reject(new Error('The operation was aborted'));
        },
      };
      const { manager } = setup({ baseModel: aborting });

      await expect(manager.respond({ query: EXPLICIT_QUERY }, controller.signal)).rejects.toBeInstanceOf(
        AdaptationCancelledError,
      );
      expect(manager.holdsAdapter).toBe(false);
    });

    it('wraps base model failures in GenerationFailureError and still disposes', async () => {
      const failing: IBaseModel = {
        name: 'failing',
        generate: () => Promise.reject(new Error('upstream unavailable')),
      };
      const { manager } = setup({ baseModel: failing });

      const error = await manager.respond({ query: EXPLICIT_QUERY }).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(GenerationFailureError);
      expect(error).toMatchObject({ message: 'Base model "failing" failed: upstream unavailable' });
      expect(manager.holdsAdapter).toBe(false);
    });

    it('refuses to run twice', async () => {
      const { manager } = setup();
      await manager.decide({ query: EXPLICIT_QUERY });
      await expect(manager.decide({ query: EXPLICIT_QUERY })).rejects.toThrow('single-use');
    });
  });

  describe('metrics sink failures', () => {
    it('answers the request when the sink throws', async () => {
      const { manager } = setup({
        metricsSink: {
          record() {
            throw new Error('disk full');
          },
        },
      });

      const response = await manager.respond({ query: EXPLICIT_QUERY });
      expect(response.adaptation.enabled).toBe(true);
    });

    it('answers the request when the sink rejects', async () => {
      const { manager } = setup({ metricsSink: { record: () => Promise.reject(new Error('disk full')) } });

      const response = await manager.respond({ query: EXPLICIT_QUERY });
      await new Promise((resolve) => setImmediate(resolve));

      expect(response.adaptation.enabled).toBe(true);
      expect(process.stderr.write).toHaveBeenCalledWith(expect.stringContaining('Metrics sink failed'));
    });
  });
});
