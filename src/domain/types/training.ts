import { z } from 'zod/v4';

export const StopMode = z.enum(['converged', 'exhausted', 'timed-out']);

export type StopMode = z.infer<typeof StopMode>;

export const AdapterRank = z.union([z.literal(8), z.literal(16), z.literal(32), z.literal(64)]);

export type AdapterRank = z.infer<typeof AdapterRank>;

export const TrainingRunSchema = z.object({
  /** Loss per completed step, in order */
  losses: z.array(z.number().min(0)),
  stopMode: StopMode,
  /** True only when the monitor saw convergence before the step budget ran out */
  earlyStopped: z.boolean(),
  timedOut: z.boolean(),
  /** Timed out before the minimum step count; no usable adapter */
  failed: z.boolean(),
  /** Loss of the weights the run hands back (its best step); null when no step ran */
  finalLoss: z.number().min(0).nullable(),
  /** 1-based step whose weights were kept; 0 when no step ran */
  bestStep: z.number().int().min(0),
  elapsedMs: z.number().min(0),
  rank: AdapterRank,
  learningRate: z.number().positive().max(1),
});

/** Immutable once training halts. */
export type TrainingRun = Readonly<Omit<z.infer<typeof TrainingRunSchema>, 'losses'>> & {
  readonly losses: readonly number[];
};
