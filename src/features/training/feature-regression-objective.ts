import type { LowRankWeights } from '@domain/types/adapter.js';
import type { TrainingInstance } from '@domain/types/example.js';
import type { ITrainingObjective } from '@domain/ports/training-objective.js';
import { encodeText } from './feature-encoder.js';

/** Ridge term added to the Gram diagonal; keeps the solve defined for repeated prompts. */
export const RIDGE_LAMBDA = 1e-3;

interface EncodedBatch {
  /** n×dim prompt features */
  x: Float32Array[];
  /** n×dim target residuals y − x */
  residual: Float64Array[];
  /** n×rank hidden activations xA */
  hidden: Float64Array[];
}

function encodeBatch(weights: LowRankWeights, batch: readonly TrainingInstance[]): EncodedBatch {
  const { dim, rank, a } = weights;
  const x: Float32Array[] = [];
  const residual: Float64Array[] = [];
  const hidden: Float64Array[] = [];

  for (const instance of batch) {
    const xi = encodeText(instance.prompt, dim);
    const yi = encodeText(instance.target, dim);

    const r = new Float64Array(dim);
    for (let k = 0; k < dim; k++) r[k] = yi[k] - xi[k];

    const h = new Float64Array(rank);
    for (let i = 0; i < dim; i++) {
      const v = xi[i];
      if (v === 0) continue;
      const row = i * rank;
      for (let j = 0; j < rank; j++) h[j] += v * a[row + j];
    }

    x.push(xi);
    residual.push(r);
    hidden.push(h);
  }
  return { x, residual, hidden };
}

/**
 * Solve (G + λI) C = R for C by Gaussian elimination with partial pivoting.
 * G is n×n, R is n×dim; returns C as n rows of length dim.
 */
function solveRidge(gram: Float64Array[], rhs: Float64Array[], lambda: number): Float64Array[] {
  const n = gram.length;
  const m = gram.map((row, i) => {
    const copy = Float64Array.from(row);
    copy[i] += lambda;
    return copy;
  });
  const c = rhs.map((row) => Float64Array.from(row));

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r][col]) > Math.abs(m[pivot][col])) pivot = r;
    }
    if (pivot !== col) {
      [m[col], m[pivot]] = [m[pivot], m[col]];
      [c[col], c[pivot]] = [c[pivot], c[col]];
    }

    const diag = m[col][col];
    for (let r = col + 1; r < n; r++) {
      const factor = m[r][col] / diag;
      if (factor === 0) continue;
      for (let k = col; k < n; k++) m[r][k] -= factor * m[col][k];
      const target = c[r];
      const source = c[col];
      for (let k = 0; k < target.length; k++) target[k] -= factor * source[k];
    }
  }

  for (let col = n - 1; col >= 0; col--) {
    const row = c[col];
    for (let k = col + 1; k < n; k++) {
      const factor = m[col][k];
      if (factor === 0) continue;
      const solved = c[k];
      for (let d = 0; d < row.length; d++) row[d] -= factor * solved[d];
    }
    const diag = m[col][col];
    for (let d = 0; d < row.length; d++) row[d] /= diag;
  }
  return c;
}

/**
 * Default training objective.
 *
 * The frozen encoder maps prompt and target to unit feature vectors x and y.
 * The adapted prediction is ŷ = x + (xA)B and the loss is the batch mean of
 * ‖ŷ − y‖², which starts in [0, 4] because B starts at zero.
 *
 * A stays at its seeded projection; only B trains. Each step moves B a
 * `learningRate` fraction of the way toward the ridge least-squares fit
 * B* = Hᵀ(HHᵀ + λI)⁻¹(Y − X), where H = XA. With A fixed the residual
 * shrinks by a factor of (1 − learningRate) per step, so the trajectory is
 * monotone and reproducible.
 */
export class FeatureRegressionObjective implements ITrainingObjective {
  readonly name = 'feature-regression';

  constructor(private readonly lambda: number = RIDGE_LAMBDA) {}

  step(weights: LowRankWeights, batch: readonly TrainingInstance[], learningRate: number): number {
    if (batch.length === 0) return 0;

    const { dim, rank, b } = weights;
    const { x, residual, hidden } = encodeBatch(weights, batch);

    const gram = hidden.map((hi) =>
      Float64Array.from(hidden, (hj) => {
        let dot = 0;
        for (let j = 0; j < rank; j++) dot += hi[j] * hj[j];
        return dot;
      }),
    );
    const coefficients = solveRidge(gram, residual, this.lambda);

    // B ← B + η (Hᵀ C − B)
    for (let j = 0; j < rank; j++) {
      const row = j * dim;
      for (let k = 0; k < dim; k++) {
        let fit = 0;
        for (let n = 0; n < hidden.length; n++) fit += hidden[n][j] * coefficients[n][k];
        b[row + k] += learningRate * (fit - b[row + k]);
      }
    }

    return batchLoss(weights, x, residual, hidden);
  }
}

/** Mean ‖(xA)B − (y − x)‖² over the batch, at the weights as they are now. */
function batchLoss(
  weights: LowRankWeights,
  x: readonly Float32Array[],
  residual: readonly Float64Array[],
  hidden: readonly Float64Array[],
): number {
  const { dim, rank, b } = weights;
  let total = 0;
  for (let n = 0; n < x.length; n++) {
    const h = hidden[n];
    const r = residual[n];
    for (let k = 0; k < dim; k++) {
      let delta = 0;
      for (let j = 0; j < rank; j++) delta += h[j] * b[j * dim + k];
      const e = delta - r[k];
      total += e * e;
    }
  }
  return total / x.length;
}
