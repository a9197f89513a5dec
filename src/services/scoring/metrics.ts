/**
 * Binary classification metrics over probability scores.
 * Curves are built at every distinct score threshold and integrated with the
 * trapezoidal rule, so tied scores contribute half credit.
 */

export class MetricError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MetricError";
  }
}

export type ClassificationCurve = {
  /** Cumulative false positives at each threshold (decreasing thresholds). */
  fps: number[];
  /** Cumulative true positives at each threshold. */
  tps: number[];
  thresholds: number[];
};

export type RocCurve = { fpr: number[]; tpr: number[]; thresholds: number[] };

export type PrecisionRecallCurve = {
  precision: number[];
  recall: number[];
  thresholds: number[];
};

function checkInputs(yTrue: number[], yScore: (number | null)[]): number[] {
  if (yTrue.length !== yScore.length) {
    throw new MetricError(
      `Found input variables with inconsistent numbers of samples: [${yTrue.length}, ${yScore.length}]`
    );
  }
  if (yTrue.length === 0) {
    throw new MetricError("Found array with 0 sample(s) while a minimum of 1 is required.");
  }
  for (const label of yTrue) {
    if (label !== 0 && label !== 1) {
      throw new MetricError(`Labels must be binary (0 or 1), got ${label}`);
    }
  }
  return yScore.map((s) => {
    if (s === null || Number.isNaN(s)) throw new MetricError("Input contains NaN.");
    if (!Number.isFinite(s)) throw new MetricError("Input contains infinity.");
    return s;
  });
}

export function binaryClassificationCurve(
  yTrue: number[],
  yScore: (number | null)[]
): ClassificationCurve {
  const scores = checkInputs(yTrue, yScore);
  const order = scores.map((_, i) => i).sort((a, b) => scores[b] - scores[a]);

  const fps: number[] = [];
  const tps: number[] = [];
  const thresholds: number[] = [];
  let tp = 0;
  let fp = 0;
  for (let k = 0; k < order.length; k++) {
    const i = order[k];
    if (yTrue[i] === 1) tp++;
    else fp++;
    if (k === order.length - 1 || scores[order[k + 1]] !== scores[i]) {
      fps.push(fp);
      tps.push(tp);
      thresholds.push(scores[i]);
    }
  }
  return { fps, tps, thresholds };
}

export function rocCurve(yTrue: number[], yScore: (number | null)[]): RocCurve {
  const { fps, tps, thresholds } = binaryClassificationCurve(yTrue, yScore);
  const totalFp = fps[fps.length - 1];
  const totalTp = tps[tps.length - 1];
  // Undefined rates (no negatives or no positives) come out as NaN.
  return {
    fpr: [0, ...fps.map((f) => f / totalFp)],
    tpr: [0, ...tps.map((t) => t / totalTp)],
    thresholds: [Infinity, ...thresholds]
  };
}

export function rocAucScore(yTrue: number[], yScore: (number | null)[]): number {
  checkInputs(yTrue, yScore);
  if (new Set(yTrue).size !== 2) {
    throw new MetricError(
      "Only one class present in y_true. ROC AUC score is not defined in that case."
    );
  }
  const { fpr, tpr } = rocCurve(yTrue, yScore);
  return auc(fpr, tpr);
}

/**
 * Points are ordered by decreasing recall and end at (recall 0, precision 1),
 * which has no threshold.
 */
export function precisionRecallCurve(
  yTrue: number[],
  yScore: (number | null)[]
): PrecisionRecallCurve {
  const { fps, tps, thresholds } = binaryClassificationCurve(yTrue, yScore);
  const totalTp = tps[tps.length - 1];
  const precision = tps.map((t, i) => {
    const predictedPositive = t + fps[i];
    return predictedPositive === 0 ? 0 : t / predictedPositive;
  });
  const recall = totalTp === 0 ? tps.map(() => 1) : tps.map((t) => t / totalTp);
  return {
    precision: [...precision.reverse(), 1],
    recall: [...recall.reverse(), 0],
    thresholds: thresholds.reverse()
  };
}

/** Trapezoidal area under (x, y); x must be monotonic in either direction. */
export function auc(x: number[], y: number[]): number {
  if (x.length !== y.length) {
    throw new MetricError(`x and y must have the same length, got ${x.length} and ${y.length}`);
  }
  if (x.length < 2) {
    throw new MetricError(
      `At least 2 points are needed to compute area under curve, but x has ${x.length}`
    );
  }
  let direction = 1;
  const dx = x.slice(1).map((v, i) => v - x[i]);
  if (dx.some((d) => d < 0)) {
    if (dx.every((d) => d <= 0)) direction = -1;
    else throw new MetricError("x is neither increasing nor decreasing");
  }
  let area = 0;
  for (let i = 0; i < dx.length; i++) {
    area += (dx[i] * (y[i] + y[i + 1])) / 2;
  }
  return direction * area;
}
