/**
 * Logistic Regression Classifier
 * ==============================
 * Inference-only: weights and bias come from a fitted artifact.
 */

import type { Classifier } from '../contracts/classifier.types.js';

function sigmoid(z: number): number {
  // Numeric stability
  if (z >= 0) {
    const ez = Math.exp(-z);
    return 1 / (1 + ez);
  } else {
    const ez = Math.exp(z);
    return ez / (1 + ez);
  }
}

export interface LogRegParams {
  weights: readonly number[];
  bias: number;
}

export class LogisticRegression implements Classifier {
  readonly type = 'logistic' as const;
  private readonly weights: readonly number[];
  private readonly bias: number;

  constructor(params: LogRegParams) {
    this.weights = Object.freeze([...params.weights]);
    this.bias = params.bias;
  }

  get inputWidth(): number {
    return this.weights.length;
  }

  predictProbaOne(x: readonly number[]): number {
    let z = this.bias;
    for (let j = 0; j < this.weights.length; j++) {
      z += this.weights[j] * (x[j] ?? 0);
    }
    return sigmoid(z);
  }

  predictProba(X: readonly number[][]): number[] {
    return X.map((row) => this.predictProbaOne(row));
  }
}
