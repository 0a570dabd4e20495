/**
 * CLASSIFIER TYPES
 */

export type DatasetType = string;

export const CONFIRMED_LABEL = 'CONFIRMED';
export const FALSE_POSITIVE_LABEL = 'FALSE POSITIVE';

export type PredictionLabel = typeof CONFIRMED_LABEL | typeof FALSE_POSITIVE_LABEL;

/** p(confirmed) at or above this is labelled CONFIRMED. */
export const CONFIRMED_THRESHOLD = 0.5;

export type FeatureValue = number | string | boolean | null;

export type FeatureRow = Record<string, FeatureValue>;

/** [false-positive probability, confirmed probability] */
export type ProbabilityPair = [number, number];

export interface PredictionResult {
  label: PredictionLabel;
  probabilities: ProbabilityPair;
}

export interface PredictionResponse {
  predictions: PredictionLabel[];
  probabilities: ProbabilityPair[];
  dataset_type: DatasetType;
  num_samples: number;
}

export interface ModelStatus {
  artifactExists: boolean;
  preprocessorExists: boolean;
  cached: boolean;
}

// ═══════════════════════════════════════════════════════════════
// LOADED HANDLES
// ═══════════════════════════════════════════════════════════════

export interface Preprocessor {
  /** Raw feature names a row must carry, in transform order. */
  readonly expectedFeatures: readonly string[];
  /** Columns in the transformed matrix. */
  readonly outputWidth: number;
  transform(rows: readonly FeatureRow[]): number[][];
}

export interface Classifier {
  readonly type: 'logistic' | 'tree';
  /** Required input width. */
  readonly inputWidth: number;
  /** Probability of the CONFIRMED class, one per matrix row. */
  predictProba(X: readonly number[][]): number[];
}

export interface CachedModelEntry {
  readonly datasetType: DatasetType;
  readonly classifier: Classifier;
  readonly preprocessor: Preprocessor;
  readonly loadedAt: number;
}
