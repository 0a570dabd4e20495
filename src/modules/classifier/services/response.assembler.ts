import { InternalInvariantViolation } from '../../../common/errors.js';
import type {
  DatasetType,
  FeatureRow,
  PredictionResponse,
  PredictionResult,
  ProbabilityPair,
} from '../contracts/classifier.types.js';

export function assemble(
  datasetType: DatasetType,
  rows: readonly FeatureRow[],
  results: readonly PredictionResult[]
): PredictionResponse {
  if (rows.length !== results.length) {
    throw new InternalInvariantViolation(
      `Result count ${results.length} does not match row count ${rows.length}`,
      { datasetType, rows: rows.length, results: results.length }
    );
  }

  return {
    predictions: results.map((r) => r.label),
    probabilities: results.map((r): ProbabilityPair => [r.probabilities[0], r.probabilities[1]]),
    dataset_type: datasetType,
    num_samples: rows.length,
  };
}
