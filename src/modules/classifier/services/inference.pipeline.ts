/**
 * INFERENCE PIPELINE
 * ==================
 * getOrLoad → drop ignored columns → schema check → transform → classify.
 *
 * Labels come from a fixed threshold on p(confirmed) for every dataset
 * type; probabilities are reported as [false-positive, confirmed].
 * A batch either fully succeeds or throws.
 */

import { FeatureMismatchError, InternalInvariantViolation } from '../../../common/errors.js';
import {
  CONFIRMED_LABEL,
  CONFIRMED_THRESHOLD,
  FALSE_POSITIVE_LABEL,
  type DatasetType,
  type FeatureRow,
  type PredictionLabel,
  type PredictionResult,
} from '../contracts/classifier.types.js';
import type { ModelConfig, ModelConfigEntry } from '../config/model.config.js';
import type { ModelRegistry } from '../runtime/model.registry.js';

export function labelFor(pConfirmed: number): PredictionLabel {
  return pConfirmed >= CONFIRMED_THRESHOLD ? CONFIRMED_LABEL : FALSE_POSITIVE_LABEL;
}

function isIgnored(column: string, entry: ModelConfigEntry): boolean {
  return (
    entry.ignoredColumns.includes(column) ||
    entry.ignoredColumnSubstrings.some((s) => column.includes(s))
  );
}

export function dropIgnoredColumns(rows: readonly FeatureRow[], entry: ModelConfigEntry): FeatureRow[] {
  return rows.map((row) => {
    const kept: FeatureRow = {};
    for (const [k, v] of Object.entries(row)) {
      if (!isIgnored(k, entry)) kept[k] = v;
    }
    return kept;
  });
}

export function checkFeatureSchema(
  datasetType: DatasetType,
  rows: readonly FeatureRow[],
  expected: readonly string[]
): void {
  const expectedSet = new Set(expected);
  rows.forEach((row, i) => {
    const keys = Object.keys(row);
    const keySet = new Set(keys);
    const missing = expected.filter((f) => !keySet.has(f)).sort();
    const unexpected = keys.filter((k) => !expectedSet.has(k)).sort();
    if (missing.length || unexpected.length) {
      throw new FeatureMismatchError(datasetType, { row: i, missing, unexpected });
    }
  });
}

export class InferencePipeline {
  constructor(
    private readonly registry: ModelRegistry,
    private readonly config: ModelConfig
  ) {}

  async predict(datasetType: DatasetType, rows: readonly FeatureRow[]): Promise<PredictionResult[]> {
    const { preprocessor, classifier } = await this.registry.getOrLoad(datasetType);
    const entry = this.config.require(datasetType);

    const features = dropIgnoredColumns(rows, entry);
    checkFeatureSchema(datasetType, features, preprocessor.expectedFeatures);

    const matrix = preprocessor.transform(features);
    const pConfirmed = classifier.predictProba(matrix);

    if (pConfirmed.length !== rows.length) {
      throw new InternalInvariantViolation(
        `Classifier returned ${pConfirmed.length} probabilities for ${rows.length} rows`,
        { datasetType }
      );
    }

    return pConfirmed.map((p, i): PredictionResult => {
      if (!Number.isFinite(p) || p < 0 || p > 1) {
        throw new InternalInvariantViolation(`Classifier produced invalid probability ${p} for row ${i}`, {
          datasetType,
          row: i,
        });
      }
      return { label: labelFor(p), probabilities: [1 - p, p] };
    });
  }
}
