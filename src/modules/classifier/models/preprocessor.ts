/**
 * Feature Preprocessor
 * ====================
 * Fitted column transform: impute, standardize numeric features and
 * one-hot encode categorical ones. Output column order follows the
 * artifact's feature order.
 */

import { MalformedInputError } from '../../../common/errors.js';
import type { FeatureRow, FeatureValue, Preprocessor } from '../contracts/classifier.types.js';
import type {
  CategoricalFeatureSpec,
  FeatureSpec,
  NumericFeatureSpec,
} from '../contracts/artifact.schema.js';

function toNumber(value: FeatureValue, spec: NumericFeatureSpec, row: number): number {
  if (value === null) return spec.fill;
  if (typeof value === 'number') {
    if (Number.isFinite(value)) return value;
  } else if (typeof value === 'boolean') {
    return value ? 1 : 0;
  } else {
    const trimmed = value.trim();
    const parsed = trimmed === '' ? NaN : Number(trimmed);
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new MalformedInputError(
    `Row ${row}: feature '${spec.name}' must be numeric, got ${JSON.stringify(value)}`,
    { row, feature: spec.name }
  );
}

function oneHot(value: FeatureValue, spec: CategoricalFeatureSpec): number[] {
  const category = value === null ? spec.fill : String(value);
  return spec.categories.map((c) => (c === category ? 1 : 0));
}

export class FeaturePreprocessor implements Preprocessor {
  readonly expectedFeatures: readonly string[];
  readonly outputWidth: number;
  private readonly specs: readonly FeatureSpec[];

  constructor(specs: readonly FeatureSpec[]) {
    this.specs = Object.freeze(specs.map((s) => Object.freeze({ ...s })));
    this.expectedFeatures = Object.freeze(specs.map((s) => s.name));
    this.outputWidth = specs.reduce(
      (w, s) => w + (s.kind === 'numeric' ? 1 : s.categories.length),
      0
    );
  }

  transformOne(row: FeatureRow, index: number): number[] {
    const out: number[] = [];
    for (const spec of this.specs) {
      const value = row[spec.name] ?? null;
      if (spec.kind === 'numeric') {
        const v = toNumber(value, spec, index);
        out.push((v - spec.mean) / (spec.scale || 1));
      } else {
        out.push(...oneHot(value, spec));
      }
    }
    return out;
  }

  transform(rows: readonly FeatureRow[]): number[][] {
    return rows.map((row, i) => this.transformOne(row, i));
  }
}
