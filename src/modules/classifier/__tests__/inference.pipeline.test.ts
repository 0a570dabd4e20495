/**
 * Inference Pipeline Tests
 */

import { describe, it, expect } from 'vitest';
import { InferencePipeline, dropIgnoredColumns, labelFor } from '../services/inference.pipeline.js';
import { ModelRegistry } from '../runtime/model.registry.js';
import { FeaturePreprocessor } from '../models/preprocessor.js';
import { normalize } from '../services/input.normalizer.js';
import type { Classifier } from '../contracts/classifier.types.js';
import {
  ArtifactLoadError,
  FeatureMismatchError,
  InternalInvariantViolation,
  MalformedInputError,
  UnknownDatasetTypeError,
} from '../../../common/errors.js';
import { captureRejection, fixtureConfig } from './helpers.js';

function createPipeline(): InferencePipeline {
  const config = fixtureConfig();
  return new InferencePipeline(new ModelRegistry({ config }), config);
}

function pipelineWithClassifier(classifier: Classifier): InferencePipeline {
  const config = fixtureConfig();
  const registry = new ModelRegistry({
    config,
    loader: async () => ({
      classifier,
      preprocessor: new FeaturePreprocessor([
        { name: 'koi_period', kind: 'numeric', fill: 0, mean: 0, scale: 1 },
        { name: 'koi_depth', kind: 'numeric', fill: 0, mean: 0, scale: 1 },
      ]),
    }),
  });
  return new InferencePipeline(registry, config);
}

describe('InferencePipeline', () => {

  describe('labelFor', () => {
    it('should label at or above 0.5 as CONFIRMED', () => {
      expect(labelFor(0.5)).toBe('CONFIRMED');
      expect(labelFor(0.93)).toBe('CONFIRMED');
      expect(labelFor(0.4999)).toBe('FALSE POSITIVE');
    });
  });

  describe('dropIgnoredColumns', () => {
    it('should drop listed columns and columns containing a listed substring', () => {
      const entry = fixtureConfig().require('kepler');
      const rows = dropIgnoredColumns(
        [{ koi_period: 1, kepid: 7, koi_depth: 2, koi_depth_lim: 0, koi_disposition: 'CONFIRMED' }],
        entry
      );
      expect(rows).toEqual([{ koi_period: 1, koi_depth: 2 }]);
    });
  });

  describe('predict', () => {
    it('should return one result per row', async () => {
      const rows = normalize({ koi_period: [10.5, 20.3], koi_depth: [100.5, 200.8] });
      const results = await createPipeline().predict('kepler', rows);

      expect(results).toHaveLength(2);
      expect(results.map((r) => r.label)).toEqual(['FALSE POSITIVE', 'FALSE POSITIVE']);
      for (const r of results) {
        expect(r.probabilities[0] + r.probabilities[1]).toBeCloseTo(1, 6);
      }
    });

    it('should report [false-positive, confirmed] probabilities', async () => {
      const [result] = await createPipeline().predict('kepler', [{ koi_period: 5, koi_depth: 3 }]);

      expect(result.label).toBe('CONFIRMED');
      expect(result.probabilities[1]).toBeCloseTo(0.8807970779778823, 12);
      expect(result.probabilities[0]).toBeCloseTo(0.11920292202211769, 12);
    });

    it('should label an even split as CONFIRMED', async () => {
      const [result] = await createPipeline().predict('kepler', [{ koi_period: 4, koi_depth: 4 }]);

      expect(result).toEqual({ label: 'CONFIRMED', probabilities: [0.5, 0.5] });
    });

    it('should keep labels consistent with probabilities and preserve row order', async () => {
      const rows = [
        { koi_period: 1, koi_depth: 9 },
        { koi_period: 9, koi_depth: 1 },
        { koi_period: 3, koi_depth: 3.5 },
        { koi_period: 3.5, koi_depth: 3 },
      ];
      const results = await createPipeline().predict('kepler', rows);

      expect(results.map((r) => r.label)).toEqual([
        'FALSE POSITIVE',
        'CONFIRMED',
        'FALSE POSITIVE',
        'CONFIRMED',
      ]);
      for (const r of results) {
        expect(r.label).toBe(r.probabilities[1] >= 0.5 ? 'CONFIRMED' : 'FALSE POSITIVE');
        expect(r.probabilities[0] + r.probabilities[1]).toBeCloseTo(1, 6);
      }
    });

    it('should ignore identifier and flag columns configured for the dataset', async () => {
      const results = await createPipeline().predict('kepler', [
        { kepid: 10797460, koi_period: 5, koi_depth: 3, koi_period_lim: 0 },
      ]);
      expect(results[0].label).toBe('CONFIRMED');
    });

    it('should be deterministic across calls', async () => {
      const pipeline = createPipeline();
      const rows = normalize([{ koi_period: 2, koi_depth: 1 }, { koi_period: 0.5, koi_depth: 7 }]);

      expect(await pipeline.predict('kepler', rows)).toEqual(await pipeline.predict('kepler', rows));
    });

    it('should score with a decision tree', async () => {
      const results = await createPipeline().predict('tess', [
        { pl_rade: 3, st_class: 'giant' },
        { pl_rade: 10, st_class: 'giant' },
        { pl_rade: 10, st_class: 'dwarf' },
        { pl_rade: null, st_class: null },
      ]);

      expect(results.map((r) => r.probabilities[1])).toEqual([0.9, 0.05, 0.3, 0.9]);
      expect(results.map((r) => r.label)).toEqual([
        'CONFIRMED',
        'FALSE POSITIVE',
        'FALSE POSITIVE',
        'CONFIRMED',
      ]);
    });

    it('should fail with FeatureMismatch naming missing and unexpected features', async () => {
      const err = await captureRejection(
        createPipeline().predict('kepler', [{ koi_period: 5, foo: 1 }])
      );

      expect(err).toBeInstanceOf(FeatureMismatchError);
      expect(err).toMatchObject({
        statusCode: 400,
        message: 'Row 0 does not match the kepler feature schema: missing [koi_depth]; unexpected [foo]',
        details: { row: 0, missing: ['koi_depth'], unexpected: ['foo'] },
      });
    });

    it('should fail with MalformedInput for non-numeric values', async () => {
      const err = await captureRejection(
        createPipeline().predict('kepler', [
          { koi_period: 5, koi_depth: 3 },
          { koi_period: 'long', koi_depth: 3 },
        ])
      );
      expect(err).toBeInstanceOf(MalformedInputError);
    });

    it('should propagate registry failures', async () => {
      const pipeline = createPipeline();
      expect(await captureRejection(pipeline.predict('unknown_x', [{ a: 1 }]))).toBeInstanceOf(
        UnknownDatasetTypeError
      );
      expect(await captureRejection(pipeline.predict('broken', [{ a: 1 }]))).toBeInstanceOf(
        ArtifactLoadError
      );
    });

    it('should treat a short classifier output as an internal invariant violation', async () => {
      const pipeline = pipelineWithClassifier({
        type: 'logistic',
        inputWidth: 2,
        predictProba: () => [0.7],
      });

      const err = await captureRejection(
        pipeline.predict('kepler', [{ koi_period: 1, koi_depth: 1 }, { koi_period: 2, koi_depth: 2 }])
      );
      expect(err).toBeInstanceOf(InternalInvariantViolation);
      expect(err).toMatchObject({ statusCode: 500 });
    });

    it('should treat an out-of-range probability as an internal invariant violation', async () => {
      const pipeline = pipelineWithClassifier({
        type: 'logistic',
        inputWidth: 2,
        predictProba: (X) => X.map(() => 1.5),
      });

      const err = await captureRejection(pipeline.predict('kepler', [{ koi_period: 1, koi_depth: 1 }]));
      expect(err).toBeInstanceOf(InternalInvariantViolation);
    });
  });
});
