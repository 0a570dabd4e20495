import { describe, it, expect } from 'vitest';
import { assemble } from '../services/response.assembler.js';
import { InternalInvariantViolation } from '../../../common/errors.js';
import type { PredictionResult } from '../contracts/classifier.types.js';

describe('ResponseAssembler', () => {
  const results: PredictionResult[] = [
    { label: 'CONFIRMED', probabilities: [0.1, 0.9] },
    { label: 'FALSE POSITIVE', probabilities: [0.8, 0.2] },
  ];

  it('should package results in row order', () => {
    const response = assemble('kepler', [{ koi_period: 1 }, { koi_period: 2 }], results);

    expect(response).toEqual({
      predictions: ['CONFIRMED', 'FALSE POSITIVE'],
      probabilities: [
        [0.1, 0.9],
        [0.8, 0.2],
      ],
      dataset_type: 'kepler',
      num_samples: 2,
    });
  });

  it('should throw an invariant violation when counts differ', () => {
    expect(() => assemble('kepler', [{ koi_period: 1 }], results)).toThrow(InternalInvariantViolation);
    expect(() => assemble('kepler', [{ koi_period: 1 }], results)).toThrow(
      'Result count 2 does not match row count 1'
    );
  });
});
