/**
 * Classifier Routes
 * =================
 * GET  /         — liveness + configured dataset types
 * POST /predict  — batch classification
 * GET  /models   — artifact presence and cache state per dataset type
 */

import type { FastifyInstance } from 'fastify';
import { MalformedInputError, PredictionTimeoutError } from '../../../common/errors.js';
import { withTimeout } from '../../../common/timeout.js';
import { PredictRequestSchema } from '../contracts/request.schema.js';
import type { ModelConfig } from '../config/model.config.js';
import type { ModelRegistry } from '../runtime/model.registry.js';
import type { InferencePipeline } from '../services/inference.pipeline.js';
import { normalize } from '../services/input.normalizer.js';
import { assemble } from '../services/response.assembler.js';

export const SERVICE_NAME = 'Exoplanet Classification API';

export interface ClassifierRouteDeps {
  config: ModelConfig;
  registry: ModelRegistry;
  pipeline: InferencePipeline;
  predictTimeoutMs: number;
}

export async function registerClassifierRoutes(
  fastify: FastifyInstance,
  deps: ClassifierRouteDeps
): Promise<void> {
  const { config, registry, pipeline, predictTimeoutMs } = deps;

  fastify.get('/', async () => ({
    status: 'healthy',
    service: SERVICE_NAME,
    available_datasets: config.listDatasetTypes(),
  }));

  fastify.post<{ Body: unknown }>('/predict', async (request) => {
    const parsed = PredictRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw new MalformedInputError(parsed.error.issues[0]?.message ?? 'Invalid request body');
    }
    const { dataset_type: datasetType, data } = parsed.data;

    config.require(datasetType);
    const rows = normalize(data);

    request.log.info(
      { datasetType, samples: rows.length },
      `Received prediction request for ${rows.length} samples using ${datasetType} model`
    );

    const results = await withTimeout(
      () => pipeline.predict(datasetType, rows),
      predictTimeoutMs,
      () => new PredictionTimeoutError(predictTimeoutMs)
    );
    const response = assemble(datasetType, rows, results);

    request.log.info({ datasetType, samples: response.num_samples }, 'Prediction succeeded');
    return response;
  });

  fastify.get('/models', async () => {
    const statuses = registry.describeAll();
    return Object.fromEntries(
      Object.entries(statuses).map(([datasetType, s]) => [
        datasetType,
        {
          model_exists: s.artifactExists,
          preprocessor_exists: s.preprocessorExists,
          cached: s.cached,
        },
      ])
    );
  });
}
