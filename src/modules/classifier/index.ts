/**
 * Classifier Module Public API
 */

import type { FastifyInstance } from 'fastify';
import { ModelConfig } from './config/model.config.js';
import { ModelRegistry, type Clock, type Logger } from './runtime/model.registry.js';
import type { ArtifactLoader } from './runtime/artifact.loader.js';
import { InferencePipeline } from './services/inference.pipeline.js';
import { registerClassifierRoutes } from './routes/classifier.routes.js';

export { ModelConfig, type ModelConfigEntry } from './config/model.config.js';
export { ModelRegistry, type Clock, type Logger } from './runtime/model.registry.js';
export { loadJsonArtifacts, type ArtifactLoader, type LoadedArtifacts } from './runtime/artifact.loader.js';
export { InferencePipeline } from './services/inference.pipeline.js';
export { normalize } from './services/input.normalizer.js';
export { assemble } from './services/response.assembler.js';
export * from './contracts/classifier.types.js';

export interface ClassifierModuleDeps {
  config: ModelConfig;
  predictTimeoutMs: number;
  logger?: Logger;
  loader?: ArtifactLoader;
  clock?: Clock;
}

export interface ClassifierModule {
  config: ModelConfig;
  registry: ModelRegistry;
  pipeline: InferencePipeline;
}

export function createClassifierModule(deps: ClassifierModuleDeps): ClassifierModule {
  const registry = new ModelRegistry({
    config: deps.config,
    loader: deps.loader,
    logger: deps.logger,
    clock: deps.clock,
  });
  const pipeline = new InferencePipeline(registry, deps.config);
  return { config: deps.config, registry, pipeline };
}

export async function registerClassifierModule(
  fastify: FastifyInstance,
  deps: ClassifierModuleDeps
): Promise<ClassifierModule> {
  const mod = createClassifierModule({ ...deps, logger: deps.logger ?? fastify.log });
  await registerClassifierRoutes(fastify, {
    config: mod.config,
    registry: mod.registry,
    pipeline: mod.pipeline,
    predictTimeoutMs: deps.predictTimeoutMs,
  });
  fastify.log.info(
    { datasets: mod.config.listDatasetTypes() },
    'Classifier module registered'
  );
  return mod;
}
