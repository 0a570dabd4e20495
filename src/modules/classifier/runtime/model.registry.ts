/**
 * MODEL REGISTRY
 * ==============
 * Owns the process-local cache of loaded artifact pairs.
 *
 * - Lazy: a dataset's pair is read on its first request.
 * - Single-flight: concurrent misses for one dataset share one load.
 * - Append-only: entries are frozen and never evicted; restart to reload.
 */

import fs from 'fs';
import { ArtifactLoadError } from '../../../common/errors.js';
import type { CachedModelEntry, DatasetType, ModelStatus } from '../contracts/classifier.types.js';
import type { ModelConfig } from '../config/model.config.js';
import { loadJsonArtifacts, type ArtifactLoader } from './artifact.loader.js';
import { RequestCoalescer } from './request-coalescer.js';

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export interface Clock {
  now: () => number;
}

export interface ModelRegistryDeps {
  config: ModelConfig;
  loader?: ArtifactLoader;
  logger?: Logger;
  clock?: Clock;
}

const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export class ModelRegistry {
  private readonly cache = new Map<DatasetType, CachedModelEntry>();
  private readonly loads = new RequestCoalescer<DatasetType, CachedModelEntry>();
  private readonly config: ModelConfig;
  private readonly loader: ArtifactLoader;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: ModelRegistryDeps) {
    this.config = deps.config;
    this.loader = deps.loader ?? loadJsonArtifacts;
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? { now: () => Date.now() };
  }

  async getOrLoad(datasetType: DatasetType): Promise<CachedModelEntry> {
    const cached = this.cache.get(datasetType);
    if (cached) {
      this.logger.debug?.({ datasetType }, 'Using cached model');
      return cached;
    }

    const entry = this.config.require(datasetType);
    return this.loads.run(datasetType, async () => {
      const started = this.clock.now();
      this.logger.info({ datasetType }, 'Loading model');

      try {
        const { classifier, preprocessor } = await this.loader(entry);
        const loaded: CachedModelEntry = Object.freeze({
          datasetType,
          classifier,
          preprocessor,
          loadedAt: this.clock.now(),
        });
        this.cache.set(datasetType, loaded);
        this.logger.info(
          { datasetType, classifier: classifier.type, durationMs: loaded.loadedAt - started },
          'Model loaded'
        );
        return loaded;
      } catch (err) {
        const failure =
          err instanceof ArtifactLoadError
            ? err
            : new ArtifactLoadError(
                datasetType,
                entry.modelPath,
                err instanceof Error ? err.message : String(err),
                err
              );
        this.logger.error({ datasetType, err: failure }, 'Model load failed');
        throw failure;
      }
    });
  }

  isCached(datasetType: DatasetType): boolean {
    return this.cache.has(datasetType);
  }

  describe(datasetType: DatasetType): ModelStatus {
    const entry = this.config.lookup(datasetType);
    if (!entry) {
      return { artifactExists: false, preprocessorExists: false, cached: false };
    }
    return {
      artifactExists: fs.existsSync(entry.modelPath),
      preprocessorExists: fs.existsSync(entry.preprocessorPath),
      cached: this.isCached(datasetType),
    };
  }

  describeAll(): Record<DatasetType, ModelStatus> {
    const out: Record<DatasetType, ModelStatus> = {};
    for (const datasetType of this.config.listDatasetTypes()) {
      out[datasetType] = this.describe(datasetType);
    }
    return out;
  }
}
