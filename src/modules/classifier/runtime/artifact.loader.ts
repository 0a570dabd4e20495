/**
 * ARTIFACT LOADER
 * ===============
 * Reads a classifier/preprocessor pair from disk and turns it into
 * in-memory handles. Every failure surfaces as ArtifactLoadError.
 */

import { readFile } from 'fs/promises';
import type { z } from 'zod';
import { ArtifactLoadError } from '../../../common/errors.js';
import type { Classifier, Preprocessor } from '../contracts/classifier.types.js';
import {
  ClassifierArtifactSchema,
  PreprocessorArtifactSchema,
  type ClassifierArtifact,
} from '../contracts/artifact.schema.js';
import type { ModelConfigEntry } from '../config/model.config.js';
import { LogisticRegression } from '../models/logreg.model.js';
import { DecisionTree } from '../models/tree.model.js';
import { FeaturePreprocessor } from '../models/preprocessor.js';

export interface LoadedArtifacts {
  classifier: Classifier;
  preprocessor: Preprocessor;
}

export type ArtifactLoader = (entry: ModelConfigEntry) => Promise<LoadedArtifacts>;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

async function readJsonArtifact<S extends z.ZodTypeAny>(
  datasetType: string,
  filePath: string,
  schema: S
): Promise<z.output<S>> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (err) {
    const reason = errorCode(err) === 'ENOENT' ? 'file not found' : 'file is unreadable';
    throw new ArtifactLoadError(datasetType, filePath, reason, err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ArtifactLoadError(datasetType, filePath, 'file is not valid JSON', err);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
      .join('; ');
    throw new ArtifactLoadError(datasetType, filePath, `unsupported format (${issues})`);
  }
  return parsed.data;
}

function buildClassifier(artifact: ClassifierArtifact): Classifier {
  const model = artifact.model;
  if (model.type === 'logistic') {
    return new LogisticRegression({ weights: model.weights, bias: model.bias });
  }
  return new DecisionTree(model.root, model.inputWidth);
}

function assertCompatible(
  entry: ModelConfigEntry,
  classifier: Classifier,
  preprocessor: Preprocessor
): void {
  if (classifier.inputWidth !== preprocessor.outputWidth) {
    throw new ArtifactLoadError(
      entry.datasetType,
      entry.modelPath,
      `classifier expects ${classifier.inputWidth} inputs but preprocessor produces ${preprocessor.outputWidth}`
    );
  }
  if (classifier instanceof DecisionTree && classifier.maxFeatureIndex() >= classifier.inputWidth) {
    throw new ArtifactLoadError(
      entry.datasetType,
      entry.modelPath,
      `tree splits on feature ${classifier.maxFeatureIndex()} beyond input width ${classifier.inputWidth}`
    );
  }
}

/**
 * Default loader: JSON artifacts on the local filesystem.
 */
export const loadJsonArtifacts: ArtifactLoader = async (entry) => {
  const [classifierArtifact, preprocessorArtifact] = await Promise.all([
    readJsonArtifact(entry.datasetType, entry.modelPath, ClassifierArtifactSchema),
    readJsonArtifact(entry.datasetType, entry.preprocessorPath, PreprocessorArtifactSchema),
  ]);

  const classifier = buildClassifier(classifierArtifact);
  const preprocessor = new FeaturePreprocessor(preprocessorArtifact.features);
  assertCompatible(entry, classifier, preprocessor);

  return { classifier, preprocessor };
};
