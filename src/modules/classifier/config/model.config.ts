/**
 * MODEL CONFIG
 * ============
 * Static table: dataset type → artifact pair. Built once at boot and
 * never mutated.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { UnknownDatasetTypeError } from '../../../common/errors.js';
import type { DatasetType } from '../contracts/classifier.types.js';

const DatasetEntrySchema = z.object({
  model: z.string().min(1),
  preprocessor: z.string().min(1),
  ignoredColumns: z.array(z.string()).default([]),
  ignoredColumnSubstrings: z.array(z.string().min(1)).default([]),
});

export const ModelConfigFileSchema = z.object({
  datasets: z
    .record(z.string().regex(/^[a-z0-9_-]+$/, 'dataset type keys must be lower-case'), DatasetEntrySchema)
    .refine((d) => Object.keys(d).length > 0, { message: 'at least one dataset is required' }),
});

export interface ModelConfigEntry {
  readonly datasetType: DatasetType;
  readonly modelPath: string;
  readonly preprocessorPath: string;
  /** Columns dropped before schema validation (identifiers, leaked labels). */
  readonly ignoredColumns: readonly string[];
  /** Any column whose name contains one of these is dropped too. */
  readonly ignoredColumnSubstrings: readonly string[];
}

export class ModelConfig {
  private readonly entries: ReadonlyMap<DatasetType, ModelConfigEntry>;

  private constructor(entries: ModelConfigEntry[]) {
    this.entries = new Map(entries.map((e) => [e.datasetType, e]));
  }

  /**
   * Relative artifact paths resolve against `baseDir`.
   */
  static fromObject(raw: unknown, baseDir: string): ModelConfig {
    const parsed = ModelConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ');
      throw new Error(`Invalid model config: ${issues}`);
    }

    const entries = Object.entries(parsed.data.datasets).map(([datasetType, e]) =>
      Object.freeze({
        datasetType,
        modelPath: path.resolve(baseDir, e.model),
        preprocessorPath: path.resolve(baseDir, e.preprocessor),
        ignoredColumns: Object.freeze([...e.ignoredColumns]),
        ignoredColumnSubstrings: Object.freeze([...e.ignoredColumnSubstrings]),
      })
    );
    return new ModelConfig(entries);
  }

  static fromFile(filePath: string): ModelConfig {
    const absolute = path.resolve(filePath);
    const raw: unknown = JSON.parse(fs.readFileSync(absolute, 'utf-8'));
    return ModelConfig.fromObject(raw, path.dirname(absolute));
  }

  lookup(datasetType: DatasetType): ModelConfigEntry | undefined {
    return this.entries.get(datasetType);
  }

  require(datasetType: DatasetType): ModelConfigEntry {
    const entry = this.lookup(datasetType);
    if (!entry) {
      throw new UnknownDatasetTypeError(datasetType, this.listDatasetTypes());
    }
    return entry;
  }

  listDatasetTypes(): DatasetType[] {
    return Array.from(this.entries.keys());
  }
}
