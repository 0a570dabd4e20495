/**
 * ARTIFACT SCHEMAS
 * ================
 * On-disk JSON formats for fitted preprocessors and classifiers.
 * Artifacts are produced by the offline training job; the service only
 * reads them.
 */

import { z } from 'zod';

export const PREPROCESSOR_FORMAT = 'exoplanet-preprocessor/v1';
export const CLASSIFIER_FORMAT = 'exoplanet-classifier/v1';

// ═══════════════════════════════════════════════════════════════
// PREPROCESSOR
// ═══════════════════════════════════════════════════════════════

export const NumericFeatureSpecSchema = z.object({
  name: z.string().min(1),
  kind: z.literal('numeric'),
  fill: z.number().finite(),
  mean: z.number().finite(),
  scale: z.number().finite(),
});

export const CategoricalFeatureSpecSchema = z.object({
  name: z.string().min(1),
  kind: z.literal('categorical'),
  categories: z.array(z.string()).min(1),
  fill: z.string().optional(),
});

export const FeatureSpecSchema = z.discriminatedUnion('kind', [
  NumericFeatureSpecSchema,
  CategoricalFeatureSpecSchema,
]);

export const PreprocessorArtifactSchema = z
  .object({
    format: z.literal(PREPROCESSOR_FORMAT),
    features: z.array(FeatureSpecSchema).min(1),
  })
  .refine((a) => new Set(a.features.map((f) => f.name)).size === a.features.length, {
    message: 'feature names must be unique',
  });

export type NumericFeatureSpec = z.infer<typeof NumericFeatureSpecSchema>;
export type CategoricalFeatureSpec = z.infer<typeof CategoricalFeatureSpecSchema>;
export type FeatureSpec = z.infer<typeof FeatureSpecSchema>;
export type PreprocessorArtifact = z.infer<typeof PreprocessorArtifactSchema>;

// ═══════════════════════════════════════════════════════════════
// CLASSIFIER
// ═══════════════════════════════════════════════════════════════

export type TreeNode =
  | { type: 'leaf'; p: number }
  | { type: 'split'; feature: number; threshold: number; left: TreeNode; right: TreeNode };

export const TreeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('leaf'), p: z.number().min(0).max(1) }),
    z.object({
      type: z.literal('split'),
      feature: z.number().int().min(0),
      threshold: z.number().finite(),
      left: TreeNodeSchema,
      right: TreeNodeSchema,
    }),
  ])
);

export const ClassifierArtifactSchema = z.object({
  format: z.literal(CLASSIFIER_FORMAT),
  model: z.discriminatedUnion('type', [
    z.object({
      type: z.literal('logistic'),
      weights: z.array(z.number().finite()).min(1),
      bias: z.number().finite(),
    }),
    z.object({
      type: z.literal('tree'),
      inputWidth: z.number().int().positive(),
      root: TreeNodeSchema,
    }),
  ]),
});

export type ClassifierArtifact = z.infer<typeof ClassifierArtifactSchema>;
