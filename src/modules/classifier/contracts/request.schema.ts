import { z } from 'zod';

export const PredictRequestSchema = z.object({
  dataset_type: z
    .string({ required_error: "Missing 'dataset_type' field" })
    .trim()
    .min(1, "Missing 'dataset_type' field")
    .transform((s) => s.toLowerCase()),
  data: z.unknown().refine((v) => v !== undefined && v !== null, "Missing 'data' field"),
});

export type PredictRequest = z.infer<typeof PredictRequestSchema>;
