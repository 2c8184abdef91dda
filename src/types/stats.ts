import { z } from "zod";
import { MAX_HISTOGRAM_BUCKETS } from "../constants.js";

export const analyzeRequestSchema = z.object({
  grades: z.string(),
  buckets: z.optional(
    z.coerce
      .number()
      .int("Bucket count must be a whole number.")
      .min(1, "At least one bucket is required.")
      .max(
        MAX_HISTOGRAM_BUCKETS,
        `At most ${MAX_HISTOGRAM_BUCKETS} buckets are allowed.`,
      ),
  ),
});

export type AnalyzeRequest = z.infer<typeof analyzeRequestSchema>;

// The client form always submits a bucket count.
export const analyzeFormSchema = analyzeRequestSchema.extend({
  grades: z.string().trim().min(1, "Enter at least one grade."),
  buckets: analyzeRequestSchema.shape.buckets.unwrap(),
});

export type AnalyzeFormData = z.infer<typeof analyzeFormSchema>;

export const statisticsSchema = z.object({
  count: z.number().int().min(1),
  mean: z.number(),
  median: z.number(),
  standardDeviation: z.number().min(0),
  min: z.number(),
  max: z.number(),
});

export type Statistics = z.infer<typeof statisticsSchema>;

export const histogramBucketSchema = z.object({
  start: z.number(),
  end: z.number(),
  count: z.number().int().min(0),
});

export type HistogramBucket = z.infer<typeof histogramBucketSchema>;

export const histogramSchema = z.object({
  bucketWidth: z.number().min(0),
  buckets: z.array(histogramBucketSchema),
});

export type Histogram = z.infer<typeof histogramSchema>;

export const gradeAnalysisSchema = z.object({
  stats: statisticsSchema,
  histogram: histogramSchema,
  grades: z.array(z.number()),
  ignoredTokens: z.array(z.string()),
  ignoredCount: z.number().int().min(0),
});

export type GradeAnalysis = z.infer<typeof gradeAnalysisSchema>;

export const errorResponseSchema = z.object({
  error: z.literal(true),
  name: z.string(),
  id: z.number(),
  message: z.string(),
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;
