import { type FastifyBaseLogger } from "fastify";
import { InvalidInputError } from "../errors/index.js";
import { type GradeAnalysis, type Statistics } from "../types/stats.js";
import {
  calculateExtrema,
  calculateHistogramBuckets,
  calculateMean,
  calculateMedian,
  calculateStandardDeviation,
} from "../util.js";
import { parseGradeList } from "./parse.js";

export function computeStatistics(grades: number[]): Statistics {
  if (grades.length === 0) {
    throw new InvalidInputError();
  }
  const sorted = [...grades].sort((a, b) => a - b);
  const { min, max } = calculateExtrema(sorted);
  if (min === max) {
    return {
      count: grades.length,
      mean: min,
      median: min,
      standardDeviation: 0,
      min,
      max,
    };
  }
  // Rounding in the sum can leave the mean just outside the extrema.
  const mean = Math.min(Math.max(calculateMean(grades), min), max);
  return {
    count: grades.length,
    mean,
    median: calculateMedian(sorted, true),
    standardDeviation: calculateStandardDeviation(grades),
    min,
    max,
  };
}

export function analyzeGrades({
  text,
  bucketCount,
  logger,
}: {
  text: string;
  bucketCount: number;
  logger?: FastifyBaseLogger;
}): GradeAnalysis {
  const { grades, ignoredTokens } = parseGradeList(text);
  if (ignoredTokens.length > 0) {
    logger?.debug(
      { ignoredCount: ignoredTokens.length },
      "Skipped non-numeric grade tokens",
    );
  }
  const stats = computeStatistics(grades);
  const histogram = calculateHistogramBuckets(grades, bucketCount);
  return {
    stats,
    histogram,
    grades,
    ignoredTokens,
    ignoredCount: ignoredTokens.length,
  };
}
