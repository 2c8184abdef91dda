import { type HistogramBucket } from "./types/stats.js";

export const calculateMean = <T extends number>(arr: T[]): number => {
  if (arr.length === 0) return 0;
  const sum = arr.reduce((acc, curr) => acc + curr, 0);
  return sum / arr.length;
};

export const calculateMedian = <T extends number>(arr: T[], isSorted: boolean): number => {
  if (arr.length === 0) return 0;
  const sortedArr = isSorted ? arr : [...arr].sort((a, b) => a - b);
  const mid = Math.floor(sortedArr.length / 2);

  if (sortedArr.length % 2 === 0) {
    return (sortedArr[mid - 1] + sortedArr[mid]) / 2;
  } else {
    return sortedArr[mid];
  }
};

/**
 * Population standard deviation: the sum of squared deviations is divided by
 * the number of values, not by n - 1. Deviations are scaled by the largest one
 * before squaring so very small or very large grades neither underflow to 0
 * nor overflow.
 */
export const calculateStandardDeviation = <T extends number>(arr: T[]): number => {
  if (arr.length === 0) return 0;
  const mean = calculateMean(arr);
  const differences = arr.map((num) => num - mean);
  const scale = differences.reduce((acc, curr) => Math.max(acc, Math.abs(curr)), 0);
  if (scale === 0) return 0;
  const sumOfSquaredDifferences = differences.reduce(
    (acc, curr) => acc + Math.pow(curr / scale, 2),
    0,
  );
  const variance = sumOfSquaredDifferences / arr.length;
  return scale * Math.sqrt(variance);
};

export const calculateExtrema = <T extends number>(arr: T[]): { min: number; max: number } => {
  if (arr.length === 0) return { min: 0, max: 0 };
  let min = arr[0];
  let max = arr[0];
  for (const val of arr) {
    if (val < min) min = val;
    if (val > max) max = val;
  }
  return { min, max };
};

/**
 * Splits [min, max] into `numBins` equal-width buckets. Every bucket is
 * half-open except the last, which also holds `max`. A sequence with a single
 * distinct value collapses to one bucket.
 */
export const calculateHistogramBuckets = <T extends number>(
  arr: T[],
  numBins: number,
): { bucketWidth: number; buckets: HistogramBucket[] } => {
  if (arr.length === 0) return { bucketWidth: 0, buckets: [] };
  const { min, max } = calculateExtrema(arr);
  if (min === max) {
    return {
      bucketWidth: 0,
      buckets: [{ start: min, end: max, count: arr.length }],
    };
  }

  const binSize = (max - min) / numBins;
  const bins: number[] = Array(numBins).fill(0);
  for (const val of arr) {
    const binIndex = Math.min(Math.max(Math.floor((val - min) / binSize), 0), numBins - 1);
    bins[binIndex] += 1;
  }

  return {
    bucketWidth: binSize,
    buckets: bins.map((count, i) => ({
      start: min + i * binSize,
      end: i === numBins - 1 ? max : min + (i + 1) * binSize,
      count,
    })),
  };
};
