import { describe, expect, it } from "vitest";
import { analyzeGrades, computeStatistics } from "../src/functions/analyze.js";
import { InvalidInputError } from "../src/errors/index.js";

describe("computeStatistics", () => {
  it("summarises the sample grades", () => {
    const stats = computeStatistics([85, 92, 78, 88, 95, 82, 90, 87, 91, 84]);
    expect(stats.count).toBe(10);
    expect(stats.mean).toBeCloseTo(87.2, 10);
    expect(stats.median).toBe(87.5);
    expect(stats.standardDeviation).toBeCloseTo(4.8332184, 6);
    expect(stats.min).toBe(78);
    expect(stats.max).toBe(95);
  });

  it("treats a single grade as its own mean, median and extrema", () => {
    expect(computeStatistics([100])).toEqual({
      count: 1,
      mean: 100,
      median: 100,
      standardDeviation: 0,
      min: 100,
      max: 100,
    });
  });

  it("keeps the mean between the extrema and the deviation non-negative", () => {
    const lists = [[1, 2, 3], [-4.5, 10, 0.25], [60, 60, 61], [33]];
    for (const grades of lists) {
      const stats = computeStatistics(grades);
      expect(stats.mean).toBeGreaterThanOrEqual(stats.min);
      expect(stats.mean).toBeLessThanOrEqual(stats.max);
      expect(stats.standardDeviation).toBeGreaterThanOrEqual(0);
    }
  });

  it("returns the exact value for repeated decimals", () => {
    expect(computeStatistics([0.1, 0.1, 0.1])).toEqual({
      count: 3,
      mean: 0.1,
      median: 0.1,
      standardDeviation: 0,
      min: 0.1,
      max: 0.1,
    });
  });

  it("keeps the mean within the extrema for fractional and extreme lists", () => {
    const lists = [
      [0.1, 0.2, 0.3],
      [0.1, 0.1, 0.2],
      [88.7, 88.7, 88.7, 88.7, 88.7, 88.7, 88.8],
      [1e100, -1e100],
      [1e100, 1e100, 9.99e99],
      [1e-200, 2e-200],
    ];
    for (const grades of lists) {
      const stats = computeStatistics(grades);
      expect(stats.mean).toBeGreaterThanOrEqual(stats.min);
      expect(stats.mean).toBeLessThanOrEqual(stats.max);
      expect(Number.isFinite(stats.standardDeviation)).toBe(true);
      expect(stats.standardDeviation).toBeGreaterThan(0);
    }
  });

  it("reports a positive deviation when any value differs", () => {
    expect(computeStatistics([60, 60, 61]).standardDeviation).toBeGreaterThan(0);
  });

  it("does not reorder the caller's list", () => {
    const grades = [9, 1, 5];
    computeStatistics(grades);
    expect(grades).toEqual([9, 1, 5]);
  });

  it("throws on an empty list", () => {
    expect(() => computeStatistics([])).toThrow(InvalidInputError);
  });
});

describe("analyzeGrades", () => {
  it("returns statistics, buckets and the parsed grades", () => {
    const analysis = analyzeGrades({ text: "70, 80, x, 90", bucketCount: 2 });
    expect(analysis.grades).toEqual([70, 80, 90]);
    expect(analysis.ignoredTokens).toEqual(["x"]);
    expect(analysis.ignoredCount).toBe(1);
    expect(analysis.stats.median).toBe(80);
    expect(analysis.histogram).toEqual({
      bucketWidth: 10,
      buckets: [
        { start: 70, end: 80, count: 1 },
        { start: 80, end: 90, count: 2 },
      ],
    });
  });

  it("bucket counts add up to the number of grades", () => {
    const analysis = analyzeGrades({
      text: "55, 61.5, 62, 70, 71, 88, 89.9, 90, 99, 100, 100",
      bucketCount: 7,
    });
    const total = analysis.histogram.buckets.reduce((acc, b) => acc + b.count, 0);
    expect(total).toBe(analysis.stats.count);
  });

  it("uses one bucket for a single grade", () => {
    const analysis = analyzeGrades({ text: "100", bucketCount: 10 });
    expect(analysis.histogram.buckets).toEqual([{ start: 100, end: 100, count: 1 }]);
  });

  it("summarises a long run of identical decimals", () => {
    const analysis = analyzeGrades({
      text: Array(7).fill("88.7").join(", "),
      bucketCount: 10,
    });
    expect(analysis.stats.mean).toBe(88.7);
    expect(analysis.stats.standardDeviation).toBe(0);
    expect(analysis.histogram.buckets).toEqual([{ start: 88.7, end: 88.7, count: 7 }]);
  });

  it("handles the largest accepted magnitudes", () => {
    const analysis = analyzeGrades({ text: "1e100, -1e100", bucketCount: 10 });
    expect(analysis.stats.mean).toBe(0);
    expect(analysis.stats.median).toBe(0);
    expect(analysis.stats.standardDeviation).toBe(1e100);
    expect(Number.isFinite(analysis.histogram.bucketWidth)).toBe(true);
    const total = analysis.histogram.buckets.reduce((acc, b) => acc + b.count, 0);
    expect(total).toBe(2);
  });

  it("bucket counts add up for fractional and extreme lists", () => {
    const texts = ["0.1, 0.2, 0.3, 0.1", "1e100, 1e100, 9.99e99", "1e-200, 2e-200, 3e-200"];
    for (const text of texts) {
      const analysis = analyzeGrades({ text, bucketCount: 10 });
      const total = analysis.histogram.buckets.reduce((acc, b) => acc + b.count, 0);
      expect(total).toBe(analysis.stats.count);
    }
  });

  it("rejects grades whose magnitude would overflow", () => {
    expect(() => analyzeGrades({ text: "1e308, -1e308", bucketCount: 10 })).toThrow(
      InvalidInputError,
    );
  });

  it("throws when nothing parses", () => {
    expect(() => analyzeGrades({ text: "n/a", bucketCount: 10 })).toThrow(InvalidInputError);
  });
});
