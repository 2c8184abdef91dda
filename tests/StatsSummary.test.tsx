// @vitest-environment jsdom
import { afterEach, describe, expect, it } from "vitest";
import { cleanup, render, screen, within } from "@testing-library/react";
import StatsSummary from "../src/client/components/StatsSummary.js";
import { type GradeAnalysis } from "../src/types/stats.js";

const analysis: GradeAnalysis = {
  stats: {
    count: 3,
    mean: 80,
    median: 80,
    standardDeviation: 8.16496580927726,
    min: 70,
    max: 90,
  },
  histogram: {
    bucketWidth: 10,
    buckets: [
      { start: 70, end: 80, count: 1 },
      { start: 80, end: 90, count: 2 },
    ],
  },
  grades: [70, 80, 90],
  ignoredTokens: [],
  ignoredCount: 0,
};

afterEach(() => {
  cleanup();
});

describe("StatsSummary", () => {
  it("shows each statistic with two decimals", () => {
    render(<StatsSummary analysis={analysis} />);
    const table = screen.getByRole("table", { name: "Statistics" });
    const row = (label: string) =>
      within(table).getByRole("rowheader", { name: label }).nextElementSibling?.textContent;
    expect(row("Count")).toBe("3");
    expect(row("Mean")).toBe("80.00");
    expect(row("Standard Deviation")).toBe("8.16");
    expect(row("Minimum")).toBe("70.00");
    expect(row("Maximum")).toBe("90.00");
  });

  it("lists the histogram buckets", () => {
    render(<StatsSummary analysis={analysis} />);
    const table = screen.getByRole("table", { name: "Histogram buckets" });
    const cells = within(table)
      .getAllByRole("cell")
      .map((cell) => cell.textContent);
    expect(cells).toEqual(["70.00 - 80.00", "1", "80.00 - 90.00", "2"]);
  });

  it("renders one row per bucket even when bucket starts coincide", () => {
    render(
      <StatsSummary
        analysis={{
          ...analysis,
          histogram: {
            bucketWidth: 0,
            buckets: [
              { start: 5, end: 5, count: 1 },
              { start: 5, end: 6, count: 2 },
            ],
          },
        }}
      />,
    );
    const table = screen.getByRole("table", { name: "Histogram buckets" });
    expect(within(table).getAllByRole("row")).toHaveLength(3);
  });

  it("mentions ignored entries only when there are some", () => {
    const { rerender } = render(<StatsSummary analysis={analysis} />);
    expect(screen.queryByRole("note")).toBeNull();

    rerender(
      <StatsSummary
        analysis={{ ...analysis, ignoredTokens: ["abc", "n/a"], ignoredCount: 2 }}
      />,
    );
    expect(screen.getByRole("note").textContent).toBe(
      "Ignored 2 invalid entries: abc, n/a",
    );
  });
});
