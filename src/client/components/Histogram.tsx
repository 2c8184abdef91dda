import { useEffect, useRef } from "react";
import type { Config, Data, Layout } from "plotly.js";
import { type Histogram as HistogramData } from "../../types/stats.js";
import { formatStat } from "../utils.js";

export interface HistogramProps {
  histogram: HistogramData;
  mean: number;
  median: number;
  xAxisTitle?: string;
  yAxisTitle?: string;
}

const BAR_COLOR = "skyblue";
const MEAN_COLOR = "red";
const MEDIAN_COLOR = "green";

function markerLine(name: string, x: number, height: number, color: string): Data {
  return {
    x: [x, x],
    y: [0, height],
    type: "scatter",
    mode: "lines",
    name,
    line: { color, dash: "dash", width: 2 },
  };
}

export function buildHistogramFigure({
  histogram,
  mean,
  median,
  xAxisTitle = "Grade",
  yAxisTitle = "Frequency",
}: HistogramProps): { data: Data[]; layout: Partial<Layout> } {
  const { buckets, bucketWidth } = histogram;
  const peak = Math.max(0, ...buckets.map((b) => b.count));
  // A collapsed histogram has zero width; draw it as a unit-wide bar.
  const width = bucketWidth > 0 ? bucketWidth : 1;

  const bars: Data = {
    x: buckets.map((b) => (b.start + b.end) / 2),
    y: buckets.map((b) => b.count),
    type: "bar",
    width,
    name: "Grades",
    opacity: 0.7,
    marker: { color: BAR_COLOR, line: { color: "black", width: 1 } },
  };

  return {
    data: [
      bars,
      markerLine(`Mean: ${formatStat(mean)}`, mean, peak, MEAN_COLOR),
      markerLine(`Median: ${formatStat(median)}`, median, peak, MEDIAN_COLOR),
    ],
    layout: {
      title: { text: "Grade Distribution" },
      xaxis: { title: { text: xAxisTitle }, gridcolor: "#e5e5e5" },
      yaxis: { title: { text: yAxisTitle }, rangemode: "tozero", gridcolor: "#e5e5e5" },
      bargap: 0,
      plot_bgcolor: "white",
      paper_bgcolor: "white",
      margin: { l: 60, r: 30, t: 50, b: 60 },
    },
  };
}

export function Histogram(props: HistogramProps) {
  const plotRef = useRef<HTMLDivElement>(null);
  const { histogram, mean, median, xAxisTitle, yAxisTitle } = props;

  useEffect(() => {
    const element = plotRef.current;
    if (!element || histogram.buckets.length === 0) return;
    let cancelled = false;
    let purge: ((root: HTMLElement) => void) | null = null;

    const config: Partial<Config> = { displayModeBar: false, responsive: true };
    const { data, layout } = buildHistogramFigure({
      histogram,
      mean,
      median,
      xAxisTitle,
      yAxisTitle,
    });

    import("plotly.js-dist-min")
      .then(({ default: Plotly }) => {
        if (cancelled) return;
        purge = Plotly.purge;
        return Plotly.newPlot(element, data, layout, config);
      })
      .catch((e: unknown) => {
        console.error("Failed to draw histogram:", e);
      });

    return () => {
      cancelled = true;
      if (purge) purge(element);
    };
  }, [histogram, mean, median, xAxisTitle, yAxisTitle]);

  return <div ref={plotRef} />;
}
