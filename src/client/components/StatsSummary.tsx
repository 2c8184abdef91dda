import React from "react";
import { Table } from "react-bootstrap";
import { type GradeAnalysis } from "../../types/stats.js";
import { formatBucketRange, formatStat } from "../utils.js";

interface StatsSummaryProps {
  analysis: GradeAnalysis;
}

const StatsSummary: React.FC<StatsSummaryProps> = ({ analysis }) => {
  const { stats, histogram, ignoredTokens } = analysis;
  const rows: [string, string][] = [
    ["Count", stats.count.toString()],
    ["Mean", formatStat(stats.mean)],
    ["Median", formatStat(stats.median)],
    ["Standard Deviation", formatStat(stats.standardDeviation)],
    ["Minimum", formatStat(stats.min)],
    ["Maximum", formatStat(stats.max)],
  ];
  return (
    <div className="d-flex flex-column">
      <Table size="sm" className="mb-3" aria-label="Statistics">
        <tbody>
          {rows.map(([label, value]) => (
            <tr key={label}>
              <th scope="row">{label}</th>
              <td className="stat-value">{value}</td>
            </tr>
          ))}
        </tbody>
      </Table>
      {ignoredTokens.length > 0 && (
        <p className="text-warning mb-2" role="note">
          Ignored {ignoredTokens.length} invalid{" "}
          {ignoredTokens.length === 1 ? "entry" : "entries"}:{" "}
          {ignoredTokens.join(", ")}
        </p>
      )}
      <Table size="sm" striped aria-label="Histogram buckets">
        <thead>
          <tr>
            <th>Range</th>
            <th>Frequency</th>
          </tr>
        </thead>
        <tbody>
          {histogram.buckets.map((bucket, i) => (
            <tr key={i}>
              <td>{formatBucketRange(bucket.start, bucket.end)}</td>
              <td className="stat-value">{bucket.count}</td>
            </tr>
          ))}
        </tbody>
      </Table>
    </div>
  );
};

export default StatsSummary;
