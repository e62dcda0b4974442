import type { ComparisonRow } from "../types/index.js";

const HEADERS = ["Policy", "Throughput", "Turnaround", "Context Switches"];

export function formatComparison(rows: readonly ComparisonRow[]): string {
  const cells = rows.map((row) => [
    row.policy,
    row.throughput.toFixed(4),
    row.meanTurnaround.toFixed(4),
    String(row.contextSwitches),
  ]);

  const widths = HEADERS.map((header, col) =>
    Math.max(header.length, ...cells.map((line) => line[col].length))
  );
  const render = (line: string[]) =>
    line
      .map((cell, col) => (col === 0 ? cell.padEnd(widths[col]) : cell.padStart(widths[col])))
      .join(" | ");

  return [
    render(HEADERS),
    widths.map((w) => "-".repeat(w)).join("-+-"),
    ...cells.map(render),
  ].join("\n");
}
