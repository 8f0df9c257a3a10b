/**
 * @fileoverview Report Preview
 *
 * Plain-text summary of an output table for console display.
 */

import type { OutputTable } from "../types/report";

export interface PreviewOptions {
  /** Table rows to print (default: 5) */
  maxRows?: number;
  /** Items listed per metric/column list before eliding (default: 10) */
  maxListItems?: number;
  /** Columns included in the coverage summary (default: 5) */
  coverageColumns?: number;
}

function formatList(items: string[], limit: number, noun: string): string[] {
  const lines = items
    .slice(0, limit)
    .map((item, index) => `  ${index + 1}. ${item}`);
  if (items.length > limit) {
    lines.push(`  ... and ${items.length - limit} more ${noun}`);
  }
  return lines;
}

/**
 * Render the first rows as an aligned text grid. The row-label column is
 * left-aligned; value columns are right-aligned.
 */
export function formatTableGrid(table: OutputTable, maxRows: number): string[] {
  const grid: string[][] = [
    [table.rowLabel, ...table.columns],
    ...table.rows
      .slice(0, maxRows)
      .map((row) => [row.metric, ...row.values.map(String)]),
  ];

  const widths = grid[0].map((_, col) =>
    Math.max(...grid.map((cells) => cells[col].length)),
  );

  return grid.map((cells) =>
    cells
      .map((cell, col) =>
        col === 0 ? cell.padEnd(widths[col]) : cell.padStart(widths[col]),
      )
      .join("  "),
  );
}

/**
 * Build the preview lines printed after a report is written
 */
export function formatPreview(
  table: OutputTable,
  options: PreviewOptions = {},
): string[] {
  const maxRows = options.maxRows ?? 5;
  const maxListItems = options.maxListItems ?? 10;
  const coverageColumns = options.coverageColumns ?? 5;

  const lines: string[] = [
    `Output shape: ${table.rows.length} rows × ${table.columns.length} columns`,
    "",
    "Metrics (rows):",
    ...formatList(table.metrics, maxListItems, "metrics"),
    "",
    "Columns:",
    ...formatList(table.columns, maxListItems, "columns"),
    "",
    `First ${Math.min(maxRows, table.rows.length)} rows:`,
    ...formatTableGrid(table, maxRows),
    "",
    "Coverage (non-zero metrics):",
  ];

  table.columns.slice(0, coverageColumns).forEach((column, col) => {
    const nonZero = table.rows.filter((row) => row.values[col] !== 0).length;
    lines.push(`  ${column}: ${nonZero}/${table.rows.length}`);
  });
  if (table.columns.length > coverageColumns) {
    lines.push(
      `  ... and ${table.columns.length - coverageColumns} more columns`,
    );
  }

  return lines;
}
