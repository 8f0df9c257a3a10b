/**
 * @fileoverview Record Lookup Index
 *
 * Indexes input records by their key-column value so each entity lookup is a
 * single map access instead of a scan over the records.
 */

import type { CellValue, InputRecord, OutputTable } from "../types/report";

/**
 * Read-only key -> record index built once per pivot run
 */
export interface RecordIndex {
  /** Number of distinct keys */
  readonly size: number;
  /** Keys seen more than once, with their total occurrence count */
  readonly duplicateKeys: ReadonlyMap<string, number>;
  get(key: string): InputRecord | undefined;
  has(key: string): boolean;
}

/**
 * Converts a key cell to its lookup form; null and missing keys never match
 */
export function toLookupKey(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return String(value);
}

/**
 * Build the key -> record index. When several records share a key, the first
 * one encountered wins and later ones are only counted.
 */
export function buildRecordIndex(
  records: readonly InputRecord[],
  keyColumn: string,
): RecordIndex {
  const byKey = new Map<string, InputRecord>();
  const occurrences = new Map<string, number>();

  for (const record of records) {
    const key = toLookupKey(record[keyColumn]);
    if (key === null) continue;

    occurrences.set(key, (occurrences.get(key) ?? 0) + 1);
    if (!byKey.has(key)) {
      byKey.set(key, record);
    }
  }

  const duplicateKeys = new Map<string, number>();
  for (const [key, count] of occurrences) {
    if (count > 1) {
      duplicateKeys.set(key, count);
    }
  }

  return {
    size: byKey.size,
    duplicateKeys,
    get: (key) => byKey.get(key),
    has: (key) => byKey.has(key),
  };
}

/**
 * Read a single cell of an output table
 *
 * @returns The cell value, or undefined when the metric or column is unknown
 */
export function getCell(
  table: OutputTable,
  metric: string,
  column: string,
): number | undefined {
  const columnIndex = table.columns.indexOf(column);
  if (columnIndex === -1) return undefined;

  const row = table.rows.find((r) => r.metric === metric);
  return row?.values[columnIndex];
}
