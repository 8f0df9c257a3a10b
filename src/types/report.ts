/**
 * Core data model for the metric pivot report
 */

/**
 * Scalar value of a single input cell
 */
export type CellValue = number | string | boolean | null;

/**
 * One input row: column header -> cell value. One record per entity
 * (category or service).
 */
export type InputRecord = Record<string, CellValue>;

/**
 * Column computed as the element-wise sum of two other output columns
 */
export interface DerivedColumnSpec {
  /** Header of the computed column */
  name: string;
  sourceA: string;
  sourceB: string;
  /** Column the derived column is placed immediately after */
  insertAfter: string;
}

/**
 * Parameters of a single pivot run
 */
export interface PivotConfig {
  /** Input column holding each record's entity identifier */
  keyColumn: string;
  /** Output rows, in order */
  metricOrder: readonly string[];
  /** Output columns, in order */
  entityOrder: readonly string[];
  derivedColumn?: DerivedColumnSpec;
}

/**
 * Non-fatal condition raised while pivoting
 */
export type PivotWarning =
  | { type: "ENTITY_NOT_FOUND"; entity: string; message: string }
  | {
      type: "METRIC_NOT_FOUND";
      entity: string;
      metric: string;
      message: string;
    }
  | {
      type: "DUPLICATE_KEY";
      entity: string;
      occurrences: number;
      message: string;
    }
  | {
      type: "NON_NUMERIC_VALUE";
      entity: string;
      metric: string;
      value: string;
      message: string;
    }
  | {
      type: "DERIVED_COLUMN_SKIPPED";
      column: string;
      missingColumns: string[];
      message: string;
    };

export type PivotWarningType = PivotWarning["type"];

/**
 * One output row: a metric and its value in each output column
 */
export interface OutputRow {
  metric: string;
  /** Aligned with {@link OutputTable.columns} */
  values: number[];
}

/**
 * Transposed report: one row per metric, one column per entity
 */
export interface OutputTable {
  /** Header of the leading row-label column */
  rowLabel: string;
  metrics: string[];
  /** Entity columns in order, plus the derived column when created */
  columns: string[];
  rows: OutputRow[];
  metadata: {
    /** Number of entity columns, excluding any derived column */
    baseColumnCount: number;
    /** Name of the derived column, or null when none was created */
    derivedColumn: string | null;
    missingEntities: string[];
    warnings: PivotWarning[];
  };
}
