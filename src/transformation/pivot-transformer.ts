/**
 * @fileoverview Pivot Transformer
 *
 * Turns entity-per-row metric exports into a metric-per-row report whose row
 * and column order is fixed by the caller. Gaps in the input are zero-filled
 * and reported as warnings; only configuration problems are fatal.
 */

import { Logger } from "../utils/logger";
import { ConfigurationError, generateCorrelationId } from "../types/errors";
import type {
  CellValue,
  InputRecord,
  OutputTable,
  PivotConfig,
  PivotWarning,
} from "../types/report";
import { buildRecordIndex } from "./record-index";

interface PivotColumn {
  name: string;
  values: number[];
}

/**
 * Convert a raw cell to a metric value.
 *
 * Blank, null and NaN cells count as 0. Numeric strings are parsed after
 * stripping thousands separators and dollar signs.
 *
 * @returns The numeric value, or null when the cell holds non-numeric text
 */
export function toMetricNumber(value: CellValue | undefined): number | null {
  if (value === null || value === undefined) {
    return 0;
  }

  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }

  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }

  const trimmed = value.trim();
  if (trimmed === "") {
    return 0;
  }

  const cleaned = trimmed.replace(/[,$]/g, "");
  const parsed = Number(cleaned);
  if (cleaned === "" || !Number.isFinite(parsed)) {
    return null;
  }
  return parsed;
}

function findDuplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      duplicates.add(value);
    }
    seen.add(value);
  }
  return Array.from(duplicates);
}

/**
 * Check a pivot configuration before any record is read
 *
 * @throws {ConfigurationError} When the configuration cannot produce a table
 */
export function validatePivotConfig(
  config: PivotConfig,
  correlationId: string,
): void {
  if (!config.keyColumn || config.keyColumn.trim() === "") {
    throw new ConfigurationError(
      "Pivot configuration requires a key column",
      correlationId,
      "keyColumn",
    );
  }

  if (config.metricOrder.length === 0) {
    throw new ConfigurationError(
      "Pivot configuration requires at least one metric",
      correlationId,
      "metricOrder",
    );
  }

  if (config.entityOrder.length === 0) {
    throw new ConfigurationError(
      "Pivot configuration requires at least one entity",
      correlationId,
      "entityOrder",
    );
  }

  const duplicateMetrics = findDuplicates(config.metricOrder);
  if (duplicateMetrics.length > 0) {
    throw new ConfigurationError(
      `Duplicate metrics in metric order: ${duplicateMetrics.join(", ")}`,
      correlationId,
      "metricOrder",
      { duplicates: duplicateMetrics },
    );
  }

  const duplicateEntities = findDuplicates(config.entityOrder);
  if (duplicateEntities.length > 0) {
    throw new ConfigurationError(
      `Duplicate entities in entity order: ${duplicateEntities.join(", ")}`,
      correlationId,
      "entityOrder",
      { duplicates: duplicateEntities },
    );
  }

  const derived = config.derivedColumn;
  if (derived) {
    if (!derived.name || derived.name.trim() === "") {
      throw new ConfigurationError(
        "Derived column requires a name",
        correlationId,
        "derivedColumn.name",
      );
    }
    if (config.entityOrder.includes(derived.name)) {
      throw new ConfigurationError(
        `Derived column '${derived.name}' collides with an entity column`,
        correlationId,
        "derivedColumn.name",
      );
    }
  }
}

/**
 * Pivot Transformer
 *
 * Stateless apart from its logger; every call builds and returns its own table.
 */
export class PivotTransformer {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger || new Logger("PivotTransformer");
  }

  /**
   * Pivot input records into an output table
   *
   * @throws {ConfigurationError} For an invalid configuration, or when no
   * record carries the key column
   */
  transform(
    records: readonly InputRecord[],
    config: PivotConfig,
    correlationId: string = generateCorrelationId(),
  ): OutputTable {
    validatePivotConfig(config, correlationId);

    const { keyColumn, metricOrder, entityOrder } = config;

    if (
      records.length > 0 &&
      !records.some((record) => Object.hasOwn(record, keyColumn))
    ) {
      throw new ConfigurationError(
        `Missing required column: ${keyColumn}`,
        correlationId,
        "keyColumn",
        { keyColumn },
      );
    }

    this.logger.info("Starting pivot transformation", {
      correlationId,
      keyColumn,
      recordCount: records.length,
      metricCount: metricOrder.length,
      entityCount: entityOrder.length,
    });

    const index = buildRecordIndex(records, keyColumn);
    const warnings: PivotWarning[] = [];
    const missingEntities: string[] = [];
    const columns: PivotColumn[] = [];

    for (const entity of entityOrder) {
      const record = index.get(entity);

      if (!record) {
        missingEntities.push(entity);
        warnings.push({
          type: "ENTITY_NOT_FOUND",
          entity,
          message: `Entity '${entity}' not found in data`,
        });
        this.logger.warn("Entity not found, filling with zeros", {
          correlationId,
          entity,
        });
        columns.push({ name: entity, values: metricOrder.map(() => 0) });
        continue;
      }

      const occurrences = index.duplicateKeys.get(entity);
      if (occurrences !== undefined) {
        warnings.push({
          type: "DUPLICATE_KEY",
          entity,
          occurrences,
          message: `Entity '${entity}' appears ${occurrences} times; using the first record`,
        });
        this.logger.warn("Duplicate entity rows, using the first", {
          correlationId,
          entity,
          occurrences,
        });
      }

      columns.push({
        name: entity,
        values: metricOrder.map((metric) =>
          this.readMetric(record, entity, metric, warnings, correlationId),
        ),
      });
    }

    const derivedColumn = this.insertDerivedColumn(
      columns,
      config,
      warnings,
      correlationId,
    );

    const table: OutputTable = {
      rowLabel: keyColumn,
      metrics: [...metricOrder],
      columns: columns.map((column) => column.name),
      rows: metricOrder.map((metric, rowIndex) => ({
        metric,
        values: columns.map((column) => column.values[rowIndex]),
      })),
      metadata: {
        baseColumnCount: entityOrder.length,
        derivedColumn,
        missingEntities,
        warnings,
      },
    };

    this.logger.info("Pivot transformation completed", {
      correlationId,
      rowCount: table.rows.length,
      columnCount: table.columns.length,
      missingEntities: missingEntities.length,
      warningsCount: warnings.length,
    });

    return table;
  }

  /**
   * Read and normalize one metric of a matched record
   */
  private readMetric(
    record: InputRecord,
    entity: string,
    metric: string,
    warnings: PivotWarning[],
    correlationId: string,
  ): number {
    if (!Object.hasOwn(record, metric)) {
      warnings.push({
        type: "METRIC_NOT_FOUND",
        entity,
        metric,
        message: `Metric '${metric}' not found for entity '${entity}'`,
      });
      this.logger.debug("Metric column missing, using 0", {
        correlationId,
        entity,
        metric,
      });
      return 0;
    }

    const raw = record[metric];
    const value = toMetricNumber(raw);
    if (value === null) {
      warnings.push({
        type: "NON_NUMERIC_VALUE",
        entity,
        metric,
        value: String(raw),
        message: `Non-numeric value '${String(raw)}' for metric '${metric}' of entity '${entity}'`,
      });
      this.logger.warn("Non-numeric metric value, using 0", {
        correlationId,
        entity,
        metric,
        value: String(raw),
      });
      return 0;
    }
    return value;
  }

  /**
   * Add the derived sum column after its anchor, when all its inputs exist
   *
   * @returns The derived column name, or null when it was not created
   */
  private insertDerivedColumn(
    columns: PivotColumn[],
    config: PivotConfig,
    warnings: PivotWarning[],
    correlationId: string,
  ): string | null {
    const derived = config.derivedColumn;
    if (!derived) return null;

    const byName = new Map(columns.map((column) => [column.name, column]));
    const sourceA = byName.get(derived.sourceA);
    const sourceB = byName.get(derived.sourceB);
    const anchorIndex = columns.findIndex(
      (column) => column.name === derived.insertAfter,
    );

    if (!sourceA || !sourceB || anchorIndex === -1) {
      const missingColumns = Array.from(
        new Set(
          [derived.sourceA, derived.sourceB, derived.insertAfter].filter(
            (name) => !byName.has(name),
          ),
        ),
      );
      warnings.push({
        type: "DERIVED_COLUMN_SKIPPED",
        column: derived.name,
        missingColumns,
        message: `Could not create '${derived.name}' column (missing: ${missingColumns.join(", ")})`,
      });
      this.logger.warn("Derived column skipped", {
        correlationId,
        column: derived.name,
        missingColumns,
      });
      return null;
    }

    columns.splice(anchorIndex + 1, 0, {
      name: derived.name,
      values: sourceA.values.map((value, i) => value + sourceB.values[i]),
    });

    this.logger.debug("Derived column added", {
      correlationId,
      column: derived.name,
      insertAfter: derived.insertAfter,
    });

    return derived.name;
  }
}

/**
 * Convenience function to pivot records with a default transformer
 */
export function transform(
  records: readonly InputRecord[],
  config: PivotConfig,
  correlationId?: string,
): OutputTable {
  return new PivotTransformer().transform(records, config, correlationId);
}
