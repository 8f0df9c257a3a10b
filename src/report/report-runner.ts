/**
 * @fileoverview Report Runner
 *
 * Runs one report end to end: load the export, check it against the preset,
 * pivot it and store the result. Fatal errors propagate before the sink is
 * touched, so a failed run never leaves a partial report behind.
 */

import path from "path";
import { Logger, createCorrelatedLogger } from "../utils/logger";
import { PivotTransformer } from "../transformation/pivot-transformer";
import { detectMetricColumns } from "../parsers/workbook-parser";
import type { ReportPreset } from "../config/report-presets";
import {
  ConfigurationError,
  generateCorrelationId,
  isReportError,
} from "../types/errors";
import type { OutputTable } from "../types/report";
import { ReportSource, WorkbookReportSource } from "./report-source";
import { FileReportSink, ReportSink } from "./report-sink";

export interface GenerateReportOptions {
  inputPath: string;
  /** Destination; defaults to `<input stem>_output.xlsx` beside the input */
  outputPath?: string;
  preset: ReportPreset;
  correlationId?: string;
  logger?: Logger;
  /** Overrides the workbook source built from inputPath */
  source?: ReportSource;
  /** Overrides the file sink built from outputPath */
  sink?: ReportSink;
}

/**
 * How the input's metric columns line up with the preset's metrics
 */
export interface MetricCoverage {
  /** Tracked metrics with no column in the input */
  missingMetrics: string[];
  /** `[...]` columns in the input the preset does not track */
  untrackedMetrics: string[];
}

export interface ReportRunResult {
  correlationId: string;
  inputPath: string;
  outputPath: string;
  table: OutputTable;
  coverage: MetricCoverage;
}

/**
 * Default the output path to `<dir>/<stem>_output.xlsx` next to the input
 */
export function resolveOutputPath(
  inputPath: string,
  outputPath?: string,
): string {
  if (outputPath && outputPath.trim() !== "") {
    return outputPath;
  }
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}_output.xlsx`);
}

/**
 * Compare input columns with the metrics a pivot will read
 */
export function computeMetricCoverage(
  columns: readonly string[],
  metricOrder: readonly string[],
): MetricCoverage {
  const available = new Set(columns);
  const tracked = new Set(metricOrder);
  return {
    missingMetrics: metricOrder.filter((metric) => !available.has(metric)),
    untrackedMetrics: detectMetricColumns(columns).filter(
      (column) => !tracked.has(column),
    ),
  };
}

/**
 * Generate one report
 *
 * @throws {SourceUnavailableError} When the input cannot be loaded
 * @throws {ConfigurationError} When the input lacks the key column or the
 * preset is invalid
 * @throws {SinkUnavailableError} When the report cannot be written
 */
export async function generateReport(
  options: GenerateReportOptions,
): Promise<ReportRunResult> {
  const { inputPath, preset } = options;
  const correlationId = options.correlationId ?? generateCorrelationId();
  const logger =
    options.logger ??
    createCorrelatedLogger(correlationId, { preset: preset.name });
  const outputPath = resolveOutputPath(inputPath, options.outputPath);

  logger.info("Report generation started", {
    correlationId,
    inputPath,
    outputPath,
  });

  try {
    const source =
      options.source ??
      new WorkbookReportSource(inputPath, {
        sheetName: preset.inputSheetName,
        correlationId,
        logger,
      });
    const dataset = await source.load();

    const { keyColumn, metricOrder } = preset.pivot;
    if (!dataset.columns.includes(keyColumn)) {
      throw new ConfigurationError(
        `Missing required column: ${keyColumn}`,
        correlationId,
        "keyColumn",
        { keyColumn, availableColumns: dataset.columns },
      );
    }

    const coverage = computeMetricCoverage(dataset.columns, metricOrder);
    if (coverage.missingMetrics.length > 0) {
      logger.debug("Tracked metrics missing from input", {
        correlationId,
        missingMetrics: coverage.missingMetrics,
      });
    }
    if (coverage.untrackedMetrics.length > 0) {
      logger.debug("Input metrics not included in report", {
        correlationId,
        untrackedMetrics: coverage.untrackedMetrics,
      });
    }

    const table = new PivotTransformer(logger).transform(
      dataset.records,
      preset.pivot,
      correlationId,
    );

    const sink =
      options.sink ??
      new FileReportSink(outputPath, {
        sheetName: preset.outputSheetName,
        correlationId,
        logger,
      });
    await sink.store(table);

    logger.info("Report generation completed", {
      correlationId,
      outputPath,
      rowCount: table.rows.length,
      columnCount: table.columns.length,
      warningsCount: table.metadata.warnings.length,
    });

    return { correlationId, inputPath, outputPath, table, coverage };
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    logger.error("Report generation failed", cause, {
      correlationId,
      ...(isReportError(error) ? { details: error.toLogFormat() } : {}),
    });
    throw error;
  }
}
