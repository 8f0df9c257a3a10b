/**
 * @fileoverview Metric Pivot Report
 *
 * Pivots entity-per-row metric exports into metric-per-row reports with a
 * fixed row and column order.
 *
 * @example
 * ```typescript
 * import { generateReport, getReportPresetService } from "metric-pivot-report";
 *
 * const preset = getReportPresetService().getPreset("category");
 * if (preset) {
 *   await generateReport({ inputPath: "data/export.xlsx", preset });
 * }
 * ```
 */

export * from "./types";
export * from "./transformation";
export * from "./parsers";
export * from "./output";
export * from "./report";
export {
  ReportPresetService,
  getReportPresetService,
  FUNNEL_METRICS,
} from "./config/report-presets";
export type { ReportPreset } from "./config/report-presets";
export {
  environmentConfig,
  getEnvironmentConfig,
} from "./config/environment";
export { Logger, logger, createCorrelatedLogger } from "./utils/logger";
export type { LogContext } from "./utils/logger";
