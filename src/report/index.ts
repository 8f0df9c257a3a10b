/**
 * @fileoverview Report Module Exports
 */

export {
  generateReport,
  resolveOutputPath,
  computeMetricCoverage,
} from "./report-runner";
export { WorkbookReportSource } from "./report-source";
export { FileReportSink, resolveOutputFormat } from "./report-sink";

export type {
  GenerateReportOptions,
  MetricCoverage,
  ReportRunResult,
} from "./report-runner";
export type {
  ReportSource,
  SourceDataset,
  WorkbookReportSourceOptions,
} from "./report-source";
export type {
  ReportSink,
  OutputFormat,
  FileReportSinkOptions,
} from "./report-sink";
