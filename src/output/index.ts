/**
 * @fileoverview Output Module Exports
 *
 * Report renderers: .xlsx workbook, CSV text and console preview.
 */

export { WorkbookGenerator } from "./workbook-generator";
export { CSVGenerator, generateCSV } from "./csv-generator";
export { formatPreview, formatTableGrid } from "./report-preview";

export type {
  WorkbookGeneratorConfig,
  WorkbookGenerationResult,
  WorkbookGenerationStats,
} from "./workbook-generator";
export type {
  CSVGeneratorConfig,
  CSVGenerationResult,
  CSVGenerationStats,
} from "./csv-generator";
export type { PreviewOptions } from "./report-preview";
