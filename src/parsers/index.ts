/**
 * @fileoverview Parser Module Exports
 *
 * This module provides a centralized export point for all parser-related
 * functionality.
 */

// Base interfaces and types
export * from "./base/parser-interface";
export * from "./base/parser-types";

export {
  WorkbookParser,
  detectMetricColumns,
  toCellValue,
} from "./workbook-parser";
