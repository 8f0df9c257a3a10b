/**
 * @fileoverview Transformation Module Exports
 *
 * This module provides a centralized export point for the pivot transform
 * and its lookup helpers.
 */

export {
  PivotTransformer,
  transform,
  toMetricNumber,
  validatePivotConfig,
} from "./pivot-transformer";

export { buildRecordIndex, getCell, toLookupKey } from "./record-index";

export type { RecordIndex } from "./record-index";
