/**
 * Central type definitions for the pivot report generator
 *
 * This barrel file exports all types for convenient importing:
 * import { PivotConfig, OutputTable } from '../types';
 */

// Environment types
export * from "./environment";

// Report data model
export * from "./report";

// Error handling types
export * from "./errors";
