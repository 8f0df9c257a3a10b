/**
 * @fileoverview Parser Type Definitions
 *
 * This module defines the core types and interfaces used by the input
 * parsers. It provides a standardized result structure for parsed exports
 * and parser configuration.
 */

import type { InputRecord } from '../../types/report';

/**
 * Supported input file types
 */
export type SupportedFileType = 'xlsx';

/**
 * Tabular content extracted from one sheet of an export
 */
export interface ParsedSheet {
  /** Sheet the rows were read from */
  sheetName: string;

  /** Header row, in column order */
  columns: string[];

  /** One record per non-empty data row; every header is present as a key */
  records: InputRecord[];
}

/**
 * Metadata about the parsing operation
 */
export interface ParseMetadata {
  /** Original filename */
  filename: string;

  fileType: SupportedFileType;

  /** File size in bytes */
  fileSize: number;

  parsedAt: Date;

  /** Parser name@version */
  parserVersion: string;

  processingTimeMs: number;

  /** Number of data rows found */
  recordCount: number;

  /** Any warnings encountered during parsing */
  warnings: string[];

  /** Additional parser-specific metadata */
  additionalMetadata?: Record<string, unknown>;
}

/**
 * Result of a file parsing operation
 */
export interface ParseResult {
  success: boolean;

  /** Parsed sheet; null when parsing failed */
  data: ParsedSheet | null;

  metadata: ParseMetadata;

  /** Error details if parsing failed */
  error?: {
    code: ParserErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Options specific to the workbook parser
 */
export interface WorkbookParserOptions {
  /** Worksheet holding the export */
  sheetName: string;

  /** 1-based row holding the column headers */
  headerRow: number;
}

/**
 * Configuration options for parsers
 */
export interface ParserConfig {
  /** Maximum file size to process (in bytes) */
  maxFileSizeBytes: number;

  /** Timeout for parsing operations (in milliseconds) */
  timeoutMs: number;

  parserOptions: WorkbookParserOptions;
}

/**
 * Caller overrides merged over a parser's defaults
 */
export type ParserConfigOverrides = Partial<Omit<ParserConfig, 'parserOptions'>> & {
  parserOptions?: Partial<WorkbookParserOptions>;
};

/**
 * Default parser configuration
 */
export const DEFAULT_PARSER_CONFIG: ParserConfig = {
  maxFileSizeBytes: 50 * 1024 * 1024, // 50MB
  timeoutMs: 30000, // 30 seconds
  parserOptions: {
    sheetName: 'Export',
    headerRow: 1,
  },
};

/**
 * Error codes for parser failures
 */
export enum ParserErrorCode {
  FILE_TOO_LARGE = 'FILE_TOO_LARGE',
  TIMEOUT = 'TIMEOUT',
  INVALID_FORMAT = 'INVALID_FORMAT',
  SHEET_NOT_FOUND = 'SHEET_NOT_FOUND',
  CORRUPTED_FILE = 'CORRUPTED_FILE',
  PARSING_ERROR = 'PARSING_ERROR',
}
