/**
 * @fileoverview Report Source
 *
 * Loads the input export from disk and hands back its records. Any failure to
 * locate, read or parse the file is fatal and raised as SourceUnavailableError.
 */

import { readFile } from "fs/promises";
import path from "path";
import { Logger } from "../utils/logger";
import { WorkbookParser } from "../parsers/workbook-parser";
import { ParserErrorCode } from "../parsers/base/parser-types";
import {
  SourceFailureReason,
  SourceUnavailableError,
  generateCorrelationId,
} from "../types/errors";
import type { InputRecord } from "../types/report";

/**
 * Records loaded from one input, with the header row they were keyed by
 */
export interface SourceDataset {
  sourcePath: string;
  sheetName: string;
  columns: string[];
  records: InputRecord[];
}

/**
 * Anything that can supply input records for a report run
 */
export interface ReportSource {
  load(): Promise<SourceDataset>;
}

export interface WorkbookReportSourceOptions {
  /** Worksheet to read (default: 'Export') */
  sheetName?: string;
  correlationId?: string;
  maxFileSizeBytes?: number;
  parser?: WorkbookParser;
  logger?: Logger;
}

function toSourceFailureReason(code?: ParserErrorCode): SourceFailureReason {
  switch (code) {
    case ParserErrorCode.SHEET_NOT_FOUND:
      return "SHEET_NOT_FOUND";
    case ParserErrorCode.FILE_TOO_LARGE:
      return "FILE_TOO_LARGE";
    case ParserErrorCode.TIMEOUT:
      return "TIMEOUT";
    default:
      return "INVALID_FORMAT";
  }
}

function errorCodeOf(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Reads one worksheet of an .xlsx export from the file system
 */
export class WorkbookReportSource implements ReportSource {
  private readonly sheetName: string;
  private readonly correlationId: string;
  private readonly maxFileSizeBytes?: number;
  private readonly parser: WorkbookParser;
  private readonly logger: Logger;

  constructor(
    private readonly sourcePath: string,
    options: WorkbookReportSourceOptions = {},
  ) {
    this.sheetName = options.sheetName ?? "Export";
    this.correlationId = options.correlationId ?? generateCorrelationId();
    this.maxFileSizeBytes = options.maxFileSizeBytes;
    this.parser = options.parser ?? new WorkbookParser();
    this.logger = options.logger ?? new Logger("WorkbookReportSource");
  }

  /**
   * @throws {SourceUnavailableError} When the file is missing, unreadable or
   * not a workbook containing the configured sheet
   */
  async load(): Promise<SourceDataset> {
    const { correlationId, sourcePath, sheetName } = this;

    this.logger.info("Reading input file", {
      correlationId,
      sourcePath,
      sheetName,
    });

    let fileBuffer: Buffer;
    try {
      fileBuffer = await readFile(sourcePath);
    } catch (error) {
      const notFound = errorCodeOf(error) === "ENOENT";
      throw new SourceUnavailableError(
        notFound
          ? `Input file not found: ${sourcePath}`
          : `Unable to read input file ${sourcePath}: ${error instanceof Error ? error.message : String(error)}`,
        correlationId,
        sourcePath,
        notFound ? "NOT_FOUND" : "READ_FAILED",
        { errno: errorCodeOf(error) },
      );
    }

    const result = await this.parser.parseFromBuffer(
      fileBuffer,
      path.basename(sourcePath),
      {
        ...(this.maxFileSizeBytes !== undefined
          ? { maxFileSizeBytes: this.maxFileSizeBytes }
          : {}),
        parserOptions: { sheetName },
      },
    );

    if (!result.success || !result.data) {
      throw new SourceUnavailableError(
        `Error reading ${sourcePath}: ${result.error?.message ?? "unknown parse failure"}`,
        correlationId,
        sourcePath,
        toSourceFailureReason(result.error?.code),
        { parserErrorCode: result.error?.code, ...result.error?.details },
      );
    }

    for (const warning of result.metadata.warnings) {
      this.logger.warn("Input parsing warning", {
        correlationId,
        sourcePath,
        warning,
      });
    }

    this.logger.info("Input file read", {
      correlationId,
      sourcePath,
      rowCount: result.data.records.length,
      columnCount: result.data.columns.length,
    });

    return {
      sourcePath,
      sheetName: result.data.sheetName,
      columns: result.data.columns.filter((column) => column !== ""),
      records: result.data.records,
    };
  }
}
