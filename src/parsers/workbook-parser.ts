/**
 * @fileoverview Workbook Export Parser
 *
 * Reads one worksheet of an .xlsx export into header-keyed records. The first
 * row holds the column headers; every later non-empty row becomes a record.
 */

import { Workbook, Worksheet, CellValue as ExcelCellValue } from "exceljs";
import { Readable } from "stream";
import { BaseFileParser } from "./base/parser-interface";
import {
  ParseResult,
  ParsedSheet,
  ParserConfigOverrides,
  ParserErrorCode,
  SupportedFileType,
  WorkbookParserOptions,
} from "./base/parser-types";
import type { CellValue, InputRecord } from "../types/report";

/**
 * Parse failure carrying the error code to report
 */
class WorkbookParseError extends Error {
  constructor(
    message: string,
    public readonly code: ParserErrorCode,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "WorkbookParseError";
  }
}

/**
 * Flatten an ExcelJS cell value into a plain scalar.
 *
 * Formula cells yield their cached result, rich text is joined, hyperlinks
 * yield their display text and dates become ISO strings. Error cells and
 * formulas without a cached result read as null.
 */
export function toCellValue(value: ExcelCellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }

  if (
    typeof value === "number" ||
    typeof value === "string" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if ("richText" in value) {
    return value.richText.map((part) => part.text).join("");
  }

  if ("hyperlink" in value) {
    return value.text;
  }

  if ("error" in value) {
    return null;
  }

  if ("result" in value && value.result !== undefined) {
    return toCellValue(value.result);
  }

  return null;
}

/**
 * Workbook Export Parser
 */
export class WorkbookParser extends BaseFileParser {
  readonly fileType: SupportedFileType = "xlsx";
  readonly parserInfo = {
    name: "WorkbookParser",
    version: "1.0.0",
  };

  /**
   * Accept .xlsx/.xlsm by extension, or any buffer with a ZIP signature
   */
  canParse(filename: string, fileBuffer?: Buffer): boolean {
    if (super.canParse(filename) || this.getFileExtension(filename) === "xlsm") {
      return true;
    }

    if (fileBuffer) {
      return this.isZipBuffer(fileBuffer);
    }

    return false;
  }

  /**
   * Parse the configured worksheet from an .xlsx buffer
   */
  async parseFromBuffer(
    fileBuffer: Buffer,
    filename: string,
    config?: ParserConfigOverrides,
  ): Promise<ParseResult> {
    const startTime = Date.now();
    const mergedConfig = this.mergeConfig(config);
    const warnings: string[] = [];

    try {
      this.validateFileSize(fileBuffer, mergedConfig);

      const sheet = await this.executeWithTimeout(
        () =>
          this.parseWorkbookContent(
            fileBuffer,
            mergedConfig.parserOptions,
            warnings,
          ),
        mergedConfig.timeoutMs,
        "Workbook parsing",
      );

      return {
        success: true,
        data: sheet,
        metadata: {
          ...this.createBaseMetadata(filename, fileBuffer, startTime, warnings),
          recordCount: sheet.records.length,
          additionalMetadata: {
            sheetName: sheet.sheetName,
            columnCount: sheet.columns.length,
          },
        },
      };
    } catch (error) {
      const parseError =
        error instanceof Error ? error : new Error(String(error));
      return this.createErrorResult(
        filename,
        fileBuffer,
        startTime,
        parseError,
        this.determineErrorCode(parseError),
        parseError instanceof WorkbookParseError ? parseError.details : {},
      );
    }
  }

  /**
   * Load the workbook and extract the configured sheet
   */
  private async parseWorkbookContent(
    fileBuffer: Buffer,
    options: WorkbookParserOptions,
    warnings: string[],
  ): Promise<ParsedSheet> {
    const workbook = new Workbook();
    try {
      await workbook.xlsx.read(Readable.from(fileBuffer));
    } catch (error) {
      throw new WorkbookParseError(
        `Unable to read workbook: ${error instanceof Error ? error.message : String(error)}`,
        ParserErrorCode.CORRUPTED_FILE,
      );
    }

    const worksheet = workbook.getWorksheet(options.sheetName);
    if (!worksheet) {
      const availableSheets = workbook.worksheets.map((ws) => ws.name);
      throw new WorkbookParseError(
        `Sheet "${options.sheetName}" not found in workbook. Available sheets: ${availableSheets.join(", ")}`,
        ParserErrorCode.SHEET_NOT_FOUND,
        { availableSheets },
      );
    }

    const columns = this.readHeaders(worksheet, options, warnings);
    const records = this.readRecords(worksheet, columns, options);

    if (records.length === 0) {
      warnings.push(`No data rows found in sheet "${options.sheetName}"`);
    }

    return { sheetName: worksheet.name, columns, records };
  }

  /**
   * Read the header row. Blank headers are kept as empty slots so column
   * positions stay aligned; duplicate headers keep their first position.
   */
  private readHeaders(
    worksheet: Worksheet,
    options: WorkbookParserOptions,
    warnings: string[],
  ): string[] {
    const headerRow = worksheet.getRow(options.headerRow);
    const headers: string[] = [];

    headerRow.eachCell({ includeEmpty: true }, (cell, colNumber) => {
      const text = toCellValue(cell.value);
      headers[colNumber - 1] = text === null ? "" : String(text).trim();
    });

    const named = headers.filter((header) => header !== "");
    if (named.length === 0) {
      throw new WorkbookParseError(
        `Sheet "${options.sheetName}" has no header row`,
        ParserErrorCode.INVALID_FORMAT,
      );
    }

    const seen = new Set<string>();
    return Array.from(headers, (header = "") => {
      if (header === "") return header;
      if (seen.has(header)) {
        warnings.push(`Duplicate column "${header}" ignored`);
        return "";
      }
      seen.add(header);
      return header;
    });
  }

  /**
   * Convert data rows into records keyed by header
   */
  private readRecords(
    worksheet: Worksheet,
    headers: string[],
    options: WorkbookParserOptions,
  ): InputRecord[] {
    const records: InputRecord[] = [];

    for (
      let rowNum = options.headerRow + 1;
      rowNum <= worksheet.rowCount;
      rowNum++
    ) {
      const row = worksheet.getRow(rowNum);

      // Skip empty rows
      if (!row.hasValues) {
        continue;
      }

      const record: InputRecord = {};
      headers.forEach((header, index) => {
        if (header === "") return;
        record[header] = toCellValue(row.getCell(index + 1).value);
      });
      records.push(record);
    }

    return records;
  }

  /**
   * Check for the ZIP signature every .xlsx file starts with
   */
  private isZipBuffer(buffer: Buffer): boolean {
    return buffer.length >= 2 && buffer[0] === 0x50 && buffer[1] === 0x4b;
  }

  /**
   * Determine appropriate error code based on error type
   */
  private determineErrorCode(error: Error): ParserErrorCode {
    if (error instanceof WorkbookParseError) {
      return error.code;
    }
    if (error.message.includes("timed out")) {
      return ParserErrorCode.TIMEOUT;
    }
    if (error.message.includes("exceeds maximum")) {
      return ParserErrorCode.FILE_TOO_LARGE;
    }
    return ParserErrorCode.PARSING_ERROR;
  }
}

/**
 * Columns named like `[Metric]`, the naming the funnel exports use for
 * measure columns
 */
export function detectMetricColumns(columns: readonly string[]): string[] {
  return columns.filter(
    (column) => column.startsWith("[") && column.endsWith("]"),
  );
}
