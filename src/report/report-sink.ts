/**
 * @fileoverview Report Sink
 *
 * Writes an output table to disk as .xlsx or CSV, chosen by the destination's
 * extension. The whole file is rendered in memory before anything is written.
 */

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { Logger } from "../utils/logger";
import { WorkbookGenerator } from "../output/workbook-generator";
import { CSVGenerator, CSVGeneratorConfig } from "../output/csv-generator";
import { SinkUnavailableError, generateCorrelationId } from "../types/errors";
import type { OutputTable } from "../types/report";

/**
 * Anything that can persist a finished report
 */
export interface ReportSink {
  store(table: OutputTable): Promise<void>;
}

export type OutputFormat = "xlsx" | "csv";

/**
 * CSV for a .csv destination, .xlsx for anything else
 */
export function resolveOutputFormat(destinationPath: string): OutputFormat {
  return path.extname(destinationPath).toLowerCase() === ".csv"
    ? "csv"
    : "xlsx";
}

export interface FileReportSinkOptions {
  /** Worksheet name for .xlsx output (default: 'Report') */
  sheetName?: string;
  /** CSV options for .csv output */
  csv?: CSVGeneratorConfig;
  correlationId?: string;
  logger?: Logger;
}

/**
 * Writes reports to the local file system
 */
export class FileReportSink implements ReportSink {
  private readonly format: OutputFormat;
  private readonly correlationId: string;
  private readonly logger: Logger;

  constructor(
    private readonly destinationPath: string,
    private readonly options: FileReportSinkOptions = {},
  ) {
    this.format = resolveOutputFormat(destinationPath);
    this.correlationId = options.correlationId ?? generateCorrelationId();
    this.logger = options.logger ?? new Logger("FileReportSink");
  }

  /**
   * @throws {SinkUnavailableError} When rendering or writing fails
   */
  async store(table: OutputTable): Promise<void> {
    const { correlationId, destinationPath } = this;
    const content = await this.render(table);

    this.logger.info("Saving output", {
      correlationId,
      destinationPath,
      format: this.format,
    });

    try {
      await mkdir(path.dirname(destinationPath), { recursive: true });
      await writeFile(destinationPath, content);
    } catch (error) {
      throw new SinkUnavailableError(
        `Error saving file ${destinationPath}: ${error instanceof Error ? error.message : String(error)}`,
        correlationId,
        destinationPath,
        { format: this.format },
      );
    }

    this.logger.info("Output saved", {
      correlationId,
      destinationPath,
      bytes: content.length,
    });
  }

  private async render(table: OutputTable): Promise<Buffer | string> {
    if (this.format === "csv") {
      const result = await new CSVGenerator(
        this.options.csv,
        this.logger,
      ).generateCSV(table, this.correlationId);
      if (!result.success || result.csvContent === undefined) {
        throw this.renderFailure(result.error?.message);
      }
      return result.csvContent;
    }

    const result = await new WorkbookGenerator(
      { sheetName: this.options.sheetName ?? "Report" },
      this.logger,
    ).generateWorkbook(table, this.correlationId);
    if (!result.success || !result.buffer) {
      throw this.renderFailure(result.error?.message);
    }
    return result.buffer;
  }

  private renderFailure(message?: string): SinkUnavailableError {
    return new SinkUnavailableError(
      message ?? `Unable to render ${this.format} output`,
      this.correlationId,
      this.destinationPath,
      { format: this.format },
    );
  }
}
