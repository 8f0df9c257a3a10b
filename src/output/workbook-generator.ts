/**
 * @fileoverview Workbook Output Generator
 *
 * Renders an output table as a single-sheet .xlsx workbook: a header row of
 * the row label and the column names, then one row per metric.
 */

import { Workbook } from "exceljs";
import { Logger } from "../utils/logger";
import type { OutputTable } from "../types/report";

/**
 * Configuration options for workbook generation
 */
export interface WorkbookGeneratorConfig {
  /** Worksheet name (default: 'Report') */
  sheetName?: string;
  /** Whether to render the header row in bold (default: true) */
  boldHeader?: boolean;
  /** Upper bound for auto-sized column widths, in characters (default: 60) */
  maxColumnWidth?: number;
}

export interface WorkbookGenerationStats {
  rowCount: number;
  columnCount: number;
  processingTimeMs: number;
  outputSizeBytes: number;
}

/**
 * Result of workbook generation
 */
export interface WorkbookGenerationResult {
  success: boolean;
  buffer?: Buffer;
  stats?: WorkbookGenerationStats;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Workbook Generator class for .xlsx report output
 */
export class WorkbookGenerator {
  private logger: Logger;
  private config: Required<WorkbookGeneratorConfig>;

  constructor(config: WorkbookGeneratorConfig = {}, logger?: Logger) {
    this.logger = logger || new Logger("WorkbookGenerator");
    this.config = {
      sheetName: "Report",
      boldHeader: true,
      maxColumnWidth: 60,
      ...config,
    };
  }

  /**
   * Generate .xlsx content from an output table
   */
  async generateWorkbook(
    table: OutputTable,
    correlationId: string,
  ): Promise<WorkbookGenerationResult> {
    const startTime = Date.now();

    try {
      this.logger.info("Starting workbook generation", {
        correlationId,
        sheetName: this.config.sheetName,
        rowCount: table.rows.length,
      });

      const workbook = new Workbook();
      const worksheet = workbook.addWorksheet(this.config.sheetName);

      const headerRow = worksheet.addRow([table.rowLabel, ...table.columns]);
      if (this.config.boldHeader) {
        headerRow.font = { bold: true };
      }

      for (const row of table.rows) {
        worksheet.addRow([row.metric, ...row.values]);
      }

      const labels = [table.rowLabel, ...table.columns];
      labels.forEach((label, index) => {
        const longest =
          index === 0
            ? Math.max(label.length, ...table.metrics.map((m) => m.length))
            : label.length;
        worksheet.getColumn(index + 1).width = Math.min(
          Math.max(longest + 2, 10),
          this.config.maxColumnWidth,
        );
      });

      const buffer = Buffer.from(await workbook.xlsx.writeBuffer());

      const stats: WorkbookGenerationStats = {
        rowCount: table.rows.length,
        columnCount: table.columns.length + 1,
        processingTimeMs: Math.max(1, Date.now() - startTime),
        outputSizeBytes: buffer.length,
      };

      this.logger.info("Workbook generation completed", {
        correlationId,
        ...stats,
      });

      return { success: true, buffer, stats };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error("Workbook generation failed", cause, {
        correlationId,
        sheetName: this.config.sheetName,
      });

      return {
        success: false,
        error: {
          code: "WORKBOOK_GENERATION_ERROR",
          message: `Workbook generation failed: ${cause.message}`,
          details: {
            sheetName: this.config.sheetName,
            rowCount: table.rows.length,
          },
        },
      };
    }
  }
}
