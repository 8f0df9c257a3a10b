/**
 * @fileoverview CSV Output Generator
 *
 * Generates CSV text from an output table: a header line of the row label and
 * the column names, then one line per metric. Fields are quoted only when
 * they need it, unless quoteAll is set.
 */

import { Logger } from "../utils/logger";
import type { OutputTable } from "../types/report";

/**
 * Configuration options for CSV generation
 */
export interface CSVGeneratorConfig {
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Quote character for fields containing special characters (default: '"') */
  quote?: string;
  /** Line ending style (default: '\n') */
  lineEnding?: "\n" | "\r\n" | "\r";
  /** Whether to include headers in output (default: true) */
  includeHeaders?: boolean;
  /** Whether to quote all fields (default: false - only quote when necessary) */
  quoteAll?: boolean;
}

/**
 * Statistics about the CSV generation process
 */
export interface CSVGenerationStats {
  /** Number of metric lines written */
  totalRows: number;
  /** Number of fields per line, including the row label */
  fieldCount: number;
  processingTimeMs: number;
  /** Size of generated CSV in bytes */
  outputSizeBytes: number;
}

/**
 * Result of CSV generation
 */
export interface CSVGenerationResult {
  success: boolean;
  csvContent?: string;
  stats?: CSVGenerationStats;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * CSV Generator class for creating CSV output from report tables
 */
export class CSVGenerator {
  private logger: Logger;
  private config: Required<CSVGeneratorConfig>;

  constructor(config: CSVGeneratorConfig = {}, logger?: Logger) {
    this.logger = logger || new Logger("CSVGenerator");
    this.config = {
      ...CSVGenerator.getDefaultConfig(),
      ...config,
    };
  }

  /**
   * Generate CSV content from an output table
   */
  async generateCSV(
    table: OutputTable,
    correlationId: string,
  ): Promise<CSVGenerationResult> {
    const startTime = Date.now();

    try {
      this.logger.info("Starting CSV generation", {
        correlationId,
        rowCount: table.rows.length,
      });

      if (this.config.delimiter === "" || this.config.quote === "") {
        throw new Error("Delimiter and quote must be non-empty");
      }

      const csvLines: string[] = [];

      if (this.config.includeHeaders) {
        csvLines.push(this.generateLine([table.rowLabel, ...table.columns]));
      }

      for (const row of table.rows) {
        csvLines.push(
          this.generateLine([
            row.metric,
            ...row.values.map((value) => this.formatValue(value)),
          ]),
        );
      }

      const csvContent = csvLines.join(this.config.lineEnding);
      const processingTime = Math.max(1, Date.now() - startTime); // Ensure at least 1ms

      const stats: CSVGenerationStats = {
        totalRows: table.rows.length,
        fieldCount: table.columns.length + 1,
        processingTimeMs: processingTime,
        outputSizeBytes: Buffer.byteLength(csvContent, "utf8"),
      };

      this.logger.info("CSV generation completed", {
        correlationId,
        ...stats,
      });

      return { success: true, csvContent, stats };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error("CSV generation failed", cause, { correlationId });

      return {
        success: false,
        error: {
          code: "CSV_GENERATION_ERROR",
          message: `CSV generation failed: ${cause.message}`,
          details: {
            rowCount: table.rows.length,
          },
        },
      };
    }
  }

  private generateLine(fields: string[]): string {
    return fields
      .map((field) => this.escapeField(field))
      .join(this.config.delimiter);
  }

  /**
   * Format a metric value for CSV output
   */
  private formatValue(value: number): string {
    return Object.is(value, -0) ? "0" : value.toString();
  }

  /**
   * Escape a field value for CSV output
   */
  private escapeField(value: string): string {
    const { delimiter, quote } = this.config;
    const needsQuoting =
      this.config.quoteAll ||
      value.includes(delimiter) ||
      value.includes(quote) ||
      value.includes("\n") ||
      value.includes("\r") ||
      // Also quote fields that contain spaces, such as entity names
      value.includes(" ");

    if (!needsQuoting) {
      return value;
    }

    // Escape quotes by doubling them
    const escapedValue = value.split(quote).join(quote + quote);

    return `${quote}${escapedValue}${quote}`;
  }

  /**
   * Get default configuration
   */
  static getDefaultConfig(): Required<CSVGeneratorConfig> {
    return {
      delimiter: ",",
      quote: '"',
      lineEnding: "\n",
      includeHeaders: true,
      quoteAll: false,
    };
  }
}

/**
 * Convenience function to generate CSV from an output table
 */
export async function generateCSV(
  table: OutputTable,
  correlationId: string,
  config?: CSVGeneratorConfig,
): Promise<CSVGenerationResult> {
  const generator = new CSVGenerator(config);
  return generator.generateCSV(table, correlationId);
}
