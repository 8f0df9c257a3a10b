/**
 * @fileoverview Base Parser Interface
 *
 * This module defines the core interface that input parsers implement.
 * It provides a consistent API for parsing exports and reporting failures
 * in a standardized way.
 */

import {
  DEFAULT_PARSER_CONFIG,
  ParseMetadata,
  ParseResult,
  ParserConfig,
  ParserConfigOverrides,
  ParserErrorCode,
  SupportedFileType,
} from './parser-types';

/**
 * Interface that input parsers implement
 */
export interface IFileParser {
  /**
   * The file type this parser handles
   */
  readonly fileType: SupportedFileType;

  /**
   * Parser name and version for identification
   */
  readonly parserInfo: {
    name: string;
    version: string;
  };

  /**
   * Parse file content from a buffer
   *
   * @param fileBuffer - The raw file content
   * @param filename - Original filename for metadata
   * @param config - Overrides for the parser's default configuration
   * @returns Promise resolving to parse result; never rejects
   */
  parseFromBuffer(
    fileBuffer: Buffer,
    filename: string,
    config?: ParserConfigOverrides
  ): Promise<ParseResult>;

  /**
   * Validate if this parser can handle the given file
   *
   * @param filename - The filename to check
   * @param fileBuffer - Optional file buffer for content-based detection
   */
  canParse(filename: string, fileBuffer?: Buffer): boolean;

  getDefaultConfig(): ParserConfig;
}

/**
 * Abstract base class providing common parser functionality
 */
export abstract class BaseFileParser implements IFileParser {
  abstract readonly fileType: SupportedFileType;
  abstract readonly parserInfo: { name: string; version: string };

  abstract parseFromBuffer(
    fileBuffer: Buffer,
    filename: string,
    config?: ParserConfigOverrides
  ): Promise<ParseResult>;

  /**
   * Default implementation of canParse based on file extension
   */
  canParse(filename: string, _fileBuffer?: Buffer): boolean {
    const extension = this.getFileExtension(filename);
    return extension === this.fileType;
  }

  getDefaultConfig(): ParserConfig {
    return {
      ...DEFAULT_PARSER_CONFIG,
      parserOptions: { ...DEFAULT_PARSER_CONFIG.parserOptions },
    };
  }

  /**
   * Merge caller overrides over the default configuration
   */
  protected mergeConfig(config?: ParserConfigOverrides): ParserConfig {
    const defaultConfig = this.getDefaultConfig();
    return {
      maxFileSizeBytes: config?.maxFileSizeBytes ?? defaultConfig.maxFileSizeBytes,
      timeoutMs: config?.timeoutMs ?? defaultConfig.timeoutMs,
      parserOptions: {
        ...defaultConfig.parserOptions,
        ...config?.parserOptions,
      },
    };
  }

  /**
   * Extract file extension from filename
   */
  protected getFileExtension(filename: string): string {
    const parts = filename.toLowerCase().split('.');
    return parts.length > 1 ? parts[parts.length - 1] : '';
  }

  /**
   * Validate file size against configuration limits
   */
  protected validateFileSize(fileBuffer: Buffer, config: ParserConfig): void {
    if (fileBuffer.length > config.maxFileSizeBytes) {
      throw new Error(
        `File size ${fileBuffer.length} bytes exceeds maximum allowed size of ${config.maxFileSizeBytes} bytes`
      );
    }
  }

  /**
   * Create base metadata for parse results
   */
  protected createBaseMetadata(
    filename: string,
    fileBuffer: Buffer,
    startTime: number,
    warnings: string[] = []
  ): ParseMetadata {
    return {
      filename,
      fileType: this.fileType,
      fileSize: fileBuffer.length,
      parsedAt: new Date(),
      parserVersion: `${this.parserInfo.name}@${this.parserInfo.version}`,
      processingTimeMs: Date.now() - startTime,
      recordCount: 0, // Will be set by specific parsers
      warnings,
    };
  }

  /**
   * Create an error result for failed parsing
   */
  protected createErrorResult(
    filename: string,
    fileBuffer: Buffer,
    startTime: number,
    error: Error,
    errorCode: ParserErrorCode,
    details: Record<string, unknown> = {}
  ): ParseResult {
    return {
      success: false,
      data: null,
      metadata: this.createBaseMetadata(filename, fileBuffer, startTime),
      error: {
        code: errorCode,
        message: error.message,
        details: {
          ...details,
          stack: error.stack,
          name: error.name,
        },
      },
    };
  }

  /**
   * Execute parsing with timeout protection
   */
  protected async executeWithTimeout<T>(
    operation: () => Promise<T>,
    timeoutMs: number,
    operationName: string
  ): Promise<T> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new Error(`${operationName} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      operation()
        .then((result) => {
          clearTimeout(timeout);
          resolve(result);
        })
        .catch((error: unknown) => {
          clearTimeout(timeout);
          reject(error);
        });
    });
  }
}
