import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  CSVGenerator,
  generateCSV,
  type CSVGeneratorConfig,
} from "./csv-generator";
import type { OutputTable } from "../types/report";

// Mock the logger
vi.mock("../utils/logger", () => ({
  Logger: vi.fn().mockImplementation(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

describe("CSV Generator Unit Tests", () => {
  let generator: CSVGenerator;
  let mockTable: OutputTable;

  beforeEach(() => {
    generator = new CSVGenerator();

    mockTable = {
      rowLabel: "Master_CPC[Service Name]",
      metrics: ["[TopLine_Revenue]", "[v__Churn]"],
      columns: ["IntimaX", "Free Time", 'Say "Hi"'],
      rows: [
        { metric: "[TopLine_Revenue]", values: [1250.75, 0, -3] },
        { metric: "[v__Churn]", values: [-0, 12, 0.5] },
      ],
      metadata: {
        baseColumnCount: 3,
        derivedColumn: null,
        missingEntities: [],
        warnings: [],
      },
    };
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe("generateCSV", () => {
    it("should generate CSV with headers by default", async () => {
      const result = await generator.generateCSV(mockTable, "test-cid");

      expect(result.success).toBe(true);
      expect(result.csvContent).toBe(
        [
          '"Master_CPC[Service Name]",IntimaX,"Free Time","Say ""Hi"""',
          "[TopLine_Revenue],1250.75,0,-3",
          "[v__Churn],0,12,0.5",
        ].join("\n"),
      );
    });

    it("should omit headers when configured", async () => {
      const result = await new CSVGenerator({
        includeHeaders: false,
      }).generateCSV(mockTable, "test-cid");

      expect(result.csvContent).toBe(
        "[TopLine_Revenue],1250.75,0,-3\n[v__Churn],0,12,0.5",
      );
    });

    it("should honour custom delimiter and line ending", async () => {
      const config: CSVGeneratorConfig = {
        delimiter: ";",
        lineEnding: "\r\n",
        includeHeaders: false,
      };

      const result = await new CSVGenerator(config).generateCSV(
        mockTable,
        "test-cid",
      );

      expect(result.csvContent).toBe(
        "[TopLine_Revenue];1250.75;0;-3\r\n[v__Churn];0;12;0.5",
      );
    });

    it("should quote every field when quoteAll is set", async () => {
      const result = await new CSVGenerator({
        quoteAll: true,
        includeHeaders: false,
      }).generateCSV(
        { ...mockTable, rows: [mockTable.rows[0]] },
        "test-cid",
      );

      expect(result.csvContent).toBe(
        '"[TopLine_Revenue]","1250.75","0","-3"',
      );
    });

    it("should report generation stats", async () => {
      const result = await generator.generateCSV(mockTable, "test-cid");

      expect(result.stats).toMatchObject({ totalRows: 2, fieldCount: 4 });
      expect(result.stats?.outputSizeBytes).toBe(
        Buffer.byteLength(result.csvContent ?? "", "utf8"),
      );
      expect(result.stats?.processingTimeMs).toBeGreaterThanOrEqual(1);
    });

    it("should return an error result for an empty delimiter", async () => {
      const result = await new CSVGenerator({ delimiter: "" }).generateCSV(
        mockTable,
        "test-cid",
      );

      expect(result.success).toBe(false);
      expect(result.csvContent).toBeUndefined();
      expect(result.error).toEqual({
        code: "CSV_GENERATION_ERROR",
        message: "CSV generation failed: Delimiter and quote must be non-empty",
        details: { rowCount: 2 },
      });
    });
  });

  describe("configuration", () => {
    it("should expose the default configuration", () => {
      expect(CSVGenerator.getDefaultConfig()).toEqual({
        delimiter: ",",
        quote: '"',
        lineEnding: "\n",
        includeHeaders: true,
        quoteAll: false,
      });
    });
  });

  describe("generateCSV convenience function", () => {
    it("should generate with a default generator", async () => {
      const result = await generateCSV(
        { ...mockTable, rows: [] },
        "test-cid",
        { includeHeaders: true },
      );

      expect(result.csvContent).toBe(
        '"Master_CPC[Service Name]",IntimaX,"Free Time","Say ""Hi"""',
      );
    });
  });
});
