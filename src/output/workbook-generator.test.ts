import { describe, it, expect, vi, afterEach } from "vitest";
import { Workbook, Worksheet } from "exceljs";
import { WorkbookGenerator } from "./workbook-generator";
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

const table: OutputTable = {
  rowLabel: "Master_CPC[TME Category]",
  metrics: ["[TopLine_Revenue]", "[Base_usuarios]"],
  columns: ["Education", "Images", "Edu+Img"],
  rows: [
    { metric: "[TopLine_Revenue]", values: [10, 20, 30] },
    { metric: "[Base_usuarios]", values: [1.5, 0, 1.5] },
  ],
  metadata: {
    baseColumnCount: 2,
    derivedColumn: "Edu+Img",
    missingEntities: [],
    warnings: [],
  },
};

function rowValues(worksheet: Worksheet, rowNumber: number): unknown[] {
  const row = worksheet.getRow(rowNumber);
  return Array.from({ length: worksheet.columnCount }, (_, index) =>
    row.getCell(index + 1).value,
  );
}

async function loadSheet(buffer: Buffer, name: string): Promise<Worksheet> {
  const workbook = new Workbook();
  await workbook.xlsx.load(buffer);
  const worksheet = workbook.getWorksheet(name);
  if (!worksheet) {
    throw new Error(`Sheet ${name} missing from generated workbook`);
  }
  return worksheet;
}

describe("WorkbookGenerator", () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it("should write a header row and one row per metric", async () => {
    const generator = new WorkbookGenerator({ sheetName: "Category Report" });

    const result = await generator.generateWorkbook(table, "test-cid");

    expect(result.success).toBe(true);
    if (!result.buffer) throw new Error("buffer missing");

    const worksheet = await loadSheet(result.buffer, "Category Report");
    expect(worksheet.rowCount).toBe(3);
    expect(rowValues(worksheet, 1)).toEqual([
      "Master_CPC[TME Category]",
      "Education",
      "Images",
      "Edu+Img",
    ]);
    expect(rowValues(worksheet, 2)).toEqual(["[TopLine_Revenue]", 10, 20, 30]);
    expect(rowValues(worksheet, 3)).toEqual(["[Base_usuarios]", 1.5, 0, 1.5]);
    expect(worksheet.getRow(1).getCell(1).font?.bold).toBe(true);
  });

  it("should size columns to their labels within the limit", async () => {
    const generator = new WorkbookGenerator({ maxColumnWidth: 20 });

    const result = await generator.generateWorkbook(table, "test-cid");
    if (!result.buffer) throw new Error("buffer missing");

    const worksheet = await loadSheet(result.buffer, "Report");
    // Row label column is capped; "Education" is 9 characters + 2, floored at 10
    expect(worksheet.getColumn(1).width).toBe(20);
    expect(worksheet.getColumn(2).width).toBe(11);
    expect(worksheet.getColumn(3).width).toBe(10);
  });

  it("should report generation stats", async () => {
    const result = await new WorkbookGenerator().generateWorkbook(
      table,
      "test-cid",
    );

    expect(result.stats).toMatchObject({ rowCount: 2, columnCount: 4 });
    expect(result.stats?.outputSizeBytes).toBe(result.buffer?.length);
    expect(result.stats?.processingTimeMs).toBeGreaterThanOrEqual(1);
  });

  it("should return an error result when the workbook cannot be built", async () => {
    const generator = new WorkbookGenerator({ sheetName: "Bad/Name" });

    const result = await generator.generateWorkbook(table, "test-cid");

    expect(result.success).toBe(false);
    expect(result.buffer).toBeUndefined();
    expect(result.error?.code).toBe("WORKBOOK_GENERATION_ERROR");
    expect(result.error?.details).toEqual({ sheetName: "Bad/Name", rowCount: 2 });
  });
});
