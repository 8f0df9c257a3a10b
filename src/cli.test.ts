import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { access, mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { Workbook } from "exceljs";
import { main, parseArgs, usage } from "./cli";

// Mock the logger
vi.mock("./utils/logger", () => {
  const createMockLogger = () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  });
  return {
    Logger: vi.fn().mockImplementation(createMockLogger),
    createCorrelatedLogger: vi.fn().mockImplementation(createMockLogger),
  };
});

describe("parseArgs", () => {
  it("should read input, output and preset", () => {
    expect(parseArgs(["in.xlsx"])).toEqual({
      kind: "run",
      inputPath: "in.xlsx",
    });
    expect(
      parseArgs(["in.xlsx", "out.csv", "--preset", "services"]),
    ).toEqual({
      kind: "run",
      inputPath: "in.xlsx",
      outputPath: "out.csv",
      presetName: "services",
    });
    expect(parseArgs(["--preset=services", "in.xlsx"])).toEqual({
      kind: "run",
      inputPath: "in.xlsx",
      presetName: "services",
    });
    expect(parseArgs(["-p", "category", "in.xlsx"])).toEqual({
      kind: "run",
      inputPath: "in.xlsx",
      presetName: "category",
    });
  });

  it("should recognise help anywhere", () => {
    expect(parseArgs(["-h"])).toEqual({ kind: "help" });
    expect(parseArgs(["in.xlsx", "--help"])).toEqual({ kind: "help" });
  });

  it("should report usage errors", () => {
    expect(parseArgs([])).toEqual({
      kind: "error",
      message: "Missing input file",
    });
    expect(parseArgs(["in.xlsx", "--preset"])).toEqual({
      kind: "error",
      message: "Option --preset requires a value",
    });
    expect(parseArgs(["--verbose", "in.xlsx"])).toEqual({
      kind: "error",
      message: "Unknown option: --verbose",
    });
    expect(parseArgs(["a.xlsx", "b.xlsx", "c.xlsx"])).toEqual({
      kind: "error",
      message: "Unexpected argument: c.xlsx",
    });
  });
});

describe("main", () => {
  const logSpy = vi.spyOn(console, "log");
  const errorSpy = vi.spyOn(console, "error");
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "pivot-cli-"));
    logSpy.mockImplementation(() => undefined);
    errorSpy.mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    vi.clearAllMocks();
  });

  it("should print usage for --help", async () => {
    expect(await main(["--help"])).toBe(0);
    expect(logSpy).toHaveBeenCalledWith(usage(["category", "services"]));
  });

  it("should exit 1 on usage errors", async () => {
    expect(await main([])).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Error: Missing input file\n");
  });

  it("should exit 1 for an unknown preset", async () => {
    expect(await main(["in.xlsx", "--preset", "regions"])).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      'Error: Unknown preset "regions". Available presets: category, services',
    );
  });

  it("should exit 1 when the input is missing", async () => {
    const inputPath = path.join(tempDir, "missing.xlsx");

    expect(await main([inputPath, "--preset", "category"])).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      `Error: Input file not found: ${inputPath}`,
    );
  });

  it("should generate the report and print a preview", async () => {
    const inputPath = path.join(tempDir, "export.xlsx");
    const outputPath = path.join(tempDir, "report.xlsx");
    const workbook = new Workbook();
    const worksheet = workbook.addWorksheet("Export");
    worksheet.addRow(["Master_CPC[Service Name]", "[TopLine_Revenue]"]);
    worksheet.addRow(["IntimaX", 42]);
    await workbook.xlsx.writeFile(inputPath);

    expect(await main([inputPath, outputPath, "--preset", "services"])).toBe(0);

    await expect(access(outputPath)).resolves.toBeUndefined();
    expect(logSpy).toHaveBeenCalledWith("SERVICES DATA TRANSFORMATION");
    expect(logSpy).toHaveBeenCalledWith("Output shape: 18 rows × 13 columns");
    expect(logSpy).toHaveBeenCalledWith(`Report saved to: ${outputPath}`);
    expect(errorSpy).not.toHaveBeenCalled();
  });
});
