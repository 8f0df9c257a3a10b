#!/usr/bin/env node

/**
 * @fileoverview Pivot Report CLI
 *
 * Usage: pivot-report <input.xlsx> [output] [--preset <name>]
 *
 * Reads the export's "Export" sheet, pivots it with the chosen preset and
 * writes the report next to the input unless an output path is given.
 */

import { environmentConfig } from "./config/environment";
import { getReportPresetService } from "./config/report-presets";
import { generateReport } from "./report/report-runner";
import { formatPreview } from "./output/report-preview";
import { isReportError } from "./types/errors";

export type ParsedArgs =
  | { kind: "help" }
  | { kind: "error"; message: string }
  | {
      kind: "run";
      inputPath: string;
      outputPath?: string;
      presetName?: string;
    };

export function usage(presetNames: string[]): string {
  return [
    "Usage: pivot-report <input.xlsx> [output] [--preset <name>]",
    "",
    "Arguments:",
    "  input            Export workbook to read",
    "  output           Report file to write (.xlsx, or .csv for CSV)",
    "                   Defaults to <input>_output.xlsx beside the input",
    "",
    "Options:",
    `  -p, --preset     Report preset: ${presetNames.join(", ")}`,
    "                   Defaults to REPORT_PRESET, or category",
    "  -h, --help       Show this help",
  ].join("\n");
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  let presetName: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    }

    if (arg === "-p" || arg === "--preset") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("-")) {
        return { kind: "error", message: `Option ${arg} requires a value` };
      }
      presetName = value;
      i++;
      continue;
    }

    if (arg.startsWith("--preset=")) {
      presetName = arg.slice("--preset=".length);
      continue;
    }

    if (arg.startsWith("-")) {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }

    positional.push(arg);
  }

  if (positional.length === 0) {
    return { kind: "error", message: "Missing input file" };
  }
  if (positional.length > 2) {
    return {
      kind: "error",
      message: `Unexpected argument: ${positional[2]}`,
    };
  }

  return {
    kind: "run",
    inputPath: positional[0],
    ...(positional[1] !== undefined ? { outputPath: positional[1] } : {}),
    ...(presetName !== undefined ? { presetName } : {}),
  };
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function main(argv: readonly string[]): Promise<number> {
  const presetService = getReportPresetService();
  const args = parseArgs(argv);

  if (args.kind === "help") {
    console.log(usage(presetService.getPresetNames()));
    return 0;
  }
  if (args.kind === "error") {
    console.error(`Error: ${args.message}\n`);
    console.error(usage(presetService.getPresetNames()));
    return 1;
  }

  const presetName = args.presetName ?? environmentConfig.defaultPreset;
  const preset = presetService.getPreset(presetName);
  if (!preset) {
    console.error(
      `Error: Unknown preset "${presetName}". Available presets: ${presetService.getPresetNames().join(", ")}`,
    );
    return 1;
  }

  console.log("=".repeat(60));
  console.log(preset.title);
  console.log("=".repeat(60));

  try {
    const result = await generateReport({
      inputPath: args.inputPath,
      outputPath: args.outputPath,
      preset,
    });

    console.log("");
    for (const line of formatPreview(result.table)) {
      console.log(line);
    }

    const { warnings, missingEntities } = result.table.metadata;
    if (missingEntities.length > 0) {
      console.log("");
      console.log(`Zero-filled columns: ${missingEntities.join(", ")}`);
    }
    if (warnings.length > 0) {
      console.log(`Warnings: ${warnings.length}`);
    }

    console.log("");
    console.log("=".repeat(60));
    console.log(`Report saved to: ${result.outputPath}`);
    console.log("=".repeat(60));
    return 0;
  } catch (error) {
    if (isReportError(error)) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error("Unexpected error:", error);
    }
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
