import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Command } from "commander";
import { z } from "zod";
import { FolderScanner } from "../../scanner";
import { startServer } from "../../server";
import { loadConfig, maxDepthInputSchema, resolveScanOptions } from "../lib/config";
import { EXPORT_FORMATS, buildExport } from "../lib/exporter";
import { getLogger } from "../lib/logger";
import { SIZE_UNITS } from "../lib/types";

const logger = getLogger("cli");

export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  setExitCode(code: number): void;
}

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

/**
 * Scan command options validated by Zod at the CLI boundary
 */
const ScanCommandOptionsSchema = z.object({
  files: z.boolean().optional(),
  maxDepth: maxDepthInputSchema.optional(),
  size: z.boolean().optional(),
  unit: z.enum(SIZE_UNITS).optional(),
  format: z.enum(EXPORT_FORMATS).default("txt"),
  output: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
});

const ServeCommandOptionsSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).optional(),
  config: z.string().min(1).optional(),
});

async function executeScanCommand(io: CliIO, path: string, rawOptions: unknown): Promise<void> {
  const validation = ScanCommandOptionsSchema.safeParse(rawOptions);
  if (!validation.success) {
    io.stderr(`Error: ${validation.error.issues[0]?.message ?? "Invalid options"}`);
    io.setExitCode(EXIT_FAILURE);
    return;
  }
  const options = validation.data;

  const config = await loadConfig(options.config);
  const scanOptions = resolveScanOptions(config.scan, {
    includeFiles: options.files,
    maxDepth: options.maxDepth,
    showSize: options.size,
    sizeUnit: options.unit,
  });

  const scanner = new FolderScanner({ onStatus: (message) => io.stderr(message) });
  const onInterrupt = () => {
    scanner.cancel();
  };
  process.once("SIGINT", onInterrupt);

  const result = await scanner.scan(path, scanOptions).finally(() => {
    process.off("SIGINT", onInterrupt);
  });

  if (result.isErr()) {
    io.setExitCode(result.error.kind === "cancelled" ? EXIT_CANCELLED : EXIT_FAILURE);
    return;
  }

  const document = await buildExport(options.format, result.value);
  if (options.output) {
    const outputPath = resolve(options.output);
    await writeFile(outputPath, document.content, "utf-8");
    io.stderr(`Tree exported to ${outputPath}`);
  } else {
    io.stdout(document.content);
  }
}

async function executeServeCommand(io: CliIO, rawOptions: unknown): Promise<void> {
  const validation = ServeCommandOptionsSchema.safeParse(rawOptions);
  if (!validation.success) {
    io.stderr(`Error: ${validation.error.issues[0]?.message ?? "Invalid options"}`);
    io.setExitCode(EXIT_FAILURE);
    return;
  }

  const config = await loadConfig(validation.data.config);
  const instance = await startServer(config, validation.data.port ?? config.port);
  io.stderr(`folder-tree running at http://localhost:${instance.port}`);

  process.once("SIGINT", () => {
    instance.stop().catch((error: unknown) => {
      logger.error({ err: error }, "Failed to stop server");
    });
  });
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();
  program.name("folder-tree").description("Render a folder as a tree and export it as text, JSON or CSV");

  program
    .command("scan")
    .description("Scan a folder and print or export its tree")
    .argument("<path>", "Folder to scan")
    .option("--files", "Include files (default from config)")
    .option("--no-files", "List folders only")
    .option("--max-depth <n>", "Deepest level to list, 0 = direct children only, empty = unlimited")
    .option("--size", "Show file and folder sizes")
    .option("--no-size", "Hide sizes")
    .option("--unit <unit>", `Size unit (${SIZE_UNITS.join("|")})`)
    .option("--format <type>", `Output format (${EXPORT_FORMATS.join("|")})`, "txt")
    .option("--output <file>", "Write the export to a file instead of stdout")
    .option("--config <file>", "Config file with scan defaults")
    .action(async (path: string, rawOptions: unknown) => {
      await executeScanCommand(io, path, rawOptions);
    });

  program
    .command("serve")
    .description("Start the HTTP server that streams scans over Server-Sent Events")
    .option("--port <n>", "Port to listen on")
    .option("--config <file>", "Config file with scan defaults and port")
    .action(async (rawOptions: unknown) => {
      await executeServeCommand(io, rawOptions);
    });

  return program;
}
