import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { resolve } from "node:path";
import { z } from "zod";
import { getLogger } from "./logger";
import { SIZE_UNITS, type ScanOptions } from "./types";

const logger = getLogger("config");

export const MAX_DEPTH_LIMIT = 20;
export const DEFAULT_PORT = 3000;

const clampDepth = (depth: number) => Math.min(Math.max(depth, 0), MAX_DEPTH_LIMIT);

export const scanOptionsSchema = z.object({
  includeFiles: z.boolean().default(true),
  maxDepth: z
    .number()
    .int()
    .nullish()
    .transform((depth) => (depth == null ? undefined : clampDepth(depth))),
  showSize: z.boolean().default(false),
  sizeUnit: z.enum(SIZE_UNITS).default("auto"),
});

export const configFileSchema = z.object({
  scan: scanOptionsSchema.default({}),
  port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
});

export type FolderTreeConfig = z.infer<typeof configFileSchema>;

export const DEFAULT_CONFIG: FolderTreeConfig = configFileSchema.parse({});

const booleanString = z
  .enum(["true", "false", "1", "0"], { message: "Expected true or false" })
  .transform((value) => value === "true" || value === "1");

/** Empty string means unlimited; anything else must be a whole number. */
export const maxDepthInputSchema = z
  .string()
  .trim()
  .regex(/^(-?\d+)?$/, { message: "maxDepth must be a whole number" })
  .transform((value) => (value === "" ? null : clampDepth(Number.parseInt(value, 10))));

/** Scan option overrides arriving as strings (query parameters). */
export const scanOverridesSchema = z.object({
  includeFiles: booleanString.optional(),
  maxDepth: maxDepthInputSchema.optional(),
  showSize: booleanString.optional(),
  sizeUnit: z.enum(SIZE_UNITS).optional(),
});

export type ScanOverrides = z.infer<typeof scanOverridesSchema>;

/**
 * Applies overrides on top of configured defaults. A `null` maxDepth
 * explicitly asks for unlimited depth.
 */
export function resolveScanOptions(defaults: ScanOptions, overrides: ScanOverrides): ScanOptions {
  const maxDepth = overrides.maxDepth === undefined ? defaults.maxDepth : (overrides.maxDepth ?? undefined);
  return {
    includeFiles: overrides.includeFiles ?? defaults.includeFiles,
    maxDepth,
    showSize: overrides.showSize ?? defaults.showSize,
    sizeUnit: overrides.sizeUnit ?? defaults.sizeUnit,
  };
}

function candidatePaths(configPath?: string): string[] {
  if (configPath) return [resolve(configPath)];
  return [resolve(process.cwd(), ".folder-tree.json"), resolve(homedir(), ".config", "folder-tree", "config.json")];
}

/**
 * Loads the first config file found. A corrupt or invalid file is reported
 * and replaced by the defaults; a missing explicit `configPath` is an error.
 */
export async function loadConfig(configPath?: string): Promise<FolderTreeConfig> {
  for (const path of candidatePaths(configPath)) {
    if (!existsSync(path)) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, "utf-8"));
    } catch (error) {
      logger.warn({ path, err: error }, "Configuration file is corrupted, using defaults");
      return DEFAULT_CONFIG;
    }

    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ path, issues: parsed.error.issues }, "Invalid configuration, using defaults");
      return DEFAULT_CONFIG;
    }

    logger.debug({ path }, "Loaded configuration");
    return parsed.data;
  }

  if (configPath) {
    throw new Error(`Config file not found: ${resolve(configPath)}`);
  }
  return DEFAULT_CONFIG;
}
