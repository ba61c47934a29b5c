import type { Dirent } from "node:fs";
import { readdir, realpath, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { err, ok, type Result } from "neverthrow";
import {
  ScanAbortedError,
  cancelled,
  errorCode,
  failure,
  invalidPath,
  isMissingError,
  isPermissionError,
  type ScanError,
} from "./src/lib/errors";
import { MAX_DEPTH_LIMIT } from "./src/lib/config";
import { SIZE_ERROR_LABEL, formatSize } from "./src/lib/format";
import { getLogger } from "./src/lib/logger";
import { ACCESS_DENIED_LABEL, childPrefix, renderLines } from "./src/lib/treeText";
import type { EntryLine, ScanOptions, ScanProgress, ScanReport, TreeLine } from "./src/lib/types";

const PROGRESS_INTERVAL_MS = 500;

const logger = getLogger("scanner");

export type ScannerState = "idle" | "running" | "cancelling";

export interface ScanCallbacks {
  onStatus?: (message: string) => void;
  onProgress?: (progress: ScanProgress) => void;
  onComplete?: (report: ScanReport) => void;
  onCancelled?: () => void;
  onError?: (error: ScanError) => void;
}

interface ChildEntry {
  name: string;
  isDirectory: boolean;
}

interface WalkContext {
  options: Readonly<ScanOptions>;
  maxDepth: number | undefined;
  signal: AbortSignal | undefined;
  lines: TreeLine[];
  progress: ScanProgress;
  /** Real paths of the folders on the current descent, to stop symlink loops. */
  ancestors: Set<string>;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new ScanAbortedError();
}

const compareNames = (a: ChildEntry, b: ChildEntry) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

/** Brings any depth into [0, MAX_DEPTH_LIMIT]; non-finite values mean unlimited. */
export function normalizeMaxDepth(maxDepth: number | undefined): number | undefined {
  if (maxDepth === undefined || !Number.isFinite(maxDepth)) return undefined;
  return Math.min(Math.max(Math.floor(maxDepth), 0), MAX_DEPTH_LIMIT);
}

/** Checks that `rootPath` is an existing, listable directory and returns its absolute form. */
export async function validateRoot(rootPath: string): Promise<Result<string, ScanError>> {
  const resolved = resolve(rootPath);

  try {
    const stats = await stat(resolved);
    if (!stats.isDirectory()) return err(invalidPath(resolved, "not-directory"));
    await readdir(resolved);
  } catch (error) {
    if (errorCode(error) === "ENOENT") return err(invalidPath(resolved, "not-found"));
    if (isPermissionError(error)) return err(invalidPath(resolved, "permission-denied"));
    return err(failure(error));
  }

  return ok(resolved);
}

/**
 * Recursive sum of the sizes of all files below `dirPath`. Symlinked folders
 * are not followed; nested entries that cannot be read count as zero. Throws
 * when `dirPath` itself cannot be listed.
 */
export async function directorySize(dirPath: string, signal?: AbortSignal): Promise<number> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  let total = 0;

  for (const entry of entries) {
    throwIfAborted(signal);
    const fullPath = join(dirPath, entry.name);

    if (entry.isDirectory()) {
      total += await nestedDirectorySize(fullPath, signal);
      continue;
    }

    try {
      const stats = await stat(fullPath);
      if (stats.isFile()) total += stats.size;
    } catch (error) {
      logger.debug({ path: fullPath, code: errorCode(error) }, "Skipping unreadable file in size total");
    }
  }

  return total;
}

async function nestedDirectorySize(dirPath: string, signal: AbortSignal | undefined): Promise<number> {
  try {
    return await directorySize(dirPath, signal);
  } catch (error) {
    if (error instanceof ScanAbortedError) throw error;
    logger.debug({ path: dirPath, code: errorCode(error) }, "Skipping unreadable folder in size total");
    return 0;
  }
}

async function classify(dirPath: string, entry: Dirent): Promise<ChildEntry> {
  if (!entry.isSymbolicLink()) return { name: entry.name, isDirectory: entry.isDirectory() };

  try {
    const target = await stat(join(dirPath, entry.name));
    return { name: entry.name, isDirectory: target.isDirectory() };
  } catch (error) {
    logger.debug({ path: join(dirPath, entry.name), code: errorCode(error) }, "Dangling symlink listed as file");
    return { name: entry.name, isDirectory: false };
  }
}

async function sizeLabel(ctx: WalkContext, path: string, isDirectory: boolean): Promise<string> {
  try {
    const bytes = isDirectory ? await directorySize(path, ctx.signal) : (await stat(path)).size;
    return formatSize(bytes, ctx.options.sizeUnit);
  } catch (error) {
    if (error instanceof ScanAbortedError) throw error;
    logger.warn({ path, code: errorCode(error) }, "Size computation failed");
    return SIZE_ERROR_LABEL;
  }
}

async function walk(ctx: WalkContext, dirPath: string, prefix: string, depth: number): Promise<void> {
  throwIfAborted(ctx.signal);
  if (ctx.maxDepth !== undefined && depth > ctx.maxDepth) return;

  let realDir: string;
  let entries: Dirent[];
  try {
    realDir = await realpath(dirPath);
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    if (isPermissionError(error)) {
      logger.warn({ path: dirPath }, "Access denied");
      ctx.lines.push({ kind: "placeholder", indentPrefix: prefix, isLastSibling: true, label: ACCESS_DENIED_LABEL });
      return;
    }
    if (isMissingError(error)) {
      logger.debug({ path: dirPath }, "Folder disappeared during scan");
      return;
    }
    throw error;
  }

  if (ctx.ancestors.has(realDir)) {
    logger.debug({ path: dirPath, target: realDir }, "Symlink loop, not descending");
    return;
  }

  ctx.ancestors.add(realDir);
  try {
    await walkEntries(ctx, dirPath, prefix, depth, entries);
  } finally {
    ctx.ancestors.delete(realDir);
  }
}

async function walkEntries(
  ctx: WalkContext,
  dirPath: string,
  prefix: string,
  depth: number,
  entries: Dirent[],
): Promise<void> {
  const classified = await Promise.all(entries.map((entry) => classify(dirPath, entry)));
  const dirs = classified.filter((c) => c.isDirectory).sort(compareNames);
  const files = ctx.options.includeFiles ? classified.filter((c) => !c.isDirectory).sort(compareNames) : [];
  const children = [...dirs, ...files];

  ctx.progress.dirsScanned++;

  for (let i = 0; i < children.length; i++) {
    throwIfAborted(ctx.signal);

    const child = children[i];
    const isLastSibling = i === children.length - 1;
    const childPath = join(dirPath, child.name);

    const line: EntryLine = {
      kind: "entry",
      indentPrefix: prefix,
      isLastSibling,
      name: child.name,
      isDirectory: child.isDirectory,
    };
    if (ctx.options.showSize) {
      line.sizeLabel = await sizeLabel(ctx, childPath, child.isDirectory);
    }
    ctx.lines.push(line);
    ctx.progress.itemsFound++;

    if (child.isDirectory) {
      await walk(ctx, childPath, childPrefix(prefix, isLastSibling), depth + 1);
    }
  }
}

/**
 * Depth-first walk producing the rendered tree lines for `rootPath`.
 * Throws ScanAbortedError when `signal` fires.
 */
export async function walkDirectory(
  rootPath: string,
  options: Readonly<ScanOptions>,
  signal?: AbortSignal,
  progress: ScanProgress = { dirsScanned: 0, itemsFound: 0 },
): Promise<TreeLine[]> {
  const ctx: WalkContext = {
    options,
    maxDepth: normalizeMaxDepth(options.maxDepth),
    signal,
    lines: [],
    progress,
    ancestors: new Set(),
  };
  await walk(ctx, rootPath, "", 0);
  return ctx.lines;
}

interface ScanRun {
  abort: AbortController;
  settled: Promise<void>;
  settle: () => void;
}

function createRun(): ScanRun {
  const abort = new AbortController();
  let settle: () => void = () => {};
  const settled = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return { abort, settled, settle };
}

function combine(first: ScanCallbacks, second: ScanCallbacks): Required<ScanCallbacks> {
  return {
    onStatus: (message) => {
      first.onStatus?.(message);
      second.onStatus?.(message);
    },
    onProgress: (progress) => {
      first.onProgress?.(progress);
      second.onProgress?.(progress);
    },
    onComplete: (report) => {
      first.onComplete?.(report);
      second.onComplete?.(report);
    },
    onCancelled: () => {
      first.onCancelled?.();
      second.onCancelled?.();
    },
    onError: (error) => {
      first.onError?.(error);
      second.onError?.(error);
    },
  };
}

/**
 * Runs one scan at a time. Starting a scan while another is in flight aborts
 * the earlier one and waits for it to unwind before the new walk begins.
 *
 * Callbacks given to the constructor hear about every scan; callbacks given
 * to `scan()` only about that one.
 */
export class FolderScanner {
  private current: ScanRun | null = null;
  private currentState: ScannerState = "idle";

  constructor(private readonly callbacks: ScanCallbacks = {}) {}

  get state(): ScannerState {
    return this.currentState;
  }

  async scan(
    rootPath: string,
    options: ScanOptions,
    callbacks: ScanCallbacks = {},
  ): Promise<Result<ScanReport, ScanError>> {
    const run = createRun();
    const previous = this.current;
    this.current = run;
    const notify = combine(this.callbacks, callbacks);

    try {
      if (previous) {
        this.currentState = "cancelling";
        previous.abort.abort();
        await previous.settled;
      }
      // A newer scan may have replaced this one while it waited
      if (run.abort.signal.aborted) return reportCancelled(notify);

      this.currentState = "running";
      return await execute(rootPath, Object.freeze({ ...options }), run.abort.signal, notify);
    } finally {
      run.settle();
      if (this.current === run) {
        this.current = null;
        this.currentState = "idle";
      }
    }
  }

  /** Returns false when there was nothing to cancel. */
  cancel(): boolean {
    if (!this.current || this.current.abort.signal.aborted) return false;
    this.currentState = "cancelling";
    this.current.abort.abort();
    return true;
  }
}

async function execute(
  rootPath: string,
  options: Readonly<ScanOptions>,
  signal: AbortSignal,
  notify: Required<ScanCallbacks>,
): Promise<Result<ScanReport, ScanError>> {
  const validated = await validateRoot(rootPath);
  if (validated.isErr()) return reportError(notify, validated.error);
  const root = validated.value;

  notify.onStatus("Scanning folder structure...");
  logger.info({ root, options }, "Scan started");

  const progress: ScanProgress = { dirsScanned: 0, itemsFound: 0 };
  let reported = -1;
  const timer = setInterval(() => {
    if (signal.aborted || progress.itemsFound === reported) return;
    reported = progress.itemsFound;
    notify.onProgress({ ...progress });
  }, PROGRESS_INTERVAL_MS);

  try {
    const lines = await walkDirectory(root, options, signal, progress);
    if (signal.aborted) return reportCancelled(notify);

    const report: ScanReport = {
      rootPath: root,
      options,
      lines,
      text: renderLines(lines),
      itemCount: lines.filter((line) => line.kind === "entry").length,
      generatedAt: new Date(),
    };
    logger.info({ root, items: report.itemCount }, "Scan complete");
    notify.onStatus(`Scan complete. Found ${report.itemCount} items.`);
    notify.onComplete(report);
    return ok(report);
  } catch (error) {
    if (error instanceof ScanAbortedError) return reportCancelled(notify);
    logger.error({ root, err: error }, "Scan failed");
    return reportError(notify, failure(error));
  } finally {
    clearInterval(timer);
  }
}

function reportCancelled(notify: Required<ScanCallbacks>): Result<ScanReport, ScanError> {
  logger.info("Scan cancelled");
  notify.onStatus("Scan cancelled");
  notify.onCancelled();
  return err(cancelled());
}

function reportError(notify: Required<ScanCallbacks>, error: ScanError): Result<ScanReport, ScanError> {
  notify.onStatus(`Error: ${error.message}`);
  notify.onError(error);
  return err(error);
}
