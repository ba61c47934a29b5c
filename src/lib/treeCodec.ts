import { stat } from "node:fs/promises";
import { join } from "node:path";
import { formatTimestamp } from "./format";
import { getLogger } from "./logger";
import { parseLine, stripHeader, type ParsedLine } from "./treeText";
import type { TableRow, TreeNode } from "./types";

const logger = getLogger("tree-codec");

type EntryParse = Extract<ParsedLine, { kind: "entry" }>;

/**
 * A marker stands for an unreadable folder only as that folder's sole child.
 * Anywhere else it is a file that happens to carry the same name.
 */
function marksUnreadable(marker: { depth: number }, previous: ParsedLine | undefined): boolean {
  return previous?.kind === "entry" && previous.isDirectory && previous.depth === marker.depth - 1;
}

/**
 * Yields the entry lines of a rendered tree, skipping the report header,
 * blank lines, bare continuation bars and placeholders. Lines that do not
 * look like tree rows are dropped rather than failing the export.
 */
function entries(lines: string[]): EntryParse[] {
  const result: EntryParse[] = [];
  let malformed = 0;
  let previous: ParsedLine | undefined;

  for (const line of stripHeader(lines)) {
    if (line.trim() === "") continue;
    const parsed = parseLine(line);

    if (parsed.kind === "entry") {
      result.push(parsed);
    } else if (parsed.kind === "placeholder") {
      if (!marksUnreadable(parsed, previous)) {
        result.push({ kind: "entry", depth: parsed.depth, name: parsed.label, isDirectory: false, size: "" });
      }
    } else if (parsed.kind === "malformed") {
      malformed++;
    }

    if (parsed.kind !== "continuation") previous = parsed;
  }

  if (malformed > 0) {
    logger.debug({ malformed }, "Skipped lines that are not tree rows");
  }
  return result;
}

interface Frame {
  children: TreeNode[];
  /** Depth of the folder owning `children`; -1 for the top level. */
  ownerDepth: number;
}

/** Rebuilds the folder forest from rendered tree text. */
export function parseToTree(lines: string[]): TreeNode[] {
  const forest: TreeNode[] = [];
  const stack: Frame[] = [{ children: forest, ownerDepth: -1 }];

  for (const entry of entries(lines)) {
    while (stack.length > 1 && entry.depth <= stack[stack.length - 1].ownerDepth) {
      stack.pop();
    }

    const node: TreeNode = { name: entry.name, type: entry.isDirectory ? "directory" : "file" };
    stack[stack.length - 1].children.push(node);

    if (entry.isDirectory) {
      node.children = [];
      stack.push({ children: node.children, ownerDepth: entry.depth });
    }
  }

  return forest;
}

async function modifiedTime(path: string): Promise<string> {
  try {
    return formatTimestamp((await stat(path)).mtime);
  } catch (error) {
    // Moved or deleted since the scan
    logger.debug({ path, err: error }, "No modification time");
    return "";
  }
}

/**
 * Flattens rendered tree text into one row per entry, rebuilding each full
 * path under `rootPath` and looking up its current modification time.
 */
export async function parseToRows(lines: string[], rootPath: string): Promise<TableRow[]> {
  const rows: TableRow[] = [];
  let pathStack: string[] = [];

  for (const entry of entries(lines)) {
    pathStack = [...pathStack.slice(0, entry.depth), entry.name];
    const path = join(rootPath, ...pathStack);

    rows.push({
      type: entry.isDirectory ? "Directory" : "File",
      name: entry.name,
      path,
      size: entry.size,
      modified: await modifiedTime(path),
    });
  }

  return rows;
}

export const CSV_HEADER = ["Type", "Name", "Path", "Size", "Modified"] as const;

function escapeCsv(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n") || value.includes("\r")) {
    return `"${value.replaceAll('"', '""')}"`;
  }
  return value;
}

export function toCsv(rows: TableRow[]): string {
  const records = [CSV_HEADER.join(",")];
  for (const row of rows) {
    records.push([row.type, row.name, row.path, row.size, row.modified].map(escapeCsv).join(","));
  }
  // RFC 4180: every record ends in CRLF
  return records.map((record) => `${record}\r\n`).join("");
}
