import { formatTimestamp } from "./format";
import type { TreeLine } from "./types";

export const BRANCH = "├── ";
export const CORNER = "└── ";
export const PIPE = "│   ";
export const BLANK = "    ";

/** Columns per nesting level. Every glyph above is exactly this wide. */
export const INDENT_STEP = 4;

export const ACCESS_DENIED_LABEL = "[Access Denied]";

const SEPARATOR_WIDTH = 80;

export function childPrefix(prefix: string, isLastSibling: boolean): string {
  return prefix + (isLastSibling ? BLANK : PIPE);
}

export function renderLine(line: TreeLine): string {
  const connector = line.isLastSibling ? CORNER : BRANCH;
  if (line.kind === "placeholder") {
    return `${line.indentPrefix}${connector}${line.label}`;
  }
  const slash = line.isDirectory ? "/" : "";
  const size = line.sizeLabel !== undefined ? ` [${line.sizeLabel}]` : "";
  return `${line.indentPrefix}${connector}${line.name}${slash}${size}`;
}

export function renderLines(lines: TreeLine[]): string {
  return lines.map(renderLine).join("\n");
}

/** The text shown to users and written by the txt export. */
export function renderReport(rootPath: string, body: string, generatedAt: Date): string {
  return (
    `Folder Tree: ${rootPath}\n` +
    `Generated: ${formatTimestamp(generatedAt)}\n` +
    `${"-".repeat(SEPARATOR_WIDTH)}\n\n` +
    body
  );
}

export type ParsedLine =
  | { kind: "entry"; depth: number; name: string; isDirectory: boolean; size: string }
  | { kind: "placeholder"; depth: number; label: string }
  | { kind: "continuation" }
  | { kind: "malformed"; text: string };

const LINE_PATTERN = /^([│ ]*)(├── |└── )(.+)$/u;
const CONTINUATION_PATTERN = /^[│ ]+$/u;
const SIZE_SUFFIX_PATTERN = / \[((?:\d+(?:\.\d+)? (?:B|KB|MB|GB|TB))|size error)\]$/;
const SEPARATOR_PATTERN = /^-{4,}\s*$/;

export function parseLine(text: string): ParsedLine {
  const match = LINE_PATTERN.exec(text);
  if (!match) {
    return CONTINUATION_PATTERN.test(text) ? { kind: "continuation" } : { kind: "malformed", text };
  }

  const [, prefix, connector, label] = match;
  // Code points, not UTF-16 units: "│" is one column.
  const depth = Math.floor([...prefix].length / INDENT_STEP);

  // The marker is always a last sibling. Whether it follows its folder is up to the caller.
  if (label === ACCESS_DENIED_LABEL && connector === CORNER) {
    return { kind: "placeholder", depth, label };
  }

  let name = label;
  let size = "";
  const sizeMatch = SIZE_SUFFIX_PATTERN.exec(name);
  if (sizeMatch) {
    size = sizeMatch[1];
    name = name.slice(0, sizeMatch.index);
  }

  const isDirectory = name.endsWith("/");
  if (isDirectory) name = name.slice(0, -1);
  if (name.length === 0) return { kind: "malformed", text };

  return { kind: "entry", depth, name, isDirectory, size };
}

/**
 * Drops the report header: everything through the first dashed separator
 * plus the blank line after it. Input without a separator is returned as is.
 */
export function stripHeader(lines: string[]): string[] {
  const separator = lines.findIndex((line) => SEPARATOR_PATTERN.test(line));
  if (separator === -1) return lines;
  const start = lines[separator + 1]?.trim() === "" ? separator + 2 : separator + 1;
  return lines.slice(start);
}
