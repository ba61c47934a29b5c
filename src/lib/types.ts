export const SIZE_UNITS = ["auto", "bytes", "KB", "MB", "GB", "TB"] as const;

export type SizeUnit = (typeof SIZE_UNITS)[number];

export interface ScanOptions {
  includeFiles: boolean;
  /** Absent means unlimited. Depth 0 is the root's direct children. */
  maxDepth?: number;
  showSize: boolean;
  sizeUnit: SizeUnit;
}

export interface EntryLine {
  kind: "entry";
  indentPrefix: string;
  isLastSibling: boolean;
  name: string;
  isDirectory: boolean;
  sizeLabel?: string;
}

/** Marker line standing in for the contents of a folder that could not be listed. */
interface PlaceholderLine {
  kind: "placeholder";
  indentPrefix: string;
  isLastSibling: boolean;
  label: string;
}

export type TreeLine = EntryLine | PlaceholderLine;

export interface TreeNode {
  name: string;
  type: "file" | "directory";
  children?: TreeNode[];
}

export interface TableRow {
  type: "Directory" | "File";
  name: string;
  path: string;
  size: string;
  modified: string;
}

export interface ScanReport {
  rootPath: string;
  options: Readonly<ScanOptions>;
  lines: TreeLine[];
  text: string;
  itemCount: number;
  generatedAt: Date;
}

export interface ScanProgress {
  dirsScanned: number;
  itemsFound: number;
}

export type ExportFormat = "txt" | "json" | "csv";
