import type { SizeUnit } from "./types";

const UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

export const SIZE_ERROR_LABEL = "size error";

/**
 * Formats a byte count for display in the tree.
 *
 * `auto` scales by 1024 until the value drops below 1024 (or TB is reached);
 * an explicit unit always divides by 1024 as many times as its position in
 * B → TB. Both render two decimals. `bytes` never scales.
 */
export function formatSize(bytes: number, unit: SizeUnit): string {
  if (unit === "bytes") return `${bytes} B`;
  if (bytes === 0) return "0 B";

  if (unit === "auto") {
    let value = bytes;
    let i = 0;
    while (value >= 1024 && i < UNITS.length - 1) {
      value /= 1024;
      i++;
    }
    return `${value.toFixed(2)} ${UNITS[i]}`;
  }

  const index = UNITS.indexOf(unit);
  return `${(bytes / Math.pow(1024, index)).toFixed(2)} ${unit}`;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
