export type InvalidPathReason = "not-found" | "not-directory" | "permission-denied";

export type ScanError =
  | { kind: "invalid-path"; path: string; reason: InvalidPathReason; message: string }
  | { kind: "cancelled"; message: string }
  | { kind: "failure"; message: string; cause?: unknown };

const INVALID_PATH_MESSAGES: Record<InvalidPathReason, string> = {
  "not-found": "Path not found",
  "not-directory": "Path is not a directory",
  "permission-denied": "Permission denied",
};

export function invalidPath(path: string, reason: InvalidPathReason): ScanError {
  return { kind: "invalid-path", path, reason, message: INVALID_PATH_MESSAGES[reason] };
}

export function cancelled(): ScanError {
  return { kind: "cancelled", message: "Scan cancelled" };
}

export function failure(cause: unknown): ScanError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return { kind: "failure", message, cause };
}

/** Node system errors carry a string `code` such as `ENOENT`. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isPermissionError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EACCES" || code === "EPERM";
}

export function isMissingError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "ENOENT" || code === "ENOTDIR";
}

/** Thrown inside the walk to unwind it once the signal fires. */
export class ScanAbortedError extends Error {
  constructor() {
    super("Scan aborted");
    this.name = "AbortError";
  }
}
