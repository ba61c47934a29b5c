import { rmSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FolderScanner, walkDirectory } from "./scanner";
import { ScanAbortedError } from "./src/lib/errors";
import { parseToTree } from "./src/lib/treeCodec";
import { renderLines } from "./src/lib/treeText";
import type { ScanOptions } from "./src/lib/types";
import { makeTree } from "./src/testing/fsTree";

// Folder path -> error code that listing it should fail with
const failures = vi.hoisted(() => new Map<string, string>());
// Called with every folder path just before it is listed
const watchers = vi.hoisted(() => new Set<(path: string) => void>());

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    readdir: async (...args: Parameters<typeof actual.readdir>) => {
      const path = String(args[0]);
      for (const watch of watchers) watch(path);
      const code = failures.get(path);
      if (code) {
        throw Object.assign(new Error(`${code}: scandir '${path}'`), { code });
      }
      return actual.readdir(...args);
    },
  };
});

const ALL: ScanOptions = { includeFiles: true, showSize: false, sizeUnit: "auto" };

describe("unreadable folders", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTree({
      locked: { "secret.txt": "s" },
      open: { "a.txt": "abc" },
      "z.txt": "",
    });
    failures.set(join(root, "locked"), "EACCES");
  });

  afterEach(() => {
    failures.clear();
    rmSync(root, { recursive: true, force: true });
  });

  it("puts an access denied marker under the folder and keeps going", async () => {
    const lines = await walkDirectory(root, ALL);
    expect(renderLines(lines).split("\n")).toEqual([
      "├── locked/",
      "│   └── [Access Denied]",
      "├── open/",
      "│   └── a.txt",
      "└── z.txt",
    ]);
  });

  it("emits no marker for a level beyond the depth limit", async () => {
    const lines = await walkDirectory(root, { ...ALL, maxDepth: 0 });
    expect(renderLines(lines).split("\n")).toEqual(["├── locked/", "├── open/", "└── z.txt"]);
  });

  it("records a size error sentinel instead of failing", async () => {
    const lines = await walkDirectory(root, { ...ALL, showSize: true, sizeUnit: "bytes" });
    expect(renderLines(lines).split("\n")).toEqual([
      "├── locked/ [size error]",
      "│   └── [Access Denied]",
      "├── open/ [3 B]",
      "│   └── a.txt [3 B]",
      "└── z.txt [0 B]",
    ]);
  });

  it("leaves the marker out of the parsed tree", async () => {
    const lines = await walkDirectory(root, ALL);
    expect(parseToTree(renderLines(lines).split("\n"))).toEqual([
      { name: "locked", type: "directory", children: [] },
      { name: "open", type: "directory", children: [{ name: "a.txt", type: "file" }] },
      { name: "z.txt", type: "file" },
    ]);
  });

  it("rejects an unreadable root as an invalid path", async () => {
    failures.set(root, "EACCES");
    const result = await new FolderScanner().scan(root, ALL);
    expect(result._unsafeUnwrapErr()).toMatchObject({ kind: "invalid-path", reason: "permission-denied" });
  });

  it("skips a folder that vanished mid-scan", async () => {
    failures.set(join(root, "locked"), "ENOENT");
    const lines = await walkDirectory(root, ALL);
    expect(renderLines(lines).split("\n")).toEqual(["├── locked/", "├── open/", "│   └── a.txt", "└── z.txt"]);
  });

  it("fails the scan on unexpected errors", async () => {
    failures.set(join(root, "open"), "EIO");
    const onStatus = vi.fn();
    const result = await new FolderScanner({ onStatus }).scan(root, ALL);

    const error = result._unsafeUnwrapErr();
    expect(error.kind).toBe("failure");
    expect(error.message).toBe(`EIO: scandir '${join(root, "open")}'`);
    expect(onStatus).toHaveBeenLastCalledWith(`Error: EIO: scandir '${join(root, "open")}'`);
  });
});

describe("cancelling mid-walk", () => {
  let root: string;
  let listed: string[];

  beforeEach(async () => {
    root = await makeTree({
      a: { deep: { "x.txt": "x" }, "1.txt": "1" },
      b: { "2.txt": "2" },
      c: { "3.txt": "3" },
    });
    listed = [];
    watchers.add((path) => listed.push(path));
  });

  afterEach(() => {
    watchers.clear();
    rmSync(root, { recursive: true, force: true });
  });

  const cancelWhenListing = (scanner: FolderScanner, target: string) => {
    watchers.add((path) => {
      if (path === target) scanner.cancel();
    });
  };

  it("stops between entries once the walk is under way", async () => {
    const onComplete = vi.fn();
    const onCancelled = vi.fn();
    const scanner = new FolderScanner({ onComplete, onCancelled });
    cancelWhenListing(scanner, join(root, "b"));

    const result = await scanner.scan(root, ALL);

    expect(result._unsafeUnwrapErr().kind).toBe("cancelled");
    expect(listed).toEqual([root, root, join(root, "a"), join(root, "a", "deep"), join(root, "b")]);
    expect(onCancelled).toHaveBeenCalledTimes(1);
    expect(onComplete).not.toHaveBeenCalled();
    expect(scanner.state).toBe("idle");
  });

  it("stops inside a folder size total", async () => {
    const onStatus = vi.fn();
    const onComplete = vi.fn();
    const scanner = new FolderScanner({ onStatus, onComplete });
    cancelWhenListing(scanner, join(root, "a", "deep"));

    const result = await scanner.scan(root, { ...ALL, showSize: true });

    expect(result._unsafeUnwrapErr().kind).toBe("cancelled");
    expect(listed).toEqual([root, root, join(root, "a"), join(root, "a", "deep")]);
    expect(onComplete).not.toHaveBeenCalled();
    expect(onStatus).toHaveBeenLastCalledWith("Scan cancelled");
    expect(scanner.state).toBe("idle");
  });

  it("stops a bare walk through its signal", async () => {
    const controller = new AbortController();
    watchers.add((path) => {
      if (path === join(root, "a")) controller.abort();
    });

    await expect(walkDirectory(root, ALL, controller.signal)).rejects.toBeInstanceOf(ScanAbortedError);
    expect(listed).toEqual([root, join(root, "a")]);
  });
});
