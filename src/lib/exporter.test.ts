import { rmSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeTree } from "../testing/fsTree";
import { buildExport, isExportFormat } from "./exporter";
import type { EntryLine, ScanReport } from "./types";

function entry(
  indentPrefix: string,
  isLastSibling: boolean,
  name: string,
  isDirectory: boolean,
  sizeLabel: string,
): EntryLine {
  return { kind: "entry", indentPrefix, isLastSibling, name, isDirectory, sizeLabel };
}

describe("buildExport", () => {
  let root: string;
  let report: ScanReport;

  beforeEach(async () => {
    root = await makeTree({ docs: { "guide, part 1.md": "abc" }, "notes.txt": "" });
    report = {
      rootPath: root,
      options: { includeFiles: true, showSize: true, sizeUnit: "bytes" },
      lines: [
        entry("", false, "docs", true, "3 B"),
        entry("│   ", true, "guide, part 1.md", false, "3 B"),
        entry("", true, "notes.txt", false, "0 B"),
      ],
      text: ["├── docs/ [3 B]", "│   └── guide, part 1.md [3 B]", "└── notes.txt [0 B]"].join("\n"),
      itemCount: 3,
      generatedAt: new Date(2024, 6, 1, 9, 30, 0),
    };
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("exports the rendered report as text", async () => {
    const document = await buildExport("txt", report);

    expect(document.extension).toBe(".txt");
    expect(document.content.split("\n")).toEqual([
      `Folder Tree: ${root}`,
      "Generated: 2024-07-01 09:30:00",
      "-".repeat(80),
      "",
      "├── docs/ [3 B]",
      "│   └── guide, part 1.md [3 B]",
      "└── notes.txt [0 B]",
    ]);
  });

  it("exports the folder structure as JSON", async () => {
    const document = await buildExport("json", report);

    expect(document.contentType).toBe("application/json; charset=utf-8");
    expect(JSON.parse(document.content)).toEqual({
      folder: root,
      generated: "2024-07-01 09:30:00",
      structure: [
        { name: "docs", type: "directory", children: [{ name: "guide, part 1.md", type: "file" }] },
        { name: "notes.txt", type: "file" },
      ],
    });
  });

  it("exports one CSV row per entry with quoted names", async () => {
    const document = await buildExport("csv", report);
    const lines = document.content.split("\r\n");

    expect(document.extension).toBe(".csv");
    expect(lines).toHaveLength(5);
    expect(lines[4]).toBe("");
    expect(lines[0]).toBe("Type,Name,Path,Size,Modified");
    expect(lines[1].startsWith(`Directory,docs,${join(root, "docs")},3 B,`)).toBe(true);
    expect(lines[2].startsWith(`File,"guide, part 1.md","${join(root, "docs", "guide, part 1.md")}",3 B,`)).toBe(
      true,
    );
    expect(lines[3]).toMatch(/^File,notes\.txt,.+,0 B,\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });
});

describe("isExportFormat", () => {
  it("accepts only the supported formats", () => {
    expect(["txt", "json", "csv", "xml", ""].filter(isExportFormat)).toEqual(["txt", "json", "csv"]);
  });
});
