import { formatTimestamp } from "./format";
import { parseToRows, parseToTree, toCsv } from "./treeCodec";
import { renderReport } from "./treeText";
import type { ExportFormat, ScanReport } from "./types";

export const EXPORT_FORMATS = ["txt", "json", "csv"] as const satisfies readonly ExportFormat[];

export interface ExportDocument {
  content: string;
  extension: string;
  contentType: string;
}

/**
 * Builds an export from the rendered report, the same text the user sees.
 * JSON and CSV are reconstructed by parsing that text back.
 */
export async function buildExport(format: ExportFormat, report: ScanReport): Promise<ExportDocument> {
  const text = renderReport(report.rootPath, report.text, report.generatedAt);

  switch (format) {
    case "txt":
      return { content: text, extension: ".txt", contentType: "text/plain; charset=utf-8" };

    case "json": {
      const document = {
        folder: report.rootPath,
        generated: formatTimestamp(report.generatedAt),
        structure: parseToTree(text.split("\n")),
      };
      return {
        content: JSON.stringify(document, undefined, 2),
        extension: ".json",
        contentType: "application/json; charset=utf-8",
      };
    }

    case "csv": {
      const rows = await parseToRows(text.split("\n"), report.rootPath);
      return { content: toCsv(rows), extension: ".csv", contentType: "text/csv; charset=utf-8" };
    }
  }
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}
