import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { z } from "zod";
import { FolderScanner, validateRoot } from "./scanner";
import { scanOverridesSchema, resolveScanOptions, type FolderTreeConfig } from "./src/lib/config";
import type { InvalidPathReason, ScanError } from "./src/lib/errors";
import { buildExport, isExportFormat } from "./src/lib/exporter";
import { formatTimestamp } from "./src/lib/format";
import { getLogger } from "./src/lib/logger";
import { renderReport } from "./src/lib/treeText";
import type { ScanOptions, ScanProgress, ScanReport } from "./src/lib/types";

const KEEPALIVE_MS = 30_000;

const logger = getLogger("server");

// ---- Background scan state (persists across client connections) ----

interface ReportPayload {
  folder: string;
  generated: string;
  itemCount: number;
  text: string;
}

type ScanEvent =
  | { type: "status"; message: string }
  | { type: "progress"; progress: ScanProgress }
  | { type: "done"; report: ReportPayload }
  | { type: "cancelled" }
  | { type: "error"; error: string };

interface ActiveScan {
  path: string;
  options: ScanOptions;
  status: string | null;
  progress: ScanProgress | null;
  /** Terminal event, once the scan has finished one way or another. */
  outcome: ScanEvent | null;
  listeners: Set<(event: ScanEvent) => void>;
}

const scanQuerySchema = scanOverridesSchema.extend({
  path: z.string({ required_error: "Missing 'path' query parameter" }).min(1, "Missing 'path' query parameter"),
});

const INVALID_PATH_STATUS: Record<InvalidPathReason, number> = {
  "not-found": 404,
  "not-directory": 400,
  "permission-denied": 403,
};

function toPayload(report: ScanReport): ReportPayload {
  return {
    folder: report.rootPath,
    generated: formatTimestamp(report.generatedAt),
    itemCount: report.itemCount,
    text: renderReport(report.rootPath, report.text, report.generatedAt),
  };
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json; charset=utf-8" });
  res.end(JSON.stringify(body));
}

function errorStatus(error: ScanError): number {
  return error.kind === "invalid-path" ? INVALID_PATH_STATUS[error.reason] : 400;
}

const sameOptions = (a: ScanOptions, b: ScanOptions) =>
  a.includeFiles === b.includeFiles &&
  a.maxDepth === b.maxDepth &&
  a.showSize === b.showSize &&
  a.sizeUnit === b.sizeUnit;

/**
 * HTTP front end for the scanner. One background scan is shared by all
 * clients; `/api/scan` streams its events as Server-Sent Events.
 */
export function createScanServer(config: FolderTreeConfig): { server: Server; scanner: FolderScanner } {
  const scanner = new FolderScanner();
  let activeScan: ActiveScan | null = null;
  let lastReport: ScanReport | null = null;

  function startBackgroundScan(path: string, options: ScanOptions): ActiveScan {
    const scan: ActiveScan = {
      path,
      options,
      status: null,
      progress: null,
      outcome: null,
      listeners: new Set(),
    };
    activeScan = scan;

    const broadcast = (event: ScanEvent) => {
      for (const fn of scan.listeners) fn(event);
    };
    const finish = (event: ScanEvent) => {
      scan.outcome = event;
      broadcast(event);
      scan.listeners.clear();
    };

    // Runs in the background, not tied to any request
    scanner
      .scan(path, options, {
        onStatus: (message) => {
          scan.status = message;
          broadcast({ type: "status", message });
        },
        onProgress: (progress) => {
          scan.progress = progress;
          broadcast({ type: "progress", progress });
        },
        onComplete: (report) => {
          lastReport = report;
          finish({ type: "done", report: toPayload(report) });
        },
        onCancelled: () => finish({ type: "cancelled" }),
        onError: (error) => finish({ type: "error", error: error.message }),
      })
      .catch((error: unknown) => {
        logger.error({ err: error, path }, "Background scan crashed");
        finish({ type: "error", error: error instanceof Error ? error.message : String(error) });
      });

    return scan;
  }

  function streamScan(req: IncomingMessage, res: ServerResponse, scan: ActiveScan): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });

    const send = (event: ScanEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    if (scan.outcome) {
      send(scan.outcome);
      res.end();
      return;
    }
    if (scan.status) send({ type: "status", message: scan.status });
    if (scan.progress) send({ type: "progress", progress: scan.progress });

    // SSE keepalive to prevent connection timeout
    const keepalive = setInterval(() => {
      res.write(": keepalive\n\n");
    }, KEEPALIVE_MS);

    const listener = (event: ScanEvent) => {
      send(event);
      if (event.type === "done" || event.type === "cancelled" || event.type === "error") {
        clearInterval(keepalive);
        res.end();
      }
    };
    scan.listeners.add(listener);

    // On client disconnect, just remove the listener (scan continues in background)
    req.on("close", () => {
      scan.listeners.delete(listener);
      clearInterval(keepalive);
    });
  }

  async function handleScan(req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> {
    const query = scanQuerySchema.safeParse(Object.fromEntries(url.searchParams));
    if (!query.success) {
      sendJson(res, 400, { error: query.error.issues[0]?.message ?? "Invalid query" });
      return;
    }

    const { path, ...overrides } = query.data;
    const validated = await validateRoot(path);
    if (validated.isErr()) {
      sendJson(res, errorStatus(validated.error), { error: validated.error.message });
      return;
    }

    const resolved = validated.value;
    const options = resolveScanOptions(config.scan, overrides);

    // Start a new scan only if needed:
    // - no scan exists
    // - different path or options requested
    // - previous scan for the same request did not complete
    const needsNew =
      !activeScan ||
      activeScan.path !== resolved ||
      !sameOptions(activeScan.options, options) ||
      (activeScan.outcome !== null && activeScan.outcome.type !== "done");

    const scan = needsNew || !activeScan ? startBackgroundScan(resolved, options) : activeScan;
    streamScan(req, res, scan);
  }

  async function handleExport(res: ServerResponse, url: URL): Promise<void> {
    const format = url.searchParams.get("format") ?? "txt";
    if (!isExportFormat(format)) {
      sendJson(res, 400, { error: `Unsupported export format: ${format}` });
      return;
    }
    if (!lastReport) {
      sendJson(res, 404, { error: "No completed scan to export" });
      return;
    }

    const document = await buildExport(format, lastReport);
    res.writeHead(200, {
      "Content-Type": document.contentType,
      "Content-Disposition": `attachment; filename="folder-tree${document.extension}"`,
    });
    res.end(document.content);
  }

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (req.method === "GET" && url.pathname === "/api/scan") {
      await handleScan(req, res, url);
      return;
    }
    if (req.method === "POST" && url.pathname === "/api/scan/cancel") {
      sendJson(res, 200, { cancelled: scanner.cancel() });
      return;
    }
    if (req.method === "GET" && url.pathname === "/api/export") {
      await handleExport(res, url);
      return;
    }

    res.writeHead(404, { "Content-Type": "text/plain; charset=utf-8" });
    res.end("Not found");
  }

  const server = createServer((req, res) => {
    route(req, res).catch((error: unknown) => {
      logger.error({ err: error, url: req.url }, "Request failed");
      if (!res.headersSent) {
        sendJson(res, 500, { error: error instanceof Error ? error.message : "Internal error" });
      } else {
        res.end();
      }
    });
  });

  return { server, scanner };
}

export interface ServerInstance {
  port: number;
  server: Server;
  stop: () => Promise<void>;
}

export function startServer(config: FolderTreeConfig, port = config.port): Promise<ServerInstance> {
  const { server, scanner } = createScanServer(config);

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      const address = server.address();
      const boundPort = typeof address === "object" && address !== null ? address.port : port;
      logger.info({ port: boundPort }, "Server listening");

      resolve({
        port: boundPort,
        server,
        stop: () =>
          new Promise<void>((resolveStop, rejectStop) => {
            scanner.cancel();
            server.closeAllConnections();
            server.close((error) => (error ? rejectStop(error) : resolveStop()));
          }),
      });
    });
  });
}
