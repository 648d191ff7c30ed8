/**
 * Completion HTTP Server
 *
 * Receives worker completion callbacks and serves status and history.
 * Uses Node's built-in http module.
 *
 * @module
 */

import * as http from "node:http";
import type { CompletionListener } from "./CompletionListener.js";
import type { IProcessingEventLog } from "../../history/processing-event-log.js";
import type { StatusSource } from "../../pipeline/status.js";
import { CompletionPayloadSchema, toCompletionEvent } from "../models/completion.js";
import { CompletionError, ErrorCode, errorMessage, toError } from "../../errors.js";
import { createLogger, type Logger } from "../../../utils/logger.js";

// =============================================================================
// Types
// =============================================================================

interface ServerConfig {
  port: number;
  host?: string;
}

type RouteHandler = (req: http.IncomingMessage, res: http.ServerResponse, query: URLSearchParams) => Promise<void>;

interface Route {
  method: string;
  path: string;
  handler: RouteHandler;
}

export interface CompletionServerOptions {
  logger?: Logger;
  /** Largest accepted request body */
  maxBodyBytes?: number;
  historyLimit?: number;
  now?: () => number;
}

const DEFAULT_MAX_BODY_BYTES = 64 * 1024;
const DEFAULT_HISTORY_LIMIT = 50;

// =============================================================================
// CompletionServer Class
// =============================================================================

export class CompletionServer {
  private readonly listener: CompletionListener;
  private readonly status: StatusSource;
  private readonly eventLog: IProcessingEventLog;
  private readonly logger: Logger;
  private readonly maxBodyBytes: number;
  private readonly historyLimit: number;
  private readonly now: () => number;
  private readonly startedAt: number;
  private readonly routes: Route[] = [];
  private server: http.Server | null = null;

  constructor(
    listener: CompletionListener,
    status: StatusSource,
    eventLog: IProcessingEventLog,
    options: CompletionServerOptions = {}
  ) {
    this.listener = listener;
    this.status = status;
    this.eventLog = eventLog;
    this.logger = options.logger ?? createLogger("completion-server");
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();

    this.addRoute("POST", "/processing_complete", this.handleProcessingComplete.bind(this));
    this.addRoute("GET", "/status", this.handleStatus.bind(this));
    this.addRoute("GET", "/health", this.handleHealth.bind(this));
    this.addRoute("GET", "/processing_history", this.handleHistory.bind(this));
  }

  private addRoute(method: string, path: string, handler: RouteHandler): void {
    this.routes.push({ method, path, handler });
  }

  // ===========================================================================
  // Request Handling
  // ===========================================================================

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";

    const matching = this.routes.filter((route) => route.path === url.pathname);
    if (matching.length === 0) {
      this.sendJSON(res, { error: "Not Found" }, 404);
      return;
    }

    const route = matching.find((candidate) => candidate.method === method);
    if (!route) {
      res.setHeader("Allow", matching.map((candidate) => candidate.method).join(", "));
      this.sendJSON(res, { error: "Method Not Allowed" }, 405);
      return;
    }

    await route.handler(req, res, url.searchParams);
  }

  private readBody(req: http.IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let received = 0;
      req.on("data", (chunk: Buffer) => {
        received += chunk.length;
        if (received > this.maxBodyBytes) {
          reject(new CompletionError("Request body too large", ErrorCode.COMPLETION_INVALID_PAYLOAD));
          req.destroy();
          return;
        }
        chunks.push(chunk);
      });
      req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
      req.on("error", reject);
    });
  }

  private sendJSON(res: http.ServerResponse, data: unknown, status = 200): void {
    res.writeHead(status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(data));
  }

  private sendBadRequest(res: http.ServerResponse, message: string, issues: string[] = []): void {
    this.logger.warn({ issues, outcome: "rejected" }, `Invalid completion payload: ${message}`);
    this.sendJSON(res, { error: message, issues }, 400);
  }

  // ===========================================================================
  // Handlers
  // ===========================================================================

  private async handleProcessingComplete(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(await this.readBody(req));
    } catch (error) {
      this.sendBadRequest(res, error instanceof CompletionError ? error.message : "Body is not valid JSON");
      return;
    }

    const parsed = CompletionPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      this.sendBadRequest(
        res,
        "Malformed completion payload",
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      );
      return;
    }

    const result = await this.listener.onCompletion(toCompletionEvent(parsed.data));
    this.sendJSON(res, {
      message: "Processing completion recorded",
      filename: parsed.data.filename,
      status: result.status,
      matched: result.matched,
    });
  }

  private async handleStatus(_req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    this.sendJSON(res, this.status.status());
  }

  private async handleHealth(_req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    this.sendJSON(res, {
      status: "ok",
      uptimeSeconds: Math.floor((this.now() - this.startedAt) / 1000),
    });
  }

  private async handleHistory(
    _req: http.IncomingMessage,
    res: http.ServerResponse,
    query: URLSearchParams
  ): Promise<void> {
    const requested = Number.parseInt(query.get("limit") ?? "", 10);
    const limit = Number.isFinite(requested) && requested > 0 ? Math.min(requested, 1000) : this.historyLimit;
    const events = await this.eventLog.recent(limit);
    this.sendJSON(res, { events, count: events.length });
  }

  // ===========================================================================
  // Server Lifecycle
  // ===========================================================================

  /** Bound port; differs from the configured one when that was 0 */
  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : null;
  }

  async start(config: ServerConfig): Promise<void> {
    const { port, host = "127.0.0.1" } = config;

    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          this.logger.error({ err: toError(error), url: req.url }, "Request failed");
          if (!res.headersSent) {
            this.sendJSON(res, { error: "Internal Server Error" }, 500);
          } else {
            res.end();
          }
        });
      });

      server.once("error", (error: Error) => {
        reject(
          new CompletionError(
            `Completion server could not listen on ${host}:${port}: ${errorMessage(error)}`,
            ErrorCode.COMPLETION_SERVER_START_FAILED,
            { host, port }
          )
        );
      });

      server.listen(port, host, () => {
        this.server = server;
        this.logger.info({ host, port: this.port }, "Completion server listening");
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    this.logger.info("Completion server stopped");
  }
}
