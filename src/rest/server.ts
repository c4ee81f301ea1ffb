// =============================================================================
// REST API — PageBriefServer (HTTP server using node:http)
// =============================================================================

import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import type { ServerOptions } from "./types.js";
import { DEFAULT_MAX_BODY_BYTES, Router, sendError } from "./router.js";
import {
  handleAsk,
  handleChat,
  handleCorrectGrammar,
  handleHealth,
  handleSummary,
  handleTranslate,
  handleUpload,
  type HandlerContext,
} from "./handlers.js";
import type { ContentService } from "../service/content-service.js";
import { describeError, silentLogger, type Logger } from "../logging/logger.js";

export class PageBriefServer {
  private readonly options: Required<ServerOptions>;
  private readonly router: Router;
  private readonly logger: Logger;
  private server: Server | null = null;

  constructor(service: ContentService, options?: ServerOptions, logger?: Logger) {
    this.options = {
      port: options?.port ?? 8000,
      corsOrigin: options?.corsOrigin ?? "*",
      maxBodyBytes: options?.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
    };
    this.logger = logger ?? silentLogger;
    this.router = new Router();
    this.registerRoutes({
      service,
      logger: this.logger,
      maxBodyBytes: this.options.maxBodyBytes,
    });
  }

  private registerRoutes(ctx: HandlerContext): void {
    this.router.get("/health", handleHealth);
    this.router.post("/upload_html/", handleUpload(ctx));
    this.router.get("/get_summary/:token", handleSummary(ctx));
    this.router.post("/ask/", handleAsk(ctx));
    this.router.post("/correct-grammar/", handleCorrectGrammar(ctx));
    this.router.post("/translate/", handleTranslate(ctx));
    this.router.post("/chat_about_content/", handleChat(ctx));

    // CORS preflight for every route
    if (this.options.corsOrigin) {
      const corsHandler = (_req: IncomingMessage, res: ServerResponse) => {
        res.writeHead(204);
        res.end();
      };
      for (const path of this.router.paths()) {
        this.router.options(path, corsHandler);
      }
    }
  }

  private addCorsHeaders(res: ServerResponse): void {
    const origin = this.options.corsOrigin;
    if (!origin) return;
    res.setHeader("Access-Control-Allow-Origin", origin);
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
    if (origin !== "*") res.setHeader("Access-Control-Allow-Credentials", "true");
  }

  private handleRequest = async (
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> => {
    const start = Date.now();
    this.addCorsHeaders(res);

    const method = req.method?.toUpperCase() ?? "GET";
    let pathname: string;
    try {
      pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    } catch {
      return sendError(res, 400, "Malformed request URL");
    }

    res.on("finish", () => {
      this.logger.info("request", {
        method,
        path: pathname,
        status: res.statusCode,
        durationMs: Date.now() - start,
      });
    });

    // Route
    const match = this.router.resolve(method, pathname);
    if (!match) {
      return sendError(res, 404, `Not found: ${method} ${pathname}`);
    }

    try {
      await match.handler(req, res, match.params);
    } catch (err) {
      this.logger.error("request:unhandled", { method, path: pathname, ...describeError(err) });
      if (!res.headersSent) {
        sendError(res, 500, "Internal server error");
      }
    }
  };

  /** Port the server is bound to, or null before listen() */
  get port(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === "string") return null;
    return address.port;
  }

  async listen(port?: number): Promise<void> {
    const p = port ?? this.options.port;
    await new Promise<void>((resolve, reject) => {
      const server = createServer((req, res) => {
        void this.handleRequest(req, res);
      });
      server.on("error", reject);
      server.listen(p, () => resolve());
      this.server = server;
    });
    this.logger.info("server:listening", { port: this.port });
  }

  async close(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      if (!this.server) return resolve();
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server.closeAllConnections();
    });
    this.server = null;
  }
}
