import http, { type IncomingMessage, type ServerResponse } from "http";
import type { Socket } from "net";
import {
  ALIGNMENTS,
  BORDER_STYLES,
  ErrorCode,
  OPTION_ALIASES,
  parseRenderOptions,
  sanitizeText,
  type FontListBody,
  type HealthBody,
  type RenderDefaults,
} from "@marquee/protocol";
import { colorizeFrame, listColorSchemes, resolveColorScheme } from "../animation/colors.js";
import type { AnimationStreamer, ShutdownResult } from "../animation/streamer.js";
import type { StreamAdmission } from "../concurrency/admission.js";
import type { FontCache } from "../fonts/cache.js";
import { Metrics } from "../metrics/metrics.js";
import { applyLayout } from "../render/layout.js";
import { renderText } from "../render/render.js";
import { Logger } from "../utils/logger.js";
import type { RateLimiter } from "./rateLimit.js";
import { ResponseSink, sendError, sendJson, sendText } from "./responses.js";

export const PARTY_PREFIX = "/party/";

/** Seconds a client turned away at capacity should wait before retrying. */
export const CAPACITY_RETRY_AFTER_SECONDS = 5;

// How long finished connections may linger after the streams drain before they are cut.
const SOCKET_LINGER_MS = 250;

export interface HttpServerConfig {
  port: number;
  host?: string;
  version: string;
  cache: FontCache;
  admission: StreamAdmission;
  streamer: AnimationStreamer;
  defaults: RenderDefaults;
  maxTextLength: number;
  metrics?: Metrics;
  rateLimiter?: RateLimiter;
  logger?: Logger;
}

type Query = URLSearchParams;

/**
 * HTTP front end: static renders, animated streams and service endpoints.
 */
export class HttpServer {
  private server: http.Server | null = null;
  private connectedSockets = new Set<Socket>();
  private config: HttpServerConfig;
  private metrics: Metrics;
  private logger: Logger;

  constructor(config: HttpServerConfig) {
    this.config = config;
    this.metrics = config.metrics ?? new Metrics();
    this.logger = config.logger || new Logger("HttpServer");
  }

  /**
   * Start listening. Resolves with the bound port, which differs from the
   * configured one when that is 0.
   */
  async start(): Promise<number> {
    if (this.server) {
      throw new Error("Server already running");
    }

    const server = http.createServer((req, res) => this.handleRequest(req, res));
    server.on("connection", (socket: Socket) => {
      this.connectedSockets.add(socket);
      socket.on("close", () => {
        this.connectedSockets.delete(socket);
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    server.on("error", (error) => {
      this.logger.error("Server error:", error);
    });

    this.server = server;
    const port = this.getPort();
    this.logger.log(`Listening on ${this.config.host ?? "0.0.0.0"}:${port}`);
    return port;
  }

  /**
   * Stop accepting connections, give active streams up to `graceMs` to
   * finish, then close whatever is still connected.
   */
  async stop(graceMs = 0): Promise<ShutdownResult> {
    const server = this.server;
    if (!server) {
      return { drained: 0, abandoned: 0 };
    }

    this.logger.log("Stopping HTTP server...");
    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    server.closeIdleConnections();

    const result = await this.config.streamer.shutdown(graceMs);
    this.logger.log(`Streams drained: ${result.drained}, abandoned: ${result.abandoned}`);

    server.closeIdleConnections();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const lingered = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, SOCKET_LINGER_MS);
    });
    await Promise.race([closed, lingered]);
    clearTimeout(timer);

    this.logger.log(`Closing ${this.connectedSockets.size} connected socket(s)`);
    for (const socket of this.connectedSockets) {
      socket.destroy();
    }
    this.connectedSockets.clear();

    await closed;
    this.server = null;
    this.logger.log("Server stopped successfully");
    return result;
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  getPort(): number {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : 0;
  }

  getMetrics(): Metrics {
    return this.metrics;
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    this.route(req, res).catch((error: unknown) => {
      this.metrics.increment("totalErrors");
      this.logger.error(`${req.method} ${req.url} failed:`, error);
      if (!res.headersSent) {
        sendError(res, ErrorCode.INTERNAL, "internal server error");
      } else {
        res.destroy();
      }
    });
  }

  private async route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const pathname = url.pathname;

    if (req.method !== "GET") {
      sendError(res, ErrorCode.NOT_FOUND, `no route for ${req.method} ${pathname}`);
      return;
    }

    if (pathname === "/health") {
      this.handleHealth(res);
      return;
    }

    if (!this.allowRequest(req, res)) {
      return;
    }

    switch (pathname) {
      case "/":
        sendText(res, 200, this.usage());
        return;
      case "/fonts":
        this.handleFonts(res);
        return;
      case "/metrics":
        sendJson(res, 200, this.metrics.snapshot());
        return;
      case "/favicon.ico":
        sendError(res, ErrorCode.NOT_FOUND, "not found");
        return;
    }

    if (pathname === "/party" || pathname.startsWith(PARTY_PREFIX)) {
      await this.handleParty(res, pathname.slice(PARTY_PREFIX.length), url.searchParams);
      return;
    }

    this.handleStatic(res, pathname.slice(1), url.searchParams);
  }

  private allowRequest(req: IncomingMessage, res: ServerResponse): boolean {
    const limiter = this.config.rateLimiter;
    if (!limiter) {
      return true;
    }
    const decision = limiter.check(req.socket.remoteAddress ?? "unknown");
    if (decision.allowed) {
      return true;
    }
    sendError(res, ErrorCode.RATE_LIMITED, "rate limit exceeded", {
      "Retry-After": String(decision.retryAfterSeconds),
    });
    return false;
  }

  private handleHealth(res: ServerResponse): void {
    const { admission, cache, streamer, version } = this.config;
    const body: HealthBody = {
      status: streamer.isShuttingDown() ? "draining" : "ok",
      version,
      activeStreams: admission.activeCount(),
      maxStreams: admission.capacity(),
      fonts: cache.size,
    };
    sendJson(res, 200, body);
  }

  private handleFonts(res: ServerResponse): void {
    this.metrics.increment("fontRequests");
    const body: FontListBody = {
      default: this.config.defaults.font,
      fonts: this.config.cache.list(),
    };
    sendJson(res, 200, body);
  }

  /**
   * Decode and clean the text segment of the path, answering 400 when it is unusable.
   */
  private readText(res: ServerResponse, encoded: string): string | null {
    let decoded: string;
    try {
      decoded = decodeURIComponent(encoded);
    } catch {
      sendError(res, ErrorCode.INVALID_OPTION, "text is not valid URL encoding");
      return null;
    }
    const result = sanitizeText(decoded, this.config.maxTextLength);
    if (!result.ok) {
      sendError(res, ErrorCode.INVALID_OPTION, result.error);
      return null;
    }
    return result.text;
  }

  private handleStatic(res: ServerResponse, encoded: string, query: Query): void {
    this.metrics.increment("staticRequests");
    const text = this.readText(res, encoded);
    if (text === null) {
      return;
    }
    const parsed = parseRenderOptions(query, this.config.defaults);
    if (!parsed.ok) {
      sendError(res, ErrorCode.INVALID_OPTION, parsed.error);
      return;
    }

    const { options } = parsed;
    const rendered = renderText(text, options, this.config.cache, this.config.defaults.font);
    if (!rendered.ok) {
      this.metrics.increment("totalErrors");
      this.logger.error("Static render failed:", rendered.error);
      sendError(res, rendered.error.code, rendered.error.message);
      return;
    }

    let art = applyLayout(rendered.art, options);
    // Static output stays plain unless a color was asked for explicitly.
    if (OPTION_ALIASES.color.some((name) => query.get(name))) {
      art = colorizeFrame(art.split("\n"), resolveColorScheme(options.color), 0).join("\n");
    }
    sendText(res, 200, `${art}\n`);
  }

  private async handleParty(res: ServerResponse, encoded: string, query: Query): Promise<void> {
    this.metrics.increment("partyRequests");
    const text = this.readText(res, encoded);
    if (text === null) {
      return;
    }
    if (text === "") {
      sendError(res, ErrorCode.INVALID_OPTION, "text must not be empty");
      return;
    }
    const parsed = parseRenderOptions(query, this.config.defaults);
    if (!parsed.ok) {
      sendError(res, ErrorCode.INVALID_OPTION, parsed.error);
      return;
    }

    const clientGone = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        clientGone.abort();
      }
    });

    const outcome = await this.config.streamer.runAnimatedStream(
      text,
      parsed.options,
      new ResponseSink(res),
      clientGone.signal,
    );

    switch (outcome.status) {
      case "rejected":
        this.metrics.increment("rejectedStreams");
        sendError(res, ErrorCode.CAPACITY_EXCEEDED, "too many active streams, try again later", {
          "Retry-After": String(CAPACITY_RETRY_AFTER_SECONDS),
        });
        return;
      case "failed":
        this.metrics.increment("totalErrors");
        if (res.headersSent) {
          // Frames already went out; the status line cannot change now.
          res.end();
        } else {
          sendError(res, outcome.error.code, outcome.error.message);
        }
        return;
      case "closed":
        if (!res.destroyed) {
          res.end();
        }
        return;
    }
  }

  private usage(): string {
    const { defaults, maxTextLength } = this.config;
    return [
      "marquee: block-letter text over HTTP",
      "",
      "  GET /<text>          render once",
      "  GET /party/<text>    stream a color-cycling animation",
      "  GET /fonts           list loaded fonts",
      "  GET /health          service status",
      "  GET /metrics         request counters",
      "",
      "Options (query string):",
      `  font, f       font name (default ${defaults.font})`,
      `  color, c      ${listColorSchemes().join(", ")} (default ${defaults.color})`,
      `  maxwidth, mw  output width in columns, 0 for unbounded (default ${defaults.maxWidth})`,
      "  timeout, t    animation length in seconds",
      `  speed, s      frames per second (default ${defaults.speed})`,
      `  align, a      ${ALIGNMENTS.join(", ")} (default ${defaults.align})`,
      `  border, b     ${BORDER_STYLES.join(", ")} (default ${defaults.border})`,
      "",
      `Text is limited to ${maxTextLength} characters.`,
      "",
    ].join("\n");
  }
}
