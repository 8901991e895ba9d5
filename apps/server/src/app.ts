import { AnimationStreamer, type ShutdownResult } from "./animation/streamer.js";
import { StreamAdmission } from "./concurrency/admission.js";
import { animationConfigFrom, describeConfig, type ServerConfig } from "./config/config.js";
import { FontCache, type FontCacheOptions } from "./fonts/cache.js";
import { HttpServer } from "./http/server.js";
import { RateLimiter } from "./http/rateLimit.js";
import { Metrics } from "./metrics/metrics.js";
import { NoFontsLoadedError } from "./render/errors.js";
import { Logger } from "./utils/logger.js";

export interface MarqueeAppOptions {
  /** Font loader override, mainly for tests. */
  loader?: FontCacheOptions["loader"];
}

/**
 * Wires the font cache, admission controller, animation streamer and HTTP
 * server together and owns their lifecycle.
 */
export class MarqueeApp {
  readonly cache: FontCache;
  readonly admission: StreamAdmission;
  readonly streamer: AnimationStreamer;
  readonly server: HttpServer;
  readonly metrics = new Metrics();
  private config: ServerConfig;
  private logger: Logger;
  private stopping: Promise<ShutdownResult> | null = null;

  constructor(config: ServerConfig, options: MarqueeAppOptions = {}) {
    this.config = config;
    this.logger = new Logger("MarqueeApp", config.logConsole);
    const cacheLogger = this.logger.child("FontCache");
    const admissionLogger = this.logger.child("StreamAdmission");
    const streamerLogger = this.logger.child("AnimationStreamer");
    const serverLogger = this.logger.child("HttpServer");

    this.cache = new FontCache({ loader: options.loader, logger: cacheLogger });
    this.admission = new StreamAdmission(config.streaming.maxConcurrent, admissionLogger);
    this.streamer = new AnimationStreamer({
      admission: this.admission,
      cache: this.cache,
      animation: animationConfigFrom(config),
      logger: streamerLogger,
    });
    this.server = new HttpServer({
      port: config.server.port,
      host: config.server.host,
      version: config.version,
      cache: this.cache,
      admission: this.admission,
      streamer: this.streamer,
      defaults: config.text.defaults,
      maxTextLength: config.text.maxLength,
      metrics: this.metrics,
      rateLimiter: new RateLimiter(config.rateLimit.requestsPerMinute, config.rateLimit.burst),
      logger: serverLogger,
    });
  }

  /**
   * Load fonts and start serving. Fails when no font, or not the default
   * font, could be loaded.
   */
  async start(): Promise<number> {
    this.logger.log(`Starting with ${describeConfig(this.config)}`);
    const { path, allowed, defaultFont } = this.config.fonts;

    const result = await this.cache.populate(path, allowed);
    if (result.skipped.length > 0) {
      this.logger.warn(`Skipped fonts: ${result.skipped.map((font) => font.name).join(", ")}`);
    }
    if (result.loaded === 0) {
      throw new NoFontsLoadedError();
    }
    if (!this.cache.has(defaultFont)) {
      throw new Error(`default font "${defaultFont}" could not be loaded from ${path}`);
    }

    const port = await this.server.start();
    this.logger.log(`Serving ${this.cache.size} font(s) on port ${port}`);
    return port;
  }

  /**
   * Stop the server, letting active streams drain for the configured grace
   * period. Repeated calls share the first shutdown.
   */
  stop(): Promise<ShutdownResult> {
    if (!this.stopping) {
      this.stopping = this.server.stop(this.config.server.shutdownGraceSeconds * 1000);
    }
    return this.stopping;
  }
}
