import { generateRequestId, type RenderOptions } from "@marquee/protocol";
import type { StreamAdmission } from "../concurrency/admission.js";
import type { FontCache } from "../fonts/cache.js";
import { RenderError, type RenderFailure } from "../render/errors.js";
import { applyLayout } from "../render/layout.js";
import { renderText } from "../render/render.js";
import { Logger } from "../utils/logger.js";
import { delay, untilAborted } from "./abortable.js";
import { CURSOR_HOME, STREAM_EPILOGUE, STREAM_PREAMBLE } from "./ansi.js";
import { cadenceMs, effectiveTimeoutSeconds, type SpeedRange } from "./cadence.js";
import { ansiColors, colorizeFrame, resolveColorScheme, type CellPainter } from "./colors.js";

/**
 * Destination for frames. `write` resolves once the chunk is flushed to the
 * connection and rejects when the client is gone.
 */
export interface FrameSink {
  write(chunk: string): Promise<void>;
}

export type StopReason = "deadline" | "disconnect" | "cancelled";

export type StreamOutcome =
  | { status: "rejected" }
  | { status: "failed"; error: RenderFailure }
  | { status: "closed"; reason: StopReason; frames: number };

export interface ShutdownResult {
  drained: number;
  abandoned: number;
}

export interface AnimationConfig {
  defaultFont: string;
  defaultTimeoutSeconds: number;
  maxTimeoutSeconds: number;
  speed: SpeedRange;
  /** Upper bound on waiting for the closing reset sequence to flush. */
  drainTimeoutMs?: number;
}

export interface AnimationStreamerConfig {
  admission: StreamAdmission;
  cache: FontCache;
  animation: AnimationConfig;
  logger?: Logger;
  colors?: CellPainter;
}

const DEFAULT_DRAIN_TIMEOUT_MS = 1_000;

/**
 * State of one animated stream from admission until close.
 */
class StreamSession {
  readonly id: string;
  frames = 0;
  readonly closed: Promise<void>;
  private readonly controller = new AbortController();
  private reason: StopReason | null = null;
  private resolveClosed: () => void = () => undefined;

  constructor(id: string) {
    this.id = id;
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  stopReason(): StopReason | null {
    return this.reason;
  }

  /** First caller decides the reason; later calls are no-ops. */
  stop(reason: StopReason): void {
    if (this.reason !== null) {
      return;
    }
    this.reason = reason;
    this.controller.abort();
  }

  markClosed(): void {
    this.resolveClosed();
  }
}

/**
 * Runs color-cycling animated streams under the admission limit.
 */
export class AnimationStreamer {
  private admission: StreamAdmission;
  private cache: FontCache;
  private config: AnimationConfig;
  private logger: Logger;
  private colors: CellPainter;
  private sessions = new Map<string, StreamSession>();
  private shuttingDown = false;

  constructor(config: AnimationStreamerConfig) {
    this.admission = config.admission;
    this.cache = config.cache;
    this.config = config.animation;
    this.logger = config.logger || new Logger("AnimationStreamer");
    this.colors = config.colors ?? ansiColors;
  }

  /**
   * Stream an animation of `text` to `sink` until the effective deadline,
   * a failed write, `signal` aborting (client disconnect) or shutdown.
   *
   * Resolves once the stream is fully closed and its admission slot returned,
   * or immediately with `rejected` when no slot is free.
   */
  async runAnimatedStream(
    text: string,
    options: RenderOptions,
    sink: FrameSink,
    signal?: AbortSignal,
  ): Promise<StreamOutcome> {
    if (this.shuttingDown) {
      return { status: "rejected" };
    }

    const slot = this.admission.acquireSlot();
    if (!slot) {
      this.logger.warn(`Stream rejected: ${this.admission.capacity()} streams already active`);
      return { status: "rejected" };
    }

    const session = new StreamSession(generateRequestId());
    this.sessions.set(session.id, session);
    const onClientGone = () => session.stop("disconnect");
    if (signal?.aborted) {
      session.stop("disconnect");
    } else {
      signal?.addEventListener("abort", onClientGone, { once: true });
    }

    let deadline: ReturnType<typeof setTimeout> | undefined;

    try {
      this.logger.log(`Stream ${session.id} admitted (${this.admission.activeCount()} active)`);

      const rendered = renderText(text, options, this.cache, this.config.defaultFont);
      if (!rendered.ok) {
        this.logger.error(`Stream ${session.id} render failed:`, rendered.error);
        return { status: "failed", error: rendered.error };
      }

      const lines = applyLayout(rendered.art, options).split("\n");
      const scheme = resolveColorScheme(options.color);
      const interval = cadenceMs(options.speed, this.config.speed);
      const timeoutSeconds = effectiveTimeoutSeconds(options.timeout, {
        defaultSeconds: this.config.defaultTimeoutSeconds,
        maxSeconds: this.config.maxTimeoutSeconds,
      });
      deadline = setTimeout(() => session.stop("deadline"), timeoutSeconds * 1000);

      this.logger.log(
        `Stream ${session.id} streaming: ${lines.length} lines, ${interval}ms cadence, ${timeoutSeconds}s deadline, ${scheme.name}`,
      );

      let fault: RenderError | null = null;
      try {
        if (await this.emit(session, sink, STREAM_PREAMBLE)) {
          while (session.stopReason() === null) {
            const frame = CURSOR_HOME + colorizeFrame(lines, scheme, session.frames, this.colors).join("\n") + "\n";
            if (!(await this.emit(session, sink, frame))) {
              break;
            }
            session.frames += 1;
            if (!(await delay(interval, session.signal))) {
              break;
            }
          }
        }
      } catch (error) {
        this.logger.error(`Stream ${session.id} failed after ${session.frames} frames:`, error);
        fault = new RenderError(error);
      }

      if (session.stopReason() !== "disconnect") {
        await this.drain(session, sink);
      }
      if (fault) {
        return { status: "failed", error: fault };
      }

      const reason = session.stopReason() ?? "disconnect";

      this.logger.log(`Stream ${session.id} closed (${reason}) after ${session.frames} frames`);
      return { status: "closed", reason, frames: session.frames };
    } finally {
      clearTimeout(deadline);
      signal?.removeEventListener("abort", onClientGone);
      slot.release();
      this.sessions.delete(session.id);
      session.markClosed();
    }
  }

  /**
   * Write one chunk unless the session stops first.
   * A failed write means the client is gone; it is not retried.
   */
  private async emit(session: StreamSession, sink: FrameSink, chunk: string): Promise<boolean> {
    if (session.stopReason() !== null) {
      return false;
    }
    try {
      const result = await untilAborted(sink.write(chunk), session.signal);
      return !result.aborted;
    } catch (error) {
      this.logger.log(`Stream ${session.id} write failed, treating as disconnect:`, error);
      session.stop("disconnect");
      return false;
    }
  }

  /**
   * Best-effort color reset on the way out, bounded by the drain timeout.
   */
  private async drain(session: StreamSession, sink: FrameSink): Promise<void> {
    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(), this.config.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS);
    try {
      const result = await untilAborted(sink.write(STREAM_EPILOGUE), timeout.signal);
      if (result.aborted) {
        this.logger.warn(`Stream ${session.id} reset sequence not flushed in time`);
      }
    } catch (error) {
      this.logger.log(`Stream ${session.id} reset sequence not delivered:`, error);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Cancel every in-flight stream and wait up to `graceMs` for them to close.
   * New streams are rejected from this point on.
   */
  async shutdown(graceMs: number): Promise<ShutdownResult> {
    this.shuttingDown = true;
    const sessions = [...this.sessions.values()];
    if (sessions.length === 0) {
      return { drained: 0, abandoned: 0 };
    }

    this.logger.log(`Cancelling ${sessions.length} active stream(s)`);
    let drained = 0;
    const allClosed = Promise.all(
      sessions.map((session) =>
        session.closed.then(() => {
          drained++;
        }),
      ),
    );
    for (const session of sessions) {
      session.stop("cancelled");
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const graceElapsed = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, graceMs);
    });
    await Promise.race([allClosed, graceElapsed]);
    clearTimeout(timer);

    const abandoned = sessions.length - drained;
    if (abandoned > 0) {
      this.logger.warn(`${abandoned} stream(s) still open after ${graceMs}ms grace period, abandoning`);
    }
    return { drained, abandoned };
  }

  activeStreams(): number {
    return this.sessions.size;
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }
}
