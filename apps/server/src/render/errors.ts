import { ErrorCode, type ErrorCodeValue } from "@marquee/protocol";

/**
 * Base class for failures that map onto a protocol error code.
 */
export class MarqueeError extends Error {
  readonly code: ErrorCodeValue;

  constructor(code: ErrorCodeValue, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MarqueeError";
    this.code = code;
  }
}

/** Render was called without a font cache. Indicates a wiring bug. */
export class NoCacheError extends MarqueeError {
  constructor() {
    super(ErrorCode.NO_CACHE, "font cache is not available");
    this.name = "NoCacheError";
  }
}

/** Neither the requested nor the default font is loaded. */
export class NoFontsLoadedError extends MarqueeError {
  constructor() {
    super(ErrorCode.NO_FONTS_LOADED, "no fonts loaded");
    this.name = "NoFontsLoadedError";
  }
}

export class RenderError extends MarqueeError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(ErrorCode.RENDER_FAILED, `failed to render text: ${detail}`, { cause });
    this.name = "RenderError";
  }
}

export type RenderFailure = NoCacheError | NoFontsLoadedError | RenderError;
