import type { RenderOptions } from "@marquee/protocol";
import type { FontCache } from "../fonts/cache.js";
import { NoCacheError, NoFontsLoadedError, RenderError, type RenderFailure } from "./errors.js";

export const DEFAULT_FONT_NAME = "standard";

export type RenderResult = { ok: true; art: string } | { ok: false; error: RenderFailure };

/**
 * Render text as glyph art with the requested font, falling back to
 * `defaultFont` when the requested one is not loaded.
 *
 * Only reads from the cache, so any number of requests may call it at once.
 */
export function renderText(
  text: string,
  options: Pick<RenderOptions, "font" | "maxWidth">,
  cache: FontCache | null | undefined,
  defaultFont: string = DEFAULT_FONT_NAME,
): RenderResult {
  if (!cache) {
    return { ok: false, error: new NoCacheError() };
  }

  if (text === "") {
    return { ok: true, art: "" };
  }

  const font = cache.lookupOrDefault(options.font, defaultFont);
  if (!font) {
    return { ok: false, error: new NoFontsLoadedError() };
  }

  try {
    return { ok: true, art: font.render(text, { maxWidth: options.maxWidth }) };
  } catch (error) {
    return { ok: false, error: new RenderError(error) };
  }
}
