export interface GlyphOptions {
  /** Wrap output at this many columns; 0 or absent means unbounded. */
  maxWidth?: number;
}

/**
 * A named glyph set that can turn text into block-letter art.
 * Instances are read-only once registered in a {@link FontCache}.
 */
export interface Font {
  readonly name: string;
  readonly path: string;
  render(text: string, options?: GlyphOptions): string;
}

/**
 * Creates a Font for a validated font file. Throws if the font cannot be used.
 */
export type FontLoader = (name: string, path: string) => Font;

/** The font has no glyph for a character of the text. */
export class UnsupportedGlyphError extends Error {
  readonly font: string;
  readonly glyph: string;

  constructor(font: string, glyph: string) {
    super(`font "${font}" has no glyph for "${glyph}"`);
    this.name = "UnsupportedGlyphError";
    this.font = font;
    this.glyph = glyph;
  }
}
