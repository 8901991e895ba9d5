import fs from "fs";
import figlet from "figlet";
import { UnsupportedGlyphError, type Font, type FontLoader, type GlyphOptions } from "./font.js";

type FigletFontName = ReturnType<typeof figlet.fontsSync>[number];

let knownFonts: FigletFontName[] | null = null;

// figlet keeps one global registry keyed by font name; remember which file each name was parsed from.
const parsedFrom = new Map<FigletFontName, string>();

/**
 * Map a configured font name onto figlet's own font name, ignoring case.
 */
export function resolveFigletName(name: string): FigletFontName | undefined {
  if (!knownFonts) {
    knownFonts = figlet.fontsSync();
  }
  const wanted = name.toLowerCase();
  return knownFonts.find((font) => font.toLowerCase() === wanted);
}

/**
 * Directory holding the .flf files shipped with the figlet package.
 */
export function bundledFontDirectory(): string {
  return figlet.defaults().fontPath ?? "./fonts";
}

/**
 * FIGlet font backed by a .flf file. The file is parsed on first render.
 */
export class FigletFont implements Font {
  readonly name: string;
  readonly path: string;
  private readonly figletName: FigletFontName;
  private readonly drawable = new Map<string, boolean>();

  constructor(name: string, path: string, figletName: FigletFontName) {
    this.name = name;
    this.path = path;
    this.figletName = figletName;
  }

  render(text: string, options: GlyphOptions = {}): string {
    this.ensureParsed();
    this.assertDrawable(text);
    const maxWidth = options.maxWidth ?? 0;
    return figlet.textSync(text, {
      font: this.figletName,
      ...(maxWidth > 0 && { width: maxWidth, whitespaceBreak: true }),
    });
  }

  /**
   * figlet skips characters its font lacks, so render each distinct character
   * on its own: a blank result means no glyph.
   */
  private assertDrawable(text: string): void {
    for (const char of new Set(text)) {
      if (/\s/u.test(char)) {
        continue;
      }
      let drawable = this.drawable.get(char);
      if (drawable === undefined) {
        drawable = figlet.textSync(char, { font: this.figletName }).trim() !== "";
        this.drawable.set(char, drawable);
      }
      if (!drawable) {
        throw new UnsupportedGlyphError(this.name, char);
      }
    }
  }

  private ensureParsed(): void {
    if (parsedFrom.get(this.figletName) === this.path) {
      return;
    }
    figlet.parseFont(this.figletName, fs.readFileSync(this.path, "utf8"));
    parsedFrom.set(this.figletName, this.path);
  }
}

export const loadFigletFont: FontLoader = (name, path) => {
  const figletName = resolveFigletName(name);
  if (!figletName) {
    throw new Error(`figlet has no font named "${name}"`);
  }
  return new FigletFont(name, path, figletName);
};
