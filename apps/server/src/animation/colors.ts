import { Chalk } from "chalk";

/**
 * A palette of ANSI-256 colors and a pure function choosing a palette entry
 * for each glyph cell of each frame.
 */
export interface ColorScheme {
  readonly name: string;
  readonly palette: readonly number[];
  index(frame: number, line: number, column: number): number;
}

export const DEFAULT_COLOR_SCHEME = "rainbow";

/**
 * Anything that can wrap a cell in an ANSI-256 foreground color.
 */
export interface CellPainter {
  ansi256(code: number): (text: string) => string;
}

// Streams go to sockets, not TTYs, so color support is fixed rather than detected.
export const ansiColors: CellPainter = new Chalk({ level: 2 });

function mod(value: number, modulus: number): number {
  return ((value % modulus) + modulus) % modulus;
}

function scheme(
  name: string,
  palette: readonly number[],
  pick: (frame: number, line: number, column: number) => number,
): ColorScheme {
  return {
    name,
    palette,
    index: (frame, line, column) => mod(pick(frame, line, column), palette.length),
  };
}

const rainbow = scheme("rainbow", [196, 208, 226, 46, 51, 21, 93, 201], (f, l, c) => f + l + c);

// Keyed by lowercase name
export const COLOR_SCHEMES: ReadonlyMap<string, ColorScheme> = new Map([
  // Diagonal bands drifting right
  ["rainbow", rainbow],
  // Rising from the bottom rows
  ["fire", scheme("fire", [196, 202, 208, 214, 220, 226], (f, l, c) => f - 2 * l + (c % 2))],
  ["ocean", scheme("ocean", [17, 18, 19, 20, 21, 27, 33, 39, 45, 51], (f, _l, c) => f + c)],
  ["matrix", scheme("matrix", [22, 28, 34, 40, 46, 82], (f, l, c) => f + 3 * l + 7 * c)],
  ["neon", scheme("neon", [201, 165, 129, 93, 57, 51], (f, l, c) => f + l - c)],
  // Whole-frame brightness pulse
  ["mono", scheme("mono", [240, 244, 248, 252, 255, 252, 248, 244], (f) => f)],
]);

/**
 * Look up a scheme by name; unknown names get the default scheme.
 */
export function resolveColorScheme(name: string): ColorScheme {
  return COLOR_SCHEMES.get(name.toLowerCase()) ?? rainbow;
}

export function listColorSchemes(): string[] {
  return [...COLOR_SCHEMES.keys()].sort();
}

/**
 * Color every non-whitespace cell of `lines` for the given frame.
 */
export function colorizeFrame(
  lines: readonly string[],
  colorScheme: ColorScheme,
  frame: number,
  colors: CellPainter = ansiColors,
): string[] {
  return lines.map((line, lineIndex) => {
    let out = "";
    let column = 0;
    for (const cell of line) {
      if (/\s/.test(cell)) {
        out += cell;
      } else {
        const code = colorScheme.palette[colorScheme.index(frame, lineIndex, column)];
        out += code === undefined ? cell : colors.ansi256(code)(cell);
      }
      column++;
    }
    return out;
  });
}
