import type { Alignment, BorderStyle } from "@marquee/protocol";

export interface LayoutOptions {
  align: Alignment;
  border: BorderStyle;
  /** Width to align within; 0 disables alignment. */
  maxWidth: number;
}

interface BorderChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

const BORDERS: Record<Exclude<BorderStyle, "none">, BorderChars> = {
  single: { topLeft: "┌", topRight: "┐", bottomLeft: "└", bottomRight: "┘", horizontal: "─", vertical: "│" },
  double: { topLeft: "╔", topRight: "╗", bottomLeft: "╚", bottomRight: "╝", horizontal: "═", vertical: "║" },
  rounded: { topLeft: "╭", topRight: "╮", bottomLeft: "╰", bottomRight: "╯", horizontal: "─", vertical: "│" },
  ascii: { topLeft: "+", topRight: "+", bottomLeft: "+", bottomRight: "+", horizontal: "-", vertical: "|" },
};

function displayWidth(line: string): number {
  return [...line].length;
}

function padEnd(line: string, width: number): string {
  return line + " ".repeat(Math.max(0, width - displayWidth(line)));
}

function frame(lines: string[], chars: BorderChars): string[] {
  const inner = Math.max(0, ...lines.map(displayWidth));
  const rule = chars.horizontal.repeat(inner + 2);
  return [
    `${chars.topLeft}${rule}${chars.topRight}`,
    ...lines.map((line) => `${chars.vertical} ${padEnd(line, inner)} ${chars.vertical}`),
    `${chars.bottomLeft}${rule}${chars.bottomRight}`,
  ];
}

/**
 * Draw the optional border around glyph art and position the block within
 * `maxWidth`. The block moves as a unit, so its rows stay aligned to each other.
 */
export function applyLayout(art: string, options: LayoutOptions): string {
  if (art === "") {
    return art;
  }

  let lines = art.split("\n");
  if (options.border !== "none") {
    lines = frame(lines, BORDERS[options.border]);
  }

  const blockWidth = Math.max(0, ...lines.map(displayWidth));
  const slack = options.maxWidth - blockWidth;
  if (slack <= 0 || options.align === "left") {
    return lines.join("\n");
  }

  const offset = options.align === "center" ? Math.floor(slack / 2) : slack;
  const indent = " ".repeat(offset);
  return lines.map((line) => (line === "" ? line : indent + line)).join("\n");
}
