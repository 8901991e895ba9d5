import { z } from "zod";
import { ALIGNMENTS, BORDER_STYLES, type Alignment, type BorderStyle, type RenderDefaults, type RenderOptions } from "./types.js";
import { MAX_FONT_NAME_LENGTH, MAX_TEXT_LENGTH, MAX_TIMEOUT_SECONDS, MAX_WIDTH } from "./limits.js";

export type QueryInput = URLSearchParams | Record<string, string | undefined>;

/**
 * Query parameter names accepted for each option, long form first.
 */
export const OPTION_ALIASES = {
  font: ["font", "f"],
  color: ["color", "c"],
  maxWidth: ["maxwidth", "mw"],
  timeout: ["timeout", "t"],
  speed: ["speed", "s"],
  align: ["align", "a"],
  border: ["border", "b"],
} as const satisfies Record<keyof RenderOptions, readonly string[]>;

const FONT_NAME_PATTERN = new RegExp(`^[A-Za-z0-9 _-]{1,${MAX_FONT_NAME_LENGTH}}$`);

function nonNegativeInteger(field: string, max: number) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, `${field} must be a non-negative integer`)
    .transform(Number)
    .pipe(z.number().max(max, `${field} must be at most ${max}`));
}

const RenderQuerySchema = z.object({
  font: z
    .string()
    .trim()
    .regex(FONT_NAME_PATTERN, `font must be 1-${MAX_FONT_NAME_LENGTH} letters, digits, spaces, '_' or '-'`)
    .optional(),
  color: z.string().trim().toLowerCase().max(32, "color must be at most 32 characters").optional(),
  maxWidth: nonNegativeInteger("maxwidth", MAX_WIDTH).optional(),
  timeout: nonNegativeInteger("timeout", MAX_TIMEOUT_SECONDS).optional(),
  // Out-of-range speeds are clamped when the stream starts, so only the shape is checked here.
  speed: z.string().trim().regex(/^-?\d{1,6}$/, "speed must be an integer").transform(Number).optional(),
  align: z
    .string()
    .trim()
    .toLowerCase()
    .refine(isAlignment, `align must be one of ${ALIGNMENTS.join(", ")}`)
    .optional(),
  border: z
    .string()
    .trim()
    .toLowerCase()
    .refine(isBorderStyle, `border must be one of ${BORDER_STYLES.join(", ")}`)
    .optional(),
});

export type ParseResult = { ok: true; options: RenderOptions } | { ok: false; error: string };

function readParam(query: QueryInput, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = query instanceof URLSearchParams ? query.get(name) : query[name];
    if (value !== null && value !== undefined && value !== "") {
      return value;
    }
  }
  return undefined;
}

/**
 * Build a frozen {@link RenderOptions}, filling unset fields from defaults.
 * `timeout` defaults to 0, which the stream loop reads as "server default".
 */
export function createRenderOptions(
  defaults: RenderDefaults,
  overrides: Partial<RenderOptions> = {},
): RenderOptions {
  return Object.freeze({
    font: overrides.font ?? defaults.font,
    color: overrides.color ?? defaults.color,
    maxWidth: overrides.maxWidth ?? defaults.maxWidth,
    timeout: overrides.timeout ?? 0,
    speed: overrides.speed ?? defaults.speed,
    align: overrides.align ?? defaults.align,
    border: overrides.border ?? defaults.border,
  });
}

/**
 * Parse render options from query parameters.
 * Rejects malformed values; anything not given comes from `defaults`.
 */
export function parseRenderOptions(query: QueryInput, defaults: RenderDefaults): ParseResult {
  const raw = {
    font: readParam(query, OPTION_ALIASES.font),
    color: readParam(query, OPTION_ALIASES.color),
    maxWidth: readParam(query, OPTION_ALIASES.maxWidth),
    timeout: readParam(query, OPTION_ALIASES.timeout),
    speed: readParam(query, OPTION_ALIASES.speed),
    align: readParam(query, OPTION_ALIASES.align),
    border: readParam(query, OPTION_ALIASES.border),
  };

  const parsed = RenderQuerySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, error: issue ? issue.message : "Invalid render options" };
  }

  const { font, color, maxWidth, timeout, speed, align, border } = parsed.data;
  return {
    ok: true,
    options: createRenderOptions(defaults, { font, color, maxWidth, timeout, speed, align, border }),
  };
}

export function isAlignment(value: string): value is Alignment {
  return ALIGNMENTS.some((alignment) => alignment === value);
}

export function isBorderStyle(value: string): value is BorderStyle {
  return BORDER_STYLES.some((style) => style === value);
}

export type SanitizeResult = { ok: true; text: string } | { ok: false; error: string };

/**
 * Clean raw input text: drop control characters, collapse whitespace runs,
 * trim, and enforce a maximum length counted in code points.
 */
export function sanitizeText(raw: string, maxLength: number = MAX_TEXT_LENGTH): SanitizeResult {
  const text = raw.replace(/\p{Cc}/gu, " ").replace(/\s+/g, " ").trim();
  const length = [...text].length;
  if (length > maxLength) {
    return { ok: false, error: `text exceeds maximum length of ${maxLength} characters` };
  }
  return { ok: true, text };
}
