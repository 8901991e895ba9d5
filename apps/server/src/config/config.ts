import {
  ALIGNMENTS,
  BORDER_STYLES,
  MAX_TEXT_LENGTH,
  MAX_WIDTH,
  isAlignment,
  isBorderStyle,
  type RenderDefaults,
} from "@marquee/protocol";
import { z } from "zod";
import type { AnimationConfig } from "../animation/streamer.js";
import { bundledFontDirectory } from "../fonts/figletFont.js";

export const ENV_PREFIX = "MARQUEE_";

export const DEFAULT_ALLOWED_FONTS = ["standard", "doom", "big", "slant", "small", "banner", "shadow"];

export interface ServerConfig {
  version: string;
  server: {
    port: number;
    host: string;
    shutdownGraceSeconds: number;
  };
  rateLimit: {
    requestsPerMinute: number;
    burst: number;
  };
  fonts: {
    defaultFont: string;
    path: string;
    allowed: string[];
  };
  streaming: {
    maxConcurrent: number;
    defaultTimeoutSeconds: number;
    maxTimeoutSeconds: number;
    defaultSpeed: number;
    minSpeed: number;
    maxSpeed: number;
  };
  text: {
    maxLength: number;
    defaults: RenderDefaults;
  };
  logConsole: boolean;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const integer = (min: number, max: number) => z.coerce.number().int().min(min).max(max);

const boolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const fontList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
  )
  .pipe(z.array(z.string()).min(1, "must name at least one font"));

const alignment = z.string().trim().toLowerCase().refine(isAlignment, `must be one of ${ALIGNMENTS.join(", ")}`);
const border = z.string().trim().toLowerCase().refine(isBorderStyle, `must be one of ${BORDER_STYLES.join(", ")}`);

const EnvSchema = z
  .object({
    VERSION: z.string().default("dev"),
    SERVER_PORT: integer(1, 65535).default(8080),
    SERVER_HOST: z.string().min(1).default("0.0.0.0"),
    SERVER_SHUTDOWN_GRACE: integer(0, 3600).default(10),
    RATELIMIT_REQUESTS_PER_MINUTE: integer(1, 1_000_000).default(100),
    RATELIMIT_BURST: integer(1, 1_000_000).default(10),
    FONTS_DEFAULT: z.string().trim().min(1).default("standard"),
    FONTS_PATH: z.string().min(1).optional(),
    FONTS_ALLOWED: fontList.default(DEFAULT_ALLOWED_FONTS.join(",")),
    STREAMING_MAX_CONCURRENT: integer(0, 100_000).default(100),
    STREAMING_DEFAULT_TIMEOUT: integer(1, 86_400).default(30),
    STREAMING_MAX_TIMEOUT: integer(1, 86_400).default(300),
    STREAMING_DEFAULT_SPEED: integer(1, 1000).default(5),
    STREAMING_MIN_SPEED: integer(1, 1000).default(1),
    STREAMING_MAX_SPEED: integer(1, 1000).default(10),
    TEXT_MAX_LENGTH: integer(1, MAX_TEXT_LENGTH).default(100),
    TEXT_DEFAULT_ALIGN: alignment.default("left"),
    TEXT_DEFAULT_BORDER: border.default("none"),
    TEXT_DEFAULT_COLOR: z.string().trim().toLowerCase().min(1).default("rainbow"),
    TEXT_DEFAULT_MAX_WIDTH: integer(0, MAX_WIDTH).default(80),
    LOG_CONSOLE: boolean.default("true"),
  })
  .superRefine((env, ctx) => {
    if (env.STREAMING_DEFAULT_TIMEOUT > env.STREAMING_MAX_TIMEOUT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["STREAMING_DEFAULT_TIMEOUT"],
        message: "must not exceed STREAMING_MAX_TIMEOUT",
      });
    }
    if (env.STREAMING_MIN_SPEED > env.STREAMING_MAX_SPEED) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["STREAMING_MIN_SPEED"],
        message: "must not exceed STREAMING_MAX_SPEED",
      });
    } else if (
      env.STREAMING_DEFAULT_SPEED < env.STREAMING_MIN_SPEED ||
      env.STREAMING_DEFAULT_SPEED > env.STREAMING_MAX_SPEED
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["STREAMING_DEFAULT_SPEED"],
        message: `must be between ${env.STREAMING_MIN_SPEED} and ${env.STREAMING_MAX_SPEED}`,
      });
    }
    if (!env.FONTS_ALLOWED.includes(env.FONTS_DEFAULT)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["FONTS_DEFAULT"],
        message: `"${env.FONTS_DEFAULT}" is not in FONTS_ALLOWED`,
      });
    }
  });

/**
 * Collect `MARQUEE_*` variables with the prefix stripped. Blank values count as unset.
 */
function readPrefixed(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined && value.trim() !== "") {
      values[key.slice(ENV_PREFIX.length)] = value;
    }
  }
  return values;
}

/**
 * Load server configuration from the environment.
 * Throws {@link ConfigError} listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(readPrefixed(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.length > 0 ? `${ENV_PREFIX}${issue.path.join(".")}` : "environment";
        return `${key}: ${issue.message}`;
      }),
    );
  }

  const e = parsed.data;
  return {
    version: e.VERSION,
    server: {
      port: e.SERVER_PORT,
      host: e.SERVER_HOST,
      shutdownGraceSeconds: e.SERVER_SHUTDOWN_GRACE,
    },
    rateLimit: {
      requestsPerMinute: e.RATELIMIT_REQUESTS_PER_MINUTE,
      burst: e.RATELIMIT_BURST,
    },
    fonts: {
      defaultFont: e.FONTS_DEFAULT,
      path: e.FONTS_PATH ?? bundledFontDirectory(),
      allowed: e.FONTS_ALLOWED,
    },
    streaming: {
      maxConcurrent: e.STREAMING_MAX_CONCURRENT,
      defaultTimeoutSeconds: e.STREAMING_DEFAULT_TIMEOUT,
      maxTimeoutSeconds: e.STREAMING_MAX_TIMEOUT,
      defaultSpeed: e.STREAMING_DEFAULT_SPEED,
      minSpeed: e.STREAMING_MIN_SPEED,
      maxSpeed: e.STREAMING_MAX_SPEED,
    },
    text: {
      maxLength: e.TEXT_MAX_LENGTH,
      defaults: {
        font: e.FONTS_DEFAULT,
        color: e.TEXT_DEFAULT_COLOR,
        maxWidth: e.TEXT_DEFAULT_MAX_WIDTH,
        speed: e.STREAMING_DEFAULT_SPEED,
        align: e.TEXT_DEFAULT_ALIGN,
        border: e.TEXT_DEFAULT_BORDER,
      },
    },
    logConsole: e.LOG_CONSOLE,
  };
}

export function animationConfigFrom(config: ServerConfig): AnimationConfig {
  return {
    defaultFont: config.fonts.defaultFont,
    defaultTimeoutSeconds: config.streaming.defaultTimeoutSeconds,
    maxTimeoutSeconds: config.streaming.maxTimeoutSeconds,
    speed: { min: config.streaming.minSpeed, max: config.streaming.maxSpeed },
  };
}

export function describeConfig(config: ServerConfig): string {
  const { server, streaming, fonts, text } = config;
  return [
    `version=${config.version}`,
    `listen=${server.host}:${server.port}`,
    `fonts=${fonts.allowed.join(",")} (default ${fonts.defaultFont}) from ${fonts.path}`,
    `streams<=${streaming.maxConcurrent} timeout=${streaming.defaultTimeoutSeconds}s/${streaming.maxTimeoutSeconds}s`,
    `speed=${streaming.minSpeed}..${streaming.maxSpeed} (default ${streaming.defaultSpeed})`,
    `align=${text.defaults.align} border=${text.defaults.border} color=${text.defaults.color}`,
  ].join(" ");
}
