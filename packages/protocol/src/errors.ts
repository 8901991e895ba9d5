import type { ErrorBody } from "./types.js";

export const ErrorCode = {
  // Admission
  CAPACITY_EXCEEDED: "CAPACITY_EXCEEDED",
  RATE_LIMITED: "RATE_LIMITED",

  // Rendering
  NO_CACHE: "NO_CACHE",
  NO_FONTS_LOADED: "NO_FONTS_LOADED",
  RENDER_FAILED: "RENDER_FAILED",

  // Request
  INVALID_OPTION: "INVALID_OPTION",
  NOT_FOUND: "NOT_FOUND",
  INTERNAL: "INTERNAL",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export const HTTP_STATUS: Record<ErrorCodeValue, number> = {
  CAPACITY_EXCEEDED: 503,
  RATE_LIMITED: 429,
  NO_CACHE: 500,
  NO_FONTS_LOADED: 500,
  RENDER_FAILED: 500,
  INVALID_OPTION: 400,
  NOT_FOUND: 404,
  INTERNAL: 500,
};

export function createErrorBody(code: ErrorCodeValue, message: string): ErrorBody {
  return {
    error: { code, message },
  };
}
