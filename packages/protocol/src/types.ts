export type Alignment = "left" | "center" | "right";

export type BorderStyle = "none" | "single" | "double" | "rounded" | "ascii";

export const ALIGNMENTS: readonly Alignment[] = ["left", "center", "right"];

export const BORDER_STYLES: readonly BorderStyle[] = ["none", "single", "double", "rounded", "ascii"];

/**
 * Options for one render request, static or animated.
 *
 * Produced by {@link createRenderOptions} or the query parser and frozen
 * afterwards.
 */
export interface RenderOptions {
  readonly font: string;
  /** Color scheme name. Unknown names fall back to the default scheme. */
  readonly color: string;
  /** Maximum output width in columns; 0 means unbounded. */
  readonly maxWidth: number;
  /** Requested stream duration in seconds; 0 means the server default. */
  readonly timeout: number;
  /** Animation speed, clamped to the configured range when a stream starts. */
  readonly speed: number;
  readonly align: Alignment;
  readonly border: BorderStyle;
}

export interface RenderDefaults {
  font: string;
  color: string;
  maxWidth: number;
  speed: number;
  align: Alignment;
  border: BorderStyle;
}

// --- Response bodies ---

export interface ErrorPayload {
  code: string;
  message: string;
}

export interface ErrorBody {
  error: ErrorPayload;
}

export interface HealthBody {
  status: "ok" | "draining";
  version: string;
  activeStreams: number;
  maxStreams: number;
  fonts: number;
}

export interface FontListBody {
  default: string;
  fonts: string[];
}

export interface MetricsBody {
  staticRequests: number;
  partyRequests: number;
  fontRequests: number;
  rejectedStreams: number;
  totalErrors: number;
}
