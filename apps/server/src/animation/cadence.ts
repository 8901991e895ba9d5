export interface SpeedRange {
  min: number;
  max: number;
}

export interface TimeoutPolicy {
  defaultSeconds: number;
  maxSeconds: number;
}

/** Frame interval at speed 1; speed n gives an interval of this divided by n. */
export const FRAME_INTERVAL_BASE_MS = 1000;

export function clampSpeed(speed: number, range: SpeedRange): number {
  if (!Number.isFinite(speed)) {
    return range.min;
  }
  return Math.min(range.max, Math.max(range.min, Math.trunc(speed)));
}

/**
 * Delay between frames for a requested speed.
 */
export function cadenceMs(speed: number, range: SpeedRange): number {
  return Math.round(FRAME_INTERVAL_BASE_MS / clampSpeed(speed, range));
}

/**
 * Stream lifetime in seconds: the requested timeout (or the default when
 * none was requested), never longer than the server maximum.
 */
export function effectiveTimeoutSeconds(requested: number, policy: TimeoutPolicy): number {
  const wanted = requested > 0 ? requested : policy.defaultSeconds;
  return Math.min(wanted, policy.maxSeconds);
}
