/**
 * Hard bounds on request options, independent of server configuration.
 */
export const LIMITS = {
  /** Longest accepted input text before configuration narrows it further */
  MAX_TEXT_LENGTH: 1000,

  /** Widest output a client may ask for */
  MAX_WIDTH: 1000,

  /** Longest font name accepted by the option parser */
  MAX_FONT_NAME_LENGTH: 64,

  /** Longest accepted timeout request in seconds; the server caps it again */
  MAX_TIMEOUT_SECONDS: 86_400,
} as const;

export const { MAX_TEXT_LENGTH, MAX_WIDTH, MAX_FONT_NAME_LENGTH, MAX_TIMEOUT_SECONDS } = LIMITS;
