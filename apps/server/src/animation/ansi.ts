export const CLEAR_SCREEN = "\x1b[2J";
export const CURSOR_HOME = "\x1b[H";
export const HIDE_CURSOR = "\x1b[?25l";
export const SHOW_CURSOR = "\x1b[?25h";
export const RESET = "\x1b[0m";

/** Written once before the first frame. */
export const STREAM_PREAMBLE = CLEAR_SCREEN + CURSOR_HOME + HIDE_CURSOR;

/** Written once when a stream ends while the client is still connected. */
export const STREAM_EPILOGUE = RESET + SHOW_CURSOR + "\n";
